import { Injectable, Logger } from '@nestjs/common';
import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { renderSrt } from '../subtitles/subtitle-format';
import { PipelineResult, WrittenSubtitles } from './pipeline.types';

/**
 * 文件名中不允许的字符替换为下划线
 */
export function safeFileName(title: string): string {
  const cleaned = title
    .replace(/[\\/:*?"<>|\u0000-\u001f]/g, '_')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+/, '');
  return cleaned || 'subtitles';
}

/**
 * "Simplified Chinese" → "simplified-chinese"
 */
export function languageSlug(language: string): string {
  return (
    language
      .toLowerCase()
      .replace(/[^\p{L}\p{N}]+/gu, '-')
      .replace(/^-+|-+$/g, '') || 'translated'
  );
}

@Injectable()
export class SubtitleWriterService {
  private readonly logger = new Logger(SubtitleWriterService.name);

  /**
   * 写出仅译文和双语两份 SRT
   * 先写临时文件再改名，不会留下写了一半的字幕
   */
  async write(result: PipelineResult, dir: string, targetLanguage: string): Promise<WrittenSubtitles> {
    await mkdir(dir, { recursive: true });

    const base = safeFileName(result.title);
    const translatedPath = join(dir, `${base}.${languageSlug(targetLanguage)}.srt`);
    const bilingualPath = join(dir, `${base}.bilingual.srt`);

    await this.writeAtomic(translatedPath, renderSrt(result.cues.translatedOnly, 'translated'));
    await this.writeAtomic(bilingualPath, renderSrt(result.cues.bilingual, 'bilingual'));

    this.logger.log(`Subtitles written: ${translatedPath}, ${bilingualPath}`);
    return { translatedPath, bilingualPath };
  }

  private async writeAtomic(path: string, content: string): Promise<void> {
    const temp = `${path}.${process.pid}.${Date.now()}.tmp`;
    try {
      await writeFile(temp, content, 'utf-8');
      await rename(temp, path);
    } catch (error) {
      await unlink(temp).catch((cleanupError: unknown) =>
        this.logger.warn(`Failed to remove temp file ${temp}: ${String(cleanupError)}`),
      );
      throw error;
    }
  }
}
