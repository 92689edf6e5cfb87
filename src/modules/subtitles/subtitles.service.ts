import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { SubtitleCue } from '../../common/interfaces/subtitle.interface';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { parseSubtitles, renderSrt } from './subtitle-format';

export interface MergeResult {
  content: string;
  cues: number;
}

@Injectable()
export class SubtitlesService {
  private readonly logger = new Logger(SubtitlesService.name);

  /**
   * 合并两份已有字幕（SRT / VTT）为双语 SRT
   * 按序号一一对应，时间轴优先取原文字幕；译文在上、原文在下
   */
  mergeBilingual(originalContent: string, translatedContent: string): MergeResult {
    const original = parseSubtitles(originalContent);
    const translated = parseSubtitles(translatedContent);

    if (original.length === 0 || translated.length === 0) {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: 'Could not parse subtitle cues from both files',
      });
    }
    if (original.length !== translated.length) {
      this.logger.warn(`Cue count mismatch: original=${original.length}, translated=${translated.length}`);
    }

    const count = Math.max(original.length, translated.length);
    const cues: SubtitleCue[] = [];
    for (let i = 0; i < count; i++) {
      const timing = original[i] ?? translated[i];
      const translatedLine = translated[i]?.text.trim();
      cues.push({
        start: timing.start,
        end: timing.end,
        ...(translatedLine ? { translatedLine } : {}),
        originalLine: original[i]?.text.trim() ?? '',
      });
    }

    return { content: renderSrt(cues, 'bilingual'), cues: cues.length };
  }
}
