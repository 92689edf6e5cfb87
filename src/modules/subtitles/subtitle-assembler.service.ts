import { Injectable, Logger } from '@nestjs/common';
import {
  AssembledCues,
  SubtitleCue,
  TimedUtterance,
  TranslationUnit,
} from '../../common/interfaces/subtitle.interface';

export interface AssemblerConfig {
  /** 最短显示时长，不足时向后延长（不超过下一条开始） */
  minCueDurationMs: number;
  /** 每行最大字符数，0 或不设置表示不换行 */
  maxLineLength?: number;
  /** 相邻两条之间至少保留的间隔 */
  minGapMs: number;
}

interface Timing {
  start: number;
  end: number;
}

const codePointLength = (value: string) => Array.from(value).length;

/**
 * 按最大字符数折行
 * 有空格时按词折行，超长的词或无空格文本（中日文）按字符硬切
 */
export function wrapText(text: string, maxLineLength?: number): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (!maxLineLength || maxLineLength <= 0 || codePointLength(clean) <= maxLineLength) {
    return clean;
  }

  const lines: string[] = [];
  let current = '';
  for (const word of clean.split(' ')) {
    const candidate = current ? `${current} ${word}` : word;
    if (codePointLength(candidate) <= maxLineLength) {
      current = candidate;
      continue;
    }
    if (current) {
      lines.push(current);
    }
    // 按码点切分，避免切断代理对
    const chars = Array.from(word);
    while (chars.length > maxLineLength) {
      lines.push(chars.splice(0, maxLineLength).join(''));
    }
    current = chars.join('');
  }
  if (current) {
    lines.push(current);
  }
  return lines.join('\n');
}

@Injectable()
export class SubtitleAssemblerService {
  private readonly logger = new Logger(SubtitleAssemblerService.name);

  /**
   * 按 index 合并时间轴、原文与译文，生成仅译文和双语两组字幕
   * 两组字幕条数、时间完全一致
   */
  assemble(
    units: readonly TranslationUnit[],
    utterances: readonly TimedUtterance[],
    config: AssemblerConfig,
  ): AssembledCues {
    const translations = new Map(units.map((unit) => [unit.index, unit.translatedText]));
    const items = utterances
      .filter((u) => u.text.trim().length > 0)
      .slice()
      .sort((a, b) => a.start - b.start || a.index - b.index);
    const timings = this.resolveTimings(items, config);

    const translatedOnly: SubtitleCue[] = [];
    const bilingual: SubtitleCue[] = [];

    items.forEach((utterance, i) => {
      const { start, end } = timings[i];
      const original = wrapText(utterance.text, config.maxLineLength);
      const translatedText = translations.get(utterance.index)?.trim();
      // 缺失译文按原文处理
      const translated = translatedText ? wrapText(translatedText, config.maxLineLength) : original;

      translatedOnly.push(Object.freeze({ start, end, translatedLine: translated, originalLine: original }));
      // 双语始终两行，译文与原文相同时也重复显示
      bilingual.push(Object.freeze({ start, end, translatedLine: translated, originalLine: original }));
    });

    const missing = items.filter((u) => !translations.get(u.index)?.trim()).length;
    if (missing > 0) {
      this.logger.warn(`${missing} cues have no translation, using original text`);
    }

    return { translatedOnly: Object.freeze(translatedOnly), bilingual: Object.freeze(bilingual) };
  }

  /**
   * 计算每条字幕的最终时间
   * 1. 开始时间不早于上一条结束
   * 2. 时长不足 minCueDurationMs 时延长
   * 3. 结束时间超过下一条开始（减 minGapMs）时裁剪
   * 保证 start < end，且相邻两条 c1.end <= c2.start
   */
  private resolveTimings(items: readonly TimedUtterance[], config: AssemblerConfig): Timing[] {
    const timings: Timing[] = [];
    let previousEnd = 0;

    items.forEach((current, i) => {
      const next = items[i + 1];
      const start = Math.max(current.start, previousEnd);
      let end = Math.max(current.end, start + config.minCueDurationMs);

      if (next) {
        end = Math.min(end, next.start - config.minGapMs);
        if (end <= start) {
          // 下一条紧贴或早于本条开始，无法保留间隔
          end = Math.max(start + 1, Math.min(next.start, start + config.minCueDurationMs));
        }
      } else if (end <= start) {
        end = start + 1;
      }

      timings.push({ start, end });
      previousEnd = end;
    });

    return timings;
  }
}
