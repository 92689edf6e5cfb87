import { SubtitleCue } from '../../common/interfaces/subtitle.interface';

/**
 * translated：仅译文；bilingual：译文在上、原文在下
 */
export type RenderMode = 'translated' | 'bilingual';

/**
 * 解析字幕文件得到的条目（毫秒）
 */
export interface ParsedCue {
  start: number;
  end: number;
  text: string;
}

function splitTime(ms: number): [number, number, number, number] {
  const total = Math.max(0, Math.round(ms));
  return [Math.floor(total / 3_600_000), Math.floor((total % 3_600_000) / 60_000), Math.floor((total % 60_000) / 1000), total % 1000];
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/**
 * HH:MM:SS,mmm
 */
export function formatSrtTimestamp(ms: number): string {
  const [h, m, s, milli] = splitTime(ms);
  return `${pad(h)}:${pad(m)}:${pad(s)},${pad(milli, 3)}`;
}

/**
 * HH:MM:SS.mmm
 */
export function formatVttTimestamp(ms: number): string {
  const [h, m, s, milli] = splitTime(ms);
  return `${pad(h)}:${pad(m)}:${pad(s)}.${pad(milli, 3)}`;
}

export function cueText(cue: SubtitleCue, mode: RenderMode): string {
  if (mode === 'translated') {
    return cue.translatedLine ?? cue.originalLine;
  }
  return [cue.translatedLine, cue.originalLine].filter((line): line is string => !!line).join('\n');
}

/**
 * 生成 SRT，编号从 1 开始，条目之间空行分隔
 */
export function renderSrt(cues: readonly SubtitleCue[], mode: RenderMode): string {
  return cues
    .map((cue, i) => `${i + 1}\n${formatSrtTimestamp(cue.start)} --> ${formatSrtTimestamp(cue.end)}\n${cueText(cue, mode)}\n\n`)
    .join('');
}

export function renderVtt(cues: readonly SubtitleCue[], mode: RenderMode): string {
  const body = cues
    .map((cue) => `${formatVttTimestamp(cue.start)} --> ${formatVttTimestamp(cue.end)}\n${cueText(cue, mode)}\n`)
    .join('\n');
  return `WEBVTT\n\n${body}`;
}

/**
 * 支持 HH:MM:SS,mmm / HH:MM:SS.mmm / MM:SS.mmm
 */
export function parseTimestamp(value: string): number {
  const parts = value.trim().replace(',', '.').split(':');
  let seconds = 0;
  for (const part of parts) {
    seconds = seconds * 60 + parseFloat(part);
  }
  if (!Number.isFinite(seconds)) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return Math.round(seconds * 1000);
}

/**
 * 解析一个文本块：找到含 "-->" 的时间行，之后的行为字幕文本
 * 时间行之后的样式设置（如 "align:start"）忽略
 */
function parseBlock(block: string): ParsedCue | null {
  const lines = block.split('\n');
  const timeLine = lines.findIndex((line) => line.includes('-->'));
  if (timeLine === -1) {
    return null;
  }
  const [startPart, endPart] = lines[timeLine].split('-->');
  const endToken = endPart.trim().split(/\s+/)[0];
  try {
    return {
      start: parseTimestamp(startPart),
      end: parseTimestamp(endToken),
      text: lines.slice(timeLine + 1).join('\n').trim(),
    };
  } catch {
    return null;
  }
}

function blocks(content: string): string[] {
  return content
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .trim()
    .split(/\n{2,}/);
}

export function parseSrt(content: string): ParsedCue[] {
  return blocks(content).flatMap((block) => {
    const cue = parseBlock(block);
    return cue ? [cue] : [];
  });
}

export function parseVtt(content: string): ParsedCue[] {
  return blocks(content).flatMap((block) => {
    const first = block.trimStart();
    if (first.startsWith('WEBVTT') || first.startsWith('NOTE') || first.startsWith('STYLE')) {
      return [];
    }
    const cue = parseBlock(block);
    return cue ? [cue] : [];
  });
}

/**
 * 根据内容判断格式
 */
export function parseSubtitles(content: string): ParsedCue[] {
  return content.replace(/^\uFEFF/, '').trimStart().startsWith('WEBVTT') ? parseVtt(content) : parseSrt(content);
}
