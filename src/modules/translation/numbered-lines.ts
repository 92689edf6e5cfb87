import { AlignmentError } from '../../common/errors/pipeline.errors';

export interface NumberedLine {
  /** 批次内编号，从 1 开始 */
  number: number;
  text: string;
}

const LINE_PATTERN = /^\s*Line\s+(\d+)\s*:\s?(.*)$/i;

/**
 * 格式化为 "Line N: 文本"，文本中的换行合并为空格
 */
export function formatNumberedLines(lines: readonly NumberedLine[]): string {
  return lines.map((line) => `Line ${line.number}: ${line.text.replace(/\s*\n\s*/g, ' ').trim()}`).join('\n');
}

/**
 * 解析模型返回的编号行
 * 必须恰好包含 1..expected 且按顺序、内容非空，否则抛出 AlignmentError
 * 不带编号的行视为上一编号行的续行（模型折行），第一个编号行之前的内容忽略
 */
export function parseNumberedLines(response: string, expected: number): string[] {
  const parsed: NumberedLine[] = [];
  for (const raw of response.split(/\r?\n/)) {
    const match = LINE_PATTERN.exec(raw);
    if (match) {
      parsed.push({ number: parseInt(match[1], 10), text: match[2].trim() });
      continue;
    }
    const last = parsed[parsed.length - 1];
    const continuation = raw.trim();
    if (last && continuation) {
      last.text = last.text ? `${last.text} ${continuation}` : continuation;
    }
  }

  if (parsed.length !== expected) {
    throw new AlignmentError(
      `Expected ${expected} numbered lines, received ${parsed.length}`,
      expected,
      parsed.length,
    );
  }

  parsed.forEach((line, i) => {
    if (line.number !== i + 1) {
      throw new AlignmentError(
        `Line numbering out of order: expected ${i + 1}, found ${line.number}`,
        expected,
        parsed.length,
      );
    }
    if (!line.text) {
      throw new AlignmentError(`Line ${line.number} is empty`, expected, parsed.length);
    }
  });

  return parsed.map((line) => line.text);
}
