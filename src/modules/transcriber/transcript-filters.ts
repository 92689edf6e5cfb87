// 出现次数超过 maxRepeat 且占比超过该值的文本视为幻觉
const HALLUCINATION_SHARE = 0.15;

/**
 * 过滤语音识别的幻觉输出（Whisper 在静音、噪声处常重复同一句话）
 * 1. 去掉空文本
 * 2. 去掉高频重复文本
 * 3. 去掉与上一条完全相同的连续文本
 */
export function filterHallucinations<T extends { text: string }>(items: readonly T[], maxRepeat = 5): T[] {
  if (items.length === 0) {
    return [];
  }

  const counts = new Map<string, number>();
  for (const item of items) {
    const text = item.text.trim();
    counts.set(text, (counts.get(text) ?? 0) + 1);
  }

  const hallucinated = new Set<string>();
  for (const [text, count] of counts) {
    if (count > maxRepeat && count / items.length > HALLUCINATION_SHARE) {
      hallucinated.add(text);
    }
  }

  const kept: T[] = [];
  let previous: string | null = null;
  for (const item of items) {
    const text = item.text.trim();
    if (!text || hallucinated.has(text) || text === previous) {
      continue;
    }
    kept.push(item);
    previous = text;
  }
  return kept;
}
