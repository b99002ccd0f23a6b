export interface EmotionSummary {
  frequency: Record<string, number>;
  distribution: Record<string, number>;
  total: number;
}

/**
 * Counts labels and normalizes the counts. Entries without a label count as
 * "neutral". `total` falls back to 1 when there is nothing to count, so the
 * distribution never divides by zero.
 */
export function summarizeEmotions(
  emotions: ReadonlyArray<string | null | undefined>,
): EmotionSummary {
  const counts = new Map<string, number>();
  for (const emotion of emotions) {
    const label = emotion ?? 'neutral';
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  let total = 0;
  for (const count of counts.values()) total += count;
  total = total || 1;

  return {
    frequency: Object.fromEntries(counts),
    distribution: Object.fromEntries(
      [...counts].map(([label, count]) => [label, count / total]),
    ),
    total,
  };
}
