import { LABELS } from '../core/types.js';
import type { PredictionLabel, VoteCounts } from '../core/types.js';

export const tallyVotes = (records: ReadonlyArray<{ label: PredictionLabel }>): VoteCounts => {
  const counts: VoteCounts = { Buy: 0, Sell: 0, Hold: 0 };
  for (const record of records) counts[record.label] += 1;
  return counts;
};

/**
 * Label with the most votes. A tie that includes Hold resolves to Hold; any
 * other tie resolves to the first tied label in `Buy, Sell, Hold` order.
 */
export const pickMajorityLabel = (counts: VoteCounts): PredictionLabel => {
  const max = Math.max(...LABELS.map((label) => counts[label]));
  const tied = LABELS.filter((label) => counts[label] === max);
  if (tied.includes('Hold')) return 'Hold';
  return tied[0] ?? 'Hold';
};
