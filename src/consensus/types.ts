import { z } from 'zod';
import { LABELS, TIMEFRAMES } from '../core/types.js';
import { predictionRecordSchema } from './predictions.js';

export const voteCountsSchema = z.object({
  Buy: z.number().int().nonnegative(),
  Sell: z.number().int().nonnegative(),
  Hold: z.number().int().nonnegative()
});

export const consensusRecordSchema = z.object({
  symbol: z.string(),
  timeframe: z.enum(TIMEFRAMES),
  label: z.enum(LABELS),
  confidence: z.number(),
  voteCounts: voteCountsSchema,
  /** Contributing sources in configured order. */
  sources: z.array(z.string()),
  missingSources: z.array(z.string()),
  /** True when at least one contributing record was synthesized by timeframe inference. */
  inferred: z.boolean(),
  predictions: z.record(predictionRecordSchema),
  timestamp: z.string()
});

export type ConsensusRecord = z.infer<typeof consensusRecordSchema>;
