/**
 * Timeframe inference — optional fallback that synthesizes a placeholder
 * prediction for a timeframe from the same symbol's other timeframes.
 *
 * This is a lossy heuristic. It only runs when configured, and every record
 * it produces carries `inferred: true`.
 *
 *   per_source: each source missing the timeframe is filled from its own
 *               predictions for the other timeframes.
 *   aggregate:  only when no source has the timeframe, one placeholder with
 *               source `inferred` is built from every source's other timeframes.
 */

import type { PredictionRecord } from './predictions.js';
import { pickMajorityLabel, tallyVotes } from './voting.js';
import type { TimeframeInferenceMode } from '../config/types.js';
import type { Timeframe } from '../core/types.js';
import { mean } from '../core/validation.js';

export const INFERRED_SOURCE = 'inferred';

export const inferFromTimeframes = (
  symbol: string,
  timeframe: Timeframe,
  source: string,
  records: readonly PredictionRecord[]
): PredictionRecord | undefined => {
  const basis = records.filter((r) => r.symbol === symbol && r.timeframe !== timeframe && r.inferred !== true);
  if (basis.length === 0) return undefined;

  const inferredFrom = [...new Set(basis.map((r) => r.timeframe))];
  // Stamped with the newest basis record so re-running on the same inputs is stable.
  const timestamp = basis.map((r) => r.timestamp).sort().at(-1) ?? '';
  return {
    symbol,
    timeframe,
    source,
    label: pickMajorityLabel(tallyVotes(basis)),
    confidence: mean(basis.map((r) => r.confidence)),
    technicalAnalysis: `Analysis inferred from the ${inferredFrom.join(', ')} predictions for ${symbol}.`,
    keyFactors: ['Inferred from other timeframes'],
    inferredFrom,
    inferred: true,
    timestamp
  };
};

export interface InferenceInput {
  symbol: string;
  timeframe: Timeframe;
  sources: readonly string[];
  /** Records observed for the requested timeframe, keyed by source. */
  direct: ReadonlyMap<string, PredictionRecord>;
  /** Every stored record for the symbol, keyed by source. */
  history: ReadonlyMap<string, readonly PredictionRecord[]>;
}

export const applyTimeframeInference = (mode: TimeframeInferenceMode, input: InferenceInput): PredictionRecord[] => {
  const { symbol, timeframe, sources, direct, history } = input;

  if (mode === 'per_source') {
    return sources.flatMap((source) => {
      if (direct.has(source)) return [];
      const inferred = inferFromTimeframes(symbol, timeframe, source, history.get(source) ?? []);
      return inferred ? [inferred] : [];
    });
  }

  if (mode === 'aggregate' && direct.size === 0) {
    const all = sources.flatMap((source) => history.get(source) ?? []);
    const inferred = inferFromTimeframes(symbol, timeframe, INFERRED_SOURCE, all);
    return inferred ? [inferred] : [];
  }

  return [];
};
