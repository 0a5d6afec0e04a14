/**
 * Consensus Engine — merges per-model predictions for one symbol/timeframe
 * into a single record.
 *
 * Label: majority vote (see `pickMajorityLabel` for ties).
 * Confidence: plain mean over the sources that produced a record; absent
 * sources are excluded, not counted as zero.
 *
 * Every aggregation builds a fresh record and replaces the stored one for
 * its (symbol, timeframe) key. The engine holds no lock: callers must not
 * run two aggregations for the same key at once.
 */

import { applyTimeframeInference } from './inference.js';
import type { PredictionRecord } from './predictions.js';
import type { ConsensusRecord } from './types.js';
import { pickMajorityLabel, tallyVotes } from './voting.js';
import type { TimeframeInferenceMode } from '../config/types.js';
import { InvalidPredictionError, NoPredictionsAvailableError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { TIMEFRAMES } from '../core/types.js';
import type { Advisory, Timeframe } from '../core/types.js';
import { mean } from '../core/validation.js';
import type { ConsensusStore, PredictionStore } from '../data/predictionStore.js';

export interface CombineOptions {
  /** Known sources in vote order; records from other sources follow, sorted by name. */
  sources?: readonly string[];
  timestamp: string;
}

const orderRecords = (records: readonly PredictionRecord[], sources: readonly string[]): PredictionRecord[] => {
  const rank = (source: string): number => {
    const i = sources.indexOf(source);
    return i === -1 ? sources.length : i;
  };
  return [...records].sort((a, b) => rank(a.source) - rank(b.source) || a.source.localeCompare(b.source));
};

/** Pure aggregation over already collected records. */
export const combinePredictions = (
  symbol: string,
  timeframe: Timeframe,
  records: readonly PredictionRecord[],
  options: CombineOptions
): ConsensusRecord => {
  if (records.length === 0) throw new NoPredictionsAvailableError(symbol, timeframe);

  const seen = new Set<string>();
  for (const record of records) {
    if (record.symbol !== symbol || record.timeframe !== timeframe) {
      throw new InvalidPredictionError(
        `Prediction from ${record.source} is for ${record.symbol} (${record.timeframe}), expected ${symbol} (${timeframe})`,
        { source: record.source }
      );
    }
    if (seen.has(record.source)) {
      throw new InvalidPredictionError(`Duplicate prediction from ${record.source}`, { source: record.source });
    }
    seen.add(record.source);
  }

  const sources = options.sources ?? [];
  const ordered = orderRecords(records, sources);
  const voteCounts = tallyVotes(ordered);

  return {
    symbol,
    timeframe,
    label: pickMajorityLabel(voteCounts),
    confidence: mean(ordered.map((r) => r.confidence)),
    voteCounts,
    sources: ordered.map((r) => r.source),
    missingSources: sources.filter((s) => !seen.has(s)),
    inferred: ordered.some((r) => r.inferred === true),
    predictions: Object.fromEntries(ordered.map((r) => [r.source, r])),
    timestamp: options.timestamp
  };
};

export interface ConsensusEngineDeps {
  sources: readonly string[];
  predictions: PredictionStore;
  store: ConsensusStore;
  logger: Logger;
  metrics?: Metrics;
  inference?: TimeframeInferenceMode;
  clock?: () => Date;
}

export interface SymbolAggregation {
  records: ConsensusRecord[];
  failures: Array<{ timeframe: Timeframe; error: NoPredictionsAvailableError }>;
}

export class ConsensusEngine {
  private readonly logger: Logger;
  private readonly inference: TimeframeInferenceMode;
  private readonly clock: () => Date;

  constructor(private readonly deps: ConsensusEngineDeps) {
    this.logger = deps.logger.child({ component: 'consensus' });
    this.inference = deps.inference ?? 'off';
    this.clock = deps.clock ?? (() => new Date());
  }

  async aggregate(symbol: string, timeframe: Timeframe): Promise<ConsensusRecord> {
    const { sources, predictions, store, metrics } = this.deps;
    const timestamp = this.clock().toISOString();

    const direct = new Map<string, PredictionRecord>();
    for (const source of sources) {
      const record = await predictions.getPrediction(source, symbol, timeframe);
      if (record) direct.set(source, record);
    }

    let inferred: PredictionRecord[] = [];
    if (this.inference !== 'off' && direct.size < sources.length) {
      const history = new Map<string, PredictionRecord[]>();
      for (const source of sources) {
        history.set(source, await predictions.getPredictionsForSymbol(source, symbol));
      }
      inferred = applyTimeframeInference(this.inference, { symbol, timeframe, sources, direct, history });
    }

    const records = [...direct.values(), ...inferred];
    if (records.length === 0) {
      metrics?.increment('consensus_no_predictions_total', 1, { timeframe });
      this.logger.warn('no predictions available', { symbol, timeframe, sources: [...sources] });
      throw new NoPredictionsAvailableError(symbol, timeframe);
    }

    const consensus = combinePredictions(symbol, timeframe, records, { sources, timestamp });

    for (const advisory of this.advisoriesFor(consensus, inferred)) {
      this.logger.warn('consensus advisory', { symbol, timeframe, ...advisory });
    }
    if (consensus.missingSources.length > 0) {
      metrics?.increment('consensus_partial_total', 1, { timeframe });
    }

    await store.saveConsensus(consensus);
    metrics?.increment('consensus_aggregations_total', 1, { timeframe });
    metrics?.gauge('consensus_confidence', consensus.confidence, { symbol, timeframe });
    this.logger.info('consensus saved', {
      symbol,
      timeframe,
      label: consensus.label,
      confidence: consensus.confidence,
      voteCounts: consensus.voteCounts
    });

    return consensus;
  }

  /** Aggregates every timeframe; a timeframe without predictions is reported, not thrown. */
  async aggregateSymbol(symbol: string): Promise<SymbolAggregation> {
    const result: SymbolAggregation = { records: [], failures: [] };
    for (const timeframe of TIMEFRAMES) {
      try {
        result.records.push(await this.aggregate(symbol, timeframe));
      } catch (err) {
        if (!(err instanceof NoPredictionsAvailableError)) throw err;
        result.failures.push({ timeframe, error: err });
      }
    }
    return result;
  }

  private advisoriesFor(consensus: ConsensusRecord, inferred: readonly PredictionRecord[]): Advisory[] {
    const advisories: Advisory[] = [];
    if (consensus.missingSources.length > 0) {
      advisories.push({
        code: 'PARTIAL_PREDICTIONS',
        required: this.deps.sources.length,
        available: consensus.sources.length,
        message: `Missing predictions from ${consensus.missingSources.join(', ')}`
      });
    }
    if (inferred.length > 0) {
      advisories.push({
        code: 'INFERRED_PREDICTIONS',
        available: inferred.length,
        message: `Inferred from other timeframes: ${inferred.map((r) => r.source).join(', ')}`
      });
    }
    return advisories;
  }
}
