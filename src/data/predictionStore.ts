import type { ConsensusRecord } from '../consensus/types.js';
import type { PredictionRecord } from '../consensus/predictions.js';
import type { Timeframe } from '../core/types.js';

export interface PredictionStore {
  /** Replaces any record held for the same (source, symbol, timeframe). */
  savePrediction(record: PredictionRecord): Promise<void>;
  getPrediction(source: string, symbol: string, timeframe: Timeframe): Promise<PredictionRecord | undefined>;
  getPredictionsForSymbol(source: string, symbol: string): Promise<PredictionRecord[]>;
}

export interface ConsensusStore {
  /** Last write wins: the previous record for (symbol, timeframe) is replaced, never merged. */
  saveConsensus(record: ConsensusRecord): Promise<void>;
  getConsensus(symbol: string, timeframe: Timeframe): Promise<ConsensusRecord | undefined>;
  listConsensus(symbol: string): Promise<ConsensusRecord[]>;
}

export const predictionKey = (source: string, symbol: string, timeframe: Timeframe): string =>
  `${source}:${symbol}:${timeframe}`;

export const consensusKey = (symbol: string, timeframe: Timeframe): string => `${symbol}:${timeframe}`;
