export * from './core/types.js';
export * from './core/errors.js';
export { JsonLogger } from './core/logger.js';
export type { Logger, LogLevel, LogContext } from './core/logger.js';
export { InMemoryMetrics } from './core/metrics.js';
export type { Metrics } from './core/metrics.js';

export { loadConfig } from './config/load.js';
export { configSchema } from './config/schema.js';
export type { AppConfig } from './config/types.js';

export { parseBarSeries, requireColumns, REQUIRED_COLUMNS } from './analysis/bars.js';
export {
  calculateIndicators,
  calculateRsi,
  calculateMacd,
  calculateVwap,
  calculateBollingerBands,
  calculateSma,
  calculateEma,
  latestIndicatorValues,
  DEFAULT_INDICATOR_OPTIONS
} from './analysis/indicators.js';
export type { IndicatorSet, IndicatorOptions, IndicatorResult, LatestIndicatorValues } from './analysis/indicators.js';
export { formatIndicators, formatBasicTrend, basicTrend } from './analysis/indicatorFormatter.js';
export type { BasicTrend, Trend } from './analysis/indicatorFormatter.js';
export {
  buildVolumeProfile,
  analyzeVolumeProfile,
  summarizeVolumeProfile,
  compareBinsByVolume,
  DEFAULT_VOLUME_PROFILE_OPTIONS
} from './analysis/volumeProfile.js';
export type {
  VolumeProfile,
  VolumeProfileBin,
  VolumeProfileOptions,
  VolumeProfileSummary,
  VolumeProfileAnalysis
} from './analysis/volumeProfile.js';
export { formatVolumeProfile } from './analysis/volumeProfileFormatter.js';
export { MarketAnalyzer } from './analysis/marketAnalyzer.js';
export type { MarketAnalysis } from './analysis/marketAnalyzer.js';

export { predictionRecordSchema, parsePredictionRecord, parsePredictionResponse } from './consensus/predictions.js';
export type { PredictionRecord } from './consensus/predictions.js';
export { consensusRecordSchema } from './consensus/types.js';
export type { ConsensusRecord } from './consensus/types.js';
export { tallyVotes, pickMajorityLabel } from './consensus/voting.js';
export { applyTimeframeInference, inferFromTimeframes, INFERRED_SOURCE } from './consensus/inference.js';
export { ConsensusEngine, combinePredictions } from './consensus/engine.js';

export type { PredictionStore, ConsensusStore } from './data/predictionStore.js';
export { InMemoryStore } from './data/inMemoryStore.js';
export { SqliteStore } from './data/sqliteStore.js';

export { buildRuntime, buildStore } from './runtime.js';
export type { Runtime } from './runtime.js';
