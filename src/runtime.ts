import { MarketAnalyzer } from './analysis/marketAnalyzer.js';
import type { AppConfig } from './config/types.js';
import { ConsensusEngine } from './consensus/engine.js';
import { JsonLogger } from './core/logger.js';
import type { Logger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { InMemoryStore } from './data/inMemoryStore.js';
import type { ConsensusStore, PredictionStore } from './data/predictionStore.js';
import { SqliteStore } from './data/sqliteStore.js';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  metrics: InMemoryMetrics;
  store: PredictionStore & ConsensusStore;
  analyzer: MarketAnalyzer;
  consensus: ConsensusEngine;
}

export const buildStore = (config: AppConfig): PredictionStore & ConsensusStore =>
  config.store.driver === 'sqlite' ? new SqliteStore(config.store.sqlitePath) : new InMemoryStore();

export const buildRuntime = (config: AppConfig, logger: Logger = new JsonLogger(config.logLevel)): Runtime => {
  const metrics = new InMemoryMetrics();
  const store = buildStore(config);

  const analyzer = new MarketAnalyzer(logger.child({ component: 'analysis' }), config.indicators, config.volumeProfile);
  const consensus = new ConsensusEngine({
    sources: config.consensus.sources,
    predictions: store,
    store,
    logger,
    metrics,
    inference: config.consensus.timeframeInference
  });

  logger.info('runtime ready', {
    store: config.store.driver,
    sources: config.consensus.sources,
    timeframeInference: config.consensus.timeframeInference
  });

  return { config, logger, metrics, store, analyzer, consensus };
};
