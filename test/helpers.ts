/**
 * Shared test helpers — fixtures and capturing fakes.
 */

import type { Bar, PredictionLabel, Timeframe } from '../src/core/types.js';
import type { LogContext, Logger } from '../src/core/logger.js';
import type { PredictionRecord } from '../src/consensus/predictions.js';

// ── Capturing Logger ────────────────────────────────────────────────

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context: LogContext;
}

export const createMockLogger = (
  entries: LogEntry[] = [],
  bindings: LogContext = {}
): Logger & { entries: LogEntry[] } => {
  const push = (level: LogEntry['level']) => (message: string, context?: LogContext) => {
    entries.push({ level, message, context: { ...bindings, ...context } });
  };
  return {
    entries,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    child: (more: LogContext) => createMockLogger(entries, { ...bindings, ...more }),
  };
};

// ── Bar Factories ───────────────────────────────────────────────────

const HOUR = 3_600_000;
const START = Date.UTC(2024, 0, 2);

export function makeBar(overrides: Partial<Bar> = {}): Bar {
  return {
    time: START,
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1000,
    ...overrides,
  };
}

/** Bars from a list of closes; each bar spans ±1 around its close. */
export function barsFromCloses(closes: number[], volume = 1000): Bar[] {
  return closes.map((close, i) => ({
    time: START + i * HOUR,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume,
  }));
}

/**
 * Generate a series of bars with a trend.
 * direction: 'up' | 'down' | 'flat'
 */
export function makeBarSeries(
  count: number,
  direction: 'up' | 'down' | 'flat' = 'flat',
  opts: { startPrice?: number; step?: number; volume?: number } = {}
): Bar[] {
  const startPrice = opts.startPrice ?? 100;
  const step = opts.step ?? 1;
  const delta = direction === 'up' ? step : direction === 'down' ? -step : 0;
  return barsFromCloses(
    Array.from({ length: count }, (_, i) => startPrice + delta * i),
    opts.volume ?? 1000
  );
}

// ── Prediction Factory ──────────────────────────────────────────────

export function makePrediction(
  source: string,
  label: PredictionLabel,
  confidence: number,
  overrides: Partial<PredictionRecord> & { timeframe?: Timeframe } = {}
): PredictionRecord {
  return {
    symbol: 'NQ',
    timeframe: 'intraday',
    source,
    label,
    confidence,
    technicalAnalysis: `${source} technical view`,
    sentimentAnalysis: `${source} sentiment view`,
    keyFactors: [`${source} factor`],
    timestamp: '2024-01-02T15:00:00.000Z',
    ...overrides,
  };
}
