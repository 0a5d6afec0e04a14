/**
 * Indicator Calculator — pure transforms from a bar sequence to indicator series.
 *
 * Every output series is aligned to the input bar index. Points inside an
 * indicator's warm-up window are `undefined`, never zero. Too few bars for an
 * indicator is not an error: the series stays undefined and an advisory is
 * returned next to it.
 */

import { SMA } from 'technicalindicators';
import { requireColumns } from './bars.js';
import type { Advisory, Bar, Series } from '../core/types.js';

export interface IndicatorOptions {
  rsiPeriod: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  bollingerPeriod: number;
  bollingerStdDev: number;
}

export const DEFAULT_INDICATOR_OPTIONS: IndicatorOptions = {
  rsiPeriod: 14,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  bollingerPeriod: 20,
  bollingerStdDev: 2
};

/** Below this many bars the set is still computed but flagged as unreliable. */
export const MIN_RELIABLE_BARS = 30;

export interface IndicatorSet {
  rsi: Series;
  macdLine: Series;
  signalLine: Series;
  histogram: Series;
  vwap: Series;
  bollingerUpper: Series;
  bollingerMiddle: Series;
  bollingerLower: Series;
}

export interface IndicatorResult {
  indicators: IndicatorSet;
  advisories: Advisory[];
}

export type LatestIndicatorValues = { [K in keyof IndicatorSet]: number | undefined };

export const emptySeries = (length: number): Series => new Array<number | undefined>(length).fill(undefined);

const alignTail = (values: readonly number[], length: number): Series => {
  const out = emptySeries(length - values.length);
  return out.concat(values);
};

/** Simple moving average aligned to the input; the first `period - 1` points are undefined. */
export const calculateSma = (values: readonly number[], period: number): Series => {
  if (values.length < period) return emptySeries(values.length);
  return alignTail(SMA.calculate({ period, values: [...values] }), values.length);
};

/** Exponential moving average with `alpha = 2 / (span + 1)`, seeded at the first value. */
export const calculateEma = (values: readonly number[], span: number): number[] => {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  let prev: number | undefined;
  for (const value of values) {
    prev = prev === undefined ? value : alpha * value + (1 - alpha) * prev;
    out.push(prev);
  }
  return out;
};

const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
};

/**
 * RSI over rolling means of gains and losses. The first bar has no prior
 * close and contributes a zero move, so `period` bars yield one value.
 */
export const calculateRsi = (closes: readonly number[], period = DEFAULT_INDICATOR_OPTIONS.rsiPeriod): Series => {
  if (closes.length < period) return emptySeries(closes.length);

  const gains: number[] = [];
  const losses: number[] = [];
  for (const [i, close] of closes.entries()) {
    const prev = i > 0 ? closes[i - 1] : undefined;
    const delta = prev === undefined ? 0 : close - prev;
    gains.push(delta > 0 ? delta : 0);
    losses.push(delta < 0 ? -delta : 0);
  }

  const avgGain = calculateSma(gains, period);
  const avgLoss = calculateSma(losses, period);
  return avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (gain === undefined || loss === undefined) return undefined;
    return rsiFromAverages(gain, loss);
  });
};

export interface MacdSeries {
  macdLine: Series;
  signalLine: Series;
  histogram: Series;
}

export const calculateMacd = (
  closes: readonly number[],
  fast = DEFAULT_INDICATOR_OPTIONS.macdFast,
  slow = DEFAULT_INDICATOR_OPTIONS.macdSlow,
  signal = DEFAULT_INDICATOR_OPTIONS.macdSignal
): MacdSeries => {
  const n = closes.length;
  if (n < slow) {
    return { macdLine: emptySeries(n), signalLine: emptySeries(n), histogram: emptySeries(n) };
  }

  const emaFast = calculateEma(closes, fast);
  const emaSlow = calculateEma(closes, slow);
  const line = emaFast.map((f, i) => f - (emaSlow[i] ?? f));
  const signalValues = calculateEma(line, signal);

  const mask = (values: readonly number[]): Series => values.map((v, i) => (i < slow - 1 ? undefined : v));
  return {
    macdLine: mask(line),
    signalLine: mask(signalValues),
    histogram: mask(line.map((m, i) => m - (signalValues[i] ?? m)))
  };
};

/** Running VWAP from the first bar; undefined while no volume has traded. */
export const calculateVwap = (bars: readonly Bar[]): Series => {
  let cumulativePv = 0;
  let cumulativeVolume = 0;
  return bars.map((bar) => {
    const typical = (bar.high + bar.low + bar.close) / 3;
    cumulativePv += typical * bar.volume;
    cumulativeVolume += bar.volume;
    return cumulativeVolume > 0 ? cumulativePv / cumulativeVolume : undefined;
  });
};

export interface BollingerSeries {
  upper: Series;
  middle: Series;
  lower: Series;
}

const sampleStdDev = (window: readonly number[], avg: number): number => {
  let sq = 0;
  for (const v of window) sq += (v - avg) ** 2;
  return Math.sqrt(sq / (window.length - 1));
};

export const calculateBollingerBands = (
  closes: readonly number[],
  period = DEFAULT_INDICATOR_OPTIONS.bollingerPeriod,
  k = DEFAULT_INDICATOR_OPTIONS.bollingerStdDev
): BollingerSeries => {
  const middle = calculateSma(closes, period);
  const upper: Series = [];
  const lower: Series = [];
  for (const [i, avg] of middle.entries()) {
    if (avg === undefined) {
      upper.push(undefined);
      lower.push(undefined);
      continue;
    }
    const band = k * sampleStdDev(closes.slice(i - period + 1, i + 1), avg);
    upper.push(avg + band);
    lower.push(avg - band);
  }
  return { upper, middle, lower };
};

const warmupAdvisory = (indicator: string, required: number, available: number): Advisory => ({
  code: 'INSUFFICIENT_WARMUP',
  indicator,
  required,
  available,
  message: `Not enough data points (${available}) for ${indicator} calculation. Minimum ${required} required.`
});

/**
 * Computes the full {@link IndicatorSet}. Throws `MissingColumnsError` when a
 * bar lacks a required field; every other condition comes back as an advisory.
 */
export const calculateIndicators = (
  bars: readonly Bar[],
  options: Partial<IndicatorOptions> = {}
): IndicatorResult => {
  requireColumns(bars);
  const opts: IndicatorOptions = { ...DEFAULT_INDICATOR_OPTIONS, ...options };
  const n = bars.length;
  const closes = bars.map((b) => b.close);
  const advisories: Advisory[] = [];

  if (n < MIN_RELIABLE_BARS) {
    advisories.push({
      code: 'LIMITED_DATA',
      required: MIN_RELIABLE_BARS,
      available: n,
      message: `Only ${n} data points available. At least ${MIN_RELIABLE_BARS} recommended for reliable indicators.`
    });
  }
  if (n < opts.rsiPeriod) advisories.push(warmupAdvisory('RSI', opts.rsiPeriod, n));
  if (n < opts.macdSlow) advisories.push(warmupAdvisory('MACD', opts.macdSlow, n));
  if (n < 1) advisories.push(warmupAdvisory('VWAP', 1, n));
  if (n < opts.bollingerPeriod) advisories.push(warmupAdvisory('Bollinger Bands', opts.bollingerPeriod, n));

  const macd = calculateMacd(closes, opts.macdFast, opts.macdSlow, opts.macdSignal);
  const bands = calculateBollingerBands(closes, opts.bollingerPeriod, opts.bollingerStdDev);

  return {
    indicators: {
      rsi: calculateRsi(closes, opts.rsiPeriod),
      macdLine: macd.macdLine,
      signalLine: macd.signalLine,
      histogram: macd.histogram,
      vwap: calculateVwap(bars),
      bollingerUpper: bands.upper,
      bollingerMiddle: bands.middle,
      bollingerLower: bands.lower
    },
    advisories
  };
};

export const lastValue = (series: Series): number | undefined => series[series.length - 1];

export const latestIndicatorValues = (set: IndicatorSet): LatestIndicatorValues => ({
  rsi: lastValue(set.rsi),
  macdLine: lastValue(set.macdLine),
  signalLine: lastValue(set.signalLine),
  histogram: lastValue(set.histogram),
  vwap: lastValue(set.vwap),
  bollingerUpper: lastValue(set.bollingerUpper),
  bollingerMiddle: lastValue(set.bollingerMiddle),
  bollingerLower: lastValue(set.bollingerLower)
});
