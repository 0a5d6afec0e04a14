/**
 * Text rendering of indicator values for predictor context. Deterministic
 * templates only; missing values print as `N/A`.
 */

import { calculateIndicators, calculateSma, lastValue, latestIndicatorValues, MIN_RELIABLE_BARS } from './indicators.js';
import type { IndicatorOptions, LatestIndicatorValues } from './indicators.js';
import type { Bar } from '../core/types.js';

export type Trend = 'Bullish' | 'Bearish' | 'Neutral';

export const fmt = (value: number | undefined): string => (value === undefined ? 'N/A' : value.toFixed(2));

export const renderIndicators = (latest: LatestIndicatorValues, barCount: number): string => {
  const note =
    barCount < MIN_RELIABLE_BARS
      ? `\nNote: Limited data points (${barCount}) may affect indicator reliability. Some indicators may not be available.`
      : '';

  return [
    `Technical Indicators:${note}`,
    `- RSI: ${fmt(latest.rsi)}`,
    '- MACD:',
    `  - MACD Line: ${fmt(latest.macdLine)}`,
    `  - Signal Line: ${fmt(latest.signalLine)}`,
    `  - Histogram: ${fmt(latest.histogram)}`,
    `- VWAP: ${fmt(latest.vwap)}`,
    '- Bollinger Bands:',
    `  - Upper Band: ${fmt(latest.bollingerUpper)}`,
    `  - Middle Band: ${fmt(latest.bollingerMiddle)}`,
    `  - Lower Band: ${fmt(latest.bollingerLower)}`
  ].join('\n');
};

export const formatIndicators = (bars: readonly Bar[], options: Partial<IndicatorOptions> = {}): string => {
  const { indicators } = calculateIndicators(bars, options);
  return renderIndicators(latestIndicatorValues(indicators), bars.length);
};

export interface BasicTrend {
  latestClose: number | undefined;
  sma20: number | undefined;
  sma50: number | undefined;
  sma200: number | undefined;
  trend: Trend;
}

export const basicTrend = (bars: readonly Bar[]): BasicTrend => {
  const closes = bars.map((b) => b.close);
  const sma20 = lastValue(calculateSma(closes, 20));
  const sma50 = lastValue(calculateSma(closes, 50));
  const sma200 = lastValue(calculateSma(closes, 200));

  let trend: Trend = 'Neutral';
  if (sma20 !== undefined && sma50 !== undefined) {
    if (sma20 > sma50) trend = 'Bullish';
    else if (sma20 < sma50) trend = 'Bearish';
  }

  return { latestClose: lastValue(closes), sma20, sma50, sma200, trend };
};

export const renderBasicTrend = (t: BasicTrend): string =>
  [
    'Basic Technical Analysis:',
    `- Latest Close: ${fmt(t.latestClose)}`,
    `- 20-period SMA: ${fmt(t.sma20)}`,
    `- 50-period SMA: ${fmt(t.sma50)}`,
    `- 200-period SMA: ${fmt(t.sma200)}`,
    `- Trend: ${t.trend}`
  ].join('\n');

export const formatBasicTrend = (bars: readonly Bar[]): string => renderBasicTrend(basicTrend(bars));
