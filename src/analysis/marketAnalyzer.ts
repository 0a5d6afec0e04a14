/**
 * Market Analyzer — runs the indicator calculator and volume profile builder
 * over one bar series and renders the context block handed to predictors.
 */

import { basicTrend, renderBasicTrend, renderIndicators } from './indicatorFormatter.js';
import type { BasicTrend } from './indicatorFormatter.js';
import { calculateIndicators, latestIndicatorValues } from './indicators.js';
import type { IndicatorOptions, IndicatorSet, LatestIndicatorValues } from './indicators.js';
import { analyzeVolumeProfile } from './volumeProfile.js';
import type { VolumeProfileAnalysis, VolumeProfileOptions } from './volumeProfile.js';
import { formatVolumeProfile } from './volumeProfileFormatter.js';
import type { Logger } from '../core/logger.js';
import type { Advisory, BarSeries } from '../core/types.js';

export interface MarketAnalysis {
  symbol: string;
  interval: string;
  barCount: number;
  indicators: IndicatorSet;
  latest: LatestIndicatorValues;
  trend: BasicTrend;
  volumeProfile: VolumeProfileAnalysis;
  advisories: Advisory[];
  context: string;
}

const isoDate = (time: number): string => new Date(time).toISOString().slice(0, 10);

export class MarketAnalyzer {
  constructor(
    private readonly logger: Logger,
    private readonly indicatorOptions: Partial<IndicatorOptions> = {},
    private readonly volumeProfileOptions: Partial<VolumeProfileOptions> = {}
  ) {}

  analyze(series: BarSeries): MarketAnalysis {
    const { symbol, interval, bars } = series;
    const { indicators, advisories: indicatorAdvisories } = calculateIndicators(bars, this.indicatorOptions);
    const volumeProfile = analyzeVolumeProfile(bars, this.volumeProfileOptions);
    const latest = latestIndicatorValues(indicators);
    const trend = basicTrend(bars);
    const advisories = [...indicatorAdvisories, ...volumeProfile.advisories];

    for (const advisory of advisories) {
      this.logger.warn('analysis advisory', { symbol, interval, ...advisory });
    }

    const first = bars[0];
    const last = bars[bars.length - 1];
    const header =
      first && last
        ? `Chart data for ${symbol} (${interval}): ${bars.length} data points from ${isoDate(first.time)} to ${isoDate(last.time)}.\nLatest close: ${last.close.toFixed(2)}.`
        : `Chart data for ${symbol} (${interval}): no data points available.`;

    const context = [
      header,
      renderIndicators(latest, bars.length),
      renderBasicTrend(trend),
      formatVolumeProfile(symbol, interval, volumeProfile)
    ].join('\n\n');

    this.logger.debug('market analysis complete', {
      symbol,
      interval,
      bars: bars.length,
      advisories: advisories.length
    });

    return {
      symbol,
      interval,
      barCount: bars.length,
      indicators,
      latest,
      trend,
      volumeProfile,
      advisories,
      context
    };
  }
}
