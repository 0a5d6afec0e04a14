/**
 * Volume Profile Builder — bins traded volume by price level.
 *
 * Algorithm:
 *   1. Split [min(low), max(high)] into N equal-width bins.
 *   2. Spread each bar's volume over the bins its [low, high] range covers,
 *      in proportion to the covered price distance.
 *   3. Rank bins by volume (descending, lower price first on ties). The first
 *      ranked bin is the Point of Control.
 *   4. Walk the ranking, flagging bins as Value Area until the flagged volume
 *      reaches the value-area fraction of the total.
 *
 * An empty series is a valid input and yields one zeroed bin flagged as POC.
 */

import { mustBeFraction, mustBePositiveInteger } from '../core/validation.js';
import type { Advisory, Bar } from '../core/types.js';

export interface VolumeProfileBin {
  priceLow: number;
  priceHigh: number;
  priceMid: number;
  volume: number;
  isValueArea: boolean;
  isPointOfControl: boolean;
}

export interface VolumeProfile {
  /** Ordered by price, lowest first. */
  bins: VolumeProfileBin[];
  totalVolume: number;
  valueAreaPct: number;
  /** True when built from an empty series; `bins` then holds the single degenerate bin. */
  empty: boolean;
}

export interface VolumeProfileOptions {
  bins: number;
  valueAreaPct: number;
}

export const DEFAULT_VOLUME_PROFILE_OPTIONS: VolumeProfileOptions = {
  bins: 20,
  valueAreaPct: 0.7
};

export type PriceVsPoc = 'above' | 'below' | 'unknown';
export type PriceVsValueArea = 'inside' | 'outside' | 'unknown';

export interface VolumeProfileSummary {
  currentPrice: number;
  pocPrice: number;
  valueAreaHigh: number;
  valueAreaLow: number;
  priceVsPoc: PriceVsPoc;
  priceVsValueArea: PriceVsValueArea;
  dataAvailable: boolean;
}

export interface VolumeProfileAnalysis {
  profile: VolumeProfile;
  summary: VolumeProfileSummary;
  advisories: Advisory[];
}

/** Ranking order for POC and Value Area: volume descending, then lower price first. */
export const compareBinsByVolume = (a: VolumeProfileBin, b: VolumeProfileBin): number =>
  b.volume - a.volume || a.priceLow - b.priceLow;

export const rankBins = (bins: readonly VolumeProfileBin[]): VolumeProfileBin[] =>
  [...bins].sort(compareBinsByVolume);

const emptyProfile = (valueAreaPct: number): VolumeProfile => ({
  bins: [{ priceLow: 0, priceHigh: 0, priceMid: 0, volume: 0, isValueArea: false, isPointOfControl: true }],
  totalVolume: 0,
  valueAreaPct,
  empty: true
});

const createBins = (low: number, high: number, count: number): VolumeProfileBin[] => {
  const step = (high - low) / count;
  const edge = (i: number): number => (i === count ? high : low + i * step);
  return Array.from({ length: count }, (_, i) => {
    const priceLow = edge(i);
    const priceHigh = edge(i + 1);
    return {
      priceLow,
      priceHigh,
      priceMid: (priceLow + priceHigh) / 2,
      volume: 0,
      isValueArea: false,
      isPointOfControl: false
    };
  });
};

const allocateBar = (bins: VolumeProfileBin[], bar: Bar, low: number, high: number): void => {
  const count = bins.length;
  const width = (high - low) / count;
  const indexOf = (price: number): number =>
    width === 0 ? 0 : Math.min(count - 1, Math.max(0, Math.floor((price - low) / width)));

  const first = indexOf(bar.low);
  const last = indexOf(bar.high);
  const firstBin = bins[first];
  if (!firstBin) return;
  if (first === last) {
    firstBin.volume += bar.volume;
    return;
  }

  const overlaps: number[] = [];
  let covered = 0;
  for (let i = first; i <= last; i++) {
    const bin = bins[i];
    const overlap = bin ? Math.max(0, Math.min(bin.priceHigh, bar.high) - Math.max(bin.priceLow, bar.low)) : 0;
    overlaps.push(overlap);
    covered += overlap;
  }
  if (covered === 0) {
    firstBin.volume += bar.volume;
    return;
  }
  for (const [offset, overlap] of overlaps.entries()) {
    const bin = bins[first + offset];
    if (bin && overlap > 0) bin.volume += bar.volume * (overlap / covered);
  }
};

const markValueArea = (bins: VolumeProfileBin[], totalVolume: number, valueAreaPct: number): void => {
  const ranked = rankBins(bins);
  const poc = ranked[0];
  if (poc) poc.isPointOfControl = true;

  const target = totalVolume * valueAreaPct;
  let cumulative = 0;
  for (const bin of ranked) {
    cumulative += bin.volume;
    bin.isValueArea = true;
    if (cumulative >= target) break;
  }
};

export const buildVolumeProfile = (
  bars: readonly Bar[],
  options: Partial<VolumeProfileOptions> = {}
): VolumeProfile => {
  const opts: VolumeProfileOptions = { ...DEFAULT_VOLUME_PROFILE_OPTIONS, ...options };
  mustBePositiveInteger(opts.bins, 'bins');
  mustBeFraction(opts.valueAreaPct, 'valueAreaPct');

  if (bars.length === 0) return emptyProfile(opts.valueAreaPct);

  const low = bars.reduce((m, b) => Math.min(m, b.low), Infinity);
  const high = bars.reduce((m, b) => Math.max(m, b.high), -Infinity);
  const bins = createBins(low, high, opts.bins);

  let totalVolume = 0;
  for (const bar of bars) {
    allocateBar(bins, bar, low, high);
    totalVolume += bar.volume;
  }

  markValueArea(bins, totalVolume, opts.valueAreaPct);
  return { bins, totalVolume, valueAreaPct: opts.valueAreaPct, empty: false };
};

export const summarizeVolumeProfile = (profile: VolumeProfile, bars: readonly Bar[]): VolumeProfileSummary => {
  const lastBar = bars[bars.length - 1];
  const poc = profile.bins.find((b) => b.isPointOfControl);
  if (profile.empty || !lastBar || !poc) {
    return {
      currentPrice: 0,
      pocPrice: 0,
      valueAreaHigh: 0,
      valueAreaLow: 0,
      priceVsPoc: 'unknown',
      priceVsValueArea: 'unknown',
      dataAvailable: false
    };
  }

  const valueArea = profile.bins.filter((b) => b.isValueArea);
  const valueAreaHigh = valueArea.length > 0 ? Math.max(...valueArea.map((b) => b.priceHigh)) : poc.priceMid;
  const valueAreaLow = valueArea.length > 0 ? Math.min(...valueArea.map((b) => b.priceLow)) : poc.priceMid;
  const currentPrice = lastBar.close;

  return {
    currentPrice,
    pocPrice: poc.priceMid,
    valueAreaHigh,
    valueAreaLow,
    priceVsPoc: currentPrice > poc.priceMid ? 'above' : 'below',
    priceVsValueArea: currentPrice >= valueAreaLow && currentPrice <= valueAreaHigh ? 'inside' : 'outside',
    dataAvailable: true
  };
};

export const analyzeVolumeProfile = (
  bars: readonly Bar[],
  options: Partial<VolumeProfileOptions> = {}
): VolumeProfileAnalysis => {
  const profile = buildVolumeProfile(bars, options);
  const advisories: Advisory[] = profile.empty
    ? [{ code: 'EMPTY_SERIES', available: 0, message: 'No bars available for volume profile' }]
    : [];
  return { profile, summary: summarizeVolumeProfile(profile, bars), advisories };
};
