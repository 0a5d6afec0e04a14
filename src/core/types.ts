export const TIMEFRAMES = ['intraday', '5d', '30d'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export const LABELS = ['Buy', 'Sell', 'Hold'] as const;
export type PredictionLabel = (typeof LABELS)[number];

export interface Bar {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface BarSeries {
  symbol: string;
  interval: string;
  bars: Bar[];
}

/** Values aligned to bar index. `undefined` marks a point that was not computed. */
export type Series = Array<number | undefined>;

export type AdvisoryCode =
  | 'INSUFFICIENT_WARMUP'
  | 'LIMITED_DATA'
  | 'EMPTY_SERIES'
  | 'PARTIAL_PREDICTIONS'
  | 'INFERRED_PREDICTIONS';

/** Non-fatal condition surfaced alongside a result. */
export interface Advisory {
  code: AdvisoryCode;
  message: string;
  indicator?: string;
  required?: number;
  available?: number;
}

export type VoteCounts = Record<PredictionLabel, number>;

export const isTimeframe = (value: unknown): value is Timeframe =>
  typeof value === 'string' && (TIMEFRAMES as readonly string[]).includes(value);
