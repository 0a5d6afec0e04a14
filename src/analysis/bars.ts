import { z } from 'zod';
import { InvalidBarsError, MissingColumnsError } from '../core/errors.js';
import type { Bar, BarSeries } from '../core/types.js';

export const REQUIRED_COLUMNS = ['open', 'high', 'low', 'close', 'volume'] as const;

// Numbers or numeric strings; a blank cell is rejected rather than read as 0.
const nonNegativeNumber = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .pipe(z.number().nonnegative());

const barSchema = z.object({
  time: z.union([z.number(), z.string(), z.date()]),
  open: nonNegativeNumber,
  high: nonNegativeNumber,
  low: nonNegativeNumber,
  close: nonNegativeNumber,
  volume: nonNegativeNumber
});

const toEpochMs = (time: number | string | Date): number => {
  if (typeof time === 'number') return time;
  return (typeof time === 'string' ? new Date(time) : time).getTime();
};

/**
 * Runtime column check for rows that did not come through {@link parseBarSeries}.
 * Throws {@link MissingColumnsError} naming every column absent from any row.
 */
export const requireColumns = (rows: readonly object[]): void => {
  const missing = new Set<string>();
  for (const row of rows) {
    for (const column of REQUIRED_COLUMNS) {
      const value: unknown = Reflect.get(row, column);
      if (typeof value !== 'number') missing.add(column);
    }
  }
  if (missing.size > 0) {
    throw new MissingColumnsError(REQUIRED_COLUMNS.filter((c) => missing.has(c)));
  }
};

export const checkBarShape = (bar: Bar, index: number): void => {
  if (bar.high < Math.max(bar.open, bar.close, bar.low)) {
    throw new InvalidBarsError(`Bar ${index} high is below open/close/low`, { index, time: bar.time });
  }
  if (bar.low > Math.min(bar.open, bar.close, bar.high)) {
    throw new InvalidBarsError(`Bar ${index} low is above open/close/high`, { index, time: bar.time });
  }
};

/** Validates raw provider rows into a time-ordered {@link BarSeries}. */
export const parseBarSeries = (symbol: string, interval: string, rows: unknown): BarSeries => {
  if (!Array.isArray(rows)) {
    throw new InvalidBarsError('Bars must be an array', { symbol, interval });
  }

  const records = rows.filter((r): r is object => typeof r === 'object' && r !== null);
  if (records.length !== rows.length) {
    throw new InvalidBarsError('Every bar must be an object', { symbol, interval });
  }

  const missing = new Set<string>();
  for (const row of records) {
    for (const column of REQUIRED_COLUMNS) {
      const value: unknown = Reflect.get(row, column);
      if (value === undefined || value === null) missing.add(column);
    }
  }
  if (missing.size > 0) {
    throw new MissingColumnsError(REQUIRED_COLUMNS.filter((c) => missing.has(c)));
  }

  const bars: Bar[] = [];
  for (const [index, row] of records.entries()) {
    const parsed = barSchema.safeParse(row);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new InvalidBarsError(`Bar ${index} is invalid: ${details}`, { symbol, interval, index });
    }
    const time = toEpochMs(parsed.data.time);
    if (!Number.isFinite(time)) {
      throw new InvalidBarsError(`Bar ${index} has an unreadable timestamp`, { symbol, interval, index });
    }
    bars.push({ ...parsed.data, time });
  }

  bars.sort((a, b) => a.time - b.time);
  for (const [index, bar] of bars.entries()) {
    const prev = bars[index - 1];
    if (prev && prev.time === bar.time) {
      throw new InvalidBarsError(`Duplicate bar timestamp ${bar.time}`, { symbol, interval, time: bar.time });
    }
    checkBarShape(bar, index);
  }

  return { symbol, interval, bars };
};
