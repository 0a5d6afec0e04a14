/**
 * Prediction records — the per-model output the consensus engine consumes.
 *
 * Predictors answer in loosely structured JSON (sometimes wrapped in prose or
 * a fenced block). `parsePredictionResponse` turns that into validated
 * records; fields it does not know are kept verbatim.
 */

import { z } from 'zod';
import { InvalidPredictionError } from '../core/errors.js';
import { LABELS, TIMEFRAMES, isTimeframe } from '../core/types.js';
import type { PredictionLabel, Timeframe } from '../core/types.js';
import { clamp } from '../core/validation.js';

export const predictionRecordSchema = z
  .object({
    symbol: z.string().min(1),
    timeframe: z.enum(TIMEFRAMES),
    source: z.string().min(1),
    label: z.enum(LABELS),
    confidence: z.number().min(0).max(1),
    technicalAnalysis: z.string().optional(),
    sentimentAnalysis: z.string().optional(),
    keyFactors: z.array(z.string()).optional(),
    timestamp: z.string(),
    inferred: z.boolean().optional()
  })
  .passthrough();

export type PredictionRecord = z.infer<typeof predictionRecordSchema>;

export const parsePredictionRecord = (value: unknown): PredictionRecord => {
  const parsed = predictionRecordSchema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new InvalidPredictionError(`Invalid prediction record: ${details}`);
  }
  return parsed.data;
};

export const normalizeLabel = (raw: unknown): PredictionLabel | undefined => {
  if (typeof raw !== 'string') return undefined;
  const wanted = raw.trim().toLowerCase();
  return LABELS.find((label) => label.toLowerCase() === wanted);
};

const responseItemSchema = z
  .object({
    timeframe: z.string(),
    prediction_label: z.string().optional(),
    signal_strength: z.coerce.number().optional(),
    technical_analysis: z.string().optional(),
    sentiment_analysis: z.string().optional(),
    key_factors: z.array(z.string()).optional()
  })
  .passthrough();

const RESPONSE_KEYS = new Set([
  'timeframe',
  'prediction_label',
  'signal_strength',
  'technical_analysis',
  'sentiment_analysis',
  'key_factors'
]);

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)\s*```/;

const tryParseJson = (text: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
};

/** Reads JSON from a raw answer, falling back to the first fenced ```json block. */
export const extractJson = (text: string): unknown => {
  const direct = tryParseJson(text.trim());
  if (direct.ok) return direct.value;

  const fenced = FENCED_JSON.exec(text);
  if (fenced?.[1] !== undefined) {
    const inner = tryParseJson(fenced[1]);
    if (inner.ok) return inner.value;
    throw new InvalidPredictionError('Failed to parse JSON from fenced block', { response: text });
  }
  throw new InvalidPredictionError('Response is not valid JSON', { response: text });
};

export interface PredictionResponseMeta {
  symbol: string;
  source: string;
  timestamp: string;
}

/**
 * Converts a predictor answer into one record per timeframe. Items whose
 * timeframe is unknown are skipped; a later item for the same timeframe
 * replaces an earlier one.
 */
export const parsePredictionResponse = (text: string, meta: PredictionResponseMeta): PredictionRecord[] => {
  const json = extractJson(text);
  const items: unknown[] = Array.isArray(json) ? json : [json];
  const byTimeframe = new Map<Timeframe, PredictionRecord>();

  for (const item of items) {
    const parsed = responseItemSchema.safeParse(item);
    if (!parsed.success) continue;
    const raw = parsed.data;
    const timeframe = raw.timeframe;
    if (!isTimeframe(timeframe)) continue;

    const label = normalizeLabel(raw.prediction_label);
    if (!label) {
      throw new InvalidPredictionError(`Unknown prediction label "${String(raw.prediction_label)}"`, {
        source: meta.source,
        timeframe
      });
    }
    if (raw.signal_strength === undefined || !Number.isFinite(raw.signal_strength)) {
      throw new InvalidPredictionError('Prediction is missing a numeric signal_strength', {
        source: meta.source,
        timeframe
      });
    }

    const extras = Object.fromEntries(Object.entries(raw).filter(([key]) => !RESPONSE_KEYS.has(key)));
    byTimeframe.set(timeframe, {
      ...extras,
      symbol: meta.symbol,
      timeframe,
      source: meta.source,
      label,
      confidence: clamp(raw.signal_strength, 0, 1),
      ...(raw.technical_analysis !== undefined ? { technicalAnalysis: raw.technical_analysis } : {}),
      ...(raw.sentiment_analysis !== undefined ? { sentimentAnalysis: raw.sentiment_analysis } : {}),
      ...(raw.key_factors !== undefined ? { keyFactors: raw.key_factors } : {}),
      timestamp: meta.timestamp
    });
  }

  return TIMEFRAMES.flatMap((tf) => {
    const record = byTimeframe.get(tf);
    return record ? [record] : [];
  });
};
