import { z } from 'zod';

const parseList = (v: unknown, fallback: string[]): string[] => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
};

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  STORE_DRIVER: z.enum(['memory', 'sqlite']).default('memory'),
  SQLITE_PATH: z.string().default('./data/analysis.sqlite'),

  // Model identities whose predictions feed the consensus, in vote order
  CONSENSUS_SOURCES: z.string().optional(),
  TIMEFRAME_INFERENCE: z.enum(['off', 'per_source', 'aggregate']).default('off'),

  VOLUME_PROFILE_BINS: z.coerce.number().int().positive().default(20),
  VALUE_AREA_PCT: z.coerce.number().gt(0).lte(1).default(0.7),

  RSI_PERIOD: z.coerce.number().int().positive().default(14),
  MACD_FAST: z.coerce.number().int().positive().default(12),
  MACD_SLOW: z.coerce.number().int().positive().default(26),
  MACD_SIGNAL: z.coerce.number().int().positive().default(9),
  BOLLINGER_PERIOD: z.coerce.number().int().min(2).default(20),
  BOLLINGER_STDDEV: z.coerce.number().positive().default(2)
});

export const configSchema = rawSchema
  .refine((raw) => raw.MACD_FAST < raw.MACD_SLOW, {
    message: 'MACD_FAST must be shorter than MACD_SLOW',
    path: ['MACD_FAST']
  })
  .transform((raw) => ({
    nodeEnv: raw.NODE_ENV,
    logLevel: raw.LOG_LEVEL,

    store: {
      driver: raw.STORE_DRIVER,
      sqlitePath: raw.SQLITE_PATH
    },

    consensus: {
      sources: parseList(raw.CONSENSUS_SOURCES, ['deepseek', 'gemini', 'groq']),
      timeframeInference: raw.TIMEFRAME_INFERENCE
    },

    volumeProfile: {
      bins: raw.VOLUME_PROFILE_BINS,
      valueAreaPct: raw.VALUE_AREA_PCT
    },

    indicators: {
      rsiPeriod: raw.RSI_PERIOD,
      macdFast: raw.MACD_FAST,
      macdSlow: raw.MACD_SLOW,
      macdSignal: raw.MACD_SIGNAL,
      bollingerPeriod: raw.BOLLINGER_PERIOD,
      bollingerStdDev: raw.BOLLINGER_STDDEV
    }
  }));
