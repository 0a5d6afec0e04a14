import type { z } from 'zod';
import type { configSchema } from './schema.js';

export type AppConfig = z.infer<typeof configSchema>;
export type IndicatorConfig = AppConfig['indicators'];
export type VolumeProfileConfig = AppConfig['volumeProfile'];
export type TimeframeInferenceMode = AppConfig['consensus']['timeframeInference'];
