import { z } from 'zod';
import { OUTPUT_FORMATS } from '../types/index.js';

export const analyzeSchema = z.object({
  config: z.string().min(1),
  trials: z.number().int().positive().optional(),
  seed: z.number().int().optional(),
  inflation: z.number().min(0).optional(),
  format: z.enum(OUTPUT_FORMATS).default('table'),
});

export const compareSchema = z.object({
  config: z.string().min(1),
  trials: z.number().int().positive().optional(),
  seed: z.number().int().optional(),
  format: z.enum(OUTPUT_FORMATS).default('table'),
});

export type AnalyzeArgs = z.infer<typeof analyzeSchema>;
export type CompareArgs = z.infer<typeof compareSchema>;
