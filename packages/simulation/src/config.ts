import { z } from 'zod';
import { DEFAULT_SEED } from '@xolrisk/core';
import { ConfigError } from '@xolrisk/utils';
import { lognormalParamsFromMoments } from './models/severity.js';

/**
 * Simulation configuration schemas.
 *
 * One explicit, validated structure replaces ad hoc parameter maps. Shorthand
 * inputs are normalized here: a frequency block without `kind` is Poisson, a
 * severity block is recognised by its fields (`mu`/`sigma` or
 * `mean`/`stdDev`), and `limit: unlimited` becomes Infinity.
 */

/** Upper bound on trials per scenario; one distribution is 8 bytes per trial */
export const MAX_TRIALS = 10_000_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const PoissonFrequencySchema = z.object({
  kind: z.literal('poisson'),
  lambda: z.number().finite().min(0),
});

export const BinomialFrequencySchema = z.object({
  kind: z.literal('binomial'),
  policies: z.number().int().min(0),
  claimProbability: z.number().min(0).max(1),
});

export const FrequencyConfigSchema = z.preprocess(
  (value) => (isRecord(value) && value.kind === undefined ? { ...value, kind: 'poisson' } : value),
  z.discriminatedUnion('kind', [PoissonFrequencySchema, BinomialFrequencySchema])
);

export const LognormalSeveritySchema = z.object({
  kind: z.literal('lognormal'),
  /** Mean of ln(claim size) */
  mu: z.number().finite(),
  /** Standard deviation of ln(claim size) */
  sigma: z.number().finite().positive(),
});

export const MomentsSeveritySchema = z.object({
  kind: z.literal('moments'),
  /** Mean claim size */
  mean: z.number().finite().positive(),
  /** Standard deviation of claim sizes */
  stdDev: z.number().finite().positive(),
});

export const SeverityConfigSchema = z
  .preprocess(
    (value) => {
      if (!isRecord(value) || value.kind !== undefined) return value;
      if ('mean' in value || 'stdDev' in value) return { ...value, kind: 'moments' };
      return { ...value, kind: 'lognormal' };
    },
    z.discriminatedUnion('kind', [LognormalSeveritySchema, MomentsSeveritySchema])
  )
  .transform((severity) =>
    severity.kind === 'lognormal'
      ? severity
      : {
          kind: 'lognormal' as const,
          ...lognormalParamsFromMoments(severity.mean, severity.stdDev),
        }
  );

export const LayerConfigSchema = z.object({
  retention: z.number().finite().min(0),
  limit: z
    .union([z.number().min(0), z.literal('unlimited')])
    .transform((limit) => (limit === 'unlimited' ? Infinity : limit)),
  basis: z.enum(['aggregate', 'per-claim']).default('aggregate'),
});

export const SimulationConfigSchema = z.object({
  trials: z.number().int().positive().max(MAX_TRIALS),
  frequency: FrequencyConfigSchema,
  severity: SeverityConfigSchema,
  layer: LayerConfigSchema,
  /** Claim inflation for the stressed scenario, e.g. 0.08 for +8% */
  inflationRate: z.number().finite().min(0),
  /** Cost of the reinsurance layer */
  premium: z.number().finite().positive(),
  seed: z
    .number()
    .int()
    .min(Number.MIN_SAFE_INTEGER)
    .max(Number.MAX_SAFE_INTEGER)
    .default(DEFAULT_SEED),
});

/**
 * One candidate layer of a comparison, carrying its own premium
 */
export const LayerCandidateSchema = LayerConfigSchema.extend({
  label: z.string().min(1),
  premium: z.number().finite().positive(),
});

export const CompareConfigSchema = SimulationConfigSchema.omit({ layer: true, premium: true })
  .extend({
    layers: z.array(LayerCandidateSchema).min(1),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.layers.forEach((layer, index) => {
      if (seen.has(layer.label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['layers', index, 'label'],
          message: `Duplicate layer label "${layer.label}"`,
        });
      }
      seen.add(layer.label);
    });
  });

export type LayerConfig = z.infer<typeof LayerConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;
export type SimulationConfig = Readonly<z.infer<typeof SimulationConfigSchema>>;
export type LayerCandidate = z.infer<typeof LayerCandidateSchema>;
export type CompareConfigInput = z.input<typeof CompareConfigSchema>;
export type CompareConfig = Readonly<z.infer<typeof CompareConfigSchema>>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const [first] = result.error.issues;
    throw new ConfigError(
      `Invalid ${what}: ${formatIssues(result.error)}`,
      first && first.path.length > 0 ? first.path.join('.') : undefined,
      { issues: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Validate a raw configuration. Throws ConfigError naming every offending
 * field; nothing is defaulted in place of an invalid value.
 */
export function parseSimulationConfig(input: unknown): SimulationConfig {
  return Object.freeze(parseWith(SimulationConfigSchema, input, 'simulation config'));
}

export function parseCompareConfig(input: unknown): CompareConfig {
  return Object.freeze(parseWith(CompareConfigSchema, input, 'compare config'));
}
