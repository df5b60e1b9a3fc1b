import { z } from 'zod';

import { ConfigurationError } from './errors.js';
import { P } from './engine/params.js';
import type { NonFinisherPolicy, RatingConfig, UpdateStrategyConfig } from './engine/types.js';
import type { FeatureSpec } from './features/assembler.js';
import type { ModelOptions } from './model/race-model.js';
import type { FoldOptions } from './evaluation/folds.js';

export interface EngineConfig {
  rating: RatingConfig;
  features: FeatureSpec;
  model: ModelOptions;
  evaluation: FoldOptions & { calibrationBins: number; probabilityFloor: number };
}

const csv = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter(Boolean)
  );

const EnvSchema = z.object({
  RATING_NON_FINISHER: z.string().trim().min(1).optional(),
  RATING_ALPHA: z.coerce.number().optional(),
  RATING_AGENT_ALPHA: z.coerce.number().optional(),
  RATING_AGENT_PRIOR_STRENGTH: z.coerce.number().optional(),
  RATING_DEFAULT: z.coerce.number().optional(),
  RATING_PARTITION: z.enum(['global', 'stratum']).optional(),
  FEATURE_ATTRIBUTES: csv.optional(),
  MODEL_VARIANT: z.enum(['winner-softmax', 'plackett-luce']).optional(),
  MODEL_L2: z.coerce.number().min(0).optional(),
  MODEL_MAX_ITERATIONS: z.coerce.number().int().min(1).optional(),
  EVAL_WARMUP_EVENTS: z.coerce.number().int().min(0).optional(),
  EVAL_FOLD_SIZE: z.coerce.number().int().min(1).optional(),
  EVAL_MAX_TRAIN_EVENTS: z.coerce.number().int().min(1).optional(),
});

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().optional(),
  DB_MIGRATE_RETRIES: z.coerce.number().int().positive().default(10),
  DB_MIGRATE_RETRY_DELAY_MS: z.coerce.number().int().positive().default(5_000),
});

export interface DatabaseConfig {
  /** Null keeps snapshots in memory. */
  url: string | null;
  migrateRetries: number;
  migrateRetryDelayMs: number;
}

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const parsed = DatabaseEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`invalid database environment: ${issues.join('; ')}`, issues);
  }
  const url = parsed.data.DATABASE_URL?.trim();
  return {
    url: url ? url : null,
    migrateRetries: parsed.data.DB_MIGRATE_RETRIES,
    migrateRetryDelayMs: parsed.data.DB_MIGRATE_RETRY_DELAY_MS,
  };
}

export function parseNonFinisherPolicy(value: string): NonFinisherPolicy {
  if (value === 'last-place') return { kind: 'last-place' };
  const numeric = Number(value);
  if (value.trim() === '' || !Number.isFinite(numeric)) {
    throw new ConfigurationError(`non-finisher policy must be "last-place" or a number, got "${value}"`);
  }
  return { kind: 'constant', value: numeric };
}

export interface RatingConfigInput {
  nonFinisher: NonFinisherPolicy;
  defaultRating?: number;
  alpha?: number;
  agentAlpha?: number;
  agentPriorStrength?: number;
  partition?: RatingConfig['partition'];
}

/** Horses decay exponentially; jockeys and trainers additionally shrink toward the default. */
export function buildRatingConfig(input: RatingConfigInput): RatingConfig {
  const defaultRating = input.defaultRating ?? P.defaultRating;
  const agent: UpdateStrategyConfig = {
    strategy: 'shrinkage',
    alpha: input.agentAlpha ?? P.agent.alpha,
    priorStrength: input.agentPriorStrength ?? P.agent.priorStrength,
    mean: defaultRating,
  };
  const config: RatingConfig = {
    defaultRating,
    nonFinisher: input.nonFinisher,
    partition: input.partition ?? P.partition,
    strategies: {
      horse: { strategy: 'exponential', alpha: input.alpha ?? P.horse.alpha },
      jockey: agent,
      trainer: agent,
    },
  };
  assertValidRatingConfig(config);
  return config;
}

export function assertValidRatingConfig(config: RatingConfig): void {
  const issues: string[] = [];
  if (!Number.isFinite(config.defaultRating)) issues.push('default rating must be a finite number');
  if (config.nonFinisher.kind === 'constant') {
    const { value } = config.nonFinisher;
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      issues.push(`non-finisher performance ${value} must lie in [0, 1]`);
    }
  }
  for (const [kind, strategy] of Object.entries(config.strategies)) {
    if (!(strategy.alpha > 0 && strategy.alpha <= 1)) {
      issues.push(`${kind} alpha ${strategy.alpha} must lie in (0, 1]`);
    }
    if (strategy.strategy === 'shrinkage') {
      if (!(strategy.priorStrength > 0)) issues.push(`${kind} prior strength must be positive`);
      if (!Number.isFinite(strategy.mean)) issues.push(`${kind} shrinkage mean must be finite`);
    }
  }
  if (issues.length) throw new ConfigurationError(`invalid rating configuration: ${issues.join('; ')}`, issues);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`invalid environment: ${issues.join('; ')}`, issues);
  }
  const vars = parsed.data;

  if (!vars.RATING_NON_FINISHER) {
    throw new ConfigurationError('RATING_NON_FINISHER is required ("last-place" or a performance in [0, 1])');
  }

  return {
    rating: buildRatingConfig({
      nonFinisher: parseNonFinisherPolicy(vars.RATING_NON_FINISHER),
      defaultRating: vars.RATING_DEFAULT,
      alpha: vars.RATING_ALPHA,
      agentAlpha: vars.RATING_AGENT_ALPHA,
      agentPriorStrength: vars.RATING_AGENT_PRIOR_STRENGTH,
      partition: vars.RATING_PARTITION,
    }),
    features: {
      ratingKinds: [...P.features.ratingKinds],
      attributes: vars.FEATURE_ATTRIBUTES ?? [...P.features.attributes],
      includeExperience: P.features.includeExperience,
    },
    model: {
      ...P.model,
      variant: vars.MODEL_VARIANT ?? P.model.variant,
      l2: vars.MODEL_L2 ?? P.model.l2,
      maxIterations: vars.MODEL_MAX_ITERATIONS ?? P.model.maxIterations,
    },
    evaluation: {
      warmupEvents: vars.EVAL_WARMUP_EVENTS ?? P.evaluation.warmupEvents,
      foldSize: vars.EVAL_FOLD_SIZE ?? P.evaluation.foldSize,
      ...(vars.EVAL_MAX_TRAIN_EVENTS ? { maxTrainEvents: vars.EVAL_MAX_TRAIN_EVENTS } : {}),
      calibrationBins: P.evaluation.calibrationBins,
      probabilityFloor: P.evaluation.probabilityFloor,
    },
  };
}
