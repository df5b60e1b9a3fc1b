import type { UpdateStrategyConfig } from './types.js';

export interface PriorState {
  raw: number;
  observations: number;
}

export interface StrategyOutcome {
  raw: number;
  rating: number;
  confidence: number;
}

export interface UpdateStrategy {
  readonly name: UpdateStrategyConfig['strategy'];
  update(prior: PriorState, performance: number): StrategyOutcome;
}

const blend = (alpha: number, performance: number, old: number) => alpha * performance + (1 - alpha) * old;

/** c = n / (n + k); 0 before any observation, approaching 1 as n grows. */
export const observationConfidence = (observations: number, priorStrength: number) =>
  observations <= 0 ? 0 : observations / (observations + priorStrength);

export function createUpdateStrategy(config: UpdateStrategyConfig): UpdateStrategy {
  switch (config.strategy) {
    case 'exponential':
      return {
        name: 'exponential',
        update: (prior, performance) => {
          const raw = blend(config.alpha, performance, prior.raw);
          return { raw, rating: raw, confidence: 1 };
        },
      };
    case 'shrinkage':
      return {
        name: 'shrinkage',
        update: (prior, performance) => {
          const raw = blend(config.alpha, performance, prior.raw);
          const confidence = observationConfidence(prior.observations + 1, config.priorStrength);
          return { raw, rating: confidence * raw + (1 - confidence) * config.mean, confidence };
        },
      };
  }
}
