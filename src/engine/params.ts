import type { EntityKind, RatingPartition } from './types.js';
import type { ModelVariant } from '../model/likelihood.js';

interface EngineParams {
  defaultRating: number;
  partition: RatingPartition;
  horse: { alpha: number };
  agent: { alpha: number; priorStrength: number };
  features: { ratingKinds: EntityKind[]; attributes: string[]; includeExperience: boolean };
  model: {
    variant: ModelVariant;
    l2: number;
    learningRate: number;
    maxIterations: number;
    tolerance: number;
    probabilityTolerance: number;
  };
  evaluation: { warmupEvents: number; foldSize: number; calibrationBins: number; probabilityFloor: number };
}

export const P: EngineParams = {
  defaultRating: 0.5,
  partition: 'global',
  horse: { alpha: 0.3 },
  agent: { alpha: 0.2, priorStrength: 5 },
  features: {
    ratingKinds: ['horse', 'jockey', 'trainer'],
    attributes: ['age', 'weight', 'draw'],
    includeExperience: true,
  },
  model: {
    variant: 'winner-softmax',
    l2: 0.01,
    learningRate: 1,
    maxIterations: 500,
    tolerance: 1e-9,
    probabilityTolerance: 1e-9,
  },
  evaluation: {
    warmupEvents: 50,
    foldSize: 100,
    calibrationBins: 10,
    probabilityFloor: 1e-15,
  },
};
