import { ConfigurationError, InvalidEventError, ModelNotFittedError } from '../errors.js';
import type { RaceFeatures } from '../features/assembler.js';
import { createLikelihood } from './likelihood.js';
import type { ModelVariant, RaceLikelihood } from './likelihood.js';
import { DEFAULT_PROBABILITY_TOLERANCE, normaliseScores } from './softmax.js';
import type { NumericalIssue } from './softmax.js';

export interface ModelOptions {
  variant: ModelVariant;
  l2: number;
  learningRate: number;
  maxIterations: number;
  tolerance: number;
  probabilityTolerance?: number;
}

export interface TrainingRace extends RaceFeatures {
  /** Entrant indices in finishing order; non-finishers are absent. */
  finishOrder: number[];
}

export interface FitSummary {
  variant: ModelVariant;
  races: number;
  usableRaces: number;
  iterations: number;
  converged: boolean;
  loss: number;
  weights: Record<string, number>;
}

export interface ProbabilityEntry {
  entrantId: string;
  competitorId: string;
  score: number;
  probability: number;
}

export interface ProbabilityAssignment {
  eventId: string;
  entries: ProbabilityEntry[];
  issues: NumericalIssue[];
}

interface Standardiser {
  means: number[];
  scales: number[];
}

interface PreparedRace {
  rows: number[][];
  finishOrder: number[];
}

const ARMIJO = 1e-4;
const MIN_STEP = 1e-12;

const dot = (w: readonly number[], x: readonly number[]) => {
  let s = 0;
  for (let k = 0; k < w.length; k += 1) s += w[k] * x[k];
  return s;
};

function buildStandardiser(races: readonly RaceFeatures[], width: number): Standardiser {
  const sums = new Array<number>(width).fill(0);
  const squares = new Array<number>(width).fill(0);
  const counts = new Array<number>(width).fill(0);

  for (const race of races) {
    for (const entrant of race.entrants) {
      entrant.values.forEach((value, k) => {
        if (value === null) return;
        sums[k] += value;
        squares[k] += value * value;
        counts[k] += 1;
      });
    }
  }

  const means = sums.map((s, k) => (counts[k] > 0 ? s / counts[k] : 0));
  const scales = squares.map((sq, k) => {
    if (counts[k] < 2) return 1;
    const variance = sq / counts[k] - means[k] * means[k];
    return variance > 1e-12 ? Math.sqrt(variance) : 1;
  });
  return { means, scales };
}

const standardise = (values: ReadonlyArray<number | null>, s: Standardiser) =>
  values.map((value, k) => (value === null ? 0 : (value - s.means[k]) / s.scales[k]));

/**
 * Linear scorer over standardised features with race-wise normalisation. The likelihood (winner
 * softmax or Plackett–Luce) only changes the training loss; scoring is the same for both.
 */
export class RaceProbabilityModel {
  private readonly likelihood: RaceLikelihood;
  private names: readonly string[] | null = null;
  private standardiser: Standardiser | null = null;
  private w: number[] = [];

  constructor(private readonly options: ModelOptions) {
    this.likelihood = createLikelihood(options.variant);
  }

  get variant(): ModelVariant {
    return this.likelihood.variant;
  }

  get fitted() {
    return this.names !== null;
  }

  weights(): Record<string, number> {
    if (!this.names) throw new ModelNotFittedError();
    return Object.fromEntries(this.names.map((name, k) => [name, this.w[k]]));
  }

  fit(races: readonly TrainingRace[]): FitSummary {
    const names = races[0]?.names ?? [];
    for (const race of races) {
      if (race.names.length !== names.length || race.names.some((name, k) => name !== names[k])) {
        throw new ConfigurationError(`race ${race.eventId} has a different feature layout`);
      }
    }

    const width = names.length;
    const standardiser = buildStandardiser(races, width);
    const prepared: PreparedRace[] = races
      .filter((race) => race.entrants.length >= 2 && race.finishOrder.length > 0)
      .map((race) => ({
        rows: race.entrants.map((entrant) => standardise(entrant.values, standardiser)),
        finishOrder: race.finishOrder,
      }));

    let w = new Array<number>(width).fill(0);
    let iterations = 0;
    let converged = prepared.length === 0;
    let current = this.objective(w, prepared);

    while (!converged && iterations < this.options.maxIterations) {
      iterations += 1;
      const gradNormSq = dot(current.gradient, current.gradient);
      if (gradNormSq < this.options.tolerance * this.options.tolerance) {
        converged = true;
        break;
      }

      let step = this.options.learningRate;
      let candidate = w.map((wk, k) => wk - step * current.gradient[k]);
      let next = this.objective(candidate, prepared);
      while (next.loss > current.loss - ARMIJO * step * gradNormSq && step > MIN_STEP) {
        step /= 2;
        candidate = w.map((wk, k) => wk - step * current.gradient[k]);
        next = this.objective(candidate, prepared);
      }

      const improvement = current.loss - next.loss;
      if (improvement < 0) {
        converged = true;
        break;
      }
      w = candidate;
      current = next;
      if (improvement < this.options.tolerance) {
        converged = true;
      }
    }

    this.names = names;
    this.standardiser = standardiser;
    this.w = w;

    return {
      variant: this.variant,
      races: races.length,
      usableRaces: prepared.length,
      iterations,
      converged,
      loss: current.loss,
      weights: this.weights(),
    };
  }

  score(values: ReadonlyArray<number | null>): number {
    if (!this.names || !this.standardiser) throw new ModelNotFittedError();
    if (values.length !== this.names.length) {
      throw new ConfigurationError(`expected ${this.names.length} feature values, got ${values.length}`);
    }
    return dot(this.w, standardise(values, this.standardiser));
  }

  predict(race: RaceFeatures): ProbabilityAssignment {
    if (race.entrants.length === 0) {
      throw new InvalidEventError(`event ${race.eventId} has no entrants`, { eventId: race.eventId });
    }
    const scores = race.entrants.map((entrant) => this.score(entrant.values));
    const { probabilities, issues } = normaliseScores(
      scores,
      this.options.probabilityTolerance ?? DEFAULT_PROBABILITY_TOLERANCE
    );
    return {
      eventId: race.eventId,
      entries: race.entrants.map((entrant, i) => ({
        entrantId: entrant.entrantId,
        competitorId: entrant.competitorId,
        score: scores[i],
        probability: probabilities[i],
      })),
      issues: issues.map((issue) => ({ eventId: race.eventId, ...issue })),
    };
  }

  eventLogLikelihood(race: TrainingRace): number {
    const scores = race.entrants.map((entrant) => this.score(entrant.values));
    return -this.likelihood.evaluate(scores, race.finishOrder).loss;
  }

  private objective(w: readonly number[], races: readonly PreparedRace[]) {
    const gradient = w.map((wk) => this.options.l2 * wk);
    let penalty = 0;
    for (const wk of w) penalty += wk * wk;
    let loss = 0.5 * this.options.l2 * penalty;
    if (races.length === 0) return { loss, gradient };

    const inv = 1 / races.length;
    for (const race of races) {
      const scores = race.rows.map((row) => dot(w, row));
      const term = this.likelihood.evaluate(scores, race.finishOrder);
      loss += inv * term.loss;
      race.rows.forEach((row, i) => {
        const g = term.gradient[i];
        if (g === 0) return;
        for (let k = 0; k < row.length; k += 1) gradient[k] += inv * g * row[k];
      });
    }
    return { loss, gradient };
  }
}
