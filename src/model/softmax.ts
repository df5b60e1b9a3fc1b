import { InvalidEventError } from '../errors.js';

export type NumericalIssueKind = 'non_finite_score' | 'renormalised' | 'probability_clipped';

export interface NumericalIssue {
  eventId: string;
  kind: NumericalIssueKind;
  detail: string;
}

export interface Normalisation {
  probabilities: number[];
  issues: Array<Omit<NumericalIssue, 'eventId'>>;
}

export const DEFAULT_PROBABILITY_TOLERANCE = 1e-9;

export function logSumExp(scores: readonly number[]): number {
  let max = -Infinity;
  for (const s of scores) if (s > max) max = s;
  if (max === -Infinity) return -Infinity;
  let sum = 0;
  for (const s of scores) sum += Math.exp(s - max);
  return max + Math.log(sum);
}

/**
 * Race-wise softmax with the max score subtracted before exponentiating. A single entrant gets
 * exactly 1; an empty event is rejected rather than producing 0/0.
 */
export function normaliseScores(
  scores: readonly number[],
  tolerance = DEFAULT_PROBABILITY_TOLERANCE
): Normalisation {
  const n = scores.length;
  if (n === 0) {
    throw new InvalidEventError('cannot normalise an event with no entrants');
  }
  if (n === 1) return { probabilities: [1], issues: [] };

  if (scores.some((s) => !Number.isFinite(s))) {
    return {
      probabilities: scores.map(() => 1 / n),
      issues: [{ kind: 'non_finite_score', detail: `non-finite score among ${n} entrants; uniform fallback` }],
    };
  }

  const max = Math.max(...scores);
  const exps = scores.map((s) => Math.exp(s - max));
  const total = exps.reduce((s, x) => s + x, 0);
  const probabilities = exps.map((x) => x / total);

  const sum = probabilities.reduce((s, p) => s + p, 0);
  if (Math.abs(sum - 1) > tolerance) {
    return {
      probabilities: probabilities.map((p) => p / sum),
      issues: [{ kind: 'renormalised', detail: `probabilities summed to ${sum}` }],
    };
  }
  return { probabilities, issues: [] };
}

export const softmax = (scores: readonly number[]) => normaliseScores(scores).probabilities;
