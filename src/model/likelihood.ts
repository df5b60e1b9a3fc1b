import { logSumExp } from './softmax.js';

export type ModelVariant = 'winner-softmax' | 'plackett-luce';

export interface LikelihoodTerm {
  /** Negative log-likelihood of the observed outcome. */
  loss: number;
  /** d(loss)/d(score) per entrant. */
  gradient: number[];
}

export interface RaceLikelihood {
  readonly variant: ModelVariant;
  evaluate(scores: readonly number[], finishOrder: readonly number[]): LikelihoodTerm;
}

const zeroTerm = (n: number): LikelihoodTerm => ({ loss: 0, gradient: new Array<number>(n).fill(0) });

/** -log p(winner) under the race-wise softmax. */
const winnerSoftmax: RaceLikelihood = {
  variant: 'winner-softmax',
  evaluate(scores, finishOrder) {
    const n = scores.length;
    if (n < 2 || finishOrder.length === 0) return zeroTerm(n);
    const winner = finishOrder[0];
    const lse = logSumExp(scores);
    const gradient = scores.map((s) => Math.exp(s - lse));
    gradient[winner] -= 1;
    return { loss: lse - scores[winner], gradient };
  },
};

/**
 * Sequential elimination: each placed finisher is a softmax draw among entrants not yet placed.
 * Non-finishers are never placed and stay in every remaining set.
 */
const plackettLuce: RaceLikelihood = {
  variant: 'plackett-luce',
  evaluate(scores, finishOrder) {
    const n = scores.length;
    if (n < 2 || finishOrder.length === 0) return zeroTerm(n);
    const gradient = new Array<number>(n).fill(0);
    const remaining = scores.map((_, i) => i);
    let loss = 0;

    for (const placed of finishOrder) {
      if (remaining.length < 2) break;
      const lse = logSumExp(remaining.map((i) => scores[i]));
      loss += lse - scores[placed];
      for (const i of remaining) gradient[i] += Math.exp(scores[i] - lse);
      gradient[placed] -= 1;
      remaining.splice(remaining.indexOf(placed), 1);
    }

    return { loss, gradient };
  },
};

export const createLikelihood = (variant: ModelVariant): RaceLikelihood =>
  variant === 'plackett-luce' ? plackettLuce : winnerSoftmax;
