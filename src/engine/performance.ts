import { InvalidEventError } from '../errors.js';
import type { EntrantResult, NonFinisherPolicy } from './types.js';

/** Performance of a finisher: 1 for the winner, 0 for last place in the declared field. */
export function finishPerformance(position: number, fieldSize: number): number {
  if (!Number.isInteger(fieldSize) || fieldSize < 1) {
    throw new InvalidEventError(`field size must be a positive integer, got ${fieldSize}`);
  }
  if (!Number.isInteger(position) || position < 1 || position > fieldSize) {
    throw new InvalidEventError(`position ${position} is outside 1..${fieldSize}`);
  }
  if (fieldSize === 1) return 1;
  return 1 - (position - 1) / (fieldSize - 1);
}

export function nonFinisherPerformance(policy: NonFinisherPolicy, fieldSize: number): number {
  switch (policy.kind) {
    case 'constant':
      return policy.value;
    case 'last-place':
      return fieldSize > 1 ? finishPerformance(fieldSize, fieldSize) : 0;
  }
}

export function entrantPerformance(
  result: EntrantResult,
  fieldSize: number,
  policy: NonFinisherPolicy
): number {
  if ('position' in result) return finishPerformance(result.position, fieldSize);
  return nonFinisherPerformance(policy, fieldSize);
}
