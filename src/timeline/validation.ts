import { InvalidEventError } from '../errors.js';
import type { RaceEvent } from '../engine/types.js';

export function collectEventIssues(event: RaceEvent): string[] {
  const issues: string[] = [];

  if (!event.eventId) issues.push('event id is required');
  if (Number.isNaN(event.startsAt.getTime())) issues.push('start time is not a valid timestamp');
  if (event.entrants.length === 0) issues.push('event has no entrants');
  if (!Number.isInteger(event.fieldSize) || event.fieldSize < 1) {
    issues.push(`field size ${event.fieldSize} is not a positive integer`);
  } else if (event.entrants.length !== event.fieldSize) {
    issues.push(`declared field size ${event.fieldSize} but found ${event.entrants.length} entrants`);
  }

  const entrantIds = new Set<string>();
  const competitorIds = new Set<string>();
  for (const entrant of event.entrants) {
    if (entrantIds.has(entrant.entrantId)) issues.push(`duplicate entrant ${entrant.entrantId}`);
    if (competitorIds.has(entrant.competitorId)) issues.push(`competitor ${entrant.competitorId} entered twice`);
    entrantIds.add(entrant.entrantId);
    competitorIds.add(entrant.competitorId);
  }

  if (event.status === 'pending') {
    if (event.entrants.some((entrant) => entrant.result !== undefined)) {
      issues.push('pending event carries results');
    }
    return issues;
  }

  const positions: number[] = [];
  for (const entrant of event.entrants) {
    if (!entrant.result) {
      issues.push(`entrant ${entrant.entrantId} has no result`);
    } else if ('position' in entrant.result) {
      positions.push(entrant.result.position);
    }
  }
  // finishers must be ranked 1..k with no gaps or ties
  const sorted = [...positions].sort((a, b) => a - b);
  if (sorted.some((position, i) => position !== i + 1)) {
    issues.push(`finishing positions [${sorted.join(', ')}] are not a permutation of 1..${sorted.length}`);
  }

  return issues;
}

export function assertValidEvent(event: RaceEvent): void {
  const issues = collectEventIssues(event);
  if (issues.length) {
    throw new InvalidEventError(`event ${event.eventId || '<unknown>'} is invalid: ${issues.join('; ')}`, {
      eventId: event.eventId,
      issues,
    });
  }
}

/** Finisher indices ordered by position. */
export const finishOrderOf = (event: RaceEvent): number[] =>
  event.entrants
    .flatMap((entrant, index) =>
      entrant.result && 'position' in entrant.result ? [{ index, position: entrant.result.position }] : []
    )
    .sort((a, b) => a.position - b.position)
    .map((entry) => entry.index);

export const winnerIndexOf = (event: RaceEvent): number | null => {
  if (event.status !== 'settled') return null;
  const order = finishOrderOf(event);
  return order.length ? order[0] : null;
};
