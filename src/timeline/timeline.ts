import { EventLookupError, InvalidEventError, OrderingViolationError, OutcomeAlreadySettledError } from '../errors.js';
import { compareIds } from '../engine/rating-store.js';
import type { EntrantResult, RaceEvent } from '../engine/types.js';
import { assertValidEvent } from './validation.js';

/** Total order over events: start time, then event id. */
export const compareEvents = (a: RaceEvent, b: RaceEvent) =>
  a.startsAt.getTime() - b.startsAt.getTime() || compareIds(a.eventId, b.eventId);

const freezeEvent = (event: RaceEvent): RaceEvent =>
  Object.freeze({
    ...event,
    startsAt: new Date(event.startsAt.getTime()),
    entrants: event.entrants.map((entrant) =>
      Object.freeze({
        ...entrant,
        agents: entrant.agents.map((agent) => ({ ...agent })),
        attributes: { ...entrant.attributes },
        ...(entrant.result ? { result: { ...entrant.result } } : {}),
      })
    ),
  });

/**
 * Validated, deterministically ordered events. Events are immutable apart from the single
 * pending → settled transition, which replaces the stored event.
 */
export class EventTimeline {
  private readonly ordered: RaceEvent[] = [];
  private readonly index = new Map<string, number>();

  constructor(events: Iterable<RaceEvent> = []) {
    const incoming = [...events];
    for (const event of incoming) assertValidEvent(event);
    incoming.sort(compareEvents);
    for (const event of incoming) {
      if (this.index.has(event.eventId)) {
        throw new InvalidEventError(`duplicate event ${event.eventId}`, { eventId: event.eventId });
      }
      this.index.set(event.eventId, this.ordered.length);
      this.ordered.push(freezeEvent(event));
    }
  }

  get size() {
    return this.ordered.length;
  }

  events(): readonly RaceEvent[] {
    return this.ordered;
  }

  settledEvents(): RaceEvent[] {
    return this.ordered.filter((event) => event.status === 'settled');
  }

  has(eventId: string) {
    return this.index.has(eventId);
  }

  get(eventId: string): RaceEvent {
    const idx = this.index.get(eventId);
    if (idx === undefined) throw new EventLookupError(`event ${eventId} not found`);
    return this.ordered[idx];
  }

  last(): RaceEvent | undefined {
    return this.ordered.at(-1);
  }

  /** Number of events starting strictly before `asOf`. */
  countBefore(asOf: Date): number {
    const at = asOf.getTime();
    let lo = 0;
    let hi = this.ordered.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.ordered[mid].startsAt.getTime() < at) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  eventsBefore(asOf: Date): RaceEvent[] {
    return this.ordered.slice(0, this.countBefore(asOf));
  }

  /** Appends an event that sorts after everything already held. */
  append(event: RaceEvent): RaceEvent {
    assertValidEvent(event);
    if (this.index.has(event.eventId)) {
      throw new InvalidEventError(`duplicate event ${event.eventId}`, { eventId: event.eventId });
    }
    const last = this.last();
    if (last && compareEvents(last, event) > 0) {
      throw new OrderingViolationError(
        `event ${event.eventId} at ${event.startsAt.toISOString()} sorts before ${last.eventId}`,
        {
          eventId: event.eventId,
          eventStartsAt: event.startsAt.toISOString(),
          lastAppliedAt: last.startsAt.toISOString(),
          lastEventId: last.eventId,
        }
      );
    }
    const frozen = freezeEvent(event);
    this.index.set(event.eventId, this.ordered.length);
    this.ordered.push(frozen);
    return frozen;
  }

  settle(eventId: string, results: Record<string, EntrantResult>): RaceEvent {
    const frozen = this.withResults(eventId, results);
    const idx = this.index.get(eventId);
    if (idx !== undefined) this.ordered[idx] = frozen;
    return frozen;
  }

  /** The settled form of a pending event, validated but not stored. */
  withResults(eventId: string, results: Record<string, EntrantResult>): RaceEvent {
    const current = this.get(eventId);
    if (current.status === 'settled') throw new OutcomeAlreadySettledError(eventId);

    const unknown = Object.keys(results).filter(
      (entrantId) => !current.entrants.some((entrant) => entrant.entrantId === entrantId)
    );
    if (unknown.length) {
      throw new InvalidEventError(`unknown entrants for event ${eventId}: ${unknown.join(', ')}`, {
        eventId,
        issues: unknown.map((id) => `unknown entrant ${id}`),
      });
    }

    const settled: RaceEvent = {
      ...current,
      status: 'settled',
      entrants: current.entrants.map((entrant) => {
        const result = results[entrant.entrantId];
        return result === undefined ? { ...entrant } : { ...entrant, result };
      }),
    };
    assertValidEvent(settled);
    return freezeEvent(settled);
  }
}
