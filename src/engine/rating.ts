import { InvalidEventError } from '../errors.js';
import { entrantPerformance } from './performance.js';
import { RatingStore, buildEntityKey, resolveStratum } from './rating-store.js';
import type { EntityRef, PreparedCommit, SnapshotDraft } from './rating-store.js';
import { createUpdateStrategy } from './strategies.js';
import type { UpdateStrategy } from './strategies.js';
import type { EntityKind, EntityUpdate, EventUpdateResult, RaceEvent, RatingConfig } from './types.js';

interface Participation {
  ref: EntityRef;
  entityKey: string;
  performances: number[];
}

const mean = (xs: number[]) => xs.reduce((s, x) => s + x, 0) / xs.length;

/**
 * Entities touched by one event, in entrant order. An agent riding or training several entrants
 * in the same event is collected once with all of their performances.
 */
function collectParticipations(event: RaceEvent, config: RatingConfig): Participation[] {
  const stratum = resolveStratum(config.partition, event.stratum);
  const byKey = new Map<string, Participation>();

  const add = (kind: EntityKind, entityId: string, performance: number) => {
    const ref: EntityRef = { kind, entityId, stratum };
    const entityKey = buildEntityKey(ref);
    const existing = byKey.get(entityKey);
    if (existing) {
      existing.performances.push(performance);
    } else {
      byKey.set(entityKey, { ref, entityKey, performances: [performance] });
    }
  };

  for (const entrant of event.entrants) {
    if (!entrant.result) {
      throw new InvalidEventError(`entrant ${entrant.entrantId} of event ${event.eventId} has no result`, {
        eventId: event.eventId,
      });
    }
    const performance = entrantPerformance(entrant.result, event.fieldSize, config.nonFinisher);
    add('horse', entrant.competitorId, performance);
    for (const agent of entrant.agents) {
      add(agent.role, agent.id, performance);
    }
  }

  return [...byKey.values()];
}

export class RatingEngine {
  private readonly strategies: Record<EntityKind, UpdateStrategy>;

  constructor(private readonly config: RatingConfig) {
    this.strategies = {
      horse: createUpdateStrategy(config.strategies.horse),
      jockey: createUpdateStrategy(config.strategies.jockey),
      trainer: createUpdateStrategy(config.strategies.trainer),
    };
  }

  createStore() {
    return new RatingStore(this.config.defaultRating);
  }

  /**
   * Folds one settled event into the store. Every involved entity receives exactly one new
   * snapshot effective at the event's start.
   */
  apply(store: RatingStore, event: RaceEvent): EventUpdateResult {
    const { perEntity, commit } = this.prepare(store, event);
    const snapshots = store.append(commit);
    return { eventId: event.eventId, appliedAt: event.startsAt, perEntity, snapshots };
  }

  /**
   * Computes one event's update against the store without appending it. Priors are the latest
   * snapshots at or before the event start, so an earlier event at the same time is built upon.
   */
  prepare(store: RatingStore, event: RaceEvent): { perEntity: EntityUpdate[]; commit: PreparedCommit } {
    if (event.status !== 'settled') {
      throw new InvalidEventError(`event ${event.eventId} is not settled`, { eventId: event.eventId });
    }

    const participations = collectParticipations(event, this.config);
    const drafts: SnapshotDraft[] = [];
    const perEntity: EntityUpdate[] = [];

    for (const participation of participations) {
      const prior = store.priorFor(participation.entityKey, event.startsAt);
      const performance = mean(participation.performances);
      const outcome = this.strategies[participation.ref.kind].update(
        { raw: prior.raw, observations: prior.observations },
        performance
      );

      drafts.push({
        entityKey: participation.entityKey,
        entityId: participation.ref.entityId,
        kind: participation.ref.kind,
        stratum: participation.ref.stratum,
        rating: outcome.rating,
        raw: outcome.raw,
        observations: prior.observations + 1,
      });
      perEntity.push({
        entityKey: participation.entityKey,
        entityId: participation.ref.entityId,
        kind: participation.ref.kind,
        performance,
        ratingBefore: prior.rating,
        ratingAfter: outcome.rating,
        rawBefore: prior.raw,
        rawAfter: outcome.raw,
        observationsBefore: prior.observations,
        observationsAfter: prior.observations + 1,
        priorSnapshotAt: prior.effectiveAt,
      });
    }

    return { perEntity, commit: store.prepare(event, drafts) };
  }

  /**
   * Sequential pass over settled events. Pending events are skipped; an abort is only honoured
   * between events so the store always reflects a prefix of the timeline.
   */
  applyAll(
    store: RatingStore,
    events: Iterable<RaceEvent>,
    options: { signal?: AbortSignal; onEvent?: (result: EventUpdateResult) => void } = {}
  ): number {
    let applied = 0;
    for (const event of events) {
      options.signal?.throwIfAborted();
      if (event.status !== 'settled') continue;
      const result = this.apply(store, event);
      applied += 1;
      options.onEvent?.(result);
    }
    return applied;
  }
}
