import { InvalidEventError, ModelNotFittedError, OrderingViolationError } from '../errors.js';
import type { EngineConfig } from '../config.js';
import { RatingEngine } from '../engine/rating.js';
import { buildEntityKey, resolveStratum } from '../engine/rating-store.js';
import type { RatingStore } from '../engine/rating-store.js';
import type { EntityKind, EntrantResult, RaceEvent, RatingSnapshot } from '../engine/types.js';
import { FeatureAssembler, assertNoLeak } from '../features/assembler.js';
import { consoleLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { RaceProbabilityModel } from '../model/race-model.js';
import type { FitSummary, ProbabilityAssignment, TrainingRace } from '../model/race-model.js';
import type { SnapshotRepository } from '../store/repository.js';
import { DEFAULT_STRATUM } from '../timeline/schema.js';
import { EventTimeline, compareEvents } from '../timeline/timeline.js';
import { assertValidEvent, finishOrderOf } from '../timeline/validation.js';

export interface IngestedEvent {
  eventId: string;
  status: RaceEvent['status'];
  snapshots: number;
}

export interface RatingLookup {
  entityKey: string;
  kind: EntityKind;
  entityId: string;
  stratum: string | null;
  asOf: Date;
  rating: number;
  raw: number;
  observations: number;
  effectiveAt: Date | null;
  eventId: string | null;
}

export interface EntityQuery {
  kind: EntityKind;
  entityId: string;
  stratum?: string;
}

/**
 * Live counterpart of the backtest: one timeline, one rating store updated as events settle, and
 * an optional fitted model. The store is rebuilt from the repository before first use, and each
 * event's snapshots are persisted before they become visible in it.
 */
export class RaceRatingService {
  private readonly timeline = new EventTimeline();
  private readonly engine: RatingEngine;
  private readonly store: RatingStore;
  private model: RaceProbabilityModel | null = null;
  private restored: readonly RatingSnapshot[] = [];
  private restoring: Promise<void> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly config: EngineConfig,
    private readonly repository: SnapshotRepository,
    private readonly logger: Logger = consoleLogger
  ) {
    this.engine = new RatingEngine(config.rating);
    this.store = this.engine.createStore();
  }

  get eventCount() {
    return this.timeline.size;
  }

  get modelFitted() {
    return this.model !== null;
  }

  /** Accepts a batch only if all of it sorts after what is already held. */
  async ingest(events: readonly RaceEvent[]): Promise<IngestedEvent[]> {
    for (const event of events) assertValidEvent(event);
    const batch = [...events].sort(compareEvents);

    return this.exclusive(async () => {
      const seen = new Set<string>();
      for (const event of batch) {
        if (seen.has(event.eventId) || this.timeline.has(event.eventId)) {
          throw new InvalidEventError(`duplicate event ${event.eventId}`, { eventId: event.eventId });
        }
        seen.add(event.eventId);
      }

      const last = this.timeline.last();
      const first = batch[0];
      if (last && first && compareEvents(last, first) > 0) {
        throw new OrderingViolationError(
          `event ${first.eventId} at ${first.startsAt.toISOString()} sorts before ${last.eventId}`,
          {
            eventId: first.eventId,
            eventStartsAt: first.startsAt.toISOString(),
            lastAppliedAt: last.startsAt.toISOString(),
            lastEventId: last.eventId,
          }
        );
      }

      const rated = this.store.lastCommit;
      const stale = batch.find(
        (event) => event.status === 'settled' && rated !== undefined && event.startsAt < rated.startsAt
      );
      if (stale && rated) {
        throw new OrderingViolationError(`event ${stale.eventId} predates already rated event ${rated.eventId}`, {
          eventId: stale.eventId,
          eventStartsAt: stale.startsAt.toISOString(),
          lastAppliedAt: rated.startsAt.toISOString(),
          lastEventId: rated.eventId,
        });
      }

      const ingested: IngestedEvent[] = [];
      for (const event of batch) {
        const snapshots = event.status === 'settled' ? await this.rate(event) : [];
        const stored = this.timeline.append(event);
        ingested.push({ eventId: stored.eventId, status: stored.status, snapshots: snapshots.length });
      }
      this.logger.info('events_ingested', {
        count: ingested.length,
        settled: ingested.filter((event) => event.status === 'settled').length,
      });
      return ingested;
    });
  }

  async settle(eventId: string, results: Record<string, EntrantResult>): Promise<IngestedEvent> {
    return this.exclusive(async () => {
      const pending = this.timeline.get(eventId);
      const last = this.store.lastCommit;
      if (pending.status === 'pending' && last && last.startsAt.getTime() > pending.startsAt.getTime()) {
        throw new OrderingViolationError(
          `event ${eventId} starts before already rated event ${last.eventId}`,
          {
            eventId,
            eventStartsAt: pending.startsAt.toISOString(),
            lastAppliedAt: last.startsAt.toISOString(),
            lastEventId: last.eventId,
          }
        );
      }

      const settled = this.timeline.withResults(eventId, results);
      const snapshots = await this.rate(settled);
      this.timeline.settle(eventId, results);
      this.logger.info('event_settled', { eventId, snapshots: snapshots.length });
      return { eventId, status: settled.status, snapshots: snapshots.length };
    });
  }

  async ratingAsOf(query: EntityQuery, asOf: Date): Promise<RatingLookup> {
    const { entityKey, stratum } = this.keyFor(query);
    const snapshot = await this.repository.findAsOf(entityKey, asOf);
    const base = { entityKey, kind: query.kind, entityId: query.entityId, stratum, asOf };
    if (!snapshot) {
      const rating = this.config.rating.defaultRating;
      return { ...base, rating, raw: rating, observations: 0, effectiveAt: null, eventId: null };
    }
    return {
      ...base,
      rating: snapshot.rating,
      raw: snapshot.raw,
      observations: snapshot.observations,
      effectiveAt: snapshot.effectiveAt,
      eventId: snapshot.eventId,
    };
  }

  async history(query: EntityQuery): Promise<{ entityKey: string; snapshots: RatingSnapshot[] }> {
    const { entityKey } = this.keyFor(query);
    return { entityKey, snapshots: await this.repository.listHistory(entityKey) };
  }

  /**
   * Refits on every settled event, each race described by ratings from strictly before it. Rating
   * history restored from the repository seeds the store the features are read from.
   */
  async fit(): Promise<FitSummary> {
    await this.ready();
    const store = this.engine.createStore();
    store.restore(this.restored);
    const assembler = new FeatureAssembler(store, this.config.features, this.config.rating.partition, {
      strict: true,
    });
    const races: TrainingRace[] = [];
    for (const event of this.timeline.settledEvents()) {
      const features = assembler.featuresFor(event);
      assertNoLeak(features);
      races.push({ ...features, finishOrder: finishOrderOf(event) });
      this.engine.apply(store, event);
    }

    const model = new RaceProbabilityModel(this.config.model);
    const summary = model.fit(races);
    if (summary.usableRaces === 0) {
      this.logger.warn('model_fit_skipped', { races: summary.races });
      throw new ModelNotFittedError(`no settled race with a winner and two or more entrants to fit on (${summary.races} settled)`);
    }
    this.model = model;
    this.logger.info('model_fitted', {
      variant: summary.variant,
      races: summary.races,
      usableRaces: summary.usableRaces,
      iterations: summary.iterations,
      converged: summary.converged,
    });
    return summary;
  }

  async predict(eventId: string): Promise<ProbabilityAssignment> {
    const model = this.model;
    if (!model) throw new ModelNotFittedError();

    const event = this.timeline.get(eventId);
    const assembler = new FeatureAssembler(this.store, this.config.features, this.config.rating.partition);
    const features = assembler.featuresFor(event);
    assertNoLeak(features);

    const assignment = model.predict(features);
    if (assignment.issues.length) {
      this.logger.warn('prediction_numerical_issues', { eventId, issues: assignment.issues });
    }
    await this.repository.savePredictions(
      assignment.entries.map((entry) => ({
        eventId,
        entrantId: entry.entrantId,
        competitorId: entry.competitorId,
        probability: entry.probability,
        modelVariant: model.variant,
      }))
    );
    return assignment;
  }

  /** Persists one event's snapshots, then makes them visible; a failed write leaves nothing behind. */
  private async rate(event: RaceEvent): Promise<RatingSnapshot[]> {
    const { commit } = this.engine.prepare(this.store, event);
    try {
      await this.repository.appendEventSnapshots(event.eventId, commit.snapshots);
    } catch (err) {
      this.logger.error('snapshot_persist_failed', { eventId: event.eventId, err });
      throw err;
    }
    return this.store.append(commit);
  }

  private ready(): Promise<void> {
    if (!this.restoring) {
      this.restoring = this.restore().catch((err: unknown) => {
        this.restoring = null;
        throw err;
      });
    }
    return this.restoring;
  }

  private async restore() {
    const snapshots = await this.repository.listSnapshots();
    this.store.restore(snapshots);
    this.restored = snapshots;
    const last = this.store.lastCommit;
    if (last) {
      this.logger.info('ratings_restored', {
        events: this.store.commitCount,
        snapshots: snapshots.length,
        lastEventId: last.eventId,
        lastAppliedAt: last.startsAt.toISOString(),
      });
    }
  }

  /** Runs store writes one at a time, after the restore. A failed write does not block the next. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writes.then(() => this.ready()).then(task);
    this.writes = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private keyFor(query: EntityQuery) {
    const stratum = resolveStratum(this.config.rating.partition, query.stratum ?? DEFAULT_STRATUM);
    return { entityKey: buildEntityKey({ kind: query.kind, entityId: query.entityId, stratum }), stratum };
  }
}
