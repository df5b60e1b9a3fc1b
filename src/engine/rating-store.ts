import { OrderingViolationError } from '../errors.js';
import type { EntityKind, RatingPartition, RatingSnapshot } from './types.js';

export interface EntityRef {
  kind: EntityKind;
  entityId: string;
  stratum: string | null;
}

export interface CommitRecord {
  eventId: string;
  startsAt: Date;
  snapshots: number;
}

export interface PointInTimeRating {
  entityKey: string;
  rating: number;
  raw: number;
  observations: number;
  /** Timestamp of the snapshot used, null when the default applied. */
  effectiveAt: Date | null;
}

export type SnapshotDraft = Omit<RatingSnapshot, 'sequence' | 'effectiveAt' | 'eventId'>;

/** Validated snapshots of one event, numbered against the store as it was when prepared. */
export interface PreparedCommit {
  eventId: string;
  startsAt: Date;
  baseSequence: number;
  snapshots: RatingSnapshot[];
}

export interface SnapshotRow {
  entity_key: string;
  entity_id: string;
  entity_kind: EntityKind;
  stratum: string | null;
  effective_at: string;
  event_id: string;
  rating: number;
  raw_rating: number;
  observations: number;
  sequence: number;
}

export const buildEntityKey = (ref: EntityRef) =>
  ref.stratum === null ? `${ref.kind}:${ref.entityId}` : `${ref.kind}:${ref.stratum}:${ref.entityId}`;

export const resolveStratum = (partition: RatingPartition, stratum: string) =>
  partition === 'stratum' ? stratum : null;

/** Code-unit order, independent of the process locale. */
export const compareIds = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Index of the last snapshot strictly earlier than `asOf` (or at it, when `inclusive`), or -1.
 * Histories are kept in non-decreasing `effectiveAt` order, so this is a plain binary search.
 */
export function lastIndexBefore(history: readonly RatingSnapshot[], asOf: number, inclusive = false): number {
  let lo = 0;
  let hi = history.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const at = history[mid].effectiveAt.getTime();
    if (at < asOf || (inclusive && at === asOf)) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo - 1;
}

/**
 * Append-only arena of rating snapshots. Nothing is rewritten or deleted; a "current" rating only
 * exists as a point-in-time query.
 */
export class RatingStore {
  private readonly histories = new Map<string, RatingSnapshot[]>();
  private readonly commits: CommitRecord[] = [];
  private sequence = 0;

  constructor(readonly defaultRating: number) {}

  get lastCommit(): CommitRecord | undefined {
    return this.commits.at(-1);
  }

  get commitCount() {
    return this.commits.length;
  }

  get snapshotCount() {
    return this.commits.reduce((total, commit) => total + commit.snapshots, 0);
  }

  entityKeys(): string[] {
    return [...this.histories.keys()].sort(compareIds);
  }

  history(entityKey: string): readonly RatingSnapshot[] {
    return this.histories.get(entityKey) ?? [];
  }

  latest(entityKey: string): RatingSnapshot | undefined {
    return this.histories.get(entityKey)?.at(-1);
  }

  latestBefore(entityKey: string, asOf: Date): RatingSnapshot | undefined {
    const history = this.histories.get(entityKey);
    if (!history) return undefined;
    const idx = lastIndexBefore(history, asOf.getTime());
    return idx >= 0 ? history[idx] : undefined;
  }

  ratingAsOf(entityKey: string, asOf: Date): PointInTimeRating {
    return this.toPointInTime(entityKey, this.latestBefore(entityKey, asOf));
  }

  /**
   * The value an update at `at` builds on: the latest snapshot at or before it. An earlier event
   * sharing the same start time is included, so tied events chain in event-id order.
   */
  priorFor(entityKey: string, at: Date): PointInTimeRating {
    const history = this.histories.get(entityKey);
    const idx = history ? lastIndexBefore(history, at.getTime(), true) : -1;
    return this.toPointInTime(entityKey, history && idx >= 0 ? history[idx] : undefined);
  }

  private toPointInTime(entityKey: string, snapshot: RatingSnapshot | undefined): PointInTimeRating {
    if (!snapshot) {
      return {
        entityKey,
        rating: this.defaultRating,
        raw: this.defaultRating,
        observations: 0,
        effectiveAt: null,
      };
    }
    return {
      entityKey,
      rating: snapshot.rating,
      raw: snapshot.raw,
      observations: snapshot.observations,
      effectiveAt: snapshot.effectiveAt,
    };
  }

  /** Appends every snapshot of one event, or none of them. */
  commit(event: { eventId: string; startsAt: Date }, drafts: SnapshotDraft[]): RatingSnapshot[] {
    return this.append(this.prepare(event, drafts));
  }

  /**
   * Validates one event's drafts and numbers them without touching the store, so they can be
   * persisted before `append` makes them visible.
   */
  prepare(event: { eventId: string; startsAt: Date }, drafts: SnapshotDraft[]): PreparedCommit {
    const at = event.startsAt.getTime();
    const last = this.lastCommit;
    if (last && last.startsAt.getTime() > at) {
      throw new OrderingViolationError(
        `event ${event.eventId} at ${event.startsAt.toISOString()} precedes last committed event ${last.eventId}`,
        {
          eventId: event.eventId,
          eventStartsAt: event.startsAt.toISOString(),
          lastAppliedAt: last.startsAt.toISOString(),
          lastEventId: last.eventId,
        }
      );
    }

    const seen = new Set<string>();
    for (const draft of drafts) {
      if (seen.has(draft.entityKey)) {
        throw new OrderingViolationError(`entity ${draft.entityKey} updated twice by event ${event.eventId}`, {
          entityKey: draft.entityKey,
          eventId: event.eventId,
          eventStartsAt: event.startsAt.toISOString(),
          lastAppliedAt: event.startsAt.toISOString(),
        });
      }
      seen.add(draft.entityKey);
      const previous = this.latest(draft.entityKey);
      if (previous && previous.effectiveAt.getTime() > at) {
        throw new OrderingViolationError(
          `entity ${draft.entityKey} already rated at ${previous.effectiveAt.toISOString()}, after event ${event.eventId}`,
          {
            entityKey: draft.entityKey,
            eventId: event.eventId,
            eventStartsAt: event.startsAt.toISOString(),
            lastAppliedAt: previous.effectiveAt.toISOString(),
            lastEventId: previous.eventId,
          }
        );
      }
    }

    const snapshots = drafts.map(
      (draft, i): RatingSnapshot =>
        Object.freeze({
          ...draft,
          effectiveAt: new Date(at),
          eventId: event.eventId,
          sequence: this.sequence + i + 1,
        })
    );
    return { eventId: event.eventId, startsAt: new Date(at), baseSequence: this.sequence, snapshots };
  }

  append(prepared: PreparedCommit): RatingSnapshot[] {
    if (prepared.baseSequence !== this.sequence) {
      throw new OrderingViolationError(`event ${prepared.eventId} was prepared against an older store`, {
        eventId: prepared.eventId,
        eventStartsAt: prepared.startsAt.toISOString(),
        lastAppliedAt: (this.lastCommit?.startsAt ?? prepared.startsAt).toISOString(),
        lastEventId: this.lastCommit?.eventId,
      });
    }
    for (const snapshot of prepared.snapshots) this.push(snapshot);
    this.sequence += prepared.snapshots.length;
    this.commits.push({
      eventId: prepared.eventId,
      startsAt: new Date(prepared.startsAt.getTime()),
      snapshots: prepared.snapshots.length,
    });
    return prepared.snapshots;
  }

  /**
   * Loads persisted snapshots into an empty store. Rows are grouped back into commits by event,
   * in effective-time then sequence order; numbering continues after the highest sequence seen.
   */
  restore(snapshots: readonly RatingSnapshot[]): void {
    if (this.commits.length) throw new Error('cannot restore into a rating store that already holds events');
    const ordered = [...snapshots].sort(
      (a, b) => a.effectiveAt.getTime() - b.effectiveAt.getTime() || a.sequence - b.sequence
    );
    for (const snapshot of ordered) {
      this.push(Object.freeze({ ...snapshot }));
      const last = this.lastCommit;
      if (last && last.eventId === snapshot.eventId) {
        last.snapshots += 1;
      } else {
        this.commits.push({ eventId: snapshot.eventId, startsAt: snapshot.effectiveAt, snapshots: 1 });
      }
      if (snapshot.sequence > this.sequence) this.sequence = snapshot.sequence;
    }
  }

  private push(snapshot: RatingSnapshot) {
    const history = this.histories.get(snapshot.entityKey);
    if (history) {
      history.push(snapshot);
    } else {
      this.histories.set(snapshot.entityKey, [snapshot]);
    }
  }

  rows(): SnapshotRow[] {
    const all: RatingSnapshot[] = [];
    for (const history of this.histories.values()) all.push(...history);
    return all.sort((a, b) => a.sequence - b.sequence).map(toSnapshotRow);
  }
}

export const toSnapshotRow = (snapshot: RatingSnapshot): SnapshotRow => ({
  entity_key: snapshot.entityKey,
  entity_id: snapshot.entityId,
  entity_kind: snapshot.kind,
  stratum: snapshot.stratum,
  effective_at: snapshot.effectiveAt.toISOString(),
  event_id: snapshot.eventId,
  rating: snapshot.rating,
  raw_rating: snapshot.raw,
  observations: snapshot.observations,
  sequence: snapshot.sequence,
});
