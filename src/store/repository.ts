import type { EntityKind, RatingSnapshot } from '../engine/types.js';
import { ENTITY_KINDS } from '../engine/types.js';
import { OrderingViolationError } from '../errors.js';

export interface PredictionRecord {
  eventId: string;
  entrantId: string;
  competitorId: string;
  probability: number;
  modelVariant: string;
  createdAt?: Date;
}

/**
 * Persisted form of the rating store: an append-only table of snapshots. One event's snapshots
 * are written in a single call and either all land or none do.
 */
export interface SnapshotRepository {
  /** Rejects the whole event when any snapshot is already stored or predates its entity's history. */
  appendEventSnapshots(eventId: string, snapshots: readonly RatingSnapshot[]): Promise<void>;
  /** Every stored snapshot, ordered by effective time then sequence. */
  listSnapshots(): Promise<RatingSnapshot[]>;
  findAsOf(entityKey: string, asOf: Date): Promise<RatingSnapshot | null>;
  listHistory(entityKey: string): Promise<RatingSnapshot[]>;
  savePredictions(rows: readonly PredictionRecord[]): Promise<void>;
  listPredictions(eventId: string): Promise<PredictionRecord[]>;
}

export class SnapshotConflictError extends Error {
  constructor(
    message: string,
    public readonly context: { eventId: string; entityKeys: string[] }
  ) {
    super(message);
    this.name = 'SnapshotConflictError';
  }
}

export const isEntityKind = (value: string): value is EntityKind =>
  ENTITY_KINDS.some((kind) => kind === value);

/**
 * Throws for the first snapshot that is older than the newest one already stored for its entity.
 * Both repositories run this before writing, so an event lands whole or not at all.
 */
export function assertAppendable(
  eventId: string,
  snapshots: readonly RatingSnapshot[],
  storedUntil: ReadonlyMap<string, { effectiveAt: Date; eventId?: string }>
): void {
  for (const snapshot of snapshots) {
    const stored = storedUntil.get(snapshot.entityKey);
    if (stored && stored.effectiveAt.getTime() > snapshot.effectiveAt.getTime()) {
      throw new OrderingViolationError(`snapshot for ${snapshot.entityKey} predates its stored history`, {
        entityKey: snapshot.entityKey,
        eventId,
        eventStartsAt: snapshot.effectiveAt.toISOString(),
        lastAppliedAt: stored.effectiveAt.toISOString(),
        lastEventId: stored.eventId,
      });
    }
  }
}
