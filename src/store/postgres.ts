import { and, asc, desc, eq, inArray, lt, sql } from 'drizzle-orm';

import { getDb } from '../db/client.js';
import type { Database } from '../db/client.js';
import { racePredictions, ratingSnapshots } from '../db/schema.js';
import type { RatingSnapshot } from '../engine/types.js';
import { SnapshotConflictError, assertAppendable, isEntityKind } from './repository.js';
import type { PredictionRecord, SnapshotRepository } from './repository.js';

type SnapshotRow = typeof ratingSnapshots.$inferSelect;

const toSnapshot = (row: SnapshotRow): RatingSnapshot => {
  if (!isEntityKind(row.entityKind)) {
    throw new Error(`unknown entity kind ${row.entityKind} for ${row.entityKey}`);
  }
  return {
    entityKey: row.entityKey,
    entityId: row.entityId,
    kind: row.entityKind,
    stratum: row.stratum,
    effectiveAt: row.effectiveAt,
    eventId: row.eventId,
    rating: row.rating,
    raw: row.rawRating,
    observations: row.observations,
    sequence: row.sequence,
  };
};

export class PostgresSnapshotRepository implements SnapshotRepository {
  constructor(private readonly db: Database = getDb()) {}

  async appendEventSnapshots(eventId: string, snapshots: readonly RatingSnapshot[]): Promise<void> {
    if (!snapshots.length) return;
    const keys = snapshots.map((snapshot) => snapshot.entityKey);
    await this.db.transaction(async (tx) => {
      const existing = await tx
        .select({ entityKey: ratingSnapshots.entityKey })
        .from(ratingSnapshots)
        .where(
          and(
            eq(ratingSnapshots.eventId, eventId),
            inArray(ratingSnapshots.entityKey, keys)
          )
        );
      if (existing.length) {
        throw new SnapshotConflictError(`snapshots for event ${eventId} already stored`, {
          eventId,
          entityKeys: existing.map((row) => row.entityKey),
        });
      }

      const latest = await tx
        .select({
          entityKey: ratingSnapshots.entityKey,
          latest: sql<Date | string>`max(${ratingSnapshots.effectiveAt})`,
        })
        .from(ratingSnapshots)
        .where(inArray(ratingSnapshots.entityKey, keys))
        .groupBy(ratingSnapshots.entityKey);
      assertAppendable(
        eventId,
        snapshots,
        new Map(latest.map((row) => [row.entityKey, { effectiveAt: new Date(row.latest) }]))
      );

      await tx.insert(ratingSnapshots).values(
        snapshots.map((snapshot) => ({
          entityKey: snapshot.entityKey,
          entityId: snapshot.entityId,
          entityKind: snapshot.kind,
          stratum: snapshot.stratum,
          effectiveAt: snapshot.effectiveAt,
          eventId: snapshot.eventId,
          rating: snapshot.rating,
          rawRating: snapshot.raw,
          observations: snapshot.observations,
          sequence: snapshot.sequence,
        }))
      );
    });
  }

  async findAsOf(entityKey: string, asOf: Date): Promise<RatingSnapshot | null> {
    const rows = await this.db
      .select()
      .from(ratingSnapshots)
      .where(and(eq(ratingSnapshots.entityKey, entityKey), lt(ratingSnapshots.effectiveAt, asOf)))
      .orderBy(desc(ratingSnapshots.effectiveAt), desc(ratingSnapshots.id))
      .limit(1);
    return rows.length ? toSnapshot(rows[0]) : null;
  }

  async listSnapshots(): Promise<RatingSnapshot[]> {
    const rows = await this.db
      .select()
      .from(ratingSnapshots)
      .orderBy(asc(ratingSnapshots.effectiveAt), asc(ratingSnapshots.sequence), asc(ratingSnapshots.id));
    return rows.map(toSnapshot);
  }

  async listHistory(entityKey: string): Promise<RatingSnapshot[]> {
    const rows = await this.db
      .select()
      .from(ratingSnapshots)
      .where(eq(ratingSnapshots.entityKey, entityKey))
      .orderBy(asc(ratingSnapshots.effectiveAt), asc(ratingSnapshots.id));
    return rows.map(toSnapshot);
  }

  async savePredictions(rows: readonly PredictionRecord[]): Promise<void> {
    if (!rows.length) return;
    await this.db.insert(racePredictions).values(
      rows.map((row) => ({
        eventId: row.eventId,
        entrantId: row.entrantId,
        competitorId: row.competitorId,
        probability: row.probability,
        modelVariant: row.modelVariant,
      }))
    );
  }

  async listPredictions(eventId: string): Promise<PredictionRecord[]> {
    const rows = await this.db
      .select()
      .from(racePredictions)
      .where(eq(racePredictions.eventId, eventId))
      .orderBy(asc(racePredictions.id));
    return rows.map((row) => ({
      eventId: row.eventId,
      entrantId: row.entrantId,
      competitorId: row.competitorId,
      probability: row.probability,
      modelVariant: row.modelVariant,
      createdAt: row.createdAt,
    }));
  }
}
