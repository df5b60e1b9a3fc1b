import { lastIndexBefore } from '../engine/rating-store.js';
import type { RatingSnapshot } from '../engine/types.js';
import { SnapshotConflictError, assertAppendable } from './repository.js';
import type { PredictionRecord, SnapshotRepository } from './repository.js';

export class MemorySnapshotRepository implements SnapshotRepository {
  private readonly histories = new Map<string, RatingSnapshot[]>();
  private readonly predictions: PredictionRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async appendEventSnapshots(eventId: string, snapshots: readonly RatingSnapshot[]): Promise<void> {
    const conflicts = snapshots
      .filter((snapshot) => this.histories.get(snapshot.entityKey)?.some((existing) => existing.eventId === eventId))
      .map((snapshot) => snapshot.entityKey);
    if (conflicts.length) {
      throw new SnapshotConflictError(`snapshots for event ${eventId} already stored`, {
        eventId,
        entityKeys: conflicts,
      });
    }

    const storedUntil = new Map<string, RatingSnapshot>();
    for (const snapshot of snapshots) {
      const last = this.histories.get(snapshot.entityKey)?.at(-1);
      if (last) storedUntil.set(snapshot.entityKey, last);
    }
    assertAppendable(eventId, snapshots, storedUntil);

    for (const snapshot of snapshots) {
      const history = this.histories.get(snapshot.entityKey);
      if (history) history.push(snapshot);
      else this.histories.set(snapshot.entityKey, [snapshot]);
    }
  }

  async findAsOf(entityKey: string, asOf: Date): Promise<RatingSnapshot | null> {
    const history = this.histories.get(entityKey);
    if (!history) return null;
    const idx = lastIndexBefore(history, asOf.getTime());
    return idx >= 0 ? history[idx] : null;
  }

  async listSnapshots(): Promise<RatingSnapshot[]> {
    return [...this.histories.values()]
      .flat()
      .sort((a, b) => a.effectiveAt.getTime() - b.effectiveAt.getTime() || a.sequence - b.sequence);
  }

  async listHistory(entityKey: string): Promise<RatingSnapshot[]> {
    return [...(this.histories.get(entityKey) ?? [])];
  }

  async savePredictions(rows: readonly PredictionRecord[]): Promise<void> {
    const createdAt = this.now();
    for (const row of rows) this.predictions.push({ ...row, createdAt: row.createdAt ?? createdAt });
  }

  async listPredictions(eventId: string): Promise<PredictionRecord[]> {
    return this.predictions.filter((row) => row.eventId === eventId);
  }
}
