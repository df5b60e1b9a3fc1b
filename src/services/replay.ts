import type { RatingConfig } from '../engine/types.js';
import { RatingEngine } from '../engine/rating.js';
import { consoleLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { SnapshotRepository } from '../store/repository.js';
import type { EventTimeline } from '../timeline/timeline.js';

export interface ReplayReport {
  dryRun: boolean;
  eventsProcessed: number;
  pendingSkipped: number;
  snapshotsWritten: number;
  entitiesTouched: number;
  replayFrom: string | null;
  replayTo: string | null;
}

export interface ReplayOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Rates every settled event of a timeline from scratch and appends each event's snapshots to the
 * repository in one call. A dry run computes the same report without writing.
 */
export async function replayTimeline(
  timeline: EventTimeline,
  rating: RatingConfig,
  repository: SnapshotRepository,
  options: ReplayOptions = {}
): Promise<ReplayReport> {
  const logger = options.logger ?? consoleLogger;
  const dryRun = options.dryRun ?? false;
  const engine = new RatingEngine(rating);
  const store = engine.createStore();

  let eventsProcessed = 0;
  let snapshotsWritten = 0;
  let replayFrom: string | null = null;
  let replayTo: string | null = null;

  for (const event of timeline.settledEvents()) {
    options.signal?.throwIfAborted();
    const { commit } = engine.prepare(store, event);
    if (!dryRun) {
      await repository.appendEventSnapshots(event.eventId, commit.snapshots);
      snapshotsWritten += commit.snapshots.length;
    }
    store.append(commit);
    eventsProcessed += 1;
    replayFrom ??= event.startsAt.toISOString();
    replayTo = event.startsAt.toISOString();
  }

  const report: ReplayReport = {
    dryRun,
    eventsProcessed,
    pendingSkipped: timeline.size - eventsProcessed,
    snapshotsWritten,
    entitiesTouched: store.entityKeys().length,
    replayFrom,
    replayTo,
  };
  logger.info('replay_complete', report);
  return report;
}
