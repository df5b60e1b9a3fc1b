import type { RaceEvent } from '../engine/types.js';
import type { EventTimeline } from '../timeline/timeline.js';

export interface FoldOptions {
  /** Leading events that only ever serve as training history. */
  warmupEvents: number;
  foldSize: number;
  /** Keep only the most recent N training events (rolling window). */
  maxTrainEvents?: number;
}

export interface Fold {
  index: number;
  train: RaceEvent[];
  test: RaceEvent[];
}

export interface WindowRange {
  from: string;
  to: string;
}

export const windowRange = (events: readonly RaceEvent[]): WindowRange | null => {
  if (!events.length) return null;
  let min = events[0].startsAt;
  let max = events[0].startsAt;
  for (const event of events) {
    if (event.startsAt < min) min = event.startsAt;
    if (event.startsAt > max) max = event.startsAt;
  }
  return { from: min.toISOString(), to: max.toISOString() };
};

/**
 * Consecutive test windows after the warm-up region. Each window trains on settled events that
 * start strictly before its first event, so same-timestamp neighbours never leak across.
 */
export function buildFolds(timeline: EventTimeline, options: FoldOptions): Fold[] {
  if (!Number.isInteger(options.foldSize) || options.foldSize < 1) {
    throw new RangeError(`fold size must be a positive integer, got ${options.foldSize}`);
  }
  const events = timeline.events();
  const folds: Fold[] = [];

  for (let start = Math.max(0, options.warmupEvents); start < events.length; start += options.foldSize) {
    const test = events.slice(start, start + options.foldSize);
    let train = timeline.eventsBefore(test[0].startsAt).filter((event) => event.status === 'settled');
    if (options.maxTrainEvents !== undefined && train.length > options.maxTrainEvents) {
      train = train.slice(train.length - options.maxTrainEvents);
    }
    folds.push({ index: folds.length + 1, train, test });
  }

  return folds;
}
