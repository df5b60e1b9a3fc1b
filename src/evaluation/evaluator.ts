import { TemporalLeakError, isFatalTemporalError } from '../errors.js';
import { RatingEngine } from '../engine/rating.js';
import type { RaceEvent, RatingConfig } from '../engine/types.js';
import { FeatureAssembler, assertNoLeak } from '../features/assembler.js';
import type { FeatureSpec } from '../features/assembler.js';
import { consoleLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { RaceProbabilityModel } from '../model/race-model.js';
import type { FitSummary, ModelOptions, TrainingRace } from '../model/race-model.js';
import type { ModelVariant } from '../model/likelihood.js';
import type { NumericalIssue } from '../model/softmax.js';
import { compareEvents } from '../timeline/timeline.js';
import { finishOrderOf, winnerIndexOf } from '../timeline/validation.js';
import type { Fold, WindowRange } from './folds.js';
import { windowRange } from './folds.js';
import { MetricAccumulator } from './metrics.js';
import type { MetricSummary } from './metrics.js';

export type EvaluatorState = 'idle' | 'training' | 'scoring' | 'aggregating' | 'complete' | 'aborted';

export interface PredictionRow {
  fold: number;
  eventId: string;
  entrantId: string;
  competitorId: string;
  probability: number;
  marketPrice: number | null;
}

export interface FoldReport {
  fold: number;
  status: 'scored' | 'skipped';
  trainEvents: number;
  testEvents: number;
  scoredEvents: number;
  trainRange: WindowRange | null;
  testRange: WindowRange | null;
  skipReason?: string;
  fit?: FitSummary;
  metrics?: MetricSummary;
}

export interface EvaluationReport {
  status: 'complete';
  variant: ModelVariant;
  aggregate: MetricSummary;
  folds: FoldReport[];
  skippedFolds: Array<{ fold: number; reason: string }>;
  numericalIssues: NumericalIssue[];
  predictions: PredictionRow[];
}

export interface EvaluatorOptions {
  rating: RatingConfig;
  features: FeatureSpec;
  model: ModelOptions;
  calibrationBins?: number;
  probabilityFloor?: number;
  logger?: Logger;
}

/** Throws unless every training event starts strictly before the first test event. */
export function assertFoldOrdering(fold: Fold): void {
  if (!fold.train.length || !fold.test.length) return;
  const latestTrain = fold.train.reduce((a, b) => (compareEvents(a, b) >= 0 ? a : b));
  const earliestTest = fold.test.reduce((a, b) => (compareEvents(a, b) <= 0 ? a : b));
  if (latestTrain.startsAt.getTime() >= earliestTest.startsAt.getTime()) {
    throw new TemporalLeakError(
      `fold ${fold.index} trains on ${latestTrain.eventId} at ${latestTrain.startsAt.toISOString()}, not before test event ${earliestTest.eventId} at ${earliestTest.startsAt.toISOString()}`,
      {
        fold: fold.index,
        eventId: latestTrain.eventId,
        eventStartsAt: earliestTest.startsAt.toISOString(),
        observedAt: latestTrain.startsAt.toISOString(),
      }
    );
  }
}

/**
 * Forward-chaining backtest. Each fold re-derives ratings from its own training events, fits a
 * fresh model, then scores the test window against ratings frozen at the fold boundary.
 */
export class ForwardChainingEvaluator {
  private currentState: EvaluatorState = 'idle';
  private readonly engine: RatingEngine;
  private readonly logger: Logger;

  constructor(private readonly options: EvaluatorOptions) {
    this.engine = new RatingEngine(options.rating);
    this.logger = options.logger ?? consoleLogger;
  }

  get state(): EvaluatorState {
    return this.currentState;
  }

  run(folds: readonly Fold[], options: { signal?: AbortSignal } = {}): EvaluationReport {
    const aggregate = this.createAccumulator();
    const foldReports: FoldReport[] = [];
    const skippedFolds: EvaluationReport['skippedFolds'] = [];
    const numericalIssues: NumericalIssue[] = [];
    const predictions: PredictionRow[] = [];
    const variant = new RaceProbabilityModel(this.options.model).variant;

    try {
      for (const fold of folds) {
        this.currentState = 'idle';
        options.signal?.throwIfAborted();
        assertFoldOrdering(fold);

        const base = {
          fold: fold.index,
          trainEvents: fold.train.length,
          testEvents: fold.test.length,
          trainRange: windowRange(fold.train),
          testRange: windowRange(fold.test),
        };

        const train = [...fold.train].filter((event) => event.status === 'settled').sort(compareEvents);
        if (!train.length) {
          this.skip(fold, 'empty_train_window', base, foldReports, skippedFolds);
          continue;
        }

        this.transition('training', fold);
        const store = this.engine.createStore();
        const assembler = new FeatureAssembler(store, this.options.features, this.options.rating.partition, {
          strict: true,
        });
        const races: TrainingRace[] = [];
        for (const event of train) {
          options.signal?.throwIfAborted();
          const features = assembler.featuresFor(event);
          assertNoLeak(features, fold.index);
          races.push({ ...features, finishOrder: finishOrderOf(event) });
          this.engine.apply(store, event);
        }

        const model = new RaceProbabilityModel(this.options.model);
        const fit = model.fit(races);
        if (fit.usableRaces === 0) {
          this.skip(fold, 'no_usable_training_races', base, foldReports, skippedFolds);
          continue;
        }

        this.transition('scoring', fold);
        const scored: Array<{ event: RaceEvent; probabilities: number[] }> = [];
        for (const event of [...fold.test].sort(compareEvents)) {
          options.signal?.throwIfAborted();
          const last = store.lastCommit;
          if (last && last.startsAt.getTime() >= event.startsAt.getTime()) {
            throw new TemporalLeakError(
              `ratings for fold ${fold.index} include event ${last.eventId}, not before test event ${event.eventId}`,
              {
                fold: fold.index,
                eventId: event.eventId,
                eventStartsAt: event.startsAt.toISOString(),
                observedAt: last.startsAt.toISOString(),
              }
            );
          }
          const features = assembler.featuresFor(event);
          assertNoLeak(features, fold.index);
          const assignment = model.predict(features);
          numericalIssues.push(...assignment.issues);
          assignment.entries.forEach((entry, i) => {
            predictions.push({
              fold: fold.index,
              eventId: event.eventId,
              entrantId: entry.entrantId,
              competitorId: entry.competitorId,
              probability: entry.probability,
              marketPrice: event.entrants[i].marketPrice ?? null,
            });
          });
          scored.push({ event, probabilities: assignment.entries.map((entry) => entry.probability) });
        }

        this.transition('aggregating', fold);
        const metrics = this.createAccumulator();
        for (const { event, probabilities } of scored) {
          const winner = winnerIndexOf(event);
          if (winner === null) continue;
          const { clipped } = metrics.add(probabilities, winner);
          if (clipped) {
            numericalIssues.push({
              eventId: event.eventId,
              kind: 'probability_clipped',
              detail: `winner probability ${probabilities[winner]} floored for log-loss`,
            });
          }
        }
        aggregate.merge(metrics);

        const summary = metrics.summary();
        foldReports.push({ ...base, status: 'scored', scoredEvents: scored.length, fit, metrics: summary });
        this.logger.info('fold_scored', {
          fold: fold.index,
          trainEvents: train.length,
          scoredEvents: scored.length,
          logLoss: summary.logLoss,
          brier: summary.brier,
        });
      }
    } catch (err) {
      this.currentState = 'aborted';
      if (isFatalTemporalError(err)) {
        this.logger.error('evaluation_aborted', { name: err.name, message: err.message, context: err.context });
      }
      throw err;
    }

    this.currentState = 'complete';
    if (numericalIssues.length) {
      this.logger.warn('numerical_issues_recovered', { count: numericalIssues.length });
    }

    return {
      status: 'complete',
      variant,
      aggregate: aggregate.summary(),
      folds: foldReports,
      skippedFolds,
      numericalIssues,
      predictions,
    };
  }

  private createAccumulator() {
    return new MetricAccumulator(this.options.calibrationBins, this.options.probabilityFloor);
  }

  private transition(next: EvaluatorState, fold: Fold) {
    this.currentState = next;
    this.logger.info('fold_state', { fold: fold.index, state: next });
  }

  private skip(
    fold: Fold,
    reason: string,
    base: Omit<FoldReport, 'status' | 'scoredEvents'>,
    reports: FoldReport[],
    skipped: EvaluationReport['skippedFolds']
  ) {
    this.logger.warn('fold_skipped', { fold: fold.index, reason, testEvents: fold.test.length });
    reports.push({ ...base, status: 'skipped', scoredEvents: 0, skipReason: reason });
    skipped.push({ fold: fold.index, reason });
  }
}
