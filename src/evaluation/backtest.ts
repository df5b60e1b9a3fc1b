import type { EngineConfig } from '../config.js';
import type { RaceEvent } from '../engine/types.js';
import type { Logger } from '../logger.js';
import { EventTimeline } from '../timeline/timeline.js';
import { ForwardChainingEvaluator } from './evaluator.js';
import type { EvaluationReport } from './evaluator.js';
import { buildFolds } from './folds.js';

export interface BacktestOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export function runBacktest(
  events: readonly RaceEvent[],
  config: EngineConfig,
  options: BacktestOptions = {}
): EvaluationReport {
  const timeline = new EventTimeline(events);
  const folds = buildFolds(timeline, config.evaluation);
  options.logger?.info('backtest_started', {
    events: timeline.size,
    settled: timeline.settledEvents().length,
    folds: folds.length,
  });

  const evaluator = new ForwardChainingEvaluator({
    rating: config.rating,
    features: config.features,
    model: config.model,
    calibrationBins: config.evaluation.calibrationBins,
    probabilityFloor: config.evaluation.probabilityFloor,
    logger: options.logger,
  });
  return evaluator.run(folds, { signal: options.signal });
}
