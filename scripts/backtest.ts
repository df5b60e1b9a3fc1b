#!/usr/bin/env tsx
import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig } from '../src/config.js';
import { runBacktest } from '../src/evaluation/backtest.js';
import type { EvaluationReport } from '../src/evaluation/evaluator.js';
import { consoleLogger } from '../src/logger.js';
import { loadTimelineFile } from '../src/timeline/file.js';

const formatMetric = (value: number | null) => (value === null ? 'n/a' : value.toFixed(4));

const printReport = (report: EvaluationReport) => {
  const { aggregate } = report;
  console.log(
    `Backtest (${report.variant}): ${aggregate.events} scored event(s) across ${report.folds.length} fold(s), ${report.skippedFolds.length} skipped.`
  );
  console.log(
    `log-loss=${formatMetric(aggregate.logLoss)} brier=${formatMetric(aggregate.brier)} top-pick=${formatMetric(aggregate.topPickHitRate)}`
  );

  for (const fold of report.folds) {
    if (fold.status === 'skipped') {
      console.log(`- fold ${fold.fold} :: skipped (${fold.skipReason ?? 'unknown'}) test=${fold.testEvents}`);
      continue;
    }
    console.log(
      `- fold ${fold.fold} :: train=${fold.trainEvents} test=${fold.testEvents} scored=${fold.scoredEvents} log-loss=${formatMetric(fold.metrics?.logLoss ?? null)} from=${fold.testRange?.from ?? 'n/a'} to=${fold.testRange?.to ?? 'n/a'}`
    );
  }

  if (report.numericalIssues.length) {
    console.warn(`Recovered ${report.numericalIssues.length} numerical issue(s).`);
  }
};

interface BacktestArgs {
  file: string;
  nonFinisher?: string;
  variant?: 'winner-softmax' | 'plackett-luce';
  warmup?: number;
  foldSize?: number;
  maxTrain?: number;
  output?: string;
}

const runBacktestCommand = async (argv: BacktestArgs) => {
  const env: NodeJS.ProcessEnv = { ...process.env };
  if (argv.nonFinisher) env.RATING_NON_FINISHER = argv.nonFinisher;
  if (argv.variant) env.MODEL_VARIANT = argv.variant;
  if (argv.warmup !== undefined) env.EVAL_WARMUP_EVENTS = String(argv.warmup);
  if (argv.foldSize !== undefined) env.EVAL_FOLD_SIZE = String(argv.foldSize);
  if (argv.maxTrain !== undefined) env.EVAL_MAX_TRAIN_EVENTS = String(argv.maxTrain);
  const config = loadConfig(env);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const events = await loadTimelineFile(argv.file);
  const report = runBacktest(events, config, { signal: controller.signal, logger: consoleLogger });
  printReport(report);

  if (argv.output) {
    await writeFile(argv.output, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    console.log(`Report written to ${argv.output}`);
  }
};

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('backtest')
    .command(
      '$0 <file>',
      'Run a forward-chaining backtest over a timeline file',
      (cmd) =>
        cmd
          .positional('file', {
            type: 'string',
            describe: 'Path to a JSON timeline ({ "events": [...] })',
            demandOption: true,
          })
          .option('non-finisher', {
            type: 'string',
            describe: 'Non-finisher policy: "last-place" or a performance in [0, 1] (overrides RATING_NON_FINISHER)',
          })
          .option('variant', {
            choices: ['winner-softmax', 'plackett-luce'] as const,
            describe: 'Likelihood used to fit the model',
          })
          .option('warmup', {
            type: 'number',
            describe: 'Leading events used only as training history',
          })
          .option('fold-size', {
            type: 'number',
            describe: 'Events per test window',
          })
          .option('max-train', {
            type: 'number',
            describe: 'Rolling training window (most recent N events)',
          })
          .option('output', {
            type: 'string',
            describe: 'Write the full JSON report to this path',
          }),
      (argv) => runBacktestCommand(argv)
    )
    .strict()
    .help()
    .parseAsync();
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
