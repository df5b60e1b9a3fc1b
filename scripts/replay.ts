#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig } from '../src/config.js';
import { closePool } from '../src/db/client.js';
import { consoleLogger } from '../src/logger.js';
import { replayTimeline } from '../src/services/replay.js';
import type { ReplayReport } from '../src/services/replay.js';
import { getRepository } from '../src/store/index.js';
import { loadTimelineFile } from '../src/timeline/file.js';
import { EventTimeline } from '../src/timeline/timeline.js';

const formatNumber = (value: number) => value.toLocaleString('en-US', { maximumFractionDigits: 2 });

const printReport = (report: ReplayReport) => {
  if (!report.eventsProcessed) {
    console.log('No settled events to replay.');
    return;
  }
  console.log(
    `${report.dryRun ? 'Dry-run replay of' : 'Replayed'} ${formatNumber(report.eventsProcessed)} event(s), ${formatNumber(report.entitiesTouched)} entit(ies), ${formatNumber(report.snapshotsWritten)} snapshot(s) written, from=${report.replayFrom ?? 'n/a'} to=${report.replayTo ?? 'n/a'}`
  );
  if (report.pendingSkipped) {
    console.log(`Skipped ${formatNumber(report.pendingSkipped)} pending event(s).`);
  }
};

interface ReplayArgs {
  file: string;
  nonFinisher?: string;
  dryRun: boolean;
}

const runReplay = async (argv: ReplayArgs) => {
  const env: NodeJS.ProcessEnv = { ...process.env };
  if (argv.nonFinisher) env.RATING_NON_FINISHER = argv.nonFinisher;
  const config = loadConfig(env);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const timeline = new EventTimeline(await loadTimelineFile(argv.file));
  const report = await replayTimeline(timeline, config.rating, getRepository(), {
    dryRun: argv.dryRun,
    signal: controller.signal,
    logger: consoleLogger,
  });
  printReport(report);
};

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('replay')
    .command(
      '$0 <file>',
      'Rate a timeline file from scratch and persist every snapshot',
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
          .option('dry-run', {
            type: 'boolean',
            default: false,
            describe: 'Compute ratings without writing snapshots',
          }),
      (argv) => runReplay(argv)
    )
    .strict()
    .help()
    .parseAsync();
}

main()
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  })
  .finally(async () => {
    try {
      await closePool();
    } catch (err) {
      console.error('db_close_failed', err);
    }
  });
