#!/usr/bin/env node
// src/cli/scores.ts
import { Command } from 'commander';
import chalk from 'chalk';
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { createPdfToTextRunner } from '../parsers/PdfToTextRunner';
import { PopplerPageTextSource } from '../parsers/PopplerPageTextSource';
import { PopplerTableSource } from '../parsers/PopplerTableSource';
import { ScoreSheetParser } from '../parsers/ScoreSheetParser';
import { BatchIngestService, BatchSummary } from '../services/BatchIngestService';
import { CaptionWeightService } from '../services/CaptionWeightService';
import { buildShowReport } from '../services/ScoringService';
import { SeasonService } from '../services/SeasonService';
import { ShowIngestService } from '../services/ShowIngestService';
import { InMemoryScoreStore } from '../services/store/InMemoryScoreStore';
import { PgScoreStore } from '../services/store/PgScoreStore';
import { ScoreStore } from '../services/store/ScoreStore';
import { AppConfig } from '../types/config.types';
import { IngestResult } from '../types/score.types';
import { loadAppConfig, requireDatabaseUrl } from '../utils/config';
import { describeError } from '../utils/errors';
import { initializeLogger } from '../utils/log-config-loader';
import { Logger } from '../utils/logger';

dotenv.config();

const logger = new Logger('Scores-CLI');
const SCHEMA_FILE = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

interface GlobalOptions {
  config?: string;
}

interface IngestOptions {
  dryRun?: boolean;
}

const program = new Command();

program
  .name('scores')
  .description('Ingest percussion score sheet PDFs into the score database')
  .version('1.0.0')
  .option('-c, --config <path>', 'JSON configuration file');

function appConfig(): AppConfig {
  const config = loadAppConfig(process.env, program.opts<GlobalOptions>().config);
  initializeLogger({}, config.logLevel);
  return config;
}

function createParser(config: AppConfig): ScoreSheetParser {
  const run = createPdfToTextRunner(config.poppler);
  return new ScoreSheetParser(new PopplerPageTextSource(run), new PopplerTableSource(run, config.tables));
}

function openStore(config: AppConfig, dryRun = false): ScoreStore {
  if (dryRun) {
    logger.info(chalk.yellow('DRY RUN - writing to an in-memory store only'));
    return new InMemoryScoreStore();
  }
  return PgScoreStore.fromUrl(requireDatabaseUrl(config));
}

async function withStore<T>(store: ScoreStore, work: (store: ScoreStore) => Promise<T>): Promise<T> {
  try {
    return await work(store);
  } finally {
    await store.close();
  }
}

// Command-level failures set a non-zero exit code; per-file ingest failures do not
function command<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      logger.error(chalk.red(describeError(error)));
      process.exitCode = 1;
    }
  };
}

function printResult(result: IngestResult): void {
  console.log(
    chalk.green(`✓ ${result.sourceFile}`) +
      ` ${result.showName} (${result.showDate}, week ${result.week}): ` +
      `${result.performances} performance(s), ${result.captionScores} caption score(s)` +
      (result.droppedRows > 0 ? chalk.gray(`, ${result.droppedRows} row(s) dropped`) : '')
  );
}

function printSummary(summary: BatchSummary): void {
  summary.results.forEach(printResult);
  for (const failure of summary.failed) {
    console.log(chalk.red(`✗ ${failure.file}: ${failure.error}`));
  }
  const color = summary.failed.length > 0 ? chalk.yellow : chalk.green;
  console.log(color(`\n${summary.succeeded}/${summary.processed} file(s) ingested, ${summary.failed.length} failed`));
}

program
  .command('init-db')
  .description('Create the score tables if they do not exist')
  .action(
    command(async () => {
      const config = appConfig();
      const store = PgScoreStore.fromUrl(requireDatabaseUrl(config));
      await withStore(store, () => store.applySchema(fs.readFileSync(SCHEMA_FILE, 'utf-8')));
      console.log(chalk.green('Schema is up to date'));
    })
  );

program
  .command('ingest <dir>')
  .description('Ingest every .pdf score sheet in a directory, in name order')
  .option('-d, --dry-run', 'Parse and persist to an in-memory store only')
  .action(
    command(async (dir: string, options: IngestOptions) => {
      const config = appConfig();
      if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
        throw new Error(`Not a directory: ${dir}`);
      }
      const summary = await withStore(openStore(config, options.dryRun), (store) =>
        new BatchIngestService(new ShowIngestService(createParser(config), store)).ingestDirectory(dir)
      );
      printSummary(summary);
    })
  );

program
  .command('ingest-file <file>')
  .description('Ingest a single score sheet')
  .option('-d, --dry-run', 'Parse and persist to an in-memory store only')
  .action(
    command(async (file: string, options: IngestOptions) => {
      const config = appConfig();
      const result = await withStore(openStore(config, options.dryRun), (store) =>
        new ShowIngestService(createParser(config), store).ingestFile(file)
      );
      printResult(result);
    })
  );

program
  .command('seed-weights [file]')
  .description('Load per-season caption weights from JSON')
  .action(
    command(async (file: string | undefined) => {
      const config = appConfig();
      const source = file ?? config.captionWeightsFile;
      const written = await withStore(openStore(config), (store) =>
        new CaptionWeightService(store).seedFromFile(source)
      );
      console.log(chalk.green(`Wrote ${written} caption weight(s) from ${source}`));
    })
  );

program
  .command('weights <year>')
  .description('List the caption weights stored for a season')
  .action(
    command(async (year: string) => {
      if (!/^\d{4}$/.test(year)) {
        throw new Error(`Invalid season year: ${year}`);
      }
      const config = appConfig();
      const weights = await withStore(openStore(config), (store) =>
        new CaptionWeightService(store).weightsForYear(Number(year))
      );
      if (weights.size === 0) {
        console.log(chalk.yellow(`No caption weights stored for ${year}`));
        return;
      }
      console.table([...weights].map(([caption, weight]) => ({ Caption: caption, Weight: weight })));
    })
  );

program
  .command('report <sourceFile>')
  .description('Show the performances of one ingested score sheet with weighted scores')
  .action(
    command(async (sourceFile: string) => {
      const config = appConfig();
      const rows = await withStore(openStore(config), (store) =>
        store.transaction((tx) => buildShowReport(tx, path.basename(sourceFile)))
      );
      if (!rows) {
        throw new Error(`No show ingested from ${path.basename(sourceFile)}`);
      }
      console.table(
        rows.map((row) => ({
          Group: row.groupName,
          HomeCity: row.homeCity,
          Class: row.classification + (row.blockNumber !== null ? ` (${row.blockNumber})` : ''),
          Total: row.totalScore,
          Place: row.placement ?? '',
          Penalty: row.penalty,
          Weighted: Number(row.weightedScore.toFixed(3))
        }))
      );
    })
  );

program
  .command('renumber-weeks <year>')
  .description('Recompute the week number of every show in a season')
  .action(
    command(async (year: string) => {
      if (!/^\d{4}$/.test(year)) {
        throw new Error(`Invalid season year: ${year}`);
      }
      const config = appConfig();
      const result = await withStore(openStore(config), (store) =>
        new SeasonService(store).renumberWeeks(Number(year))
      );
      console.log(chalk.green(`Season ${result.year}: ${result.changed} of ${result.shows} show(s) renumbered`));
    })
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(chalk.red(describeError(error)));
  process.exitCode = 1;
});
