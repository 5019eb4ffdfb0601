// src/services/BatchIngestService.ts
import * as fs from 'fs';
import * as path from 'path';
import { IngestResult } from '../types/score.types';
import { describeError } from '../utils/errors';
import { Logger } from '../utils/logger';

export interface DocumentIngester {
  ingestFile(pdfPath: string): Promise<IngestResult>;
}

export interface BatchFailure {
  file: string;
  error: string;
}

export interface BatchSummary {
  processed: number;
  succeeded: number;
  failed: BatchFailure[];
  results: IngestResult[];
}

export function listScoreSheets(directory: string): string[] {
  return fs
    .readdirSync(directory)
    .filter((name) => path.extname(name).toLowerCase() === '.pdf')
    .sort();
}

/**
 * Runs every score sheet in a directory through the ingester, in sorted name
 * order and one at a time. A failing document is logged and skipped.
 */
export class BatchIngestService {
  private logger = new Logger('BatchIngestService');

  constructor(private readonly ingester: DocumentIngester) {}

  async ingestDirectory(directory: string): Promise<BatchSummary> {
    const files = listScoreSheets(directory);
    this.logger.info(`Found ${files.length} score sheet(s) in ${directory}`);

    const summary: BatchSummary = { processed: 0, succeeded: 0, failed: [], results: [] };
    for (const file of files) {
      summary.processed++;
      try {
        summary.results.push(await this.ingester.ingestFile(path.join(directory, file)));
        summary.succeeded++;
      } catch (error) {
        const message = describeError(error);
        this.logger.error(`${file}: ${message}`);
        summary.failed.push({ file, error: message });
      }
    }

    this.logger.info(
      `Batch complete: ${summary.succeeded}/${summary.processed} succeeded, ${summary.failed.length} failed`
    );
    return summary;
  }
}
