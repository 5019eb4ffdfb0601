// src/parsers/PdfToTextRunner.ts
import * as path from 'path';
import { spawn } from 'child_process';
import { PopplerConfig } from '../types/config.types';
import { logger } from '../utils/logger';

export interface PdfTextExtractOptions {
  layout?: boolean;
  tsv?: boolean;
  // First and last page, 1-based
  f?: number;
  l?: number;
}

export type PdfToTextRunner = (pdfPath: string, options: PdfTextExtractOptions) => Promise<string>;

export function buildPdfToTextArgs(pdfPath: string, options: PdfTextExtractOptions): string[] {
  const args: string[] = [];
  if (options.layout) args.push('-layout');
  if (options.tsv) args.push('-tsv');
  if (options.f !== undefined) args.push('-f', options.f.toString());
  if (options.l !== undefined) args.push('-l', options.l.toString());

  // Input file and - for stdout
  args.push(pdfPath, '-');
  return args;
}

/**
 * Create a runner that invokes poppler's pdftotext and resolves with stdout.
 */
export function createPdfToTextRunner(config: PopplerConfig = {}): PdfToTextRunner {
  const executable = config.popplerPath ? path.join(config.popplerPath, 'pdftotext') : 'pdftotext';

  return (pdfPath, options) =>
    new Promise((resolve, reject) => {
      const args = buildPdfToTextArgs(pdfPath, options);
      logger.debug(`Executing: ${executable} ${args.join(' ')}`);

      const pdftotext = spawn(executable, args);
      let output = '';
      let error = '';

      pdftotext.stdout.on('data', (data: Buffer) => {
        output += data.toString();
      });

      pdftotext.stderr.on('data', (data: Buffer) => {
        error += data.toString();
      });

      pdftotext.on('close', (code: number | null) => {
        if (code !== 0) {
          reject(new Error(`pdftotext exited with code ${code}: ${error.trim()}`));
        } else {
          resolve(output);
        }
      });

      pdftotext.on('error', (err: Error) => {
        reject(new Error(`Failed to spawn pdftotext: ${err.message}`));
      });
    });
}
