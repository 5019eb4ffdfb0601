// src/parsers/PopplerTableSource.ts
import { TableExtractionConfig, TableExtractionStrategy } from '../types/config.types';
import { RawTable } from '../types/score.types';
import { Logger } from '../utils/logger';
import { TableSource } from './interfaces/IDocumentSource';
import { PdfToTextRunner } from './PdfToTextRunner';
import { buildTableGrid, parseTsvWords, WordBox } from './WordGridBuilder';

export const DEFAULT_TABLE_EXTRACTION: TableExtractionConfig = {
  primary: { name: 'tight', rowTolerance: 2, edgeTolerance: 3 },
  fallback: { name: 'loose', rowTolerance: 10, edgeTolerance: 8 },
  minColumns: 3,
  minRows: 3
};

/**
 * Tables from pdftotext word boxes. The primary strategy runs first; the
 * looser fallback only when the primary finds nothing on the page.
 */
export class PopplerTableSource implements TableSource {
  private logger = new Logger('PopplerTableSource');

  constructor(
    private readonly run: PdfToTextRunner,
    private readonly config: TableExtractionConfig = DEFAULT_TABLE_EXTRACTION
  ) {}

  async extractTables(pdfPath: string, pageIndex: number): Promise<RawTable[]> {
    const page = pageIndex + 1;
    const words = parseTsvWords(await this.run(pdfPath, { tsv: true, f: page, l: page }));

    const primary = this.tryStrategy(words, this.config.primary);
    if (primary.length > 0) return primary;

    this.logger.debug(`No table on page ${page} with ${this.config.primary.name}; trying ${this.config.fallback.name}`);
    return this.tryStrategy(words, this.config.fallback);
  }

  private tryStrategy(words: WordBox[], strategy: TableExtractionStrategy): RawTable[] {
    const grid = buildTableGrid(words, strategy, this.config);
    return grid ? [grid] : [];
  }
}
