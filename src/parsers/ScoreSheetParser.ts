// src/parsers/ScoreSheetParser.ts
import * as path from 'path';
import { CAPTION_COLUMNS, PENALTY_COLUMN_PATTERN, SUBTOTAL_SLUG, GROUP_COLUMN, HOME_CITY_COLUMN } from '../config/patterns';
import {
  CellValue,
  ClassificationBlock,
  FileNameIdentity,
  HeaderMeta,
  NormalizedTable,
  ParsedCaptionScore,
  ParsedPerformance,
  ParsedScoreSheet,
  RawTable,
  ShowIdentity,
  TableRow
} from '../types/score.types';
import { FormatError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { splitCaptionCells } from './CaptionCellSplitter';
import { splitClassification } from './ClassificationParser';
import { parseScoreSheetFileName } from './FileNameParser';
import { scanHeader, splitLocation } from './HeaderScanner';
import { PageTextSource, TableSource } from './interfaces/IDocumentSource';
import { isPerformanceCandidate, SUBTOTAL_TOTAL_COLUMN, validateRows } from './RowValidator';
import { normalizeTable } from './TableNormalizer';

const SUBTOTAL_PLACE_COLUMN = `${SUBTOTAL_SLUG}_place`;

export interface TablePerformances {
  performances: ParsedPerformance[];
  dropped: number;
}

/**
 * Read phase of ingestion: identity plus every valid performance row of a
 * document, with no persistence side effects.
 */
export class ScoreSheetParser {
  private logger = new Logger('ScoreSheetParser');

  constructor(
    private readonly pages: PageTextSource,
    private readonly tables: TableSource
  ) {}

  async parse(pdfPath: string): Promise<ParsedScoreSheet> {
    const sourceFile = path.basename(pdfPath);
    const pageCount = await this.pages.getPageCount(pdfPath);
    const pageTexts: string[] = [];
    for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
      pageTexts.push(await this.pages.getPageText(pdfPath, pageIndex));
    }

    const identity = resolveShowIdentity(scanHeader(pageTexts[0] ?? ''), sourceFile);
    this.logger.info(`${sourceFile}: ${identity.name} on ${identity.date} (${pageCount} page(s))`);

    const performances: ParsedPerformance[] = [];
    let tableCount = 0;
    let droppedRows = 0;

    for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
      const classification = splitClassification(scanHeader(pageTexts[pageIndex]).classificationText);
      const rawTables = await this.tables.extractTables(pdfPath, pageIndex);
      this.logger.debug(
        `Page ${pageIndex + 1}: ${rawTables.length} table(s), classification ${classification.name}` +
          (classification.block !== null ? ` block ${classification.block}` : '')
      );

      for (const raw of rawTables) {
        const result = tableToPerformances(raw, classification);
        performances.push(...result.performances);
        droppedRows += result.dropped;
        tableCount++;
      }
    }

    return { identity, performances, pageCount, tableCount, droppedRows };
  }
}

/**
 * Combine header metadata with the file name fallback. The header wins on
 * every field it supplies; the file name is parsed only when needed.
 */
export function resolveShowIdentity(header: HeaderMeta, sourceFile: string): ShowIdentity {
  let fromFileName: FileNameIdentity | undefined;
  let name = header.showName;
  let date = header.showDate;

  if (!name || !date) {
    fromFileName = parseScoreSheetFileName(sourceFile);
    name = name ?? fromFileName.showName;
    date = date ?? fromFileName.showDate;
  }

  let city: string | null = null;
  let state: string | null = null;
  const location = splitLocation(header.location);
  if (location) {
    ({ city, state } = location);
  } else {
    fromFileName = fromFileName ?? tryParseFileName(sourceFile);
    if (fromFileName) {
      city = fromFileName.city || null;
      state = fromFileName.state || null;
    }
  }

  return {
    name,
    date,
    hostName: hostNameOf(name),
    city,
    state,
    sourceFile
  };
}

/**
 * "Arcadia HS Saturday" -> "Arcadia HS"
 */
export function hostNameOf(showName: string): string {
  const trimmed = showName.trim();
  const lastSpace = trimmed.lastIndexOf(' ');
  return lastSpace === -1 ? trimmed : trimmed.slice(0, lastSpace);
}

/**
 * Normalize, filter and split one raw table into performances.
 * Identity checks run before the caption split, the total check after it.
 */
export function tableToPerformances(raw: RawTable, classification: ClassificationBlock): TablePerformances {
  const normalized = normalizeTable(raw);
  const candidates: NormalizedTable = {
    columns: normalized.columns,
    rows: normalized.rows.filter(isPerformanceCandidate)
  };
  const split = splitCaptionCells(candidates);
  const { kept } = validateRows(split.rows);
  const penaltyColumn = split.columns.find((column) => PENALTY_COLUMN_PATTERN.test(column));

  return {
    performances: kept.map((row) => toPerformance(row, classification, penaltyColumn)),
    dropped: normalized.rows.length - kept.length
  };
}

function toPerformance(
  row: TableRow,
  classification: ClassificationBlock,
  penaltyColumn: string | undefined
): ParsedPerformance {
  const captions: ParsedCaptionScore[] = [];
  for (const caption of CAPTION_COLUMNS) {
    if (!caption.scored) continue;
    const comp = row[`${caption.slug}_comp`];
    const perf = row[`${caption.slug}_perf`];
    const place = row[`${caption.slug}_place`];
    if (typeof comp !== 'number' || typeof perf !== 'number' || typeof place !== 'number') continue;
    captions.push({ caption: caption.name, compScore: comp, perfScore: perf, placement: place });
  }

  const placement = row[SUBTOTAL_PLACE_COLUMN];
  return {
    groupName: String(row[GROUP_COLUMN]).trim(),
    homeCity: String(row[HOME_CITY_COLUMN]).trim(),
    classification: classification.name,
    blockNumber: classification.block,
    totalScore: Number(row[SUBTOTAL_TOTAL_COLUMN]),
    placement: typeof placement === 'number' ? placement : null,
    penalty: penaltyColumn ? parsePenalty(row[penaltyColumn]) : 0,
    captions
  };
}

export function parsePenalty(value: CellValue | undefined): number {
  if (typeof value === 'number') return value;
  const text = (value ?? '').trim();
  return /^-?\d+(?:\.\d+)?$/.test(text) ? parseFloat(text) : 0;
}

function tryParseFileName(sourceFile: string): FileNameIdentity | undefined {
  try {
    return parseScoreSheetFileName(sourceFile);
  } catch (error) {
    if (error instanceof FormatError) return undefined;
    throw error;
  }
}
