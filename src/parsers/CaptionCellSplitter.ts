// src/parsers/CaptionCellSplitter.ts
import { CAPTION_COLUMNS } from '../config/patterns';
import { CaptionCellParts, CellValue, NormalizedTable, TableRow } from '../types/score.types';
import { ParseError } from '../utils/errors';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;
const INTEGER_PATTERN = /^-?\d+$/;

const PART_SUFFIXES = ['comp', 'perf', 'total', 'place'] as const;

/**
 * Decompose a composite score cell: competition score, performance score,
 * total and placement, one per line. Lines after the fourth are ignored.
 */
export function splitCaptionCell(text: string): CaptionCellParts {
  const lines = text.split('\n').map((line) => line.trim());
  if (lines.length < 4) {
    throw new ParseError(`Expected 4 lines in score cell, found ${lines.length}`, { cell: text });
  }

  return {
    comp: parseDecimal(lines[0], text),
    perf: parseDecimal(lines[1], text),
    total: parseDecimal(lines[2], text),
    place: parseInteger(lines[3], text)
  };
}

/**
 * Inverse of splitCaptionCell.
 */
export function joinCaptionCell(parts: CaptionCellParts): string {
  return [formatDecimal(parts.comp), formatDecimal(parts.perf), formatDecimal(parts.total), String(parts.place)].join(
    '\n'
  );
}

/**
 * Replace every recognized composite caption column with its four typed
 * sub-columns (<slug>_comp, <slug>_perf, <slug>_total, <slug>_place), in place.
 * Blank cells carry no score and yield null sub-fields.
 */
export function splitCaptionCells(table: NormalizedTable): NormalizedTable {
  const present = CAPTION_COLUMNS.filter((caption) => table.columns.includes(caption.name));
  if (present.length === 0) return table;

  const columns = table.columns.flatMap((column) => {
    const caption = present.find((candidate) => candidate.name === column);
    return caption ? PART_SUFFIXES.map((suffix) => `${caption.slug}_${suffix}`) : [column];
  });

  const rows = table.rows.map((row) => {
    const split: TableRow = {};
    for (const column of table.columns) {
      const caption = present.find((candidate) => candidate.name === column);
      if (!caption) {
        split[column] = row[column] ?? null;
        continue;
      }
      const parts = splitOptionalCell(row[column]);
      for (const suffix of PART_SUFFIXES) {
        split[`${caption.slug}_${suffix}`] = parts ? parts[suffix] : null;
      }
    }
    return split;
  });

  return { columns, rows };
}

function splitOptionalCell(value: CellValue | undefined): CaptionCellParts | null {
  if (value === null || value === undefined) return null;
  const text = String(value);
  if (text.trim() === '') return null;
  return splitCaptionCell(text);
}

function parseDecimal(value: string, cell: string): number {
  if (!DECIMAL_PATTERN.test(value)) {
    throw new ParseError(`Non-numeric score value "${value}"`, { cell });
  }
  return parseFloat(value);
}

function parseInteger(value: string, cell: string): number {
  if (!INTEGER_PATTERN.test(value)) {
    throw new ParseError(`Non-integer placement "${value}"`, { cell });
  }
  return parseInt(value, 10);
}

function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
