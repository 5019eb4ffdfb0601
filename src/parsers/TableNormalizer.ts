// src/parsers/TableNormalizer.ts
import { BLANK_COLUMN, GROUP_COLUMN, HOME_CITY_COLUMN } from '../config/patterns';
import { CellText, NormalizedTable, RawTable, TableRow } from '../types/score.types';
import { StructureError } from '../utils/errors';

/**
 * Flatten a raw grid whose first two rows form a split header
 * (caption group over sub-metric) into uniquely named columns.
 *
 * - merged name = row0 + " " + row1 (trimmed), "BLANK" when empty
 * - repeats get _1, _2, ... in first-seen order
 * - columns 0 and 1 are always Group and HomeCity
 */
export function normalizeTable(raw: RawTable): NormalizedTable {
  if (raw.length < 2) {
    throw new StructureError(`Table has ${raw.length} row(s); two header rows are required`, { rows: raw.length });
  }

  const [header1, header2, ...body] = raw;
  if (header1.length !== header2.length) {
    throw new StructureError(
      `Header rows differ in length (${header1.length} vs ${header2.length})`,
      { header1: header1.length, header2: header2.length }
    );
  }
  if (header1.length < 2) {
    throw new StructureError(`Table has ${header1.length} column(s); Group and HomeCity are required`, {
      columns: header1.length
    });
  }

  const columns = dedupeColumnNames(header1.map((cell, index) => mergeHeaderCells(cell, header2[index])));
  columns[0] = GROUP_COLUMN;
  columns[1] = HOME_CITY_COLUMN;

  const rows = body.map((cells) => {
    const row: TableRow = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? null;
    });
    return row;
  });

  return { columns, rows };
}

export function mergeHeaderCells(top: CellText, bottom: CellText): string {
  const merged = [top, bottom]
    .map((cell) => (cell ?? '').trim())
    .filter((part) => part.length > 0)
    .join(' ');
  return merged || BLANK_COLUMN;
}

export function dedupeColumnNames(names: string[]): string[] {
  const counts = new Map<string, number>();
  return names.map((name) => {
    const seen = counts.get(name);
    if (seen === undefined) {
      counts.set(name, 0);
      return name;
    }
    counts.set(name, seen + 1);
    return `${name}_${seen + 1}`;
  });
}
