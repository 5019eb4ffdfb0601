// src/parsers/RowValidator.ts
import { GROUP_COLUMN, HOME_CITY_COLUMN, SUBTOTAL_SLUG } from '../config/patterns';
import { CellValue, TableRow } from '../types/score.types';

export const SUBTOTAL_TOTAL_COLUMN = `${SUBTOTAL_SLUG}_total`;

/**
 * Group and HomeCity present, and Group is not a repeated "Group" header cell.
 */
export function isPerformanceCandidate(row: TableRow): boolean {
  const group = textOf(row[GROUP_COLUMN]);
  const homeCity = textOf(row[HOME_CITY_COLUMN]);
  if (!group || !homeCity) return false;
  return group.toLowerCase() !== 'group';
}

export function hasPositiveTotal(row: TableRow): boolean {
  const total = row[SUBTOTAL_TOTAL_COLUMN];
  return typeof total === 'number' && Number.isFinite(total) && total > 0;
}

export interface RowValidation {
  kept: TableRow[];
  dropped: number;
}

export function validateRows(rows: TableRow[]): RowValidation {
  const kept = rows.filter((row) => isPerformanceCandidate(row) && hasPositiveTotal(row));
  return { kept, dropped: rows.length - kept.length };
}

function textOf(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}
