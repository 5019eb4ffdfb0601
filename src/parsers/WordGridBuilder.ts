// src/parsers/WordGridBuilder.ts
import { TableExtractionStrategy } from '../types/config.types';
import { RawTable } from '../types/score.types';

export interface WordBox {
  text: string;
  left: number;
  top: number;
  width: number;
  height: number;
}

interface Phrase {
  text: string;
  left: number;
  right: number;
}

interface TextLine {
  center: number;
  phrases: Phrase[];
}

interface ColumnSpan {
  left: number;
  right: number;
}

export interface GridLimits {
  minColumns: number;
  minRows: number;
}

// pdftotext -tsv level for individual words
const WORD_LEVEL = 5;

// Words closer than this fraction of their height belong to one phrase
const PHRASE_GAP_RATIO = 0.6;

/**
 * Parse `pdftotext -tsv` output into word boxes, skipping page/block/line markers.
 */
export function parseTsvWords(tsv: string): WordBox[] {
  const lines = tsv.split(/\r?\n/).filter((line) => line.length > 0);
  if (lines.length === 0) return [];

  const header = lines[0].split('\t');
  const col = (name: string) => header.indexOf(name);
  const levelIdx = col('level');
  const leftIdx = col('left');
  const topIdx = col('top');
  const widthIdx = col('width');
  const heightIdx = col('height');
  const textIdx = col('text');
  if ([levelIdx, leftIdx, topIdx, widthIdx, heightIdx, textIdx].some((idx) => idx === -1)) {
    return [];
  }

  const words: WordBox[] = [];
  for (const line of lines.slice(1)) {
    const fields = line.split('\t');
    if (Number(fields[levelIdx]) !== WORD_LEVEL) continue;
    const text = (fields[textIdx] ?? '').trim();
    if (!text) continue;
    words.push({
      text,
      left: Number(fields[leftIdx]),
      top: Number(fields[topIdx]),
      width: Number(fields[widthIdx]),
      height: Number(fields[heightIdx])
    });
  }
  return words;
}

/**
 * Reconstruct one table from positioned words.
 *
 * Lines carrying at least `minColumns` separated phrases bound the table.
 * The first two table lines are the split header; after that a line with
 * text in the first column starts a row, and other lines continue the cells
 * of the row above (joined by newlines). Returns null when no table fits.
 */
export function buildTableGrid(
  words: WordBox[],
  strategy: TableExtractionStrategy,
  limits: GridLimits
): RawTable | null {
  const lines = groupLines(words, strategy.rowTolerance);

  const isTableLine = (line: TextLine) => line.phrases.length >= limits.minColumns;
  const first = lines.findIndex(isTableLine);
  if (first === -1) return null;
  let last = first;
  lines.forEach((line, index) => {
    if (isTableLine(line)) last = index;
  });

  const columns = detectColumns(lines.slice(first, last + 1), strategy.edgeTolerance);
  if (columns.length < limits.minColumns) return null;

  // Trailing lines of the last row carry no first-column text
  while (last + 1 < lines.length && continuesRow(lines[last + 1], columns)) {
    last++;
  }
  const region = lines.slice(first, last + 1);

  const grid: RawTable = [];
  region.forEach((line, index) => {
    const cells = assignCells(line, columns);
    const startsRow = index < 2 || cells[0] !== null || grid.length < 3;
    if (startsRow) {
      grid.push(cells);
      return;
    }
    const current = grid[grid.length - 1];
    cells.forEach((cell, col) => {
      if (cell === null) return;
      const existing = current[col];
      current[col] = existing === null ? cell : `${existing}\n${cell}`;
    });
  });

  return grid.length >= limits.minRows ? grid : null;
}

function groupLines(words: WordBox[], rowTolerance: number): TextLine[] {
  const sorted = [...words].sort((a, b) => centerOf(a) - centerOf(b) || a.left - b.left);
  const grouped: WordBox[][] = [];
  let currentCenter = Number.NEGATIVE_INFINITY;

  for (const word of sorted) {
    const center = centerOf(word);
    if (grouped.length > 0 && Math.abs(center - currentCenter) <= rowTolerance) {
      grouped[grouped.length - 1].push(word);
    } else {
      grouped.push([word]);
      currentCenter = center;
    }
  }

  return grouped.map((lineWords) => ({
    center: centerOf(lineWords[0]),
    phrases: toPhrases(lineWords.sort((a, b) => a.left - b.left))
  }));
}

function toPhrases(words: WordBox[]): Phrase[] {
  const phrases: Phrase[] = [];
  for (const word of words) {
    const right = word.left + word.width;
    const previous = phrases[phrases.length - 1];
    if (previous && word.left - previous.right <= word.height * PHRASE_GAP_RATIO) {
      previous.text = `${previous.text} ${word.text}`;
      previous.right = Math.max(previous.right, right);
    } else {
      phrases.push({ text: word.text, left: word.left, right });
    }
  }
  return phrases;
}

function detectColumns(lines: TextLine[], edgeTolerance: number): ColumnSpan[] {
  const spans = lines
    .flatMap((line) => line.phrases.map((phrase) => ({ left: phrase.left, right: phrase.right })))
    .sort((a, b) => a.left - b.left);

  const columns: ColumnSpan[] = [];
  for (const span of spans) {
    const current = columns[columns.length - 1];
    if (current && span.left <= current.right + edgeTolerance) {
      current.right = Math.max(current.right, span.right);
    } else {
      columns.push({ ...span });
    }
  }
  return columns;
}

function nearestColumn(phrase: Phrase, columns: ColumnSpan[]): { index: number; distance: number } {
  const middle = (phrase.left + phrase.right) / 2;
  let index = 0;
  let distance = Number.POSITIVE_INFINITY;
  columns.forEach((column, candidate) => {
    const d = middle < column.left ? column.left - middle : middle > column.right ? middle - column.right : 0;
    if (d < distance) {
      index = candidate;
      distance = d;
    }
  });
  return { index, distance };
}

function continuesRow(line: TextLine, columns: ColumnSpan[]): boolean {
  return line.phrases.every((phrase) => {
    const { index, distance } = nearestColumn(phrase, columns);
    return index > 0 && distance === 0;
  });
}

function assignCells(line: TextLine, columns: ColumnSpan[]): (string | null)[] {
  const cells: (string | null)[] = columns.map(() => null);
  for (const phrase of line.phrases) {
    const { index } = nearestColumn(phrase, columns);
    const existing = cells[index];
    cells[index] = existing === null ? phrase.text : `${existing} ${phrase.text}`;
  }
  return cells;
}

function centerOf(word: WordBox): number {
  return word.top + word.height / 2;
}
