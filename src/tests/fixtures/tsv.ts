// src/tests/fixtures/tsv.ts

// [text, left, top, width]; every word is 10pt tall
export type TsvWord = [string, number, number, number];

const TSV_HEADER = 'level\tpage_num\tpar_num\tblock_num\tline_num\tword_num\tleft\ttop\twidth\theight\tconf\ttext';

/**
 * Render words the way `pdftotext -tsv` does, with a page marker row first.
 */
export function toTsv(words: TsvWord[]): string {
  const rows = [TSV_HEADER, '1\t1\t0\t0\t0\t0\t0\t0\t612\t792\t-1\t###PAGE###'];
  words.forEach(([text, left, top, width], index) => {
    rows.push(`5\t1\t0\t0\t0\t${index + 1}\t${left}\t${top}\t${width}\t10\t100\t${text}`);
  });
  return rows.join('\n') + '\n';
}

/**
 * Two header lines, two performances with stacked score lines.
 * `offset` shifts the second column down, which only a loose row tolerance absorbs.
 */
export function scoreTableWords(offset = 0): TsvWord[] {
  return [
    ['Group', 10, 100, 30],
    ['Home', 80, 100 + offset, 20],
    ['City', 102, 100 + offset, 18],
    ['Music', 160, 100, 30],
    ['Total', 160, 115, 25],
    ['Blue', 10, 130, 20],
    ['Knights', 32, 130, 28],
    ['Denver', 80, 130 + offset, 30],
    ['12.5', 160, 130, 20],
    ['11.0', 160, 145, 20],
    ['23.5', 160, 160, 20],
    ['3', 165, 175, 5],
    ['Cadets', 10, 190, 30],
    ['Allentown', 80, 190 + offset, 40],
    ['12.0', 160, 190, 20],
    ['11.5', 160, 205, 20],
    ['23.5', 160, 220, 20],
    ['4', 165, 235, 5]
  ];
}

export const EXPECTED_SCORE_GRID = [
  ['Group', 'Home City', 'Music'],
  [null, null, 'Total'],
  ['Blue Knights', 'Denver', '12.5\n11.0\n23.5\n3'],
  ['Cadets', 'Allentown', '12.0\n11.5\n23.5\n4']
];
