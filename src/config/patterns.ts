// src/config/patterns.ts
import { CaptionColumn, HeaderPattern } from '../types/patterns.types';
import { parseLongDate } from '../utils/dateUtils';

// Page header rules; each is optional and matched independently
export const HEADER_RULES: readonly HeaderPattern[] = [
  {
    // e.g., "Arcadia HS Saturday"
    field: 'showName',
    pattern: /([A-Za-z ]+ HS(?: Saturday| Sunday| Finals| Prelims))/,
    extract: (match) => match[1].trim()
  },
  {
    // e.g., "– Arcadia, CA"
    field: 'location',
    pattern: /[–—-]\s*([A-Za-z ]+,\s*[A-Z]{2})\b/,
    extract: (match) => match[1].trim()
  },
  {
    // e.g., "September 14, 2024"
    field: 'showDate',
    pattern: /([A-Za-z]+ \d{1,2},\s*\d{4})/,
    extract: (match) => parseLongDate(match[1])
  },
  {
    // e.g., "Percussion Scholastic A – Block 2"; block suffix is kept for splitting
    field: 'classificationText',
    pattern: /Percussion (?:Scholastic|Independent) [A-Za-z ]+(?:\s*[–—-]\s*Block\s*\d+)?/i,
    extract: (match) => match[0].trim()
  }
];

// Trailing block designation on a classification label
export const CLASSIFICATION_BLOCK_PATTERN = /^(.*?)(?:\s*[–—-]\s*Block\s*(\d+))?$/i;

export const UNKNOWN_CLASSIFICATION = 'Unknown';

export const WEEKDAY_TOKENS: ReadonlySet<string> = new Set([
  'saturday',
  'sunday',
  'prelims',
  'semifinals',
  'finals'
]);

export const SUBTOTAL_CAPTION = 'SubTotal';

export const CAPTION_COLUMNS: readonly CaptionColumn[] = [
  'Effect - Music',
  'Effect - Visual',
  'Music',
  'Visual',
  SUBTOTAL_CAPTION
].map((name) => ({
  name,
  slug: captionSlug(name),
  scored: name !== SUBTOTAL_CAPTION
}));

export const SUBTOTAL_SLUG = captionSlug(SUBTOTAL_CAPTION);

export const GROUP_COLUMN = 'Group';
export const HOME_CITY_COLUMN = 'HomeCity';
export const BLANK_COLUMN = 'BLANK';

export const PENALTY_COLUMN_PATTERN = /penalty/i;

export function captionSlug(caption: string): string {
  return caption.toLowerCase().replace(/[\s-]+/g, '');
}
