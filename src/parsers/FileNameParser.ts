// src/parsers/FileNameParser.ts
import * as path from 'path';
import { WEEKDAY_TOKENS } from '../config/patterns';
import { FileNameIdentity } from '../types/score.types';
import { parseDateTokens } from '../utils/dateUtils';
import { FormatError } from '../utils/errors';
import { titleCase } from '../utils/text';

const MIN_TOKENS = 6;

/**
 * Parse show identity from a score sheet file name.
 *
 * Pattern: YYYY_MM_DD_<host tokens>[_hs]_<weekday>_<city tokens>_<STATE>.pdf
 * e.g. "2024_09_14_arcadia_hs_saturday_arcadia_ca.pdf"
 */
export function parseScoreSheetFileName(fileName: string): FileNameIdentity {
  const base = path.basename(fileName, path.extname(fileName));
  const parts = base.split('_');

  if (parts.length < MIN_TOKENS) {
    throw new FormatError(`File name too short: ${fileName}`, { fileName, tokens: parts.length });
  }

  const showDate = parseDateTokens(parts[0], parts[1], parts[2]);
  if (!showDate) {
    throw new FormatError(`No valid date at start of file name: ${fileName}`, { fileName });
  }

  const weekdayIndex = parts.findIndex((part, index) => index >= 3 && WEEKDAY_TOKENS.has(part.toLowerCase()));
  if (weekdayIndex === -1) {
    throw new FormatError(`No weekday in file name: ${fileName}`, { fileName });
  }

  const hostParts = parts.slice(3, weekdayIndex);
  const lastHostPart = hostParts[hostParts.length - 1];
  if (!lastHostPart || lastHostPart.toLowerCase() !== 'hs') {
    hostParts.push('hs');
  }
  const hostId = hostParts.join('_');

  const weekday = titleCase(parts[weekdayIndex]);
  const city = parts
    .slice(weekdayIndex + 1, -1)
    .map((part) => titleCase(part))
    .join(' ');
  const state = parts[parts.length - 1].toUpperCase();

  return {
    showDate,
    hostId,
    weekday,
    city,
    state,
    showName: `${titleCase(hostId.replace(/_/g, ' '))} ${weekday}`
  };
}
