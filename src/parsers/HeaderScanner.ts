// src/parsers/HeaderScanner.ts
import { HEADER_RULES } from '../config/patterns';
import { HeaderPattern } from '../types/patterns.types';
import { HeaderMeta } from '../types/score.types';

/**
 * Best-effort extraction of show metadata from a page's plain text.
 * Each rule is independent; fields that do not match are left out.
 */
export function scanHeader(text: string, rules: readonly HeaderPattern[] = HEADER_RULES): HeaderMeta {
  const meta: HeaderMeta = {};
  if (!text) return meta;

  for (const rule of rules) {
    if (meta[rule.field] !== undefined) continue;
    const match = text.match(rule.pattern);
    if (!match) continue;
    const value = rule.extract(match);
    if (value) {
      meta[rule.field] = value;
    }
  }

  return meta;
}

/**
 * Split a header location such as "Arcadia, CA" into city and state.
 */
export function splitLocation(location: string | undefined): { city: string; state: string } | null {
  if (!location) return null;
  const comma = location.indexOf(',');
  if (comma === -1) return null;
  const city = location.slice(0, comma).trim();
  const state = location.slice(comma + 1).trim();
  if (!city || !state) return null;
  return { city, state };
}
