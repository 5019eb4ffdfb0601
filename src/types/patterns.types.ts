// src/types/patterns.types.ts
import { HeaderMeta } from './score.types';

export type HeaderField = keyof HeaderMeta;

export interface HeaderPattern {
  readonly field: HeaderField;
  readonly pattern: RegExp;
  // Returns undefined when the match cannot yield a usable value
  readonly extract: (match: RegExpMatchArray) => string | undefined;
}

export interface CaptionColumn {
  readonly name: string;
  readonly slug: string;
  // SubTotal is split like a caption but never stored as a CaptionScore
  readonly scored: boolean;
}
