// src/parsers/ClassificationParser.ts
import { CLASSIFICATION_BLOCK_PATTERN, UNKNOWN_CLASSIFICATION } from '../config/patterns';
import { ClassificationBlock } from '../types/score.types';

/**
 * Split "Percussion Scholastic A – Block 2" into ("Percussion Scholastic A", 2).
 * Text without a usable label falls back to "Unknown" with no block.
 */
export function splitClassification(text: string | null | undefined): ClassificationBlock {
  const trimmed = (text ?? '').trim();
  const match = trimmed.match(CLASSIFICATION_BLOCK_PATTERN);
  const name = match?.[1]?.trim();

  if (!match || !name) {
    return { name: UNKNOWN_CLASSIFICATION, block: null };
  }

  return {
    name,
    block: match[2] ? parseInt(match[2], 10) : null
  };
}
