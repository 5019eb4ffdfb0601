// src/services/CaptionWeightService.ts
import * as fs from 'fs';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { ScoreStore } from './store/ScoreStore';

// { "2024": { "Effect - Music": 30, ... }, ... }
export const CaptionWeightSeedSchema = z.record(
  z.string().regex(/^\d{4}$/, 'season keys must be four-digit years'),
  z.record(z.number().min(0).max(100))
);

export type CaptionWeightSeed = z.infer<typeof CaptionWeightSeedSchema>;

export function parseCaptionWeights(json: string, source: string): CaptionWeightSeed {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new Error(`Caption weights in ${source} are not valid JSON: ${error instanceof Error ? error.message : error}`);
  }
  const result = CaptionWeightSeedSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid caption weights in ${source} at ${issue?.path.join('.') ?? '?'}: ${issue?.message}`);
  }
  return result.data;
}

/**
 * Maintains the per-season caption weight lookup. Weights are reference data:
 * they are seeded, never derived from ingested scores.
 */
export class CaptionWeightService {
  private logger = new Logger('CaptionWeightService');

  constructor(private readonly store: ScoreStore) {}

  async seedFromFile(filePath: string): Promise<number> {
    return this.seed(parseCaptionWeights(fs.readFileSync(filePath, 'utf-8'), filePath));
  }

  /** Upserts every (season, caption) entry; returns how many were written. */
  async seed(weights: CaptionWeightSeed): Promise<number> {
    return this.store.transaction(async (tx) => {
      let written = 0;
      for (const [year, captions] of Object.entries(weights)) {
        const season = await tx.seasons.upsertByYear(Number(year));
        for (const [caption, weight] of Object.entries(captions)) {
          await tx.captionWeights.upsert(season.id, caption, weight);
          written++;
        }
        this.logger.info(`Season ${year}: ${Object.keys(captions).length} caption weight(s)`);
      }
      return written;
    });
  }

  async weightsForYear(year: number): Promise<Map<string, number>> {
    return this.store.transaction(async (tx) => {
      const weights = new Map<string, number>();
      const season = await tx.seasons.findByYear(year);
      if (!season) return weights;
      for (const entry of await tx.captionWeights.listForSeason(season.id)) {
        weights.set(entry.caption, entry.weight);
      }
      return weights;
    });
  }
}
