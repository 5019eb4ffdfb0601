// src/services/ScoringService.ts
import { CaptionScoreRecord } from '../types/score.types';
import { ScoreRepositories } from './store/ScoreStore';

export type WeightedCaptionScore = Pick<CaptionScoreRecord, 'caption' | 'weight' | 'compScore' | 'perfScore' | 'judgeId'>;

export interface PerformanceReportRow {
  performanceId: number;
  groupName: string;
  homeCity: string;
  classification: string;
  blockNumber: number | null;
  totalScore: number;
  placement: number | null;
  penalty: number;
  weightedScore: number;
}

/**
 * Weighted score of one performance.
 *
 * Each caption averages, over its judge contexts, (comp + perf) / 2 scaled by
 * weight / 100; the captions are then summed. `weights` is the season lookup;
 * a caption missing from it falls back to the weight stored on the score.
 * Scores with a null judge form a single context.
 */
export function computeWeightedScore(
  captionScores: readonly WeightedCaptionScore[],
  weights: ReadonlyMap<string, number>
): number {
  // caption -> judge context -> contribution
  const byCaption = new Map<string, Map<number | null, number>>();

  for (const score of captionScores) {
    if (score.compScore === null || score.perfScore === null) continue;
    const weight = weights.get(score.caption) ?? score.weight;
    const contribution = ((score.compScore + score.perfScore) / 2) * (weight / 100);
    const contexts = byCaption.get(score.caption) ?? new Map<number | null, number>();
    contexts.set(score.judgeId, (contexts.get(score.judgeId) ?? 0) + contribution);
    byCaption.set(score.caption, contexts);
  }

  let total = 0;
  for (const contexts of byCaption.values()) {
    let sum = 0;
    for (const value of contexts.values()) sum += value;
    total += sum / contexts.size;
  }
  return total;
}

/**
 * Performances of one show with their derived weighted scores, highest total first.
 */
export async function buildShowReport(tx: ScoreRepositories, sourceFile: string): Promise<PerformanceReportRow[] | null> {
  const show = await tx.shows.findBySourceFile(sourceFile);
  if (!show) return null;

  const weights = new Map<string, number>();
  for (const entry of await tx.captionWeights.listForSeason(show.seasonId)) {
    weights.set(entry.caption, entry.weight);
  }

  const rows: PerformanceReportRow[] = [];
  for (const performance of await tx.performances.listForShow(show.id)) {
    const group = await tx.groups.findById(performance.groupId);
    const classification =
      performance.classificationId !== null ? await tx.classifications.findById(performance.classificationId) : null;
    const captionScores = await tx.captionScores.listForPerformance(performance.id);

    rows.push({
      performanceId: performance.id,
      groupName: group?.name ?? `#${performance.groupId}`,
      homeCity: group?.homeCity ?? '',
      classification: classification?.name ?? '',
      blockNumber: performance.blockNumber,
      totalScore: performance.totalScore,
      placement: performance.placement,
      penalty: performance.penalty,
      weightedScore: computeWeightedScore(captionScores, weights)
    });
  }

  return rows.sort((a, b) => b.totalScore - a.totalScore);
}
