// src/tests/ScoringService.test.ts
import { ScoreSheetParser } from '../parsers/ScoreSheetParser';
import { CaptionWeightService } from '../services/CaptionWeightService';
import { buildShowReport, computeWeightedScore, WeightedCaptionScore } from '../services/ScoringService';
import { ShowIngestService } from '../services/ShowIngestService';
import { InMemoryScoreStore } from '../services/store/InMemoryScoreStore';
import { ARCADIA_FILE, arcadiaDocument, FakeDocumentSource } from './fixtures/scoreSheets';

function score(
  caption: string,
  compScore: number | null,
  perfScore: number | null,
  weight = 0,
  judgeId: number | null = null
): WeightedCaptionScore {
  return { caption, weight, compScore, perfScore, judgeId };
}

describe('computeWeightedScore', () => {
  it('should weight each caption by the season lookup', () => {
    const weights = new Map([['Music', 30]]);

    // Music: 17.5 * 0.3; Visual falls back to its stored 20: 15.5 * 0.2
    expect(computeWeightedScore([score('Music', 18, 17), score('Visual', 16, 15, 20)], weights)).toBeCloseTo(8.35, 10);
  });

  it('should average judge contexts within a caption', () => {
    const weights = new Map([['Music', 30]]);
    const scores = [score('Music', 18, 17, 0, 1), score('Music', 16, 16, 0, 2)];

    expect(computeWeightedScore(scores, weights)).toBeCloseTo((5.25 + 4.8) / 2, 10);
  });

  it('should skip scores without both values', () => {
    expect(computeWeightedScore([score('Music', null, 17, 50)], new Map())).toBe(0);
    expect(computeWeightedScore([], new Map())).toBe(0);
  });
});

describe('buildShowReport', () => {
  it('should list performances by total with weighted scores', async () => {
    const source = new FakeDocumentSource().add(ARCADIA_FILE, arcadiaDocument());
    const store = new InMemoryScoreStore();
    await new CaptionWeightService(store).seed({ '2024': { 'Effect - Music': 30, Music: 30 } });
    await new ShowIngestService(new ScoreSheetParser(source, source), store).ingestFile(ARCADIA_FILE);

    const rows = await store.transaction((tx) => buildShowReport(tx, ARCADIA_FILE));

    expect(rows?.map((row) => [row.groupName, row.classification, row.totalScore])).toEqual([
      ['Blue Knights', 'Percussion Scholastic A', 69],
      ['Cadets', 'Percussion Scholastic A', 66],
      ['Pulse', 'Percussion Independent World', 39]
    ]);
    // (18.5 + 17) / 2 * 0.3 + (17 + 16.5) / 2 * 0.3
    expect(rows?.[0].weightedScore).toBeCloseTo(10.35, 10);
    expect(rows?.[2].weightedScore).toBe(0);
  });

  it('should return null for a file that was never ingested', async () => {
    const store = new InMemoryScoreStore();

    expect(await store.transaction((tx) => buildShowReport(tx, 'missing.pdf'))).toBeNull();
  });
});
