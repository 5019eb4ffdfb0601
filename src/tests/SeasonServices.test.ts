// src/tests/SeasonServices.test.ts
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ScoreSheetParser } from '../parsers/ScoreSheetParser';
import { CaptionWeightService, parseCaptionWeights } from '../services/CaptionWeightService';
import { SeasonService } from '../services/SeasonService';
import { ShowIngestService } from '../services/ShowIngestService';
import { InMemoryScoreStore } from '../services/store/InMemoryScoreStore';
import { FakeDocumentSource, singlePageDocument } from './fixtures/scoreSheets';

describe('CaptionWeightService', () => {
  let store: InMemoryScoreStore;
  let service: CaptionWeightService;

  beforeEach(() => {
    store = new InMemoryScoreStore();
    service = new CaptionWeightService(store);
  });

  it('should upsert weights by season and caption', async () => {
    expect(await service.seed({ '2024': { Music: 30, Visual: 20 }, '2025': { Music: 25 } })).toBe(3);
    expect(await service.seed({ '2024': { Music: 35 } })).toBe(1);

    expect(Object.fromEntries(await service.weightsForYear(2024))).toEqual({ Music: 35, Visual: 20 });
    expect(Object.fromEntries(await service.weightsForYear(2025))).toEqual({ Music: 25 });
    expect(store.dump().captionWeights).toHaveLength(3);
  });

  it('should return no weights for an unknown season', async () => {
    expect((await service.weightsForYear(1999)).size).toBe(0);
  });

  it('should seed from the JSON file format', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'weights-'));
    const file = path.join(dir, 'caption-weights.json');
    fs.writeFileSync(file, JSON.stringify({ '2024': { 'Effect - Music': 30 } }));

    try {
      expect(await service.seedFromFile(file)).toBe(1);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  describe('parseCaptionWeights', () => {
    it('should accept year keys with weights from 0 to 100', () => {
      expect(parseCaptionWeights('{"2024":{"Music":0,"Visual":100}}', 'test')).toEqual({
        '2024': { Music: 0, Visual: 100 }
      });
    });

    it('should reject bad keys, out of range weights and broken JSON', () => {
      expect(() => parseCaptionWeights('{"season":{"Music":30}}', 'test')).toThrow('Invalid caption weights in test');
      expect(() => parseCaptionWeights('{"2024":{"Music":150}}', 'test')).toThrow('at 2024.Music');
      expect(() => parseCaptionWeights('{', 'test')).toThrow('Caption weights in test are not valid JSON');
    });
  });
});

describe('SeasonService', () => {
  it('should renumber weeks after out-of-order ingestion', async () => {
    const source = new FakeDocumentSource()
      .add('late.pdf', singlePageDocument('Poly', 'Riverside', 'February 17, 2024'))
      .add('early.pdf', singlePageDocument('Arcadia', 'Arcadia', 'February 3, 2024'))
      .add('middle.pdf', singlePageDocument('Chino', 'Chino', 'February 10, 2024'))
      .add('middle-b.pdf', singlePageDocument('Irvine', 'Irvine', 'February 10, 2024'));
    const store = new InMemoryScoreStore();
    const ingest = new ShowIngestService(new ScoreSheetParser(source, source), store);

    const weeks: number[] = [];
    for (const file of ['late.pdf', 'early.pdf', 'middle.pdf', 'middle-b.pdf']) {
      weeks.push((await ingest.ingestFile(file)).week);
    }
    expect(weeks).toEqual([1, 1, 2, 2]);

    const result = await new SeasonService(store).renumberWeeks(2024);

    expect(result).toEqual({ year: 2024, shows: 4, changed: 1 });
    const weekOf = new Map(store.dump().shows.map((show) => [show.sourceFile, show.week]));
    expect(Object.fromEntries(weekOf)).toEqual({
      'late.pdf': 4,
      'early.pdf': 1,
      'middle.pdf': 2,
      'middle-b.pdf': 2
    });
  });

  it('should do nothing for a season without shows', async () => {
    const result = await new SeasonService(new InMemoryScoreStore()).renumberWeeks(2030);

    expect(result).toEqual({ year: 2030, shows: 0, changed: 0 });
  });
});
