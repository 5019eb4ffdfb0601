// src/tests/ScoreSheetParser.test.ts
import {
  hostNameOf,
  parsePenalty,
  resolveShowIdentity,
  ScoreSheetParser,
  tableToPerformances
} from '../parsers/ScoreSheetParser';
import { FormatError, ParseError, StructureError } from '../utils/errors';
import {
  ARCADIA_FILE,
  arcadiaDocument,
  FakeDocumentSource,
  MALFORMED_TABLE,
  SCHOLASTIC_TABLE,
  WORLD_TABLE
} from './fixtures/scoreSheets';

const ARCADIA_PAGE_HEADER_ONLY = 'Arcadia HS Saturday – Arcadia, CA\nSeptember 14, 2024\nPercussion Independent World';

describe('ScoreSheetParser', () => {
  let source: FakeDocumentSource;
  let parser: ScoreSheetParser;

  beforeEach(() => {
    source = new FakeDocumentSource();
    parser = new ScoreSheetParser(source, source);
  });

  describe('parse', () => {
    it('should read identity and every valid performance', async () => {
      source.add(ARCADIA_FILE, arcadiaDocument());

      const sheet = await parser.parse(`/scores/${ARCADIA_FILE}`);

      expect(sheet.identity).toEqual({
        name: 'Arcadia HS Saturday',
        date: '2024-09-14',
        hostName: 'Arcadia HS',
        city: 'Arcadia',
        state: 'CA',
        sourceFile: ARCADIA_FILE
      });
      expect(sheet.pageCount).toBe(2);
      expect(sheet.tableCount).toBe(2);
      expect(sheet.droppedRows).toBe(2);
      expect(sheet.performances).toEqual([
        {
          groupName: 'Blue Knights',
          homeCity: 'Denver',
          classification: 'Percussion Scholastic A',
          blockNumber: 2,
          totalScore: 69,
          placement: 1,
          penalty: 0.5,
          captions: [
            { caption: 'Effect - Music', compScore: 18.5, perfScore: 17, placement: 1 },
            { caption: 'Music', compScore: 17, perfScore: 16.5, placement: 2 }
          ]
        },
        {
          groupName: 'Cadets',
          homeCity: 'Allentown',
          classification: 'Percussion Scholastic A',
          blockNumber: 2,
          totalScore: 66,
          placement: 2,
          penalty: 0,
          captions: [
            { caption: 'Effect - Music', compScore: 16, perfScore: 15.5, placement: 2 },
            { caption: 'Music', compScore: 17.5, perfScore: 17, placement: 1 }
          ]
        },
        {
          groupName: 'Pulse',
          homeCity: 'Irvine',
          classification: 'Percussion Independent World',
          blockNumber: null,
          totalScore: 39,
          placement: 1,
          penalty: 0,
          captions: [{ caption: 'Visual', compScore: 20, perfScore: 19, placement: 1 }]
        }
      ]);
    });

    it('should use Unknown for pages without a classification', async () => {
      source.add(ARCADIA_FILE, { pages: ['Arcadia HS Saturday\nSeptember 14, 2024'], tables: [[WORLD_TABLE]] });

      const sheet = await parser.parse(ARCADIA_FILE);

      expect(sheet.performances[0].classification).toBe('Unknown');
      expect(sheet.performances[0].blockNumber).toBeNull();
    });

    it('should abort the document on a malformed score cell', async () => {
      source.add(ARCADIA_FILE, { pages: [ARCADIA_PAGE_HEADER_ONLY], tables: [[WORLD_TABLE, MALFORMED_TABLE]] });

      await expect(parser.parse(ARCADIA_FILE)).rejects.toThrow(ParseError);
    });

    it('should fail when neither header nor file name gives a date', async () => {
      source.add('scores.pdf', { pages: ['Arcadia HS Saturday'], tables: [[]] });

      await expect(parser.parse('scores.pdf')).rejects.toThrow(FormatError);
    });
  });

  describe('resolveShowIdentity', () => {
    it('should fall back to the file name for every missing field', () => {
      expect(resolveShowIdentity({}, ARCADIA_FILE)).toEqual({
        name: 'Arcadia Hs Saturday',
        date: '2024-09-14',
        hostName: 'Arcadia Hs',
        city: 'Arcadia',
        state: 'CA',
        sourceFile: ARCADIA_FILE
      });
    });

    it('should prefer header fields over the file name', () => {
      const identity = resolveShowIdentity(
        { showName: 'Arcadia HS Saturday' },
        '2024_09_21_arcadia_hs_saturday_arcadia_ca.pdf'
      );

      expect(identity.name).toBe('Arcadia HS Saturday');
      expect(identity.date).toBe('2024-09-21');
    });

    it('should not need the file name when the header is complete', () => {
      const identity = resolveShowIdentity(
        { showName: 'Chino HS Finals', showDate: '2024-04-06', location: 'Chino, CA' },
        'scores.pdf'
      );

      expect(identity).toEqual({
        name: 'Chino HS Finals',
        date: '2024-04-06',
        hostName: 'Chino HS',
        city: 'Chino',
        state: 'CA',
        sourceFile: 'scores.pdf'
      });
    });

    it('should leave city and state null when no source has them', () => {
      const identity = resolveShowIdentity({ showName: 'Chino HS Finals', showDate: '2024-04-06' }, 'scores.pdf');

      expect(identity.city).toBeNull();
      expect(identity.state).toBeNull();
    });
  });

  describe('tableToPerformances', () => {
    it('should drop header repeats and scoreless rows', () => {
      const result = tableToPerformances(SCHOLASTIC_TABLE, { name: 'Percussion Scholastic A', block: 2 });

      expect(result.performances.map((p) => p.groupName)).toEqual(['Blue Knights', 'Cadets']);
      expect(result.dropped).toBe(2);
    });

    it('should surface structure errors', () => {
      expect(() => tableToPerformances([['Group', 'City']], { name: 'Unknown', block: null })).toThrow(StructureError);
    });
  });

  it('should derive the host from the show name', () => {
    expect(hostNameOf('Arcadia HS Saturday')).toBe('Arcadia HS');
    expect(hostNameOf('Finals')).toBe('Finals');
  });

  it('should read penalties leniently', () => {
    expect(parsePenalty('1.5')).toBe(1.5);
    expect(parsePenalty(2)).toBe(2);
    expect(parsePenalty(' ')).toBe(0);
    expect(parsePenalty('n/a')).toBe(0);
    expect(parsePenalty(null)).toBe(0);
  });
});
