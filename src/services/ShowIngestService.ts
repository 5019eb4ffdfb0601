// src/services/ShowIngestService.ts
import { ScoreSheetParser } from '../parsers/ScoreSheetParser';
import { IngestResult, ParsedScoreSheet } from '../types/score.types';
import { yearOf } from '../utils/dateUtils';
import { Logger } from '../utils/logger';
import { ScoreRepositories, ScoreStore } from './store/ScoreStore';

/**
 * Ingests one score sheet document. The document is parsed first, then every
 * record it produces is written in a single store transaction, so a failure at
 * any point leaves the store as it was.
 */
export class ShowIngestService {
  private logger = new Logger('ShowIngestService');

  constructor(
    private readonly parser: ScoreSheetParser,
    private readonly store: ScoreStore
  ) {}

  async ingestFile(pdfPath: string): Promise<IngestResult> {
    const sheet = await this.parser.parse(pdfPath);
    if (sheet.droppedRows > 0) {
      this.logger.debug(`${sheet.identity.sourceFile}: dropped ${sheet.droppedRows} non-performance row(s)`);
    }

    const result = await this.store.transaction((tx) => this.persist(tx, sheet));
    this.logger.info(
      `${result.sourceFile}: ${result.created ? 'created' : 'updated'} show ${result.showId} ` +
        `(week ${result.week}, ${result.performances} performance(s), ${result.captionScores} caption score(s))`
    );
    return result;
  }

  private async persist(tx: ScoreRepositories, sheet: ParsedScoreSheet): Promise<IngestResult> {
    const { identity } = sheet;

    const season = await tx.seasons.upsertByYear(yearOf(identity.date));
    const host = await tx.hosts.upsert({ name: identity.hostName, city: identity.city, state: identity.state });
    const existing = await tx.shows.findBySourceFile(identity.sourceFile);
    const week = 1 + (await tx.shows.countEarlierInSeason(season.id, identity.date, existing?.id));

    const showData = {
      name: identity.name,
      date: identity.date,
      seasonId: season.id,
      hostId: host.id,
      week,
      sourceFile: identity.sourceFile
    };
    const show = existing ? await tx.shows.update(existing.id, showData) : await tx.shows.insert(showData);

    const replacedPerformances = existing ? await tx.performances.deleteForShow(show.id) : 0;
    if (replacedPerformances > 0) {
      this.logger.debug(`Replaced ${replacedPerformances} performance(s) of show ${show.id}`);
    }

    const weights = new Map<string, number>();
    for (const entry of await tx.captionWeights.listForSeason(season.id)) {
      weights.set(entry.caption, entry.weight);
    }

    let captionScores = 0;
    for (const parsed of sheet.performances) {
      const classification = await tx.classifications.upsertByName(parsed.classification);
      const group = await tx.groups.upsert(parsed.groupName, parsed.homeCity, classification.id);
      const performance = await tx.performances.insert({
        showId: show.id,
        groupId: group.id,
        classificationId: classification.id,
        blockNumber: parsed.blockNumber,
        totalScore: parsed.totalScore,
        placement: parsed.placement,
        penalty: parsed.penalty
      });

      for (const caption of parsed.captions) {
        await tx.captionScores.insert({
          performanceId: performance.id,
          caption: caption.caption,
          weight: weights.get(caption.caption) ?? 0,
          compScore: caption.compScore,
          perfScore: caption.perfScore,
          placement: caption.placement,
          judgeId: null
        });
        captionScores++;
      }
    }

    return {
      sourceFile: identity.sourceFile,
      showId: show.id,
      showName: show.name,
      showDate: show.date,
      week: show.week,
      created: !existing,
      replacedPerformances,
      performances: sheet.performances.length,
      captionScores,
      droppedRows: sheet.droppedRows
    };
  }
}
