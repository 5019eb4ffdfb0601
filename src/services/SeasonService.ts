// src/services/SeasonService.ts
import { Logger } from '../utils/logger';
import { ScoreStore } from './store/ScoreStore';

export interface RenumberResult {
  year: number;
  shows: number;
  changed: number;
}

export class SeasonService {
  private logger = new Logger('SeasonService');

  constructor(private readonly store: ScoreStore) {}

  /**
   * Recompute the week of every show in a season as 1 + the number of shows
   * dated strictly earlier. Ingestion only numbers the show being ingested,
   * so out-of-order ingestion leaves later shows behind until this runs.
   */
  async renumberWeeks(year: number): Promise<RenumberResult> {
    return this.store.transaction(async (tx) => {
      const season = await tx.seasons.findByYear(year);
      if (!season) {
        this.logger.warn(`No season ${year}; nothing to renumber`);
        return { year, shows: 0, changed: 0 };
      }

      const shows = await tx.shows.listForSeason(season.id);
      let changed = 0;
      let earlier = 0;
      let previousDate: string | undefined;

      // Sorted by date, so shows sharing a date share the index of the first of them
      for (const [index, show] of shows.entries()) {
        if (show.date !== previousDate) {
          earlier = index;
          previousDate = show.date;
        }
        const week = earlier + 1;
        if (show.week !== week) {
          await tx.shows.updateWeek(show.id, week);
          changed++;
        }
      }

      this.logger.info(`Season ${year}: ${changed} of ${shows.length} show week(s) changed`);
      return { year, shows: shows.length, changed };
    });
  }
}
