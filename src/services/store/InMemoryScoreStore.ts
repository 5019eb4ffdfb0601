// src/services/store/InMemoryScoreStore.ts
import {
  CaptionScoreData,
  CaptionScoreRecord,
  CaptionWeightRecord,
  ClassificationRecord,
  GroupRecord,
  HostLocationRecord,
  PerformanceData,
  PerformanceRecord,
  SeasonRecord,
  ShowData,
  ShowDate,
  ShowRecord
} from '../../types/score.types';
import { HostKey, ScoreRepositories, ScoreStore } from './ScoreStore';

interface Tables {
  nextId: number;
  seasons: SeasonRecord[];
  captionWeights: CaptionWeightRecord[];
  hosts: HostLocationRecord[];
  shows: ShowRecord[];
  classifications: ClassificationRecord[];
  groups: GroupRecord[];
  performances: PerformanceRecord[];
  captionScores: CaptionScoreRecord[];
}

function emptyTables(): Tables {
  return {
    nextId: 1,
    seasons: [],
    captionWeights: [],
    hosts: [],
    shows: [],
    classifications: [],
    groups: [],
    performances: [],
    captionScores: []
  };
}

/**
 * Process-local store used for dry runs and tests. A transaction snapshots
 * every table and restores the snapshot when the callback throws.
 */
export class InMemoryScoreStore implements ScoreStore {
  private tables: Tables = emptyTables();
  private readonly repositories: ScoreRepositories = this.createRepositories();
  private queue: Promise<unknown> = Promise.resolve();

  transaction<T>(work: (tx: ScoreRepositories) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const snapshot = structuredClone(this.tables);
      try {
        return await work(this.repositories);
      } catch (error) {
        this.tables = snapshot;
        throw error;
      }
    };
    // One transaction at a time, like a single writer connection
    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }

  async close(): Promise<void> {
    await this.queue;
  }

  /** Read-only copy of the current contents. */
  dump(): Omit<Tables, 'nextId'> {
    const { nextId: _nextId, ...rest } = structuredClone(this.tables);
    return rest;
  }

  private id(): number {
    return this.tables.nextId++;
  }

  private createRepositories(): ScoreRepositories {
    const t = (): Tables => this.tables;
    const id = (): number => this.id();

    return {
      seasons: {
        findByYear: async (year) => t().seasons.find((s) => s.year === year) ?? null,
        upsertByYear: async (year) => {
          const existing = t().seasons.find((s) => s.year === year);
          if (existing) return { ...existing };
          const record: SeasonRecord = { id: id(), year };
          t().seasons.push(record);
          return { ...record };
        }
      },

      captionWeights: {
        listForSeason: async (seasonId) =>
          t()
            .captionWeights.filter((w) => w.seasonId === seasonId)
            .sort((a, b) => a.caption.localeCompare(b.caption))
            .map((w) => ({ ...w })),
        upsert: async (seasonId, caption, weight) => {
          const existing = t().captionWeights.find((w) => w.seasonId === seasonId && w.caption === caption);
          if (existing) {
            existing.weight = weight;
            return { ...existing };
          }
          const record: CaptionWeightRecord = { id: id(), seasonId, caption, weight };
          t().captionWeights.push(record);
          return { ...record };
        }
      },

      hosts: {
        upsert: async (key: HostKey) => {
          const existing = t().hosts.find(
            (h) => h.name === key.name && h.city === key.city && h.state === key.state
          );
          if (existing) return { ...existing };
          const record: HostLocationRecord = { id: id(), name: key.name, city: key.city, state: key.state };
          t().hosts.push(record);
          return { ...record };
        }
      },

      shows: {
        findBySourceFile: async (sourceFile) => {
          const show = t().shows.find((s) => s.sourceFile === sourceFile);
          return show ? { ...show } : null;
        },
        countEarlierInSeason: async (seasonId: number, date: ShowDate, excludeShowId?: number) =>
          t().shows.filter((s) => s.seasonId === seasonId && s.date < date && s.id !== excludeShowId).length,
        listForSeason: async (seasonId) =>
          t()
            .shows.filter((s) => s.seasonId === seasonId)
            .sort((a, b) => a.date.localeCompare(b.date) || a.id - b.id)
            .map((s) => ({ ...s })),
        insert: async (data: ShowData) => {
          const record: ShowRecord = { id: id(), ...data };
          t().shows.push(record);
          return { ...record };
        },
        update: async (showId: number, data: ShowData) => {
          const index = t().shows.findIndex((s) => s.id === showId);
          if (index === -1) throw new Error(`Show ${showId} not found`);
          const record: ShowRecord = { id: showId, ...data };
          t().shows[index] = record;
          return { ...record };
        },
        updateWeek: async (showId, week) => {
          const show = t().shows.find((s) => s.id === showId);
          if (show) show.week = week;
        }
      },

      classifications: {
        upsertByName: async (name) => {
          const existing = t().classifications.find((c) => c.name === name);
          if (existing) return { ...existing };
          const record: ClassificationRecord = { id: id(), name };
          t().classifications.push(record);
          return { ...record };
        },
        findById: async (classificationId) => {
          const found = t().classifications.find((c) => c.id === classificationId);
          return found ? { ...found } : null;
        }
      },

      groups: {
        upsert: async (name, homeCity, classificationId) => {
          const existing = t().groups.find((g) => g.name === name && g.homeCity === homeCity);
          if (existing) {
            existing.classificationId = classificationId;
            return { ...existing };
          }
          const record: GroupRecord = { id: id(), name, homeCity, classificationId };
          t().groups.push(record);
          return { ...record };
        },
        findById: async (groupId) => {
          const found = t().groups.find((g) => g.id === groupId);
          return found ? { ...found } : null;
        }
      },

      performances: {
        listForShow: async (showId) => t().performances.filter((p) => p.showId === showId).map((p) => ({ ...p })),
        deleteForShow: async (showId) => {
          const doomed = new Set(t().performances.filter((p) => p.showId === showId).map((p) => p.id));
          t().captionScores = t().captionScores.filter((c) => !doomed.has(c.performanceId));
          t().performances = t().performances.filter((p) => !doomed.has(p.id));
          return doomed.size;
        },
        insert: async (data: PerformanceData) => {
          const record: PerformanceRecord = { id: id(), ...data };
          t().performances.push(record);
          return { ...record };
        }
      },

      captionScores: {
        listForPerformance: async (performanceId) =>
          t()
            .captionScores.filter((c) => c.performanceId === performanceId)
            .map((c) => ({ ...c })),
        insert: async (data: CaptionScoreData) => {
          const record: CaptionScoreRecord = { id: id(), ...data };
          t().captionScores.push(record);
          return { ...record };
        }
      }
    };
  }
}
