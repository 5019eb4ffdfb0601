// src/services/store/ScoreStore.ts
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

export interface HostKey {
  name: string;
  city: string | null;
  state: string | null;
}

export interface SeasonRepository {
  findByYear(year: number): Promise<SeasonRecord | null>;
  upsertByYear(year: number): Promise<SeasonRecord>;
}

export interface CaptionWeightRepository {
  listForSeason(seasonId: number): Promise<CaptionWeightRecord[]>;
  upsert(seasonId: number, caption: string, weight: number): Promise<CaptionWeightRecord>;
}

export interface HostLocationRepository {
  upsert(key: HostKey): Promise<HostLocationRecord>;
}

export interface ShowRepository {
  findBySourceFile(sourceFile: string): Promise<ShowRecord | null>;
  // Shows dated strictly before `date`, not counting `excludeShowId`
  countEarlierInSeason(seasonId: number, date: ShowDate, excludeShowId?: number): Promise<number>;
  listForSeason(seasonId: number): Promise<ShowRecord[]>;
  insert(data: ShowData): Promise<ShowRecord>;
  update(id: number, data: ShowData): Promise<ShowRecord>;
  updateWeek(id: number, week: number): Promise<void>;
}

export interface ClassificationRepository {
  upsertByName(name: string): Promise<ClassificationRecord>;
  findById(id: number): Promise<ClassificationRecord | null>;
}

export interface GroupRepository {
  // Natural key (name, homeCity); classification is overwritten with the current one
  upsert(name: string, homeCity: string, classificationId: number | null): Promise<GroupRecord>;
  findById(id: number): Promise<GroupRecord | null>;
}

export interface PerformanceRepository {
  listForShow(showId: number): Promise<PerformanceRecord[]>;
  // Removes the show's performances and their caption scores; returns the performance count
  deleteForShow(showId: number): Promise<number>;
  insert(data: PerformanceData): Promise<PerformanceRecord>;
}

export interface CaptionScoreRepository {
  listForPerformance(performanceId: number): Promise<CaptionScoreRecord[]>;
  insert(data: CaptionScoreData): Promise<CaptionScoreRecord>;
}

export interface ScoreRepositories {
  seasons: SeasonRepository;
  captionWeights: CaptionWeightRepository;
  hosts: HostLocationRepository;
  shows: ShowRepository;
  classifications: ClassificationRepository;
  groups: GroupRepository;
  performances: PerformanceRepository;
  captionScores: CaptionScoreRepository;
}

/**
 * Persistence boundary. All work for one document runs inside one
 * transaction: the callback's changes commit together or not at all.
 */
export interface ScoreStore {
  transaction<T>(work: (tx: ScoreRepositories) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
