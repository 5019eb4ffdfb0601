// src/services/store/PgRepositories.ts
import { QueryResult, QueryResultRow } from 'pg';
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
import {
  CaptionScoreRepository,
  CaptionWeightRepository,
  ClassificationRepository,
  GroupRepository,
  HostKey,
  HostLocationRepository,
  PerformanceRepository,
  ScoreRepositories,
  SeasonRepository,
  ShowRepository
} from './ScoreStore';

export interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

const SHOW_COLUMNS = `id, name, date, season_id AS "seasonId", host_id AS "hostId", week, pdf_name AS "sourceFile"`;
const GROUP_COLUMNS = `id, name, home_city AS "homeCity", classification_id AS "classificationId"`;
const PERFORMANCE_COLUMNS = `id, show_id AS "showId", group_id AS "groupId", classification_id AS "classificationId",
  block_number AS "blockNumber", total_score AS "totalScore", placement, penalty`;
const CAPTION_SCORE_COLUMNS = `id, performance_id AS "performanceId", caption, weight, comp_score AS "compScore",
  perf_score AS "perfScore", placement, judge_id AS "judgeId"`;

async function one<R extends QueryResultRow>(db: Queryable, text: string, values: unknown[]): Promise<R> {
  const result = await db.query<R>(text, values);
  const row = result.rows[0];
  if (!row) {
    throw new Error(`Query returned no rows: ${text.split('\n')[0]}`);
  }
  return row;
}

async function maybeOne<R extends QueryResultRow>(db: Queryable, text: string, values: unknown[]): Promise<R | null> {
  const result = await db.query<R>(text, values);
  return result.rows[0] ?? null;
}

class PgSeasonRepository implements SeasonRepository {
  constructor(private readonly db: Queryable) {}

  findByYear(year: number): Promise<SeasonRecord | null> {
    return maybeOne<SeasonRecord>(this.db, 'SELECT id, year FROM seasons WHERE year = $1', [year]);
  }

  async upsertByYear(year: number): Promise<SeasonRecord> {
    const existing = await this.findByYear(year);
    if (existing) return existing;
    return one<SeasonRecord>(this.db, 'INSERT INTO seasons (year) VALUES ($1) RETURNING id, year', [year]);
  }
}

class PgCaptionWeightRepository implements CaptionWeightRepository {
  constructor(private readonly db: Queryable) {}

  async listForSeason(seasonId: number): Promise<CaptionWeightRecord[]> {
    const result = await this.db.query<CaptionWeightRecord>(
      'SELECT id, season_id AS "seasonId", caption, weight FROM caption_weights WHERE season_id = $1 ORDER BY caption',
      [seasonId]
    );
    return result.rows;
  }

  upsert(seasonId: number, caption: string, weight: number): Promise<CaptionWeightRecord> {
    return one<CaptionWeightRecord>(
      this.db,
      `INSERT INTO caption_weights (season_id, caption, weight) VALUES ($1, $2, $3)
       ON CONFLICT (season_id, caption) DO UPDATE SET weight = EXCLUDED.weight
       RETURNING id, season_id AS "seasonId", caption, weight`,
      [seasonId, caption, weight]
    );
  }
}

class PgHostLocationRepository implements HostLocationRepository {
  constructor(private readonly db: Queryable) {}

  async upsert(key: HostKey): Promise<HostLocationRecord> {
    const existing = await maybeOne<HostLocationRecord>(
      this.db,
      `SELECT id, name, city, state FROM hosts
       WHERE name = $1 AND city IS NOT DISTINCT FROM $2 AND state IS NOT DISTINCT FROM $3`,
      [key.name, key.city, key.state]
    );
    if (existing) return existing;
    return one<HostLocationRecord>(
      this.db,
      'INSERT INTO hosts (name, city, state) VALUES ($1, $2, $3) RETURNING id, name, city, state',
      [key.name, key.city, key.state]
    );
  }
}

class PgShowRepository implements ShowRepository {
  constructor(private readonly db: Queryable) {}

  findBySourceFile(sourceFile: string): Promise<ShowRecord | null> {
    return maybeOne<ShowRecord>(this.db, `SELECT ${SHOW_COLUMNS} FROM shows WHERE pdf_name = $1`, [sourceFile]);
  }

  async countEarlierInSeason(seasonId: number, date: ShowDate, excludeShowId?: number): Promise<number> {
    const row = await one<{ count: number }>(
      this.db,
      'SELECT COUNT(*)::int AS count FROM shows WHERE season_id = $1 AND date < $2 AND id IS DISTINCT FROM $3',
      [seasonId, date, excludeShowId ?? null]
    );
    return row.count;
  }

  async listForSeason(seasonId: number): Promise<ShowRecord[]> {
    const result = await this.db.query<ShowRecord>(
      `SELECT ${SHOW_COLUMNS} FROM shows WHERE season_id = $1 ORDER BY date, id`,
      [seasonId]
    );
    return result.rows;
  }

  insert(data: ShowData): Promise<ShowRecord> {
    return one<ShowRecord>(
      this.db,
      `INSERT INTO shows (name, date, season_id, host_id, week, pdf_name) VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${SHOW_COLUMNS}`,
      [data.name, data.date, data.seasonId, data.hostId, data.week, data.sourceFile]
    );
  }

  update(id: number, data: ShowData): Promise<ShowRecord> {
    return one<ShowRecord>(
      this.db,
      `UPDATE shows SET name = $2, date = $3, season_id = $4, host_id = $5, week = $6, pdf_name = $7
       WHERE id = $1 RETURNING ${SHOW_COLUMNS}`,
      [id, data.name, data.date, data.seasonId, data.hostId, data.week, data.sourceFile]
    );
  }

  async updateWeek(id: number, week: number): Promise<void> {
    await this.db.query('UPDATE shows SET week = $2 WHERE id = $1', [id, week]);
  }
}

class PgClassificationRepository implements ClassificationRepository {
  constructor(private readonly db: Queryable) {}

  async upsertByName(name: string): Promise<ClassificationRecord> {
    const existing = await maybeOne<ClassificationRecord>(
      this.db,
      'SELECT id, name FROM classifications WHERE name = $1',
      [name]
    );
    if (existing) return existing;
    return one<ClassificationRecord>(this.db, 'INSERT INTO classifications (name) VALUES ($1) RETURNING id, name', [
      name
    ]);
  }

  findById(id: number): Promise<ClassificationRecord | null> {
    return maybeOne<ClassificationRecord>(this.db, 'SELECT id, name FROM classifications WHERE id = $1', [id]);
  }
}

class PgGroupRepository implements GroupRepository {
  constructor(private readonly db: Queryable) {}

  async upsert(name: string, homeCity: string, classificationId: number | null): Promise<GroupRecord> {
    const existing = await maybeOne<GroupRecord>(
      this.db,
      `SELECT ${GROUP_COLUMNS} FROM groups WHERE name = $1 AND home_city = $2`,
      [name, homeCity]
    );
    if (!existing) {
      return one<GroupRecord>(
        this.db,
        `INSERT INTO groups (name, home_city, classification_id) VALUES ($1, $2, $3) RETURNING ${GROUP_COLUMNS}`,
        [name, homeCity, classificationId]
      );
    }
    if (existing.classificationId === classificationId) return existing;
    return one<GroupRecord>(
      this.db,
      `UPDATE groups SET classification_id = $2 WHERE id = $1 RETURNING ${GROUP_COLUMNS}`,
      [existing.id, classificationId]
    );
  }

  findById(id: number): Promise<GroupRecord | null> {
    return maybeOne<GroupRecord>(this.db, `SELECT ${GROUP_COLUMNS} FROM groups WHERE id = $1`, [id]);
  }
}

class PgPerformanceRepository implements PerformanceRepository {
  constructor(private readonly db: Queryable) {}

  async listForShow(showId: number): Promise<PerformanceRecord[]> {
    const result = await this.db.query<PerformanceRecord>(
      `SELECT ${PERFORMANCE_COLUMNS} FROM performances WHERE show_id = $1 ORDER BY id`,
      [showId]
    );
    return result.rows;
  }

  async deleteForShow(showId: number): Promise<number> {
    await this.db.query(
      'DELETE FROM caption_scores WHERE performance_id IN (SELECT id FROM performances WHERE show_id = $1)',
      [showId]
    );
    const result = await this.db.query('DELETE FROM performances WHERE show_id = $1', [showId]);
    return result.rowCount ?? 0;
  }

  insert(data: PerformanceData): Promise<PerformanceRecord> {
    return one<PerformanceRecord>(
      this.db,
      `INSERT INTO performances (show_id, group_id, classification_id, block_number, total_score, placement, penalty)
       VALUES ($1, $2, $3, $4, $5, $6, $7) RETURNING ${PERFORMANCE_COLUMNS}`,
      [
        data.showId,
        data.groupId,
        data.classificationId,
        data.blockNumber,
        data.totalScore,
        data.placement,
        data.penalty
      ]
    );
  }
}

class PgCaptionScoreRepository implements CaptionScoreRepository {
  constructor(private readonly db: Queryable) {}

  async listForPerformance(performanceId: number): Promise<CaptionScoreRecord[]> {
    const result = await this.db.query<CaptionScoreRecord>(
      `SELECT ${CAPTION_SCORE_COLUMNS} FROM caption_scores WHERE performance_id = $1 ORDER BY id`,
      [performanceId]
    );
    return result.rows;
  }

  insert(data: CaptionScoreData): Promise<CaptionScoreRecord> {
    return one<CaptionScoreRecord>(
      this.db,
      `INSERT INTO caption_scores (performance_id, caption, weight, comp_score, perf_score, placement, judge_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7) RETURNING ${CAPTION_SCORE_COLUMNS}`,
      [data.performanceId, data.caption, data.weight, data.compScore, data.perfScore, data.placement, data.judgeId]
    );
  }
}

export function createPgRepositories(db: Queryable): ScoreRepositories {
  return {
    seasons: new PgSeasonRepository(db),
    captionWeights: new PgCaptionWeightRepository(db),
    hosts: new PgHostLocationRepository(db),
    shows: new PgShowRepository(db),
    classifications: new PgClassificationRepository(db),
    groups: new PgGroupRepository(db),
    performances: new PgPerformanceRepository(db),
    captionScores: new PgCaptionScoreRepository(db)
  };
}
