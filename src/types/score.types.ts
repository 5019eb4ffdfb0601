// src/types/score.types.ts

/** Calendar date as `yyyy-MM-dd`. */
export type ShowDate = string;

export type CellText = string | null;

/** Raw grid from a table source; first two rows are the split header. */
export type RawTable = CellText[][];

export type CellValue = string | number | null;

export type TableRow = Record<string, CellValue>;

export interface NormalizedTable {
  columns: string[];
  rows: TableRow[];
}

export interface HeaderMeta {
  showName?: string;
  showDate?: ShowDate;
  location?: string;
  classificationText?: string;
}

export interface FileNameIdentity {
  showDate: ShowDate;
  hostId: string;
  weekday: string;
  city: string;
  state: string;
  showName: string;
}

export interface ClassificationBlock {
  name: string;
  block: number | null;
}

export interface CaptionCellParts {
  comp: number;
  perf: number;
  total: number;
  place: number;
}

export interface ShowIdentity {
  name: string;
  date: ShowDate;
  hostName: string;
  city: string | null;
  state: string | null;
  sourceFile: string;
}

export interface ParsedCaptionScore {
  caption: string;
  compScore: number;
  perfScore: number;
  placement: number;
}

export interface ParsedPerformance {
  groupName: string;
  homeCity: string;
  classification: string;
  blockNumber: number | null;
  totalScore: number;
  placement: number | null;
  penalty: number;
  captions: ParsedCaptionScore[];
}

export interface ParsedScoreSheet {
  identity: ShowIdentity;
  performances: ParsedPerformance[];
  pageCount: number;
  tableCount: number;
  droppedRows: number;
}

// Persisted records

export interface SeasonRecord {
  id: number;
  year: number;
}

export interface CaptionWeightRecord {
  id: number;
  seasonId: number;
  caption: string;
  weight: number;
}

export interface HostLocationRecord {
  id: number;
  name: string;
  city: string | null;
  state: string | null;
}

export interface ShowRecord {
  id: number;
  name: string;
  date: ShowDate;
  seasonId: number;
  hostId: number;
  week: number;
  sourceFile: string;
}

export type ShowData = Omit<ShowRecord, 'id'>;

export interface ClassificationRecord {
  id: number;
  name: string;
}

export interface GroupRecord {
  id: number;
  name: string;
  homeCity: string;
  classificationId: number | null;
}

export interface PerformanceRecord {
  id: number;
  showId: number;
  groupId: number;
  classificationId: number | null;
  blockNumber: number | null;
  totalScore: number;
  placement: number | null;
  penalty: number;
}

export type PerformanceData = Omit<PerformanceRecord, 'id'>;

export interface CaptionScoreRecord {
  id: number;
  performanceId: number;
  caption: string;
  weight: number;
  compScore: number | null;
  perfScore: number | null;
  placement: number | null;
  judgeId: number | null;
}

export type CaptionScoreData = Omit<CaptionScoreRecord, 'id'>;

export interface IngestResult {
  sourceFile: string;
  showId: number;
  showName: string;
  showDate: ShowDate;
  week: number;
  created: boolean;
  replacedPerformances: number;
  performances: number;
  captionScores: number;
  droppedRows: number;
}
