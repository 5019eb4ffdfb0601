import { RawTable } from '../../types/score.types';

export interface PageTextSource {
  getPageCount(pdfPath: string): Promise<number>;
  // Zero-based page index; empty string when the page has no text
  getPageText(pdfPath: string, pageIndex: number): Promise<string>;
}

export interface TableSource {
  // Zero or more raw grids for one zero-based page
  extractTables(pdfPath: string, pageIndex: number): Promise<RawTable[]>;
}
