// src/parsers/PopplerPageTextSource.ts
import { PageTextSource } from './interfaces/IDocumentSource';
import { PdfToTextRunner } from './PdfToTextRunner';

const PAGE_BREAK = '\f';

/**
 * Page text via pdftotext -layout. The whole document is converted once and
 * split on form feeds; the most recent document is cached.
 */
export class PopplerPageTextSource implements PageTextSource {
  private cached: { pdfPath: string; pages: string[] } | null = null;

  constructor(private readonly run: PdfToTextRunner) {}

  async getPageCount(pdfPath: string): Promise<number> {
    const pages = await this.loadPages(pdfPath);
    return pages.length;
  }

  async getPageText(pdfPath: string, pageIndex: number): Promise<string> {
    const pages = await this.loadPages(pdfPath);
    return pages[pageIndex] ?? '';
  }

  private async loadPages(pdfPath: string): Promise<string[]> {
    if (this.cached?.pdfPath === pdfPath) {
      return this.cached.pages;
    }
    const output = await this.run(pdfPath, { layout: true });
    const pages = splitPages(output);
    this.cached = { pdfPath, pages };
    return pages;
  }
}

export function splitPages(output: string): string[] {
  const pages = output.split(PAGE_BREAK);
  // pdftotext ends every page, including the last, with a form feed
  if (pages.length > 1 && pages[pages.length - 1].trim() === '') {
    pages.pop();
  }
  return pages;
}
