// src/utils/errors.ts

export type ErrorContext = Record<string, string | number | null | undefined>;

export class IngestError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
  }
}

/** A file name or page header cannot yield the required show identity. */
export class FormatError extends IngestError {}

/** Raw table geometry is inconsistent, e.g. ragged header rows. */
export class StructureError extends IngestError {}

/** A composite score cell does not hold the fixed four-value layout. */
export class ParseError extends IngestError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
