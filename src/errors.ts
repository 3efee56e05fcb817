/**
 * Error types
 *
 * Parse problems are never errors (see ParseWarning in types.ts). Enrichment
 * failures stay per record; a WriteError ends the run.
 */

/** A lookup against the metadata source failed for one record */
export class EnrichmentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnrichmentError';
  }
}

/** One input file could not be read or did not have the expected shape */
export class InputError extends Error {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`${file}: ${message}`, options);
    this.name = 'InputError';
    this.file = file;
  }
}

/** The output database could not be created or written */
export class WriteError extends Error {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Cannot write database to ${path}${reason}`, options);
    this.name = 'WriteError';
    this.path = path;
  }
}
