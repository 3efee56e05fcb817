/**
 * Bookshelf DB Type Definitions
 */

// =============================================================================
// Source Data Types (raw entries read from the reading log)
// =============================================================================

/**
 * One unparsed book listing from a source file
 */
export interface RawEntry {
  author: string;
  rawTitle: string;
  rawDate: string;          // free text, may be empty
  rawNote: string;          // free text, may be empty
  description?: string;     // pre-parsed files sometimes carry one
  rawLocation?: string;     // "Author (Place):" in list files
}

// =============================================================================
// Canonical Types
// =============================================================================

/**
 * Fields filled from an external metadata lookup
 */
export interface EnrichmentFields {
  description: string | null;
  externalId: string | null;
  publisher: string | null;
  publishedDate: string | null;
  pageCount: number | null;
  categories: string[];     // empty when unknown
  language: string | null;
  isbn: string | null;
  coverUrl: string | null;
}

/**
 * Normalized, enrichment-eligible book record
 */
export interface CanonicalRecord extends EnrichmentFields {
  author: string;
  title: string;
  seriesVolume: number | null;
  year: number | null;
  month: number | null;     // 1-12
  location: string | null;
  notes: string | null;
}

/**
 * Result of date parsing; either part may be missing
 */
export interface YearMonth {
  year: number | null;
  month: number | null;
}

/**
 * Non-fatal parse issue; the affected field stays null
 */
export interface ParseWarning {
  field: 'date' | 'title';
  raw: string;
  message: string;
}

// =============================================================================
// Run Types
// =============================================================================

export type RunMode =
  | { kind: 'normalize' }
  | { kind: 'enrich'; limit?: number };

/**
 * Enrichment outcome per record
 */
export type EnrichmentStatus = 'enriched' | 'no-match' | 'failed' | 'skipped';

/**
 * Run summary
 */
export interface RunResult {
  records: CanonicalRecord[];
  loaded: number;
  written: number;
  enriched: number;
  enrichmentFailures: number;
  parseWarnings: number;
  outputPath: string;
  duration: number;         // milliseconds
}
