/**
 * Record normalization
 * RawEntry → CanonicalRecord. Pure: no I/O, same input gives the same record.
 */

import { parseDate, isRecognized, type DateParseOptions } from './parsers/dateParser.js';
import { extractSeries } from './parsers/titleSeries.js';
import type { NoteClassifier } from './parsers/noteClassifier.js';
import type { CanonicalRecord, EnrichmentFields, ParseWarning, RawEntry } from './types.js';

export interface NormalizedEntry {
  record: CanonicalRecord;
  warnings: ParseWarning[];
}

export function emptyEnrichment(): EnrichmentFields {
  return {
    description: null,
    externalId: null,
    publisher: null,
    publishedDate: null,
    pageCount: null,
    categories: [],
    language: null,
    isbn: null,
    coverUrl: null,
  };
}

/**
 * Add enrichment fields to a record. A field the record already has is never
 * replaced.
 */
export function mergeEnrichment(record: CanonicalRecord, found: EnrichmentFields): CanonicalRecord {
  return {
    ...record,
    description: record.description ?? found.description,
    externalId: record.externalId ?? found.externalId,
    publisher: record.publisher ?? found.publisher,
    publishedDate: record.publishedDate ?? found.publishedDate,
    pageCount: record.pageCount ?? found.pageCount,
    categories: record.categories.length > 0 ? record.categories : found.categories,
    language: record.language ?? found.language,
    isbn: record.isbn ?? found.isbn,
    coverUrl: record.coverUrl ?? found.coverUrl,
  };
}

export class RecordNormalizer {
  constructor(
    private readonly classifier: NoteClassifier,
    private readonly dateOptions: DateParseOptions = {}
  ) {}

  normalize(entry: RawEntry): CanonicalRecord {
    return this.normalizeWithWarnings(entry).record;
  }

  normalizeWithWarnings(entry: RawEntry): NormalizedEntry {
    const warnings: ParseWarning[] = [];

    const date = parseDate(entry.rawDate, this.dateOptions);
    if (entry.rawDate.trim() && !isRecognized(date)) {
      warnings.push({ field: 'date', raw: entry.rawDate, message: 'date not recognized' });
    }

    const { title, seriesVolume } = extractSeries(entry.rawTitle);
    if (!title) {
      warnings.push({ field: 'title', raw: entry.rawTitle, message: 'empty title' });
    }

    const { location, notes } = this.classifier.classify(entry.rawNote);
    const description = entry.description?.trim();

    const record: CanonicalRecord = {
      author: entry.author.trim(),
      title,
      seriesVolume,
      year: date.year,
      month: date.month,
      location: location ?? (entry.rawLocation?.trim() || null),
      notes,
      ...emptyEnrichment(),
      description: description || null,
    };

    return { record, warnings };
  }
}
