/**
 * On-disk shape of a book record in books_database.json
 *
 * snake_case keys in a fixed order; absent values are written as null so the
 * display page always sees the same fields.
 */

import { z } from 'zod';
import type { CanonicalRecord } from '../types.js';

export const DatabaseRowSchema = z.object({
  author: z.string(),
  title: z.string(),
  series_volume: z.number().int().positive().nullable(),
  year: z.number().int().nullable(),
  month: z.number().int().min(1).max(12).nullable(),
  location: z.string().nullable(),
  notes: z.string().nullable(),
  description: z.string().nullable(),
  external_id: z.string().nullable(),
  publisher: z.string().nullable(),
  published_date: z.string().nullable(),
  page_count: z.number().int().nullable(),
  categories: z.array(z.string()),
  language: z.string().nullable(),
  isbn: z.string().nullable(),
  cover_url: z.string().nullable(),
});

export const DatabaseSchema = z.array(DatabaseRowSchema);

export type DatabaseRow = z.infer<typeof DatabaseRowSchema>;

export function toRow(record: CanonicalRecord): DatabaseRow {
  return {
    author: record.author,
    title: record.title,
    series_volume: record.seriesVolume,
    year: record.year,
    month: record.month,
    location: record.location,
    notes: record.notes,
    description: record.description,
    external_id: record.externalId,
    publisher: record.publisher,
    published_date: record.publishedDate,
    page_count: record.pageCount,
    categories: [...record.categories],
    language: record.language,
    isbn: record.isbn,
    cover_url: record.coverUrl,
  };
}

export function fromRow(row: DatabaseRow): CanonicalRecord {
  return {
    author: row.author,
    title: row.title,
    seriesVolume: row.series_volume,
    year: row.year,
    month: row.month,
    location: row.location,
    notes: row.notes,
    description: row.description,
    externalId: row.external_id,
    publisher: row.publisher,
    publishedDate: row.published_date,
    pageCount: row.page_count,
    categories: [...row.categories],
    language: row.language,
    isbn: row.isbn,
    coverUrl: row.cover_url,
  };
}
