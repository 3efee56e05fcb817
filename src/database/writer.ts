/**
 * Bookshelf DB Writer
 * Sorts records by reading date and writes books_database.json
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { WriteError } from '../errors.js';
import { toRow } from './rows.js';
import type { CanonicalRecord } from '../types.js';

// Unknown year/month sorts after every known one
function compareNullable(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

export function compareByDate(a: CanonicalRecord, b: CanonicalRecord): number {
  return compareNullable(a.year, b.year) || compareNullable(a.month, b.month);
}

/**
 * Sorted copy; records with equal dates keep their input order
 */
export function sortRecords(records: readonly CanonicalRecord[]): CanonicalRecord[] {
  return [...records].sort(compareByDate);
}

export function serializeDatabase(records: readonly CanonicalRecord[]): string {
  return JSON.stringify(sortRecords(records).map(toRow), null, 2) + '\n';
}

/**
 * Write the database, replacing any existing file.
 * Throws WriteError when the directory or file cannot be written.
 */
export function writeDatabase(records: readonly CanonicalRecord[], path: string): number {
  const content = serializeDatabase(records);

  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, 'utf-8');
  } catch (error) {
    throw new WriteError(path, { cause: error });
  }

  console.log(`[Writer] Saved ${records.length} books to ${path}`);
  return records.length;
}
