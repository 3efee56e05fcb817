/**
 * Reading an existing books_database.json
 *
 * Used by the maintenance commands, and on reruns to keep enrichment that an
 * earlier run already fetched.
 */

import { existsSync, readFileSync } from 'fs';
import { InputError } from '../errors.js';
import { mergeEnrichment } from '../normalizer.js';
import { DatabaseSchema, fromRow } from './rows.js';
import type { CanonicalRecord } from '../types.js';

/**
 * Load a database file. Returns null when the file does not exist; throws
 * InputError when it exists but cannot be parsed.
 */
export function readDatabase(path: string): CanonicalRecord[] | null {
  if (!existsSync(path)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new InputError(path, 'not valid JSON', { cause: error });
  }

  const result = DatabaseSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InputError(path, `unexpected database shape at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}`);
  }

  return result.data.map(fromRow);
}

export function recordKey(record: Pick<CanonicalRecord, 'author' | 'title' | 'seriesVolume'>): string {
  return [record.author, record.title, record.seriesVolume ?? '']
    .map(part => String(part).normalize('NFC').trim().toLowerCase())
    .join('\u0000');
}

/**
 * Fill enrichment fields from a previous run's record for the same book.
 * Like enrichment itself, fields that are already set are left alone.
 */
export function carryOverEnrichment(
  records: CanonicalRecord[],
  previous: CanonicalRecord[]
): { records: CanonicalRecord[]; reused: number } {
  const byKey = new Map<string, CanonicalRecord>();
  for (const record of previous) {
    if (!byKey.has(recordKey(record))) byKey.set(recordKey(record), record);
  }

  let reused = 0;
  const merged = records.map(record => {
    const old = byKey.get(recordKey(record));
    if (!old) return record;
    reused++;
    return mergeEnrichment(record, old);
  });

  return { records: merged, reused };
}
