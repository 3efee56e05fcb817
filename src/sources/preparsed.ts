/**
 * Pre-parsed reading log files
 * JSON arrays of { author, title, date_read, notes, description }
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { InputError } from '../errors.js';
import type { RawEntry } from '../types.js';

const PreparsedEntrySchema = z.object({
  author: z.string(),
  title: z.string(),
  date_read: z.string().nullish(),
  notes: z.string().nullish(),
  description: z.string().nullish(),
});

const PreparsedFileSchema = z.array(PreparsedEntrySchema);

export type PreparsedEntry = z.infer<typeof PreparsedEntrySchema>;

export function toRawEntry(entry: PreparsedEntry): RawEntry {
  const raw: RawEntry = {
    author: entry.author,
    rawTitle: entry.title,
    rawDate: entry.date_read ?? '',
    rawNote: entry.notes ?? '',
  };
  if (entry.description) raw.description = entry.description;
  return raw;
}

export function parsePreparsed(content: string, file: string): RawEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InputError(file, 'not valid JSON', { cause: error });
  }

  const result = PreparsedFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InputError(file, `entry ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}`);
  }

  return result.data.map(toRawEntry);
}

export function readPreparsedFile(path: string): RawEntry[] {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new InputError(path, 'cannot be read', { cause: error });
  }
  return parsePreparsed(content, path);
}
