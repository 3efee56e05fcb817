/**
 * Bookshelf DB Configuration
 * Reading log normalizer and Google Books enrichment
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));

const DEFAULT_LOCATIONS_FILE = join(__dirname, '..', 'data', 'locations.json');

const LocationListSchema = z.array(z.string().min(1));

/**
 * Load the location allow-list used by the note classifier.
 * The file is a plain JSON array of place names.
 */
export function loadKnownLocations(path: string = DEFAULT_LOCATIONS_FILE): string[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return LocationListSchema.parse(parsed);
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

export const config = {
  // Input files, looked up in the input directory
  input: {
    dir: process.env.BOOKSHELF_INPUT_DIR || '.',
    preparsedFiles: ['preparsed1.txt', 'preparsed2.txt', 'preparsed3.txt', 'preparsed4.txt'],
    listFiles: ['books1.txt', 'books2.txt', 'books3.txt', 'books4.txt'],
  },

  // Output database for the display page
  output: {
    path: process.env.BOOKSHELF_OUTPUT || './books_database.json',
  },

  // Note classification
  locations: {
    file: process.env.BOOKSHELF_LOCATIONS_FILE || DEFAULT_LOCATIONS_FILE,
  },

  // Date parsing
  dates: {
    twoDigitYearPivot: 30,   // 00-30 → 20xx, 31-99 → 19xx
  },

  // Google Books
  googleBooks: {
    baseUrl: 'https://www.googleapis.com/books/v1/volumes',
    apiKey: process.env.GOOGLE_BOOKS_API_KEY || '',
    maxResults: 5,
    timeout: 10000,          // 10 seconds per request
    minIntervalMs: intFromEnv('BOOKSHELF_ENRICH_DELAY_MS', 500),
    weakMatchThreshold: 0.5, // log matches whose title similarity is below this
  },

  // Reruns reuse enrichment already present in the previous database
  enrichment: {
    reusePrevious: process.env.BOOKSHELF_REUSE_PREVIOUS !== 'false',
  },
};

export type Config = typeof config;
