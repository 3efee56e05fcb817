/**
 * Bookshelf DB pipeline
 * load → normalize → (enrich) → write
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { config, loadKnownLocations } from './config.js';
import { InputError } from './errors.js';
import { RecordNormalizer } from './normalizer.js';
import { NoteClassifier } from './parsers/noteClassifier.js';
import { readPreparsedFile } from './sources/preparsed.js';
import { readBookListFile } from './sources/bookList.js';
import { Enricher, GoogleBooksClient } from './sources/googleBooks.js';
import { readDatabase, carryOverEnrichment } from './database/reader.js';
import { writeDatabase } from './database/writer.js';
import { describeError } from './utils/resilience.js';
import type { CanonicalRecord, RawEntry, RunMode, RunResult } from './types.js';

export interface InputFiles {
  dir: string;
  preparsedFiles: string[];
  listFiles: string[];
}

export interface LoadedInputs {
  entries: RawEntry[];
  filesRead: number;
}

/**
 * Read every configured input file that exists. A missing or broken file is
 * reported and skipped; no readable file at all is an InputError.
 */
export function loadInputs(files: InputFiles = config.input): LoadedInputs {
  const entries: RawEntry[] = [];
  let filesRead = 0;

  const sources: Array<[string[], (path: string) => RawEntry[]]> = [
    [files.preparsedFiles, readPreparsedFile],
    [files.listFiles, readBookListFile],
  ];

  for (const [names, read] of sources) {
    for (const name of names) {
      const path = join(files.dir, name);
      if (!existsSync(path)) {
        console.warn(`[Bookshelf] ${name} not found, skipping`);
        continue;
      }

      try {
        const found = read(path);
        console.log(`[Bookshelf] Loaded ${found.length} entries from ${name}`);
        entries.push(...found);
        filesRead++;
      } catch (error) {
        console.error(`[Bookshelf] Skipping ${name}: ${describeError(error)}`);
      }
    }
  }

  if (filesRead === 0) {
    throw new InputError(files.dir, 'no readable input files');
  }

  return { entries, filesRead };
}

export function normalizeEntries(
  entries: readonly RawEntry[],
  normalizer: RecordNormalizer
): { records: CanonicalRecord[]; warnings: number } {
  const records: CanonicalRecord[] = [];
  let warnings = 0;

  for (const entry of entries) {
    const normalized = normalizer.normalizeWithWarnings(entry);
    for (const warning of normalized.warnings) {
      console.warn(`[Bookshelf] ${entry.author}: ${entry.rawTitle}: ${warning.message} ("${warning.raw}")`);
    }
    warnings += normalized.warnings.length;
    records.push(normalized.record);
  }

  return { records, warnings };
}

export interface RunOptions {
  mode: RunMode;
  input?: InputFiles;
  outputPath?: string;
  normalizer?: RecordNormalizer;
  enricher?: Enricher;
  reusePrevious?: boolean;
}

export function defaultNormalizer(): RecordNormalizer {
  return new RecordNormalizer(
    new NoteClassifier(loadKnownLocations(config.locations.file)),
    { pivot: config.dates.twoDigitYearPivot }
  );
}

/**
 * One complete batch run. Throws InputError when nothing could be loaded and
 * WriteError when the output cannot be written; everything else is logged.
 */
export async function run(options: RunOptions): Promise<RunResult> {
  const started = Date.now();
  const outputPath = options.outputPath ?? config.output.path;
  const normalizer = options.normalizer ?? defaultNormalizer();

  const { entries } = loadInputs(options.input);
  console.log(`[Bookshelf] Total entries loaded: ${entries.length}`);

  const normalized = normalizeEntries(entries, normalizer);
  let records = normalized.records;

  if (options.reusePrevious ?? config.enrichment.reusePrevious) {
    try {
      const previous = readDatabase(outputPath);
      if (previous) {
        const carried = carryOverEnrichment(records, previous);
        records = carried.records;
        console.log(`[Bookshelf] Reused enrichment for ${carried.reused} books from ${outputPath}`);
      }
    } catch (error) {
      console.warn(`[Bookshelf] Ignoring previous database: ${describeError(error)}`);
    }
  }

  let enriched = 0;
  let enrichmentFailures = 0;

  if (options.mode.kind === 'enrich') {
    const enricher = options.enricher ?? new Enricher(new GoogleBooksClient());
    const batch = await enricher.enrichAll(records, {
      limit: options.mode.limit,
      onProgress: (current, total, record) => {
        console.log(`[${current}/${total}] ${record.author}: ${record.title}`);
      },
    });
    records = batch.records;
    enriched = batch.enriched;
    enrichmentFailures = batch.failed + batch.noMatch;
    console.log(`[GoogleBooks] Enriched ${batch.enriched}, no match ${batch.noMatch}, failed ${batch.failed}, already complete ${batch.skipped}`);
  }

  const written = writeDatabase(records, outputPath);

  return {
    records,
    loaded: entries.length,
    written,
    enriched,
    enrichmentFailures,
    parseWarnings: normalized.warnings,
    outputPath,
    duration: Date.now() - started,
  };
}
