/**
 * End-to-end batch runs against a temporary input directory
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { run, loadInputs, type InputFiles } from '../src/pipeline.js';
import { RecordNormalizer } from '../src/normalizer.js';
import { NoteClassifier } from '../src/parsers/noteClassifier.js';
import { Enricher, type GoogleBooksVolume, type VolumeLookup } from '../src/sources/googleBooks.js';
import { InputError } from '../src/errors.js';

let dir: string;
let input: InputFiles;
let outputPath: string;

const normalizer = new RecordNormalizer(new NoteClassifier(['Sydney']));

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'bookshelf-run-'));
  input = { dir, preparsedFiles: ['preparsed1.txt', 'preparsed2.txt'], listFiles: ['books1.txt'] };
  outputPath = join(dir, 'books_database.json');

  writeFileSync(join(dir, 'preparsed1.txt'), JSON.stringify([
    { author: 'Kepler, Lars', title: 'Der Hypnotiseur (Band 1)', date_read: 'April 06', notes: 'Sydney' },
    { author: 'Fitzek, Sebastian', title: 'Passagier 23', date_read: 'Januar 2025', notes: '3. Fall 😐' },
  ]));
  writeFileSync(join(dir, 'books1.txt'), 'Schätzing, Frank: Der Schwarm (Mai 2005)\n');

  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function readOutput(): Array<Record<string, unknown>> {
  return JSON.parse(readFileSync(outputPath, 'utf-8'));
}

describe('loadInputs', () => {
  it('reads existing files and skips missing ones', () => {
    const { entries, filesRead } = loadInputs(input);
    expect(filesRead).toBe(2);
    expect(entries.map(e => e.author)).toEqual(['Kepler, Lars', 'Fitzek, Sebastian', 'Schätzing, Frank']);
    expect(console.warn).toHaveBeenCalledWith('[Bookshelf] preparsed2.txt not found, skipping');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('skips a broken file and keeps going', () => {
    writeFileSync(join(dir, 'preparsed2.txt'), '[{');
    const { entries, filesRead } = loadInputs(input);
    expect(filesRead).toBe(2);
    expect(entries).toHaveLength(3);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('fails when no input file can be read', () => {
    const empty = mkdtempSync(join(tmpdir(), 'bookshelf-empty-'));
    try {
      expect(() => loadInputs({ ...input, dir: empty })).toThrow(InputError);
    } finally {
      rmSync(empty, { recursive: true, force: true });
    }
  });
});

describe('run', () => {
  it('normalizes and writes every record in date order', async () => {
    const result = await run({ mode: { kind: 'normalize' }, input, outputPath, normalizer, reusePrevious: false });

    expect(result.loaded).toBe(3);
    expect(result.written).toBe(3);
    expect(result.enriched).toBe(0);
    expect(result.parseWarnings).toBe(0);
    expect(result.records.map(r => r.title)).toEqual(['Der Hypnotiseur', 'Passagier 23', 'Der Schwarm']);

    const rows = readOutput();
    expect(rows.map(r => [r.title, r.year, r.month])).toEqual([
      ['Der Schwarm', 2005, 5],
      ['Der Hypnotiseur', 2006, 4],
      ['Passagier 23', 2025, 1],
    ]);
    expect(rows[1]).toMatchObject({ series_volume: 1, location: 'Sydney', notes: null });
    expect(rows[2]).toMatchObject({ location: null, notes: '3. Fall 😐' });
  });

  it('counts unrecognized dates as warnings and still writes the record', async () => {
    writeFileSync(join(dir, 'books1.txt'), 'Schätzing, Frank: Der Schwarm (Mai 2005)\n');
    writeFileSync(join(dir, 'preparsed1.txt'), JSON.stringify([
      { author: 'Kepler, Lars', title: 'Der Sandmann', date_read: 'irgendwann', notes: null },
    ]));

    const result = await run({ mode: { kind: 'normalize' }, input, outputPath, normalizer, reusePrevious: false });

    expect(result.parseWarnings).toBe(1);
    expect(readOutput().map(r => [r.title, r.year])).toEqual([['Der Schwarm', 2005], ['Der Sandmann', null]]);
  });

  it('rejects when nothing can be loaded', async () => {
    const empty = mkdtempSync(join(tmpdir(), 'bookshelf-empty-'));
    try {
      await expect(run({ mode: { kind: 'normalize' }, input: { ...input, dir: empty }, outputPath, normalizer }))
        .rejects.toThrow(InputError);
    } finally {
      rmSync(empty, { recursive: true, force: true });
    }
  });

  it('enriches only the first N records and reuses the result later', async () => {
    const volume: GoogleBooksVolume = {
      id: 'vol-1',
      volumeInfo: { title: 'Der Hypnotiseur', publisher: 'Lübbe', pageCount: 512 },
    };
    const search = vi.fn(async (_query: string) => [volume]);
    const lookup: VolumeLookup = { search };
    const enricher = new Enricher(lookup, { minIntervalMs: 0, sleep: async () => {} });

    const enriched = await run({
      mode: { kind: 'enrich', limit: 1 }, input, outputPath, normalizer, enricher, reusePrevious: false,
    });

    expect(search).toHaveBeenCalledTimes(1);
    expect(search).toHaveBeenCalledWith('Der Hypnotiseur Kepler, Lars');
    expect(enriched.enriched).toBe(1);
    expect(enriched.enrichmentFailures).toBe(0);
    expect(readOutput().map(r => r.publisher)).toEqual([null, 'Lübbe', null]);

    await run({ mode: { kind: 'normalize' }, input, outputPath, normalizer, reusePrevious: true });

    const rows = readOutput();
    expect(rows[1]).toMatchObject({ title: 'Der Hypnotiseur', external_id: 'vol-1', page_count: 512 });
    expect(rows[0].external_id).toBeNull();
  });
});
