import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseCommand, main } from '../src/cli.js';
import { RecordNormalizer } from '../src/normalizer.js';
import { NoteClassifier } from '../src/parsers/noteClassifier.js';
import type { InputFiles } from '../src/pipeline.js';

describe('parseCommand', () => {
  it('normalizes by default', () => {
    expect(parseCommand([])).toEqual({ name: 'run', mode: { kind: 'normalize' } });
    expect(parseCommand(['normalize'])).toEqual({ name: 'run', mode: { kind: 'normalize' } });
  });

  it('reads the enrich limit', () => {
    expect(parseCommand(['enrich'])).toEqual({ name: 'run', mode: { kind: 'enrich' } });
    expect(parseCommand(['enrich', '--limit=25'])).toEqual({ name: 'run', mode: { kind: 'enrich', limit: 25 } });
  });

  it('rejects an invalid limit', () => {
    expect(parseCommand(['enrich', '--limit=viele'])).toEqual({ name: 'unknown', input: '--limit=viele' });
    expect(parseCommand(['enrich', '--limit=-3'])).toEqual({ name: 'unknown', input: '--limit=-3' });
  });

  it('maps the remaining commands', () => {
    expect(parseCommand(['stats'])).toEqual({ name: 'stats' });
    expect(parseCommand(['upgrade-covers'])).toEqual({ name: 'upgrade-covers' });
    expect(parseCommand(['--help'])).toEqual({ name: 'help' });
    expect(parseCommand(['-h'])).toEqual({ name: 'help' });
    expect(parseCommand(['import'])).toEqual({ name: 'unknown', input: 'import' });
  });
});

describe('main', () => {
  let dir: string;
  let input: InputFiles;
  const normalizer = new RecordNormalizer(new NoteClassifier(['Sydney']));

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bookshelf-cli-'));
    input = { dir, preparsedFiles: [], listFiles: ['books1.txt'] };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('exits 0 after writing the database', async () => {
    writeFileSync(join(dir, 'books1.txt'), 'Schätzing, Frank: Der Schwarm (Mai 2005)\n');
    const outputPath = join(dir, 'books_database.json');

    expect(await main(['normalize'], { input, outputPath, normalizer })).toBe(0);
    expect(existsSync(outputPath)).toBe(true);
    expect(console.log).toHaveBeenCalledWith('  Total books: 1\n  Date range: 2005 - 2005\n  Books with descriptions: 0 (0.0%)\n  Books with covers: 0 (0.0%)\n\n  Top 1 authors:\n    Schätzing, Frank: 1 books');
  });

  it('exits 1 when no input file can be read', async () => {
    const outputPath = join(dir, 'books_database.json');
    expect(await main(['normalize'], { input, outputPath, normalizer })).toBe(1);
    expect(existsSync(outputPath)).toBe(false);
  });

  it('exits 1 when the database cannot be written', async () => {
    writeFileSync(join(dir, 'books1.txt'), 'Schätzing, Frank: Der Schwarm (Mai 2005)\n');
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');

    const code = await main(['normalize'], { input, outputPath: join(blocker, 'books_database.json'), normalizer });
    expect(code).toBe(1);
  });

  it('exits 1 for stats without a database', async () => {
    expect(await main(['stats'], { outputPath: join(dir, 'missing.json') })).toBe(1);
  });

  it('exits 2 for an unknown command', async () => {
    expect(await main(['bogus'], { input, outputPath: join(dir, 'books_database.json') })).toBe(2);
    expect(console.error).toHaveBeenCalledWith('Unknown command: bogus\n');
  });
});
