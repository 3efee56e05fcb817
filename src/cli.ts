/**
 * Command line: argument parsing and command dispatch
 */

import { config } from './config.js';
import { run, type InputFiles } from './pipeline.js';
import { readDatabase } from './database/reader.js';
import { writeDatabase } from './database/writer.js';
import { computeStats, formatStats } from './database/stats.js';
import { upgradeRecordCovers } from './sources/covers.js';
import { InputError, WriteError } from './errors.js';
import type { RecordNormalizer } from './normalizer.js';
import type { RunMode } from './types.js';

export type Command =
  | { name: 'run'; mode: RunMode }
  | { name: 'stats' }
  | { name: 'upgrade-covers' }
  | { name: 'help' }
  | { name: 'unknown'; input: string };

function flagValue(args: string[], flag: string): string | undefined {
  return args.find(a => a.startsWith(`--${flag}=`))?.split('=').slice(1).join('=');
}

export function parseCommand(args: string[]): Command {
  const command = args[0] || 'normalize';

  switch (command) {
    case 'normalize':
      return { name: 'run', mode: { kind: 'normalize' } };

    case 'enrich': {
      // enrich [--limit=N]: normalize everything, look up the first N
      const raw = flagValue(args, 'limit');
      if (raw === undefined) {
        return { name: 'run', mode: { kind: 'enrich' } };
      }
      const limit = parseInt(raw, 10);
      if (Number.isNaN(limit) || limit < 0) {
        return { name: 'unknown', input: `--limit=${raw}` };
      }
      return { name: 'run', mode: { kind: 'enrich', limit } };
    }

    case 'stats':
      return { name: 'stats' };

    case 'upgrade-covers':
      return { name: 'upgrade-covers' };

    case 'help':
    case '--help':
    case '-h':
      return { name: 'help' };

    default:
      return { name: 'unknown', input: command };
  }
}

export const USAGE = [
  'Usage: bookshelf-db <command>',
  '',
  '  normalize            Parse input files and write the database (no API calls)',
  '  enrich               Parse and fill missing data from Google Books',
  '  enrich --limit=N     Same, but only look up the first N books',
  '  stats                Show statistics of the existing database',
  '  upgrade-covers       Switch zoom=1 cover URLs to zoom=5',
];

export interface CliOptions {
  input?: InputFiles;
  outputPath?: string;
  normalizer?: RecordNormalizer;
}

/**
 * Run one command and return the process exit code:
 * 0 on success, 1 on input or write failures, 2 for an unknown command.
 */
export async function main(args: string[], options: CliOptions = {}): Promise<number> {
  const command = parseCommand(args);
  const outputPath = options.outputPath ?? config.output.path;

  console.log('═'.repeat(60));
  console.log('📚 Bookshelf DB - Reading Log Database Builder');
  console.log('═'.repeat(60));

  try {
    switch (command.name) {
      case 'run':
        return await runBuild(command.mode, { ...options, outputPath });

      case 'stats':
        return showStats(outputPath);

      case 'upgrade-covers':
        return upgradeCovers(outputPath);

      case 'help':
        console.log(USAGE.join('\n'));
        return 0;

      case 'unknown':
        console.error(`Unknown command: ${command.input}\n`);
        console.log(USAGE.join('\n'));
        return 2;
    }
  } catch (error) {
    if (error instanceof InputError || error instanceof WriteError) {
      console.error(`\n❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}

async function runBuild(mode: RunMode, options: CliOptions & { outputPath: string }): Promise<number> {
  if (mode.kind === 'normalize') {
    console.log('⚡ Quick parse mode - no API calls');
  } else if (mode.limit !== undefined) {
    console.log(`🧪 Enriching the first ${mode.limit} books from Google Books`);
  } else {
    console.log('🌐 Full enrichment mode - missing data from Google Books');
  }
  console.log('');

  const result = await run({
    mode,
    input: options.input,
    outputPath: options.outputPath,
    normalizer: options.normalizer,
  });

  console.log('');
  console.log('═'.repeat(60));
  console.log('✅ Processing complete!');
  console.log('═'.repeat(60));
  console.log(`📁 Saved to: ${result.outputPath}`);
  console.log(`  Entries loaded:      ${result.loaded}`);
  console.log(`  Unparsed dates:      ${result.parseWarnings}`);
  if (mode.kind === 'enrich') {
    console.log(`  Enriched:            ${result.enriched}`);
    console.log(`  Lookups failed:      ${result.enrichmentFailures}`);
  }
  console.log(`  Duration:            ${(result.duration / 1000).toFixed(1)}s`);
  console.log('');
  console.log('📊 Statistics:');
  console.log(formatStats(computeStats(result.records)).join('\n'));
  console.log('═'.repeat(60));
  return 0;
}

function showStats(path: string): number {
  const records = readDatabase(path);
  if (!records) {
    console.error(`[Bookshelf] ${path} not found - run "normalize" first`);
    return 1;
  }
  console.log(formatStats(computeStats(records)).join('\n'));
  return 0;
}

function upgradeCovers(path: string): number {
  const records = readDatabase(path);
  if (!records) {
    console.error(`[Bookshelf] ${path} not found - run "normalize" first`);
    return 1;
  }

  const result = upgradeRecordCovers(records);
  writeDatabase(result.records, path);

  console.log(`✅ Upgraded ${result.upgraded} cover URLs to higher quality (zoom=5)`);
  console.log(`🖼️  Books with covers: ${result.records.filter(r => r.coverUrl).length}`);
  return 0;
}
