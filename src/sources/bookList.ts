/**
 * Book list text files
 *
 * One book per line:
 *   Kepler, Lars (Bergisch Gladbach): Der Hypnotiseur (Band 1) (April 06) TOP!
 *   └ author ┘ └ place, optional ┘   └ title ──────────────┘ └ date ┘ └ note
 *
 * Quotes, blurb prose and anything without an "Author:" part are skipped.
 */

import { readFileSync } from 'fs';
import { InputError } from '../errors.js';
import { parseDate, isRecognized } from '../parsers/dateParser.js';
import { matchVolume } from '../parsers/titleSeries.js';
import type { RawEntry, YearMonth } from '../types.js';

// Copied listings sometimes still carry "   12→" line numbers
const LINE_NUMBER_PREFIX = /^\s*\d+→/;

const MIN_LINE_LENGTH = 15;

// Blurb lines copied along with the listings
const SKIP_PATTERNS: RegExp[] = [
  /^>>/,
  /^(?:Als|Ein|In|Sie|Er|Vom|Mit|Für|Auf|Seit|Nach|Während)\s/,
  /^Die\s+[A-ZÄÖÜ][a-zäöüß]+\s+/,
  /^[A-ZÄÖÜ][a-zäöüß]+,?\s+im\s+/,
];

const AUTHOR_WITH_PLACE = /^(.+?)\s*\(([^)]+)\)$/;
const PARENTHETICAL = /\(([^()]+)\)/g;
const FOUR_DIGIT_YEAR = /\b\d{4}\b/;

// Where the free-text remark after the title starts
const NOTE_MARKER = /\s(?=\p{Extended_Pictographic}|TOP!|super!|nee!|zum heulen|selbst\b|-[^-\s][^-]*-)/iu;

// A full year, or a month together with a year
function isFirmDate(text: string, date: YearMonth): boolean {
  return date.year !== null && (date.month !== null || FOUR_DIGIT_YEAR.test(text));
}

/**
 * Pick the reading date out of the parentheticals: the first firm date wins,
 * otherwise the first one that parses at all. Volume markers are never dates.
 */
function takeDate(text: string): { rest: string; rawDate: string } {
  let fallback: RegExpMatchArray | null = null;

  for (const match of text.matchAll(PARENTHETICAL)) {
    const inner = match[1].trim();
    if (matchVolume(inner) !== null) continue;

    const date = parseDate(inner);
    if (isFirmDate(inner, date)) return cutOut(text, match);
    if (!fallback && isRecognized(date)) fallback = match;
  }

  return fallback ? cutOut(text, fallback) : { rest: text, rawDate: '' };
}

function cutOut(text: string, match: RegExpMatchArray): { rest: string; rawDate: string } {
  const start = match.index ?? 0;
  const rest = `${text.slice(0, start)} ${text.slice(start + match[0].length)}`;
  return { rest, rawDate: match[1].trim() };
}

/**
 * Parse one listing line. Returns null for lines that are not listings.
 */
export function parseListLine(input: string): RawEntry | null {
  const line = input.replace(LINE_NUMBER_PREFIX, '').trim();

  if (line.length < MIN_LINE_LENGTH) return null;
  if (SKIP_PATTERNS.some(pattern => pattern.test(line))) return null;

  const colon = line.indexOf(':');
  if (colon < 0) return null;

  const authorPart = line.slice(0, colon).trim();
  const placed = authorPart.match(AUTHOR_WITH_PLACE);
  const author = placed ? placed[1].trim() : authorPart;
  if (!author) return null;

  const taken = takeDate(line.slice(colon + 1));
  const remainder = taken.rest.replace(/\s+/g, ' ').trim();

  const marker = NOTE_MARKER.exec(remainder);
  const rawTitle = (marker ? remainder.slice(0, marker.index) : remainder).trim();
  const rawNote = marker ? remainder.slice(marker.index).trim() : '';

  if (rawTitle.length < 2) return null;

  // No date in parentheses: a firm date written inside the note still counts
  let rawDate = taken.rawDate;
  if (!rawDate && rawNote && isFirmDate(rawNote, parseDate(rawNote))) {
    rawDate = rawNote;
  }

  const entry: RawEntry = { author, rawTitle, rawDate, rawNote };
  if (placed) entry.rawLocation = placed[2].trim();
  return entry;
}

export function parseBookList(content: string): RawEntry[] {
  const entries: RawEntry[] = [];
  for (const line of content.split(/\r?\n/)) {
    const entry = parseListLine(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

export function readBookListFile(path: string): RawEntry[] {
  try {
    return parseBookList(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new InputError(path, 'cannot be read', { cause: error });
  }
}
