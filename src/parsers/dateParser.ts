/**
 * Reading Date Parser
 * Turns the informal "when did I read it" text into a year and month.
 *
 * Recognized, in order:
 *   "2015-11-06", "2015-11"        → year + month
 *   "Januar 2025", "Jan. 14", ...   → month name (German or English) + year
 *   "2019"                          → year only
 *
 * Anything else yields { year: null, month: null }. Never throws.
 */

import { config } from '../config.js';
import type { YearMonth } from '../types.js';

const MONTH_NAMES = new Map<string, number>([
  // German, full and abbreviated
  ['januar', 1], ['jänner', 1], ['jan', 1],
  ['februar', 2], ['feb', 2],
  ['märz', 3], ['maerz', 3], ['mär', 3],
  ['april', 4], ['apr', 4],
  ['mai', 5],
  ['juni', 6], ['jun', 6],
  ['juli', 7], ['jul', 7],
  ['august', 8], ['aug', 8],
  ['september', 9], ['sept', 9], ['sep', 9],
  ['oktober', 10], ['okt', 10],
  ['november', 11], ['nov', 11],
  ['dezember', 12], ['dez', 12],
  // English
  ['january', 1], ['february', 2], ['march', 3], ['mar', 3],
  ['may', 5], ['june', 6], ['july', 7],
  ['october', 10], ['oct', 10], ['december', 12], ['dec', 12],
]);

const ISO_PATTERN = /\b(\d{4})-(\d{1,2})(?:-\d{1,2})?\b/;
const TOKEN_PATTERN = /\p{L}+|\d+/gu;
const FOUR_DIGITS = /^\d{4}$/;
const TWO_DIGITS = /^\d{2}$/;

const NOTHING: YearMonth = { year: null, month: null };

export interface DateParseOptions {
  /** Two-digit years up to and including this value map to 20xx, the rest to 19xx */
  pivot?: number;
}

export function expandTwoDigitYear(value: number, pivot: number = config.dates.twoDigitYearPivot): number {
  return value <= pivot ? 2000 + value : 1900 + value;
}

function isMonth(value: number): boolean {
  return value >= 1 && value <= 12;
}

/**
 * Parse a free-text reading date
 */
export function parseDate(text: string | null | undefined, options: DateParseOptions = {}): YearMonth {
  if (!text) return { ...NOTHING };

  const pivot = options.pivot ?? config.dates.twoDigitYearPivot;
  const normalized = text.normalize('NFC').trim().toLowerCase();
  if (!normalized) return { ...NOTHING };

  const iso = normalized.match(ISO_PATTERN);
  if (iso) {
    const month = parseInt(iso[2], 10);
    return { year: parseInt(iso[1], 10), month: isMonth(month) ? month : null };
  }

  const tokens = normalized.match(TOKEN_PATTERN) ?? [];

  for (let i = 0; i < tokens.length; i++) {
    const month = MONTH_NAMES.get(tokens[i]);
    if (month === undefined) continue;

    const following = tokens.slice(i + 1);
    const fullYear = following.find(t => FOUR_DIGITS.test(t));
    if (fullYear) {
      return { year: parseInt(fullYear, 10), month };
    }

    // Right after a month name a two-digit number is read as a year, never a day
    const shortYear = following.find(t => TWO_DIGITS.test(t));
    if (shortYear) {
      return { year: expandTwoDigitYear(parseInt(shortYear, 10), pivot), month };
    }

    const leadingYear = tokens.slice(0, i).find(t => FOUR_DIGITS.test(t));
    return { year: leadingYear ? parseInt(leadingYear, 10) : null, month };
  }

  const bareYear = tokens.find(t => FOUR_DIGITS.test(t));
  if (bareYear) {
    return { year: parseInt(bareYear, 10), month: null };
  }

  // No month anywhere: only a number that cannot be a day counts as a year
  const loneYear = tokens.find(t => TWO_DIGITS.test(t) && parseInt(t, 10) > 31);
  if (loneYear) {
    return { year: expandTwoDigitYear(parseInt(loneYear, 10), pivot), month: null };
  }

  return { ...NOTHING };
}

/** True when at least one of year or month was found */
export function isRecognized(date: YearMonth): boolean {
  return date.year !== null || date.month !== null;
}
