/**
 * Date parsing tests
 */

import { describe, it, expect } from 'vitest';
import { parseDate, expandTwoDigitYear, isRecognized } from '../src/parsers/dateParser.js';

describe('parseDate', () => {
  it('reads ISO dates', () => {
    expect(parseDate('2015-11-06')).toEqual({ year: 2015, month: 11 });
    expect(parseDate('2019-03')).toEqual({ year: 2019, month: 3 });
  });

  it('keeps the year of an ISO date with an impossible month', () => {
    expect(parseDate('2015-13')).toEqual({ year: 2015, month: null });
  });

  it('reads German month names with a four-digit year', () => {
    expect(parseDate('Januar 2025')).toEqual({ year: 2025, month: 1 });
    expect(parseDate('März 2012')).toEqual({ year: 2012, month: 3 });
    expect(parseDate('MÄRZ 2012')).toEqual({ year: 2012, month: 3 });
    expect(parseDate('Dezember 2019')).toEqual({ year: 2019, month: 12 });
  });

  it('reads abbreviations with a trailing period', () => {
    expect(parseDate('Jan. 2014')).toEqual({ year: 2014, month: 1 });
    expect(parseDate('Okt. 2008')).toEqual({ year: 2008, month: 10 });
  });

  it('reads English month names', () => {
    expect(parseDate('May 2010')).toEqual({ year: 2010, month: 5 });
    expect(parseDate('October 99')).toEqual({ year: 1999, month: 10 });
  });

  it('expands two-digit years after a month name with the pivot', () => {
    expect(parseDate('April 06')).toEqual({ year: 2006, month: 4 });
    expect(parseDate('Mai 30')).toEqual({ year: 2030, month: 5 });
    expect(parseDate('Mai 31')).toEqual({ year: 1931, month: 5 });
    expect(parseDate('Aug 98')).toEqual({ year: 1998, month: 8 });
  });

  it('prefers a four-digit year over a day after the month', () => {
    expect(parseDate('Januar 12, 2025')).toEqual({ year: 2025, month: 1 });
    expect(parseDate('12. Januar 2025')).toEqual({ year: 2025, month: 1 });
  });

  it('takes a four-digit year written before the month', () => {
    expect(parseDate('2014 Jan')).toEqual({ year: 2014, month: 1 });
  });

  it('returns the month alone when no year is given', () => {
    expect(parseDate('März')).toEqual({ year: null, month: 3 });
    expect(parseDate('April 6')).toEqual({ year: null, month: 4 });
  });

  it('reads a bare four-digit year', () => {
    expect(parseDate('2019')).toEqual({ year: 2019, month: null });
    expect(parseDate('gelesen 2003')).toEqual({ year: 2003, month: null });
  });

  it('treats a lone two-digit number above 31 as a year', () => {
    expect(parseDate('98')).toEqual({ year: 1998, month: null });
  });

  it('ignores a lone number that could be a day', () => {
    expect(parseDate('12')).toEqual({ year: null, month: null });
  });

  it('returns nothing for empty or unrecognized text', () => {
    expect(parseDate('')).toEqual({ year: null, month: null });
    expect(parseDate('   ')).toEqual({ year: null, month: null });
    expect(parseDate(null)).toEqual({ year: null, month: null });
    expect(parseDate('irgendwann im Urlaub')).toEqual({ year: null, month: null });
  });

  it('does not treat object prototype keys as month names', () => {
    expect(parseDate('constructor 2010')).toEqual({ year: 2010, month: null });
  });

  it('accepts a custom pivot', () => {
    expect(parseDate('April 45', { pivot: 50 })).toEqual({ year: 2045, month: 4 });
    expect(parseDate('April 45')).toEqual({ year: 1945, month: 4 });
  });
});

describe('expandTwoDigitYear', () => {
  it('splits at the pivot', () => {
    expect(expandTwoDigitYear(0, 30)).toBe(2000);
    expect(expandTwoDigitYear(30, 30)).toBe(2030);
    expect(expandTwoDigitYear(31, 30)).toBe(1931);
  });
});

describe('isRecognized', () => {
  it('needs a year or a month', () => {
    expect(isRecognized({ year: null, month: null })).toBe(false);
    expect(isRecognized({ year: null, month: 4 })).toBe(true);
    expect(isRecognized({ year: 2001, month: null })).toBe(true);
  });
});
