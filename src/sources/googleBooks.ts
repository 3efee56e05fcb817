/**
 * Google Books API Integration
 *
 * Used for filling in what the reading log does not have: descriptions,
 * covers, ISBNs, publisher and page counts. One free-text lookup per record,
 * one request at a time, with a fixed pause between requests.
 *
 * Google Books requires no auth for basic queries; an API key raises the
 * daily quota.
 */

import * as cheerio from 'cheerio';
import stringSimilarity from 'string-similarity';
import { z } from 'zod';
import { config } from '../config.js';
import { EnrichmentError } from '../errors.js';
import { fetchWithTimeout, sleep, describeError, type FetchLike } from '../utils/resilience.js';
import { mergeEnrichment } from '../normalizer.js';
import { pickCoverUrl } from './covers.js';
import type { CanonicalRecord, EnrichmentFields, EnrichmentStatus } from '../types.js';

const USER_AGENT = 'BookshelfDB/0.1.0 (Reading Log Enrichment)';

// Only the fields we read; everything else in the payload is dropped
const VolumeSchema = z.object({
  id: z.string(),
  volumeInfo: z.object({
    title: z.string().optional(),
    authors: z.array(z.string()).optional(),
    publisher: z.string().optional(),
    publishedDate: z.string().optional(),
    description: z.string().optional(),
    industryIdentifiers: z.array(z.object({
      type: z.string(),
      identifier: z.string(),
    })).optional(),
    pageCount: z.number().optional(),
    categories: z.array(z.string()).optional(),
    language: z.string().optional(),
    imageLinks: z.object({
      smallThumbnail: z.string().optional(),
      thumbnail: z.string().optional(),
      small: z.string().optional(),
      medium: z.string().optional(),
      large: z.string().optional(),
      extraLarge: z.string().optional(),
    }).optional(),
  }),
});

const SearchResultSchema = z.object({
  totalItems: z.number().optional(),
  items: z.array(VolumeSchema).optional(),
});

export type GoogleBooksVolume = z.infer<typeof VolumeSchema>;

// =============================================================================
// Client
// =============================================================================

/**
 * Anything that can answer a free-text volume search
 */
export interface VolumeLookup {
  search(query: string): Promise<GoogleBooksVolume[]>;
}

export interface GoogleBooksClientOptions {
  baseUrl?: string;
  apiKey?: string;
  maxResults?: number;
  timeout?: number;
  fetchImpl?: FetchLike;
}

export class GoogleBooksClient implements VolumeLookup {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly maxResults: number;
  private readonly timeout: number;
  private readonly fetchImpl?: FetchLike;

  constructor(options: GoogleBooksClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.googleBooks.baseUrl;
    this.apiKey = options.apiKey ?? config.googleBooks.apiKey;
    this.maxResults = options.maxResults ?? config.googleBooks.maxResults;
    this.timeout = options.timeout ?? config.googleBooks.timeout;
    this.fetchImpl = options.fetchImpl;
  }

  buildUrl(query: string): string {
    let url = `${this.baseUrl}?q=${encodeURIComponent(query)}&maxResults=${this.maxResults}`;
    if (this.apiKey) {
      url += `&key=${encodeURIComponent(this.apiKey)}`;
    }
    return url;
  }

  async search(query: string): Promise<GoogleBooksVolume[]> {
    let response: Response;
    try {
      response = await fetchWithTimeout(this.buildUrl(query), {
        headers: { 'User-Agent': USER_AGENT },
        timeout: this.timeout,
        fetchImpl: this.fetchImpl,
      });
    } catch (error) {
      throw new EnrichmentError(`Request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new EnrichmentError(`API error: HTTP ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new EnrichmentError('Response is not JSON', { cause: error });
    }

    const parsed = SearchResultSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EnrichmentError(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    return parsed.data.items ?? [];
  }
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * Reduce description HTML (<p>, <br>, <b>, entities) to plain text
 */
export function cleanDescription(html: string): string {
  const withBreaks = html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/p>\s*/gi, '\n\n');

  return cheerio.load(withBreaks, null, false)
    .root()
    .text()
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** First result that actually has a title */
export function selectVolume(volumes: GoogleBooksVolume[]): GoogleBooksVolume | null {
  return volumes.find(v => (v.volumeInfo.title ?? '').trim().length > 0) ?? null;
}

export function extractEnrichment(volume: GoogleBooksVolume): EnrichmentFields {
  const vi = volume.volumeInfo;

  const isbn13 = vi.industryIdentifiers?.find(id => id.type === 'ISBN_13')?.identifier;
  const isbn10 = vi.industryIdentifiers?.find(id => id.type === 'ISBN_10')?.identifier;
  const description = vi.description ? cleanDescription(vi.description) : '';

  return {
    description: description || null,
    externalId: volume.id,
    publisher: vi.publisher || null,
    publishedDate: vi.publishedDate || null,
    pageCount: vi.pageCount !== undefined && Number.isInteger(vi.pageCount) && vi.pageCount > 0 ? vi.pageCount : null,
    categories: [...new Set(vi.categories ?? [])],
    language: vi.language || null,
    isbn: isbn13 ?? isbn10 ?? null,
    coverUrl: pickCoverUrl(vi.imageLinks),
  };
}

/** Records that already have a description and a cover are not looked up again */
export function needsEnrichment(record: CanonicalRecord): boolean {
  return !record.description || !record.coverUrl;
}

export function buildQuery(record: Pick<CanonicalRecord, 'title' | 'author'>): string {
  return `${record.title} ${record.author}`.trim();
}

// =============================================================================
// Enricher
// =============================================================================

export interface EnricherOptions {
  /** Minimum pause between the end of one request and the start of the next */
  minIntervalMs?: number;
  /** Title similarity below this is logged as a weak match */
  weakMatchThreshold?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface EnrichmentOutcome {
  record: CanonicalRecord;
  status: EnrichmentStatus;
}

export interface BatchEnrichResult {
  records: CanonicalRecord[];
  enriched: number;
  noMatch: number;
  failed: number;
  skipped: number;
}

export class Enricher {
  private lastRequestAt: number | null = null;
  private readonly minIntervalMs: number;
  private readonly weakMatchThreshold: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly lookup: VolumeLookup, options: EnricherOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? config.googleBooks.minIntervalMs;
    this.weakMatchThreshold = options.weakMatchThreshold ?? config.googleBooks.weakMatchThreshold;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  private async rateLimit(): Promise<void> {
    if (this.lastRequestAt === null) return;
    const elapsed = this.now() - this.lastRequestAt;
    if (elapsed < this.minIntervalMs) {
      await this.sleep(this.minIntervalMs - elapsed);
    }
  }

  private async search(query: string): Promise<GoogleBooksVolume[]> {
    await this.rateLimit();
    try {
      return await this.lookup.search(query);
    } finally {
      // Counted whether the request worked or not
      this.lastRequestAt = this.now();
    }
  }

  private warnOnWeakMatch(record: CanonicalRecord, volume: GoogleBooksVolume): void {
    const found = (volume.volumeInfo.title ?? '').toLowerCase();
    const score = stringSimilarity.compareTwoStrings(record.title.toLowerCase(), found);
    if (score < this.weakMatchThreshold) {
      console.warn(`[GoogleBooks] Weak match for "${record.title}": got "${volume.volumeInfo.title}" (${score.toFixed(2)})`);
    }
  }

  /**
   * Look up one record and merge what was found. Never throws: a failed
   * lookup returns the record unchanged.
   */
  async enrich(record: CanonicalRecord): Promise<EnrichmentOutcome> {
    if (!needsEnrichment(record)) {
      return { record, status: 'skipped' };
    }

    try {
      const volume = selectVolume(await this.search(buildQuery(record)));
      if (!volume) {
        console.warn(`[GoogleBooks] No match for "${record.title}" by ${record.author}`);
        return { record, status: 'no-match' };
      }

      this.warnOnWeakMatch(record, volume);
      return { record: mergeEnrichment(record, extractEnrichment(volume)), status: 'enriched' };
    } catch (error) {
      console.warn(`[GoogleBooks] Lookup failed for "${record.title}": ${describeError(error)}`);
      return { record, status: 'failed' };
    }
  }

  /**
   * Enrich records in order, one request at a time. With a limit, only the
   * first `limit` records are looked up; the rest pass through untouched.
   */
  async enrichAll(
    records: CanonicalRecord[],
    options: { limit?: number; onProgress?: (current: number, total: number, record: CanonicalRecord) => void } = {}
  ): Promise<BatchEnrichResult> {
    const limit = Math.min(options.limit ?? records.length, records.length);
    const result: BatchEnrichResult = { records: [], enriched: 0, noMatch: 0, failed: 0, skipped: 0 };

    for (let i = 0; i < records.length; i++) {
      if (i >= limit) {
        result.records.push(records[i]);
        continue;
      }

      options.onProgress?.(i + 1, limit, records[i]);
      const outcome = await this.enrich(records[i]);
      result.records.push(outcome.record);

      switch (outcome.status) {
        case 'enriched': result.enriched++; break;
        case 'no-match': result.noMatch++; break;
        case 'failed': result.failed++; break;
        case 'skipped': result.skipped++; break;
      }
    }

    return result;
  }
}
