/**
 * Cover image URLs from Google Books image links
 */

import type { CanonicalRecord } from '../types.js';

export interface ImageLinks {
  smallThumbnail?: string;
  thumbnail?: string;
  small?: string;
  medium?: string;
  large?: string;
  extraLarge?: string;
}

// Largest first
const SIZE_PREFERENCE: Array<keyof ImageLinks> = [
  'extraLarge',
  'large',
  'medium',
  'small',
  'thumbnail',
  'smallThumbnail',
];

export function secureUrl(url: string): string {
  return url.replace(/^http:\/\//, 'https://');
}

/**
 * Pick the largest available cover, served over https
 */
export function pickCoverUrl(links: ImageLinks | undefined): string | null {
  if (!links) return null;
  for (const size of SIZE_PREFERENCE) {
    const url = links[size];
    if (url) return secureUrl(url);
  }
  return null;
}

/**
 * Google serves a higher resolution of the same cover at zoom=5.
 * Returns null when the URL has no zoom=1 parameter.
 */
export function upgradeCoverUrl(url: string): string | null {
  const upgraded = url.replace(/([?&])zoom=1(?!\d)/, '$1zoom=5');
  return upgraded === url ? null : upgraded;
}

/**
 * Upgrade every zoom=1 cover in a set of records
 */
export function upgradeRecordCovers(
  records: readonly CanonicalRecord[]
): { records: CanonicalRecord[]; upgraded: number } {
  let upgraded = 0;
  const result = records.map(record => {
    const better = record.coverUrl ? upgradeCoverUrl(record.coverUrl) : null;
    if (!better) return record;
    upgraded++;
    return { ...record, coverUrl: better };
  });
  return { records: result, upgraded };
}
