/**
 * Database statistics for the end-of-run summary and the `stats` command
 */

import type { CanonicalRecord } from '../types.js';

export interface DatabaseStats {
  total: number;
  yearRange: { from: number; to: number } | null;
  withDescription: number;
  withCover: number;
  topAuthors: Array<{ author: string; count: number }>;
}

export function computeStats(records: readonly CanonicalRecord[], topN: number = 10): DatabaseStats {
  const years = records.flatMap(r => (r.year === null ? [] : [r.year]));

  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.author, (counts.get(record.author) ?? 0) + 1);
  }

  // Ties keep first-seen order (Map iteration order + stable sort)
  const topAuthors = [...counts.entries()]
    .map(([author, count]) => ({ author, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, topN);

  return {
    total: records.length,
    yearRange: years.length > 0 ? { from: Math.min(...years), to: Math.max(...years) } : null,
    withDescription: records.filter(r => r.description).length,
    withCover: records.filter(r => r.coverUrl).length,
    topAuthors,
  };
}

function percent(part: number, total: number): string {
  return total === 0 ? '0.0' : ((part / total) * 100).toFixed(1);
}

export function formatStats(stats: DatabaseStats): string[] {
  const lines = [`  Total books: ${stats.total}`];
  if (stats.yearRange) {
    lines.push(`  Date range: ${stats.yearRange.from} - ${stats.yearRange.to}`);
  }
  lines.push(`  Books with descriptions: ${stats.withDescription} (${percent(stats.withDescription, stats.total)}%)`);
  lines.push(`  Books with covers: ${stats.withCover} (${percent(stats.withCover, stats.total)}%)`);

  if (stats.topAuthors.length > 0) {
    lines.push('', `  Top ${stats.topAuthors.length} authors:`);
    for (const { author, count } of stats.topAuthors) {
      lines.push(`    ${author}: ${count} books`);
    }
  }
  return lines;
}
