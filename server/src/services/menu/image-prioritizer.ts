import type { ImagePriorityRule } from '../../config/pipeline.config.js';

/** Rank for URLs no rule matches: after every configured rank */
export const UNMATCHED_RANK = Number.POSITIVE_INFINITY;

export function rankImage(url: string, rules: readonly ImagePriorityRule[]): number {
  let rank = UNMATCHED_RANK;
  for (const rule of rules) {
    if (url.includes(rule.pattern) && rule.rank < rank) {
      rank = rule.rank;
    }
  }
  return rank;
}

/**
 * Order image URLs so the likeliest menu photos are classified first.
 * Stable within a rank; exact duplicates keep their first occurrence.
 */
export function prioritizeImages(urls: readonly string[], rules: readonly ImagePriorityRule[]): string[] {
  const unique = [...new Set(urls)];
  return unique
    .map((url, index) => ({ url, index, rank: rankImage(url, rules) }))
    .sort((a, b) => (a.rank === b.rank ? a.index - b.index : a.rank - b.rank))
    .map(entry => entry.url);
}
