// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command suggestions for unrecognized input.
 *
 * Ranks registered names by normalized edit-distance similarity.
 */

export interface SuggestOptions {
  /** Maximum number of suggestions returned */
  max?: number;
  /** Minimum similarity (0-1) a candidate needs */
  threshold?: number;
}

export const DEFAULT_SUGGEST_OPTIONS: Required<SuggestOptions> = {
  max: 3,
  threshold: 0.6,
};

/**
 * Levenshtein edit distance between two strings.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Single rolling row
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      );
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Similarity in [0, 1]: 1 - distance / longer length, ignoring case.
 */
export function stringSimilarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left === right) return 1;
  if (left.length === 0 || right.length === 0) return 0;

  const distance = levenshteinDistance(left, right);
  return 1 - distance / Math.max(left.length, right.length);
}

/**
 * Return up to `max` candidates at or above `threshold`, most similar first.
 * Equal scores keep candidate order.
 */
export function suggest(
  token: string,
  candidates: Iterable<string>,
  options: SuggestOptions = {}
): string[] {
  const { max, threshold } = { ...DEFAULT_SUGGEST_OPTIONS, ...options };
  if (max <= 0) return [];

  const seen = new Set<string>();
  const scored: Array<{ name: string; score: number }> = [];

  for (const name of candidates) {
    if (seen.has(name)) continue;
    seen.add(name);

    const score = stringSimilarity(token, name);
    if (score >= threshold) {
      scored.push({ name, score });
    }
  }

  // Array.prototype.sort is stable, so ties stay in candidate order
  scored.sort((a, b) => b.score - a.score);

  return scored.slice(0, max).map((s) => s.name);
}
