/**
 * Preference re-ranking of search results
 *
 * Caller-supplied hints (metadata to match, a recency field) compute a boost
 * per result. Boosts only reorder results whose similarity scores are equal;
 * the primary similarity ordering is never changed.
 */

import { Metadata } from '../../types/chunk';
import { SearchResult } from '../../types/vector';
import { compareResults } from '../vectorstore/ranking';

// ============================================================================
// Types
// ============================================================================

export interface PreferenceHints {
  /** Metadata entries a result should carry; each exact match counts once */
  match?: Metadata;

  /** Metadata key holding an ISO date or epoch milliseconds; newer wins */
  recencyField?: string;
}

export interface PreferenceBoost {
  matches: number;
  recency: number;
}

// ============================================================================
// Boosts
// ============================================================================

function recencyOf(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  return Number.NEGATIVE_INFINITY;
}

export function computeBoost(result: SearchResult, hints: PreferenceHints): PreferenceBoost {
  const metadata = result.chunk.metadata;
  const matches = Object.entries(hints.match ?? {}).filter(
    ([key, value]) => metadata[key] === value
  ).length;
  const recency = hints.recencyField ? recencyOf(metadata[hints.recencyField]) : Number.NEGATIVE_INFINITY;

  return { matches, recency };
}

function compareDescending(a: number, b: number): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}

// ============================================================================
// Re-ranking
// ============================================================================

/**
 * Orders by score desc, then boost (matches, then recency) desc, then
 * chunk index, document path and id ascending
 */
export function rerankByPreferences(
  results: SearchResult[],
  hints?: PreferenceHints
): SearchResult[] {
  if (!hints || (!hints.match && !hints.recencyField)) {
    return [...results];
  }

  const boosts = new Map<SearchResult, PreferenceBoost>();
  for (const result of results) {
    boosts.set(result, computeBoost(result, hints));
  }

  const noBoost: PreferenceBoost = { matches: 0, recency: Number.NEGATIVE_INFINITY };

  return [...results].sort((a, b) => {
    const boostA = boosts.get(a) ?? noBoost;
    const boostB = boosts.get(b) ?? noBoost;

    return (
      compareDescending(a.score, b.score) ||
      compareDescending(boostA.matches, boostB.matches) ||
      compareDescending(boostA.recency, boostB.recency) ||
      compareResults(a, b)
    );
  });
}
