import { token_set_ratio } from 'fuzzball';

export type Matcher = (query: string, target: string) => boolean;

export interface MatchOptions {
  fuzzy: boolean;
  threshold?: number;
}

export const DEFAULT_FUZZY_THRESHOLD = 80;

export function exactMatch(query: string, target: string): boolean {
  return target.toLowerCase().includes(query.toLowerCase());
}

/** Token-set similarity in [0, 100]; insensitive to case and word order. */
export function similarity(query: string, target: string): number {
  return token_set_ratio(query.toLowerCase(), target.toLowerCase());
}

export function fuzzyMatch(query: string, target: string, threshold = DEFAULT_FUZZY_THRESHOLD): boolean {
  return similarity(query, target) >= threshold;
}

/**
 * Resolves the matching capability once; callers inject the result instead
 * of probing for fuzzy support on every comparison.
 */
export function createMatcher(options: MatchOptions): Matcher {
  if (!options.fuzzy) return exactMatch;
  const threshold = options.threshold ?? DEFAULT_FUZZY_THRESHOLD;
  return (query, target) => fuzzyMatch(query, target, threshold);
}
