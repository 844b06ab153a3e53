import * as stringSimilarity from 'string-similarity';

/**
 * Case- and whitespace-insensitive form used for every name comparison.
 */
export function normalizeName(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Dice coefficient over character bigrams of the normalized names, in [0, 1].
 */
export function similarity(a: string, b: string): number {
  return stringSimilarity.compareTwoStrings(normalizeName(a), normalizeName(b));
}

/**
 * Best candidate scoring at or above the threshold.
 * Ties go to the earliest candidate.
 */
export function closestMatch(
  name: string,
  candidates: Iterable<string>,
  threshold: number
): { candidate: string; score: number } | null {
  const pool = Array.from(candidates);
  if (pool.length === 0) return null;

  const { bestMatch, bestMatchIndex } = stringSimilarity.findBestMatch(
    normalizeName(name),
    pool.map((candidate) => normalizeName(candidate))
  );
  if (bestMatch.rating < threshold) return null;

  return { candidate: pool[bestMatchIndex], score: bestMatch.rating };
}
