/**
 * Fuzzy matching using Levenshtein distance
 * Only used for "did you mean" hints; resolution itself is exact on the
 * normalized key.
 */

export type Confidence = 'exact' | 'high' | 'medium' | 'low';

export interface FuzzyMatchResult {
  match: string;
  distance: number;
  confidence: Confidence;
}

/**
 * Edit distance between two strings
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Two rolling rows of the distance matrix
  let previous = Array.from({ length: a.length + 1 }, (_, j) => j);
  for (let i = 1; i <= b.length; i++) {
    const current = [i];
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        current[j] = previous[j - 1];
      } else {
        current[j] = Math.min(
          previous[j - 1] + 1, // substitution
          current[j - 1] + 1, // insertion
          previous[j] + 1 // deletion
        );
      }
    }
    previous = current;
  }

  return previous[a.length];
}

function getConfidence(distance: number): Confidence {
  if (distance === 0) return 'exact';
  if (distance === 1) return 'high';
  if (distance === 2) return 'medium';
  return 'low';
}

/**
 * Closest candidate within `maxDistance`, first one wins on ties
 */
export function findBestMatch(
  input: string,
  candidates: string[],
  maxDistance: number = 2
): FuzzyMatchResult | null {
  let bestMatch: string | null = null;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const distance = levenshteinDistance(input, candidate);
    if (distance < bestDistance) {
      bestDistance = distance;
      bestMatch = candidate;
    }
    if (distance === 0) break;
  }

  if (bestMatch === null || bestDistance > maxDistance) {
    return null;
  }

  return {
    match: bestMatch,
    distance: bestDistance,
    confidence: getConfidence(bestDistance),
  };
}
