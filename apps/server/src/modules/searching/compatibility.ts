import { MAX_INTEREST_LENGTH, MAX_INTERESTS } from '@strangerline/shared';

/**
 * Jaccard overlap of two interest sets. An empty side scores 0: no declared
 * interests never disqualifies a pairing, it only fails to boost it.
 */
export const compatibilityScore = (
  left: Iterable<string>,
  right: Iterable<string>
): number => {
  const a = new Set(left);
  const b = new Set(right);
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const interest of a) {
    if (b.has(interest)) intersection += 1;
  }
  const union = a.size + b.size - intersection;
  return intersection / union;
};

export const normalizeInterests = (interests: readonly string[]): string[] => {
  const seen = new Set<string>();
  for (const raw of interests) {
    const interest = raw.trim().toLowerCase().slice(0, MAX_INTEREST_LENGTH);
    if (!interest) continue;
    seen.add(interest);
    if (seen.size >= MAX_INTERESTS) break;
  }
  return [...seen];
};

export type RankedCandidate<T> = {
  candidate: T;
  score: number;
};

// Array.prototype.sort is stable, so equal scores keep queue order.
export const rankCandidates = <T extends { interests: readonly string[] }>(
  interests: readonly string[],
  candidates: readonly T[]
): RankedCandidate<T>[] =>
  candidates
    .map((candidate) => ({
      candidate,
      score: compatibilityScore(interests, candidate.interests),
    }))
    .sort((a, b) => b.score - a.score);
