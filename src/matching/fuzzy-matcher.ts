/**
 * Fuzzy name matching - tolerates naming drift between manifest course
 * names and folder names on disk
 */

import { normalizeName } from '../naming.js';

export interface FuzzyMatch {
  candidate: string;
  score: number;
}

interface PreparedCandidate {
  original: string;
  normalized: string;
  sortedTokens: string;
}

/**
 * Length of the longest common subsequence, single-row dynamic programming
 */
function lcsLength(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  const row = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    let diagonal = 0;
    for (let j = 1; j <= b.length; j++) {
      const above = row[j];
      row[j] = a[i - 1] === b[j - 1] ? diagonal + 1 : Math.max(row[j], row[j - 1]);
      diagonal = above;
    }
  }

  return row[b.length];
}

/**
 * Indel similarity in [0, 100]
 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * lcsLength(a, b)) / total;
}

function sortTokens(value: string): string {
  return value.split(' ').filter(Boolean).sort().join(' ');
}

export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortTokens(a), sortTokens(b));
}

/**
 * Best ratio of the shorter string against every same-length window of the longer
 */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) return longer.length === 0 ? 100 : 0;
  if (longer.includes(shorter)) return 100;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    const score = ratio(shorter, longer.slice(start, start + shorter.length));
    if (score > best) {
      best = score;
      if (best === 100) break;
    }
  }
  return best;
}

/**
 * Weight applied to partial matches as the length gap grows
 */
function partialWeight(a: string, b: string): number {
  const shorter = Math.min(a.length, b.length);
  const longer = Math.max(a.length, b.length);
  if (shorter === 0) return 0;
  const lengthRatio = longer / shorter;
  if (lengthRatio < 1.5) return 1;
  if (lengthRatio <= 8) return 0.9;
  return 0.6;
}

/**
 * Similarity of two already-normalized names
 */
export function similarity(a: string, b: string, sortedA = sortTokens(a), sortedB = sortTokens(b)): number {
  const score = Math.max(
    ratio(a, b),
    ratio(sortedA, sortedB),
    partialRatio(a, b) * partialWeight(a, b)
  );
  return Math.round(score * 100) / 100;
}

function compareMatches(
  left: { score: number; candidate: PreparedCandidate },
  right: { score: number; candidate: PreparedCandidate }
): number {
  if (left.score !== right.score) return right.score - left.score;
  const lengthDelta = left.candidate.normalized.length - right.candidate.normalized.length;
  if (lengthDelta !== 0) return lengthDelta;
  if (left.candidate.normalized !== right.candidate.normalized) {
    return left.candidate.normalized < right.candidate.normalized ? -1 : 1;
  }
  if (left.candidate.original === right.candidate.original) return 0;
  return left.candidate.original < right.candidate.original ? -1 : 1;
}

/**
 * Candidate set normalized once and reused across many targets
 */
export class FuzzyMatcher {
  private readonly candidates: PreparedCandidate[];

  constructor(candidateNames: Iterable<string>) {
    const seen = new Set<string>();
    this.candidates = [];
    for (const original of candidateNames) {
      if (seen.has(original)) continue;
      seen.add(original);
      const normalized = normalizeName(original);
      this.candidates.push({ original, normalized, sortedTokens: sortTokens(normalized) });
    }
  }

  get size(): number {
    return this.candidates.length;
  }

  /**
   * All candidates scoring at or above the threshold, best first
   */
  rank(targetName: string, threshold: number): FuzzyMatch[] {
    const target = normalizeName(targetName);
    if (!target) return [];
    const sortedTarget = sortTokens(target);

    const scored: Array<{ score: number; candidate: PreparedCandidate }> = [];
    for (const candidate of this.candidates) {
      if (!candidate.normalized) continue;
      const score = similarity(target, candidate.normalized, sortedTarget, candidate.sortedTokens);
      if (score >= threshold) {
        scored.push({ score, candidate });
      }
    }

    return scored
      .sort(compareMatches)
      .map(({ score, candidate }) => ({ candidate: candidate.original, score }));
  }

  findBestMatch(targetName: string, threshold: number): FuzzyMatch | null {
    return this.rank(targetName, threshold)[0] ?? null;
  }
}

export function findBestMatch(
  targetName: string,
  candidateNames: Iterable<string>,
  threshold: number
): FuzzyMatch | null {
  return new FuzzyMatcher(candidateNames).findBestMatch(targetName, threshold);
}
