/**
 * Content Similarity Layer
 *
 * Cosine similarity between the user's factor weights and each candidate's
 * cached factor scores, plus a capped bonus for exact style-tag overlap.
 * Depends only on the current request, so it works without any history.
 */

import { factorVector } from "./factor-aggregator.js";
import {
  FACTOR_KEYS,
  type CandidateFactorScores,
  type FactorMatch,
  type ScoredCandidate,
  type UserFactorWeights,
  type ViableCandidate,
} from "./types.js";

export const STYLE_TAG_BONUS = 0.1;
export const STYLE_TAG_MAX_BONUS = 0.3;

/** Contributions at or below this are noise and left out of the match list. */
export const MIN_MATCH_CONTRIBUTION = 0.1;
export const MAX_MATCHING_FACTORS = 5;

function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/** Returns 0 when either vector has zero magnitude. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  if (magA === 0 || magB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

export function styleTagBonus(
  userTags: readonly string[],
  candidateTags: ReadonlySet<string>,
): number {
  if (userTags.length === 0 || candidateTags.size === 0) {
    return 0;
  }

  const wanted = new Set(userTags.map(normalizeTag));
  const offered = new Set([...candidateTags].map(normalizeTag));
  let matches = 0;
  for (const tag of offered) {
    if (wanted.has(tag)) {
      matches += 1;
    }
  }
  return Math.min(STYLE_TAG_MAX_BONUS, STYLE_TAG_BONUS * matches);
}

/**
 * Factors that drove the match, for explanations. Ties keep factor order.
 */
export function identifyMatches(
  userWeights: UserFactorWeights,
  factors: CandidateFactorScores,
): FactorMatch[] {
  const matches: FactorMatch[] = [];
  for (const factor of FACTOR_KEYS) {
    const contribution = userWeights[factor] * factors[factor];
    if (contribution > MIN_MATCH_CONTRIBUTION) {
      matches.push({
        factor,
        userWeight: userWeights[factor],
        candidateScore: factors[factor],
        contribution,
      });
    }
  }
  return matches
    .toSorted((a, b) => b.contribution - a.contribution)
    .slice(0, MAX_MATCHING_FACTORS);
}

export function scoreCandidates(
  viable: readonly ViableCandidate[],
  userWeights: UserFactorWeights,
  styleTags: readonly string[] = [],
): ScoredCandidate[] {
  const userVector = factorVector(userWeights);

  return viable.map((item) => {
    const cosine = clampUnit(cosineSimilarity(userVector, factorVector(item.candidate.factors)));
    const styleBonus = styleTagBonus(styleTags, item.candidate.entry.styleTags);
    return {
      ...item,
      cosine,
      styleBonus,
      contentSimilarity: clampUnit(cosine + styleBonus),
      matchingFactors: identifyMatches(userWeights, item.candidate.factors),
    };
  });
}
