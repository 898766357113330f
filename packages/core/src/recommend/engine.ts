/**
 * Recommendation Engine
 *
 * The single public entry point. Runs constraint filtering, the resolution
 * cascade when nothing survives, content scoring and TOPSIS ranking, and
 * records a reasoning trace for the caller to render.
 *
 * Every stage is a deterministic pure function, so nothing here is retried:
 * the same request always yields the same result.
 */

import { filterCandidates } from "./constraint-layer.js";
import { scoreCandidates } from "./content-layer.js";
import { aggregateUser } from "./factor-aggregator.js";
import { DEFAULT_RANKING_WEIGHTS, rankCandidates, type RankingWeights } from "./ranking-layer.js";
import { DEFAULT_MARGINAL_TOLERANCE, resolveEmptyPool } from "./resolution-cascade.js";
import type {
  CandidateCatalog,
  CatalogCandidate,
  HardwareSnapshot,
  RankedCandidate,
  RecommendationResult,
  RejectionReason,
  UserPreferences,
  ViableCandidate,
} from "./types.js";

export interface RecommendationRequest {
  hardware: HardwareSnapshot;
  catalog: CandidateCatalog;
  preferences: UserPreferences;
  rankingWeights?: RankingWeights;
  marginalTolerance?: number;
}

export function isEligible(candidate: CatalogCandidate, preferences: UserPreferences): boolean {
  const { entry } = candidate;
  if (preferences.commercialOnly && !entry.commercialUse) {
    return false;
  }
  if (preferences.modalities && preferences.modalities.length > 0) {
    return preferences.modalities.includes(entry.modality);
  }
  return true;
}

/** Entries the strict pass considers. Fallback-only entries wait for substitution. */
export function buildCandidatePool(
  catalog: CandidateCatalog,
  preferences: UserPreferences,
): CatalogCandidate[] {
  return catalog.candidates.filter(
    (candidate) => !candidate.entry.fallbackOnly && isEligible(candidate, preferences),
  );
}

function formatScore(value: number): string {
  return value.toFixed(3);
}

export function describeRejection(rejection: RejectionReason): string {
  return `Rejected ${rejection.candidateId} [${rejection.constraint}]: ${rejection.message}`;
}

export function describeRanked(item: RankedCandidate): string {
  const { criteria } = item;
  const parts = [
    `Ranked #${item.rank} ${item.candidate.entry.id}: closeness ${formatScore(item.closenessScore)}`,
    `similarity ${formatScore(item.contentSimilarity)} (cosine ${formatScore(item.cosine)} + style ${formatScore(item.styleBonus)})`,
    `hardware fit ${formatScore(criteria.hardwareFit)}`,
    `approach fit ${formatScore(criteria.approachFit)}`,
    `maturity ${formatScore(criteria.ecosystemMaturity)}`,
  ];
  let line = parts.join(", ");
  if (item.executionMode !== "native") {
    line += ` [${item.executionMode}]`;
  }
  if (item.notes.length > 0) {
    line += `; ${item.notes.join("; ")}`;
  }
  return line;
}

export function recommend(request: RecommendationRequest): RecommendationResult {
  const { hardware, catalog, preferences } = request;
  const weights = request.rankingWeights ?? DEFAULT_RANKING_WEIGHTS;
  const userWeights = aggregateUser(preferences.factors);
  const reasoning: string[] = [];

  const pool = buildCandidatePool(catalog, preferences);
  const strict = filterCandidates(pool, hardware);
  let viable: ViableCandidate[] = strict.viable;
  let rejections: RejectionReason[] = strict.rejections;
  let resolutionApplied: RecommendationResult["resolutionApplied"];
  let cascadeSummary: string | null = null;

  if (viable.length === 0) {
    const outcome = resolveEmptyPool({
      catalog,
      evaluated: pool,
      rejections: strict.rejections,
      hardware,
      isEligible: (candidate) => isEligible(candidate, preferences),
      marginalTolerance: request.marginalTolerance ?? DEFAULT_MARGINAL_TOLERANCE,
    });

    const rescued = new Set(outcome.viable.map((item) => item.candidate.entry.id));
    viable = outcome.viable;
    rejections = [
      ...strict.rejections.filter((rejection) => !rescued.has(rejection.candidateId)),
      ...outcome.rejections,
    ];
    resolutionApplied = outcome.strategy;
    cascadeSummary = `Resolution cascade applied ${outcome.strategy}: ${outcome.notes.join("; ")}`;
  }

  for (const rejection of rejections) {
    reasoning.push(describeRejection(rejection));
  }
  if (cascadeSummary !== null) {
    reasoning.push(cascadeSummary);
  }

  const scored = scoreCandidates(viable, userWeights, preferences.styleTags ?? []);
  const ranked = rankCandidates(
    scored,
    hardware,
    { useCase: preferences.useCase, preferredApproach: preferences.preferredApproach },
    weights,
  );
  for (const item of ranked) {
    reasoning.push(describeRanked(item));
  }

  const result: RecommendationResult = {
    catalogVersion: catalog.version,
    ranked,
    rejections,
    reasoning,
  };
  if (resolutionApplied !== undefined) {
    result.resolutionApplied = resolutionApplied;
  }
  return result;
}
