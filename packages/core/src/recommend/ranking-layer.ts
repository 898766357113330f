/**
 * Ranking Layer (TOPSIS)
 *
 * Four benefit criteria per candidate: content similarity, hardware fit,
 * approach fit and ecosystem maturity. Columns are vector-normalized, weighted,
 * and each row is scored by its relative distance to the ideal (column max)
 * and anti-ideal (column min) rows.
 *
 * Adding or removing a candidate moves the ideal/anti-ideal rows and can
 * reorder the others (rank reversal). That is a property of the method.
 */

import { usableStorageGB } from "./constraint-layer.js";
import type {
  HardwareSnapshot,
  Modality,
  RankedCandidate,
  RankingCriteria,
  ScoredCandidate,
  WorkflowApproach,
} from "./types.js";

export interface RankingWeights {
  contentSimilarity: number;
  hardwareFit: number;
  approachFit: number;
  ecosystemMaturity: number;
}

export interface RankingContext {
  useCase?: string;
  preferredApproach?: WorkflowApproach;
}

/** Policy constants. Must sum to 1. */
export const DEFAULT_RANKING_WEIGHTS: Readonly<RankingWeights> = {
  contentSimilarity: 0.4,
  hardwareFit: 0.35,
  approachFit: 0.15,
  ecosystemMaturity: 0.1,
};

const CRITERIA: readonly (keyof RankingCriteria)[] = [
  "contentSimilarity",
  "hardwareFit",
  "approachFit",
  "ecosystemMaturity",
];

export const CLOSENESS_EPSILON = 1e-10;

/** Subtracted from hardware fit when the candidate only runs degraded. */
export const DEGRADED_EXECUTION_PENALTY = 0.3;

const NEUTRAL_APPROACH_FIT = 0.5;
const WEIGHT_SUM_TOLERANCE = 1e-6;

export const USE_CASE_MODALITIES: Readonly<Record<string, readonly Modality[]>> = {
  txt2img: ["image"],
  img2img: ["image"],
  inpainting: ["image"],
  upscaling: ["image"],
  txt2vid: ["video"],
  img2vid: ["image", "video"],
  flf2v: ["image", "video"],
  character_animation: ["image", "video"],
  tts: ["audio"],
  music: ["audio"],
  chat: ["text"],
  coding: ["text"],
  txt2model: ["3d"],
};

export function validateRankingWeights(weights: RankingWeights): void {
  let sum = 0;
  for (const key of CRITERIA) {
    const value = weights[key];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new RangeError(`Ranking weight "${key}" must be within [0, 1], got ${value}`);
    }
    sum += value;
  }
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new RangeError(`Ranking weights must sum to 1, got ${sum}`);
  }
}

function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function usageRatio(required: number, ceiling: number): number {
  if (required <= 0) {
    return 0;
  }
  if (ceiling <= 0) {
    return 1;
  }
  return Math.min(1, required / ceiling);
}

/**
 * 1 minus how close the candidate sits to the tighter of the VRAM and storage
 * ceilings. Degraded execution modes skip the VRAM term (they already exceed
 * it) and take a fixed penalty instead.
 */
export function computeHardwareFit(item: ScoredCandidate, hardware: HardwareSnapshot): number {
  const { entry } = item.candidate;
  const storageUsage = usageRatio(entry.sizeGB, usableStorageGB(hardware));

  if (item.executionMode !== "native") {
    return clampUnit(1 - storageUsage - DEGRADED_EXECUTION_PENALTY);
  }

  const vramUsage = usageRatio(entry.minVramGB, hardware.effectiveVramGB);
  return clampUnit(1 - Math.max(vramUsage, storageUsage));
}

export function computeApproachFit(item: ScoredCandidate, context: RankingContext): number {
  const { entry } = item.candidate;
  let fit = NEUTRAL_APPROACH_FIT;

  if (context.useCase) {
    const modalities = USE_CASE_MODALITIES[context.useCase] ?? [];
    fit = entry.useCases.includes(context.useCase) || modalities.includes(entry.modality) ? 1 : 0;
  }

  if (context.preferredApproach && context.preferredApproach !== entry.approach) {
    fit /= 2;
  }
  return fit;
}

export function buildCriteria(
  item: ScoredCandidate,
  hardware: HardwareSnapshot,
  context: RankingContext,
): RankingCriteria {
  return {
    contentSimilarity: item.contentSimilarity,
    hardwareFit: computeHardwareFit(item, hardware),
    approachFit: computeApproachFit(item, context),
    ecosystemMaturity: item.candidate.entry.ecosystemMaturity,
  };
}

function euclidean(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/** Id order by UTF-16 code units; independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * TOPSIS closeness for each row of a decision matrix (all benefit criteria).
 * A row that coincides with both the ideal and anti-ideal solution scores 0.5.
 */
export function topsisCloseness(matrix: readonly number[][], weights: readonly number[]): number[] {
  if (matrix.length === 0) {
    return [];
  }

  const columns = weights.length;
  const norms = Array.from({ length: columns }, (_, col) =>
    Math.sqrt(matrix.reduce((sum, row) => sum + row[col] * row[col], 0)),
  );

  const weighted = matrix.map((row) =>
    row.map((value, col) => (norms[col] === 0 ? 0 : (value / norms[col]) * weights[col])),
  );

  const ideal = Array.from({ length: columns }, (_, col) =>
    Math.max(...weighted.map((row) => row[col])),
  );
  const antiIdeal = Array.from({ length: columns }, (_, col) =>
    Math.min(...weighted.map((row) => row[col])),
  );

  return weighted.map((row) => {
    const dIdeal = euclidean(row, ideal);
    const dAnti = euclidean(row, antiIdeal);
    if (dIdeal + dAnti < CLOSENESS_EPSILON) {
      return 0.5;
    }
    return clampUnit(dAnti / (dIdeal + dAnti + CLOSENESS_EPSILON));
  });
}

export function rankCandidates(
  scored: readonly ScoredCandidate[],
  hardware: HardwareSnapshot,
  context: RankingContext = {},
  weights: RankingWeights = DEFAULT_RANKING_WEIGHTS,
): RankedCandidate[] {
  validateRankingWeights(weights);

  const criteria = scored.map((item) => buildCriteria(item, hardware, context));
  const matrix = criteria.map((row) => CRITERIA.map((key) => row[key]));
  const closeness = topsisCloseness(
    matrix,
    CRITERIA.map((key) => weights[key]),
  );

  return scored
    .map((item, index) => ({
      ...item,
      criteria: criteria[index],
      closenessScore: closeness[index],
      rank: 0,
    }))
    .toSorted(
      (a, b) =>
        b.closenessScore - a.closenessScore ||
        compareIds(a.candidate.entry.id, b.candidate.entry.id),
    )
    .map((item, index) => ({ ...item, rank: index + 1 }));
}
