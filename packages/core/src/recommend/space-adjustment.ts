/**
 * Space Adjustment
 *
 * Each recommendation fits storage on its own, but a machine set up for
 * several use cases has to hold all of the picks at once. This module picks
 * the best model per use case and, when the set overflows free storage,
 * keeps the most important use cases and moves the rest to cloud fallback.
 */

import { recommend, type RecommendationRequest } from "./engine.js";
import { buildInstallManifest } from "./manifest.js";
import { USE_CASE_MODALITIES } from "./ranking-layer.js";
import type { RecommendationResult } from "./types.js";

/** Space kept free for temp files and outputs while models run. */
export const WORKSPACE_BUFFER_GB = 10;

/** Priority for use cases missing from the table. Lower is more important. */
export const DEFAULT_PRIORITY = 99;

export const DEFAULT_USE_CASE_PRIORITIES: Readonly<Record<string, number>> = {
  txt2img: 1,
  img2img: 1,
  txt2vid: 2,
  img2vid: 2,
  flf2v: 2,
  character_animation: 2,
  tts: 3,
  music: 3,
  chat: 4,
  coding: 4,
  upscaling: 5,
  inpainting: 6,
  txt2model: 7,
};

const MAX_NAMED_FALLBACKS = 3;

export interface PlannedInstall {
  candidateId: string;
  name: string;
  /** Use cases this install covers, in request order. */
  useCases: string[];
  /** Weights plus components. */
  sizeGB: number;
  hasCloudAlternative: boolean;
}

export interface SpaceAdjustment {
  fits: boolean;
  kept: PlannedInstall[];
  removed: PlannedInstall[];
  /** Removed installs a hosted provider can stand in for. */
  cloudFallback: PlannedInstall[];
  neededGB: number;
  availableGB: number;
  shortGB: number;
  suggestions: string[];
}

export interface SpaceAdjustmentOptions {
  priorities?: Readonly<Record<string, number>>;
  bufferGB?: number;
}

export interface InstallPlanRequest extends RecommendationRequest {
  useCases: readonly string[];
  bufferGB?: number;
  priorities?: Readonly<Record<string, number>>;
}

export interface InstallPlan {
  installs: PlannedInstall[];
  /** Use cases with no ranked candidate that lists them. */
  uncovered: string[];
  adjustment: SpaceAdjustment;
}

function roundToTwo(value: number): number {
  return Math.round(value * 100) / 100;
}

export function installPriority(
  install: PlannedInstall,
  priorities: Readonly<Record<string, number>> = DEFAULT_USE_CASE_PRIORITIES,
): number {
  return Math.min(
    DEFAULT_PRIORITY,
    ...install.useCases.map((useCase) => priorities[useCase] ?? DEFAULT_PRIORITY),
  );
}

function buildSuggestions(
  removed: readonly PlannedInstall[],
  cloudFallback: readonly PlannedInstall[],
  shortGB: number,
): string[] {
  const suggestions: string[] = [];

  if (shortGB > 0) {
    suggestions.push(`Free up ${shortGB.toFixed(0)}GB of disk space to install every pick`);
  }

  if (cloudFallback.length > 0) {
    let names = cloudFallback
      .slice(0, MAX_NAMED_FALLBACKS)
      .map((install) => install.name)
      .join(", ");
    if (cloudFallback.length > MAX_NAMED_FALLBACKS) {
      names += `, and ${cloudFallback.length - MAX_NAMED_FALLBACKS} more`;
    }
    suggestions.push(`Use a hosted API for: ${names}`);
  }

  const localOnly = removed.filter((install) => !install.hasCloudAlternative).length;
  if (localOnly > 0) {
    suggestions.push(
      `${localOnly} removed pick(s) have no hosted alternative; free storage for these first`,
    );
  }

  return suggestions;
}

/**
 * Fit installs into free storage, most important use case first. Installs
 * with equal priority keep their input order.
 */
export function adjustForSpace(
  installs: readonly PlannedInstall[],
  freeStorageGB: number,
  options: SpaceAdjustmentOptions = {},
): SpaceAdjustment {
  const bufferGB = options.bufferGB ?? WORKSPACE_BUFFER_GB;
  const priorities = options.priorities ?? DEFAULT_USE_CASE_PRIORITIES;
  const neededGB = roundToTwo(installs.reduce((sum, install) => sum + install.sizeGB, 0));
  const budgetGB = freeStorageGB - bufferGB;

  if (neededGB <= budgetGB) {
    return {
      fits: true,
      kept: [...installs],
      removed: [],
      cloudFallback: [],
      neededGB,
      availableGB: freeStorageGB,
      shortGB: 0,
      suggestions: [],
    };
  }

  const kept: PlannedInstall[] = [];
  const removed: PlannedInstall[] = [];
  let usedGB = 0;
  const ordered = installs.toSorted(
    (a, b) => installPriority(a, priorities) - installPriority(b, priorities),
  );
  for (const install of ordered) {
    if (usedGB + install.sizeGB <= budgetGB) {
      kept.push(install);
      usedGB += install.sizeGB;
    } else {
      removed.push(install);
    }
  }

  const cloudFallback = removed.filter((install) => install.hasCloudAlternative);
  const shortGB = roundToTwo(Math.max(0, neededGB - budgetGB));

  return {
    fits: false,
    kept,
    removed,
    cloudFallback,
    neededGB,
    availableGB: freeStorageGB,
    shortGB,
    suggestions: buildSuggestions(removed, cloudFallback, shortGB),
  };
}

function topPickFor(result: RecommendationResult, useCase: string) {
  return result.ranked.find((item) => item.candidate.entry.useCases.includes(useCase));
}

/**
 * Recommend one model per use case, merge picks that land on the same model,
 * then fit the set into free storage.
 */
export function planInstalls(request: InstallPlanRequest): InstallPlan {
  const { hardware, catalog, preferences } = request;
  const installs = new Map<string, PlannedInstall>();
  const uncovered: string[] = [];

  for (const useCase of request.useCases) {
    const modalities = USE_CASE_MODALITIES[useCase];
    if (!modalities) {
      throw new RangeError(
        `Unknown use case "${useCase}". Valid: ${Object.keys(USE_CASE_MODALITIES).join(", ")}`,
      );
    }

    const result = recommend({
      ...request,
      preferences: { ...preferences, useCase, modalities },
    });
    const pick = topPickFor(result, useCase);
    if (!pick) {
      uncovered.push(useCase);
      continue;
    }

    const { entry } = pick.candidate;
    const existing = installs.get(entry.id);
    if (existing) {
      existing.useCases.push(useCase);
      continue;
    }
    const manifest = buildInstallManifest(result, catalog, hardware, entry.id);
    installs.set(entry.id, {
      candidateId: entry.id,
      name: entry.name,
      useCases: [useCase],
      sizeGB: manifest?.totalDownloadGB ?? entry.sizeGB,
      hasCloudAlternative: entry.hasCloudAlternative,
    });
  }

  const planned = [...installs.values()];
  return {
    installs: planned,
    uncovered,
    adjustment: adjustForSpace(planned, hardware.freeStorageGB, {
      bufferGB: request.bufferGB,
      priorities: request.priorities,
    }),
  };
}
