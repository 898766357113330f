/**
 * Engine configuration from environment variables.
 *
 * - LOADOUT_CATALOG_PATH         catalog JSON to load instead of the bundled one
 * - LOADOUT_RANKING_WEIGHTS      "content,hardware,approach,ecosystem", must sum to 1
 * - LOADOUT_MARGINAL_TOLERANCE   ceiling multiplier for the workflow-optimization step
 * - LOADOUT_WORKSPACE_BUFFER_GB  storage kept free when planning several installs
 * - LOADOUT_VERBOSE              log catalog load summaries
 */

import { DEFAULT_MARGINAL_TOLERANCE } from "./resolution-cascade.js";
import {
  DEFAULT_RANKING_WEIGHTS,
  validateRankingWeights,
  type RankingWeights,
} from "./ranking-layer.js";
import { WORKSPACE_BUFFER_GB } from "./space-adjustment.js";

export interface EngineConfig {
  catalogPath?: string;
  rankingWeights: RankingWeights;
  marginalTolerance: number;
  workspaceBufferGB: number;
  verbose: boolean;
}

export function parseRankingWeights(raw: string): RankingWeights {
  const parts = raw.split(",").map((part) => Number.parseFloat(part.trim()));
  if (parts.length !== 4 || parts.some((part) => Number.isNaN(part))) {
    throw new RangeError(
      `Expected four comma-separated ranking weights (content,hardware,approach,ecosystem), got "${raw}"`,
    );
  }

  const [contentSimilarity, hardwareFit, approachFit, ecosystemMaturity] = parts;
  const weights = { contentSimilarity, hardwareFit, approachFit, ecosystemMaturity };
  validateRankingWeights(weights);
  return weights;
}

/**
 * Read engine config from env vars. Invalid weights throw; an invalid
 * tolerance or buffer falls back to the default.
 */
export function readEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const weightsRaw = env.LOADOUT_RANKING_WEIGHTS?.trim();

  return {
    catalogPath: env.LOADOUT_CATALOG_PATH?.trim() || undefined,
    rankingWeights: weightsRaw ? parseRankingWeights(weightsRaw) : { ...DEFAULT_RANKING_WEIGHTS },
    marginalTolerance: envNumber(env, "LOADOUT_MARGINAL_TOLERANCE", DEFAULT_MARGINAL_TOLERANCE, 1),
    workspaceBufferGB: envNumber(env, "LOADOUT_WORKSPACE_BUFFER_GB", WORKSPACE_BUFFER_GB, 0),
    verbose: envBool(env, "LOADOUT_VERBOSE", false),
  };
}

function envBool(env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return defaultValue;
  }
  return raw === "1" || raw.toLowerCase() === "true";
}

function envNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  defaultValue: number,
  min: number,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return defaultValue;
  }
  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed) || parsed < min) {
    console.warn(`[config] Ignoring ${key}="${raw}", using ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}
