import type {
  CandidateCatalog,
  CatalogComponent,
  ExecutionMode,
  HardwareSnapshot,
  RankedCandidate,
  RecommendationResult,
} from "./types.js";

export interface InstallManifest {
  catalogVersion: string;
  candidateId: string;
  displayName: string;
  family: string;
  rank: number;
  closenessScore: number;
  executionMode: ExecutionMode;
  /** Weights format to fetch; null means the entry's own full-precision files. */
  quantization: string | null;
  components: CatalogComponent[];
  /** Upper bound: reduced-precision downloads are usually smaller. */
  totalDownloadGB: number;
  warnings: string[];
}

/** Highest quality first. */
const QUANTIZATION_LADDER: readonly { formats: readonly string[]; minVramRatio: number }[] = [
  { formats: ["Q8_0"], minVramRatio: 0.6 },
  { formats: ["Q6_K"], minVramRatio: 0.5 },
  { formats: ["Q5_K_M", "Q5_0"], minVramRatio: 0.42 },
  { formats: ["Q4_K_M", "Q4_0"], minVramRatio: 0 },
];

function roundToTwo(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Pick the best quant the snapshot allows for a reduced-precision install,
 * based on how much of the full-precision VRAM requirement is available.
 */
export function chooseQuantization(minVramGB: number, hardware: HardwareSnapshot): string {
  const ratio = minVramGB > 0 ? hardware.effectiveVramGB / minVramGB : 1;
  const allowed = hardware.allowedQuantizationFormats;
  const permits = (format: string): boolean => allowed.size === 0 || allowed.has(format);

  for (const rung of QUANTIZATION_LADDER) {
    if (ratio < rung.minVramRatio) {
      continue;
    }
    const format = rung.formats.find(permits);
    if (format) {
      return format;
    }
  }
  return "Q4_0";
}

function pickCandidate(
  result: RecommendationResult,
  candidateId?: string,
): RankedCandidate | undefined {
  if (candidateId === undefined) {
    return result.ranked[0];
  }
  return result.ranked.find((item) => item.candidate.entry.id === candidateId);
}

/**
 * Map the top ranked candidate (or a user-chosen alternative from the list)
 * onto the data an installer needs. Returns null when nothing was ranked.
 */
export function buildInstallManifest(
  result: RecommendationResult,
  catalog: CandidateCatalog,
  hardware: HardwareSnapshot,
  candidateId?: string,
): InstallManifest | null {
  const chosen = pickCandidate(result, candidateId);
  if (!chosen) {
    if (candidateId !== undefined && result.ranked.length > 0) {
      throw new Error(`Candidate "${candidateId}" is not in the ranked list`);
    }
    return null;
  }

  const { entry } = chosen.candidate;
  const components = entry.components.map((componentId) => {
    const component = catalog.components.get(componentId);
    if (!component) {
      throw new Error(`Catalog ${catalog.version} has no component "${componentId}" (${entry.id})`);
    }
    return component;
  });

  const quantization =
    chosen.executionMode === "reduced-precision"
      ? chooseQuantization(entry.minVramGB, hardware)
      : entry.quantizationFormat;

  const totalDownloadGB = roundToTwo(
    components.reduce((sum, component) => sum + component.sizeGB, entry.sizeGB),
  );

  return {
    catalogVersion: result.catalogVersion,
    candidateId: entry.id,
    displayName: entry.name,
    family: entry.family,
    rank: chosen.rank,
    closenessScore: chosen.closenessScore,
    executionMode: chosen.executionMode,
    quantization,
    components,
    totalDownloadGB,
    warnings: [...chosen.notes],
  };
}
