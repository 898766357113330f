/**
 * Resolution Cascade
 *
 * Entered only when strict filtering leaves nothing. Tries, in order:
 *   1. quantization_downgrade   reduced-precision variants outside the allowlist
 *   2. variant_substitution     lower-resource sibling families
 *   3. workflow_optimization    nearest miss within a small tolerance, tiled
 *   4. cloud_offload_suggested  nothing local; explain the nearest miss
 *
 * Every step only reads the catalog, so re-running one yields the same outcome.
 */

import { filterCandidates, formatGB, usableStorageGB } from "./constraint-layer.js";
import { compareIds } from "./ranking-layer.js";
import type {
  CandidateCatalog,
  CatalogCandidate,
  HardwareSnapshot,
  RejectionReason,
  ResolutionStrategy,
  ViableCandidate,
} from "./types.js";

/** VRAM/storage may miss by this factor and still be flagged for tiled processing. */
export const DEFAULT_MARGINAL_TOLERANCE = 1.1;

export interface CascadeInput {
  catalog: CandidateCatalog;
  /** The pool strict filtering ran over. */
  evaluated: readonly CatalogCandidate[];
  rejections: readonly RejectionReason[];
  hardware: HardwareSnapshot;
  /** Extra pool filter for substitutes (e.g. modality or licence preferences). */
  isEligible?: (candidate: CatalogCandidate) => boolean;
  marginalTolerance?: number;
}

export interface CascadeOutcome {
  strategy: ResolutionStrategy;
  viable: ViableCandidate[];
  /** Rejections produced while trying this step (substitutes that also failed). */
  rejections: RejectionReason[];
  notes: string[];
}

function rejectedCandidates(input: CascadeInput): CatalogCandidate[] {
  const rejectedIds = new Set(input.rejections.map((rejection) => rejection.candidateId));
  return input.evaluated.filter((candidate) => rejectedIds.has(candidate.entry.id));
}

/** How far (as a ratio) a requirement overshoots its ceiling; Infinity if unfixable. */
export function relativeShortfall(
  candidate: CatalogCandidate,
  rejection: RejectionReason,
  hardware: HardwareSnapshot,
): number {
  const { entry } = candidate;
  const ratio = (required: number, available: number): number =>
    available > 0 ? required / available - 1 : Number.POSITIVE_INFINITY;

  switch (rejection.constraint) {
    case "vram":
      return ratio(entry.minVramGB, hardware.effectiveVramGB);
    case "ram":
      return ratio(entry.minRamGB, hardware.ramGB);
    case "storage":
      return ratio(entry.sizeGB, usableStorageGB(hardware));
    case "platform":
      return Number.POSITIVE_INFINITY;
  }
}

export function tryQuantizationDowngrade(input: CascadeInput): CascadeOutcome | null {
  const { viable } = filterCandidates(input.evaluated, input.hardware, {
    ignoreQuantizationAllowlist: true,
  });
  if (viable.length === 0) {
    return null;
  }
  return {
    strategy: "quantization_downgrade",
    viable,
    rejections: [],
    notes: [
      `Quantization downgrade admitted ${viable.length} reduced-precision candidate(s) outside the ${input.hardware.platform} allowlist; expect lower output quality`,
    ],
  };
}

export function tryVariantSubstitution(input: CascadeInput): CascadeOutcome | null {
  const evaluatedIds = new Set(input.evaluated.map((candidate) => candidate.entry.id));
  const swaps = new Map<string, string>();

  for (const candidate of rejectedCandidates(input)) {
    const sibling = input.catalog.substitutions.get(candidate.entry.family);
    if (sibling !== undefined) {
      swaps.set(candidate.entry.family, sibling);
    }
  }
  if (swaps.size === 0) {
    return null;
  }

  const siblingFamilies = new Set(swaps.values());
  const substitutes = input.catalog.candidates.filter(
    (candidate) =>
      siblingFamilies.has(candidate.entry.family) &&
      !evaluatedIds.has(candidate.entry.id) &&
      (input.isEligible?.(candidate) ?? true),
  );
  if (substitutes.length === 0) {
    return null;
  }

  const { viable, rejections } = filterCandidates(substitutes, input.hardware);
  if (viable.length === 0) {
    return null;
  }

  const replacedFamily = (item: ViableCandidate): string =>
    [...swaps.entries()]
      .filter(([, to]) => to === item.candidate.entry.family)
      .map(([from]) => from)
      .toSorted(compareIds)
      .join("/");

  const pairs = [...swaps.entries()]
    .toSorted(([a], [b]) => compareIds(a, b))
    .map(([from, to]) => `${from} -> ${to}`);
  return {
    strategy: "variant_substitution",
    viable: viable.map((item) => ({
      ...item,
      notes: [...item.notes, `Substituted for the larger ${replacedFamily(item)} family`],
    })),
    rejections,
    notes: [`Variant substitution: ${pairs.join(", ")}`],
  };
}

export function tryWorkflowOptimization(input: CascadeInput): CascadeOutcome | null {
  const tolerance = input.marginalTolerance ?? DEFAULT_MARGINAL_TOLERANCE;
  // Only the VRAM and storage ceilings stretch, so anything that now passes is a marginal miss.
  const { viable: marginal } = filterCandidates(rejectedCandidates(input), input.hardware, {
    tolerance,
  });
  if (marginal.length === 0) {
    return null;
  }

  const byId = new Map(
    input.rejections.map((rejection) => [rejection.candidateId, rejection] as const),
  );
  const shortfallOf = (item: ViableCandidate): number => {
    const rejection = byId.get(item.candidate.entry.id);
    return rejection ? relativeShortfall(item.candidate, rejection, input.hardware) : 0;
  };

  const [nearest] = marginal.toSorted(
    (a, b) =>
      shortfallOf(a) - shortfallOf(b) || compareIds(a.candidate.entry.id, b.candidate.entry.id),
  );

  const notes = [...nearest.notes];
  if (input.hardware.cpuOffloadViable) {
    notes.push("CPU offload is available to absorb layers that do not fit in VRAM");
  }

  return {
    strategy: "workflow_optimization",
    viable: [{ ...nearest, notes }],
    rejections: [],
    notes: [
      `Workflow optimization: ${nearest.candidate.entry.name} misses by ${Math.round(shortfallOf(nearest) * 100)}% and is flagged viable with reduced batch/tiled processing`,
    ],
  };
}

function describeMiss(
  candidate: CatalogCandidate,
  rejection: RejectionReason,
  hardware: HardwareSnapshot,
): string {
  const { entry } = candidate;
  const gap = (required: number, available: number): string =>
    `needs ${formatGB(required)}, ${formatGB(available)} available (short by ${formatGB(required - available)})`;

  switch (rejection.constraint) {
    case "vram":
      return `vram: ${gap(entry.minVramGB, hardware.effectiveVramGB)}`;
    case "ram":
      return `ram: ${gap(entry.minRamGB, hardware.ramGB)}`;
    case "storage":
      return `storage: ${gap(entry.sizeGB, usableStorageGB(hardware))}`;
    case "platform":
      return `platform: requires ${rejection.required}, this machine offers ${rejection.available}`;
  }
}

interface NearestMiss {
  candidate: CatalogCandidate;
  rejection: RejectionReason;
  shortfall: number;
}

export function suggestCloudOffload(input: CascadeInput): CascadeOutcome {
  const byId = new Map(
    input.evaluated.map((candidate) => [candidate.entry.id, candidate] as const),
  );
  let nearest: NearestMiss | null = null;

  for (const rejection of input.rejections) {
    const candidate = byId.get(rejection.candidateId);
    if (!candidate) {
      continue;
    }
    const shortfall = relativeShortfall(candidate, rejection, input.hardware);
    if (
      nearest === null ||
      shortfall < nearest.shortfall ||
      (shortfall === nearest.shortfall &&
        compareIds(candidate.entry.id, nearest.candidate.entry.id) < 0)
    ) {
      nearest = { candidate, rejection, shortfall };
    }
  }

  const explanation =
    nearest === null
      ? "No catalog entries matched this request, so nothing can run locally; a cloud provider is the remaining option"
      : `No candidate runs locally. Nearest miss is ${nearest.candidate.entry.name}, blocked on ${describeMiss(nearest.candidate, nearest.rejection, input.hardware)}. Consider a cloud provider for this workload`;

  return { strategy: "cloud_offload_suggested", viable: [], rejections: [], notes: [explanation] };
}

/**
 * Run the relaxation steps in order and return the first that yields viable
 * candidates, or the cloud-offload outcome when all are exhausted.
 */
export function resolveEmptyPool(input: CascadeInput): CascadeOutcome {
  return (
    tryQuantizationDowngrade(input) ??
    tryVariantSubstitution(input) ??
    tryWorkflowOptimization(input) ??
    suggestCloudOffload(input)
  );
}
