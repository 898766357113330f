/**
 * Constraint Layer
 *
 * Binary elimination of catalog candidates that cannot run on the snapshot.
 * Checks run in a fixed order (vram, ram, storage, platform) and stop at the
 * first failure, so each rejection carries exactly one reason. The platform
 * check covers OS restrictions, CUDA compute capability and quant formats.
 */

import type {
  CatalogCandidate,
  ConstraintName,
  HardwareSnapshot,
  RejectionReason,
  ViableCandidate,
} from "./types.js";

/** Share of free storage a model may occupy; the rest is workspace/temp. */
export const STORAGE_SAFETY_FACTOR = 0.8;

export interface ConstraintOptions {
  /** Let any reduced-precision entry through the VRAM check, allowlist or not. */
  ignoreQuantizationAllowlist?: boolean;
  /** Multiplier on the VRAM and storage ceilings. Defaults to 1 (strict). */
  tolerance?: number;
}

export interface ConstraintResult {
  viable: ViableCandidate[];
  rejections: RejectionReason[];
}

export function formatGB(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return `${rounded}GB`;
}

export function usableStorageGB(hardware: HardwareSnapshot): number {
  return hardware.freeStorageGB * STORAGE_SAFETY_FACTOR;
}

function reject(
  candidate: CatalogCandidate,
  constraint: ConstraintName,
  required: string,
  available: string,
  message: string,
): RejectionReason {
  return { candidateId: candidate.entry.id, constraint, required, available, message };
}

function describeFormats(formats: ReadonlySet<string>): string {
  return formats.size > 0 ? [...formats].join(", ") : "none";
}

/**
 * Run every check against one candidate. Returns the viable wrapper or the
 * first rejection.
 */
export function evaluateCandidate(
  candidate: CatalogCandidate,
  hardware: HardwareSnapshot,
  options: ConstraintOptions = {},
): ViableCandidate | RejectionReason {
  const { entry } = candidate;
  const tolerance = options.tolerance ?? 1;
  const notes: string[] = [];
  let executionMode: ViableCandidate["executionMode"] = "native";

  if (entry.minVramGB > hardware.effectiveVramGB) {
    const allowlistOk =
      options.ignoreQuantizationAllowlist === true || hardware.allowedQuantizationFormats.size > 0;

    if (entry.hasReducedPrecisionVariant && allowlistOk) {
      executionMode = "reduced-precision";
      notes.push(
        options.ignoreQuantizationAllowlist === true
          ? `Quality impact: forced reduced-precision variant outside the ${hardware.platform} quantization allowlist`
          : `Quality impact: runs as a reduced-precision variant (${describeFormats(hardware.allowedQuantizationFormats)}) to fit ${formatGB(hardware.effectiveVramGB)} VRAM`,
      );
    } else if (entry.minVramGB <= hardware.effectiveVramGB * tolerance) {
      executionMode = "tiled";
      notes.push(
        `Needs ${formatGB(entry.minVramGB)} VRAM against ${formatGB(hardware.effectiveVramGB)}; viable with reduced batch size and tiled processing`,
      );
    } else {
      return reject(
        candidate,
        "vram",
        formatGB(entry.minVramGB),
        formatGB(hardware.effectiveVramGB),
        `${entry.name} needs ${formatGB(entry.minVramGB)} VRAM, only ${formatGB(hardware.effectiveVramGB)} available and no usable reduced-precision variant`,
      );
    }
  }

  if (entry.minRamGB > hardware.ramGB) {
    return reject(
      candidate,
      "ram",
      formatGB(entry.minRamGB),
      formatGB(hardware.ramGB),
      `${entry.name} needs ${formatGB(entry.minRamGB)} system RAM, only ${formatGB(hardware.ramGB)} installed`,
    );
  }

  const usable = usableStorageGB(hardware);
  if (entry.sizeGB > usable) {
    if (entry.sizeGB <= usable * tolerance) {
      // A reduced-precision admission keeps its mode: the installer needs the quant.
      if (executionMode === "native") {
        executionMode = "tiled";
      }
      notes.push(
        `Download of ${formatGB(entry.sizeGB)} leaves less than the usual workspace margin on ${formatGB(hardware.freeStorageGB)} free; keep temporary outputs small`,
      );
    } else {
      return reject(
        candidate,
        "storage",
        formatGB(entry.sizeGB),
        formatGB(usable),
        `${entry.name} downloads ${formatGB(entry.sizeGB)}, more than the ${formatGB(usable)} usable out of ${formatGB(hardware.freeStorageGB)} free`,
      );
    }
  }

  if (entry.platformRestrictions.size > 0 && !entry.platformRestrictions.has(hardware.platform)) {
    return reject(
      candidate,
      "platform",
      [...entry.platformRestrictions].join(", "),
      hardware.platform,
      `${entry.name} is not supported on ${hardware.platform}`,
    );
  }

  if (entry.minComputeCapability !== null) {
    const capability = hardware.computeCapability;
    if (capability === undefined || capability < entry.minComputeCapability) {
      return reject(
        candidate,
        "platform",
        `compute ${entry.minComputeCapability}`,
        capability === undefined ? "unknown compute capability" : `compute ${capability}`,
        capability === undefined
          ? `${entry.name} needs CUDA compute capability ${entry.minComputeCapability}; this GPU reports none`
          : `${entry.name} needs CUDA compute capability ${entry.minComputeCapability}, this GPU has ${capability}`,
      );
    }
  }

  if (
    entry.quantizationFormat !== null &&
    !hardware.allowedQuantizationFormats.has(entry.quantizationFormat)
  ) {
    return reject(
      candidate,
      "platform",
      entry.quantizationFormat,
      describeFormats(hardware.allowedQuantizationFormats),
      `${entry.name} ships ${entry.quantizationFormat} weights, which ${hardware.platform} cannot load`,
    );
  }

  return { candidate, executionMode, notes };
}

export function isRejection(value: ViableCandidate | RejectionReason): value is RejectionReason {
  return "constraint" in value;
}

export function filterCandidates(
  candidates: readonly CatalogCandidate[],
  hardware: HardwareSnapshot,
  options: ConstraintOptions = {},
): ConstraintResult {
  const viable: ViableCandidate[] = [];
  const rejections: RejectionReason[] = [];

  for (const candidate of candidates) {
    const outcome = evaluateCandidate(candidate, hardware, options);
    if (isRejection(outcome)) {
      rejections.push(outcome);
    } else {
      viable.push(outcome);
    }
  }

  return { viable, rejections };
}
