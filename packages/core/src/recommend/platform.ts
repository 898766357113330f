import type { GpuVendor, HardwareSnapshot, Platform } from "./types.js";

/** macOS keeps roughly a quarter of unified memory for itself. */
export const UNIFIED_MEMORY_CEILING = 0.75;

/** Below this much offload-usable RAM, CPU offload is not worth attempting. */
const MIN_OFFLOAD_RAM_GB = 4;

export const PLATFORMS: readonly Platform[] = ["windows", "mac", "linux"];

/**
 * Quantization formats each platform can load. K-quants crash on MPS, so mac
 * only gets the non-grouped subset.
 */
export const QUANTIZATION_ALLOWLIST: Readonly<Record<Platform, readonly string[]>> = {
  windows: ["Q4_0", "Q4_K_M", "Q5_0", "Q5_K_M", "Q6_K", "Q8_0"],
  mac: ["Q4_0", "Q5_0", "Q8_0"],
  linux: ["Q4_0", "Q4_K_M", "Q5_0", "Q5_K_M", "Q6_K", "Q8_0"],
};

export interface HardwareSnapshotInput {
  platform: Platform;
  gpuVendor: GpuVendor;
  /** Dedicated VRAM. Ignored on Apple Silicon when unifiedMemoryGB is set. */
  vramGB: number;
  unifiedMemoryGB?: number;
  ramGB: number;
  freeStorageGB: number;
  cpuOffloadViable?: boolean;
  /** CUDA compute capability; dropped for non-NVIDIA vendors. */
  computeCapability?: number;
  /** Narrows the platform allowlist, e.g. when the runtime lacks a kernel. */
  quantizationFormats?: readonly string[];
}

function roundToTwo(value: number): number {
  return Math.round(value * 100) / 100;
}

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

export function usesUnifiedMemory(platform: Platform, gpuVendor: GpuVendor): boolean {
  return platform === "mac" && gpuVendor === "apple";
}

export function computeEffectiveVram(input: HardwareSnapshotInput): number {
  if (usesUnifiedMemory(input.platform, input.gpuVendor)) {
    const pool = input.unifiedMemoryGB ?? input.vramGB;
    return roundToTwo(pool * UNIFIED_MEMORY_CEILING);
  }
  return input.vramGB;
}

export function allowedQuantizationFormats(
  platform: Platform,
  restrictTo?: readonly string[],
): Set<string> {
  const allowed = QUANTIZATION_ALLOWLIST[platform];
  if (!restrictTo) {
    return new Set(allowed);
  }
  return new Set(allowed.filter((format) => restrictTo.includes(format)));
}

/**
 * Build the frozen snapshot the engine consumes from raw detector numbers.
 */
export function createHardwareSnapshot(input: HardwareSnapshotInput): HardwareSnapshot {
  for (const [field, value] of [
    ["vramGB", input.vramGB],
    ["ramGB", input.ramGB],
    ["freeStorageGB", input.freeStorageGB],
    ["unifiedMemoryGB", input.unifiedMemoryGB ?? 0],
    ["computeCapability", input.computeCapability ?? 0],
  ] as const) {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`${field} must be a non-negative number, got ${value}`);
    }
  }

  return Object.freeze({
    effectiveVramGB: computeEffectiveVram(input),
    ramGB: input.ramGB,
    freeStorageGB: input.freeStorageGB,
    platform: input.platform,
    gpuVendor: input.gpuVendor,
    allowedQuantizationFormats: allowedQuantizationFormats(
      input.platform,
      input.quantizationFormats,
    ),
    cpuOffloadViable: input.cpuOffloadViable ?? input.ramGB * 0.5 >= MIN_OFFLOAD_RAM_GB,
    computeCapability: input.gpuVendor === "nvidia" ? input.computeCapability : undefined,
  });
}

function toPlatformLabel(platform: Platform): string {
  if (platform === "mac") {
    return "macOS";
  }
  if (platform === "windows") {
    return "Windows";
  }
  return "Linux";
}

export function formatSnapshot(snapshot: HardwareSnapshot): string {
  const quants = [...snapshot.allowedQuantizationFormats].join("/") || "none";
  return [
    toPlatformLabel(snapshot.platform),
    `${snapshot.gpuVendor} GPU ${snapshot.effectiveVramGB}GB effective VRAM` +
      (snapshot.computeCapability === undefined ? "" : ` (compute ${snapshot.computeCapability})`),
    `${snapshot.ramGB}GB RAM`,
    `${snapshot.freeStorageGB}GB free`,
    `quants ${quants}`,
  ].join(", ");
}
