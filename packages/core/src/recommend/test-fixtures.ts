import type { FactorGroups } from "./factor-aggregator.js";
import type {
  CandidateCatalog,
  CandidateEntry,
  CatalogCandidate,
  CatalogComponent,
  FactorVector,
  HardwareSnapshot,
  Platform,
} from "./types.js";

export const TEST_FACTOR_GROUPS: FactorGroups = {
  quality: { dimensions: ["photorealism", "prompt_adherence"], inverted: false },
  speed: { dimensions: ["generation_speed"], inverted: false },
  control: { dimensions: ["controlnet_coverage"], inverted: false },
  consistency: { dimensions: ["style_consistency"], inverted: false },
  simplicity: { dimensions: ["setup_complexity", "dependency_count"], inverted: true },
};

export function makeHardware(overrides: Partial<HardwareSnapshot> = {}): HardwareSnapshot {
  return {
    effectiveVramGB: 8,
    ramGB: 16,
    freeStorageGB: 100,
    platform: "windows",
    gpuVendor: "nvidia",
    allowedQuantizationFormats: new Set(["Q4_0", "Q4_K_M", "Q5_0", "Q5_K_M", "Q6_K", "Q8_0"]),
    cpuOffloadViable: true,
    ...overrides,
  };
}

export function makeEntry(overrides: Partial<CandidateEntry> = {}): CandidateEntry {
  return {
    id: "test-model",
    name: "Test Model",
    family: "test-family",
    modality: "image",
    approach: "minimal",
    minVramGB: 4,
    minRamGB: 8,
    sizeGB: 10,
    platformRestrictions: new Set<Platform>(),
    quantizationFormat: null,
    hasReducedPrecisionVariant: false,
    minComputeCapability: null,
    rawCapabilityDimensions: {},
    styleTags: new Set<string>(),
    ecosystemMaturity: 0.5,
    useCases: [],
    components: [],
    fallbackOnly: false,
    commercialUse: true,
    hasCloudAlternative: false,
    ...overrides,
  };
}

export function makeCandidate(
  overrides: Partial<CandidateEntry> = {},
  factors: Partial<FactorVector> = {},
): CatalogCandidate {
  return {
    entry: makeEntry(overrides),
    factors: {
      quality: 0.5,
      speed: 0.5,
      control: 0.5,
      consistency: 0.5,
      simplicity: 0.5,
      ...factors,
    },
  };
}

export function makeCatalog(
  candidates: CatalogCandidate[],
  extras: {
    components?: CatalogComponent[];
    substitutions?: Record<string, string>;
  } = {},
): CandidateCatalog {
  return {
    version: "test-1",
    candidates,
    components: new Map(
      (extras.components ?? []).map((component) => [component.id, component] as const),
    ),
    substitutions: new Map(Object.entries(extras.substitutions ?? {})),
  };
}
