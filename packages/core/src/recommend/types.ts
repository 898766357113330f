// ---------------------------------------------------------------------------
// Hardware
// ---------------------------------------------------------------------------

export type Platform = "windows" | "mac" | "linux";

export type GpuVendor = "nvidia" | "amd" | "apple" | "intel" | "none";

/**
 * Detected hardware, already platform-adjusted by the detector
 * (unified-memory ceiling applied, quantization allowlist filtered).
 */
export interface HardwareSnapshot {
  readonly effectiveVramGB: number;
  readonly ramGB: number;
  readonly freeStorageGB: number;
  readonly platform: Platform;
  readonly gpuVendor: GpuVendor;
  readonly allowedQuantizationFormats: ReadonlySet<string>;
  readonly cpuOffloadViable: boolean;
  /** CUDA compute capability (e.g. 8.9); only reported for NVIDIA GPUs. */
  readonly computeCapability?: number;
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export type Modality = "image" | "video" | "audio" | "text" | "3d";

export type WorkflowApproach = "minimal" | "monolithic" | "modular";

/** One installable artifact variant: a specific model at a specific precision. */
export interface CandidateEntry {
  readonly id: string;
  readonly name: string;
  readonly family: string;
  readonly modality: Modality;
  readonly approach: WorkflowApproach;
  readonly minVramGB: number;
  readonly minRamGB: number;
  readonly sizeGB: number;
  /** Empty means the entry runs everywhere. */
  readonly platformRestrictions: ReadonlySet<Platform>;
  /** GGUF-style quant label (e.g. "Q4_K_M"); null for full-precision weights. */
  readonly quantizationFormat: string | null;
  readonly hasReducedPrecisionVariant: boolean;
  /** Lowest CUDA compute capability the weights run on (fp8 matmul, bf16); null when any GPU works. */
  readonly minComputeCapability: number | null;
  readonly rawCapabilityDimensions: Readonly<Record<string, number>>;
  readonly styleTags: ReadonlySet<string>;
  /** Static freshness/stability score from the catalog, 0-1. */
  readonly ecosystemMaturity: number;
  readonly useCases: readonly string[];
  /** Supporting component ids, resolved against the catalog component table. */
  readonly components: readonly string[];
  /** Only reachable through variant substitution, never recommended directly. */
  readonly fallbackOnly: boolean;
  readonly commercialUse: boolean;
  /** A hosted API serves the same model when it cannot be installed locally. */
  readonly hasCloudAlternative: boolean;
}

export const FACTOR_KEYS = ["quality", "speed", "control", "consistency", "simplicity"] as const;

export type FactorKey = (typeof FACTOR_KEYS)[number];

export type FactorVector = Readonly<Record<FactorKey, number>>;

export type UserFactorWeights = FactorVector;

export type CandidateFactorScores = FactorVector;

/** Catalog row with its factor scores computed once at load. */
export interface CatalogCandidate {
  readonly entry: CandidateEntry;
  readonly factors: CandidateFactorScores;
}

export interface CatalogComponent {
  readonly id: string;
  readonly name: string;
  readonly sizeGB: number;
}

export interface CandidateCatalog {
  readonly version: string;
  readonly candidates: readonly CatalogCandidate[];
  readonly components: ReadonlyMap<string, CatalogComponent>;
  /** Family → lower-resource sibling family. */
  readonly substitutions: ReadonlyMap<string, string>;
}

// ---------------------------------------------------------------------------
// User preferences
// ---------------------------------------------------------------------------

export type PreferencePreset = "balanced" | "quality-first" | "speed-first" | "beginner" | "power-user";

/** Five onboarding answers on a 1-5 scale, one per factor. */
export type OnboardingAnswers = Readonly<Record<FactorKey, number>>;

export type RawPreferences =
  | { kind: "answers"; answers: OnboardingAnswers; overrides?: Partial<UserFactorWeights> }
  | { kind: "preset"; preset: PreferencePreset; overrides?: Partial<UserFactorWeights> };

export interface UserPreferences {
  factors: RawPreferences;
  styleTags?: readonly string[];
  /** Selected use case, e.g. "txt2img". */
  useCase?: string;
  preferredApproach?: WorkflowApproach;
  /** Restrict the pool to these modalities. */
  modalities?: readonly Modality[];
  commercialOnly?: boolean;
}

// ---------------------------------------------------------------------------
// Pipeline stages
// ---------------------------------------------------------------------------

export type ConstraintName = "vram" | "ram" | "storage" | "platform";

export interface RejectionReason {
  candidateId: string;
  constraint: ConstraintName;
  required: string;
  available: string;
  message: string;
}

export type ExecutionMode = "native" | "reduced-precision" | "tiled";

export interface ViableCandidate {
  candidate: CatalogCandidate;
  executionMode: ExecutionMode;
  notes: string[];
}

/** How much one factor contributed to a content match. */
export interface FactorMatch {
  factor: FactorKey;
  userWeight: number;
  candidateScore: number;
  /** userWeight * candidateScore */
  contribution: number;
}

export interface ScoredCandidate extends ViableCandidate {
  /** Cosine similarity plus style bonus, clamped to 0-1. */
  contentSimilarity: number;
  cosine: number;
  styleBonus: number;
  /** Strongest factor contributions, largest first. */
  matchingFactors: FactorMatch[];
}

export interface RankingCriteria {
  contentSimilarity: number;
  hardwareFit: number;
  approachFit: number;
  ecosystemMaturity: number;
}

export interface RankedCandidate extends ScoredCandidate {
  closenessScore: number;
  /** 1 = best. */
  rank: number;
  criteria: RankingCriteria;
}

export type ResolutionStrategy =
  | "quantization_downgrade"
  | "variant_substitution"
  | "workflow_optimization"
  | "cloud_offload_suggested";

export interface RecommendationResult {
  catalogVersion: string;
  ranked: RankedCandidate[];
  rejections: RejectionReason[];
  reasoning: string[];
  resolutionApplied?: ResolutionStrategy;
}
