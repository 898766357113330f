import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { RuntimeEnv } from "../runtime.js";
import { loadCatalog } from "../../packages/core/src/catalog/catalog-loader.js";
import { readEngineConfig } from "../../packages/core/src/recommend/config.js";
import { recommend } from "../../packages/core/src/recommend/engine.js";
import { isPreferencePreset } from "../../packages/core/src/recommend/factor-aggregator.js";
import {
  buildInstallManifest,
  type InstallManifest,
} from "../../packages/core/src/recommend/manifest.js";
import {
  createHardwareSnapshot,
  formatSnapshot,
  type HardwareSnapshotInput,
} from "../../packages/core/src/recommend/platform.js";
import {
  FACTOR_KEYS,
  type FactorKey,
  type HardwareSnapshot,
  type RankedCandidate,
  type RawPreferences,
  type UserFactorWeights,
  type UserPreferences,
} from "../../packages/core/src/recommend/types.js";

export interface RecommendOptions {
  hardware?: string;
  platform?: string;
  gpu?: string;
  vram?: string;
  unifiedMemory?: string;
  ram?: string;
  storage?: string;
  quants?: string;
  computeCapability?: string;
  preset?: string;
  answers?: string;
  override?: string[];
  tags?: string;
  useCase?: string;
  approach?: string;
  modality?: string;
  commercialOnly?: boolean;
  catalog?: string;
  limit?: string;
  explain?: boolean;
  manifest?: boolean | string;
  json?: boolean;
}

const DEFAULT_LIMIT = 5;

const platformSchema = z.enum(["windows", "mac", "linux"]);
const gpuVendorSchema = z.enum(["nvidia", "amd", "apple", "intel", "none"]);
const modalitySchema = z.enum(["image", "video", "audio", "text", "3d"]);
const approachSchema = z.enum(["minimal", "monolithic", "modular"]);

const hardwareFileSchema = z.object({
  platform: platformSchema,
  gpuVendor: gpuVendorSchema.default("none"),
  vramGB: z.number().nonnegative().default(0),
  unifiedMemoryGB: z.number().nonnegative().optional(),
  ramGB: z.number().nonnegative(),
  freeStorageGB: z.number().nonnegative(),
  cpuOffloadViable: z.boolean().optional(),
  computeCapability: z.number().positive().optional(),
  quantizationFormats: z.array(z.string()).optional(),
});

function gbFlag(flag: string) {
  return z
    .string({ required_error: `${flag} is required without --hardware` })
    .pipe(z.coerce.number().nonnegative());
}

const hardwareFlagsSchema = z.object({
  platform: platformSchema,
  gpu: gpuVendorSchema.default("none"),
  vram: gbFlag("--vram").default("0"),
  unifiedMemory: gbFlag("--unified-memory").optional(),
  ram: gbFlag("--ram"),
  storage: gbFlag("--storage"),
  quants: z.string().optional(),
  computeCapability: z.string().pipe(z.coerce.number().positive()).optional(),
});

const HARDWARE_FLAGS = [
  "platform",
  "gpu",
  "vram",
  "unifiedMemory",
  "ram",
  "storage",
  "quants",
  "computeCapability",
] as const satisfies readonly (keyof RecommendOptions)[];

const answer = z.coerce.number().int().min(1).max(5);
const answersSchema = z.tuple([answer, answer, answer, answer, answer]);
const overrideValueSchema = z.coerce.number().min(0).max(1);
const limitSchema = z.coerce.number().int().positive();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ` : "") + issue.message)
    .join("; ");
}

export function splitList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
}

function isFactorKey(value: string): value is FactorKey {
  return (FACTOR_KEYS as readonly string[]).includes(value);
}

async function readHardwareFile(file: string): Promise<HardwareSnapshotInput> {
  const filePath = path.resolve(file);
  const raw = await fs.readFile(filePath, "utf8");
  let payload: unknown;
  try {
    payload = JSON.parse(raw) as unknown;
  } catch {
    throw new Error(`Invalid JSON in hardware file ${filePath}`);
  }

  const parsed = hardwareFileSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Invalid hardware file ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function readHardwareFlags(opts: RecommendOptions): HardwareSnapshotInput {
  const parsed = hardwareFlagsSchema.safeParse(opts);
  if (!parsed.success) {
    throw new Error(`Invalid hardware flags: ${formatIssues(parsed.error)}`);
  }

  const { platform, gpu, vram, unifiedMemory, ram, storage, quants, computeCapability } =
    parsed.data;
  return {
    platform,
    gpuVendor: gpu,
    vramGB: vram,
    unifiedMemoryGB: unifiedMemory,
    ramGB: ram,
    freeStorageGB: storage,
    computeCapability,
    quantizationFormats: quants === undefined ? undefined : splitList(quants),
  };
}

export async function resolveHardware(opts: RecommendOptions): Promise<HardwareSnapshot> {
  const flagsGiven = HARDWARE_FLAGS.some((flag) => opts[flag] !== undefined);
  if (opts.hardware && flagsGiven) {
    throw new Error("Pass either --hardware <file> or hardware flags, not both");
  }
  if (!opts.hardware && !opts.platform) {
    throw new Error("Describe the machine with --hardware <file> or --platform, --ram and --storage");
  }
  const input = opts.hardware ? await readHardwareFile(opts.hardware) : readHardwareFlags(opts);
  return createHardwareSnapshot(input);
}

function parseOverrides(raw: readonly string[] | undefined): Partial<UserFactorWeights> {
  const overrides: Partial<Record<FactorKey, number>> = {};
  for (const item of raw ?? []) {
    const [key, value] = item.split("=", 2).map((part) => part.trim());
    if (!isFactorKey(key)) {
      throw new Error(`Unknown factor in --override "${item}". Valid: ${FACTOR_KEYS.join(", ")}`);
    }
    const parsed = overrideValueSchema.safeParse(value);
    if (!parsed.success) {
      throw new Error(`--override ${key} must be a number between 0 and 1, got "${value ?? ""}"`);
    }
    overrides[key] = parsed.data;
  }
  return overrides;
}

function resolveFactors(opts: RecommendOptions): RawPreferences {
  const overrides = parseOverrides(opts.override);

  if (opts.answers !== undefined) {
    if (opts.preset !== undefined) {
      throw new Error("Pass either --preset or --answers, not both");
    }
    const parsed = answersSchema.safeParse(splitList(opts.answers));
    if (!parsed.success) {
      throw new Error(
        `--answers takes five 1-5 ratings (${FACTOR_KEYS.join(",")}), got "${opts.answers}"`,
      );
    }
    const [quality, speed, control, consistency, simplicity] = parsed.data;
    return {
      kind: "answers",
      answers: { quality, speed, control, consistency, simplicity },
      overrides,
    };
  }

  const preset = opts.preset ?? "balanced";
  if (!isPreferencePreset(preset)) {
    throw new Error(
      `Unknown preset "${preset}". Valid: balanced, quality-first, speed-first, beginner, power-user`,
    );
  }
  return { kind: "preset", preset, overrides };
}

export function resolvePreferences(opts: RecommendOptions): UserPreferences {
  const preferences: UserPreferences = {
    factors: resolveFactors(opts),
    styleTags: splitList(opts.tags),
    commercialOnly: opts.commercialOnly === true,
  };

  if (opts.useCase) {
    preferences.useCase = opts.useCase.trim();
  }
  if (opts.approach) {
    const parsed = approachSchema.safeParse(opts.approach.trim());
    if (!parsed.success) {
      throw new Error(`Unknown approach "${opts.approach}". Valid: minimal, monolithic, modular`);
    }
    preferences.preferredApproach = parsed.data;
  }
  if (opts.modality) {
    const parsed = z.array(modalitySchema).safeParse(splitList(opts.modality));
    if (!parsed.success) {
      throw new Error(
        `Unknown modality in "${opts.modality}". Valid: ${modalitySchema.options.join(", ")}`,
      );
    }
    preferences.modalities = parsed.data;
  }
  return preferences;
}

function parseLimit(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_LIMIT;
  }
  const parsed = limitSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`--limit must be a positive integer, got "${raw}"`);
  }
  return parsed.data;
}

function toJsonCandidate(item: RankedCandidate) {
  const { entry } = item.candidate;
  return {
    rank: item.rank,
    id: entry.id,
    name: entry.name,
    family: entry.family,
    modality: entry.modality,
    closenessScore: item.closenessScore,
    executionMode: item.executionMode,
    criteria: item.criteria,
    matchingFactors: item.matchingFactors,
    notes: item.notes,
  };
}

function formatRankedLine(item: RankedCandidate): string {
  const { entry } = item.candidate;
  const mode = item.executionMode === "native" ? "" : ` [${item.executionMode}]`;
  return `#${item.rank} ${entry.name} (${entry.id}) closeness ${item.closenessScore.toFixed(3)}${mode}`;
}

function formatMatches(item: RankedCandidate): string {
  const matches = item.matchingFactors
    .map((match) => `${match.factor} ${match.contribution.toFixed(2)}`)
    .join(", ");
  return `   matches: ${matches || "none above 0.1"}`;
}

function logManifest(manifest: InstallManifest, runtime: RuntimeEnv): void {
  runtime.log(`Install plan for ${manifest.displayName} (${manifest.candidateId}):`);
  runtime.log(`  weights: ${manifest.quantization ?? "full precision"}`);
  const components = manifest.components.map((component) => component.name).join(", ");
  runtime.log(`  components: ${components || "none"}`);
  runtime.log(`  total download: ${manifest.totalDownloadGB}GB`);
  for (const warning of manifest.warnings) {
    runtime.log(`  warning: ${warning}`);
  }
}

export async function recommendCommand(opts: RecommendOptions, runtime: RuntimeEnv) {
  const config = readEngineConfig();
  const hardware = await resolveHardware(opts);
  const preferences = resolvePreferences(opts);
  const limit = parseLimit(opts.limit);
  const catalog = loadCatalog({
    path: opts.catalog ?? config.catalogPath,
    verbose: config.verbose,
  });

  const result = recommend({
    hardware,
    catalog,
    preferences,
    rankingWeights: config.rankingWeights,
    marginalTolerance: config.marginalTolerance,
  });

  const manifest =
    opts.manifest === undefined || opts.manifest === false
      ? null
      : buildInstallManifest(
          result,
          catalog,
          hardware,
          typeof opts.manifest === "string" ? opts.manifest : undefined,
        );
  const shown = result.ranked.slice(0, limit);

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        {
          hardware: {
            ...hardware,
            allowedQuantizationFormats: [...hardware.allowedQuantizationFormats],
          },
          catalogVersion: result.catalogVersion,
          resolutionApplied: result.resolutionApplied ?? null,
          ranked: shown.map(toJsonCandidate),
          rejections: result.rejections,
          reasoning: result.reasoning,
          ...(manifest ? { manifest } : {}),
        },
        null,
        2,
      ),
    );
    return;
  }

  runtime.log(`Hardware: ${formatSnapshot(hardware)}`);
  runtime.log(
    `Catalog ${result.catalogVersion}: ${result.ranked.length} viable, ${result.rejections.length} rejected`,
  );
  if (result.resolutionApplied) {
    runtime.log(`Resolution: ${result.resolutionApplied}`);
  }

  for (const item of shown) {
    runtime.log(formatRankedLine(item));
    for (const note of item.notes) {
      runtime.log(`   - ${note}`);
    }
    if (opts.explain) {
      runtime.log(formatMatches(item));
    }
  }
  if (result.ranked.length > shown.length) {
    runtime.log(`(${result.ranked.length - shown.length} more; raise --limit to see them)`);
  }

  if (opts.explain || result.ranked.length === 0) {
    runtime.log("Reasoning:");
    for (const line of result.reasoning) {
      runtime.log(`  ${line}`);
    }
  }

  if (manifest) {
    logManifest(manifest, runtime);
  }
}
