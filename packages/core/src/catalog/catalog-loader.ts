/**
 * Catalog loading.
 *
 * Reads the static candidate catalog and the factor grouping table, validates
 * both, computes each entry's factor scores once and freezes the result. The
 * catalog is never mutated after this point, so any number of concurrent
 * requests can share it.
 */

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { aggregateCandidate, type FactorGroups } from "../recommend/factor-aggregator.js";
import { PLATFORMS } from "../recommend/platform.js";
import type {
  CandidateCatalog,
  CandidateEntry,
  CatalogCandidate,
  CatalogComponent,
  Platform,
} from "../recommend/types.js";

export class CatalogValidationError extends Error {
  readonly code: string;
  readonly suggestion: string;
  readonly issues: string[];

  constructor(message: string, code: string, suggestion: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "CatalogValidationError";
    this.code = code;
    this.suggestion = suggestion;
    this.issues = issues;
  }
}

const unitScore = z.number().min(0).max(1);

const platformSchema = z.enum(["windows", "mac", "linux"]);

const candidateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  family: z.string().min(1),
  modality: z.enum(["image", "video", "audio", "text", "3d"]),
  approach: z.enum(["minimal", "monolithic", "modular"]).default("minimal"),
  minVramGB: z.number().nonnegative(),
  minRamGB: z.number().nonnegative(),
  sizeGB: z.number().positive(),
  platformRestrictions: z.array(platformSchema).default([]),
  quantizationFormat: z.string().min(1).nullable().default(null),
  hasReducedPrecisionVariant: z.boolean().default(false),
  minComputeCapability: z.number().positive().nullable().default(null),
  capabilities: z.record(unitScore),
  styleTags: z.array(z.string()).default([]),
  ecosystemMaturity: unitScore,
  useCases: z.array(z.string()).default([]),
  components: z.array(z.string()).default([]),
  fallbackOnly: z.boolean().default(false),
  commercialUse: z.boolean().default(true),
  hasCloudAlternative: z.boolean().default(false),
});

const componentSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  sizeGB: z.number().nonnegative(),
});

export const catalogFileSchema = z.object({
  version: z.string().min(1),
  components: z.array(componentSchema).default([]),
  substitutions: z.record(z.string()).default({}),
  candidates: z.array(candidateSchema),
});

const factorGroupSchema = z.object({
  dimensions: z.array(z.string().min(1)).min(1),
  inverted: z.boolean().default(false),
});

export const factorGroupsFileSchema = z.object({
  version: z.number().int(),
  groups: z.object({
    quality: factorGroupSchema,
    speed: factorGroupSchema,
    control: factorGroupSchema,
    consistency: factorGroupSchema,
    simplicity: factorGroupSchema,
  }),
});

export type CatalogFile = z.input<typeof catalogFileSchema>;

export interface ParseCatalogOptions {
  factorGroups?: FactorGroups;
}

export interface LoadCatalogOptions extends ParseCatalogOptions {
  path?: string;
  verbose?: boolean;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Bundled data lives in packages/core/data. Look beside the sources first,
 * then from the compiled location under dist/.
 */
export function resolveDataFile(fileName: string): string {
  const candidates = [
    new URL(`../../data/${fileName}`, import.meta.url),
    new URL(`../../../../../packages/core/data/${fileName}`, import.meta.url),
  ].map((url) => fileURLToPath(url));
  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
}

function readJson(filePath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CatalogValidationError(
      `Cannot read ${filePath}: ${message}`,
      "unreadable",
      "Check the path, or unset LOADOUT_CATALOG_PATH to use the bundled catalog.",
    );
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch {
    throw new CatalogValidationError(
      `Invalid JSON in ${filePath}`,
      "invalid-json",
      "Validate the file with a JSON linter.",
    );
  }
}

export function parseFactorGroups(payload: unknown): FactorGroups {
  const parsed = factorGroupsFileSchema.safeParse(payload);
  if (!parsed.success) {
    throw new CatalogValidationError(
      "Malformed factor grouping table",
      "invalid-factor-groups",
      "Every factor needs a non-empty dimensions list.",
      formatIssues(parsed.error),
    );
  }
  return parsed.data.groups;
}

export function loadFactorGroups(filePath = resolveDataFile("factor-groups.json")): FactorGroups {
  return parseFactorGroups(readJson(filePath));
}

function toEntry(raw: z.output<typeof candidateSchema>): CandidateEntry {
  return Object.freeze({
    id: raw.id,
    name: raw.name,
    family: raw.family,
    modality: raw.modality,
    approach: raw.approach,
    minVramGB: raw.minVramGB,
    minRamGB: raw.minRamGB,
    sizeGB: raw.sizeGB,
    platformRestrictions: new Set<Platform>(raw.platformRestrictions),
    quantizationFormat: raw.quantizationFormat,
    hasReducedPrecisionVariant: raw.hasReducedPrecisionVariant,
    minComputeCapability: raw.minComputeCapability,
    rawCapabilityDimensions: Object.freeze({ ...raw.capabilities }),
    styleTags: new Set(raw.styleTags),
    ecosystemMaturity: raw.ecosystemMaturity,
    useCases: Object.freeze([...raw.useCases]),
    components: Object.freeze([...raw.components]),
    fallbackOnly: raw.fallbackOnly,
    commercialUse: raw.commercialUse,
    hasCloudAlternative: raw.hasCloudAlternative,
  });
}

function crossCheck(data: z.output<typeof catalogFileSchema>): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();
  const families = new Set(data.candidates.map((candidate) => candidate.family));
  const componentIds = new Set(data.components.map((component) => component.id));

  data.candidates.forEach((candidate, index) => {
    if (seen.has(candidate.id)) {
      issues.push(`candidates.${index}.id: duplicate id "${candidate.id}"`);
    }
    seen.add(candidate.id);
    for (const componentId of candidate.components) {
      if (!componentIds.has(componentId)) {
        issues.push(`candidates.${index}.components: unknown component "${componentId}"`);
      }
    }
  });

  for (const [from, to] of Object.entries(data.substitutions)) {
    if (!families.has(from)) {
      issues.push(`substitutions.${from}: no candidate belongs to family "${from}"`);
    }
    if (!families.has(to)) {
      issues.push(`substitutions.${from}: no candidate belongs to family "${to}"`);
    }
  }

  return issues;
}

export function parseCatalog(payload: unknown, options: ParseCatalogOptions = {}): CandidateCatalog {
  const parsed = catalogFileSchema.safeParse(payload);
  if (!parsed.success) {
    throw new CatalogValidationError(
      "Malformed catalog",
      "invalid-catalog",
      "Fix the listed entries; every score must be a number between 0 and 1.",
      formatIssues(parsed.error),
    );
  }

  const issues = crossCheck(parsed.data);
  if (issues.length > 0) {
    throw new CatalogValidationError(
      "Inconsistent catalog",
      "inconsistent-catalog",
      "Ids must be unique and every referenced component or family must exist.",
      issues,
    );
  }

  const groups = options.factorGroups ?? loadFactorGroups();
  const candidates: CatalogCandidate[] = parsed.data.candidates.map((raw) => {
    const entry = toEntry(raw);
    return Object.freeze({
      entry,
      factors: Object.freeze(aggregateCandidate(entry.rawCapabilityDimensions, groups)),
    });
  });

  const components = new Map<string, CatalogComponent>(
    parsed.data.components.map(
      (component) => [component.id, Object.freeze({ ...component })] as const,
    ),
  );

  return Object.freeze({
    version: parsed.data.version,
    candidates: Object.freeze(candidates),
    components,
    substitutions: new Map(Object.entries(parsed.data.substitutions)),
  });
}

export function loadCatalog(options: LoadCatalogOptions = {}): CandidateCatalog {
  const filePath = options.path ?? resolveDataFile("catalog.json");
  const catalog = parseCatalog(readJson(filePath), options);

  if (options.verbose) {
    const platforms = PLATFORMS.map((platform) => {
      const count = catalog.candidates.filter(
        ({ entry }) =>
          entry.platformRestrictions.size === 0 || entry.platformRestrictions.has(platform),
      ).length;
      return `${platform}=${count}`;
    }).join(" ");
    console.log(
      `[catalog] Loaded ${catalog.candidates.length} candidates (version ${catalog.version}) from ${filePath}; ${platforms}`,
    );
  }

  return catalog;
}
