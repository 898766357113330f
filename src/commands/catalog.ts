import type { RuntimeEnv } from "../runtime.js";
import { loadCatalog } from "../../packages/core/src/catalog/catalog-loader.js";
import { readEngineConfig } from "../../packages/core/src/recommend/config.js";
import type { CatalogCandidate } from "../../packages/core/src/recommend/types.js";

export interface CatalogListOptions {
  catalog?: string;
  modality?: string;
  fallback?: boolean;
  json?: boolean;
}

function describeFlags(candidate: CatalogCandidate): string[] {
  const { entry } = candidate;
  const flags: string[] = [];
  if (entry.quantizationFormat) {
    flags.push(entry.quantizationFormat);
  }
  if (entry.hasReducedPrecisionVariant) {
    flags.push("reduced-precision variant");
  }
  if (entry.platformRestrictions.size > 0) {
    flags.push(`${[...entry.platformRestrictions].join("/")} only`);
  }
  if (!entry.commercialUse) {
    flags.push("non-commercial");
  }
  if (entry.fallbackOnly) {
    flags.push("fallback only");
  }
  return flags;
}

export async function catalogListCommand(opts: CatalogListOptions, runtime: RuntimeEnv) {
  const config = readEngineConfig();
  const catalog = loadCatalog({ path: opts.catalog ?? config.catalogPath, verbose: config.verbose });
  const modality = opts.modality?.trim().toLowerCase();

  const candidates = catalog.candidates.filter(
    ({ entry }) =>
      (modality === undefined || entry.modality === modality) &&
      (opts.fallback === true || !entry.fallbackOnly),
  );

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        {
          version: catalog.version,
          candidates: candidates.map(({ entry, factors }) => ({
            ...entry,
            platformRestrictions: [...entry.platformRestrictions],
            styleTags: [...entry.styleTags],
            factors,
          })),
          substitutions: Object.fromEntries(catalog.substitutions),
        },
        null,
        2,
      ),
    );
    return;
  }

  runtime.log(`Catalog ${catalog.version}: ${candidates.length} entries`);
  for (const candidate of candidates) {
    const { entry } = candidate;
    const flags = describeFlags(candidate);
    runtime.log(
      `- ${entry.id} (${entry.modality}, ${entry.family}): ${entry.minVramGB}GB VRAM, ${entry.minRamGB}GB RAM, ${entry.sizeGB}GB download${flags.length > 0 ? `; ${flags.join(", ")}` : ""}`,
    );
  }
}
