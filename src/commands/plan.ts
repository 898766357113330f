import { z } from "zod";
import type { RuntimeEnv } from "../runtime.js";
import { loadCatalog } from "../../packages/core/src/catalog/catalog-loader.js";
import { readEngineConfig } from "../../packages/core/src/recommend/config.js";
import { formatSnapshot } from "../../packages/core/src/recommend/platform.js";
import {
  planInstalls,
  type PlannedInstall,
} from "../../packages/core/src/recommend/space-adjustment.js";
import {
  resolveHardware,
  resolvePreferences,
  splitList,
  type RecommendOptions,
} from "./recommend.js";

export type PlanOptions = Omit<
  RecommendOptions,
  "useCase" | "modality" | "limit" | "explain" | "manifest"
> & {
  useCases?: string;
  buffer?: string;
};

const bufferSchema = z.coerce.number().nonnegative();

function parseBuffer(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const parsed = bufferSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`--buffer must be a non-negative number of GB, got "${raw}"`);
  }
  return parsed.data;
}

function formatInstall(install: PlannedInstall): string {
  return `${install.name} (${install.candidateId}) ${install.sizeGB}GB: ${install.useCases.join(", ")}`;
}

export async function planCommand(opts: PlanOptions, runtime: RuntimeEnv) {
  const useCases = splitList(opts.useCases);
  if (useCases.length === 0) {
    throw new Error("--use-cases takes a comma-separated list, e.g. txt2img,chat");
  }

  const config = readEngineConfig();
  const hardware = await resolveHardware(opts);
  const preferences = resolvePreferences(opts);
  const bufferGB = parseBuffer(opts.buffer, config.workspaceBufferGB);
  const catalog = loadCatalog({
    path: opts.catalog ?? config.catalogPath,
    verbose: config.verbose,
  });

  const plan = planInstalls({
    hardware,
    catalog,
    preferences,
    useCases,
    bufferGB,
    rankingWeights: config.rankingWeights,
    marginalTolerance: config.marginalTolerance,
  });
  const { adjustment } = plan;

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        {
          catalogVersion: catalog.version,
          bufferGB,
          installs: plan.installs,
          uncovered: plan.uncovered,
          adjustment,
        },
        null,
        2,
      ),
    );
    return;
  }

  runtime.log(`Hardware: ${formatSnapshot(hardware)}`);
  runtime.log(
    `Catalog ${catalog.version}: ${adjustment.neededGB}GB for ${plan.installs.length} install(s), ${adjustment.availableGB}GB free, ${bufferGB}GB kept as workspace`,
  );
  for (const install of adjustment.kept) {
    runtime.log(`+ ${formatInstall(install)}`);
  }
  for (const install of adjustment.removed) {
    const hosted = install.hasCloudAlternative ? " (hosted alternative)" : "";
    runtime.log(`- ${formatInstall(install)}${hosted}`);
  }
  if (plan.uncovered.length > 0) {
    runtime.log(`No local pick for: ${plan.uncovered.join(", ")}`);
  }
  for (const suggestion of adjustment.suggestions) {
    runtime.log(`Suggestion: ${suggestion}`);
  }
}
