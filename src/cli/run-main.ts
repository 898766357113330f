import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { CatalogValidationError } from "../../packages/core/src/catalog/catalog-loader.js";
import { catalogListCommand, type CatalogListOptions } from "../commands/catalog.js";
import { planCommand, type PlanOptions } from "../commands/plan.js";
import { recommendCommand, type RecommendOptions } from "../commands/recommend.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

const VERSION = "0.1.0";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function formatCliError(error: unknown): string {
  if (error instanceof CatalogValidationError) {
    return `[loadout] ${error.message}\n  ${error.suggestion}`;
  }
  return `[loadout] ${error instanceof Error ? error.message : String(error)}`;
}

async function runAction(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    runtime.error(formatCliError(error));
    process.exitCode = 1;
  }
}

function withMachineOptions(command: Command): Command {
  return command
    .option("--hardware <file>", "JSON file describing the machine")
    .option("--platform <platform>", "windows, mac or linux")
    .option("--gpu <vendor>", "nvidia, amd, apple, intel or none")
    .option("--vram <gb>", "Dedicated GPU memory in GB")
    .option("--unified-memory <gb>", "Unified memory in GB (Apple silicon)")
    .option("--ram <gb>", "System RAM in GB")
    .option("--storage <gb>", "Free storage in GB")
    .option("--quants <formats>", "Comma-separated quantization formats the runtime supports")
    .option("--compute-capability <x.y>", "CUDA compute capability of an NVIDIA GPU")
    .option(
      "--preset <name>",
      "Preference preset: balanced, quality-first, speed-first, beginner, power-user",
    )
    .option("--answers <ratings>", "Five 1-5 ratings: quality,speed,control,consistency,simplicity")
    .option("--override <factor=value>", "Pin one factor weight (repeatable)", collect, [])
    .option("--tags <tags>", "Comma-separated style tags")
    .option("--approach <approach>", "minimal, monolithic or modular")
    .option("--commercial-only", "Exclude models without a commercial-use license")
    .option("--catalog <file>", "Catalog JSON to use instead of the bundled one");
}

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command();
  program
    .name("loadout")
    .description("Recommend local generative models that fit your machine")
    .version(VERSION);

  withMachineOptions(
    program
      .command("recommend")
      .description("Rank catalog models against your hardware and preferences"),
  )
    .option("--use-case <name>", "Use case the model should cover, e.g. txt2img")
    .option("--modality <list>", "Comma-separated modalities: image, video, audio, text, 3d")
    .option("--limit <n>", "How many ranked models to print")
    .option("--explain", "Print the full reasoning trace")
    .option("--manifest [id]", "Print an install plan for the top pick or the given model")
    .option("--json", "Output JSON")
    .action(async (opts: RecommendOptions) => {
      await runAction(runtime, () => recommendCommand(opts, runtime));
    });

  withMachineOptions(
    program
      .command("plan")
      .description("Pick one model per use case and fit the set into free storage"),
  )
    .option("--use-cases <list>", "Comma-separated use cases, e.g. txt2img,chat")
    .option("--buffer <gb>", "Storage to keep free as workspace")
    .option("--json", "Output JSON")
    .action(async (opts: PlanOptions) => {
      await runAction(runtime, () => planCommand(opts, runtime));
    });

  const catalog = program.command("catalog").description("Inspect the model catalog");
  catalog
    .command("list")
    .description("List catalog entries and their requirements")
    .option("--catalog <file>", "Catalog JSON to use instead of the bundled one")
    .option("--modality <modality>", "Only show one modality")
    .option("--fallback", "Include fallback-only variants")
    .option("--json", "Output JSON")
    .action(async (opts: CatalogListOptions) => {
      await runAction(runtime, () => catalogListCommand(opts, runtime));
    });

  return program;
}

export async function runCli(argv: string[] = process.argv, runtime: RuntimeEnv = defaultRuntime) {
  await buildProgram(runtime).parseAsync(argv);
}

export function isCliMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return fs.realpathSync(path.resolve(entry)) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isCliMainModule()) {
  runCli().catch((error: unknown) => {
    console.error(formatCliError(error));
    process.exit(1);
  });
}
