import { describe, expect, it } from "vitest";
import { filterCandidates } from "./constraint-layer.js";
import {
  relativeShortfall,
  resolveEmptyPool,
  suggestCloudOffload,
  tryQuantizationDowngrade,
  tryVariantSubstitution,
  tryWorkflowOptimization,
  type CascadeInput,
} from "./resolution-cascade.js";
import { makeCandidate, makeCatalog, makeHardware } from "./test-fixtures.js";
import type { CatalogCandidate, HardwareSnapshot, Platform } from "./types.js";

function cascadeInput(
  candidates: CatalogCandidate[],
  hardware: HardwareSnapshot,
  options: { substitutions?: Record<string, string>; evaluated?: CatalogCandidate[] } = {},
): CascadeInput {
  const evaluated = options.evaluated ?? candidates;
  const strict = filterCandidates(evaluated, hardware);
  expect(strict.viable).toEqual([]);
  return {
    catalog: makeCatalog(candidates, { substitutions: options.substitutions }),
    evaluated,
    rejections: strict.rejections,
    hardware,
  };
}

// ---------------------------------------------------------------------------
// quantization_downgrade
// ---------------------------------------------------------------------------

describe("tryQuantizationDowngrade", () => {
  it("admits reduced-precision variants when the allowlist is empty", () => {
    const hardware = makeHardware({ allowedQuantizationFormats: new Set<string>() });
    const input = cascadeInput(
      [makeCandidate({ id: "reducible", minVramGB: 12, hasReducedPrecisionVariant: true })],
      hardware,
    );

    const outcome = tryQuantizationDowngrade(input);
    expect(outcome?.strategy).toBe("quantization_downgrade");
    expect(outcome?.viable.map((item) => item.executionMode)).toEqual(["reduced-precision"]);
    expect(outcome?.notes).toEqual([
      "Quantization downgrade admitted 1 reduced-precision candidate(s) outside the windows allowlist; expect lower output quality",
    ]);
  });

  it("returns null without any reduced-precision variant", () => {
    const input = cascadeInput([makeCandidate({ minVramGB: 12 })], makeHardware());
    expect(tryQuantizationDowngrade(input)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// variant_substitution
// ---------------------------------------------------------------------------

describe("tryVariantSubstitution", () => {
  const big = makeCandidate({ id: "dev-16g", family: "dev", minVramGB: 16 });
  const small = makeCandidate({
    id: "schnell-6g",
    family: "schnell",
    minVramGB: 6,
    fallbackOnly: true,
  });

  it("swaps a rejected family for its lower-resource sibling", () => {
    const input = cascadeInput([big, small], makeHardware(), {
      evaluated: [big],
      substitutions: { dev: "schnell" },
    });

    const outcome = tryVariantSubstitution(input);
    expect(outcome?.strategy).toBe("variant_substitution");
    expect(outcome?.notes).toEqual(["Variant substitution: dev -> schnell"]);
    expect(outcome?.viable).toEqual([
      {
        candidate: small,
        executionMode: "native",
        notes: ["Substituted for the larger dev family"],
      },
    ]);
  });

  it("skips substitutes the caller marks ineligible", () => {
    const input = cascadeInput([big, small], makeHardware(), {
      evaluated: [big],
      substitutions: { dev: "schnell" },
    });
    expect(tryVariantSubstitution({ ...input, isEligible: () => false })).toBeNull();
  });

  it("returns null when the sibling does not fit either", () => {
    const tooBig = makeCandidate({ id: "schnell-12g", family: "schnell", minVramGB: 12 });
    const input = cascadeInput([big, tooBig], makeHardware(), {
      evaluated: [big],
      substitutions: { dev: "schnell" },
    });
    expect(tryVariantSubstitution(input)).toBeNull();
  });

  it("returns null without a substitution for the rejected family", () => {
    const input = cascadeInput([big, small], makeHardware(), { evaluated: [big] });
    expect(tryVariantSubstitution(input)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// workflow_optimization
// ---------------------------------------------------------------------------

describe("tryWorkflowOptimization", () => {
  const near = makeCandidate({ id: "near", name: "Near Model", minVramGB: 8.5 });
  const nearish = makeCandidate({ id: "nearish", name: "Nearish Model", minVramGB: 8.7 });

  it("flags only the nearest marginal miss as viable", () => {
    const input = cascadeInput([nearish, near], makeHardware({ effectiveVramGB: 8 }));

    const outcome = tryWorkflowOptimization(input);
    expect(outcome?.strategy).toBe("workflow_optimization");
    expect(outcome?.viable).toEqual([
      {
        candidate: near,
        executionMode: "tiled",
        notes: [
          "Needs 8.5GB VRAM against 8GB; viable with reduced batch size and tiled processing",
          "CPU offload is available to absorb layers that do not fit in VRAM",
        ],
      },
    ]);
    expect(outcome?.notes).toEqual([
      "Workflow optimization: Near Model misses by 6% and is flagged viable with reduced batch/tiled processing",
    ]);
  });

  it("omits the CPU offload note when offload is not viable", () => {
    const input = cascadeInput([near], makeHardware({ cpuOffloadViable: false }));
    expect(tryWorkflowOptimization(input)?.viable[0].notes).toEqual([
      "Needs 8.5GB VRAM against 8GB; viable with reduced batch size and tiled processing",
    ]);
  });

  it("respects a custom tolerance", () => {
    const input = cascadeInput([near], makeHardware());
    expect(tryWorkflowOptimization({ ...input, marginalTolerance: 1.05 })).toBeNull();
  });

  it("never relaxes RAM", () => {
    const input = cascadeInput([makeCandidate({ minRamGB: 17 })], makeHardware({ ramGB: 16 }));
    expect(tryWorkflowOptimization(input)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// cloud_offload_suggested
// ---------------------------------------------------------------------------

describe("suggestCloudOffload", () => {
  it("names the nearest miss and its blocking constraint", () => {
    const input = cascadeInput(
      [
        makeCandidate({ id: "bigger", name: "Bigger Model", minVramGB: 40 }),
        makeCandidate({ id: "huge", name: "Huge Model", minVramGB: 24 }),
      ],
      makeHardware({ effectiveVramGB: 8 }),
    );

    expect(suggestCloudOffload(input)).toEqual({
      strategy: "cloud_offload_suggested",
      viable: [],
      rejections: [],
      notes: [
        "No candidate runs locally. Nearest miss is Huge Model, blocked on vram: needs 24GB, 8GB available (short by 16GB). Consider a cloud provider for this workload",
      ],
    });
  });

  it("describes platform misses without a size gap", () => {
    const input = cascadeInput(
      [
        makeCandidate({
          id: "linux-only",
          name: "Linux Only",
          platformRestrictions: new Set<Platform>(["linux"]),
        }),
      ],
      makeHardware(),
    );
    expect(suggestCloudOffload(input).notes).toEqual([
      "No candidate runs locally. Nearest miss is Linux Only, blocked on platform: requires linux, this machine offers windows. Consider a cloud provider for this workload",
    ]);
  });

  it("explains an empty pool", () => {
    const input = cascadeInput([], makeHardware());
    expect(suggestCloudOffload(input).notes).toEqual([
      "No catalog entries matched this request, so nothing can run locally; a cloud provider is the remaining option",
    ]);
  });
});

describe("relativeShortfall", () => {
  it("is the ratio by which the requirement overshoots", () => {
    const candidate = makeCandidate({ id: "x", minVramGB: 12 });
    const input = cascadeInput([candidate], makeHardware({ effectiveVramGB: 8 }));
    expect(relativeShortfall(candidate, input.rejections[0], input.hardware)).toBe(0.5);
  });

  it("is infinite for platform rejections", () => {
    const candidate = makeCandidate({ platformRestrictions: new Set<Platform>(["mac"]) });
    const input = cascadeInput([candidate], makeHardware());
    expect(relativeShortfall(candidate, input.rejections[0], input.hardware)).toBe(
      Number.POSITIVE_INFINITY,
    );
  });
});

describe("resolveEmptyPool", () => {
  it("prefers quantization downgrade over substitution", () => {
    const big = makeCandidate({
      id: "dev-16g",
      family: "dev",
      minVramGB: 16,
      hasReducedPrecisionVariant: true,
    });
    const small = makeCandidate({ id: "schnell-6g", family: "schnell", fallbackOnly: true });
    const hardware = makeHardware({ allowedQuantizationFormats: new Set<string>() });
    const input = cascadeInput([big, small], hardware, {
      evaluated: [big],
      substitutions: { dev: "schnell" },
    });

    expect(resolveEmptyPool(input).strategy).toBe("quantization_downgrade");
  });

  it("falls through to the cloud suggestion and is repeatable", () => {
    const input = cascadeInput([makeCandidate({ minVramGB: 80 })], makeHardware());
    const first = resolveEmptyPool(input);
    expect(first.strategy).toBe("cloud_offload_suggested");
    expect(resolveEmptyPool(input)).toEqual(first);
  });
});
