import { describe, expect, it } from "vitest";
import { evaluateCandidate, filterCandidates, formatGB, isRejection } from "./constraint-layer.js";
import { makeCandidate, makeHardware } from "./test-fixtures.js";
import type { Platform } from "./types.js";

describe("formatGB", () => {
  it("rounds to two decimals", () => {
    expect(formatGB(24)).toBe("24GB");
    expect(formatGB(6.789)).toBe("6.79GB");
  });
});

describe("evaluateCandidate", () => {
  it("rejects on VRAM without a reduced-precision variant", () => {
    const hardware = makeHardware({ effectiveVramGB: 8, ramGB: 16, platform: "windows" });
    const candidate = makeCandidate({ id: "big-model", name: "Big Model", minVramGB: 24 });

    expect(evaluateCandidate(candidate, hardware)).toEqual({
      candidateId: "big-model",
      constraint: "vram",
      required: "24GB",
      available: "8GB",
      message: "Big Model needs 24GB VRAM, only 8GB available and no usable reduced-precision variant",
    });
  });

  it("admits a reduced-precision variant with a quality-impact note", () => {
    const hardware = makeHardware({ effectiveVramGB: 8, ramGB: 16, platform: "windows" });
    const candidate = makeCandidate({
      id: "big-model",
      minVramGB: 24,
      hasReducedPrecisionVariant: true,
    });

    const outcome = evaluateCandidate(candidate, hardware);
    expect(isRejection(outcome)).toBe(false);
    expect(outcome).toEqual({
      candidate,
      executionMode: "reduced-precision",
      notes: [
        "Quality impact: runs as a reduced-precision variant (Q4_0, Q4_K_M, Q5_0, Q5_K_M, Q6_K, Q8_0) to fit 8GB VRAM",
      ],
    });
  });

  it("does not use a reduced-precision variant when the platform allows no quant format", () => {
    const hardware = makeHardware({ allowedQuantizationFormats: new Set<string>() });
    const candidate = makeCandidate({ minVramGB: 24, hasReducedPrecisionVariant: true });

    const outcome = evaluateCandidate(candidate, hardware);
    expect(isRejection(outcome) && outcome.constraint).toBe("vram");
  });

  it("forces the variant when the allowlist is ignored", () => {
    const hardware = makeHardware({ allowedQuantizationFormats: new Set<string>() });
    const candidate = makeCandidate({ minVramGB: 24, hasReducedPrecisionVariant: true });

    const outcome = evaluateCandidate(candidate, hardware, { ignoreQuantizationAllowlist: true });
    expect(outcome).toEqual({
      candidate,
      executionMode: "reduced-precision",
      notes: [
        "Quality impact: forced reduced-precision variant outside the windows quantization allowlist",
      ],
    });
  });

  it("rejects a mac-only entry whose quant format mac cannot load, even with enough VRAM", () => {
    const hardware = makeHardware({
      platform: "mac",
      gpuVendor: "apple",
      effectiveVramGB: 18,
      ramGB: 24,
      allowedQuantizationFormats: new Set(["Q4_0", "Q5_0", "Q8_0"]),
    });
    const candidate = makeCandidate({
      id: "kquant-model",
      name: "K-Quant Model",
      minVramGB: 12,
      platformRestrictions: new Set<Platform>(["mac"]),
      quantizationFormat: "Q4_K_M",
    });

    expect(evaluateCandidate(candidate, hardware)).toEqual({
      candidateId: "kquant-model",
      constraint: "platform",
      required: "Q4_K_M",
      available: "Q4_0, Q5_0, Q8_0",
      message: "K-Quant Model ships Q4_K_M weights, which mac cannot load",
    });
  });

  it("rejects entries restricted to other platforms", () => {
    const candidate = makeCandidate({
      name: "Linux Only",
      platformRestrictions: new Set<Platform>(["linux"]),
    });
    const outcome = evaluateCandidate(candidate, makeHardware());

    expect(outcome).toMatchObject({
      constraint: "platform",
      required: "linux",
      available: "windows",
      message: "Linux Only is not supported on windows",
    });
  });

  it("rejects on RAM with no relaxation", () => {
    const candidate = makeCandidate({ minRamGB: 32 });
    expect(evaluateCandidate(candidate, makeHardware(), { tolerance: 3 })).toMatchObject({
      constraint: "ram",
      required: "32GB",
      available: "16GB",
    });
  });

  it("keeps a fifth of free storage as workspace", () => {
    const candidate = makeCandidate({ sizeGB: 90 });
    expect(evaluateCandidate(candidate, makeHardware({ freeStorageGB: 100 }))).toMatchObject({
      constraint: "storage",
      required: "90GB",
      available: "80GB",
    });
  });

  it("reports only the first failing check", () => {
    const candidate = makeCandidate({ minVramGB: 24, minRamGB: 64, sizeGB: 500 });
    const outcome = evaluateCandidate(candidate, makeHardware());
    expect(isRejection(outcome) && outcome.constraint).toBe("vram");
  });

  it("flags marginal VRAM misses as tiled under a tolerance", () => {
    const candidate = makeCandidate({ minVramGB: 8.5 });
    const hardware = makeHardware({ effectiveVramGB: 8 });

    expect(isRejection(evaluateCandidate(candidate, hardware))).toBe(true);
    expect(evaluateCandidate(candidate, hardware, { tolerance: 1.1 })).toEqual({
      candidate,
      executionMode: "tiled",
      notes: ["Needs 8.5GB VRAM against 8GB; viable with reduced batch size and tiled processing"],
    });
  });

  it("flags marginal storage misses as tiled under a tolerance", () => {
    const candidate = makeCandidate({ sizeGB: 85 });
    const outcome = evaluateCandidate(candidate, makeHardware({ freeStorageGB: 100 }), {
      tolerance: 1.1,
    });
    expect(isRejection(outcome) ? null : outcome.executionMode).toBe("tiled");
  });

  it("keeps a reduced-precision admission when storage is only marginally short", () => {
    const hardware = makeHardware({ effectiveVramGB: 8, freeStorageGB: 100 });
    const candidate = makeCandidate({
      id: "big-quant",
      minVramGB: 24,
      sizeGB: 84,
      hasReducedPrecisionVariant: true,
    });

    expect(evaluateCandidate(candidate, hardware)).toMatchObject({
      constraint: "storage",
      required: "84GB",
      available: "80GB",
    });
    expect(evaluateCandidate(candidate, hardware, { tolerance: 1.1 })).toEqual({
      candidate,
      executionMode: "reduced-precision",
      notes: [
        "Quality impact: runs as a reduced-precision variant (Q4_0, Q4_K_M, Q5_0, Q5_K_M, Q6_K, Q8_0) to fit 8GB VRAM",
        "Download of 84GB leaves less than the usual workspace margin on 100GB free; keep temporary outputs small",
      ],
    });
  });

  it("rejects an entry that needs a newer CUDA compute capability", () => {
    const candidate = makeCandidate({
      id: "fp8-model",
      name: "FP8 Model",
      minComputeCapability: 8.9,
    });

    expect(evaluateCandidate(candidate, makeHardware({ computeCapability: 8.6 }))).toEqual({
      candidateId: "fp8-model",
      constraint: "platform",
      required: "compute 8.9",
      available: "compute 8.6",
      message: "FP8 Model needs CUDA compute capability 8.9, this GPU has 8.6",
    });
    expect(evaluateCandidate(candidate, makeHardware())).toEqual({
      candidateId: "fp8-model",
      constraint: "platform",
      required: "compute 8.9",
      available: "unknown compute capability",
      message: "FP8 Model needs CUDA compute capability 8.9; this GPU reports none",
    });
  });

  it("admits an entry when the compute capability is sufficient", () => {
    const candidate = makeCandidate({ minComputeCapability: 8.9 });
    const outcome = evaluateCandidate(candidate, makeHardware({ computeCapability: 9 }));
    expect(outcome).toEqual({ candidate, executionMode: "native", notes: [] });
  });
});

describe("filterCandidates", () => {
  it("partitions the input, preserving order, with one outcome per candidate", () => {
    const candidates = [
      makeCandidate({ id: "fits-a", minVramGB: 6 }),
      makeCandidate({ id: "too-big", minVramGB: 48 }),
      makeCandidate({ id: "fits-b", minVramGB: 2 }),
      makeCandidate({ id: "no-ram", minRamGB: 128 }),
    ];
    const hardware = makeHardware();
    const { viable, rejections } = filterCandidates(candidates, hardware);

    expect(viable.map((item) => item.candidate.entry.id)).toEqual(["fits-a", "fits-b"]);
    expect(rejections.map((rejection) => rejection.candidateId)).toEqual(["too-big", "no-ram"]);
    for (const item of viable) {
      expect(item.candidate.entry.minVramGB).toBeLessThanOrEqual(hardware.effectiveVramGB);
      expect(item.candidate.entry.minRamGB).toBeLessThanOrEqual(hardware.ramGB);
    }
  });

  it("returns two empty lists for an empty pool", () => {
    expect(filterCandidates([], makeHardware())).toEqual({ viable: [], rejections: [] });
  });
});
