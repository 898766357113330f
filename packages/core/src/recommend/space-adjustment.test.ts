import { describe, expect, it } from "vitest";
import {
  adjustForSpace,
  installPriority,
  planInstalls,
  type PlannedInstall,
} from "./space-adjustment.js";
import { makeCandidate, makeCatalog, makeHardware } from "./test-fixtures.js";
import type { UserPreferences } from "./types.js";

function makeInstall(overrides: Partial<PlannedInstall> = {}): PlannedInstall {
  return {
    candidateId: "model",
    name: "Model",
    useCases: ["txt2img"],
    sizeGB: 5,
    hasCloudAlternative: false,
    ...overrides,
  };
}

const ids = (installs: readonly PlannedInstall[]) => installs.map((install) => install.candidateId);

describe("installPriority", () => {
  it("takes the most important use case an install covers", () => {
    expect(installPriority(makeInstall({ useCases: ["chat", "txt2img"] }))).toBe(1);
    expect(installPriority(makeInstall({ useCases: ["sculpting"] }))).toBe(99);
  });
});

describe("adjustForSpace", () => {
  it("keeps everything when the picks fit beside the workspace buffer", () => {
    const installs = [
      makeInstall({ candidateId: "a" }),
      makeInstall({ candidateId: "b", sizeGB: 3 }),
    ];

    expect(adjustForSpace(installs, 30)).toEqual({
      fits: true,
      kept: installs,
      removed: [],
      cloudFallback: [],
      neededGB: 8,
      availableGB: 30,
      shortGB: 0,
      suggestions: [],
    });
  });

  it("treats an empty plan as fitting", () => {
    const adjustment = adjustForSpace([], 0);
    expect(adjustment.fits).toBe(true);
    expect(adjustment.neededGB).toBe(0);
  });

  it("fills storage by use-case priority and offers hosted fallbacks", () => {
    const installs = [
      makeInstall({
        candidateId: "chat",
        name: "Chat Model",
        useCases: ["chat"],
        sizeGB: 8,
        hasCloudAlternative: true,
      }),
      makeInstall({ candidateId: "video", useCases: ["txt2vid"], sizeGB: 20 }),
      makeInstall({
        candidateId: "image",
        useCases: ["txt2img"],
        sizeGB: 7,
        hasCloudAlternative: true,
      }),
      makeInstall({ candidateId: "speech", useCases: ["tts"], sizeGB: 1 }),
    ];

    const adjustment = adjustForSpace(installs, 40);

    expect(adjustment.fits).toBe(false);
    expect(ids(adjustment.kept)).toEqual(["image", "video", "speech"]);
    expect(ids(adjustment.removed)).toEqual(["chat"]);
    expect(ids(adjustment.cloudFallback)).toEqual(["chat"]);
    expect(adjustment.neededGB).toBe(36);
    expect(adjustment.shortGB).toBe(6);
    expect(adjustment.suggestions).toEqual([
      "Free up 6GB of disk space to install every pick",
      "Use a hosted API for: Chat Model",
    ]);
  });

  it("names at most three fallbacks and counts local-only removals", () => {
    const installs = ["A", "B", "C", "D"].map((name) =>
      makeInstall({
        candidateId: name,
        name,
        useCases: ["chat"],
        sizeGB: 10,
        hasCloudAlternative: true,
      }),
    );
    installs.push(makeInstall({ candidateId: "E", name: "E", useCases: ["chat"], sizeGB: 10 }));

    const adjustment = adjustForSpace(installs, 15);

    expect(adjustment.kept).toEqual([]);
    expect(ids(adjustment.removed)).toEqual(["A", "B", "C", "D", "E"]);
    expect(adjustment.suggestions).toEqual([
      "Free up 45GB of disk space to install every pick",
      "Use a hosted API for: A, B, C, and 1 more",
      "1 removed pick(s) have no hosted alternative; free storage for these first",
    ]);
  });

  it("accepts custom priorities and buffer", () => {
    const installs = [
      makeInstall({ candidateId: "image", useCases: ["txt2img"], sizeGB: 7 }),
      makeInstall({ candidateId: "chat", useCases: ["chat"], sizeGB: 8 }),
    ];

    const adjustment = adjustForSpace(installs, 10, { priorities: { chat: 0 }, bufferGB: 0 });

    expect(ids(adjustment.kept)).toEqual(["chat"]);
    expect(ids(adjustment.removed)).toEqual(["image"]);
    expect(adjustment.shortGB).toBe(5);
  });
});

describe("planInstalls", () => {
  const preferences: UserPreferences = { factors: { kind: "preset", preset: "balanced" } };
  const catalog = makeCatalog(
    [
      makeCandidate({
        id: "img-a",
        name: "Image A",
        modality: "image",
        useCases: ["txt2img", "img2img"],
        sizeGB: 6,
        components: ["vae"],
        hasCloudAlternative: true,
      }),
      makeCandidate({
        id: "chat-a",
        name: "Chat A",
        modality: "text",
        useCases: ["chat"],
        sizeGB: 5,
      }),
      makeCandidate({
        id: "vid-a",
        name: "Video A",
        modality: "video",
        useCases: ["txt2vid"],
        sizeGB: 90,
      }),
    ],
    { components: [{ id: "vae", name: "VAE", sizeGB: 0.5 }] },
  );

  it("picks one model per use case and merges shared picks", () => {
    const plan = planInstalls({
      hardware: makeHardware({ freeStorageGB: 100 }),
      catalog,
      preferences,
      useCases: ["txt2img", "img2img", "chat", "txt2vid"],
    });

    expect(plan.installs).toEqual([
      {
        candidateId: "img-a",
        name: "Image A",
        useCases: ["txt2img", "img2img"],
        sizeGB: 6.5,
        hasCloudAlternative: true,
      },
      {
        candidateId: "chat-a",
        name: "Chat A",
        useCases: ["chat"],
        sizeGB: 5,
        hasCloudAlternative: false,
      },
    ]);
    expect(plan.uncovered).toEqual(["txt2vid"]);
    expect(plan.adjustment.fits).toBe(true);
    expect(plan.adjustment.neededGB).toBe(11.5);
  });

  it("drops the lower-priority pick when the set overflows storage", () => {
    const plan = planInstalls({
      hardware: makeHardware({ freeStorageGB: 20 }),
      catalog,
      preferences,
      useCases: ["chat", "txt2img"],
    });

    expect(ids(plan.adjustment.kept)).toEqual(["img-a"]);
    expect(ids(plan.adjustment.removed)).toEqual(["chat-a"]);
    expect(plan.adjustment.shortGB).toBe(1.5);
    expect(plan.adjustment.suggestions).toEqual([
      "Free up 2GB of disk space to install every pick",
      "1 removed pick(s) have no hosted alternative; free storage for these first",
    ]);
  });

  it("rejects an unknown use case", () => {
    expect(() =>
      planInstalls({ hardware: makeHardware(), catalog, preferences, useCases: ["sculpting"] }),
    ).toThrow(RangeError);
  });
});
