/**
 * Factor Aggregation
 *
 * Compresses the ~40 raw capability dimensions of a catalog entry, and the
 * user's onboarding answers, into the same five-factor space:
 * quality, speed, control, consistency, simplicity.
 *
 * The dimension → factor grouping is configuration data
 * (packages/core/data/factor-groups.json) passed in by the caller.
 */

import {
  FACTOR_KEYS,
  type CandidateFactorScores,
  type FactorKey,
  type OnboardingAnswers,
  type PreferencePreset,
  type RawPreferences,
  type UserFactorWeights,
} from "./types.js";

export interface FactorGroup {
  dimensions: readonly string[];
  /** Inverted groups score `1 - mean` (e.g. setup complexity → simplicity). */
  inverted: boolean;
}

export type FactorGroups = Readonly<Record<FactorKey, FactorGroup>>;

/** Value used when none of a factor's dimensions are present on an entry. */
export const NEUTRAL_FACTOR_SCORE = 0.5;

const ANSWER_MIN = 1;
const ANSWER_MAX = 5;

export const PREFERENCE_PRESETS: Readonly<Record<PreferencePreset, UserFactorWeights>> = {
  balanced: { quality: 0.6, speed: 0.6, control: 0.6, consistency: 0.6, simplicity: 0.6 },
  "quality-first": { quality: 1, speed: 0.3, control: 0.5, consistency: 0.7, simplicity: 0.3 },
  "speed-first": { quality: 0.4, speed: 1, control: 0.3, consistency: 0.5, simplicity: 0.7 },
  beginner: { quality: 0.6, speed: 0.6, control: 0.2, consistency: 0.5, simplicity: 1 },
  "power-user": { quality: 0.9, speed: 0.4, control: 1, consistency: 0.8, simplicity: 0.1 },
};

export function isPreferencePreset(value: string): value is PreferencePreset {
  return Object.hasOwn(PREFERENCE_PRESETS, value);
}

function mean(values: number[]): number {
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

function assertUnitInterval(label: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`${label} must be within [0, 1], got ${value}`);
  }
}

/**
 * Average each factor's dimension group. Missing dimensions are skipped, not
 * treated as zero.
 */
export function aggregateCandidate(
  rawDimensions: Readonly<Record<string, number>>,
  groups: FactorGroups,
): CandidateFactorScores {
  const scores: Record<FactorKey, number> = {
    quality: NEUTRAL_FACTOR_SCORE,
    speed: NEUTRAL_FACTOR_SCORE,
    control: NEUTRAL_FACTOR_SCORE,
    consistency: NEUTRAL_FACTOR_SCORE,
    simplicity: NEUTRAL_FACTOR_SCORE,
  };

  for (const key of FACTOR_KEYS) {
    const group = groups[key];
    const present: number[] = [];
    for (const dimension of group.dimensions) {
      const value = rawDimensions[dimension];
      if (value === undefined) {
        continue;
      }
      assertUnitInterval(`dimension "${dimension}"`, value);
      present.push(value);
    }
    if (present.length === 0) {
      continue;
    }
    const average = mean(present);
    scores[key] = group.inverted ? 1 - average : average;
  }

  return scores;
}

function answersToWeights(answers: OnboardingAnswers): Record<FactorKey, number> {
  const weights = { ...PREFERENCE_PRESETS.balanced };
  for (const key of FACTOR_KEYS) {
    const answer = answers[key];
    if (!Number.isFinite(answer) || answer < ANSWER_MIN || answer > ANSWER_MAX) {
      throw new RangeError(
        `Onboarding answer "${key}" must be within [${ANSWER_MIN}, ${ANSWER_MAX}], got ${answer}`,
      );
    }
    weights[key] = (answer - ANSWER_MIN) / (ANSWER_MAX - ANSWER_MIN);
  }
  return weights;
}

export function aggregateUser(raw: RawPreferences): UserFactorWeights {
  const weights =
    raw.kind === "answers" ? answersToWeights(raw.answers) : { ...PREFERENCE_PRESETS[raw.preset] };

  for (const key of FACTOR_KEYS) {
    const override = raw.overrides?.[key];
    if (override === undefined) {
      continue;
    }
    assertUnitInterval(`Override "${key}"`, override);
    weights[key] = override;
  }

  return weights;
}

export function factorVector(factors: Readonly<Record<FactorKey, number>>): number[] {
  return FACTOR_KEYS.map((key) => factors[key]);
}
