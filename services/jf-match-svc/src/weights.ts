import { ServiceError } from '@jobfit/common';

import type { WeightConfig } from './types';
import { clampUnit } from './vector-math';

const WEIGHT_SUM_TOLERANCE = 1e-9;
const WEIGHT_NAMES: ReadonlyArray<keyof WeightConfig> = ['skills', 'experience', 'goals'];

export const DEFAULT_WEIGHTS: WeightConfig = Object.freeze({
  skills: 0.4,
  experience: 0.35,
  goals: 0.25
});

/**
 * Validates and freezes a weight configuration. Every weight must be a finite,
 * non-negative number and together they must sum to 1.0, which keeps the
 * overall score inside [0, 1] whenever the components are.
 */
export function createWeightConfig(weights: WeightConfig): WeightConfig {
  for (const name of WEIGHT_NAMES) {
    const value = weights[name];
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ServiceError(`Weight "${name}" must be a finite, non-negative number.`, {
        code: 'invalid_weights',
        details: { name, value }
      });
    }
  }

  const total = weights.skills + weights.experience + weights.goals;
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ServiceError(`Compatibility weights must sum to 1.0, received ${total}.`, {
      code: 'invalid_weights',
      details: { ...weights, total }
    });
  }

  return Object.freeze({
    skills: weights.skills,
    experience: weights.experience,
    goals: weights.goals
  });
}

export function weightedScore(
  components: { skillsMatch: number; experienceMatch: number; goalsAlignment: number },
  weights: WeightConfig
): number {
  // Clamped so rounding in the weights cannot push the sum past 1.
  return clampUnit(
    components.skillsMatch * weights.skills +
      components.experienceMatch * weights.experience +
      components.goalsAlignment * weights.goals
  );
}
