import { badRequestError } from '@jobfit/common';

import { DimensionMismatchError } from './errors';
import type {
  CandidateSupplier,
  CompatibilityResult,
  CompatibilityScorer,
  CompatibleJob,
  FindCompatibleOptions,
  JobEmbeddingSet,
  ProfileEmbeddingSet,
  WeightConfig
} from './types';
import { cosineSimilarity } from './vector-math';
import { weightedScore } from './weights';

export interface CompatibilityEngineOptions {
  weights: WeightConfig;
  /** When set, every non-empty vector passed to `score` must have this length. */
  dimensions?: number;
}

export function assertFindCompatibleOptions({ limit, minScore }: FindCompatibleOptions): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw badRequestError('limit must be a positive integer.', { limit });
  }

  if (!Number.isFinite(minScore) || minScore < 0 || minScore > 1) {
    throw badRequestError('minScore must be between 0.0 and 1.0.', { minScore });
  }
}

/**
 * Scores job postings against candidate profiles.
 *
 * Pairing is fixed: the job description is compared with the profile's skills
 * and goals, the job requirements with the profile's experience. Holds no
 * state beyond its frozen weights.
 */
export class CompatibilityEngine implements CompatibilityScorer {
  readonly weights: WeightConfig;
  private readonly dimensions?: number;

  constructor({ weights, dimensions }: CompatibilityEngineOptions) {
    this.weights = weights;
    this.dimensions = dimensions;
  }

  score(job: JobEmbeddingSet, profile: ProfileEmbeddingSet): CompatibilityResult {
    this.assertDimensions({
      'job.description': job.description,
      'job.requirements': job.requirements,
      'profile.skills': profile.skills,
      'profile.experience': profile.experience,
      'profile.goals': profile.goals
    });

    const skillsMatch = cosineSimilarity(job.description, profile.skills);
    const experienceMatch = cosineSimilarity(job.requirements, profile.experience);
    const goalsAlignment = cosineSimilarity(job.description, profile.goals);

    return {
      overallScore: weightedScore({ skillsMatch, experienceMatch, goalsAlignment }, this.weights),
      skillsMatch,
      experienceMatch,
      goalsAlignment
    };
  }

  async findCompatible<TJob>(
    profile: ProfileEmbeddingSet,
    supplier: CandidateSupplier<TJob>,
    options: FindCompatibleOptions
  ): Promise<Array<CompatibleJob<TJob>>> {
    assertFindCompatibleOptions(options);

    const candidates = await supplier({ profile, weights: this.weights, limit: options.limit });

    const scored = candidates.slice(0, options.limit).map((candidate) => {
      const breakdown = this.score(candidate.embeddings, profile);
      return {
        jobId: candidate.jobId,
        job: candidate.job,
        overallScore: breakdown.overallScore,
        breakdown
      } satisfies CompatibleJob<TJob>;
    });

    // Array.prototype.sort is stable, so ties keep the supplier's order.
    return scored
      .filter((entry) => entry.overallScore >= options.minScore)
      .sort((a, b) => b.overallScore - a.overallScore);
  }

  private assertDimensions(vectors: Record<string, readonly number[]>): void {
    let expected = this.dimensions;
    let expectedFrom = 'configuration';

    for (const [name, vector] of Object.entries(vectors)) {
      if (vector.length === 0) {
        continue;
      }

      if (expected === undefined) {
        expected = vector.length;
        expectedFrom = name;
        continue;
      }

      if (vector.length !== expected) {
        throw new DimensionMismatchError(
          `Embedding ${name} has ${vector.length} dimensions; expected ${expected} (from ${expectedFrom}).`,
          { vector: name, received: vector.length, expected }
        );
      }
    }
  }
}
