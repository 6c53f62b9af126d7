import type { Logger } from 'pino';

import type {
  CandidateSupplier,
  CompatibilityResult,
  CompatibilityScorer,
  CompatibleJob,
  FindCompatibleOptions,
  JobEmbeddingSet,
  ProfileEmbeddingSet
} from './types';

function elapsedMs(started: bigint): number {
  return Number(process.hrtime.bigint() - started) / 1_000_000;
}

/**
 * Wraps a scorer so both operations report their duration and outcome.
 * Failures are logged and rethrown unchanged.
 */
export function instrumentScorer(scorer: CompatibilityScorer, logger: Logger): CompatibilityScorer {
  return {
    score(job: JobEmbeddingSet, profile: ProfileEmbeddingSet): CompatibilityResult {
      const started = process.hrtime.bigint();
      try {
        const result = scorer.score(job, profile);
        logger.debug(
          { operation: 'score', durationMs: elapsedMs(started), overallScore: result.overallScore },
          'Compatibility scored.'
        );
        return result;
      } catch (error) {
        logger.error({ operation: 'score', durationMs: elapsedMs(started), err: error }, 'Compatibility scoring failed.');
        throw error;
      }
    },

    async findCompatible<TJob>(
      profile: ProfileEmbeddingSet,
      supplier: CandidateSupplier<TJob>,
      options: FindCompatibleOptions
    ): Promise<Array<CompatibleJob<TJob>>> {
      const started = process.hrtime.bigint();
      try {
        const matches = await scorer.findCompatible(profile, supplier, options);
        logger.debug(
          {
            operation: 'findCompatible',
            durationMs: elapsedMs(started),
            limit: options.limit,
            minScore: options.minScore,
            matches: matches.length
          },
          'Compatible jobs ranked.'
        );
        return matches;
      } catch (error) {
        logger.error(
          {
            operation: 'findCompatible',
            durationMs: elapsedMs(started),
            limit: options.limit,
            minScore: options.minScore,
            err: error
          },
          'Compatible job search failed.'
        );
        throw error;
      }
    }
  };
}
