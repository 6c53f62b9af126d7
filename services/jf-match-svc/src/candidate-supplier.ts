import type { PgVectorClient } from './pgvector-client';
import type { CandidateSupplier, JobRecord, RankedCandidate } from './types';
import { cosineSimilarity } from './vector-math';
import { weightedScore } from './weights';

export type RankingStore = Pick<PgVectorClient, 'rankActiveJobs'>;

/** Ranking happens in Postgres; only the best `limit` rows come back. */
export function createPgCandidateSupplier(store: RankingStore): CandidateSupplier<JobRecord> {
  return (query) => store.rankActiveJobs(query);
}

/**
 * Loads every active job and ranks them in process with the query's weights.
 * Used where the store cannot evaluate the weighted formula itself.
 */
export function createScanningCandidateSupplier(
  loadActiveJobs: () => Promise<JobRecord[]>
): CandidateSupplier<JobRecord> {
  return async ({ profile, weights, limit }) => {
    const jobs = await loadActiveJobs();

    const ranked: Array<RankedCandidate<JobRecord>> = jobs
      .filter((job) => job.isActive)
      .map((job) => ({
        jobId: job.jobId,
        job,
        embeddings: job.embeddings,
        preliminaryScore: weightedScore(
          {
            skillsMatch: cosineSimilarity(job.embeddings.description, profile.skills),
            experienceMatch: cosineSimilarity(job.embeddings.requirements, profile.experience),
            goalsAlignment: cosineSimilarity(job.embeddings.description, profile.goals)
          },
          weights
        )
      }));

    return ranked.sort((a, b) => b.preliminaryScore - a.preliminaryScore).slice(0, limit);
  };
}
