import { describe, expect, it, vi } from 'vitest';

import { createPgCandidateSupplier, createScanningCandidateSupplier } from '../candidate-supplier';
import { CompatibilityEngine } from '../compatibility-engine';
import type { CandidateQuery, JobRecord, RankedCandidate } from '../types';
import { DEFAULT_WEIGHTS } from '../weights';
import { jobRecord } from './fixtures';

const query: CandidateQuery = {
  profile: { skills: [1, 0], experience: [1, 0], goals: [0, 1] },
  weights: DEFAULT_WEIGHTS,
  limit: 10
};

const jobs: JobRecord[] = [
  jobRecord('broad', [1, 1], [1, 0]),
  jobRecord('narrow', [1, 0], [1, 0]),
  jobRecord('none', [0, 0], [0, 1]),
  jobRecord('archived', [1, 0], [1, 0], false)
];

describe('createScanningCandidateSupplier', () => {
  it('ranks active jobs with the weighted formula', async () => {
    const supplier = createScanningCandidateSupplier(async () => jobs);

    const ranked = await supplier(query);

    expect(ranked.map((candidate) => candidate.jobId)).toEqual(['broad', 'narrow', 'none']);
    expect(ranked[0].preliminaryScore).toBeCloseTo(0.4 * Math.SQRT1_2 + 0.35 + 0.25 * Math.SQRT1_2, 10);
    expect(ranked[1].preliminaryScore).toBeCloseTo(0.75, 10);
    expect(ranked[2].preliminaryScore).toBe(0);
  });

  it('caps the result at the query limit', async () => {
    const supplier = createScanningCandidateSupplier(async () => jobs);

    const ranked = await supplier({ ...query, limit: 1 });

    expect(ranked.map((candidate) => candidate.jobId)).toEqual(['broad']);
  });

  it('propagates load failures', async () => {
    const supplier = createScanningCandidateSupplier(async () => {
      throw new Error('connection reset');
    });

    await expect(supplier(query)).rejects.toThrow('connection reset');
  });
});

describe('createPgCandidateSupplier', () => {
  it('delegates ranking to the store', async () => {
    const rows: Array<RankedCandidate<JobRecord>> = [
      { jobId: 'narrow', job: jobs[1], embeddings: jobs[1].embeddings, preliminaryScore: 0.75 }
    ];
    const store = { rankActiveJobs: vi.fn(async (_query: CandidateQuery) => rows) };

    await expect(createPgCandidateSupplier(store)(query)).resolves.toBe(rows);
    expect(store.rankActiveJobs).toHaveBeenCalledWith(query);
  });
});

describe('engine with the scanning supplier', () => {
  it('produces the same order as the store ranking for the same data', async () => {
    const engine = new CompatibilityEngine({ weights: DEFAULT_WEIGHTS, dimensions: 2 });
    const scanning = createScanningCandidateSupplier(async () => jobs);
    const presorted = await scanning(query);
    const pushdown = createPgCandidateSupplier({ rankActiveJobs: async () => presorted });

    const viaScan = await engine.findCompatible(query.profile, scanning, { limit: 10, minScore: 0 });
    const viaPushdown = await engine.findCompatible(query.profile, pushdown, { limit: 10, minScore: 0 });

    expect(viaScan.map((match) => match.jobId)).toEqual(['broad', 'narrow', 'none']);
    expect(viaPushdown).toEqual(viaScan);
  });
});
