import pino from 'pino';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { createScanningCandidateSupplier } from '../candidate-supplier';
import { CompatibilityEngine } from '../compatibility-engine';
import { DatastoreError } from '../errors';
import type { MatchingSettings } from '../config';
import { MatchService, type MatchGateway, type MatchStore } from '../match-service';
import type { UpsertJobInput, UpsertProfileInput } from '../pgvector-client';
import type { CandidateSupplier, EmbeddingVector, JobRecord, ProfileRecord } from '../types';
import { DEFAULT_WEIGHTS } from '../weights';

const TIMESTAMP = '2024-03-01T00:00:00.000Z';

const settings: MatchingSettings = {
  weights: { skills: 0.4, experience: 0.35, goals: 0.25 },
  rankingMode: 'scan',
  defaultLimit: 20,
  maxLimit: 100,
  defaultMinScore: 0.6,
  recommendationLimit: 10,
  recommendationMinScore: 0.7
};

/** Backend text points one way, everything else the other, blank text nowhere. */
function embedText(text: string): EmbeddingVector {
  if (text.trim().length === 0) {
    return [0, 0];
  }
  return text.includes('backend') ? [1, 0] : [0, 1];
}

const gateway: MatchGateway = {
  dimensions: 2,
  embedProfile: async (skills, experience, goals) => ({
    skills: embedText(skills),
    experience: embedText(experience),
    goals: embedText(goals)
  }),
  embedJob: async (description, requirements) => ({
    description: embedText(description),
    requirements: embedText(requirements)
  })
};

class InMemoryMatchStore implements MatchStore {
  readonly profiles = new Map<string, ProfileRecord>();
  readonly jobs = new Map<string, JobRecord>();

  async upsertProfile(input: UpsertProfileInput): Promise<ProfileRecord> {
    const record: ProfileRecord = { ...input, createdAt: TIMESTAMP, updatedAt: TIMESTAMP };
    this.profiles.set(input.profileId, record);
    return record;
  }

  async upsertJob(input: UpsertJobInput): Promise<JobRecord> {
    const record: JobRecord = { ...input, createdAt: TIMESTAMP, updatedAt: TIMESTAMP };
    this.jobs.set(input.jobId, record);
    return record;
  }

  async getProfile(profileId: string): Promise<ProfileRecord | null> {
    return this.profiles.get(profileId) ?? null;
  }

  async getJob(jobId: string): Promise<JobRecord | null> {
    return this.jobs.get(jobId) ?? null;
  }

  async setJobActive(jobId: string, isActive: boolean): Promise<JobRecord | null> {
    const existing = this.jobs.get(jobId);
    if (!existing) {
      return null;
    }
    const updated = { ...existing, isActive };
    this.jobs.set(jobId, updated);
    return updated;
  }

  async listActiveJobs(): Promise<JobRecord[]> {
    return [...this.jobs.values()].filter((job) => job.isActive);
  }
}

describe('MatchService', () => {
  let store: InMemoryMatchStore;
  let service: MatchService;

  const build = (supplier?: CandidateSupplier<JobRecord>): MatchService =>
    new MatchService({
      gateway,
      scorer: new CompatibilityEngine({ weights: DEFAULT_WEIGHTS, dimensions: 2 }),
      store,
      supplier: supplier ?? createScanningCandidateSupplier(() => store.listActiveJobs()),
      settings,
      logger: pino({ level: 'silent' })
    });

  beforeEach(async () => {
    store = new InMemoryMatchStore();
    service = build();

    await service.upsertProfile('p-backend', {
      skills: 'backend services',
      experience: 'backend systems',
      goals: 'backend leadership'
    });
    await service.upsertJob('j-backend', {
      title: 'Backend Engineer',
      company: 'Acme',
      description: 'backend platform work',
      requirements: 'backend experience'
    });
    await service.upsertJob('j-design', {
      title: 'Product Designer',
      description: 'design systems',
      requirements: 'portfolio'
    });
  });

  describe('upserts', () => {
    it('embeds and stores a profile, reporting blank fields', async () => {
      const summary = await service.upsertProfile('p-new', { skills: 'design', experience: 'backend', goals: '   ' });

      expect(summary).toEqual({
        profileId: 'p-new',
        dimensions: 2,
        emptyFields: ['goals'],
        updatedAt: TIMESTAMP
      });
      expect(store.profiles.get('p-new')?.embeddings).toEqual({ skills: [0, 1], experience: [1, 0], goals: [0, 0] });
    });

    it('stores jobs as active by default with null optional fields', async () => {
      const summary = await service.upsertJob('j-new', { title: 'Writer', description: '', requirements: 'prose' });

      expect(summary).toEqual({
        jobId: 'j-new',
        isActive: true,
        dimensions: 2,
        emptyFields: ['description'],
        updatedAt: TIMESTAMP
      });
      expect(store.jobs.get('j-new')).toMatchObject({ company: null, location: null });
    });

    it('rejects a blank identifier', async () => {
      await expect(service.upsertProfile('  ', { skills: 'a', experience: 'b', goals: 'c' })).rejects.toMatchObject({
        statusCode: 400,
        message: 'profileId is required.'
      });
    });

    it('toggles job status and reports unknown jobs', async () => {
      await expect(service.setJobActive('j-design', false)).resolves.toMatchObject({
        jobId: 'j-design',
        isActive: false
      });
      await expect(service.setJobActive('j-missing', true)).rejects.toMatchObject({
        statusCode: 404,
        message: 'Job j-missing was not found.'
      });
    });
  });

  describe('getCompatibility', () => {
    it('scores a stored pair', async () => {
      const outcome = await service.getCompatibility('p-backend', 'j-backend');

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.value.job).toEqual({
          jobId: 'j-backend',
          title: 'Backend Engineer',
          company: 'Acme',
          location: null,
          isActive: true,
          updatedAt: TIMESTAMP
        });
        expect(outcome.value.compatibility.overallScore).toBeCloseTo(1, 10);
      }
    });

    it('reports a missing profile or job as not_found', async () => {
      await expect(service.getCompatibility('p-missing', 'j-backend')).resolves.toEqual({
        ok: false,
        error: { kind: 'not_found', message: 'Profile p-missing was not found.', cause: undefined }
      });
      await expect(service.getCompatibility('p-backend', 'j-missing')).resolves.toMatchObject({
        ok: false,
        error: { kind: 'not_found', message: 'Job j-missing was not found.' }
      });
    });

    it('reports a stored vector of the wrong dimension as internal', async () => {
      store.profiles.set('p-wide', {
        profileId: 'p-wide',
        skillsText: 'backend',
        experienceText: 'backend',
        goalsText: 'backend',
        embeddings: { skills: [1, 0, 0], experience: [1, 0, 0], goals: [1, 0, 0] },
        createdAt: TIMESTAMP,
        updatedAt: TIMESTAMP
      });

      await expect(service.getCompatibility('p-wide', 'j-backend')).resolves.toMatchObject({
        ok: false,
        error: {
          kind: 'internal',
          message: 'Embedding profile.skills has 3 dimensions; expected 2 (from configuration).'
        }
      });
    });

    it('reports store failures as datastore_unavailable', async () => {
      vi.spyOn(store, 'getJob').mockRejectedValueOnce(new DatastoreError('Connection terminated due to connection timeout'));

      await expect(service.getCompatibility('p-backend', 'j-backend')).resolves.toMatchObject({
        ok: false,
        error: { kind: 'datastore_unavailable', message: 'Connection terminated due to connection timeout' }
      });
    });
  });

  describe('findCompatibleJobs', () => {
    it('returns jobs above the default threshold', async () => {
      const outcome = await service.findCompatibleJobs('p-backend');

      expect(outcome).toMatchObject({
        ok: true,
        value: { profileId: 'p-backend', total: 1, limit: 20, minScore: 0.6 }
      });
      if (outcome.ok) {
        expect(outcome.value.results.map((entry) => entry.jobId)).toEqual(['j-backend']);
        expect(outcome.value.results[0]).toMatchObject({ title: 'Backend Engineer', company: 'Acme', location: null });
      }
    });

    it('reports no matches as success with an empty list', async () => {
      await service.upsertProfile('p-design', { skills: 'design', experience: 'design', goals: 'design' });
      await service.setJobActive('j-design', false);

      const outcome = await service.findCompatibleJobs('p-design');

      expect(outcome).toMatchObject({ ok: true, value: { total: 0, results: [] } });
    });

    it('honours explicit limit and minScore', async () => {
      const outcome = await service.findCompatibleJobs('p-backend', { limit: 5, minScore: 0 });

      expect(outcome).toMatchObject({ ok: true, value: { total: 2, limit: 5, minScore: 0 } });
    });

    it('rejects a limit above the maximum', async () => {
      await expect(service.findCompatibleJobs('p-backend', { limit: 101 })).resolves.toMatchObject({
        ok: false,
        error: { kind: 'invalid_request', message: 'limit must not exceed 100.' }
      });
    });

    it('reports an out-of-range minScore as invalid_request', async () => {
      await expect(service.findCompatibleJobs('p-backend', { minScore: 2 })).resolves.toMatchObject({
        ok: false,
        error: { kind: 'invalid_request', message: 'minScore must be between 0.0 and 1.0.' }
      });
    });

    it('reports store failures from the supplier as datastore_unavailable', async () => {
      const failing = build(async () => {
        throw new DatastoreError('connection terminated unexpectedly');
      });

      await expect(failing.findCompatibleJobs('p-backend')).resolves.toMatchObject({
        ok: false,
        error: { kind: 'datastore_unavailable', message: 'connection terminated unexpectedly' }
      });
    });

    it('reports programming errors from the supplier as internal', async () => {
      const failing = build(async () => {
        throw new TypeError("Cannot read properties of undefined (reading 'description')");
      });

      await expect(failing.findCompatibleJobs('p-backend')).resolves.toMatchObject({
        ok: false,
        error: { kind: 'internal', message: "Cannot read properties of undefined (reading 'description')" }
      });
    });

    it('reports an unknown profile as not_found', async () => {
      await expect(service.findCompatibleJobs('p-missing')).resolves.toMatchObject({
        ok: false,
        error: { kind: 'not_found' }
      });
    });
  });

  describe('recommendJobs', () => {
    it('uses the recommendation limit and threshold', async () => {
      const supplier = vi.fn(createScanningCandidateSupplier(() => store.listActiveJobs()));
      const recommending = build(supplier);

      const outcome = await recommending.recommendJobs('p-backend');

      expect(outcome).toMatchObject({ ok: true, value: { limit: 10, minScore: 0.7, total: 1 } });
      expect(supplier).toHaveBeenCalledWith(expect.objectContaining({ limit: 10 }));
    });
  });
});
