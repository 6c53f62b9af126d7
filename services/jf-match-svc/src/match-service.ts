import { badRequestError, getLogger, notFoundError } from '@jobfit/common';
import type { Logger } from 'pino';

import type { MatchingSettings } from './config';
import type { EmbeddingGateway } from './embedding-gateway';
import {
  classifyMatchError,
  matchFailure,
  matchSuccess,
  type MatchOutcome
} from './match-outcome';
import type { PgVectorClient } from './pgvector-client';
import type {
  CandidateSupplier,
  CompatibilityReport,
  CompatibilityScorer,
  CompatibleJob,
  CompatibleJobEntry,
  CompatibleJobsQuery,
  CompatibleJobsReport,
  FindCompatibleOptions,
  JobRecord,
  JobSummary,
  UpsertJobRequest,
  UpsertJobResponse,
  UpsertProfileRequest,
  UpsertProfileResponse
} from './types';

export type MatchStore = Pick<PgVectorClient, 'upsertProfile' | 'upsertJob' | 'getProfile' | 'getJob' | 'setJobActive'>;

export type MatchGateway = Pick<EmbeddingGateway, 'embedProfile' | 'embedJob' | 'dimensions'>;

export interface MatchServiceOptions {
  gateway: MatchGateway;
  scorer: CompatibilityScorer;
  store: MatchStore;
  supplier: CandidateSupplier<JobRecord>;
  settings: MatchingSettings;
  logger?: Logger;
}

function emptyFields(fields: Record<string, string>): string[] {
  return Object.entries(fields)
    .filter(([, text]) => text.trim().length === 0)
    .map(([name]) => name);
}

function requireId(value: string, name: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw badRequestError(`${name} is required.`);
  }
  return trimmed;
}

export function summarizeJob(job: JobRecord): JobSummary {
  return {
    jobId: job.jobId,
    title: job.title,
    company: job.company,
    location: job.location,
    isActive: job.isActive,
    updatedAt: job.updatedAt
  };
}

function toEntry(match: CompatibleJob<JobRecord>): CompatibleJobEntry {
  return {
    jobId: match.jobId,
    title: match.job.title,
    company: match.job.company,
    location: match.job.location,
    overallScore: match.overallScore,
    breakdown: match.breakdown
  };
}

/**
 * Embeds and stores profiles and jobs, and answers compatibility questions
 * about them. Read operations report failures as outcomes so that "no
 * matches" and "matching failed" stay distinguishable.
 */
export class MatchService {
  private readonly gateway: MatchGateway;
  private readonly scorer: CompatibilityScorer;
  private readonly store: MatchStore;
  private readonly supplier: CandidateSupplier<JobRecord>;
  private readonly settings: MatchingSettings;
  private readonly logger: Logger;

  constructor({ gateway, scorer, store, supplier, settings, logger }: MatchServiceOptions) {
    this.gateway = gateway;
    this.scorer = scorer;
    this.store = store;
    this.supplier = supplier;
    this.settings = settings;
    this.logger = logger ?? getLogger({ module: 'match-service' });
  }

  async upsertProfile(profileId: string, request: UpsertProfileRequest): Promise<UpsertProfileResponse> {
    const id = requireId(profileId, 'profileId');
    const embeddings = await this.gateway.embedProfile(request.skills, request.experience, request.goals);

    const record = await this.store.upsertProfile({
      profileId: id,
      skillsText: request.skills,
      experienceText: request.experience,
      goalsText: request.goals,
      embeddings
    });

    const empty = emptyFields({ skills: request.skills, experience: request.experience, goals: request.goals });
    this.logger.info({ profileId: id, emptyFields: empty }, 'Profile embeddings stored.');

    return {
      profileId: record.profileId,
      dimensions: this.gateway.dimensions,
      emptyFields: empty,
      updatedAt: record.updatedAt
    };
  }

  async upsertJob(jobId: string, request: UpsertJobRequest): Promise<UpsertJobResponse> {
    const id = requireId(jobId, 'jobId');
    const title = request.title.trim();
    if (title.length === 0) {
      throw badRequestError('title is required.');
    }

    const embeddings = await this.gateway.embedJob(request.description, request.requirements);

    const record = await this.store.upsertJob({
      jobId: id,
      title,
      company: request.company ?? null,
      location: request.location ?? null,
      descriptionText: request.description,
      requirementsText: request.requirements,
      embeddings,
      isActive: request.isActive ?? true
    });

    const empty = emptyFields({ description: request.description, requirements: request.requirements });
    this.logger.info({ jobId: id, isActive: record.isActive, emptyFields: empty }, 'Job embeddings stored.');

    return {
      jobId: record.jobId,
      isActive: record.isActive,
      dimensions: this.gateway.dimensions,
      emptyFields: empty,
      updatedAt: record.updatedAt
    };
  }

  async setJobActive(jobId: string, isActive: boolean): Promise<JobSummary> {
    const id = requireId(jobId, 'jobId');
    const record = await this.store.setJobActive(id, isActive);
    if (!record) {
      throw notFoundError(`Job ${id} was not found.`);
    }

    this.logger.info({ jobId: id, isActive }, 'Job status updated.');
    return summarizeJob(record);
  }

  async getCompatibility(profileId: string, jobId: string): Promise<MatchOutcome<CompatibilityReport>> {
    try {
      const [profile, job] = await Promise.all([this.store.getProfile(profileId), this.store.getJob(jobId)]);

      if (!profile) {
        return matchFailure('not_found', `Profile ${profileId} was not found.`);
      }
      if (!job) {
        return matchFailure('not_found', `Job ${jobId} was not found.`);
      }

      return matchSuccess({
        profileId: profile.profileId,
        job: summarizeJob(job),
        compatibility: this.scorer.score(job.embeddings, profile.embeddings)
      });
    } catch (error) {
      return this.fail('getCompatibility', error, { profileId, jobId });
    }
  }

  async findCompatibleJobs(
    profileId: string,
    query: CompatibleJobsQuery = {}
  ): Promise<MatchOutcome<CompatibleJobsReport>> {
    const limit = query.limit ?? this.settings.defaultLimit;
    const minScore = query.minScore ?? this.settings.defaultMinScore;

    if (limit > this.settings.maxLimit) {
      return matchFailure('invalid_request', `limit must not exceed ${this.settings.maxLimit}.`);
    }

    return this.rank(profileId, { limit, minScore });
  }

  async recommendJobs(profileId: string): Promise<MatchOutcome<CompatibleJobsReport>> {
    return this.rank(profileId, {
      limit: this.settings.recommendationLimit,
      minScore: this.settings.recommendationMinScore
    });
  }

  private async rank(profileId: string, options: FindCompatibleOptions): Promise<MatchOutcome<CompatibleJobsReport>> {
    try {
      const profile = await this.store.getProfile(profileId);
      if (!profile) {
        return matchFailure('not_found', `Profile ${profileId} was not found.`);
      }

      const matches = await this.scorer.findCompatible(profile.embeddings, this.supplier, options);

      return matchSuccess({
        profileId: profile.profileId,
        total: matches.length,
        limit: options.limit,
        minScore: options.minScore,
        results: matches.map(toEntry)
      });
    } catch (error) {
      return this.fail('findCompatibleJobs', error, { profileId, ...options });
    }
  }

  private fail<T>(operation: string, error: unknown, context: Record<string, unknown>): MatchOutcome<T> {
    const failure = classifyMatchError(error);

    if (failure.kind === 'invalid_request' || failure.kind === 'not_found') {
      this.logger.warn({ operation, ...context, kind: failure.kind, err: error }, 'Matching request rejected.');
    } else {
      this.logger.error({ operation, ...context, kind: failure.kind, err: error }, 'Matching failed.');
    }

    return { ok: false, error: failure };
  }
}
