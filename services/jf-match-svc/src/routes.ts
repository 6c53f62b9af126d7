import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { badRequestError, internalError, notFoundError, serviceUnavailableError } from '@jobfit/common';

import type { MatchOutcome } from './match-outcome';
import type { MatchService } from './match-service';
import type { PgVectorClient } from './pgvector-client';
import {
  compatibilitySchema,
  compatibleJobsSchema,
  recommendationsSchema,
  updateJobStatusSchema,
  upsertJobSchema,
  upsertProfileSchema
} from './schemas';
import type { CompatibleJobsQuery, UpdateJobStatusRequest, UpsertJobRequest, UpsertProfileRequest } from './types';

export const MATCHING_UNAVAILABLE_MESSAGE = 'Matching is temporarily unavailable.';

export type MatchRouteService = Pick<
  MatchService,
  'upsertProfile' | 'upsertJob' | 'setJobActive' | 'getCompatibility' | 'findCompatibleJobs' | 'recommendJobs'
>;

export interface RegisterRoutesOptions {
  serviceName: string;
  service: MatchRouteService | null;
  store: Pick<PgVectorClient, 'healthCheck'> | null;
  state: { isReady: boolean };
}

interface ProfileParams {
  profileId: string;
}

interface JobParams {
  jobId: string;
}

function unwrapOutcome<T>(outcome: MatchOutcome<T>): T {
  if (outcome.ok) {
    return outcome.value;
  }

  switch (outcome.error.kind) {
    case 'invalid_request':
      throw badRequestError(outcome.error.message);
    case 'not_found':
      throw notFoundError(outcome.error.message);
    case 'provider_unavailable':
    case 'datastore_unavailable':
      throw serviceUnavailableError(MATCHING_UNAVAILABLE_MESSAGE);
    case 'internal':
      throw internalError('Matching failed.', { reason: outcome.error.message });
  }
}

export async function registerRoutes(app: FastifyInstance, dependencies: RegisterRoutesOptions): Promise<void> {
  const requireService = (): MatchRouteService => {
    if (!dependencies.state.isReady || !dependencies.service) {
      throw serviceUnavailableError('Service initializing, please retry.');
    }
    return dependencies.service;
  };

  // Answers during initialization too.
  app.get('/health', async (_request, reply: FastifyReply) => {
    if (!dependencies.state.isReady || !dependencies.store) {
      reply.status(503);
      return { status: 'initializing', service: dependencies.serviceName };
    }

    const health = await dependencies.store.healthCheck();
    if (health.status !== 'healthy') {
      reply.status(503);
      return {
        status: health.status,
        message: 'Database connection degraded.',
        poolSize: health.poolSize
      };
    }

    return {
      status: 'ok',
      service: dependencies.serviceName,
      activeJobs: health.activeJobs,
      profiles: health.profiles
    };
  });

  app.put(
    '/v1/profiles/:profileId',
    { schema: upsertProfileSchema },
    async (request: FastifyRequest<{ Params: ProfileParams; Body: UpsertProfileRequest }>) =>
      requireService().upsertProfile(request.params.profileId, request.body)
  );

  app.put(
    '/v1/jobs/:jobId',
    { schema: upsertJobSchema },
    async (request: FastifyRequest<{ Params: JobParams; Body: UpsertJobRequest }>) =>
      requireService().upsertJob(request.params.jobId, request.body)
  );

  app.patch(
    '/v1/jobs/:jobId/status',
    { schema: updateJobStatusSchema },
    async (request: FastifyRequest<{ Params: JobParams; Body: UpdateJobStatusRequest }>) =>
      requireService().setJobActive(request.params.jobId, request.body.isActive)
  );

  app.get(
    '/v1/compatibility/:profileId/:jobId',
    { schema: compatibilitySchema },
    async (request: FastifyRequest<{ Params: ProfileParams & JobParams }>) => {
      const outcome = await requireService().getCompatibility(request.params.profileId, request.params.jobId);
      return unwrapOutcome(outcome);
    }
  );

  app.get(
    '/v1/profiles/:profileId/compatible-jobs',
    { schema: compatibleJobsSchema },
    async (request: FastifyRequest<{ Params: ProfileParams; Querystring: CompatibleJobsQuery }>) => {
      const outcome = await requireService().findCompatibleJobs(request.params.profileId, {
        limit: request.query.limit,
        minScore: request.query.minScore
      });
      return unwrapOutcome(outcome);
    }
  );

  app.get(
    '/v1/profiles/:profileId/recommendations',
    { schema: recommendationsSchema },
    async (request: FastifyRequest<{ Params: ProfileParams }>) => {
      const outcome = await requireService().recommendJobs(request.params.profileId);
      return unwrapOutcome(outcome);
    }
  );
}
