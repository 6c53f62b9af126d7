import type { FastifySchema } from 'fastify';

const identifierSchema = { type: 'string', minLength: 1, maxLength: 128 } as const;

const sourceTextSchema = { type: 'string', maxLength: 50_000 } as const;

const profileParamsSchema = {
  type: 'object',
  required: ['profileId'],
  properties: {
    profileId: identifierSchema
  }
} as const;

const jobParamsSchema = {
  type: 'object',
  required: ['jobId'],
  properties: {
    jobId: identifierSchema
  }
} as const;

const breakdownSchema = {
  type: 'object',
  required: ['overallScore', 'skillsMatch', 'experienceMatch', 'goalsAlignment'],
  properties: {
    overallScore: { type: 'number' },
    skillsMatch: { type: 'number' },
    experienceMatch: { type: 'number' },
    goalsAlignment: { type: 'number' }
  }
} as const;

const compatibleJobsResponseSchema = {
  type: 'object',
  required: ['profileId', 'total', 'limit', 'minScore', 'results'],
  properties: {
    profileId: { type: 'string' },
    total: { type: 'integer' },
    limit: { type: 'integer' },
    minScore: { type: 'number' },
    results: {
      type: 'array',
      items: {
        type: 'object',
        required: ['jobId', 'title', 'overallScore', 'breakdown'],
        properties: {
          jobId: { type: 'string' },
          title: { type: 'string' },
          company: { type: ['string', 'null'] },
          location: { type: ['string', 'null'] },
          overallScore: { type: 'number' },
          breakdown: breakdownSchema
        }
      }
    }
  }
} as const;

export const upsertProfileSchema: FastifySchema = {
  params: profileParamsSchema,
  body: {
    type: 'object',
    additionalProperties: false,
    required: ['skills', 'experience', 'goals'],
    properties: {
      skills: sourceTextSchema,
      experience: sourceTextSchema,
      goals: sourceTextSchema
    }
  }
};

export const upsertJobSchema: FastifySchema = {
  params: jobParamsSchema,
  body: {
    type: 'object',
    additionalProperties: false,
    required: ['title', 'description', 'requirements'],
    properties: {
      title: { type: 'string', minLength: 1, maxLength: 500 },
      company: { type: 'string', maxLength: 500 },
      location: { type: 'string', maxLength: 500 },
      description: sourceTextSchema,
      requirements: sourceTextSchema,
      isActive: { type: 'boolean' }
    }
  }
};

export const updateJobStatusSchema: FastifySchema = {
  params: jobParamsSchema,
  body: {
    type: 'object',
    additionalProperties: false,
    required: ['isActive'],
    properties: {
      isActive: { type: 'boolean' }
    }
  }
};

export const compatibilitySchema: FastifySchema = {
  params: {
    type: 'object',
    required: ['profileId', 'jobId'],
    properties: {
      profileId: identifierSchema,
      jobId: identifierSchema
    }
  },
  response: {
    200: {
      type: 'object',
      required: ['profileId', 'job', 'compatibility'],
      properties: {
        profileId: { type: 'string' },
        job: {
          type: 'object',
          required: ['jobId', 'title', 'isActive', 'updatedAt'],
          properties: {
            jobId: { type: 'string' },
            title: { type: 'string' },
            company: { type: ['string', 'null'] },
            location: { type: ['string', 'null'] },
            isActive: { type: 'boolean' },
            updatedAt: { type: 'string' }
          }
        },
        compatibility: breakdownSchema
      }
    }
  }
};

export const compatibleJobsSchema: FastifySchema = {
  params: profileParamsSchema,
  querystring: {
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: 100 },
      minScore: { type: 'number', minimum: 0, maximum: 1 }
    }
  },
  response: {
    200: compatibleJobsResponseSchema
  }
};

export const recommendationsSchema: FastifySchema = {
  params: profileParamsSchema,
  response: {
    200: compatibleJobsResponseSchema
  }
};
