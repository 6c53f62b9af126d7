import type { JobRecord } from '../types';

const TIMESTAMP = '2024-03-01T00:00:00.000Z';

export function jobRecord(jobId: string, description: number[], requirements: number[], isActive = true): JobRecord {
  return {
    jobId,
    title: `Job ${jobId}`,
    company: null,
    location: null,
    descriptionText: `description for ${jobId}`,
    requirementsText: `requirements for ${jobId}`,
    embeddings: { description, requirements },
    isActive,
    createdAt: TIMESTAMP,
    updatedAt: TIMESTAMP
  };
}
