export type EmbeddingVector = number[];

export type EmbeddingProviderName = 'openai' | 'local';

export interface ProfileEmbeddingSet {
  skills: EmbeddingVector;
  experience: EmbeddingVector;
  goals: EmbeddingVector;
}

export interface JobEmbeddingSet {
  description: EmbeddingVector;
  requirements: EmbeddingVector;
}

export interface CompatibilityResult {
  overallScore: number;
  skillsMatch: number;
  experienceMatch: number;
  goalsAlignment: number;
}

export interface WeightConfig {
  readonly skills: number;
  readonly experience: number;
  readonly goals: number;
}

export interface ProfileRecord {
  profileId: string;
  skillsText: string;
  experienceText: string;
  goalsText: string;
  embeddings: ProfileEmbeddingSet;
  createdAt: string;
  updatedAt: string;
}

export interface JobRecord {
  jobId: string;
  title: string;
  company: string | null;
  location: string | null;
  descriptionText: string;
  requirementsText: string;
  embeddings: JobEmbeddingSet;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export type JobSummary = Pick<JobRecord, 'jobId' | 'title' | 'company' | 'location' | 'isActive' | 'updatedAt'>;

export interface CandidateQuery {
  profile: ProfileEmbeddingSet;
  weights: WeightConfig;
  limit: number;
}

export interface RankedCandidate<TJob> {
  jobId: string;
  job: TJob;
  embeddings: JobEmbeddingSet;
  preliminaryScore: number;
}

/**
 * Yields active jobs ranked by the weighted compatibility formula, best first,
 * at most `query.limit` of them.
 */
export type CandidateSupplier<TJob> = (query: CandidateQuery) => Promise<Array<RankedCandidate<TJob>>>;

export interface FindCompatibleOptions {
  limit: number;
  minScore: number;
}

export interface CompatibleJob<TJob> {
  jobId: string;
  job: TJob;
  overallScore: number;
  breakdown: CompatibilityResult;
}

export interface CompatibilityScorer {
  score(job: JobEmbeddingSet, profile: ProfileEmbeddingSet): CompatibilityResult;
  findCompatible<TJob>(
    profile: ProfileEmbeddingSet,
    supplier: CandidateSupplier<TJob>,
    options: FindCompatibleOptions
  ): Promise<Array<CompatibleJob<TJob>>>;
}

export interface UpsertProfileRequest {
  skills: string;
  experience: string;
  goals: string;
}

export interface UpsertJobRequest {
  title: string;
  company?: string;
  location?: string;
  description: string;
  requirements: string;
  isActive?: boolean;
}

export interface UpdateJobStatusRequest {
  isActive: boolean;
}

export interface CompatibleJobsQuery {
  limit?: number;
  minScore?: number;
}

export interface EmbeddingSummary {
  dimensions: number;
  emptyFields: string[];
  updatedAt: string;
}

export interface UpsertProfileResponse extends EmbeddingSummary {
  profileId: string;
}

export interface UpsertJobResponse extends EmbeddingSummary {
  jobId: string;
  isActive: boolean;
}

export interface CompatibilityReport {
  profileId: string;
  job: JobSummary;
  compatibility: CompatibilityResult;
}

export interface CompatibleJobEntry {
  jobId: string;
  title: string;
  company: string | null;
  location: string | null;
  overallScore: number;
  breakdown: CompatibilityResult;
}

export interface CompatibleJobsReport {
  profileId: string;
  total: number;
  limit: number;
  minScore: number;
  results: CompatibleJobEntry[];
}
