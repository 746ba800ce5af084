import type { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';

import { PersistenceUnavailableError } from '../errors';
import type { JobStatus, Qualification, ResumeAnalysis, ResumeCheckJob } from '../types';

type ResumeCheckRow = {
  id: string;
  user_id: string;
  job_post: string;
  resume_text: string;
  summarize_job_post: boolean;
  qualifications: Qualification[] | null;
  status: JobStatus;
  analysis: ResumeAnalysis | null;
  error: string | null;
  created_at: Date;
  updated_at: Date;
};

export type NewResumeCheck = {
  userId: string;
  jobPost: string;
  resumeText: string;
  summarizeJobPost: boolean;
  qualifications: Qualification[];
};

export interface JobStore {
  createJob(input: NewResumeCheck): Promise<ResumeCheckJob>;
  getJob(id: string): Promise<ResumeCheckJob | undefined>;
  listPendingJobIds(limit: number): Promise<string[]>;
  /** Moves a job from pending to processing; undefined when another worker won. */
  claimJob(id: string): Promise<ResumeCheckJob | undefined>;
  saveQualifications(id: string, qualifications: Qualification[]): Promise<void>;
  completeJob(id: string, analysis: ResumeAnalysis): Promise<void>;
  failJob(id: string, error: string): Promise<void>;
}

const MAX_ERROR_LENGTH = 2000;

const COLUMNS = `id, user_id, job_post, resume_text, summarize_job_post, qualifications,
  status, analysis, error, created_at, updated_at`;

const toJob = (row: ResumeCheckRow): ResumeCheckJob => ({
  id: row.id,
  userId: row.user_id,
  jobPost: row.job_post,
  resumeText: row.resume_text,
  summarizeJobPost: row.summarize_job_post,
  qualifications: row.qualifications ?? [],
  status: row.status,
  analysis: row.analysis ?? undefined,
  error: row.error ?? undefined,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

export const createJobStore = (pool: Pool): JobStore => {
  // Every worker-side write is guarded on status = 'processing' so a terminal
  // job can never be mutated again.
  const updateProcessing = async (
    id: string,
    operation: string,
    assignments: string,
    values: unknown[],
  ): Promise<void> => {
    const result = await pool.query(
      `update resume_checks set ${assignments}, updated_at = now()
        where id = $1 and status = 'processing'
        returning id`,
      [id, ...values],
    );

    if (result.rows.length === 0) {
      throw new PersistenceUnavailableError(id, operation);
    }
  };

  return {
    async createJob(input) {
      const result = await pool.query<ResumeCheckRow>(
        `insert into resume_checks (${COLUMNS})
          values ($1, $2, $3, $4, $5, $6::jsonb, 'pending', null, null, now(), now())
          returning ${COLUMNS}`,
        [
          uuidv4(),
          input.userId,
          input.jobPost,
          input.resumeText,
          input.summarizeJobPost,
          JSON.stringify(input.qualifications),
        ],
      );

      return toJob(result.rows[0]);
    },

    async getJob(id) {
      const result = await pool.query<ResumeCheckRow>(
        `select ${COLUMNS} from resume_checks where id = $1`,
        [id],
      );

      const row = result.rows[0];
      return row ? toJob(row) : undefined;
    },

    async listPendingJobIds(limit) {
      const result = await pool.query<{ id: string }>(
        `select id from resume_checks where status = 'pending'
          order by created_at asc, id asc
          limit ${Math.max(1, Math.trunc(limit))}`,
      );

      return result.rows.map((row) => row.id);
    },

    async claimJob(id) {
      const result = await pool.query<ResumeCheckRow>(
        `update resume_checks set status = 'processing', updated_at = now()
          where id = $1 and status = 'pending'
          returning ${COLUMNS}`,
        [id],
      );

      const row = result.rows[0];
      return row ? toJob(row) : undefined;
    },

    async saveQualifications(id, qualifications) {
      await updateProcessing(id, 'saveQualifications', 'qualifications = $2::jsonb', [
        JSON.stringify(qualifications),
      ]);
    },

    async completeJob(id, analysis) {
      await updateProcessing(
        id,
        'completeJob',
        `status = 'completed', analysis = $2::jsonb, error = null`,
        [JSON.stringify(analysis)],
      );
    },

    async failJob(id, error) {
      await updateProcessing(id, 'failJob', `status = 'failed', error = $2, analysis = null`, [
        error.slice(0, MAX_ERROR_LENGTH),
      ]);
    },
  };
};
