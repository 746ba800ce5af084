import { ForbiddenError, NotFoundError } from '../errors';
import type { JobStore } from '../store/jobs';
import type { ResumeCheckStatus } from '../types';

export const getResumeCheckStatus = async (
  jobs: JobStore,
  userId: string,
  jobId: string,
): Promise<ResumeCheckStatus> => {
  const job = await jobs.getJob(jobId);

  if (!job) {
    throw new NotFoundError();
  }

  if (job.userId !== userId) {
    throw new ForbiddenError();
  }

  return {
    job_id: job.id,
    status: job.status,
    analysis: job.analysis,
    error: job.error,
    qualifications: job.qualifications,
    updated_at: job.updatedAt.toISOString(),
  };
};
