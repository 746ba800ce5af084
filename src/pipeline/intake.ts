import { z } from 'zod';

import { ResumeUnavailableError, ValidationError } from '../errors';
import { createJobLogger } from '../logger';
import type { JobStore } from '../store/jobs';
import type { ProfileStore } from '../store/profiles';
import type { ResumeCheckQueued } from '../types';
import { normalizeQualifications } from './qualifications';

const submitSchema = z.object({
  job_post: z
    .string({ required_error: 'job_post is required' })
    .refine((value) => value.trim().length > 0, 'job_post must not be empty'),
  resume_text: z.string().nullish(),
  summarize_job_post: z.boolean().nullish(),
  qualifications: z.array(z.unknown()).nullish(),
});

export type SubmitResumeCheckRequest = z.infer<typeof submitSchema>;

export type IntakeDeps = {
  jobs: JobStore;
  profiles: ProfileStore;
};

const statusUrlFor = (jobId: string): string => `/check-resume/${jobId}`;

/**
 * Validates a submission and stores it as a pending job. Never waits on the
 * evaluation itself.
 */
export const submitResumeCheck = async (
  { jobs, profiles }: IntakeDeps,
  userId: string,
  body: unknown,
): Promise<ResumeCheckQueued> => {
  const validation = submitSchema.safeParse(body);

  if (!validation.success) {
    throw ValidationError.fromZod('Invalid resume check request.', validation.error);
  }

  const payload: SubmitResumeCheckRequest = validation.data;
  const log = createJobLogger('intake', { user_id: userId });

  let resumeText: string | undefined;

  if (payload.resume_text && payload.resume_text.trim()) {
    resumeText = payload.resume_text;
  } else {
    resumeText = await profiles.getBaseResume(userId);
  }

  if (!resumeText) {
    throw new ResumeUnavailableError();
  }

  const job = await jobs.createJob({
    userId,
    jobPost: payload.job_post,
    resumeText,
    summarizeJobPost: payload.summarize_job_post ?? true,
    qualifications: normalizeQualifications(payload.qualifications ?? [], log),
  });

  log.info({ job_id: job.id }, 'Enqueued resume check job');

  return { job_id: job.id, status_url: statusUrlFor(job.id), status: 'pending' };
};
