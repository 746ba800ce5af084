import type { Pool } from 'pg';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ScoringError } from '../errors';
import { ResumeCheckWorker } from '../pipeline/worker';
import { submitResumeCheck } from '../pipeline/intake';
import { getResumeCheckStatus } from '../pipeline/status';
import { createJobStore, type JobStore } from '../store/jobs';
import { createProfileStore, type ProfileStore } from '../store/profiles';
import {
  createFakeLeaves,
  createMemoryPool,
  extractedQualifications,
  sampleAnalysis,
  testWorkerConfig,
} from './helpers';

const USER = 'user-1';
const RESUME = 'Seven years of Python and two of Go.';

describe('ResumeCheckWorker', () => {
  let pool: Pool;
  let jobs: JobStore;
  let profiles: ProfileStore;

  const submit = async (body: Record<string, unknown>) =>
    submitResumeCheck({ jobs, profiles }, USER, { resume_text: RESUME, ...body });

  const status = (jobId: string) => getResumeCheckStatus(jobs, USER, jobId);

  beforeEach(async () => {
    pool = await createMemoryPool();
    jobs = createJobStore(pool);
    profiles = createProfileStore(pool);
  });

  afterEach(async () => {
    await pool.end();
  });

  it('completes a job with caller-supplied qualifications without extracting', async () => {
    const leaves = createFakeLeaves();
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const supplied = [
      { qualification: 'Python', weight: 9 },
      { qualification: 'Golang', weight: 6 },
    ];
    const { job_id } = await submit({
      job_post: 'Platform engineer',
      summarize_job_post: false,
      qualifications: supplied,
    });

    await expect(worker.runOnce()).resolves.toBe(1);

    const result = await status(job_id);
    expect(result.status).toBe('completed');
    expect(result.qualifications).toEqual(supplied);
    expect(result.analysis).toEqual(sampleAnalysis(supplied));
    expect(result.error).toBeUndefined();
    expect(leaves.summarize).not.toHaveBeenCalled();
    expect(leaves.extract).not.toHaveBeenCalled();
  });

  it('summarizes then extracts when no qualifications are supplied', async () => {
    const leaves = createFakeLeaves();
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const { job_id } = await submit({ job_post: 'Data platform role', summarize_job_post: true });

    await worker.runOnce();

    expect(leaves.summarize).toHaveBeenCalledWith('Data platform role');
    expect(leaves.extract.mock.calls[0][0]).toBe('summary of: Data platform role');
    const result = await status(job_id);
    expect(result.status).toBe('completed');
    expect(result.qualifications).toEqual(extractedQualifications);
  });

  it('extracts directly from the posting when summarizing is off', async () => {
    const leaves = createFakeLeaves();
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const { job_id } = await submit({ job_post: 'Site reliability role', summarize_job_post: false });

    await worker.runOnce();

    expect(leaves.summarize).not.toHaveBeenCalled();
    expect(leaves.extract.mock.calls[0][0]).toBe('Site reliability role');
    expect((await status(job_id)).qualifications).toEqual(extractedQualifications);
  });

  it('keeps extracted qualifications when scoring fails', async () => {
    const leaves = createFakeLeaves();
    leaves.score.mockRejectedValue(new ScoringError('model timed out'));
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const { job_id } = await submit({ job_post: 'Backend role' });

    await worker.runOnce();

    const result = await status(job_id);
    expect(result.status).toBe('failed');
    expect(result.error).toBe('scorer failed: model timed out');
    expect(result.analysis).toBeUndefined();
    expect(result.qualifications).toEqual(extractedQualifications);
  });

  it('leaves terminal jobs alone on later scans', async () => {
    const leaves = createFakeLeaves();
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const { job_id } = await submit({ job_post: 'Backend role' });

    await worker.runOnce();
    const first = await status(job_id);
    await expect(worker.runOnce()).resolves.toBe(0);

    expect(await status(job_id)).toEqual(first);
    expect(leaves.score).toHaveBeenCalledTimes(1);
  });

  it('keeps processing other jobs when a row disappears mid-flight', async () => {
    const leaves = createFakeLeaves();
    const doomed = await submit({ job_post: 'First role', summarize_job_post: false });
    const survivor = await submit({ job_post: 'Second role', summarize_job_post: false });

    leaves.extract.mockImplementation(async (text: string) => {
      if (text === 'First role') {
        await pool.query('delete from resume_checks where id = $1', [doomed.job_id]);
      }
      return extractedQualifications;
    });
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);

    await expect(worker.runOnce()).resolves.toBe(2);

    await expect(jobs.getJob(doomed.job_id)).resolves.toBeUndefined();
    expect((await status(survivor.job_id)).status).toBe('completed');
    expect(leaves.score).toHaveBeenCalledTimes(1);
  });

  it('records which step failed when derived qualifications cannot be stored', async () => {
    const leaves = createFakeLeaves();
    vi.spyOn(jobs, 'saveQualifications').mockRejectedValueOnce(new Error('connection terminated'));
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const { job_id } = await submit({ job_post: 'Backend role' });

    await worker.runOnce();

    const result = await status(job_id);
    expect(result.status).toBe('failed');
    expect(result.error).toBe('persist-qualifications failed: connection terminated');
    expect(result.qualifications).toEqual([]);
    expect(leaves.score).not.toHaveBeenCalled();
  });

  it('processes each job exactly once when two workers scan the same store', async () => {
    const leaves = createFakeLeaves();
    const first = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const second = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const ids: string[] = [];
    for (const jobPost of ['Backend role', 'Frontend role', 'Data role', 'Platform role']) {
      ids.push((await submit({ job_post: jobPost })).job_id);
    }

    const [fromFirst, fromSecond] = await Promise.all([first.runOnce(), second.runOnce()]);

    expect(fromFirst + fromSecond).toBe(4);
    expect(leaves.score).toHaveBeenCalledTimes(4);
    const statuses = await Promise.all(ids.map(async (id) => (await status(id)).status));
    expect(statuses).toEqual(['completed', 'completed', 'completed', 'completed']);
  });

  it('does not process a job another worker already claimed', async () => {
    const leaves = createFakeLeaves();
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const { job_id } = await submit({ job_post: 'Backend role' });
    const listPendingJobIds = vi.spyOn(jobs, 'listPendingJobIds');
    listPendingJobIds.mockImplementation(async () => {
      await jobs.claimJob(job_id);
      return [job_id];
    });

    await expect(worker.runOnce()).resolves.toBe(0);
    expect(leaves.score).not.toHaveBeenCalled();
    expect((await status(job_id)).status).toBe('processing');
  });

  it('polls in the background until stopped', async () => {
    const leaves = createFakeLeaves();
    const worker = new ResumeCheckWorker({ jobs, leaves }, { ...testWorkerConfig, concurrency: 2 });
    const { job_id } = await submit({ job_post: 'Backend role' });

    worker.start();
    await vi.waitFor(async () => {
      expect((await status(job_id)).status).toBe('completed');
    });
    await worker.stop();

    expect(worker.isRunning).toBe(false);
    expect(leaves.score).toHaveBeenCalledTimes(1);
  });

  it('survives scan failures and recovers on the next poll', async () => {
    const leaves = createFakeLeaves();
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const { job_id } = await submit({ job_post: 'Backend role' });
    vi.spyOn(jobs, 'listPendingJobIds').mockRejectedValueOnce(new Error('connection refused'));

    worker.start();
    await vi.waitFor(async () => {
      expect((await status(job_id)).status).toBe('completed');
    });
    await worker.stop();
  });

  it('claims nothing further once stop() is called', async () => {
    const leaves = createFakeLeaves();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    leaves.score.mockImplementationOnce(async (_resumeText, qualifications) => {
      await gate;
      return sampleAnalysis(qualifications);
    });
    const worker = new ResumeCheckWorker({ jobs, leaves }, testWorkerConfig);
    const ids: string[] = [];
    for (const jobPost of ['Backend role', 'Frontend role', 'Data role']) {
      ids.push((await submit({ job_post: jobPost })).job_id);
    }

    worker.start();
    await vi.waitFor(() => {
      expect(leaves.score).toHaveBeenCalledTimes(1);
    });
    const stopped = worker.stop();
    release();
    await stopped;

    expect(leaves.score).toHaveBeenCalledTimes(1);
    const statuses = await Promise.all(ids.map(async (id) => (await status(id)).status));
    expect([...statuses].sort()).toEqual(['completed', 'pending', 'pending']);
  });
});
