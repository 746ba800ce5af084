import type { WorkerConfig } from '../config';
import { PersistenceUnavailableError, describeError } from '../errors';
import { createJobLogger, type Logger } from '../logger';
import type { JobStore } from '../store/jobs';
import type { ResumeCheckJob } from '../types';
import type { ResumeCheckLeaves } from './leaves';
import { runResumeCheck } from './orchestrator';

export type WorkerDeps = {
  jobs: JobStore;
  leaves: ResumeCheckLeaves;
};

/**
 * Polls the job store for pending resume checks. Each of the `concurrency`
 * tasks scans, claims and processes jobs independently; the claim is a
 * compare-and-set on status, so several workers may share one store.
 */
export class ResumeCheckWorker {
  private readonly deps: WorkerDeps;

  private readonly config: WorkerConfig;

  private readonly log: Logger = createJobLogger('worker');

  private running = false;

  private stopping = false;

  private tasks: Promise<void>[] = [];

  private readonly wakeups = new Set<() => void>();

  constructor(deps: WorkerDeps, config: WorkerConfig) {
    this.deps = deps;
    this.config = config;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.stopping = false;
    this.tasks = Array.from({ length: this.config.concurrency }, (_, index) => this.runTask(index));
    this.log.info({ concurrency: this.config.concurrency }, 'Resume check worker started');
  }

  /** Stops polling and waits for jobs already claimed to finish. */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.stopping = true;
    this.wakeups.forEach((wake) => wake());
    await Promise.all(this.tasks);
    this.tasks = [];
    this.log.info('Resume check worker stopped');
  }

  /**
   * Scans once, processing every pending job this call manages to claim.
   * Claims nothing further once stop() has been called.
   */
  async runOnce(): Promise<number> {
    const ids = await this.deps.jobs.listPendingJobIds(this.config.batchSize);
    let processed = 0;

    for (const id of ids) {
      if (this.stopping) {
        break;
      }

      const job = await this.deps.jobs.claimJob(id);

      if (!job) {
        this.log.debug({ job_id: id }, 'Job already claimed by another worker');
        continue;
      }

      await this.processJob(job);
      processed += 1;
    }

    return processed;
  }

  private async runTask(index: number): Promise<void> {
    const log = this.log.child({ task: index });

    while (this.running) {
      let delay = this.config.pollIntervalMs;

      try {
        await this.runOnce();
      } catch (error) {
        log.error({ err: error }, 'Worker scan failed');
        delay = this.config.errorBackoffMs;
      }

      await this.sleep(delay);
    }
  }

  private sleep(ms: number): Promise<void> {
    if (!this.running) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        this.wakeups.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.wakeups.add(wake);
    });
  }

  private async processJob(job: ResumeCheckJob): Promise<void> {
    const log = createJobLogger('worker', { job_id: job.id, user_id: job.userId });
    log.info('Picked up resume check job');

    try {
      const outcome = await runResumeCheck(
        this.deps.leaves,
        {
          jobPost: job.jobPost,
          resumeText: job.resumeText,
          summarizeJobPost: job.summarizeJobPost,
          qualifications: job.qualifications,
        },
        {
          log,
          onQualifications: (qualifications) => this.deps.jobs.saveQualifications(job.id, qualifications),
        },
      );

      await this.deps.jobs.completeJob(job.id, outcome.analysis);
      log.info({ strategy: outcome.strategy, score: outcome.analysis.score }, 'Completed resume check job');
    } catch (error) {
      await this.recordFailure(job, error, log);
    }
  }

  private async recordFailure(job: ResumeCheckJob, error: unknown, log: Logger): Promise<void> {
    if (error instanceof PersistenceUnavailableError) {
      log.error({ err: error }, 'Job row unavailable at commit; discarding result');
      return;
    }

    log.error({ err: error }, 'Resume check job failed');

    try {
      await this.deps.jobs.failJob(job.id, describeError(error));
    } catch (commitError) {
      if (commitError instanceof PersistenceUnavailableError) {
        log.error({ err: commitError }, 'Job row unavailable at commit; discarding failure');
        return;
      }

      log.error({ err: commitError }, 'Could not record job failure; job left in processing');
    }
  }
}
