import { loadConfig, requireDatabaseUrl } from './config';
import { createPool } from './db/pool';
import { ensureSchema } from './db/schema';
import { LlmClient } from './llm/client';
import logger from './logger';
import { createLlmLeaves } from './pipeline/leaves';
import { ResumeCheckWorker } from './pipeline/worker';
import { createJobStore } from './store/jobs';

const main = async (): Promise<void> => {
  const config = loadConfig();
  const pool = createPool(requireDatabaseUrl(config));
  await ensureSchema(pool);

  const worker = new ResumeCheckWorker(
    { jobs: createJobStore(pool), leaves: createLlmLeaves(new LlmClient(config.llm)) },
    config.worker,
  );

  worker.start();

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Stopping resume check worker');
    worker
      .stop()
      .then(() => pool.end())
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Worker shutdown failed');
        process.exitCode = 1;
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

main().catch((error) => {
  logger.fatal({ err: error }, 'Worker failed to start');
  process.exitCode = 1;
});
