import { createApp } from './app';
import { loadConfig, requireDatabaseUrl } from './config';
import { createPool } from './db/pool';
import { ensureSchema } from './db/schema';
import { LlmClient } from './llm/client';
import logger from './logger';
import { createLlmLeaves } from './pipeline/leaves';
import { ResumeCheckWorker } from './pipeline/worker';
import { createJobStore } from './store/jobs';
import { createProfileStore } from './store/profiles';

const main = async (): Promise<void> => {
  const config = loadConfig();
  const pool = createPool(requireDatabaseUrl(config));
  await ensureSchema(pool);

  const jobs = createJobStore(pool);
  const profiles = createProfileStore(pool);
  const app = createApp({ jobs, profiles });

  const worker = config.runWorkerInProcess
    ? new ResumeCheckWorker({ jobs, leaves: createLlmLeaves(new LlmClient(config.llm)) }, config.worker)
    : undefined;

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, 'Server listening');
  });
  worker?.start();

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    server.close();
    Promise.resolve(worker?.stop())
      .then(() => pool.end())
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exitCode = 1;
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
};

main().catch((error) => {
  logger.fatal({ err: error }, 'Server failed to start');
  process.exitCode = 1;
});
