import express, { type Express } from 'express';

import { errorHandler, notFoundHandler } from './middleware/errors';
import { requireUser } from './middleware/user';
import { createCheckResumeRouter } from './routes/checkResume';
import { createProfilesRouter } from './routes/profiles';
import { createResultRouter } from './routes/result';
import type { JobStore } from './store/jobs';
import type { ProfileStore } from './store/profiles';

export type AppDeps = {
  jobs: JobStore;
  profiles: ProfileStore;
};

export const createApp = ({ jobs, profiles }: AppDeps): Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/check-resume', requireUser, createCheckResumeRouter({ jobs, profiles }));
  app.use('/check-resume', requireUser, createResultRouter(jobs));
  app.use('/profiles', requireUser, createProfilesRouter(profiles));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
