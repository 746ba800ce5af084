import { Router } from 'express';

import { currentUserId } from '../middleware/user';
import { getResumeCheckStatus } from '../pipeline/status';
import type { JobStore } from '../store/jobs';

export const createResultRouter = (jobs: JobStore): Router => {
  const router = Router();

  router.get('/:id', async (req, res, next) => {
    try {
      res.json(await getResumeCheckStatus(jobs, currentUserId(res), req.params.id));
    } catch (error) {
      next(error);
    }
  });

  return router;
};
