import { Router } from 'express';

import { currentUserId } from '../middleware/user';
import { submitResumeCheck, type IntakeDeps } from '../pipeline/intake';

export const createCheckResumeRouter = (deps: IntakeDeps): Router => {
  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const queued = await submitResumeCheck(deps, currentUserId(res), req.body);
      res.status(202).json(queued);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
