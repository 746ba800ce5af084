import { Router } from 'express';
import { z } from 'zod';

import { ValidationError } from '../errors';
import { currentUserId } from '../middleware/user';
import type { ProfileStore } from '../store/profiles';
import type { BaseResumeResponse } from '../types';

const baseResumeSchema = z.object({
  resume_text: z
    .string({ required_error: 'resume_text is required' })
    .refine((value) => value.trim().length > 0, 'resume_text must not be empty'),
});

export const createProfilesRouter = (profiles: ProfileStore): Router => {
  const router = Router();

  router.put('/resume', async (req, res, next) => {
    try {
      const validation = baseResumeSchema.safeParse(req.body);

      if (!validation.success) {
        throw ValidationError.fromZod('Invalid base resume.', validation.error);
      }

      await profiles.saveBaseResume(currentUserId(res), validation.data.resume_text);
      const body: BaseResumeResponse = { resume_text: validation.data.resume_text };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  router.get('/resume-text', async (_req, res, next) => {
    try {
      const resumeText = await profiles.getBaseResume(currentUserId(res));
      const body: BaseResumeResponse = { resume_text: resumeText ?? null };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
