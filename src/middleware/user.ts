import type { NextFunction, Request, Response } from 'express';

import { UnauthorizedError } from '../errors';

export const USER_ID_HEADER = 'x-user-id';

/** Resolves the caller id set by the upstream gateway. */
export const requireUser = (req: Request, res: Response, next: NextFunction): void => {
  const userId = req.header(USER_ID_HEADER)?.trim();

  if (!userId) {
    next(new UnauthorizedError());
    return;
  }

  res.locals.userId = userId;
  next();
};

export const currentUserId = (res: Response): string => {
  const { userId } = res.locals;

  if (typeof userId !== 'string') {
    throw new UnauthorizedError();
  }

  return userId;
};
