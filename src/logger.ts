import dotenv from 'dotenv';
import pino from 'pino';
import { z } from 'zod';

// The root logger is built on first import, which happens before config.ts loads.
dotenv.config();

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/** LOG_LEVEL when it names a pino level, otherwise `silent` under test and `info` elsewhere. */
export const resolveLogLevel = (env: Record<string, string | undefined> = process.env): LogLevel => {
  const parsed = logLevelSchema.safeParse(env.LOG_LEVEL);

  if (parsed.success) {
    return parsed.data;
  }

  return env.NODE_ENV === 'test' ? 'silent' : 'info';
};

const logger = pino({
  level: resolveLogLevel(),
  base: { service: 'resume-check' },
});

export type Logger = pino.Logger;

/**
 * Creates a child logger bound to a component and, optionally, a job.
 */
export function createJobLogger(
  component: string,
  bindings?: { job_id?: string; user_id?: string },
): Logger {
  return logger.child({ component, ...bindings });
}

export default logger;
