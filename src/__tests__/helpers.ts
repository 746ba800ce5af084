import { newDb } from 'pg-mem';
import type { Pool } from 'pg';
import { vi } from 'vitest';

import type { WorkerConfig } from '../config';
import { ensureSchema } from '../db/schema';
import type { ResumeCheckLeaves } from '../pipeline/leaves';
import type { Qualification, ResumeAnalysis } from '../types';

export const createMemoryPool = async (): Promise<Pool> => {
  const db = newDb();
  const { Pool: MemoryPool } = db.adapters.createPg();
  const pool: Pool = new MemoryPool();
  await ensureSchema(pool);
  return pool;
};

export const testWorkerConfig: WorkerConfig = {
  pollIntervalMs: 5,
  batchSize: 5,
  concurrency: 1,
  errorBackoffMs: 5,
};

export const sampleAnalysis = (qualifications: Qualification[]): ResumeAnalysis => ({
  score: qualifications.length ? 70 : 0,
  breakdown: qualifications.map((entry) => ({ ...entry, score: 7 })),
  suggestions: 'In Experience instead of "worked on APIs" write "built REST APIs".',
  proofread: 'Proofread complete. Everything looks right.',
});

export const extractedQualifications: Qualification[] = [
  { qualification: 'TypeScript', weight: 9 },
  { qualification: 'PostgreSQL', weight: 7 },
];

export const createFakeLeaves = () => {
  const leaves = {
    summarize: vi.fn(async (text: string) => `summary of: ${text}`),
    extract: vi.fn(async (_text: string) => extractedQualifications),
    score: vi.fn(async (_resumeText: string, qualifications: Qualification[]) =>
      sampleAnalysis(qualifications),
    ),
  } satisfies ResumeCheckLeaves;

  return leaves;
};
