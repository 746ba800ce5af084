import { EvaluationError, PersistenceUnavailableError, type EvaluationStage } from '../errors';
import type { Logger } from '../logger';
import type { Qualification, ResumeAnalysis } from '../types';
import type { ResumeCheckLeaves } from './leaves';

export type ResumeCheckInput = {
  jobPost: string;
  resumeText: string;
  summarizeJobPost: boolean;
  qualifications: Qualification[];
};

export type EvaluationStrategy =
  | { kind: 'supplied'; qualifications: Qualification[] }
  | { kind: 'summarize-then-extract' }
  | { kind: 'extract-directly' };

export type ResumeCheckOutcome = {
  strategy: EvaluationStrategy['kind'];
  qualifications: Qualification[];
  analysis: ResumeAnalysis;
};

type RunOptions = {
  /** Receives derived qualifications before scoring starts. Not called for supplied lists. */
  onQualifications?: (qualifications: Qualification[]) => Promise<void>;
  log?: Logger;
};

export const selectStrategy = (input: ResumeCheckInput): EvaluationStrategy => {
  if (input.qualifications.length > 0) {
    return { kind: 'supplied', qualifications: input.qualifications };
  }

  return input.summarizeJobPost ? { kind: 'summarize-then-extract' } : { kind: 'extract-directly' };
};

const runStage = async <T>(stage: EvaluationStage, action: () => Promise<T>): Promise<T> => {
  try {
    return await action();
  } catch (error) {
    // Reaches the worker as-is; it drops results for rows that are gone.
    if (error instanceof PersistenceUnavailableError) {
      throw error;
    }

    throw new EvaluationError(stage, error);
  }
};

export const runResumeCheck = async (
  leaves: ResumeCheckLeaves,
  input: ResumeCheckInput,
  { onQualifications, log }: RunOptions = {},
): Promise<ResumeCheckOutcome> => {
  const strategy = selectStrategy(input);
  log?.info({ strategy: strategy.kind }, 'Selected evaluation strategy');

  let qualifications: Qualification[];

  switch (strategy.kind) {
    case 'supplied':
      qualifications = strategy.qualifications;
      break;
    case 'summarize-then-extract': {
      const summary = await runStage('summarizer', () => leaves.summarize(input.jobPost));
      qualifications = await runStage('extractor', () => leaves.extract(summary, log));
      break;
    }
    case 'extract-directly':
      qualifications = await runStage('extractor', () => leaves.extract(input.jobPost, log));
      break;
  }

  if (strategy.kind !== 'supplied') {
    if (qualifications.length === 0) {
      log?.warn('Extraction yielded no usable qualifications; scoring against an empty list');
    }

    await runStage('persist-qualifications', async () => onQualifications?.(qualifications));
  }

  const analysis = await runStage('scorer', () => leaves.score(input.resumeText, qualifications));

  return { strategy: strategy.kind, qualifications, analysis };
};
