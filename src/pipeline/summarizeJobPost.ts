import { SummarizationError, describeError } from '../errors';
import type { LlmClient } from '../llm/client';

export const summarizeJobPost = async (llm: LlmClient, jobPost: string): Promise<string> => {
  let summary: string;

  try {
    summary = await llm.summarizeJobPost(jobPost);
  } catch (error) {
    throw new SummarizationError(describeError(error), { cause: error });
  }

  if (!summary) {
    throw new SummarizationError('Summarizer returned an empty summary.');
  }

  return summary;
};
