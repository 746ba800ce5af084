import OpenAI from 'openai';

import type { LlmConfig, LlmModels } from '../config';
import { createJobLogger } from '../logger';
import type { Qualification } from '../types';
import { exponentialBackoff } from '../util/retry';
import {
  JOB_POST_SUMMARY_PROMPT,
  QUALIFICATIONS_EXTRACTION_PROMPT,
  RESUME_SCORING_PROMPT,
} from './prompts';

export type ChatRequest = {
  model: string;
  temperature: number;
  json: boolean;
  system: string;
  user: string;
};

/** Sends one chat completion and returns the first choice's content. */
export type ChatCompletionFn = (request: ChatRequest) => Promise<string | null | undefined>;

type ResumeScoringPayload = {
  resumeText: string;
  qualifications: Qualification[];
};

const log = createJobLogger('llm');

const buildUserInput = (input: Record<string, unknown>): string => JSON.stringify(input, null, 2);

export const openAiCompletion = (config: LlmConfig): ChatCompletionFn => {
  let client: OpenAI | null = null;

  const getClient = (): OpenAI => {
    if (client) {
      return client;
    }

    if (!config.apiKey) {
      throw new Error('LLM API key not configured. Set OPENAI_API_KEY.');
    }

    client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
    return client;
  };

  return async (request) => {
    const response = await getClient().chat.completions.create({
      model: request.model,
      temperature: request.temperature,
      response_format: request.json ? { type: 'json_object' } : { type: 'text' },
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user },
      ],
    });

    return response.choices[0]?.message?.content;
  };
};

export class LlmClient {
  private readonly complete: ChatCompletionFn;

  private readonly models: LlmModels;

  private readonly maxAttempts: number;

  private readonly retryDelayMs: number;

  constructor(config: LlmConfig, complete: ChatCompletionFn = openAiCompletion(config)) {
    this.complete = complete;
    this.models = config.models;
    this.maxAttempts = config.maxAttempts;
    this.retryDelayMs = config.retryDelayMs;
  }

  private async request(model: string, system: string, user: string, json: boolean): Promise<string> {
    const content = await exponentialBackoff(
      () => this.complete({ model, temperature: 0.2, json, system, user }),
      {
        maxAttempts: this.maxAttempts,
        initialDelayMs: this.retryDelayMs,
        onRetry: (error, attempt, delayMs) => {
          log.warn({ err: error, model, attempt, delayMs }, 'Retrying LLM call');
        },
      },
    );

    if (!content || !content.trim()) {
      throw new Error('LLM response did not contain any content.');
    }

    return content;
  }

  private async completeStructured(
    model: string,
    system: string,
    input: Record<string, unknown>,
  ): Promise<unknown> {
    const content = await this.request(model, system, buildUserInput(input), true);

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new Error(
        `Failed to parse LLM JSON response: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  async summarizeJobPost(jobPost: string): Promise<string> {
    const summary = await this.request(this.models.summarizer, JOB_POST_SUMMARY_PROMPT, jobPost, false);
    return summary.trim();
  }

  async extractQualifications(jobPost: string): Promise<unknown> {
    return this.completeStructured(this.models.extractor, QUALIFICATIONS_EXTRACTION_PROMPT, { jobPost });
  }

  async scoreResume(payload: ResumeScoringPayload): Promise<unknown> {
    return this.completeStructured(this.models.scorer, RESUME_SCORING_PROMPT, {
      resumeText: payload.resumeText,
      qualifications: payload.qualifications,
    });
  }
}
