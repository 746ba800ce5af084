import { ExtractionError, describeError } from '../errors';
import type { LlmClient } from '../llm/client';
import type { Logger } from '../logger';
import type { Qualification } from '../types';
import { normalizeQualifications, rankByWeight } from './qualifications';

// The model is asked for { qualifications: [...] } but some reply with the bare array.
const unwrapEntries = (response: unknown): unknown[] | undefined => {
  if (Array.isArray(response)) {
    return response;
  }

  if (response && typeof response === 'object' && 'qualifications' in response) {
    const { qualifications } = response;
    return Array.isArray(qualifications) ? qualifications : undefined;
  }

  return undefined;
};

export const extractQualifications = async (
  llm: LlmClient,
  text: string,
  log?: Logger,
): Promise<Qualification[]> => {
  let response: unknown;

  try {
    response = await llm.extractQualifications(text);
  } catch (error) {
    throw new ExtractionError(describeError(error), { cause: error });
  }

  const entries = unwrapEntries(response);

  if (!entries) {
    throw new ExtractionError('Extractor response did not contain a qualifications array.');
  }

  return rankByWeight(normalizeQualifications(entries, log));
};
