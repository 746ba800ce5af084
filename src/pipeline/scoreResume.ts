import { z } from 'zod';

import { ScoringError, describeError } from '../errors';
import type { LlmClient } from '../llm/client';
import type { Qualification, ResumeAnalysis, ScoredQualification } from '../types';

const resumeScoringSchema = z.object({
  breakdown: z.array(
    z.object({
      qualification: z.string(),
      score: z.coerce.number(),
    }),
  ),
  suggestions: z.string().default(''),
  proofread: z.string().default(''),
});

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

const toInteger = (value: number, min: number, max: number): number =>
  Math.round(clamp(Number.isFinite(value) ? value : min, min, max));

const matchKey = (qualification: string): string => qualification.trim().toLowerCase();

/**
 * Lays the scorer's ratings over the job's own list and weights, matching rows
 * by qualification text. A qualification the scorer did not rate scores 0.
 */
export const alignBreakdown = (
  qualifications: readonly Qualification[],
  rated: readonly { qualification: string; score: number }[],
): ScoredQualification[] => {
  const scores = new Map<string, number>();

  rated.forEach((row) => {
    const key = matchKey(row.qualification);

    if (!scores.has(key)) {
      scores.set(key, toInteger(row.score, 0, 10));
    }
  });

  return qualifications.map((entry) => ({
    qualification: entry.qualification,
    weight: entry.weight,
    score: scores.get(matchKey(entry.qualification)) ?? 0,
  }));
};

/**
 * Weighted average of the 0-10 row scores, scaled to 0-100.
 * Rows with a non-positive weight are ignored; no rows scores 0.
 */
export const weightedScore = (rows: readonly ScoredQualification[]): number => {
  let totalWeight = 0;
  let weightedSum = 0;

  rows.forEach((row) => {
    if (row.weight <= 0) {
      return;
    }

    weightedSum += row.score * row.weight;
    totalWeight += row.weight;
  });

  if (totalWeight === 0) {
    return 0;
  }

  return Math.round(10 * (weightedSum / totalWeight));
};

export const scoreResume = async (
  llm: LlmClient,
  resumeText: string,
  qualifications: Qualification[],
): Promise<ResumeAnalysis> => {
  let response: unknown;

  try {
    response = await llm.scoreResume({ resumeText, qualifications });
  } catch (error) {
    throw new ScoringError(describeError(error), { cause: error });
  }

  const parsed = resumeScoringSchema.safeParse(response);

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`)
      .join('; ');
    throw new ScoringError(`Scoring response was malformed (${detail}).`, { cause: parsed.error });
  }

  const breakdown = alignBreakdown(qualifications, parsed.data.breakdown);

  return {
    score: weightedScore(breakdown),
    breakdown,
    suggestions: parsed.data.suggestions,
    proofread: parsed.data.proofread,
  };
};
