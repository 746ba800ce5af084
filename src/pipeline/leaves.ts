import type { LlmClient } from '../llm/client';
import type { Logger } from '../logger';
import type { Qualification, ResumeAnalysis } from '../types';
import { extractQualifications } from './extractQualifications';
import { scoreResume } from './scoreResume';
import { summarizeJobPost } from './summarizeJobPost';

/** The language-model collaborators the orchestrator drives. */
export interface ResumeCheckLeaves {
  summarize(text: string): Promise<string>;
  extract(text: string, log?: Logger): Promise<Qualification[]>;
  score(resumeText: string, qualifications: Qualification[]): Promise<ResumeAnalysis>;
}

export const createLlmLeaves = (llm: LlmClient): ResumeCheckLeaves => ({
  summarize: (text) => summarizeJobPost(llm, text),
  extract: (text, log) => extractQualifications(llm, text, log),
  score: (resumeText, qualifications) => scoreResume(llm, resumeText, qualifications),
});
