export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface Qualification {
  qualification: string;
  weight: number; // integer 1..10
}

export interface ScoredQualification extends Qualification {
  score: number; // integer 0..10
}

export interface ResumeAnalysis {
  score: number; // 0..100
  breakdown: ScoredQualification[];
  suggestions: string;
  proofread: string;
}

export interface ResumeCheckJob {
  id: string;
  userId: string;
  jobPost: string;
  resumeText: string;
  summarizeJobPost: boolean;
  qualifications: Qualification[];
  status: JobStatus;
  analysis?: ResumeAnalysis;
  error?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ResumeCheckQueued {
  job_id: string;
  status_url: string;
  status: Extract<JobStatus, 'pending'>;
}

export interface ResumeCheckStatus {
  job_id: string;
  status: JobStatus;
  analysis?: ResumeAnalysis;
  error?: string;
  qualifications: Qualification[];
  updated_at: string;
}

export interface BaseResumeResponse {
  resume_text: string | null;
}
