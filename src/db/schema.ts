import type { Pool } from 'pg';

const RESUME_CHECKS_TABLE = `
  create table if not exists resume_checks (
    id text primary key,
    user_id text not null,
    job_post text not null,
    resume_text text not null,
    summarize_job_post boolean not null,
    qualifications jsonb not null,
    status text not null,
    analysis jsonb,
    error text,
    created_at timestamptz not null,
    updated_at timestamptz not null
  );
`;

const PROFILES_TABLE = `
  create table if not exists profiles (
    user_id text primary key,
    resume_text text,
    updated_at timestamptz not null
  );
`;

/**
 * Creates the tables the service relies on. Idempotent; runs on every start.
 */
export const ensureSchema = async (pool: Pool): Promise<void> => {
  await pool.query(RESUME_CHECKS_TABLE);
  await pool.query(PROFILES_TABLE);
};
