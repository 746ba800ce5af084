import type { Pool } from 'pg';

export interface ProfileStore {
  getBaseResume(userId: string): Promise<string | undefined>;
  saveBaseResume(userId: string, resumeText: string): Promise<void>;
}

export const createProfileStore = (pool: Pool): ProfileStore => ({
  async getBaseResume(userId) {
    const result = await pool.query<{ resume_text: string | null }>(
      'select resume_text from profiles where user_id = $1',
      [userId],
    );

    const resumeText = result.rows[0]?.resume_text;
    return resumeText && resumeText.trim() ? resumeText : undefined;
  },

  async saveBaseResume(userId, resumeText) {
    await pool.query(
      `insert into profiles (user_id, resume_text, updated_at) values ($1, $2, now())
        on conflict (user_id) do update set resume_text = excluded.resume_text, updated_at = now()`,
      [userId, resumeText],
    );
  },
});
