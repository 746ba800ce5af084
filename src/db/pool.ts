import { Pool } from 'pg';

import { createJobLogger } from '../logger';

const log = createJobLogger('db');

export const createPool = (connectionString: string): Pool => {
  const pool = new Pool({ connectionString });

  pool.on('error', (error) => {
    log.error({ err: error }, 'Idle PostgreSQL client error');
  });

  return pool;
};
