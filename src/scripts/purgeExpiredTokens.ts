import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { PurgeExpiredTokensUseCase } from '../application/auth/purgeExpiredTokens.js';
import { loadDatabaseUrl } from '../infra/config.js';
import { createPool } from '../infra/db/pool.js';
import { RefreshTokenRepo } from '../infra/db/refreshTokenRepo.js';

export async function purgeExpiredTokens(databaseUrl: string): Promise<number> {
  const pool = createPool(databaseUrl, console);
  try {
    return await new PurgeExpiredTokensUseCase(new RefreshTokenRepo(pool), console).execute();
  } finally {
    await pool.end();
  }
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  dotenv.config();

  purgeExpiredTokens(loadDatabaseUrl())
    .then((removed) => {
      console.log(`Done. ${removed} expired refresh token(s) removed.`);
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
