import dotenv from 'dotenv';
import { createAuthService } from '../../application/auth/authService.js';
import { PurgeExpiredTokensUseCase } from '../../application/auth/purgeExpiredTokens.js';
import { SlidingWindowRateLimiter } from '../../application/rateLimit/slidingWindowRateLimiter.js';
import { Password } from '../../domain/auth/password.js';
import { TokenCodec } from '../../domain/auth/tokenCodec.js';
import { ConfigError, loadConfig, type AppConfig } from '../config.js';
import { createPool } from '../db/pool.js';
import { RefreshTokenRepo } from '../db/refreshTokenRepo.js';
import { UserRepo } from '../db/userRepo.js';
import { createRedisClient } from '../redis/client.js';
import { RedisRevocationStore } from '../redis/revocationStore.js';
import { shutdownAll } from '../shutdown.js';
import { createApp } from './app.js';

dotenv.config();

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
const logger = console;

const pool = createPool(config.databaseUrl, logger);
const redis = createRedisClient(config.redisUrl, logger);

const users = new UserRepo(pool);
const refreshTokens = new RefreshTokenRepo(pool);
const revocations = new RedisRevocationStore(redis);

const authService = createAuthService({
  users,
  refreshTokens,
  revocations,
  codec: new TokenCodec({
    secret: config.jwt.secret,
    accessTokenTtlSeconds: config.jwt.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: config.jwt.refreshTokenTtlSeconds,
  }),
  passwords: new Password(config.passwordHashCost),
  logger,
});

const app = createApp({
  authService,
  rateLimiter: new SlidingWindowRateLimiter(revocations),
  rateLimit: config.rateLimit,
  refreshCookie: config.refreshCookie,
  cors: config.cors,
  trustProxy: config.trustProxy,
  logger,
  healthChecks: [
    { name: 'postgres', check: () => pool.query('SELECT 1') },
    { name: 'redis', check: () => redis.ping() },
  ],
});

const purge = new PurgeExpiredTokensUseCase(refreshTokens, logger);
const sweep =
  config.tokenSweepIntervalMs > 0
    ? setInterval(() => {
        purge.execute().catch((error: unknown) => {
          logger.warn('Expired token sweep failed', error);
        });
      }, config.tokenSweepIntervalMs)
    : undefined;
sweep?.unref();

const server = app.listen(config.server.port, config.server.host, () => {
  logger.info(`Server running on http://${config.server.host}:${config.server.port}`);
  logger.info(`Health check: http://${config.server.host}:${config.server.port}/healthz`);
});

let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, shutting down`);

  shutdownAll(
    [
      { name: 'sweep', close: async () => clearInterval(sweep) },
      {
        name: 'http',
        close: () =>
          new Promise<void>((resolve, reject) => {
            server.close((err) => (err ? reject(err) : resolve()));
          }),
      },
      { name: 'postgres', close: () => pool.end() },
      { name: 'redis', close: () => redis.quit() },
    ],
    logger
  ).then(
    () => {
      process.exit(0);
    },
    (error: unknown) => {
      logger.error('Shutdown completed with errors', error);
      process.exit(1);
    }
  );
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
