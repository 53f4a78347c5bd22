import { Redis } from 'ioredis';
import type { Logger } from '../../application/ports.js';

export function createRedisClient(url: string, logger: Logger): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 2,
    connectTimeout: 2000,
    lazyConnect: false,
  });

  client.on('error', (err) => {
    logger.error('Unexpected Redis error:', err);
  });

  return client;
}
