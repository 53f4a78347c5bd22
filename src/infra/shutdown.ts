import type { Logger } from '../application/ports.js';

export interface Closeable {
  name: string;
  close: () => Promise<unknown>;
}

/**
 * Close every resource even when some fail. Failures are collected into a
 * single AggregateError once all closes have settled.
 */
export async function shutdownAll(resources: Closeable[], logger?: Logger): Promise<void> {
  const results = await Promise.allSettled(resources.map((r) => r.close()));

  const errors: unknown[] = [];
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      logger?.error(`Failed to close ${resources[i].name}`, result.reason);
      errors.push(result.reason);
    }
  });

  if (errors.length > 0) {
    throw new AggregateError(errors, `Failed to close ${errors.length} resource(s)`);
  }
}
