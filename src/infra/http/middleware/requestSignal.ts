import type { Response } from 'express';

const signals = new WeakMap<Response, AbortSignal>();

/**
 * Signal that aborts when the connection closes before the response has
 * been fully written. One signal per response.
 */
export function requestSignal(res: Response): AbortSignal {
  const existing = signals.get(res);
  if (existing) {
    return existing;
  }

  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new Error('Client disconnected'));
    }
  });
  signals.set(res, controller.signal);
  return controller.signal;
}
