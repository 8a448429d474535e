import { setImmediate as nextTick } from 'node:timers/promises';
import { CancelledError } from '../models/errors';

export const throwIfAborted = (signal: AbortSignal | undefined, stage: string) => {
  if (signal?.aborted) {
    throw new CancelledError(`Capture was cancelled during ${stage}`, {
      cause: signal.reason,
    });
  }
};

/**
 * Hands control back to the event loop, then re-checks the abort signal.
 */
export const yieldControl = async (signal: AbortSignal | undefined, stage: string) => {
  await nextTick();
  throwIfAborted(signal, stage);
};
