import { CommandCancelledError } from '../errors/index.js';

/**
 * Cooperative cancellation check, called only between stages
 */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new CommandCancelledError(stage);
  }
}
