/**
 * Cancellation & Timeout Controller — one per turn.
 *
 * Holds the AbortController whose signal reaches the backend fetch and
 * the caller write path, plus the deadline timer. The first reason to
 * cancel wins.
 */
import type { SessionId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { CancelReason } from './types.js';

export interface TurnControllerOptions {
  sessionId: SessionId;
  /** Deadline for the whole turn. */
  timeoutMs: number;
  logger: Logger;
}

export interface TurnController {
  readonly signal: AbortSignal;
  /** Why the turn was cancelled, or null while it is still live. */
  reason(): CancelReason | null;
  /** Returns false when the turn was already cancelled. */
  cancel(reason: CancelReason): boolean;
  /** Stop the deadline timer. Does not cancel. */
  dispose(): void;
}

export function createTurnController(options: TurnControllerOptions): TurnController {
  const { sessionId, timeoutMs, logger } = options;
  const abort = new AbortController();
  let cancelReason: CancelReason | null = null;

  const timer = setTimeout(() => {
    controller.cancel('timed_out');
  }, timeoutMs);
  timer.unref();

  const controller: TurnController = {
    signal: abort.signal,

    reason: () => cancelReason,

    cancel(reason: CancelReason): boolean {
      if (cancelReason !== null) return false;
      cancelReason = reason;
      clearTimeout(timer);
      logger.info('Cancelling turn', { component: 'turn-controller', sessionId, reason });
      abort.abort(reason);
      return true;
    },

    dispose(): void {
      clearTimeout(timer);
    },
  };

  return controller;
}
