/**
 * In-memory registry of live turns and of sessions suspended on a
 * clarification.
 *
 * A suspended session holds its state machine so that the chained
 * request continues the same fragment sequence. `claim` hands it to
 * exactly one resuming request.
 */
import type { AgentId, ChatMessage, SessionId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { SessionStateMachine } from './state-machine.js';
import type { TurnController } from './turn-controller.js';
import type { SessionSnapshot } from './types.js';

const COMPONENT = 'session-store';

export interface ActiveTurn {
  sessionId: SessionId;
  agentId: AgentId;
  machine: SessionStateMachine;
  controller: TurnController;
}

export interface SuspendedSession {
  sessionId: SessionId;
  agentId: AgentId;
  machine: SessionStateMachine;
  /** Backend run to resume; null when the backend did not report one. */
  runId: string | null;
  /** The conversation up to and including the turn that asked for clarification. */
  history: readonly ChatMessage[];
  suspendedAt: Date;
  expiresAt: Date;
}

export type SessionState = 'active' | 'suspended';

export interface SessionView {
  state: SessionState;
  snapshot: SessionSnapshot;
  expiresAt: Date | null;
}

export type CancelOutcome = 'cancelled' | 'discarded' | 'not_found';

export interface SessionStore {
  track(turn: ActiveTurn): void;
  /** Forget an active turn once it has reached a resting phase. */
  release(sessionId: SessionId): void;
  suspend(session: Omit<SuspendedSession, 'suspendedAt' | 'expiresAt'>): SuspendedSession;
  /** Remove and return a suspended, unexpired session. */
  claim(sessionId: SessionId): SuspendedSession | null;
  get(sessionId: SessionId): SessionView | null;
  /** Active turns first, then unexpired suspended sessions. */
  list(): SessionView[];
  /** Cancel an active turn, or discard a suspended session. */
  cancel(sessionId: SessionId): CancelOutcome;
  /** Drop expired suspended sessions; returns how many. */
  sweepExpired(): number;
  /** Cancel every active turn (shutdown); returns how many. */
  cancelAll(): number;
  stats(): { active: number; suspended: number };
}

export interface SessionStoreOptions {
  clarificationTtlMs: number;
  logger: Logger;
  now?: () => Date;
}

export function createSessionStore(options: SessionStoreOptions): SessionStore {
  const { clarificationTtlMs, logger } = options;
  const now = options.now ?? ((): Date => new Date());
  const active = new Map<SessionId, ActiveTurn>();
  const suspended = new Map<SessionId, SuspendedSession>();

  function isExpired(session: SuspendedSession): boolean {
    return session.expiresAt.getTime() <= now().getTime();
  }

  return {
    track(turn: ActiveTurn): void {
      active.set(turn.sessionId, turn);
    },

    release(sessionId: SessionId): void {
      active.delete(sessionId);
    },

    suspend(session): SuspendedSession {
      const suspendedAt = now();
      const entry: SuspendedSession = {
        ...session,
        suspendedAt,
        expiresAt: new Date(suspendedAt.getTime() + clarificationTtlMs),
      };
      active.delete(session.sessionId);
      suspended.set(session.sessionId, entry);
      logger.info('Session awaiting clarification', {
        component: COMPONENT,
        sessionId: session.sessionId,
        agentId: session.agentId,
        expiresAt: entry.expiresAt.toISOString(),
      });
      return entry;
    },

    claim(sessionId: SessionId): SuspendedSession | null {
      const session = suspended.get(sessionId);
      if (!session) return null;
      suspended.delete(sessionId);
      if (isExpired(session)) {
        logger.info('Suspended session expired before it was resumed', { component: COMPONENT, sessionId });
        return null;
      }
      return session;
    },

    get(sessionId: SessionId): SessionView | null {
      const turn = active.get(sessionId);
      if (turn) return { state: 'active', snapshot: turn.machine.snapshot(), expiresAt: null };

      const session = suspended.get(sessionId);
      if (!session || isExpired(session)) return null;
      return { state: 'suspended', snapshot: session.machine.snapshot(), expiresAt: session.expiresAt };
    },

    list(): SessionView[] {
      const views: SessionView[] = [...active.values()].map((turn) => ({
        state: 'active',
        snapshot: turn.machine.snapshot(),
        expiresAt: null,
      }));
      for (const session of suspended.values()) {
        if (isExpired(session)) continue;
        views.push({ state: 'suspended', snapshot: session.machine.snapshot(), expiresAt: session.expiresAt });
      }
      return views;
    },

    cancel(sessionId: SessionId): CancelOutcome {
      const turn = active.get(sessionId);
      if (turn) {
        turn.controller.cancel('cancelled');
        return 'cancelled';
      }
      const session = suspended.get(sessionId);
      if (session) {
        suspended.delete(sessionId);
        session.machine.cancel('cancelled');
        return 'discarded';
      }
      return 'not_found';
    },

    sweepExpired(): number {
      let removed = 0;
      for (const [sessionId, session] of suspended) {
        if (isExpired(session)) {
          suspended.delete(sessionId);
          removed += 1;
        }
      }
      if (removed > 0) {
        logger.debug('Swept expired sessions', { component: COMPONENT, removed });
      }
      return removed;
    },

    cancelAll(): number {
      let count = 0;
      for (const turn of active.values()) {
        if (turn.controller.cancel('cancelled')) count += 1;
      }
      return count;
    },

    stats: () => ({ active: active.size, suspended: suspended.size }),
  };
}
