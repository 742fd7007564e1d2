import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { SessionId } from '@/core/types.js';
import { createMockLogger } from '@/testing/fixtures/routes.js';
import { createTurnController } from './turn-controller.js';

describe('createTurnController', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function create(timeoutMs = 1_000): ReturnType<typeof createTurnController> {
    return createTurnController({ sessionId: 'sess-1' as SessionId, timeoutMs, logger: createMockLogger() });
  }

  it('aborts with timed_out when the deadline passes', () => {
    const controller = create();

    vi.advanceTimersByTime(999);
    expect(controller.signal.aborted).toBe(false);

    vi.advanceTimersByTime(1);
    expect(controller.signal.aborted).toBe(true);
    expect(controller.reason()).toBe('timed_out');
    expect(controller.signal.reason).toBe('timed_out');
  });

  it('keeps the first reason', () => {
    const controller = create();

    expect(controller.cancel('cancelled')).toBe(true);
    expect(controller.cancel('timed_out')).toBe(false);
    vi.advanceTimersByTime(5_000);

    expect(controller.reason()).toBe('cancelled');
  });

  it('does not time out after dispose', () => {
    const controller = create();

    controller.dispose();
    vi.advanceTimersByTime(5_000);

    expect(controller.signal.aborted).toBe(false);
    expect(controller.reason()).toBeNull();
  });
});
