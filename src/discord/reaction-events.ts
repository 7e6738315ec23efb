// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A reaction-add as delivered by the gateway, reduced to what waiters need. */
export type ReactionEvent = {
  readonly emoji: string;
  readonly userId: string;
  readonly messageId: string;
};

export type ReactionPredicate = (event: ReactionEvent) => boolean;

export type ReactionWaitResult =
  | { type: 'reaction'; event: ReactionEvent }
  | { type: 'timeout' }
  | { type: 'message-deleted' };

export type ReactionWaitRequest = {
  /** Message the waiter is attached to; used for deletion notices. */
  messageId: string;
  predicate: ReactionPredicate;
  timeoutMs: number;
  signal?: AbortSignal;
};

export interface ReactionEventSource {
  waitFor(request: ReactionWaitRequest): Promise<ReactionWaitResult>;
}

/** Largest delay `setTimeout` honours; Node fires longer ones after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function assertTimeoutMs(timeoutMs: number): void {
  if (Number.isNaN(timeoutMs) || timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(`timeoutMs must be at most ${MAX_TIMEOUT_MS}, got ${timeoutMs}`);
  }
}

type Waiter = {
  messageId: string;
  predicate: ReactionPredicate;
  settle: (result: ReactionWaitResult) => void;
  fail: (err: unknown) => void;
};

// ---------------------------------------------------------------------------
// In-memory waiter registry
// ---------------------------------------------------------------------------

/**
 * Fan-out point between the gateway and suspended waiters.
 *
 * The deadline is enforced only by each waiter's timer callback, so an event
 * dispatched before that callback runs still wins even if it arrives exactly
 * at the deadline.
 */
export class ReactionWaiters implements ReactionEventSource {
  private waiters = new Set<Waiter>();

  waitFor(request: ReactionWaitRequest): Promise<ReactionWaitResult> {
    const { messageId, predicate, timeoutMs, signal } = request;
    if (signal?.aborted) return Promise.reject(signal.reason);
    try {
      assertTimeoutMs(timeoutMs);
    } catch (err) {
      return Promise.reject(err);
    }

    return new Promise<ReactionWaitResult>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const cleanup = () => {
        this.waiters.delete(waiter);
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = () => {
        cleanup();
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        messageId,
        predicate,
        settle: (result) => {
          cleanup();
          resolve(result);
        },
        fail: (err) => {
          cleanup();
          reject(err);
        },
      };

      this.waiters.add(waiter);
      timer = setTimeout(() => waiter.settle({ type: 'timeout' }), Math.max(0, timeoutMs));
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Deliver a reaction to every live waiter, in registration order.
   * Returns how many waiters the event resolved.
   */
  dispatch(event: ReactionEvent): number {
    let resolved = 0;
    for (const waiter of [...this.waiters]) {
      // A waiter settled earlier in this loop (e.g. by a re-entrant dispatch) is skipped.
      if (!this.waiters.has(waiter)) continue;
      let matched: boolean;
      try {
        matched = waiter.predicate(event);
      } catch (err) {
        waiter.fail(err);
        continue;
      }
      if (matched) {
        waiter.settle({ type: 'reaction', event });
        resolved++;
      }
    }
    return resolved;
  }

  /** Wake every waiter attached to a message that was deleted out-of-band. */
  messageDeleted(messageId: string): number {
    let resolved = 0;
    for (const waiter of [...this.waiters]) {
      if (waiter.messageId !== messageId) continue;
      waiter.settle({ type: 'message-deleted' });
      resolved++;
    }
    return resolved;
  }

  /** Reject all pending waits, e.g. on shutdown. */
  cancelAll(reason: unknown): void {
    for (const waiter of [...this.waiters]) waiter.fail(reason);
  }

  size(): number {
    return this.waiters.size;
  }
}
