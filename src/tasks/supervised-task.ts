import type { LoggerLike } from '../logging/logger-like.js';
import { classifyFailure } from '../discord/discord-errors.js';
import type { FailureKind } from '../discord/discord-errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Runs `run` later without blocking the caller. */
export type Scheduler = (run: () => void) => void;

export type TaskOutcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; kind: Exclude<FailureKind, 'cancelled'>; error: unknown; reported: boolean }
  | { status: 'cancelled' };

export type SupervisedTaskOptions<T> = {
  /** Diagnostic name; shows up in the error log and nowhere else. */
  label: string;
  /** Failure kinds the caller expects. Cancellation is always expected. */
  suppress?: readonly FailureKind[];
  log: LoggerLike;
  scheduler?: Scheduler;
  /** Parent signal; aborting it cancels the task. */
  signal?: AbortSignal;
  /** Completion callback, invoked exactly once. */
  onSettled?: (outcome: TaskOutcome<T>) => void;
};

export type TaskHandle<T> = {
  id: number;
  label: string;
  /** Settles exactly once and never rejects. */
  done: Promise<TaskOutcome<T>>;
  cancel: (reason?: unknown) => void;
};

export const microtaskScheduler: Scheduler = (run) => queueMicrotask(run);

let nextTaskId = 1;

// ---------------------------------------------------------------------------
// Spawn
// ---------------------------------------------------------------------------

/**
 * Fire-and-forget wrapper that observes the work's completion and logs any
 * failure outside `suppress`. Failures are never re-raised: the caller has
 * already moved on by the time they happen.
 */
export function spawnSupervised<T>(
  work: (signal: AbortSignal) => Promise<T>,
  opts: SupervisedTaskOptions<T>,
): TaskHandle<T> {
  const id = nextTaskId++;
  const { label, log } = opts;
  const suppressed = new Set<FailureKind>(opts.suppress ?? []);
  const scheduler = opts.scheduler ?? microtaskScheduler;

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(opts.signal?.reason);
  if (opts.signal?.aborted) {
    controller.abort(opts.signal.reason);
  } else {
    opts.signal?.addEventListener('abort', onParentAbort, { once: true });
  }

  function toFailureOutcome(err: unknown): TaskOutcome<T> {
    const kind = controller.signal.aborted ? 'cancelled' : classifyFailure(err);
    if (kind === 'cancelled') return { status: 'cancelled' };
    const reported = !suppressed.has(kind);
    if (reported) {
      log.error({ err, task: label, taskId: id, kind }, `task:${label} (#${id}) failed`);
    }
    return { status: 'rejected', kind, error: err, reported };
  }

  const settled = new Promise<TaskOutcome<T>>((resolve) => {
    scheduler(() => {
      if (controller.signal.aborted) {
        resolve({ status: 'cancelled' });
        return;
      }
      let running: Promise<T>;
      try {
        running = work(controller.signal);
      } catch (err) {
        running = Promise.reject(err);
      }
      running.then(
        (value) => resolve({ status: 'fulfilled', value }),
        (err: unknown) => resolve(toFailureOutcome(err)),
      );
    });
  });

  const done = settled.then((outcome) => {
    opts.signal?.removeEventListener('abort', onParentAbort);
    if (opts.onSettled) {
      try {
        opts.onSettled(outcome);
      } catch (err) {
        log.error({ err, task: label, taskId: id }, `task:${label} (#${id}) completion callback threw`);
      }
    }
    return outcome;
  });

  return {
    id,
    label,
    done,
    cancel: (reason?: unknown) => controller.abort(reason),
  };
}
