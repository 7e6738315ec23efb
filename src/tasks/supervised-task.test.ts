import { describe, expect, it, vi } from 'vitest';
import { spawnSupervised } from './supervised-task.js';
import type { Scheduler } from './supervised-task.js';

function makeLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function apiError(message: string, code: number): Error {
  return Object.assign(new Error(message), { code });
}

function manualScheduler(): { scheduler: Scheduler; flush: () => void; pending: () => number } {
  const queued: Array<() => void> = [];
  return {
    scheduler: (run) => {
      queued.push(run);
    },
    flush: () => {
      for (const run of queued.splice(0)) run();
    },
    pending: () => queued.length,
  };
}

describe('spawnSupervised', () => {
  it('does not start the work before the caller returns', async () => {
    const log = makeLog();
    const work = vi.fn().mockResolvedValue('ok');
    const handle = spawnSupervised(work, { label: 'noop', log });

    expect(work).not.toHaveBeenCalled();
    await expect(handle.done).resolves.toEqual({ status: 'fulfilled', value: 'ok' });
    expect(work).toHaveBeenCalledOnce();
    expect(log.error).not.toHaveBeenCalled();
  });

  it('silences failures whose kind is suppressed', async () => {
    const log = makeLog();
    const err = apiError('Unknown Message', 10008);
    const handle = spawnSupervised(() => Promise.reject(err), {
      label: 'remove_reaction',
      suppress: ['not-found'],
      log,
    });

    await expect(handle.done).resolves.toEqual({
      status: 'rejected',
      kind: 'not-found',
      error: err,
      reported: false,
    });
    expect(log.error).not.toHaveBeenCalled();
  });

  it('logs other failures exactly once with the label and task id', async () => {
    const log = makeLog();
    const err = new Error('503 Service Unavailable');
    const handle = spawnSupervised(() => Promise.reject(err), {
      label: 'remove_reaction-🗑️-m1-u2',
      suppress: ['not-found'],
      log,
    });

    const outcome = await handle.done;
    expect(outcome).toEqual({ status: 'rejected', kind: 'transport', error: err, reported: true });
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(log.error).toHaveBeenCalledWith(
      { err, task: 'remove_reaction-🗑️-m1-u2', taskId: handle.id, kind: 'transport' },
      `task:remove_reaction-🗑️-m1-u2 (#${handle.id}) failed`,
    );
  });

  it('treats a synchronous throw as a failure', async () => {
    const log = makeLog();
    const err = new Error('sync boom');
    const handle = spawnSupervised<void>(() => {
      throw err;
    }, { label: 'sync', log });

    const outcome = await handle.done;
    expect(outcome.status).toBe('rejected');
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it('skips the work when cancelled before it is scheduled', async () => {
    const log = makeLog();
    const { scheduler, flush } = manualScheduler();
    const work = vi.fn().mockResolvedValue(undefined);
    const handle = spawnSupervised(work, { label: 'cancel-early', log, scheduler });

    handle.cancel();
    flush();

    await expect(handle.done).resolves.toEqual({ status: 'cancelled' });
    expect(work).not.toHaveBeenCalled();
    expect(log.error).not.toHaveBeenCalled();
  });

  it('treats a rejection after cancellation as expected', async () => {
    const log = makeLog();
    const handle = spawnSupervised(
      (signal) =>
        new Promise<never>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('request aborted')));
        }),
      { label: 'cancel-running', log },
    );

    await Promise.resolve();
    handle.cancel();

    await expect(handle.done).resolves.toEqual({ status: 'cancelled' });
    expect(log.error).not.toHaveBeenCalled();
  });

  it('is cancelled by an already-aborted parent signal', async () => {
    const log = makeLog();
    const parent = new AbortController();
    parent.abort();
    const work = vi.fn().mockResolvedValue(undefined);
    const handle = spawnSupervised(work, { label: 'parent', log, signal: parent.signal });

    await expect(handle.done).resolves.toEqual({ status: 'cancelled' });
    expect(work).not.toHaveBeenCalled();
  });

  it('forwards a later parent abort to the work signal', async () => {
    const log = makeLog();
    const parent = new AbortController();
    let seen: AbortSignal | undefined;
    const handle = spawnSupervised(
      (signal) => {
        seen = signal;
        return new Promise<never>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason));
        });
      },
      { label: 'parent-late', log, signal: parent.signal },
    );

    await Promise.resolve();
    parent.abort();

    await expect(handle.done).resolves.toEqual({ status: 'cancelled' });
    expect(seen?.aborted).toBe(true);
  });

  it('runs on the supplied scheduler', async () => {
    const log = makeLog();
    const { scheduler, flush, pending } = manualScheduler();
    const work = vi.fn().mockResolvedValue(7);
    const handle = spawnSupervised(work, { label: 'custom', log, scheduler });

    expect(pending()).toBe(1);
    expect(work).not.toHaveBeenCalled();
    flush();

    await expect(handle.done).resolves.toEqual({ status: 'fulfilled', value: 7 });
  });

  it('calls onSettled once and survives a throwing callback', async () => {
    const log = makeLog();
    const onSettled = vi.fn(() => {
      throw new Error('callback boom');
    });
    const handle = spawnSupervised(() => Promise.resolve('v'), { label: 'settled', log, onSettled });

    await expect(handle.done).resolves.toEqual({ status: 'fulfilled', value: 'v' });
    expect(onSettled).toHaveBeenCalledOnce();
    expect(onSettled).toHaveBeenCalledWith({ status: 'fulfilled', value: 'v' });
    expect(log.error).toHaveBeenCalledTimes(1);
    expect(log.error.mock.calls[0]?.[1]).toBe(`task:settled (#${handle.id}) completion callback threw`);
  });

  it('hands out distinct ids', () => {
    const log = makeLog();
    const a = spawnSupervised(() => Promise.resolve(), { label: 'a', log });
    const b = spawnSupervised(() => Promise.resolve(), { label: 'b', log });
    expect(a.id).not.toBe(b.id);
    expect(a.label).toBe('a');
  });
});
