import type { LoggerLike } from '../logging/logger-like.js';
import { isForbidden } from './discord-errors.js';

type ThreadLike = {
  id: string;
  parentId: string | null;
  joinable: boolean;
  joined: boolean;
  join: () => Promise<unknown>;
};

/**
 * Join newly created threads so prefix commands work inside them.
 * Threads the bot cannot see or join are skipped quietly.
 */
export function createThreadCreateHandler(log: LoggerLike): (thread: ThreadLike) => Promise<void> {
  return async (thread) => {
    if (thread.joined || !thread.joinable) return;
    try {
      await thread.join();
      log.info({ threadId: thread.id, parentId: thread.parentId }, 'discord:thread joined (threadCreate)');
    } catch (err) {
      if (isForbidden(err)) {
        log.debug({ threadId: thread.id }, 'discord:thread join forbidden (threadCreate)');
        return;
      }
      log.warn({ err, threadId: thread.id }, 'discord:thread failed to join (threadCreate)');
    }
  };
}
