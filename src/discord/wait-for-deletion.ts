import type { LoggerLike } from '../logging/logger-like.js';
import type { Scheduler } from '../tasks/supervised-task.js';
import type { DeletableMessage } from './deletable-message.js';
import { InvalidContextError, isNotFound } from './discord-errors.js';
import { createReactionCheck } from './reaction-check.js';
import { assertTimeoutMs } from './reaction-events.js';
import type { ReactionEventSource } from './reaction-events.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DeletionOutcome = 'deleted' | 'expired' | 'aborted';

export type WaitForDeletionOptions = {
  events: ReactionEventSource;
  /** The bot's own user ID, so its affordance reactions are ignored. */
  selfId: string;
  /** Users allowed to delete. Empty means nobody can. */
  userIds: Iterable<string>;
  deletionEmojis?: readonly string[];
  timeoutMs?: number;
  /** Add each deletion emoji to the message before waiting. */
  attachEmojis?: boolean;
  log: LoggerLike;
  signal?: AbortSignal;
  /** Scheduler for background removal of disallowed reactions. */
  scheduler?: Scheduler;
};

export const DEFAULT_DELETION_EMOJIS: readonly string[] = ['🗑️'];
export const DEFAULT_DELETION_TIMEOUT_MS = 5 * 60_000;

// ---------------------------------------------------------------------------
// Protocol
// ---------------------------------------------------------------------------

/**
 * Wait for one of `userIds` to react with a deletion emoji, then delete the
 * message. When the timeout lapses first, reactions are cleared to show the
 * option has expired.
 *
 * - `deleted`: an allowed user reacted (also when the delete finds the message already gone).
 * - `expired`: nobody allowed reacted in time (also when the clear finds the message gone).
 * - `aborted`: the message vanished before or during the wait; no further calls are made.
 *
 * A reaction dispatched before the timeout callback runs wins over the timeout.
 * Rejects with `InvalidContextError` outside a guild, with `RangeError` for a
 * timeout above `MAX_TIMEOUT_MS`, with the abort reason when
 * `signal` fires, and with any non-not-found failure of the final delete/clear.
 */
export async function waitForDeletion(
  message: DeletableMessage,
  opts: WaitForDeletionOptions,
): Promise<DeletionOutcome> {
  const { log } = opts;
  const deletionEmojis = opts.deletionEmojis ?? DEFAULT_DELETION_EMOJIS;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_DELETION_TIMEOUT_MS;

  if (message.guildId == null) {
    throw new InvalidContextError('Message must be sent in a guild');
  }
  assertTimeoutMs(timeoutMs);

  if (opts.attachEmojis ?? true) {
    for (const emoji of deletionEmojis) {
      try {
        await message.react(emoji);
      } catch (err) {
        if (!isNotFound(err)) throw err;
        log.debug({ messageId: message.id }, 'wait-for-deletion:aborting, message deleted prematurely');
        return 'aborted';
      }
    }
  }

  const check = createReactionCheck({
    selfId: opts.selfId,
    messageId: message.id,
    allowedEmoji: deletionEmojis,
    allowedUserIds: new Set(opts.userIds),
    removeReaction: (emoji, userId) => message.removeReaction(emoji, userId),
    log,
    scheduler: opts.scheduler,
  });

  const result = await opts.events.waitFor({
    messageId: message.id,
    predicate: check,
    timeoutMs,
    signal: opts.signal,
  });

  if (result.type === 'message-deleted') {
    log.debug({ messageId: message.id }, 'wait-for-deletion:aborting, message deleted during wait');
    return 'aborted';
  }

  const outcome: DeletionOutcome = result.type === 'reaction' ? 'deleted' : 'expired';
  try {
    if (outcome === 'deleted') {
      await message.delete();
    } else {
      await message.clearReactions();
    }
  } catch (err) {
    if (!isNotFound(err)) throw err;
    log.debug({ messageId: message.id, outcome }, 'wait-for-deletion:message deleted prematurely');
  }
  return outcome;
}
