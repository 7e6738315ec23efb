import type { LoggerLike } from '../logging/logger-like.js';
import { spawnSupervised } from '../tasks/supervised-task.js';
import type { Scheduler } from '../tasks/supervised-task.js';
import { isAllowlisted } from './allowlist.js';
import type { ReactionEvent, ReactionPredicate } from './reaction-events.js';

export type CandidateReactionOptions = {
  /** The bot's own user ID; its reactions never count. */
  selfId: string;
  messageId: string;
  allowedEmoji: readonly string[];
};

export type ReactionCheckOptions = CandidateReactionOptions & {
  allowedUserIds: ReadonlySet<string>;
  removeReaction: (emoji: string, userId: string) => Promise<unknown>;
  log: LoggerLike;
  scheduler?: Scheduler;
};

/** Right message, right emoji, not the bot itself. Says nothing about who reacted. */
export function isCandidateReaction(event: ReactionEvent, opts: CandidateReactionOptions): boolean {
  return (
    event.userId !== opts.selfId
    && event.messageId === opts.messageId
    && opts.allowedEmoji.includes(event.emoji)
  );
}

/**
 * Build the predicate a deletion waiter suspends on. Candidates from users
 * outside the allowlist are removed in the background and never resolve the wait.
 */
export function createReactionCheck(opts: ReactionCheckOptions): ReactionPredicate {
  return (event) => {
    if (!isCandidateReaction(event, opts)) return false;

    if (isAllowlisted(opts.allowedUserIds, event.userId)) {
      opts.log.debug(
        { emoji: event.emoji, userId: event.userId, messageId: event.messageId },
        'reaction-check:allowed reaction',
      );
      return true;
    }

    opts.log.debug(
      { emoji: event.emoji, userId: event.userId, messageId: event.messageId },
      'reaction-check:removing reaction from disallowed user',
    );
    spawnSupervised(() => opts.removeReaction(event.emoji, event.userId), {
      label: `remove_reaction-${event.emoji}-${event.messageId}-${event.userId}`,
      suppress: ['not-found'],
      log: opts.log,
      scheduler: opts.scheduler,
    });
    return false;
  };
}
