import type { MessageMentionOptions } from 'discord.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { spawnSupervised } from '../tasks/supervised-task.js';
import type { TaskHandle } from '../tasks/supervised-task.js';
import { NO_MENTIONS } from './allowed-mentions.js';
import { deletionAllowlist } from './allowlist.js';
import { toDeletableMessage } from './deletable-message.js';
import type { DiscordMessageLike } from './deletable-message.js';
import { handleHelpCommand, parseHelpCommand } from './help-command.js';
import type { ReactionEventSource } from './reaction-events.js';
import { waitForDeletion } from './wait-for-deletion.js';
import type { DeletionOutcome } from './wait-for-deletion.js';

export type MessageHandlerParams = {
  commandPrefix: string;
  moderatorIds: ReadonlySet<string>;
  deletionEmojis: readonly string[];
  deletionTimeoutMs: number;
  events: ReactionEventSource;
  log: LoggerLike;
  /** Aborted on shutdown; cancels pending deletion waits. */
  signal?: AbortSignal;
};

export type IncomingMessageLike = {
  id: string;
  content: string;
  author: { id: string; bot: boolean };
  client: { user: { id: string } };
  reply: (opts: { content: string; allowedMentions: MessageMentionOptions }) => Promise<DiscordMessageLike>;
};

/**
 * Let the invoker (and moderators) delete a bot reply by reacting. The wait
 * runs in the background; replies outside a guild are left alone.
 */
export function armDeletion(
  reply: DiscordMessageLike,
  invoker: Pick<IncomingMessageLike, 'author' | 'client'>,
  params: MessageHandlerParams,
): TaskHandle<DeletionOutcome> | null {
  const message = toDeletableMessage(reply);
  if (message.guildId == null) return null;

  return spawnSupervised(
    (signal) =>
      waitForDeletion(message, {
        events: params.events,
        selfId: invoker.client.user.id,
        userIds: deletionAllowlist(invoker.author.id, params.moderatorIds),
        deletionEmojis: params.deletionEmojis,
        timeoutMs: params.deletionTimeoutMs,
        log: params.log,
        signal,
      }),
    {
      label: `wait_for_deletion-${message.id}`,
      log: params.log,
      signal: params.signal,
      onSettled: (outcome) => {
        if (outcome.status === 'fulfilled') {
          params.log.debug({ messageId: message.id, outcome: outcome.value }, 'wait-for-deletion:settled');
        }
      },
    },
  );
}

export function createMessageCreateHandler(
  params: MessageHandlerParams,
): (msg: IncomingMessageLike) => Promise<void> {
  return async (msg) => {
    try {
      if (msg.author.bot) return;

      if (parseHelpCommand(msg.content, params.commandPrefix)) {
        const reply = await msg.reply({
          content: handleHelpCommand(params.commandPrefix, params.deletionEmojis),
          allowedMentions: NO_MENTIONS,
        });
        armDeletion(reply, msg, params);
      }
    } catch (err) {
      params.log.error({ err, messageId: msg.id }, 'discord:command handler failed');
    }
  };
}
