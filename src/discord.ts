import { Client, GatewayIntentBits, Partials } from 'discord.js';
import type { LoggerLike } from './logging/logger-like.js';
import { toReactionEvent } from './discord/deletable-message.js';
import { createMessageCreateHandler } from './discord/message-handler.js';
import { ReactionWaiters } from './discord/reaction-events.js';
import { createThreadCreateHandler } from './discord/thread-join.js';

export type BotParams = {
  token: string;
  commandPrefix: string;
  moderatorIds: ReadonlySet<string>;
  deletionEmojis: readonly string[];
  deletionTimeoutMs: number;
  autoJoinThreads: boolean;
  log: LoggerLike;
  /** Aborted on shutdown. */
  signal?: AbortSignal;
};

export async function startDiscordBot(params: BotParams): Promise<{ client: Client; waiters: ReactionWaiters }> {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.GuildMessageReactions,
      GatewayIntentBits.DirectMessages,
    ],
    partials: [Partials.Channel],
  });

  const waiters = new ReactionWaiters();

  client.on('messageCreate', createMessageCreateHandler({
    commandPrefix: params.commandPrefix,
    moderatorIds: params.moderatorIds,
    deletionEmojis: params.deletionEmojis,
    deletionTimeoutMs: params.deletionTimeoutMs,
    events: waiters,
    log: params.log,
    signal: params.signal,
  }));

  client.on('messageReactionAdd', (reaction, user) => {
    try {
      waiters.dispatch(toReactionEvent(reaction, user));
    } catch (err) {
      params.log.error({ err }, 'discord:reaction dispatch failed');
    }
  });

  client.on('messageDelete', (message) => {
    waiters.messageDeleted(message.id);
  });

  client.on('messageDeleteBulk', (messages) => {
    for (const id of messages.keys()) waiters.messageDeleted(id);
  });

  if (params.autoJoinThreads) {
    client.on('threadCreate', createThreadCreateHandler(params.log));
  }

  client.on('error', (err) => {
    params.log.error({ err }, 'discord:client error');
  });

  await client.login(params.token);

  await new Promise<void>((resolve) => {
    if (client.isReady()) {
      resolve();
    } else {
      client.once('ready', () => resolve());
    }
  });

  params.log.info({ userId: client.user?.id, guilds: client.guilds.cache.size }, 'discord:ready');
  return { client, waiters };
}
