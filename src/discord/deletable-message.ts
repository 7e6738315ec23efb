import type { ReactionEvent } from './reaction-events.js';

/**
 * The slice of a platform message the deletion protocol reads and mutates.
 * Every call may fail with a not-found error if the message went away.
 */
export type DeletableMessage = {
  id: string;
  channelId: string;
  /** Null outside a guild (DMs), where reactions cannot be moderated. */
  guildId: string | null;
  react: (emoji: string) => Promise<unknown>;
  removeReaction: (emoji: string, userId: string) => Promise<unknown>;
  clearReactions: () => Promise<unknown>;
  delete: () => Promise<unknown>;
};

type ReactionUsersLike = {
  users: { remove: (userId: string) => Promise<unknown> };
};

/** Structural subset of a discord.js `Message`. */
export type DiscordMessageLike = {
  id: string;
  channelId: string;
  guildId: string | null;
  react: (emoji: string) => Promise<unknown>;
  delete: () => Promise<unknown>;
  reactions: {
    cache: { get: (key: string) => ReactionUsersLike | undefined };
    removeAll: () => Promise<unknown>;
  };
};

type EmojiLike = {
  id: string | null;
  name: string | null;
  animated?: boolean | null;
};

const CUSTOM_EMOJI_RE = /^<a?:[\w~]+:(\d+)>$/;

/** Unicode emoji by name, custom emoji as `<:name:id>` (or `<a:name:id>`). */
export function emojiIdentifier(emoji: EmojiLike): string {
  if (emoji.id) return `<${emoji.animated ? 'a' : ''}:${emoji.name ?? '_'}:${emoji.id}>`;
  return emoji.name ?? '';
}

/** discord.js keys its reaction cache by emoji ID for custom emoji and by name otherwise. */
export function reactionCacheKey(emoji: string): string {
  const match = CUSTOM_EMOJI_RE.exec(emoji);
  return match?.[1] ?? emoji;
}

export function toDeletableMessage(msg: DiscordMessageLike): DeletableMessage {
  return {
    id: msg.id,
    channelId: msg.channelId,
    guildId: msg.guildId,
    react: (emoji) => msg.react(emoji),
    removeReaction: async (emoji, userId) => {
      const reaction = msg.reactions.cache.get(reactionCacheKey(emoji));
      // Nothing cached means nothing left to remove.
      if (!reaction) return;
      await reaction.users.remove(userId);
    },
    clearReactions: () => msg.reactions.removeAll(),
    delete: () => msg.delete(),
  };
}

export function toReactionEvent(
  reaction: { emoji: EmojiLike; message: { id: string } },
  user: { id: string },
): ReactionEvent {
  return {
    emoji: emojiIdentifier(reaction.emoji),
    userId: user.id,
    messageId: reaction.message.id,
  };
}
