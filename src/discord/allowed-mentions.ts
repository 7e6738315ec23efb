import type { MessageMentionOptions } from 'discord.js';

/** Suppress all pings for bot-authored replies. */
export const NO_MENTIONS: MessageMentionOptions = { parse: [] };
