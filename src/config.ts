import pino from 'pino';
import { parseAllowUserIds } from './discord/allowlist.js';
import { MAX_TIMEOUT_MS } from './discord/reaction-events.js';
import { DEFAULT_DELETION_EMOJIS } from './discord/wait-for-deletion.js';

export const DEFAULT_COMMAND_PREFIX = '?';
export const DEFAULT_DELETION_TIMEOUT_SECONDS = 300;

type ParseResult = {
  config: GhLinkerConfig;
  warnings: string[];
  infos: string[];
};

export type GhLinkerConfig = {
  token: string;
  commandPrefix: string;
  /** Users who may delete any bot reply, in addition to whoever invoked it. */
  moderatorIds: Set<string>;
  deletionEmojis: string[];
  deletionTimeoutMs: number;
  autoJoinThreads: boolean;
  logLevel: string;
};

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parsePositiveNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

function parseLogLevel(env: NodeJS.ProcessEnv, name: string): string {
  const raw = parseTrimmedString(env, name);
  if (!raw) return 'info';
  const level = raw.toLowerCase();
  if (level !== 'silent' && !Object.hasOwn(pino.levels.values, level)) {
    throw new Error(`${name} must be a pino level name or "silent", got "${raw}"`);
  }
  return level;
}

function parseEmojiList(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const raw = parseTrimmedString(env, name);
  if (!raw) return undefined;
  const emojis = raw
    .split(/[,\s]+/g)
    .map((e) => e.trim())
    .filter(Boolean);
  if (emojis.length === 0) {
    throw new Error(`${name} was set but no emojis were parsed`);
  }
  return [...new Set(emojis)];
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const token = parseTrimmedString(env, 'BOT_TOKEN');
  if (!token) {
    throw new Error('Missing BOT_TOKEN');
  }

  const commandPrefix = parseTrimmedString(env, 'BOT_PREFIX') ?? DEFAULT_COMMAND_PREFIX;

  const moderatorIdsRaw = env.BOT_MODERATOR_IDS;
  const moderatorIds = parseAllowUserIds(moderatorIdsRaw);
  if ((moderatorIdsRaw ?? '').trim().length > 0 && moderatorIds.size === 0) {
    warnings.push('BOT_MODERATOR_IDS was set but no valid IDs were parsed: only command invokers can delete replies');
  }

  const deletionEmojis = parseEmojiList(env, 'BOT_DELETION_EMOJIS') ?? [...DEFAULT_DELETION_EMOJIS];
  const deletionTimeoutSeconds = parsePositiveNumber(
    env,
    'BOT_DELETION_TIMEOUT_SECONDS',
    DEFAULT_DELETION_TIMEOUT_SECONDS,
  );
  const deletionTimeoutMs = Math.round(deletionTimeoutSeconds * 1000);
  if (deletionTimeoutMs > MAX_TIMEOUT_MS) {
    throw new Error(
      `BOT_DELETION_TIMEOUT_SECONDS must be at most ${MAX_TIMEOUT_MS / 1000}, got "${env.BOT_DELETION_TIMEOUT_SECONDS ?? ''}"`,
    );
  }

  const autoJoinThreads = parseBoolean(env, 'BOT_AUTO_JOIN_THREADS', true);
  if (!autoJoinThreads) {
    infos.push('BOT_AUTO_JOIN_THREADS=0: commands inside new threads require the bot to be added manually');
  }

  const logLevel = parseLogLevel(env, 'LOG_LEVEL');

  return {
    config: {
      token,
      commandPrefix,
      moderatorIds,
      deletionEmojis,
      deletionTimeoutMs,
      autoJoinThreads,
      logLevel,
    },
    warnings,
    infos,
  };
}
