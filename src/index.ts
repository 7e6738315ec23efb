import 'dotenv/config';
import pino from 'pino';

import { parseConfig } from './config.js';
import { startDiscordBot } from './discord.js';

// LOG_LEVEL is validated by parseConfig before it is applied.
const log = pino({ level: 'info' });

let parsedConfig;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  log.error({ err }, 'Invalid configuration');
  process.exit(1);
}
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
const cfg = parsedConfig.config;
log.level = cfg.logLevel;

const shutdownController = new AbortController();

let bot: Awaited<ReturnType<typeof startDiscordBot>>;
try {
  bot = await startDiscordBot({
    token: cfg.token,
    commandPrefix: cfg.commandPrefix,
    moderatorIds: cfg.moderatorIds,
    deletionEmojis: cfg.deletionEmojis,
    deletionTimeoutMs: cfg.deletionTimeoutMs,
    autoJoinThreads: cfg.autoJoinThreads,
    log,
    signal: shutdownController.signal,
  });
} catch (err) {
  log.error({ err }, 'discord:login failed');
  process.exit(1);
}

let shuttingDown = false;
const shutdown = async (signalName: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal: signalName }, 'shutdown:requested');

  const reason = new Error('Process shutting down');
  reason.name = 'AbortError';
  shutdownController.abort(reason);
  // Waiters registered outside a supervised task are not tied to the signal.
  bot.waiters.cancelAll(reason);

  try {
    await bot.client.destroy();
  } catch (err) {
    log.warn({ err }, 'shutdown:client destroy failed');
  }
  process.exit(0);
};

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
