import pino from 'pino';
import {
  AppTokenProvider,
  checksPerUpdate,
  createTwitchStreamSource,
  getLocalization,
  RetryExecutor,
  runMonitor,
  SessionMachine
} from '@herald/core';
import { parseEnv } from './env';
import { buildStatusServer } from './status';
import { TelegramNotifier } from './telegram';

const bootstrap = async () => {
  const env = parseEnv(process.env);
  const logger = pino({ name: 'herald-bot', level: env.LOG_LEVEL });
  const locale = getLocalization(env.LANGUAGE);

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutdown requested');
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const tokens = new AppTokenProvider({
    clientId: env.TWITCH_CLIENT_ID,
    clientSecret: env.TWITCH_CLIENT_SECRET,
    signal: controller.signal
  });
  const source = createTwitchStreamSource({ tokens, locale, signal: controller.signal });
  const notifier = new TelegramNotifier({
    botToken: env.TELEGRAM_BOT_TOKEN,
    chatId: env.TELEGRAM_CHAT_ID,
    threadId: env.TELEGRAM_THREAD_ID,
    signal: controller.signal
  });
  const retry = new RetryExecutor({ signal: controller.signal, logger });
  const machine = new SessionMachine({
    channel: env.TWITCH_CHANNEL,
    checksPerUpdate: checksPerUpdate(env.UPDATE_INTERVAL_MINUTES, env.CHECK_INTERVAL_SECONDS),
    locale,
    source,
    notifier,
    retry,
    logger
  });

  const statusServer = env.STATUS_PORT ? buildStatusServer(() => machine.current) : null;
  if (statusServer && env.STATUS_PORT) {
    await statusServer.listen({ port: env.STATUS_PORT, host: '0.0.0.0' });
    logger.info({ port: env.STATUS_PORT }, 'status server listening');
  }

  try {
    await runMonitor({
      channel: env.TWITCH_CHANNEL,
      checkIntervalMs: env.CHECK_INTERVAL_SECONDS * 1000,
      source,
      machine,
      signal: controller.signal,
      logger,
      simulateEndPath: env.SIMULATE_END_PATH
    });
  } finally {
    await statusServer?.close();
  }
};

bootstrap().catch((error) => {
  pino({ name: 'herald-bot' }).error(error, 'Failed to start monitor');
  process.exit(1);
});
