import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  TWITCH_CHANNEL: z
    .string()
    .min(1)
    .transform((value) => value.trim().toLowerCase()),
  TWITCH_CLIENT_ID: z.string().min(1),
  TWITCH_CLIENT_SECRET: z.string().min(1),
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_CHAT_ID: z.coerce.number().int(),
  TELEGRAM_THREAD_ID: positiveInt.optional(),
  CHECK_INTERVAL_SECONDS: positiveInt.default(60),
  UPDATE_INTERVAL_MINUTES: positiveInt.default(5),
  LANGUAGE: z.enum(['en', 'ru']).default('ru').catch('en'),
  SIMULATE_END_PATH: z.string().min(1).default('simulate_end'),
  STATUS_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type AppEnv = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): AppEnv {
  return envSchema.parse(source);
}
