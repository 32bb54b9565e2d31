// MARK: - Configuration
// Environment parsing and validation for the bot process

import { z } from 'zod';

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform(value => (value && value.trim() ? Number.parseInt(value, 10) : fallback));

const configSchema = z.object({
  discordToken: z.string().min(1, 'DISCORD_TOKEN is required'),
  discordClientId: z.string().min(1, 'DISCORD_CLIENT_ID is required'),
  discordGuildId: z
    .string()
    .optional()
    .transform(value => (value && value.trim() ? value.trim() : undefined)),
  mongoUri: z.string().min(1, 'MONGODB_URI is required'),
  port: intFromEnv(3000).pipe(z.number().int().min(0).max(65535)),
  portExplicit: z.boolean(),
  dispatchIntervalMs: intFromEnv(15_000).pipe(z.number().int().min(5_000).max(60_000)),
  dispatchBatchLimit: intFromEnv(50).pipe(z.number().int().min(1).max(500)),
  defaultTimezone: z.string().default('UTC'),
  ownerIds: z
    .string()
    .optional()
    .transform(value =>
      (value ?? '')
        .split(',')
        .map(id => id.trim())
        .filter(id => id.length > 0),
    ),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Builds the validated configuration from an environment map.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return configSchema.parse({
    discordToken: env.DISCORD_TOKEN,
    discordClientId: env.DISCORD_CLIENT_ID,
    discordGuildId: env.DISCORD_GUILD_ID,
    mongoUri: env.MONGODB_URI,
    port: env.PORT,
    portExplicit: Boolean(env.PORT && env.PORT.trim()),
    dispatchIntervalMs: env.DISPATCH_INTERVAL_MS,
    dispatchBatchLimit: env.DISPATCH_BATCH_LIMIT,
    defaultTimezone: env.DEFAULT_TIMEZONE || undefined,
    ownerIds: env.DISCORD_OWNER_IDS,
    logLevel: env.LOG_LEVEL || undefined,
  });
}
