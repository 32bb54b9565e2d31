import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../src/config';

const required = {
  DISCORD_TOKEN: 'test-token',
  DISCORD_CLIENT_ID: 'client-1',
  MONGODB_URI: 'mongodb://localhost:27017/test',
};

describe('loadConfig', () => {
  it('applies defaults for optional settings', () => {
    expect(loadConfig(required)).toEqual({
      discordToken: 'test-token',
      discordClientId: 'client-1',
      discordGuildId: undefined,
      mongoUri: 'mongodb://localhost:27017/test',
      port: 3000,
      portExplicit: false,
      dispatchIntervalMs: 15_000,
      dispatchBatchLimit: 50,
      defaultTimezone: 'UTC',
      ownerIds: [],
      logLevel: 'info',
    });
  });

  it('reads explicit overrides', () => {
    const config = loadConfig({
      ...required,
      DISCORD_GUILD_ID: ' guild-1 ',
      PORT: '8080',
      DISPATCH_INTERVAL_MS: '30000',
      DISPATCH_BATCH_LIMIT: '10',
      DEFAULT_TIMEZONE: 'Europe/Berlin',
      DISCORD_OWNER_IDS: ' owner-1, ,owner-2 ',
      LOG_LEVEL: 'debug',
    });

    expect(config.discordGuildId).toBe('guild-1');
    expect(config.port).toBe(8080);
    expect(config.portExplicit).toBe(true);
    expect(config.dispatchIntervalMs).toBe(30_000);
    expect(config.dispatchBatchLimit).toBe(10);
    expect(config.defaultTimezone).toBe('Europe/Berlin');
    expect(config.ownerIds).toEqual(['owner-1', 'owner-2']);
    expect(config.logLevel).toBe('debug');
  });

  it('rejects missing credentials', () => {
    expect(() => loadConfig({ MONGODB_URI: required.MONGODB_URI })).toThrow(ZodError);
  });

  it('bounds the dispatch cadence', () => {
    expect(() => loadConfig({ ...required, DISPATCH_INTERVAL_MS: '1000' })).toThrow(ZodError);
    expect(() => loadConfig({ ...required, DISPATCH_INTERVAL_MS: '120000' })).toThrow(ZodError);
    expect(() => loadConfig({ ...required, DISPATCH_BATCH_LIMIT: 'lots' })).toThrow(ZodError);
  });

  it('rejects unknown log levels', () => {
    expect(() => loadConfig({ ...required, LOG_LEVEL: 'verbose' })).toThrow(ZodError);
  });
});
