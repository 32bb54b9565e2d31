// MARK: - Main Bot Entry Point
// Discord bot initialization, scheduler wiring and event handling

import 'dotenv/config';
import { Client, Events, GatewayIntentBits, MessageFlags, PermissionFlagsBits, REST, Routes } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import mongoose from 'mongoose';
import { ZodError } from 'zod';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { ADMIN_COMMANDS, commands, getCommandHandler } from './commands';
import type { CommandServices } from './commands';
import { createHealthApp, startHealthServer } from './health';
import type { HealthServer } from './health';
import { Dispatcher } from './services/Dispatcher';
import { DiscordDeliverySink } from './services/DiscordDeliverySink';
import { ErrorNotifier } from './services/ErrorNotifier';
import { ScheduleRegistry } from './services/ScheduleRegistry';
import { SchedulerContext } from './services/SchedulerContext';
import { MongoSchedulerStore } from './store/MongoSchedulerStore';
import { errorMessage, errorStack } from './utils/errors';
import { logger, setLogLevel } from './utils/logger';
import { replyWithCommandError } from './utils/interactionReplies';
import { assertValidTimezone } from './utils/timezone';

// MARK: - Configuration
function readConfig(): AppConfig {
  try {
    const config = loadConfig();
    assertValidTimezone(config.defaultTimezone);
    return config;
  } catch (error) {
    logger.error('Invalid configuration', {
      error: errorMessage(error),
      issues: error instanceof ZodError ? error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) : undefined,
    });
    process.exit(1);
  }
}

const config = readConfig();
setLogLevel(config.logLevel);

// MARK: - Discord Client Setup
const client = new Client({
  intents: [GatewayIntentBits.Guilds],
});

// MARK: - Scheduler Setup
const store = new MongoSchedulerStore();
const context = new SchedulerContext({ store, defaultTimezone: config.defaultTimezone });
const registry = new ScheduleRegistry(context);
const dispatcher = new Dispatcher(context, new DiscordDeliverySink(client), {
  intervalMs: config.dispatchIntervalMs,
  batchLimit: config.dispatchBatchLimit,
  failureReporter: new ErrorNotifier(client),
});
const services: CommandServices = { registry };
let healthServer: HealthServer | null = null;

// MARK: - MongoDB Connection
async function connectMongoDB(): Promise<void> {
  const maxRetries = 5;
  let retries = 0;

  while (retries < maxRetries) {
    try {
      await mongoose.connect(config.mongoUri, {
        maxPoolSize: 10,
        minPoolSize: 2,
        serverSelectionTimeoutMS: 5000,
      });
      logger.info('MongoDB connected successfully');
      return;
    } catch (error) {
      retries++;
      logger.error(`MongoDB connection attempt ${retries} failed`, {
        error: errorMessage(error),
        retries,
        maxRetries,
      });

      if (retries >= maxRetries) {
        throw new Error('Failed to connect to MongoDB after maximum retries');
      }

      // Exponential backoff
      const delay = Math.min(1000 * Math.pow(2, retries), 10000);
      logger.info(`Retrying MongoDB connection in ${delay}ms...`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

mongoose.connection.on('connected', () => {
  logger.info('Mongoose connected to MongoDB');
});

mongoose.connection.on('error', (error: Error) => {
  logger.error('Mongoose connection error', { error: error.message });
});

mongoose.connection.on('disconnected', () => {
  logger.warn('Mongoose disconnected from MongoDB');
});

async function registerCommands(): Promise<void> {
  const rest = new REST({ version: '10' }).setToken(config.discordToken);
  const route = config.discordGuildId
    ? Routes.applicationGuildCommands(config.discordClientId, config.discordGuildId)
    : Routes.applicationCommands(config.discordClientId);

  await rest.put(route, { body: commands });
  logger.info(`✓ Registered ${commands.length} slash commands`, {
    scope: config.discordGuildId ? 'guild' : 'global',
  });
}

// MARK: - Event: Client Ready
client.once(Events.ClientReady, async readyClient => {
  logger.info(`Bot logged in as: ${readyClient.user.tag}`);
  logger.info(`Guilds: ${readyClient.guilds.cache.size}`);

  try {
    await context.init();
    logger.info('✓ SchedulerContext initialized');

    await registerCommands();

    dispatcher.start();
    logger.info('✓ Dispatcher started');

    healthServer = await startHealthServer(
      createHealthApp({ client, dispatcher, store }),
      config.port,
      !config.portExplicit,
    );
    logger.info('✓ Health server started');
  } catch (error) {
    logger.error('Failed to initialize bot services', {
      error: errorMessage(error),
      stack: errorStack(error),
    });
    process.exit(1);
  }
});

// MARK: - Event: Interaction Create
client.on(Events.InteractionCreate, async interaction => {
  if (!interaction.isChatInputCommand()) {
    return;
  }

  const commandName = interaction.commandName;
  const handler = getCommandHandler(commandName);

  if (!handler) {
    logger.warn('Unknown command', { commandName });
    await rejectInteraction(interaction, '❌ Unknown command.');
    return;
  }

  if (ADMIN_COMMANDS.has(commandName)) {
    const isOwnerOverride = config.ownerIds.includes(interaction.user.id);
    if (!isOwnerOverride && !interaction.memberPermissions?.has(PermissionFlagsBits.Administrator)) {
      await rejectInteraction(interaction, '❌ You need Administrator permissions to use this command.');
      return;
    }
  }

  try {
    logger.info('Command executed', {
      commandName,
      userId: interaction.user.id,
      guildId: interaction.guildId,
    });

    await handler(interaction, services);
  } catch (error) {
    await replyWithCommandError(interaction, commandName, error);
  }
});

async function rejectInteraction(interaction: ChatInputCommandInteraction, content: string): Promise<void> {
  try {
    await interaction.reply({ content, flags: MessageFlags.Ephemeral });
  } catch (error) {
    logger.error('Failed to reply to interaction', {
      commandName: interaction.commandName,
      guildId: interaction.guildId,
      error: errorMessage(error),
    });
  }
}

// MARK: - Event: Guild Delete
client.on(Events.GuildDelete, async guild => {
  try {
    const paused = await registry.removeTenant(guild.id);
    logger.info('Left guild, schedules paused', { guildId: guild.id, paused });
  } catch (error) {
    logger.error('Failed to retain tenant after guild removal', {
      guildId: guild.id,
      error: errorMessage(error),
    });
  }
});

// MARK: - Graceful Shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  try {
    await dispatcher.stop();
    logger.info('✓ Dispatcher stopped');

    await context.teardown();

    await client.destroy();
    logger.info('✓ Discord client destroyed');

    await mongoose.connection.close();
    logger.info('✓ MongoDB connection closed');

    if (healthServer) {
      await healthServer.stop();
      logger.info('✓ Health server stopped');
    }

    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', {
      error: errorMessage(error),
      stack: errorStack(error),
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

// MARK: - Uncaught Exception Handler
process.on('uncaughtException', error => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', {
    reason: errorMessage(reason),
    stack: errorStack(reason),
  });
  process.exit(1);
});

// MARK: - Start Bot
async function start(): Promise<void> {
  try {
    logger.info('Starting Discord Ping Scheduler...');

    await connectMongoDB();
    await client.login(config.discordToken);
  } catch (error) {
    logger.error('Failed to start bot', {
      error: errorMessage(error),
      stack: errorStack(error),
    });
    process.exit(1);
  }
}

void start();
