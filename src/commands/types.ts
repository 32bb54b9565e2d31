// MARK: - Command Types
// Handler signature shared by every slash command module

import type { ChatInputCommandInteraction } from 'discord.js';
import type { ScheduleRegistry } from '../services/ScheduleRegistry';

export interface CommandServices {
  registry: ScheduleRegistry;
}

export type CommandHandler = (
  interaction: ChatInputCommandInteraction,
  services: CommandServices,
) => Promise<void>;
