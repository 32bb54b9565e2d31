// MARK: - Commands Index
// Export command builders and handlers

import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import * as help from './help';
import * as pings from './pings';
import * as remind from './remind';
import * as reminderTemplate from './reminderTemplate';
import * as serverConfig from './serverConfig';
import type { CommandHandler } from './types';

export type { CommandHandler, CommandServices } from './types';

// Commands that require Administrator (or a configured owner id)
export const ADMIN_COMMANDS: ReadonlySet<string> = new Set(['pings', 'remind', 'reminder-template', 'server-config']);

// Export commands array for deployment
export const commands: RESTPostAPIChatInputApplicationCommandsJSONBody[] = [
  pings.data.toJSON(),
  remind.data.toJSON(),
  reminderTemplate.data.toJSON(),
  serverConfig.data.toJSON(),
  help.data.toJSON(),
];

// Export handlers map for execution
export const handlers = new Map<string, CommandHandler>([
  ['pings', pings.execute],
  ['remind', remind.execute],
  ['reminder-template', reminderTemplate.execute],
  ['server-config', serverConfig.execute],
  ['help', help.execute],
]);

export function getCommandHandler(commandName: string): CommandHandler | undefined {
  return handlers.get(commandName);
}
