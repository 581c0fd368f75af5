/**
 * Command tree for the workorder CLI
 */

import { Command } from 'commander';
import { contextFactory } from './shared.js';
import { createInitCommand } from './commands/init.js';
import { createAnalyticsCommand } from './commands/analytics.js';
import { createTaskCommands } from './commands/tasks.js';
import { createUserCommands, createWorkerCommands } from './commands/users.js';
import { createConfigCommand } from './commands/config.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('workorder')
    .description('Maintenance work orders and their dashboard metrics')
    .version(VERSION)
    .option('-c, --config <path>', 'Config file (default: .workorder/config.yaml)');

  const getContext = contextFactory(() => program.opts<{ config?: string }>().config);

  program.addCommand(createInitCommand(getContext));
  program.addCommand(createAnalyticsCommand(getContext));
  program.addCommand(createTaskCommands(getContext));
  program.addCommand(createUserCommands(getContext));
  program.addCommand(createWorkerCommands(getContext));
  program.addCommand(createConfigCommand(getContext));

  return program;
}
