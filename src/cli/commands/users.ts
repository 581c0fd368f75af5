/**
 * User and worker management commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ContextFactory, reportFailure, requireDatabase } from '../shared.js';
import { EntityIdSchema, UserRoleSchema, validateInput } from '../../validation/schemas.js';

interface AddUserOptions {
  password: string;
  role?: string;
  email?: string;
  phone?: string;
}

export function createUserCommands(getContext: ContextFactory): Command {
  const users = new Command('user').alias('users').description('Manage user accounts');

  users
    .command('add <username>')
    .description('Create a user account')
    .requiredOption('-p, --password <password>', 'Initial password')
    .option('-r, --role <role>', 'Role (admin, worker)', 'worker')
    .option('-e, --email <email>', 'Email address')
    .option('--phone <phone>', 'Phone number')
    .action((username: string, options: AddUserOptions) => {
      try {
        const { store } = getContext();
        if (!requireDatabase(store)) return;

        const role = validateInput(UserRoleSchema, options.role ?? 'worker', 'role');
        const id = store.createUser({
          username,
          password: options.password,
          role,
          email: options.email,
          phone: options.phone,
        });
        console.log(chalk.green(`✅ Created ${role} #${id}: ${username.trim()}`));
      } catch (error) {
        reportFailure('user add', error);
      }
    });

  return users;
}

export function createWorkerCommands(getContext: ContextFactory): Command {
  const workers = new Command('worker').alias('workers').description('Manage workers');

  workers
    .command('remove <id>')
    .alias('rm')
    .description('Remove a worker, deleting their unfinished tasks')
    .action((rawId: string) => {
      try {
        const { store } = getContext();
        if (!requireDatabase(store)) return;

        const id = validateInput(EntityIdSchema, rawId, 'worker id');
        const result = store.removeWorker(id);
        console.log(chalk.green(`🗑️  Removed worker ${result.username}`));
        console.log(`   Unfinished tasks deleted: ${result.deletedTasks}`);
        console.log(`   Finished tasks unassigned: ${result.detachedTasks}`);
      } catch (error) {
        reportFailure('worker remove', error);
      }
    });

  return workers;
}
