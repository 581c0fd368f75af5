/**
 * Database initialization command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ContextFactory, reportFailure } from '../shared.js';
import { SchemaVariantSchema, validateInput } from '../../validation/schemas.js';

interface InitOptions {
  reset?: boolean;
  seed?: boolean;
  schema?: string;
}

export function createInitCommand(getContext: ContextFactory): Command {
  return new Command('init')
    .description('Create the work-order database')
    .option('--reset', 'Delete the existing database first')
    .option('--seed', 'Create the default admin account')
    .option('--schema <variant>', 'Schema variant (extended, minimal)')
    .action((options: InitOptions) => {
      try {
        const { config, store } = getContext();
        const variant = validateInput(
          SchemaVariantSchema,
          options.schema ?? config.getConfig().database.schema,
          'schema variant'
        );

        const { seeded } = store.initialize({
          variant,
          reset: options.reset ?? false,
          seedAdmin: options.seed ?? false,
        });

        console.log(chalk.green(`✅ Database ready at ${store.getPath()} (${variant} schema)`));
        if (seeded) {
          console.log(chalk.yellow('⚠️  Default admin created (admin / admin); change its password'));
        }
      } catch (error) {
        reportFailure('init', error);
      }
    });
}
