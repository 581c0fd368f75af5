/**
 * Config command for the workorder CLI
 */

import { Command } from 'commander';
import * as yaml from 'js-yaml';
import chalk from 'chalk';
import { ContextFactory } from '../shared.js';

export function createConfigCommand(getContext: ContextFactory): Command {
  const config = new Command('config').description('Inspect workorder configuration');

  config
    .command('show')
    .description('Print the effective configuration')
    .action(() => {
      const { config: manager } = getContext({ lenient: true });
      console.log(chalk.gray(`# ${manager.getConfigPath()}`));
      console.log(yaml.dump(manager.getConfig(), { indent: 2, lineWidth: 120, noRefs: true }));
      console.log(chalk.gray(`# database file: ${manager.getDatabasePath()}`));
    });

  config
    .command('validate')
    .description('Validate the configuration file')
    .action(() => {
      console.log(chalk.blue('🔍 Validating configuration...'));
      const { config: manager } = getContext({ lenient: true });
      const result = manager.validate();

      if (result.errors.length > 0) {
        console.log(chalk.red('\n✗ Errors:'));
        result.errors.forEach((error) => {
          console.log(chalk.red(`  • ${error}`));
        });
      }

      if (result.warnings.length > 0) {
        console.log(chalk.yellow('\n⚠ Warnings:'));
        result.warnings.forEach((warning) => {
          console.log(chalk.yellow(`  • ${warning}`));
        });
      }

      if (result.valid) {
        console.log(chalk.green('\n✅ Configuration is valid'));
      } else {
        console.log(chalk.red('\n❌ Configuration has errors'));
        process.exitCode = 1;
      }
    });

  return config;
}
