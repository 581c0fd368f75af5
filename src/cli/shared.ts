/**
 * Helpers shared by the workorder CLI commands
 */

import chalk from 'chalk';
import { ConfigManager } from '../core/config/config-manager.js';
import { WorkOrderStore } from '../core/database/workorder-store.js';
import { getErrorMessage, isWorkOrderError } from '../core/errors/index.js';
import { logger } from '../core/monitoring/logger.js';

export interface CliContext {
  config: ConfigManager;
  store: WorkOrderStore;
}

export interface ContextOptions {
  /** Allow a config file that did not load cleanly (inspection commands). */
  lenient?: boolean;
}

/** Builds a fresh context per command so each run rereads the config. */
export type ContextFactory = (options?: ContextOptions) => CliContext;

export function contextFactory(getConfigPath: () => string | undefined): ContextFactory {
  return (options = {}) => {
    const config = new ConfigManager(getConfigPath());
    if (!options.lenient) {
      config.ensureLoaded();
    }
    const store = new WorkOrderStore({
      dbPath: config.getDatabasePath(),
      busyTimeout: config.getConfig().database.busy_timeout_ms,
    });
    return { config, store };
  };
}

/**
 * Returns false (after telling the user) when the database file is missing.
 */
export function requireDatabase(store: WorkOrderStore): boolean {
  if (store.exists()) return true;
  console.error(
    chalk.red(`❌ No database at ${store.getPath()}. Run "workorder init" first.`)
  );
  process.exitCode = 1;
  return false;
}

export function reportFailure(action: string, error: unknown): void {
  if (!isWorkOrderError(error)) {
    logger.error(`${action} failed`, error instanceof Error ? error : undefined);
  }
  console.error(chalk.red(`❌ ${getErrorMessage(error)}`));
  process.exitCode = 1;
}
