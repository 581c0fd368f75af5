#!/usr/bin/env node
/**
 * workorder CLI
 * Command-line interface for the work-order store and dashboard
 */

import { createProgram } from './program.js';
import { logger } from '../core/monitoring/logger.js';

// Only parse when running as main module (not when imported for testing)
const isMainModule =
  import.meta.url === `file://${process.argv[1]}` ||
  process.argv[1]?.endsWith('/workorder') ||
  process.argv[1]?.endsWith('cli/index.ts');

if (isMainModule) {
  createProgram()
    .parseAsync()
    .catch((error: unknown) => {
      logger.error('CLI failed', error instanceof Error ? error : undefined);
      process.exitCode = 1;
    });
}
