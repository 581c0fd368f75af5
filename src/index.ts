/**
 * Work-order hub
 * Task/user store and dashboard analytics for maintenance work orders
 */

export * from './analytics/index.js';
export {
  WorkOrderStore,
  pickCompletionField,
  type WorkOrderStoreConfig,
} from './core/database/workorder-store.js';
export * from './core/database/store-types.js';
export { ConfigManager, type ValidationResult } from './core/config/config-manager.js';
export * from './core/config/types.js';
export * from './core/errors/index.js';
export { logger, Logger, LogLevel } from './core/monitoring/logger.js';
export {
  NewTaskSchema,
  NewUserSchema,
  PositiveIntSchema,
  validateInput,
  type NewTaskInput,
  type NewUserInput,
} from './validation/schemas.js';
