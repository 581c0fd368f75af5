/**
 * Configuration types for the work-order system
 */

import type { SchemaVariant } from '../database/store-types.js';

export interface DatabaseConfig {
  path: string; // relative paths resolve against the working directory
  schema: SchemaVariant;
  busy_timeout_ms: number;
}

export interface AnalyticsConfig {
  upcoming_days: number;
  throughput_days: number;
  leaderboard_limit: number;
  bottleneck_top_n: number;
}

export interface WorkOrderConfig {
  version: string;
  database: DatabaseConfig;
  analytics: AnalyticsConfig;
}

export const DEFAULT_ANALYTICS: AnalyticsConfig = {
  upcoming_days: 3,
  throughput_days: 7,
  leaderboard_limit: 5,
  bottleneck_top_n: 3,
};

export const DEFAULT_CONFIG: WorkOrderConfig = {
  version: '1.0',
  database: {
    path: 'database/workorders.db',
    schema: 'extended',
    busy_timeout_ms: 5000,
  },
  analytics: DEFAULT_ANALYTICS,
};
