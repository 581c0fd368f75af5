/**
 * Configuration Manager
 * Handles loading, validation, and persistence of the YAML configuration
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import {
  AnalyticsConfig,
  DEFAULT_CONFIG,
  WorkOrderConfig,
} from './types.js';
import { logger } from '../monitoring/logger.js';
import {
  ConfigFile,
  ConfigFileSchema,
  MAX_ANALYTICS_VALUE,
  PositiveIntSchema,
  SchemaVariantSchema,
} from '../../validation/schemas.js';
import { SCHEMA_VARIANTS } from '../database/store-types.js';
import { ErrorCode, ValidationError, getErrorMessage } from '../errors/index.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export class ConfigManager {
  private config: WorkOrderConfig;
  private configPath: string;
  private loadErrors: string[] = [];

  constructor(configPath?: string) {
    this.configPath =
      configPath || path.join(process.cwd(), '.workorder', 'config.yaml');
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults. Problems are kept for
   * validate() instead of being thrown.
   */
  private loadConfig(): WorkOrderConfig {
    let loaded: ConfigFile = {};
    try {
      if (fs.existsSync(this.configPath)) {
        const content = fs.readFileSync(this.configPath, 'utf-8');
        const parsed = ConfigFileSchema.safeParse(yaml.load(content) ?? {});
        if (parsed.success) {
          loaded = parsed.data;
        } else {
          this.loadErrors.push(
            ...parsed.error.issues.map((issue) =>
              issue.path.length > 0
                ? `${issue.path.join('.')}: ${issue.message}`
                : issue.message
            )
          );
        }
      }
    } catch (error) {
      this.loadErrors.push(`Cannot read config: ${getErrorMessage(error)}`);
    }

    const config = this.mergeWithDefaults(loaded);
    if (this.loadErrors.length > 0) {
      logger.warn(`Invalid config in ${this.configPath}`, {
        errors: this.loadErrors,
      });
    }
    return config;
  }

  private mergeWithDefaults(loaded: ConfigFile): WorkOrderConfig {
    const { schema, ...database }: NonNullable<ConfigFile['database']> =
      loaded.database ?? {};

    let variant = DEFAULT_CONFIG.database.schema;
    if (schema !== undefined) {
      const known = SchemaVariantSchema.safeParse(schema);
      if (known.success) {
        variant = known.data;
      } else {
        this.loadErrors.push(
          `database.schema must be one of ${SCHEMA_VARIANTS.join(', ')} (current: ${schema})`
        );
      }
    }

    return {
      version: loaded.version || DEFAULT_CONFIG.version,
      database: { ...DEFAULT_CONFIG.database, ...database, schema: variant },
      analytics: { ...DEFAULT_CONFIG.analytics, ...loaded.analytics },
    };
  }

  /**
   * Validate configuration
   */
  validate(): ValidationResult {
    const result: ValidationResult = {
      valid: true,
      errors: [...this.loadErrors],
      warnings: [],
    };

    Object.entries(this.config.analytics).forEach(([key, value]) => {
      if (!PositiveIntSchema.safeParse(value).success) {
        result.errors.push(
          `analytics.${key} must be an integer from 1 to ${MAX_ANALYTICS_VALUE} (current: ${value})`
        );
      }
    });
    result.valid = result.errors.length === 0;

    const { upcoming_days, throughput_days } = this.config.analytics;
    if (upcoming_days > 365) {
      result.warnings.push('analytics.upcoming_days > 365 covers more than a year');
    }
    if (throughput_days > 365) {
      result.warnings.push(
        'analytics.throughput_days > 365 covers more than a year'
      );
    }

    return result;
  }

  getLoadErrors(): string[] {
    return [...this.loadErrors];
  }

  /**
   * Throws when the file could not be loaded as written, so callers never
   * run against defaults that silently replaced it.
   */
  ensureLoaded(): void {
    if (this.loadErrors.length > 0) {
      throw new ValidationError(
        `Invalid configuration in ${this.configPath}: ${this.loadErrors.join('; ')}`,
        ErrorCode.CONFIGURATION_ERROR,
        { configPath: this.configPath, errors: this.loadErrors }
      );
    }
  }

  /**
   * Save configuration to file
   */
  save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const content = yaml.dump(this.config, {
      indent: 2,
      lineWidth: 120,
      noRefs: true,
    });

    fs.writeFileSync(this.configPath, content, 'utf-8');
  }

  getConfig(): WorkOrderConfig {
    return {
      ...this.config,
      database: { ...this.config.database },
      analytics: { ...this.config.analytics },
    };
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Absolute path of the SQLite database file
   */
  getDatabasePath(): string {
    return path.resolve(process.cwd(), this.config.database.path);
  }

  updateAnalytics(analytics: Partial<AnalyticsConfig>): void {
    this.config.analytics = { ...this.config.analytics, ...analytics };
  }
}
