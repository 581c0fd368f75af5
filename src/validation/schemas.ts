import { z } from 'zod';
import { ValidationError, ErrorCode } from '../core/errors/index.js';
import {
  SCHEMA_VARIANTS,
  TASK_STATUSES,
  USER_ROLES,
} from '../core/database/store-types.js';
import {
  formatSqlTimestamp,
  parseTimestamp,
} from '../analytics/utils/timestamps.js';

// ============================================================
// QUERY ARGUMENT SCHEMAS
// ============================================================

/**
 * Window sizes and row limits. These end up in SQL, so only a bounded
 * positive integer gets through.
 */
export const MAX_ANALYTICS_VALUE = 100000;

export const PositiveIntSchema = z
  .number()
  .int('Must be an integer')
  .positive('Must be positive')
  .max(MAX_ANALYTICS_VALUE, 'Too large');

/** Row ids as typed on a command line. */
export const EntityIdSchema = z.coerce
  .number()
  .int('Must be an integer')
  .positive('Must be positive');

export const SchemaVariantSchema = z.enum(SCHEMA_VARIANTS);

// ============================================================
// USER SCHEMAS
// ============================================================

const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .email('Invalid email format')
  .max(255, 'Email too long');

export const UserRoleSchema = z.enum(USER_ROLES);

/**
 * User creation schema
 */
export const NewUserSchema = z.object({
  username: z.string().trim().min(1, 'Username is required').max(64),
  password: z.string().min(4, 'Password too short').max(256),
  role: UserRoleSchema.default('worker'),
  email: EmailSchema.optional(),
  phone: z
    .string()
    .trim()
    .regex(/^[0-9+()\-\s]{3,32}$/, 'Invalid phone number')
    .optional(),
  profilePic: z.string().trim().max(255).optional(),
});

// ============================================================
// TASK SCHEMAS
// ============================================================

export const TaskStatusSchema = z.enum(TASK_STATUSES);

/**
 * Deadline accepted in any format parseTimestamp understands,
 * stored normalized as `YYYY-MM-DD HH:MM:SS` (UTC).
 */
const DeadlineSchema = z
  .string()
  .trim()
  .transform((raw, ctx) => {
    const parsed = parseTimestamp(raw);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unrecognized deadline: ${raw}`,
      });
      return z.NEVER;
    }
    return formatSqlTimestamp(parsed);
  });

/**
 * Task creation schema
 */
export const NewTaskSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(200),
  description: z.string().max(5000).optional(),
  machineId: z.string().trim().max(100).optional(),
  area: z.string().max(100).optional(),
  deadline: DeadlineSchema.nullable().optional(),
  assignedTo: z.number().int().positive().nullable().optional(),
  status: TaskStatusSchema.default('Pending'),
});

export const StatusUpdateSchema = z.object({
  taskId: z.number().int().positive(),
  status: TaskStatusSchema,
});

// ============================================================
// CONFIGURATION FILE SCHEMA
// ============================================================

export const ConfigFileSchema = z.object({
  version: z.string().optional(),
  database: z
    .object({
      path: z.string().min(1).optional(),
      // checked against the known variants after load
      schema: z.string().optional(),
      busy_timeout_ms: z.number().int().nonnegative().optional(),
    })
    .optional(),
  analytics: z
    .object({
      upcoming_days: z.number().optional(),
      throughput_days: z.number().optional(),
      leaderboard_limit: z.number().optional(),
      bottleneck_top_n: z.number().optional(),
    })
    .optional(),
});

// ============================================================
// HELPERS
// ============================================================

/**
 * Parse `value` or throw a ValidationError naming every issue.
 */
export function validateInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    );
    throw new ValidationError(
      `Invalid ${label}: ${issues.join('; ')}`,
      ErrorCode.INVALID_INPUT,
      { label, issues }
    );
  }
  return result.data;
}

// ============================================================
// TYPE EXPORTS
// ============================================================

export type NewUserInput = z.input<typeof NewUserSchema>;
export type NewUser = z.output<typeof NewUserSchema>;
export type NewTaskInput = z.input<typeof NewTaskSchema>;
export type NewTask = z.output<typeof NewTaskSchema>;
export type StatusUpdate = z.infer<typeof StatusUpdateSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;
