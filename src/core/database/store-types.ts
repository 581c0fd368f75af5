/**
 * Work-order store types
 * Row shapes, domain enums and the schema capability descriptor
 */

export const SCHEMA_VARIANTS = ['minimal', 'extended'] as const;
export type SchemaVariant = (typeof SCHEMA_VARIANTS)[number];

export const USER_ROLES = ['admin', 'worker'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const TASK_STATUSES = ['Pending', 'In Progress', 'Done', 'Deleted'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

/** Tables the store owns; anything else is rejected by the schema probe. */
export const KNOWN_TABLES = [
  'users',
  'tasks',
  'completed_tasks',
  'messages',
  'audit_logs',
] as const;
export type KnownTable = (typeof KNOWN_TABLES)[number];

export function isKnownTable(table: string): table is KnownTable {
  return (KNOWN_TABLES as readonly string[]).includes(table);
}

export type CompletionField = 'completed_at' | 'deadline';

/** Source of "now"; injected so time-based metrics are reproducible. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Which optional task columns the deployed schema exposes.
 * Probed once per store and threaded into every aggregator.
 */
export interface StoreCapabilities {
  readonly hasCreatedAt: boolean;
  readonly hasCompletedAt: boolean;
  readonly hasUpdatedAt: boolean;
  /** `completed_at` when present, otherwise `deadline` as a stand-in. */
  readonly completionField: CompletionField;
}

export interface UserRow {
  id: number;
  username: string;
  role: string;
  email: string | null;
  phone: string | null;
  profile_pic: string | null;
}

export interface TaskRow {
  id: number;
  title: string | null;
  description: string | null;
  machine_id: string | null;
  area: string | null;
  deadline: string | null;
  assigned_to: number | null;
  status: string | null;
  created_at?: string | null;
  completed_at?: string | null;
}

export interface CountResult {
  count: number;
}

export interface ColumnInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

export interface TaskFilter {
  status?: TaskStatus;
  assignedTo?: number;
}

export interface RemoveWorkerResult {
  username: string;
  deletedTasks: number;
  detachedTasks: number;
}

export interface InitializeOptions {
  variant?: SchemaVariant;
  reset?: boolean;
  seedAdmin?: boolean;
}
