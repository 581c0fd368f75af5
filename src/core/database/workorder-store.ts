/**
 * Work-order store
 * SQLite-backed users and tasks, with per-call connections and a
 * schema capability probe for the minimal and extended deployments
 */

import Database from 'better-sqlite3';
import * as bcrypt from 'bcryptjs';
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../monitoring/logger.js';
import {
  DatabaseError,
  ErrorCode,
  TaskError,
  UserError,
  ValidationError,
  WorkOrderError,
  getErrorMessage,
} from '../errors/index.js';
import { schemaSql } from './schema.js';
import {
  Clock,
  ColumnInfoRow,
  CompletionField,
  CountResult,
  InitializeOptions,
  KnownTable,
  RemoveWorkerResult,
  StoreCapabilities,
  TaskFilter,
  TaskRow,
  TaskStatus,
  UserRow,
  isKnownTable,
  systemClock,
} from './store-types.js';
import {
  NewTaskInput,
  NewTaskSchema,
  NewUserInput,
  NewUserSchema,
  StatusUpdateSchema,
  validateInput,
} from '../../validation/schemas.js';
import { formatSqlTimestamp } from '../../analytics/utils/timestamps.js';

export interface WorkOrderStoreConfig {
  dbPath: string;
  busyTimeout?: number;
  clock?: Clock;
}

interface ConnectionOptions {
  operation: string;
  readonly?: boolean;
  code?: ErrorCode;
  context?: Record<string, unknown>;
}

const BCRYPT_ROUNDS = 10;
const DEFAULT_ADMIN = { username: 'admin', password: 'admin', email: 'admin@example.com' };

export function pickCompletionField(
  caps: Pick<StoreCapabilities, 'hasCompletedAt'>
): CompletionField {
  return caps.hasCompletedAt ? 'completed_at' : 'deadline';
}

export class WorkOrderStore {
  private readonly dbPath: string;
  private readonly busyTimeout: number;
  private readonly clock: Clock;
  private capabilities: StoreCapabilities | null = null;

  constructor(config: WorkOrderStoreConfig) {
    this.dbPath = config.dbPath;
    this.busyTimeout = config.busyTimeout ?? 5000;
    this.clock = config.clock ?? systemClock;
  }

  getPath(): string {
    return this.dbPath;
  }

  exists(): boolean {
    return fs.existsSync(this.dbPath);
  }

  // ============================================================
  // CONNECTIONS
  // ============================================================

  private open(readonly: boolean): Database.Database {
    try {
      const db = new Database(this.dbPath, {
        readonly,
        fileMustExist: readonly,
        timeout: this.busyTimeout,
      });
      if (!readonly) {
        db.pragma('foreign_keys = ON');
      }
      return db;
    } catch (error) {
      throw new DatabaseError(
        `Failed to open work-order database: ${getErrorMessage(error)}`,
        ErrorCode.DB_CONNECTION_FAILED,
        { dbPath: this.dbPath },
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Run `fn` on a fresh connection that is closed before returning,
   * whether `fn` succeeds or throws.
   */
  withConnection<T>(
    options: ConnectionOptions,
    fn: (db: Database.Database) => T
  ): T {
    const db = this.open(options.readonly ?? false);
    try {
      return fn(db);
    } catch (error) {
      if (error instanceof WorkOrderError) throw error;
      const cause = error instanceof Error ? error : undefined;
      logger.error(`Store operation failed: ${options.operation}`, cause, {
        dbPath: this.dbPath,
        ...options.context,
      });
      throw new DatabaseError(
        `${options.operation} failed: ${getErrorMessage(error)}`,
        options.code ?? ErrorCode.DB_QUERY_FAILED,
        { operation: options.operation, ...options.context },
        cause
      );
    } finally {
      db.close();
    }
  }

  /**
   * Read-only connection scoped to one call.
   */
  read<T>(operation: string, fn: (db: Database.Database) => T): T {
    return this.withConnection({ operation, readonly: true }, fn);
  }

  // ============================================================
  // SCHEMA
  // ============================================================

  /**
   * Create the schema, optionally wiping the file first and seeding
   * a default admin. Returns whether an admin was seeded.
   */
  initialize(options: InitializeOptions = {}): { seeded: boolean } {
    const variant = options.variant ?? 'extended';

    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    if (options.reset && fs.existsSync(this.dbPath)) {
      fs.rmSync(this.dbPath);
      logger.info('Removed existing database', { dbPath: this.dbPath });
    }

    const seeded = this.withConnection(
      {
        operation: 'initialize',
        code: ErrorCode.DB_SCHEMA_ERROR,
        context: { variant },
      },
      (db) => {
        db.exec(schemaSql(variant));
        return options.seedAdmin ? this.seedAdmin(db) : false;
      }
    );

    this.capabilities = null;
    logger.info('Work-order database initialized', {
      dbPath: this.dbPath,
      variant,
      seeded,
    });
    return { seeded };
  }

  private seedAdmin(db: Database.Database): boolean {
    const admins = db
      .prepare<[], CountResult>(
        "SELECT COUNT(*) AS count FROM users WHERE role = 'admin'"
      )
      .get();
    if (admins && admins.count > 0) return false;

    db.prepare(
      `INSERT INTO users (username, password, role, email)
       VALUES (?, ?, 'admin', ?)`
    ).run(
      DEFAULT_ADMIN.username,
      bcrypt.hashSync(DEFAULT_ADMIN.password, BCRYPT_ROUNDS),
      DEFAULT_ADMIN.email
    );
    logger.warn('Seeded default admin account; change its password', {
      username: DEFAULT_ADMIN.username,
    });
    return true;
  }

  private static columnsOf(db: Database.Database, table: KnownTable): Set<string> {
    const rows = db
      .prepare<[], ColumnInfoRow>(`PRAGMA table_info(${table})`)
      .all();
    return new Set(rows.map((row) => row.name));
  }

  /**
   * Live check against the deployed table, never a cached answer.
   */
  hasColumn(table: string, column: string): boolean {
    if (!isKnownTable(table)) {
      throw new ValidationError(`Unknown table: ${table}`, ErrorCode.INVALID_INPUT, {
        table,
      });
    }
    return this.read('hasColumn', (db) =>
      WorkOrderStore.columnsOf(db, table).has(column)
    );
  }

  /**
   * Optional task columns, probed on first use and cached for the
   * lifetime of this store.
   */
  getCapabilities(): StoreCapabilities {
    if (this.capabilities) return this.capabilities;

    const columns = this.read('getCapabilities', (db) =>
      WorkOrderStore.columnsOf(db, 'tasks')
    );
    const hasCompletedAt = columns.has('completed_at');
    const capabilities: StoreCapabilities = Object.freeze({
      hasCreatedAt: columns.has('created_at'),
      hasCompletedAt,
      hasUpdatedAt: columns.has('updated_at'),
      completionField: pickCompletionField({ hasCompletedAt }),
    });

    logger.debug('Probed task schema capabilities', { ...capabilities });
    this.capabilities = capabilities;
    return capabilities;
  }

  refreshCapabilities(): StoreCapabilities {
    this.capabilities = null;
    return this.getCapabilities();
  }

  // ============================================================
  // USERS
  // ============================================================

  createUser(input: NewUserInput): number {
    const user = validateInput(NewUserSchema, input, 'user');

    return this.withConnection(
      {
        operation: 'createUser',
        code: ErrorCode.DB_INSERT_FAILED,
        context: { username: user.username },
      },
      (db) => {
        const existing = db
          .prepare<[string], { id: number }>('SELECT id FROM users WHERE username = ?')
          .get(user.username);
        if (existing) {
          throw new UserError(
            `Username already taken: ${user.username}`,
            ErrorCode.USER_DUPLICATE,
            { username: user.username }
          );
        }

        const result = db
          .prepare(
            `INSERT INTO users (username, password, role, email, phone, profile_pic)
             VALUES (@username, @password, @role, @email, @phone, @profilePic)`
          )
          .run({
            username: user.username,
            password: bcrypt.hashSync(user.password, BCRYPT_ROUNDS),
            role: user.role,
            email: user.email ?? null,
            phone: user.phone ?? null,
            profilePic: user.profilePic ?? null,
          });
        return Number(result.lastInsertRowid);
      }
    );
  }

  getUser(userId: number): UserRow | undefined {
    return this.read('getUser', (db) =>
      db
        .prepare<[number], UserRow>(
          'SELECT id, username, role, email, phone, profile_pic FROM users WHERE id = ?'
        )
        .get(userId)
    );
  }

  /**
   * Remove a worker: unfinished tasks go with them, finished ones stay
   * with `assigned_to` cleared so history survives.
   */
  removeWorker(userId: number): RemoveWorkerResult {
    return this.withConnection(
      {
        operation: 'removeWorker',
        code: ErrorCode.DB_DELETE_FAILED,
        context: { userId },
      },
      (db) => {
        const remove = db.transaction((id: number): RemoveWorkerResult => {
          const user = db
            .prepare<[number], Pick<UserRow, 'username' | 'role'>>(
              'SELECT username, role FROM users WHERE id = ?'
            )
            .get(id);
          if (!user) {
            throw new UserError(`Worker not found: ${id}`, ErrorCode.USER_NOT_FOUND, {
              userId: id,
            });
          }
          if (user.role !== 'worker') {
            throw new UserError(
              `User ${user.username} is not a worker`,
              ErrorCode.USER_INVALID_ROLE,
              { userId: id, role: user.role }
            );
          }

          db.prepare(
            `DELETE FROM messages WHERE task_id IN (
               SELECT id FROM tasks WHERE assigned_to = ? AND status IS NOT 'Done'
             )`
          ).run(id);
          const deleted = db
            .prepare("DELETE FROM tasks WHERE assigned_to = ? AND status IS NOT 'Done'")
            .run(id);
          const detached = db
            .prepare(
              "UPDATE tasks SET assigned_to = NULL WHERE assigned_to = ? AND status = 'Done'"
            )
            .run(id);
          db.prepare('UPDATE completed_tasks SET worker_id = NULL WHERE worker_id = ?').run(id);
          db.prepare('DELETE FROM users WHERE id = ?').run(id);

          return {
            username: user.username,
            deletedTasks: deleted.changes,
            detachedTasks: detached.changes,
          };
        });

        const result = remove(userId);
        logger.info('Removed worker', { userId, ...result });
        return result;
      }
    );
  }

  // ============================================================
  // TASKS
  // ============================================================

  createTask(input: NewTaskInput): number {
    const task = validateInput(NewTaskSchema, input, 'task');
    const caps = this.getCapabilities();
    const now = this.clock();

    return this.withConnection(
      {
        operation: 'createTask',
        code: ErrorCode.DB_INSERT_FAILED,
        context: { title: task.title },
      },
      (db) => {
        const insert = db.transaction((): number => {
          if (task.assignedTo != null) {
            const assignee = db
              .prepare<[number], { id: number }>('SELECT id FROM users WHERE id = ?')
              .get(task.assignedTo);
            if (!assignee) {
              throw new UserError(
                `Assignee not found: ${task.assignedTo}`,
                ErrorCode.USER_NOT_FOUND,
                { assignedTo: task.assignedTo }
              );
            }
          }

          const columns = [
            'title',
            'description',
            'machine_id',
            'area',
            'deadline',
            'assigned_to',
            'status',
          ];
          const values: Record<string, string | number | null> = {
            title: task.title,
            description: task.description ?? null,
            machine_id: task.machineId ?? null,
            area: task.area ?? null,
            deadline: task.deadline ?? null,
            assigned_to: task.assignedTo ?? null,
            status: task.status,
          };
          const stamp = formatSqlTimestamp(now);
          if (caps.hasCreatedAt) {
            columns.push('created_at');
            values.created_at = stamp;
          }
          if (caps.hasUpdatedAt) {
            columns.push('updated_at');
            values.updated_at = stamp;
          }

          const result = db
            .prepare<Record<string, string | number | null>>(
              `INSERT INTO tasks (${columns.join(', ')})
               VALUES (${columns.map((column) => `@${column}`).join(', ')})`
            )
            .run(values);
          const taskId = Number(result.lastInsertRowid);

          if (task.status === 'Done') {
            this.recordCompletion(db, caps, taskId, now);
          }
          return taskId;
        });

        return insert();
      }
    );
  }

  getTask(taskId: number): TaskRow | undefined {
    return this.read('getTask', (db) =>
      db.prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(taskId)
    );
  }

  listTasks(filter: TaskFilter = {}): TaskRow[] {
    const conditions: string[] = ['1=1'];
    const params: Record<string, string | number> = {};

    if (filter.status) {
      conditions.push('status = @status');
      params.status = filter.status;
    }
    if (filter.assignedTo !== undefined) {
      conditions.push('assigned_to = @assignedTo');
      params.assignedTo = filter.assignedTo;
    }

    return this.read('listTasks', (db) =>
      db
        .prepare<Record<string, string | number>, TaskRow>(
          `SELECT * FROM tasks WHERE ${conditions.join(' AND ')} ORDER BY id`
        )
        .all(params)
    );
  }

  /**
   * Change a task's status. Entering Done stamps `completed_at` (where the
   * column exists) and archives a completion record once; leaving Done
   * clears the stamp.
   */
  updateTaskStatus(
    taskId: number,
    status: TaskStatus,
    now: Date = this.clock()
  ): TaskRow {
    const update = validateInput(StatusUpdateSchema, { taskId, status }, 'status update');
    const caps = this.getCapabilities();

    return this.withConnection(
      {
        operation: 'updateTaskStatus',
        code: ErrorCode.DB_UPDATE_FAILED,
        context: { taskId, status },
      },
      (db) => {
        const apply = db.transaction((): TaskRow => {
          const existing = db
            .prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?')
            .get(update.taskId);
          if (!existing) {
            throw new TaskError(`Task not found: ${update.taskId}`, ErrorCode.TASK_NOT_FOUND, {
              taskId: update.taskId,
              status: update.status,
              operation: 'updateTaskStatus',
            });
          }

          const sets = ['status = @status'];
          if (caps.hasUpdatedAt) sets.push('updated_at = @now');
          if (caps.hasCompletedAt && existing.status === 'Done' && update.status !== 'Done') {
            sets.push('completed_at = NULL');
          }
          db.prepare(`UPDATE tasks SET ${sets.join(', ')} WHERE id = @id`).run({
            id: update.taskId,
            status: update.status,
            ...(caps.hasUpdatedAt ? { now: formatSqlTimestamp(now) } : {}),
          });

          if (update.status === 'Done' && existing.status !== 'Done') {
            this.recordCompletion(db, caps, update.taskId, now);
          }

          const updated = db
            .prepare<[number], TaskRow>('SELECT * FROM tasks WHERE id = ?')
            .get(update.taskId);
          if (!updated) {
            throw new TaskError(`Task vanished during update: ${update.taskId}`, ErrorCode.TASK_NOT_FOUND, {
              taskId: update.taskId,
            });
          }
          return updated;
        });

        const updated = apply();
        logger.debug('Task status updated', { taskId, status });
        return updated;
      }
    );
  }

  private recordCompletion(
    db: Database.Database,
    caps: StoreCapabilities,
    taskId: number,
    now: Date
  ): void {
    const completedAt = formatSqlTimestamp(now);
    if (caps.hasCompletedAt) {
      db.prepare('UPDATE tasks SET completed_at = ? WHERE id = ?').run(completedAt, taskId);
    }
    db.prepare(
      `INSERT OR IGNORE INTO completed_tasks
         (task_id, title, description, machine_id, area, deadline, worker_id, completed_at)
       SELECT id, title, description, machine_id, area, deadline, assigned_to, ?
       FROM tasks WHERE id = ?`
    ).run(completedAt, taskId);
  }

  countCompletionRecords(): number {
    return this.read('countCompletionRecords', (db) => {
      const row = db
        .prepare<[], CountResult>('SELECT COUNT(*) AS count FROM completed_tasks')
        .get();
      return row?.count ?? 0;
    });
  }
}
