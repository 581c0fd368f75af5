import type { SchemaVariant } from './store-types.js';

/**
 * Schema without task timestamps, as early deployments created it.
 */
const MINIMAL_SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    password TEXT NOT NULL,
    role TEXT NOT NULL,
    email TEXT,
    phone TEXT,
    profile_pic TEXT
  );

  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT,
    description TEXT,
    machine_id TEXT,
    area TEXT,
    deadline TEXT,
    assigned_to INTEGER,
    status TEXT,
    FOREIGN KEY (assigned_to) REFERENCES users (id)
  );

  CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    sender TEXT,
    message TEXT,
    timestamp TEXT,
    task_id INTEGER,
    FOREIGN KEY (task_id) REFERENCES tasks (id)
  );

  CREATE TABLE IF NOT EXISTS completed_tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER UNIQUE,
    title TEXT,
    description TEXT,
    machine_id TEXT,
    area TEXT,
    deadline TEXT,
    worker_id INTEGER,
    completed_at TEXT DEFAULT CURRENT_TIMESTAMP
  );
`;

/**
 * Schema with creation/completion timestamps, constraints and indexes.
 */
const EXTENDED_SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    password TEXT NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('admin', 'worker')),
    phone TEXT,
    email TEXT UNIQUE,
    profile_pic TEXT,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT,
    machine_id TEXT,
    area TEXT,
    deadline DATETIME,
    assigned_to INTEGER,
    status TEXT NOT NULL DEFAULT 'Pending'
      CHECK (status IN ('Pending', 'In Progress', 'Done', 'Deleted')),
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    completed_at DATETIME,
    FOREIGN KEY (assigned_to) REFERENCES users (id) ON DELETE SET NULL
  );

  CREATE TABLE IF NOT EXISTS completed_tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER UNIQUE,
    title TEXT,
    description TEXT,
    machine_id TEXT,
    area TEXT,
    deadline DATETIME,
    worker_id INTEGER,
    proof_file TEXT,
    completed_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (worker_id) REFERENCES users (id) ON DELETE SET NULL,
    FOREIGN KEY (task_id) REFERENCES tasks (id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id INTEGER NOT NULL,
    sender_id INTEGER NOT NULL,
    message TEXT NOT NULL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (task_id) REFERENCES tasks (id) ON DELETE CASCADE,
    FOREIGN KEY (sender_id) REFERENCES users (id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS audit_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER,
    action TEXT,
    entity_type TEXT,
    entity_id INTEGER,
    old_value TEXT,
    new_value TEXT,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (user_id) REFERENCES users (id) ON DELETE SET NULL
  );

  CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks (status);
  CREATE INDEX IF NOT EXISTS idx_tasks_assigned_to ON tasks (assigned_to);
  CREATE INDEX IF NOT EXISTS idx_tasks_deadline ON tasks (deadline);
  CREATE INDEX IF NOT EXISTS idx_tasks_completed_at ON tasks (completed_at);
  CREATE INDEX IF NOT EXISTS idx_tasks_area ON tasks (area);
  CREATE INDEX IF NOT EXISTS idx_messages_task_id ON messages (task_id);
`;

export function schemaSql(variant: SchemaVariant): string {
  return variant === 'extended' ? EXTENDED_SCHEMA : MINIMAL_SCHEMA;
}
