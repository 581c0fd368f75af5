/**
 * Tests for the workorder CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createProgram } from '../program.js';
import { WorkOrderStore } from '../../core/database/workorder-store.js';
import { logger, LogLevel } from '../../core/monitoring/logger.js';

describe('workorder CLI', () => {
  let dir: string;
  let dbPath: string;
  let configPath: string;
  let log: MockInstance<typeof console.log>;
  let errorLog: MockInstance<typeof console.error>;
  const initialLevel = logger.getLevel();

  const run = async (...args: string[]): Promise<void> => {
    await createProgram().parseAsync(['node', 'workorder', '-c', configPath, ...args]);
  };

  const printed = (): string[] => log.mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    chalk.level = 0;
    // Store progress messages would otherwise interleave with command output
    logger.setLevel(LogLevel.WARN);
    dir = mkdtempSync(join(tmpdir(), 'workorder-cli-'));
    dbPath = join(dir, 'data', 'workorders.db');
    configPath = join(dir, 'config.yaml');
    writeFileSync(configPath, `database:\n  path: ${dbPath}\n  schema: extended\n`);

    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
    logger.setLevel(initialLevel);
    vi.restoreAllMocks();
  });

  describe('init', () => {
    it('creates the configured database', async () => {
      await run('init');

      expect(printed()).toContain(`✅ Database ready at ${dbPath} (extended schema)`);
      expect(new WorkOrderStore({ dbPath }).getCapabilities().hasCompletedAt).toBe(true);
    });

    it('honors --schema and --seed', async () => {
      await run('init', '--schema', 'minimal', '--seed');

      expect(printed()).toEqual([
        `✅ Database ready at ${dbPath} (minimal schema)`,
        '⚠️  Default admin created (admin / admin); change its password',
      ]);
      expect(new WorkOrderStore({ dbPath }).getCapabilities().completionField).toBe('deadline');
    });

    it('rejects an unknown schema variant', async () => {
      await run('init', '--schema', 'huge');

      expect(process.exitCode).toBe(1);
      expect(String(errorLog.mock.calls[0][0])).toMatch(/^❌ Invalid schema variant: /);
    });
  });

  describe('tasks and users', () => {
    beforeEach(async () => {
      await run('init');
      log.mockClear();
    });

    it('creates a worker and an assigned task', async () => {
      await run('user', 'add', 'kim', '--password', 'test-secret');
      await run(
        'task', 'add', 'Replace seal',
        '--area', 'Press',
        '--assign', '1',
        '--deadline', '2024-02-01'
      );

      expect(printed()).toEqual([
        '✅ Created worker #1: kim',
        '✅ Created task #1: Replace seal',
        '   Deadline: 2024-02-01 00:00:00',
      ]);
      const task = new WorkOrderStore({ dbPath }).getTask(1);
      expect(task).toMatchObject({ area: 'Press', assigned_to: 1, status: 'Pending' });
    });

    it('moves a task to Done and archives it', async () => {
      await run('task', 'add', 'Tighten bolts');
      log.mockClear();

      await run('task', 'status', '1', 'Done');

      expect(printed()[0]).toBe('✅ Task #1 is now Done');
      const store = new WorkOrderStore({ dbPath });
      expect(store.getTask(1)?.status).toBe('Done');
      expect(store.countCompletionRecords()).toBe(1);
    });

    it('reports unknown statuses without touching the task', async () => {
      await run('task', 'add', 'Tighten bolts');
      await run('task', 'status', '1', 'Archived');

      expect(process.exitCode).toBe(1);
      expect(String(errorLog.mock.calls[0][0])).toMatch(/^❌ Invalid status: /);
      expect(new WorkOrderStore({ dbPath }).getTask(1)?.status).toBe('Pending');
    });

    it('reports missing tasks', async () => {
      await run('task', 'status', '9', 'Done');

      expect(process.exitCode).toBe(1);
      expect(errorLog).toHaveBeenCalledWith('❌ Task not found: 9');
    });

    it('removes a worker with their open tasks', async () => {
      await run('user', 'add', 'lee', '--password', 'test-secret');
      await run('task', 'add', 'Open job', '--assign', '1');
      log.mockClear();

      await run('worker', 'remove', '1');

      expect(printed()).toEqual([
        '🗑️  Removed worker lee',
        '   Unfinished tasks deleted: 1',
        '   Finished tasks unassigned: 0',
      ]);
      expect(new WorkOrderStore({ dbPath }).listTasks()).toEqual([]);
    });

    it('prints an empty listing', async () => {
      await run('task', 'list', '--status', 'Done');
      expect(printed()).toEqual(['📝 No tasks found']);
    });
  });

  describe('analytics', () => {
    it('requires an initialized database', async () => {
      await run('analytics');

      expect(process.exitCode).toBe(1);
      expect(printed()).toEqual([]);
      expect(errorLog).toHaveBeenCalledWith(
        `❌ No database at ${dbPath}. Run "workorder init" first.`
      );
    });

    it('prints the dashboard state as JSON', async () => {
      await run('init');
      await run('task', 'add', 'Check pressure');
      await run('task', 'add', 'Swap nozzle');
      await run('task', 'status', '2', 'In Progress');
      log.mockClear();

      await run('analytics', '--json', '--limit', '2');

      const state = JSON.parse(printed()[0]);
      expect(state.statusCounts).toEqual({ pending: 1, in_progress: 1, done: 0 });
      expect(state.arguments).toEqual({
        upcomingDays: 3,
        throughputDays: 7,
        leaderboardLimit: 2,
        bottleneckTopN: 3,
      });
      expect(state.capabilities.completionField).toBe('completed_at');
    });

    it('rejects a non-numeric override', async () => {
      await run('init');
      await run('analytics', '--top', 'many');

      expect(process.exitCode).toBe(1);
      expect(String(errorLog.mock.calls[0][0])).toMatch(/^❌ Invalid topN: /);
    });
  });

  describe('config', () => {
    it('flags invalid analytics settings', async () => {
      writeFileSync(configPath, 'analytics:\n  upcoming_days: 0\n');

      await run('config', 'validate');

      expect(process.exitCode).toBe(1);
      expect(printed()).toContain(
        '  • analytics.upcoming_days must be an integer from 1 to 100000 (current: 0)'
      );
    });

    it('flags a misspelled schema variant and keeps the database path', async () => {
      writeFileSync(configPath, `database:\n  path: ${dbPath}\n  schema: extnded\n`);

      await run('config', 'validate');

      expect(process.exitCode).toBe(1);
      expect(printed()).toContain(
        '  • database.schema must be one of minimal, extended (current: extnded)'
      );

      log.mockClear();
      await run('config', 'show');
      expect(printed()[2]).toBe(`# database file: ${dbPath}`);
    });

    it('refuses store commands while the config file is invalid', async () => {
      await run('init');
      writeFileSync(configPath, `database:\n  path: ${dbPath}\n  schema: extnded\n`);

      await run('task', 'list');

      expect(process.exitCode).toBe(1);
      expect(errorLog).toHaveBeenCalledWith(
        `❌ Invalid configuration in ${configPath}: ` +
          'database.schema must be one of minimal, extended (current: extnded)'
      );
    });

    it('shows the effective configuration', async () => {
      await run('config', 'show');

      const lines = printed();
      expect(lines[0]).toBe(`# ${configPath}`);
      expect(lines[1]).toContain(`path: ${dbPath}`);
      expect(lines[2]).toBe(`# database file: ${dbPath}`);
    });
  });
});
