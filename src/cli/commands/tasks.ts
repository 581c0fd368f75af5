/**
 * Task commands for the workorder CLI
 */

import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { ContextFactory, reportFailure, requireDatabase } from '../shared.js';
import {
  EntityIdSchema,
  TaskStatusSchema,
  validateInput,
} from '../../validation/schemas.js';
import type { TaskFilter } from '../../core/database/store-types.js';

interface AddTaskOptions {
  description?: string;
  machine?: string;
  area?: string;
  deadline?: string;
  assign?: string;
}

interface ListTaskOptions {
  status?: string;
  assigned?: string;
}

const statusIcon: Record<string, string> = {
  Pending: '⏳',
  'In Progress': '🔄',
  Done: '✅',
  Deleted: '🗑️',
};

export function createTaskCommands(getContext: ContextFactory): Command {
  const tasks = new Command('task').alias('tasks').description('Manage work-order tasks');

  tasks
    .command('add <title>')
    .description('Create a task')
    .option('-d, --description <text>', 'Task description')
    .option('-m, --machine <id>', 'Machine identifier')
    .option('-a, --area <area>', 'Plant area')
    .option('--deadline <when>', 'Deadline (YYYY-MM-DD or ISO-8601)')
    .option('--assign <userId>', 'Assign to a user id')
    .action((title: string, options: AddTaskOptions) => {
      try {
        const { store } = getContext();
        if (!requireDatabase(store)) return;

        const assignedTo =
          options.assign === undefined
            ? undefined
            : validateInput(EntityIdSchema, options.assign, 'assignee id');
        const id = store.createTask({
          title,
          description: options.description,
          machineId: options.machine,
          area: options.area,
          deadline: options.deadline,
          assignedTo,
        });

        const task = store.getTask(id);
        console.log(chalk.green(`✅ Created task #${id}: ${task?.title ?? title}`));
        if (task?.deadline) {
          console.log(`   Deadline: ${task.deadline}`);
        }
      } catch (error) {
        reportFailure('task add', error);
      }
    });

  tasks
    .command('status <id> <status>')
    .description('Change a task status (Pending, "In Progress", Done, Deleted)')
    .action((rawId: string, rawStatus: string) => {
      try {
        const { store } = getContext();
        if (!requireDatabase(store)) return;

        const id = validateInput(EntityIdSchema, rawId, 'task id');
        const status = validateInput(TaskStatusSchema, rawStatus, 'status');
        const task = store.updateTaskStatus(id, status);

        console.log(`${statusIcon[status]} Task #${task.id} is now ${status}`);
        if (task.completed_at) {
          console.log(`   Completed at: ${task.completed_at}`);
        }
      } catch (error) {
        reportFailure('task status', error);
      }
    });

  tasks
    .command('list')
    .alias('ls')
    .description('List tasks')
    .option('-s, --status <status>', 'Filter by status')
    .option('--assigned <userId>', 'Filter by assignee id')
    .action((options: ListTaskOptions) => {
      try {
        const { store } = getContext();
        if (!requireDatabase(store)) return;

        const filter: TaskFilter = {};
        if (options.status !== undefined) {
          filter.status = validateInput(TaskStatusSchema, options.status, 'status');
        }
        if (options.assigned !== undefined) {
          filter.assignedTo = validateInput(EntityIdSchema, options.assigned, 'assignee id');
        }

        const rows = store.listTasks(filter);
        if (rows.length === 0) {
          console.log('📝 No tasks found');
          return;
        }

        const table = new Table({
          head: ['ID', 'Status', 'Title', 'Area', 'Machine', 'Deadline', 'Assignee'],
          style: { head: ['cyan'] },
        });
        for (const row of rows) {
          const status = row.status ?? '-';
          table.push([
            row.id,
            `${statusIcon[status] ?? '⚪'} ${status}`,
            row.title ?? '-',
            row.area || '-',
            row.machine_id || '-',
            row.deadline ?? '-',
            row.assigned_to ?? '-',
          ]);
        }

        console.log(`\n📋 Tasks (${rows.length})\n`);
        console.log(table.toString());
      } catch (error) {
        reportFailure('task list', error);
      }
    });

  return tasks;
}
