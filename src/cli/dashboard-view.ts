import chalk from 'chalk';
import Table from 'cli-table3';
import type {
  DashboardState,
  LabelCount,
  ThroughputPoint,
} from '../analytics/types/metrics.js';

const RULE = '─'.repeat(50);
const BAR_WIDTH = 20;

function bar(value: number, max: number): string {
  if (max <= 0 || value <= 0) return '';
  return '█'.repeat(Math.max(1, Math.round((value / max) * BAR_WIDTH)));
}

function throughputLines(points: ThroughputPoint[]): string[] {
  if (points.length === 0) return ['  No completions in this window'];
  const max = Math.max(...points.map((point) => point.count));
  return points.map(
    (point) => `  ${point.date} ${bar(point.count, max)} ${point.count}`
  );
}

function labelTable(title: string, rows: LabelCount[]): string {
  const table = new Table({ head: [title, 'Tasks'], style: { head: ['cyan'] } });
  for (const row of rows) {
    table.push([row.label, row.count]);
  }
  return table.toString();
}

/**
 * Text rendering of a dashboard state, one string ready for stdout.
 */
export function renderDashboard(state: DashboardState): string {
  const { statusCounts, arguments: args } = state;
  const lines: string[] = [];

  lines.push(chalk.bold.cyan('\n📊 Work-Order Dashboard\n'));
  lines.push(chalk.gray(RULE));

  lines.push(chalk.bold.white('\n📈 Key Metrics\n'));
  const metrics: Array<[string, string | number]> = [
    ['Pending', chalk.yellow(statusCounts.pending)],
    ['In Progress', chalk.blue(statusCounts.in_progress)],
    ['Done', chalk.green(statusCounts.done)],
    ['Overdue', chalk.red(state.overdueCount)],
    [`Due in ${args.upcomingDays}d`, state.upcomingCount],
    ['Avg Cycle Time', `${state.cycleTimeAvg.toFixed(2)} days`],
    ['On-Time Rate', `${state.onTimePercentage.toFixed(2)}%`],
  ];
  for (const [label, value] of metrics) {
    lines.push(`  ${chalk.gray(label.padEnd(20))} ${value}`);
  }

  lines.push(chalk.bold.white(`\n📉 Throughput (last ${args.throughputDays} days)\n`));
  lines.push(...throughputLines(state.throughput));

  if (state.heatmap.byArea.length > 0) {
    lines.push(chalk.bold.white('\n🗺️  Tasks by Area\n'));
    lines.push(labelTable('Area', state.heatmap.byArea));
    lines.push(chalk.bold.white('\n⚙️  Tasks by Machine\n'));
    lines.push(labelTable('Machine', state.heatmap.byMachine));
  }

  if (state.leaderboard.length > 0) {
    lines.push(chalk.bold.white('\n🏆 Leaderboard\n'));
    const table = new Table({
      head: ['#', 'Worker', 'Done', 'Avg Days'],
      style: { head: ['cyan'] },
    });
    state.leaderboard.forEach((entry, i) => {
      table.push([i + 1, entry.workerName, entry.tasksDone, entry.avgDaysToComplete.toFixed(2)]);
    });
    lines.push(table.toString());
  }

  if (state.bottlenecks.length > 0) {
    lines.push(chalk.bold.white('\n🚧 Bottleneck Areas\n'));
    for (const item of state.bottlenecks) {
      lines.push(`  ${item.area.padEnd(20)} ${item.count} open`);
    }
  }

  lines.push(chalk.gray(`\n${RULE}`));
  const source =
    state.capabilities.completionField === 'completed_at'
      ? 'completion timestamps'
      : 'deadlines (no completion timestamps in this schema)';
  lines.push(chalk.gray(`Completion dates from ${source}`));
  lines.push(chalk.gray(`Generated at ${state.generatedAt.toISOString()}`));

  return lines.join('\n');
}
