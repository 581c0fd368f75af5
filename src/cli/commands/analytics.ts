/**
 * Dashboard command
 */

import { Command } from 'commander';
import { AnalyticsService } from '../../analytics/core/analytics-service.js';
import type { DashboardArguments } from '../../analytics/types/metrics.js';
import { ContextFactory, reportFailure, requireDatabase } from '../shared.js';
import { renderDashboard } from '../dashboard-view.js';

interface AnalyticsOptions {
  json?: boolean;
  upcoming?: number;
  throughput?: number;
  limit?: number;
  top?: number;
}

// Range checks are left to the service
const toNumber = (value: string): number => Number(value);

export function createAnalyticsCommand(getContext: ContextFactory): Command {
  return new Command('analytics')
    .alias('dashboard')
    .description('Show the work-order dashboard')
    .option('--json', 'Print the raw dashboard state as JSON')
    .option('--upcoming <days>', 'Upcoming-deadline window in days', toNumber)
    .option('--throughput <days>', 'Throughput window in days', toNumber)
    .option('--limit <n>', 'Leaderboard size', toNumber)
    .option('--top <n>', 'Number of bottleneck areas', toNumber)
    .action((options: AnalyticsOptions) => {
      try {
        const { config, store } = getContext();
        if (!requireDatabase(store)) return;

        const service = new AnalyticsService(store, {
          analytics: config.getConfig().analytics,
        });
        const overrides: Partial<DashboardArguments> = {
          upcomingDays: options.upcoming,
          throughputDays: options.throughput,
          leaderboardLimit: options.limit,
          bottleneckTopN: options.top,
        };
        const state = service.getDashboardState(overrides);

        console.log(options.json ? JSON.stringify(state, null, 2) : renderDashboard(state));
      } catch (error) {
        reportFailure('analytics', error);
      }
    });
}
