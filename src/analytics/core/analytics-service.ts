import { MetricsQueries } from '../queries/metrics-queries.js';
import { WorkOrderStore } from '../../core/database/workorder-store.js';
import { Clock, systemClock } from '../../core/database/store-types.js';
import { ConfigManager } from '../../core/config/config-manager.js';
import { AnalyticsConfig, DEFAULT_ANALYTICS } from '../../core/config/types.js';
import { logger } from '../../core/monitoring/logger.js';
import {
  AreaCount,
  DashboardArguments,
  DashboardState,
  HeatmapData,
  LeaderboardEntry,
  StatusCounts,
  ThroughputPoint,
} from '../types/metrics.js';

export interface AnalyticsServiceOptions {
  clock?: Clock;
  analytics?: AnalyticsConfig;
}

export class AnalyticsService {
  private readonly store: WorkOrderStore;
  private readonly clock: Clock;
  private readonly analytics: AnalyticsConfig;

  constructor(store: WorkOrderStore, options: AnalyticsServiceOptions = {}) {
    this.store = store;
    this.clock = options.clock ?? systemClock;
    this.analytics = options.analytics ?? DEFAULT_ANALYTICS;
  }

  static fromConfig(configManager: ConfigManager, clock?: Clock): AnalyticsService {
    configManager.ensureLoaded();
    const config = configManager.getConfig();
    const store = new WorkOrderStore({
      dbPath: configManager.getDatabasePath(),
      busyTimeout: config.database.busy_timeout_ms,
      clock,
    });
    return new AnalyticsService(store, { clock, analytics: config.analytics });
  }

  getStore(): WorkOrderStore {
    return this.store;
  }

  // One evaluation instant per call, shared by every metric it computes
  private queriesAt(now: Date): MetricsQueries {
    return new MetricsQueries(this.store, {
      clock: () => now,
      capabilities: this.store.getCapabilities(),
    });
  }

  private queries(): MetricsQueries {
    return this.queriesAt(this.clock());
  }

  getStatusCounts(): StatusCounts {
    return this.queries().getStatusCounts();
  }

  getOverdueCount(): number {
    return this.queries().getOverdueCount();
  }

  getUpcomingCount(windowDays = this.analytics.upcoming_days): number {
    return this.queries().getUpcomingCount(windowDays);
  }

  getTaskThroughput(windowDays = this.analytics.throughput_days): ThroughputPoint[] {
    return this.queries().getTaskThroughput(windowDays);
  }

  getHeatmapData(): HeatmapData {
    return this.queries().getHeatmapData();
  }

  getLeaderboard(limit = this.analytics.leaderboard_limit): LeaderboardEntry[] {
    return this.queries().getLeaderboard(limit);
  }

  getCycleTimeAvg(): number {
    return this.queries().getCycleTimeAvg();
  }

  getOnTimePercentage(): number {
    return this.queries().getOnTimePercentage();
  }

  getBottleneckTopAreas(topN = this.analytics.bottleneck_top_n): AreaCount[] {
    return this.queries().getBottleneckTopAreas(topN);
  }

  /**
   * Every dashboard metric, computed against a single instant.
   */
  getDashboardState(overrides: Partial<DashboardArguments> = {}): DashboardState {
    const args: DashboardArguments = {
      upcomingDays: overrides.upcomingDays ?? this.analytics.upcoming_days,
      throughputDays: overrides.throughputDays ?? this.analytics.throughput_days,
      leaderboardLimit: overrides.leaderboardLimit ?? this.analytics.leaderboard_limit,
      bottleneckTopN: overrides.bottleneckTopN ?? this.analytics.bottleneck_top_n,
    };

    const started = Date.now();
    const generatedAt = this.clock();
    const queries = this.queriesAt(generatedAt);

    const state: DashboardState = {
      statusCounts: queries.getStatusCounts(),
      overdueCount: queries.getOverdueCount(),
      upcomingCount: queries.getUpcomingCount(args.upcomingDays),
      cycleTimeAvg: queries.getCycleTimeAvg(),
      onTimePercentage: queries.getOnTimePercentage(),
      throughput: queries.getTaskThroughput(args.throughputDays),
      heatmap: queries.getHeatmapData(),
      leaderboard: queries.getLeaderboard(args.leaderboardLimit),
      bottlenecks: queries.getBottleneckTopAreas(args.bottleneckTopN),
      capabilities: this.store.getCapabilities(),
      arguments: args,
      generatedAt,
    };

    logger.debug('Dashboard state assembled', {
      durationMs: Date.now() - started,
      completionField: state.capabilities.completionField,
    });
    return state;
  }
}
