import type { StoreCapabilities } from '../../core/database/store-types.js';

export interface StatusCounts {
  pending: number;
  in_progress: number;
  done: number;
}

/** One calendar day (`YYYY-MM-DD`) and the tasks completed on it. */
export interface ThroughputPoint {
  date: string;
  count: number;
}

export interface LabelCount {
  label: string;
  count: number;
}

export interface HeatmapData {
  byArea: LabelCount[];
  byMachine: LabelCount[];
}

export interface LeaderboardEntry {
  workerName: string;
  tasksDone: number;
  /** 0 when the schema has no `created_at`. */
  avgDaysToComplete: number;
}

export interface AreaCount {
  area: string;
  count: number;
}

export interface DashboardArguments {
  upcomingDays: number;
  throughputDays: number;
  leaderboardLimit: number;
  bottleneckTopN: number;
}

export interface DashboardState {
  statusCounts: StatusCounts;
  overdueCount: number;
  upcomingCount: number;
  cycleTimeAvg: number;
  onTimePercentage: number;
  throughput: ThroughputPoint[];
  heatmap: HeatmapData;
  leaderboard: LeaderboardEntry[];
  bottlenecks: AreaCount[];
  capabilities: StoreCapabilities;
  arguments: DashboardArguments;
  generatedAt: Date;
}
