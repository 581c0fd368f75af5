import type { WorkOrderStore } from '../../core/database/workorder-store.js';
import {
  Clock,
  CountResult,
  StoreCapabilities,
  systemClock,
} from '../../core/database/store-types.js';
import { PositiveIntSchema, validateInput } from '../../validation/schemas.js';
import {
  daysBetween,
  formatSqlTimestamp,
  parseTimestamp,
  roundTo,
} from '../utils/timestamps.js';
import {
  AreaCount,
  HeatmapData,
  LabelCount,
  LeaderboardEntry,
  StatusCounts,
  ThroughputPoint,
} from '../types/metrics.js';

export interface MetricsQueriesOptions {
  clock?: Clock;
  /** Defaults to the store's own cached probe. */
  capabilities?: StoreCapabilities;
}

interface StatusCountsRow {
  pending: number | null;
  in_progress: number | null;
  done: number | null;
}

interface LabelCountRow {
  label: string | null;
  count: number;
}

interface CompletionRow {
  workerName: string | null;
  createdAt: string | null;
  doneAt: string | null;
}

interface DeadlineRow {
  deadline: string | null;
  doneAt: string | null;
}

interface CycleRow {
  createdAt: string | null;
  doneAt: string | null;
}

interface WorkerTally {
  workerName: string | null;
  tasksDone: number;
  totalDays: number;
  samples: number;
}

const UNSPECIFIED = 'Unspecified';
const UNKNOWN_WORKER = 'Unknown';

/**
 * Read-only dashboard metrics over the tasks/users tables. Every method
 * opens its own connection through the store and never writes.
 */
export class MetricsQueries {
  private readonly store: WorkOrderStore;
  private readonly clock: Clock;
  private readonly capabilities?: StoreCapabilities;

  constructor(store: WorkOrderStore, options: MetricsQueriesOptions = {}) {
    this.store = store;
    this.clock = options.clock ?? systemClock;
    this.capabilities = options.capabilities;
  }

  private caps(): StoreCapabilities {
    return this.capabilities ?? this.store.getCapabilities();
  }

  private now(): string {
    return formatSqlTimestamp(this.clock());
  }

  getStatusCounts(): StatusCounts {
    const row = this.store.read('getStatusCounts', (db) =>
      db
        .prepare<[], StatusCountsRow>(
          `
        SELECT
          SUM(CASE WHEN status = 'Pending' THEN 1 ELSE 0 END) AS pending,
          SUM(CASE WHEN status = 'In Progress' THEN 1 ELSE 0 END) AS in_progress,
          SUM(CASE WHEN status = 'Done' THEN 1 ELSE 0 END) AS done
        FROM tasks
      `
        )
        .get()
    );

    return {
      pending: row?.pending || 0,
      in_progress: row?.in_progress || 0,
      done: row?.done || 0,
    };
  }

  /**
   * Unfinished tasks whose deadline is already behind the clock.
   */
  getOverdueCount(): number {
    const row = this.store.read('getOverdueCount', (db) =>
      db
        .prepare<{ now: string }, CountResult>(
          `
        SELECT COUNT(*) AS count
        FROM tasks
        WHERE status != 'Done'
          AND deadline IS NOT NULL
          AND datetime(deadline) < datetime(@now)
      `
        )
        .get({ now: this.now() })
    );
    return row?.count ?? 0;
  }

  /**
   * Unfinished tasks due within `[now, now + windowDays]`.
   */
  getUpcomingCount(windowDays: number): number {
    const days = validateInput(PositiveIntSchema, windowDays, 'windowDays');

    const row = this.store.read('getUpcomingCount', (db) =>
      db
        .prepare<{ now: string; window: string }, CountResult>(
          `
        SELECT COUNT(*) AS count
        FROM tasks
        WHERE status != 'Done'
          AND deadline IS NOT NULL
          AND datetime(deadline) BETWEEN datetime(@now) AND datetime(@now, @window)
      `
        )
        .get({ now: this.now(), window: `+${days} days` })
    );
    return row?.count ?? 0;
  }

  /**
   * Completions per calendar day over the last `windowDays` days,
   * oldest first. Days without completions are left out.
   */
  getTaskThroughput(windowDays: number): ThroughputPoint[] {
    const days = validateInput(PositiveIntSchema, windowDays, 'windowDays');
    const field = this.caps().completionField;

    return this.store.read('getTaskThroughput', (db) =>
      db
        .prepare<{ now: string; window: string }, ThroughputPoint>(
          `
        SELECT DATE(${field}) AS date, COUNT(*) AS count
        FROM tasks
        WHERE status = 'Done'
          AND ${field} IS NOT NULL
          AND DATE(${field}) BETWEEN DATE(@now, @window) AND DATE(@now)
        GROUP BY DATE(${field})
        ORDER BY DATE(${field}) ASC
      `
        )
        .all({ now: this.now(), window: `-${days} days` })
    );
  }

  /**
   * Task counts per area and per machine over all tasks, largest first.
   */
  getHeatmapData(): HeatmapData {
    const toLabels = (rows: LabelCountRow[]): LabelCount[] =>
      rows.map((row) => ({ label: row.label ?? UNSPECIFIED, count: row.count }));

    return this.store.read('getHeatmapData', (db) => {
      const byArea = db
        .prepare<[], LabelCountRow>(
          `
        SELECT NULLIF(area, '') AS label, COUNT(*) AS count
        FROM tasks
        GROUP BY NULLIF(area, '')
        ORDER BY count DESC, label ASC
      `
        )
        .all();
      const byMachine = db
        .prepare<[], LabelCountRow>(
          `
        SELECT NULLIF(machine_id, '') AS label, COUNT(*) AS count
        FROM tasks
        GROUP BY NULLIF(machine_id, '')
        ORDER BY count DESC, label ASC
      `
        )
        .all();

      return { byArea: toLabels(byArea), byMachine: toLabels(byMachine) };
    });
  }

  /**
   * Workers ranked by finished tasks. Ties go to the name that sorts
   * first, with unassigned work last.
   */
  getLeaderboard(limit: number): LeaderboardEntry[] {
    const max = validateInput(PositiveIntSchema, limit, 'limit');
    const caps = this.caps();
    const field = caps.completionField;
    const createdAt = caps.hasCreatedAt ? 't.created_at' : 'NULL';

    const rows = this.store.read('getLeaderboard', (db) =>
      db
        .prepare<[], CompletionRow>(
          `
        SELECT u.username AS workerName,
               ${createdAt} AS createdAt,
               t.${field} AS doneAt
        FROM tasks t
        LEFT JOIN users u ON u.id = t.assigned_to
        WHERE t.status = 'Done'
      `
        )
        .all()
    );

    const tallies = new Map<string | null, WorkerTally>();
    for (const row of rows) {
      let tally = tallies.get(row.workerName);
      if (!tally) {
        tally = { workerName: row.workerName, tasksDone: 0, totalDays: 0, samples: 0 };
        tallies.set(row.workerName, tally);
      }
      tally.tasksDone += 1;

      const start = parseTimestamp(row.createdAt);
      const end = parseTimestamp(row.doneAt);
      if (start && end) {
        tally.totalDays += daysBetween(start, end);
        tally.samples += 1;
      }
    }

    return [...tallies.values()]
      .sort((a, b) => {
        if (b.tasksDone !== a.tasksDone) return b.tasksDone - a.tasksDone;
        if (a.workerName === null) return b.workerName === null ? 0 : 1;
        if (b.workerName === null) return -1;
        return a.workerName < b.workerName ? -1 : a.workerName > b.workerName ? 1 : 0;
      })
      .slice(0, max)
      .map((tally) => ({
        workerName: tally.workerName ?? UNKNOWN_WORKER,
        tasksDone: tally.tasksDone,
        avgDaysToComplete:
          tally.samples > 0 ? roundTo(tally.totalDays / tally.samples) : 0,
      }));
  }

  /**
   * Mean days from creation to completion across finished tasks.
   * Rows with an unreadable timestamp are skipped.
   */
  getCycleTimeAvg(): number {
    const caps = this.caps();
    if (!caps.hasCreatedAt) return 0;
    const field = caps.completionField;

    const rows = this.store.read('getCycleTimeAvg', (db) =>
      db
        .prepare<[], CycleRow>(
          `
        SELECT created_at AS createdAt, ${field} AS doneAt
        FROM tasks
        WHERE status = 'Done'
          AND created_at IS NOT NULL
          AND ${field} IS NOT NULL
      `
        )
        .all()
    );

    const durations: number[] = [];
    for (const row of rows) {
      const start = parseTimestamp(row.createdAt);
      const end = parseTimestamp(row.doneAt);
      if (start && end) {
        durations.push(daysBetween(start, end));
      }
    }

    if (durations.length === 0) return 0;
    const total = durations.reduce((sum, days) => sum + days, 0);
    return roundTo(total / durations.length);
  }

  /**
   * Share of finished tasks completed no later than their deadline.
   */
  getOnTimePercentage(): number {
    const field = this.caps().completionField;

    const rows = this.store.read('getOnTimePercentage', (db) =>
      db
        .prepare<[], DeadlineRow>(
          `
        SELECT deadline, ${field} AS doneAt
        FROM tasks
        WHERE status = 'Done'
          AND deadline IS NOT NULL
          AND ${field} IS NOT NULL
      `
        )
        .all()
    );

    let qualifying = 0;
    let onTime = 0;
    for (const row of rows) {
      const deadline = parseTimestamp(row.deadline);
      const doneAt = parseTimestamp(row.doneAt);
      if (!deadline || !doneAt) continue;
      qualifying += 1;
      if (doneAt.getTime() <= deadline.getTime()) onTime += 1;
    }

    return qualifying > 0 ? roundTo((onTime / qualifying) * 100) : 0;
  }

  /**
   * Areas with the most unfinished work. Blank areas are left out,
   * unlike the heatmap which reports them as unspecified.
   */
  getBottleneckTopAreas(topN: number): AreaCount[] {
    const max = validateInput(PositiveIntSchema, topN, 'topN');

    return this.store.read('getBottleneckTopAreas', (db) =>
      db
        .prepare<{ limit: number }, AreaCount>(
          `
        SELECT TRIM(area) AS area, COUNT(*) AS count
        FROM tasks
        WHERE status IN ('Pending', 'In Progress')
          AND TRIM(COALESCE(area, '')) <> ''
        GROUP BY TRIM(area)
        ORDER BY count DESC, area ASC
        LIMIT @limit
      `
        )
        .all({ limit: max })
    );
  }
}
