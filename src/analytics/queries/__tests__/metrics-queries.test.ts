import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { tmpdir } from 'os';
import { MetricsQueries } from '../metrics-queries.js';
import { WorkOrderStore } from '../../../core/database/workorder-store.js';
import { DatabaseError, ValidationError } from '../../../core/errors/index.js';
import {
  TempStore,
  createTempStore,
  fixedClock,
  insertRawTask,
  insertRawUser,
} from '../../../testing/store-fixtures.js';

// Evaluation instant for every time-based assertion below
const NOW = '2024-01-15T12:00:00Z';

describe('MetricsQueries', () => {
  let temp: TempStore;
  let metrics: MetricsQueries;

  const useStore = (variant: 'minimal' | 'extended') => {
    temp = createTempStore(variant);
    metrics = new MetricsQueries(temp.store, { clock: fixedClock(NOW) });
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    temp?.cleanup();
    vi.restoreAllMocks();
  });

  describe.each(['minimal', 'extended'] as const)('empty %s store', (variant) => {
    beforeEach(() => useStore(variant));

    it('returns zero defaults for every metric', () => {
      expect(metrics.getStatusCounts()).toEqual({ pending: 0, in_progress: 0, done: 0 });
      expect(metrics.getOverdueCount()).toBe(0);
      expect(metrics.getUpcomingCount(3)).toBe(0);
      expect(metrics.getTaskThroughput(7)).toEqual([]);
      expect(metrics.getHeatmapData()).toEqual({ byArea: [], byMachine: [] });
      expect(metrics.getLeaderboard(5)).toEqual([]);
      expect(metrics.getCycleTimeAvg()).toBe(0);
      expect(metrics.getOnTimePercentage()).toBe(0);
      expect(metrics.getBottleneckTopAreas(3)).toEqual([]);
    });
  });

  describe('getStatusCounts', () => {
    beforeEach(() => useStore('extended'));

    it('counts each recognized status and sums to the table size', () => {
      for (const status of ['Pending', 'Pending', 'In Progress', 'Done', 'Done', 'Done']) {
        insertRawTask(temp.dbPath, { status });
      }

      const counts = metrics.getStatusCounts();
      expect(counts).toEqual({ pending: 2, in_progress: 1, done: 3 });
      expect(counts.pending + counts.in_progress + counts.done).toBe(
        temp.store.listTasks().length
      );
    });

    it('ignores statuses outside the three dashboard buckets', () => {
      insertRawTask(temp.dbPath, { status: 'Deleted' });
      insertRawTask(temp.dbPath, { status: 'Pending' });
      expect(metrics.getStatusCounts()).toEqual({ pending: 1, in_progress: 0, done: 0 });
    });
  });

  describe('getOverdueCount', () => {
    beforeEach(() => useStore('extended'));

    it('counts unfinished tasks whose deadline has passed', () => {
      insertRawTask(temp.dbPath, { status: 'Pending', deadline: '2024-01-14 12:00:00' });
      insertRawTask(temp.dbPath, { status: 'Done', deadline: '2024-01-14 12:00:00' });
      insertRawTask(temp.dbPath, { status: 'In Progress', deadline: '2024-01-16 00:00:00' });
      insertRawTask(temp.dbPath, { status: 'Pending', deadline: null });
      insertRawTask(temp.dbPath, { status: 'Pending', deadline: 'soon' });

      expect(metrics.getOverdueCount()).toBe(1);
    });

    it('does not treat a deadline equal to now as overdue', () => {
      insertRawTask(temp.dbPath, { status: 'Pending', deadline: '2024-01-15 12:00:00' });
      expect(metrics.getOverdueCount()).toBe(0);
    });

    it('follows the injected clock', () => {
      insertRawTask(temp.dbPath, { status: 'Pending', deadline: '2024-01-20' });

      const later = new MetricsQueries(temp.store, {
        clock: fixedClock('2024-01-21T00:00:00Z'),
      });
      expect(metrics.getOverdueCount()).toBe(0);
      expect(later.getOverdueCount()).toBe(1);
    });
  });

  describe('getUpcomingCount', () => {
    beforeEach(() => useStore('extended'));

    it('counts unfinished deadlines inside the inclusive window', () => {
      insertRawTask(temp.dbPath, { status: 'Pending', deadline: '2024-01-15 12:00:00' });
      insertRawTask(temp.dbPath, { status: 'In Progress', deadline: '2024-01-18 12:00:00' });
      insertRawTask(temp.dbPath, { status: 'Pending', deadline: '2024-01-18 12:00:01' });
      insertRawTask(temp.dbPath, { status: 'Pending', deadline: '2024-01-14 00:00:00' });
      insertRawTask(temp.dbPath, { status: 'Done', deadline: '2024-01-16 00:00:00' });

      expect(metrics.getUpcomingCount(3)).toBe(2);
      expect(metrics.getUpcomingCount(4)).toBe(3);
    });

    it('rejects window sizes that are not positive integers', () => {
      expect(() => metrics.getUpcomingCount(0)).toThrow(ValidationError);
      expect(() => metrics.getUpcomingCount(-2)).toThrow(ValidationError);
      expect(() => metrics.getUpcomingCount(1.5)).toThrow(ValidationError);
      expect(() => metrics.getUpcomingCount(Number.NaN)).toThrow(ValidationError);
    });
  });

  describe('getTaskThroughput', () => {
    it('groups completions by day over the window, oldest first', () => {
      useStore('extended');
      insertRawTask(temp.dbPath, { status: 'Done', completed_at: '2024-01-15 09:00:00' });
      insertRawTask(temp.dbPath, { status: 'Done', completed_at: '2024-01-15 10:00:00' });
      insertRawTask(temp.dbPath, { status: 'Done', completed_at: '2024-01-13 08:00:00' });
      insertRawTask(temp.dbPath, { status: 'Done', completed_at: '2024-01-08 08:00:00' });
      insertRawTask(temp.dbPath, { status: 'Done', completed_at: '2024-01-07 23:59:59' });
      insertRawTask(temp.dbPath, { status: 'Done', completed_at: '2024-01-16 08:00:00' });
      insertRawTask(temp.dbPath, { status: 'Done', completed_at: null });
      insertRawTask(temp.dbPath, { status: 'Pending', completed_at: '2024-01-14 08:00:00' });

      expect(metrics.getTaskThroughput(7)).toEqual([
        { date: '2024-01-08', count: 1 },
        { date: '2024-01-13', count: 1 },
        { date: '2024-01-15', count: 2 },
      ]);
      expect(metrics.getTaskThroughput(1)).toEqual([{ date: '2024-01-15', count: 2 }]);
    });

    it('uses the deadline when the schema has no completion column', () => {
      useStore('minimal');
      insertRawTask(temp.dbPath, { status: 'Done', deadline: '2024-01-14' });
      insertRawTask(temp.dbPath, { status: 'Done', deadline: '2024-01-14 17:00:00' });
      insertRawTask(temp.dbPath, { status: 'Pending', deadline: '2024-01-14' });

      expect(metrics.getTaskThroughput(7)).toEqual([{ date: '2024-01-14', count: 2 }]);
    });
  });

  describe('getHeatmapData', () => {
    beforeEach(() => useStore('extended'));

    it('counts every task by area and machine, labeling blanks', () => {
      insertRawTask(temp.dbPath, { status: 'Pending', area: 'Line A', machine_id: 'M-1' });
      insertRawTask(temp.dbPath, { status: 'Done', area: 'Line A', machine_id: 'M-1' });
      insertRawTask(temp.dbPath, { status: 'Pending', area: null, machine_id: 'M-1' });
      insertRawTask(temp.dbPath, { status: 'In Progress', area: '', machine_id: null });
      insertRawTask(temp.dbPath, { status: 'Done', area: 'Line B', machine_id: null });

      expect(metrics.getHeatmapData()).toEqual({
        byArea: [
          { label: 'Unspecified', count: 2 },
          { label: 'Line A', count: 2 },
          { label: 'Line B', count: 1 },
        ],
        byMachine: [
          { label: 'M-1', count: 3 },
          { label: 'Unspecified', count: 2 },
        ],
      });
    });
  });

  describe('getBottleneckTopAreas', () => {
    beforeEach(() => useStore('extended'));

    it('ranks trimmed areas of unfinished work and drops blanks', () => {
      insertRawTask(temp.dbPath, { status: 'Pending', area: ' Line A ' });
      insertRawTask(temp.dbPath, { status: 'In Progress', area: 'Line A' });
      insertRawTask(temp.dbPath, { status: 'In Progress', area: 'Line B' });
      insertRawTask(temp.dbPath, { status: 'Done', area: 'Line C' });
      insertRawTask(temp.dbPath, { status: 'Pending', area: null });
      insertRawTask(temp.dbPath, { status: 'Pending', area: '   ' });

      expect(metrics.getBottleneckTopAreas(3)).toEqual([
        { area: 'Line A', count: 2 },
        { area: 'Line B', count: 1 },
      ]);
      expect(metrics.getBottleneckTopAreas(1)).toEqual([{ area: 'Line A', count: 2 }]);
    });

    it('keeps a null area out even though the heatmap reports it', () => {
      insertRawTask(temp.dbPath, { status: 'Pending', area: null });

      expect(metrics.getHeatmapData().byArea).toEqual([{ label: 'Unspecified', count: 1 }]);
      expect(metrics.getBottleneckTopAreas(3)).toEqual([]);
    });
  });

  describe('getLeaderboard', () => {
    it('ranks workers by finished tasks with averaged cycle time', () => {
      useStore('extended');
      const alice = insertRawUser(temp.dbPath, 'alice');
      const bob = insertRawUser(temp.dbPath, 'bob');
      const carol = insertRawUser(temp.dbPath, 'carol');

      insertRawTask(temp.dbPath, {
        status: 'Done',
        assigned_to: bob,
        created_at: '2024-01-01 00:00:00',
        completed_at: '2024-01-04 00:00:00',
      });
      insertRawTask(temp.dbPath, {
        status: 'Done',
        assigned_to: alice,
        created_at: '2024-01-01 00:00:00',
        completed_at: '2024-01-03 00:00:00',
      });
      insertRawTask(temp.dbPath, {
        status: 'Done',
        assigned_to: alice,
        created_at: '2024-01-01 00:00:00',
        completed_at: '2024-01-02 12:00:00',
      });
      insertRawTask(temp.dbPath, {
        status: 'Done',
        assigned_to: bob,
        created_at: '2024-01-01 00:00:00',
        completed_at: '2024-01-02 00:00:00',
      });
      insertRawTask(temp.dbPath, {
        status: 'Done',
        assigned_to: carol,
        created_at: 'garbage',
        completed_at: '2024-01-02 00:00:00',
      });
      insertRawTask(temp.dbPath, { status: 'Done', assigned_to: null });
      insertRawTask(temp.dbPath, { status: 'Done', assigned_to: null });
      insertRawTask(temp.dbPath, { status: 'Pending', assigned_to: carol });

      expect(metrics.getLeaderboard(5)).toEqual([
        { workerName: 'alice', tasksDone: 2, avgDaysToComplete: 1.75 },
        { workerName: 'bob', tasksDone: 2, avgDaysToComplete: 2 },
        { workerName: 'Unknown', tasksDone: 2, avgDaysToComplete: 0 },
        { workerName: 'carol', tasksDone: 1, avgDaysToComplete: 0 },
      ]);
    });

    it('never returns more rows than the limit', () => {
      useStore('extended');
      for (let i = 0; i < 10; i++) {
        const worker = insertRawUser(temp.dbPath, `worker-${i}`);
        insertRawTask(temp.dbPath, { status: 'Done', assigned_to: worker });
      }

      const board = metrics.getLeaderboard(2);
      expect(board).toHaveLength(2);
      expect(board.map((entry) => entry.workerName)).toEqual(['worker-0', 'worker-1']);
    });

    it('reports zero average days without a created_at column', () => {
      useStore('minimal');
      const dee = insertRawUser(temp.dbPath, 'dee');
      insertRawTask(temp.dbPath, { status: 'Done', assigned_to: dee, deadline: '2024-01-10' });

      expect(metrics.getLeaderboard(5)).toEqual([
        { workerName: 'dee', tasksDone: 1, avgDaysToComplete: 0 },
      ]);
    });
  });

  describe('getCycleTimeAvg', () => {
    it('averages creation-to-completion days, skipping unreadable rows', () => {
      useStore('extended');
      insertRawTask(temp.dbPath, {
        status: 'Done',
        created_at: '2024-01-01 00:00:00',
        completed_at: '2024-01-03 00:00:00',
      });
      insertRawTask(temp.dbPath, {
        status: 'Done',
        created_at: '2024-01-01',
        completed_at: '2024-01-02',
      });
      insertRawTask(temp.dbPath, {
        status: 'Done',
        created_at: 'not-a-date',
        completed_at: '2024-01-09 00:00:00',
      });
      insertRawTask(temp.dbPath, {
        status: 'Done',
        created_at: '2024-01-01 00:00:00',
        completed_at: null,
      });
      insertRawTask(temp.dbPath, {
        status: 'Pending',
        created_at: '2024-01-01 00:00:00',
        completed_at: '2024-01-30 00:00:00',
      });

      expect(metrics.getCycleTimeAvg()).toBe(1.5);
    });

    it('rounds to two decimals', () => {
      useStore('extended');
      insertRawTask(temp.dbPath, {
        status: 'Done',
        created_at: '2024-01-01 00:00:00',
        completed_at: '2024-01-01 08:00:00',
      });

      expect(metrics.getCycleTimeAvg()).toBe(0.33);
    });

    it('is zero when the schema has no created_at column', () => {
      useStore('minimal');
      insertRawTask(temp.dbPath, { status: 'Done', deadline: '2024-01-10' });
      expect(metrics.getCycleTimeAvg()).toBe(0);
    });
  });

  describe('getOnTimePercentage', () => {
    beforeEach(() => useStore('extended'));

    it('counts a completion before the deadline as on time', () => {
      insertRawTask(temp.dbPath, {
        status: 'Done',
        deadline: '2024-01-10',
        completed_at: '2024-01-08',
      });
      expect(metrics.getOnTimePercentage()).toBe(100);
    });

    it('keeps late completions in the denominator only', () => {
      insertRawTask(temp.dbPath, {
        status: 'Done',
        deadline: '2024-01-10',
        completed_at: '2024-01-12',
      });
      expect(metrics.getOnTimePercentage()).toBe(0);

      insertRawTask(temp.dbPath, {
        status: 'Done',
        deadline: '2024-01-10',
        completed_at: '2024-01-08',
      });
      insertRawTask(temp.dbPath, {
        status: 'Done',
        deadline: '2024-01-10 08:00:00',
        completed_at: '2024-01-10 08:00:00',
      });
      expect(metrics.getOnTimePercentage()).toBe(66.67);
    });

    it('excludes rows missing or failing to parse either timestamp', () => {
      insertRawTask(temp.dbPath, {
        status: 'Done',
        deadline: '2024-01-10',
        completed_at: '2024-01-08',
      });
      insertRawTask(temp.dbPath, { status: 'Done', deadline: 'bad', completed_at: '2024-01-20' });
      insertRawTask(temp.dbPath, { status: 'Done', deadline: null, completed_at: '2024-01-20' });
      insertRawTask(temp.dbPath, { status: 'Done', deadline: '2024-01-10', completed_at: null });
      insertRawTask(temp.dbPath, {
        status: 'Pending',
        deadline: '2024-01-10',
        completed_at: '2024-01-20',
      });

      expect(metrics.getOnTimePercentage()).toBe(100);
    });
  });

  describe('on a host with daylight saving', () => {
    const previousTz = process.env.TZ;

    beforeAll(() => {
      process.env.TZ = 'America/New_York';
    });

    afterAll(() => {
      if (previousTz === undefined) {
        delete process.env.TZ;
      } else {
        process.env.TZ = previousTz;
      }
    });

    it('compares completions in the spring-forward hour as UTC', () => {
      useStore('extended');
      insertRawTask(temp.dbPath, {
        status: 'Done',
        deadline: '2024-03-10 03:15:00',
        created_at: '2024-03-10 01:30:00',
        completed_at: '2024-03-10 02:30:00',
      });

      expect(metrics.getOnTimePercentage()).toBe(100);
      expect(metrics.getCycleTimeAvg()).toBe(0.04);
    });
  });

  describe('capability descriptor', () => {
    it('honors an explicitly supplied descriptor', () => {
      useStore('extended');
      insertRawTask(temp.dbPath, {
        status: 'Done',
        deadline: '2024-01-14',
        completed_at: '2024-01-10',
      });

      const viaDeadline = new MetricsQueries(temp.store, {
        clock: fixedClock(NOW),
        capabilities: {
          hasCreatedAt: false,
          hasCompletedAt: false,
          hasUpdatedAt: false,
          completionField: 'deadline',
        },
      });

      expect(metrics.getTaskThroughput(7)).toEqual([{ date: '2024-01-10', count: 1 }]);
      expect(viaDeadline.getTaskThroughput(7)).toEqual([{ date: '2024-01-14', count: 1 }]);
    });
  });

  describe('purity', () => {
    it('returns identical results on repeated calls', () => {
      useStore('extended');
      const worker = insertRawUser(temp.dbPath, 'gus');
      insertRawTask(temp.dbPath, {
        status: 'Done',
        assigned_to: worker,
        area: 'Dock',
        deadline: '2024-01-14',
        created_at: '2024-01-10 00:00:00',
        completed_at: '2024-01-13 00:00:00',
      });
      insertRawTask(temp.dbPath, { status: 'Pending', area: 'Dock', deadline: '2024-01-16' });

      const snapshot = () => ({
        status: metrics.getStatusCounts(),
        overdue: metrics.getOverdueCount(),
        upcoming: metrics.getUpcomingCount(3),
        throughput: metrics.getTaskThroughput(7),
        heatmap: metrics.getHeatmapData(),
        leaderboard: metrics.getLeaderboard(5),
        cycle: metrics.getCycleTimeAvg(),
        onTime: metrics.getOnTimePercentage(),
        bottlenecks: metrics.getBottleneckTopAreas(3),
      });

      const first = snapshot();
      expect(snapshot()).toEqual(first);
      expect(temp.store.listTasks()).toHaveLength(2);
      expect(first.upcoming).toBe(1);
      expect(first.cycle).toBe(3);
    });
  });

  describe('store failures', () => {
    it('propagates an unavailable store as a DatabaseError', () => {
      temp = createTempStore('minimal');
      const missing = new WorkOrderStore({
        dbPath: join(tmpdir(), 'workorder-absent', 'gone.db'),
      });
      const broken = new MetricsQueries(missing, { clock: fixedClock(NOW) });

      expect(() => broken.getStatusCounts()).toThrow(DatabaseError);
      expect(() => broken.getOnTimePercentage()).toThrow(DatabaseError);
    });
  });
});
