/**
 * Usage Store
 *
 * In-memory lookup of metric names and the dashboards / rules that use them.
 *
 * Writes only happen through four bounded queues, each drained by one
 * consumer:
 * - metric lists: discovery of concrete metrics + eviction of stale ones
 * - usage: usage keyed by concrete metric name
 * - partial usage: usage keyed by a metric name pattern
 * - labels: label names per metric
 *
 * Usage may arrive before the metric it refers to. It waits in the pending
 * buffer until the metric shows up in a metric list (or the labels feed).
 *
 * Lock order, everywhere: metricsMutex, then partialMetricsMutex.
 */

import { Mutex } from 'async-mutex';
import { BoundedQueue } from '../../lib/bounded-queue';
import { logger } from '../../lib/logger';
import type { Metric, MetricUsage, PartialMetric } from '../../types/metric-usage';
import { compilePartialMetricPattern, isMatching } from './pattern-compiler';
import { cloneMap, cloneMetric, clonePartialMetric, cloneUsage, mergeUsage } from './usage-merge';

// ============================================================================
// 1. Types
// ============================================================================

export interface QueueCapacities {
  metrics: number;
  usage: number;
  partialUsage: number;
  labels: number;
}

export interface UsageStoreOptions {
  /** Consecutive metric lists a metric may be missing from before it is deleted */
  threshold: number;
  /** Metric lists a pending usage entry may wait for its metric; 0 keeps it forever */
  pendingUsageThreshold?: number;
  queueCapacity?: Partial<QueueCapacities>;
  /** Metrics restored from a snapshot */
  initialMetrics?: ReadonlyMap<string, Metric>;
}

export interface UsageStoreStats {
  metrics: number;
  partialMetrics: number;
  pendingUsage: number;
  queues: Record<keyof QueueCapacities, number>;
}

export const DEFAULT_QUEUE_CAPACITY: QueueCapacities = {
  metrics: 10,
  usage: 250,
  partialUsage: 250,
  labels: 250,
};

// ============================================================================
// 2. Store
// ============================================================================

export class UsageStore {
  private readonly metrics = new Map<string, Metric>();
  /** Consecutive metric lists each metric was missing from */
  private readonly metricLastTimeSeen = new Map<string, number>();
  /** Usage for metric names not confirmed yet */
  private readonly pendingUsage = new Map<string, MetricUsage>();
  private readonly pendingUsageAge = new Map<string, number>();
  private readonly partialMetrics = new Map<string, PartialMetric>();

  private readonly metricsMutex = new Mutex();
  private readonly partialMetricsMutex = new Mutex();

  private readonly metricsQueue: BoundedQueue<readonly string[]>;
  private readonly usageQueue: BoundedQueue<ReadonlyMap<string, MetricUsage>>;
  private readonly partialUsageQueue: BoundedQueue<ReadonlyMap<string, MetricUsage>>;
  private readonly labelsQueue: BoundedQueue<ReadonlyMap<string, readonly string[]>>;
  private readonly consumers: Promise<void>;

  private readonly threshold: number;
  private readonly pendingUsageThreshold: number;
  private stopped = false;

  constructor(options: UsageStoreOptions) {
    if (!Number.isInteger(options.threshold) || options.threshold < 1) {
      throw new RangeError(`threshold must be a positive integer, got ${options.threshold}`);
    }
    this.threshold = options.threshold;
    this.pendingUsageThreshold = options.pendingUsageThreshold ?? 0;

    const capacity = { ...DEFAULT_QUEUE_CAPACITY, ...options.queueCapacity };
    this.metricsQueue = new BoundedQueue('metrics', capacity.metrics);
    this.usageQueue = new BoundedQueue('usage', capacity.usage);
    this.partialUsageQueue = new BoundedQueue('partial-usage', capacity.partialUsage);
    this.labelsQueue = new BoundedQueue('labels', capacity.labels);

    if (options.initialMetrics) {
      for (const [name, metric] of options.initialMetrics) {
        this.metrics.set(name, cloneMetric(metric));
      }
    }

    this.consumers = Promise.all([
      this.metricsQueue.consume((names) => this.processMetricList(names)),
      this.usageQueue.consume((usage) => this.processUsage(usage)),
      this.partialUsageQueue.consume((usage) => this.processPartialUsage(usage)),
      this.labelsQueue.consume((labels) => this.processLabels(labels)),
    ]).then(() => undefined);
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  async getMetric(name: string): Promise<Metric | null> {
    return this.metricsMutex.runExclusive(() => {
      const metric = this.metrics.get(name);
      return metric ? cloneMetric(metric) : null;
    });
  }

  /** Deep copy; callers may filter or mutate it freely */
  async listMetrics(): Promise<Map<string, Metric>> {
    return this.metricsMutex.runExclusive(() => cloneMap(this.metrics, cloneMetric));
  }

  async listPartialMetrics(): Promise<Map<string, PartialMetric>> {
    return this.partialMetricsMutex.runExclusive(() => cloneMap(this.partialMetrics, clonePartialMetric));
  }

  async listPendingUsage(): Promise<Map<string, MetricUsage>> {
    return this.metricsMutex.runExclusive(() => cloneMap(this.pendingUsage, cloneUsage));
  }

  getStats(): UsageStoreStats {
    return {
      metrics: this.metrics.size,
      partialMetrics: this.partialMetrics.size,
      pendingUsage: this.pendingUsage.size,
      queues: {
        metrics: this.metricsQueue.depth,
        usage: this.usageQueue.depth,
        partialUsage: this.partialUsageQueue.depth,
        labels: this.labelsQueue.depth,
      },
    };
  }

  get isRunning(): boolean {
    return !this.stopped;
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  /**
   * Remove a concrete metric and unlink it from every partial metric.
   */
  async deleteMetric(name: string): Promise<boolean> {
    return this.withAllLocks(() => {
      if (!this.metrics.has(name)) {
        return false;
      }
      this.removeMetric(name);
      return true;
    });
  }

  /** The metric names currently exposed by the metrics backend */
  enqueueMetricList(names: readonly string[]): Promise<void> {
    return this.metricsQueue.push(names);
  }

  enqueueUsage(usage: ReadonlyMap<string, MetricUsage>): Promise<void> {
    return this.usageQueue.push(usage);
  }

  enqueuePartialUsage(usage: ReadonlyMap<string, MetricUsage>): Promise<void> {
    return this.partialUsageQueue.push(usage);
  }

  enqueueLabels(labels: ReadonlyMap<string, readonly string[]>): Promise<void> {
    return this.labelsQueue.push(labels);
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Resolves once every queue is drained and no batch is being applied.
   */
  async settle(): Promise<void> {
    const queues = [this.metricsQueue, this.usageQueue, this.partialUsageQueue, this.labelsQueue];
    // A batch on one queue never enqueues on another, so one pass is enough
    for (const queue of queues) {
      await queue.whenIdle();
    }
  }

  /**
   * Stop draining the queues and wait for in-flight batches to finish.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.metricsQueue.close();
    this.usageQueue.close();
    this.partialUsageQueue.close();
    this.labelsQueue.close();
    await this.consumers;
    logger.info('[UsageStore] Stopped');
  }

  // ============================================================================
  // 3. Consumers
  // ============================================================================

  private async processMetricList(names: readonly string[]): Promise<void> {
    await this.withAllLocks(() => {
      for (const name of this.metrics.keys()) {
        this.metricLastTimeSeen.set(name, (this.metricLastTimeSeen.get(name) ?? 0) + 1);
      }

      let discovered = 0;
      for (const name of names) {
        if (!this.metrics.has(name)) {
          this.registerMetric(name, []);
          discovered++;
        }
        this.metricLastTimeSeen.set(name, 0);
      }

      const evicted: string[] = [];
      for (const [name, absentFor] of this.metricLastTimeSeen) {
        if (absentFor >= this.threshold) {
          evicted.push(name);
        }
      }
      for (const name of evicted) {
        this.removeMetric(name);
      }

      const expiredPending = this.agePendingUsage();

      logger.debug(
        { received: names.length, discovered, evicted: evicted.length, expiredPending },
        '[UsageStore] Metric list applied'
      );
    });
  }

  private async processUsage(usage: ReadonlyMap<string, MetricUsage>): Promise<void> {
    await this.metricsMutex.runExclusive(() => {
      for (const [name, metricUsage] of usage) {
        this.applyFact('usage', name, () => {
          const metric = this.metrics.get(name);
          if (metric) {
            metric.usage = mergeUsage(metric.usage, metricUsage);
            return;
          }
          logger.debug(`[UsageStore] Metric "${name}" is used but not known yet, buffering its usage`);
          const merged = mergeUsage(this.pendingUsage.get(name), metricUsage);
          if (merged) {
            this.pendingUsage.set(name, merged);
          }
          if (this.pendingUsageThreshold > 0 && !this.pendingUsageAge.has(name)) {
            this.pendingUsageAge.set(name, 0);
          }
        });
      }
    });
  }

  private async processPartialUsage(usage: ReadonlyMap<string, MetricUsage>): Promise<void> {
    await this.withAllLocks(() => {
      for (const [pattern, metricUsage] of usage) {
        this.applyFact('partial usage', pattern, () => {
          const existing = this.partialMetrics.get(pattern);
          if (existing) {
            existing.usage = mergeUsage(existing.usage, metricUsage);
            return;
          }
          const matchingRegexp = this.compilePattern(pattern);
          const matchingMetrics = new Set<string>();
          if (matchingRegexp) {
            for (const name of this.metrics.keys()) {
              if (isMatching(matchingRegexp, name)) {
                matchingMetrics.add(name);
              }
            }
          }
          this.partialMetrics.set(pattern, { usage: metricUsage, matchingRegexp, matchingMetrics });
        });
      }
    });
  }

  private async processLabels(labels: ReadonlyMap<string, readonly string[]>): Promise<void> {
    await this.withAllLocks(() => {
      for (const [name, labelNames] of labels) {
        this.applyFact('labels', name, () => {
          const metric = this.metrics.get(name);
          if (metric) {
            for (const label of labelNames) {
              metric.labels.add(label);
            }
            return;
          }
          // Seen by another source; the next metric list takes over its lifecycle
          this.registerMetric(name, labelNames);
        });
      }
    });
  }

  // ============================================================================
  // 4. Helpers (callers hold the locks they touch)
  // ============================================================================

  private withAllLocks<T>(fn: () => T): Promise<T> {
    return this.metricsMutex.runExclusive<T>(() => this.partialMetricsMutex.runExclusive<T>(fn));
  }

  /**
   * Create a concrete metric, link it to matching partial metrics and move
   * any buffered usage onto it. Needs both locks.
   */
  private registerMetric(name: string, labels: readonly string[]): void {
    const metric: Metric = { labels: new Set(labels), usage: null };
    this.metrics.set(name, metric);

    for (const partial of this.partialMetrics.values()) {
      if (partial.matchingRegexp && isMatching(partial.matchingRegexp, name)) {
        partial.matchingMetrics.add(name);
      }
    }

    const buffered = this.pendingUsage.get(name);
    if (buffered) {
      metric.usage = buffered;
      this.pendingUsage.delete(name);
    }
    this.pendingUsageAge.delete(name);
  }

  /** Needs both locks. */
  private removeMetric(name: string): void {
    this.metrics.delete(name);
    this.metricLastTimeSeen.delete(name);
    for (const partial of this.partialMetrics.values()) {
      partial.matchingMetrics.delete(name);
    }
  }

  private agePendingUsage(): number {
    if (this.pendingUsageThreshold <= 0) {
      return 0;
    }
    let expired = 0;
    for (const [name, age] of this.pendingUsageAge) {
      const next = age + 1;
      if (next >= this.pendingUsageThreshold) {
        this.pendingUsage.delete(name);
        this.pendingUsageAge.delete(name);
        expired++;
      } else {
        this.pendingUsageAge.set(name, next);
      }
    }
    return expired;
  }

  private compilePattern(pattern: string): RegExp | null {
    try {
      const compiled = compilePartialMetricPattern(pattern);
      if (!compiled) {
        logger.debug(`[UsageStore] Partial metric "${pattern}" matches every metric, skipping matching`);
      }
      return compiled;
    } catch (error) {
      logger.warn(
        { err: error, partialMetric: pattern },
        '[UsageStore] Unable to compile the partial metric name into a regexp'
      );
      return null;
    }
  }

  private applyFact(kind: string, key: string, apply: () => void): void {
    try {
      apply();
    } catch (error) {
      logger.error({ err: error, kind, key }, '[UsageStore] Failed to apply fact, skipping it');
    }
  }
}
