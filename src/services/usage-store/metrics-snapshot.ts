/**
 * Metrics Snapshot
 *
 * Best-effort warm cache: the concrete metric map is dumped to a JSON file
 * on a fixed period and read back once at startup. Nothing here is
 * authoritative, so every failure is logged and the store keeps running.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '../../lib/logger';
import type { Metric } from '../../types/metric-usage';
import { MetricMapSchema, mapToJSON, metricFromJSON, metricToJSON, recordToMap } from '../../types/metric-usage';
import type { UsageStore } from './usage-store';

export async function readMetricsSnapshot(path: string): Promise<Map<string, Metric>> {
  const raw = await readFile(path, 'utf8');
  const parsed = MetricMapSchema.parse(JSON.parse(raw));
  return recordToMap(parsed, metricFromJSON);
}

/**
 * Write to a sibling temp file first, then rename, so a crash mid-write
 * never leaves a truncated snapshot behind.
 */
export async function writeMetricsSnapshot(path: string, metrics: ReadonlyMap<string, Metric>): Promise<void> {
  const data = JSON.stringify(mapToJSON(metrics, metricToJSON));
  const tmpPath = `${path}.tmp`;
  await mkdir(dirname(path), { recursive: true });
  await writeFile(tmpPath, data, { encoding: 'utf8', mode: 0o644 });
  await rename(tmpPath, path);
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Startup load. Any failure yields an empty map.
 */
export async function loadMetricsSnapshot(path: string): Promise<Map<string, Metric>> {
  try {
    const metrics = await readMetricsSnapshot(path);
    logger.info({ path, metrics: metrics.size }, '[Snapshot] Metrics restored');
    return metrics;
  } catch (error) {
    if (isFileNotFound(error)) {
      logger.info({ path }, '[Snapshot] No snapshot file yet, starting empty');
    } else {
      logger.warn({ err: error, path }, '[Snapshot] Failed to read metrics file, starting empty');
    }
    return new Map();
  }
}

export interface SnapshotFlusher {
  /** Write the snapshot now; resolves false when the write failed or another flush was running */
  flush: () => Promise<boolean>;
  stop: () => void;
}

export function setupSnapshotFlush(
  store: UsageStore,
  options: { path: string; flushPeriodMs: number }
): SnapshotFlusher {
  let flushInFlight = false;

  const flush = async (): Promise<boolean> => {
    if (flushInFlight) return false;
    flushInFlight = true;

    try {
      // Copy under the store lock, write outside of it
      const metrics = await store.listMetrics();
      await writeMetricsSnapshot(options.path, metrics);
      logger.debug({ path: options.path, metrics: metrics.size }, '[Snapshot] Metrics flushed');
      return true;
    } catch (error) {
      logger.error({ err: error, path: options.path }, '[Snapshot] Unable to flush the metrics in the file');
      return false;
    } finally {
      flushInFlight = false;
    }
  };

  const intervalTimer = setInterval(() => {
    void flush();
  }, options.flushPeriodMs);
  intervalTimer.unref();

  logger.info(
    { path: options.path, flushPeriodMs: options.flushPeriodMs },
    '[Snapshot] Periodic flush enabled'
  );

  return {
    flush,
    stop: () => clearInterval(intervalTimer),
  };
}
