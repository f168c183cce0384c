import { logger } from '../../lib/logger';
import type { MetricUsage } from '../../types/metric-usage';
import type { UsageStore } from '../usage-store/usage-store';
import type { MetricUsageClient } from './metric-usage-client';

/**
 * Destination of analysed usage facts: the local store queues, or a
 * remote instance when one is configured.
 */
export interface UsageSink {
  readonly target: 'local' | 'remote';
  sendUsage(usage: ReadonlyMap<string, MetricUsage>): Promise<void>;
  sendPartialUsage(usage: ReadonlyMap<string, MetricUsage>): Promise<void>;
  sendLabels(labels: ReadonlyMap<string, readonly string[]>): Promise<void>;
}

export function createUsageSink(store: UsageStore, client: MetricUsageClient | null): UsageSink {
  if (!client) {
    return {
      target: 'local',
      sendUsage: (usage) => (usage.size > 0 ? store.enqueueUsage(usage) : Promise.resolve()),
      sendPartialUsage: (usage) => (usage.size > 0 ? store.enqueuePartialUsage(usage) : Promise.resolve()),
      sendLabels: (labels) => (labels.size > 0 ? store.enqueueLabels(labels) : Promise.resolve()),
    };
  }

  // Remote failures are logged and absorbed
  const forward = async (kind: string, size: number, send: () => Promise<void>): Promise<void> => {
    if (size === 0) return;
    try {
      await send();
    } catch (error) {
      logger.error({ err: error, kind, entries: size }, '[UsageSink] Failed to forward to the remote instance');
    }
  };

  return {
    target: 'remote',
    sendUsage: (usage) => forward('usage', usage.size, () => client.pushUsage(usage)),
    sendPartialUsage: (usage) => forward('partial usage', usage.size, () => client.pushPartialUsage(usage)),
    sendLabels: (labels) => forward('labels', labels.size, () => client.pushLabels(labels)),
  };
}
