/**
 * HTTP client for a remote metrics-usage instance.
 *
 * Used when this process only analyses sources and a central instance
 * owns the store. Bodies use the same wire format as the local API.
 */

import type { MetricUsage } from '../../types/metric-usage';
import { mapToJSON, usageToJSON } from '../../types/metric-usage';

const DEFAULT_TIMEOUT_MS = 10_000;

export interface MetricUsageClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

export class MetricUsageClientError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'MetricUsageClientError';
  }
}

export class MetricUsageClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;

  constructor(options: MetricUsageClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  pushUsage(usage: ReadonlyMap<string, MetricUsage>): Promise<void> {
    return this.post('/api/v1/metrics', mapToJSON(usage, usageToJSON));
  }

  pushPartialUsage(usage: ReadonlyMap<string, MetricUsage>): Promise<void> {
    return this.post('/api/v1/partial_metrics', mapToJSON(usage, usageToJSON));
  }

  pushLabels(labels: ReadonlyMap<string, readonly string[]>): Promise<void> {
    return this.post('/api/v1/labels', mapToJSON(labels, (names) => [...names]));
  }

  private async post(path: string, body: unknown): Promise<void> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers['X-API-Key'] = this.apiKey;
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new MetricUsageClientError(`POST ${path} timed out after ${this.timeoutMs}ms`);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new MetricUsageClientError(`POST ${path} failed: ${reason}`);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new MetricUsageClientError(
        `POST ${path} returned ${response.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
        response.status
      );
    }
  }
}
