/**
 * MetricUsageClient / UsageSink Tests
 *
 * The remote instance is an msw request handler; nothing leaves the process.
 */
import { HttpResponse, http } from 'msw';
import { setupServer } from 'msw/node';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { logger } from '../../lib/logger';
import { createUsage } from '../../types/metric-usage';
import { UsageStore } from '../usage-store/usage-store';
import { MetricUsageClient, MetricUsageClientError } from './metric-usage-client';
import { createUsageSink } from './usage-sink';

vi.mock('../../lib/logger', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

const REMOTE = 'http://metrics-usage.test';

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => {
  server.resetHandlers();
  vi.clearAllMocks();
});
afterAll(() => server.close());

describe('MetricUsageClient', () => {
  it('posts usage in the wire format with the api key', async () => {
    let received: { body: unknown; apiKey: string | null } | null = null;
    server.use(
      http.post(`${REMOTE}/api/v1/metrics`, async ({ request }) => {
        received = { body: await request.json(), apiKey: request.headers.get('x-api-key') };
        return new HttpResponse(null, { status: 202 });
      })
    );
    const client = new MetricUsageClient({ baseUrl: `${REMOTE}/`, apiKey: 'test-secret' });

    await client.pushUsage(new Map([['up', createUsage({ dashboards: [{ id: 'd1', name: 'Up', url: '/d/d1' }] })]]));

    expect(received).toEqual({
      body: { up: { dashboards: [{ id: 'd1', name: 'Up', url: '/d/d1' }] } },
      apiKey: 'test-secret',
    });
  });

  it('posts partial usage and labels to their own endpoints', async () => {
    const paths: string[] = [];
    let labels: unknown = null;
    server.use(
      http.post(`${REMOTE}/api/v1/partial_metrics`, ({ request }) => {
        paths.push(new URL(request.url).pathname);
        return new HttpResponse(null, { status: 202 });
      }),
      http.post(`${REMOTE}/api/v1/labels`, async ({ request }) => {
        paths.push(new URL(request.url).pathname);
        labels = await request.json();
        return new HttpResponse(null, { status: 202 });
      })
    );
    const client = new MetricUsageClient({ baseUrl: REMOTE });

    await client.pushPartialUsage(new Map([['foo_${x}', createUsage()]]));
    await client.pushLabels(new Map([['up', ['job', 'instance']]]));

    expect(paths).toEqual(['/api/v1/partial_metrics', '/api/v1/labels']);
    expect(labels).toEqual({ up: ['job', 'instance'] });
  });

  it('raises MetricUsageClientError on an error status', async () => {
    server.use(http.post(`${REMOTE}/api/v1/metrics`, () => HttpResponse.text('nope', { status: 401 })));
    const client = new MetricUsageClient({ baseUrl: REMOTE });

    const failure = client.pushUsage(new Map([['up', createUsage()]]));

    await expect(failure).rejects.toBeInstanceOf(MetricUsageClientError);
    await expect(failure).rejects.toMatchObject({ status: 401, message: 'POST /api/v1/metrics returned 401: nope' });
  });
});

describe('createUsageSink', () => {
  it('forwards to the remote instance and absorbs its failures', async () => {
    server.use(http.post(`${REMOTE}/api/v1/metrics`, () => HttpResponse.error()));
    const store = new UsageStore({ threshold: 3 });
    const sink = createUsageSink(store, new MetricUsageClient({ baseUrl: REMOTE }));

    await expect(sink.sendUsage(new Map([['up', createUsage()]]))).resolves.toBeUndefined();

    expect(sink.target).toBe('remote');
    expect(logger.error).toHaveBeenCalledTimes(1);
    await store.stop();
  });

  it('skips empty batches', async () => {
    const store = new UsageStore({ threshold: 3 });
    const sink = createUsageSink(store, new MetricUsageClient({ baseUrl: REMOTE }));

    // No handler is registered, so any request would fail the test
    await sink.sendLabels(new Map());

    expect(logger.error).not.toHaveBeenCalled();
    await store.stop();
  });

  it('feeds the local store when no remote is configured', async () => {
    const store = new UsageStore({ threshold: 3 });
    const sink = createUsageSink(store, null);

    await sink.sendLabels(new Map([['up', ['job']]]));
    await store.settle();

    expect(sink.target).toBe('local');
    expect([...((await store.getMetric('up'))?.labels ?? [])]).toEqual(['job']);
    await store.stop();
  });
});
