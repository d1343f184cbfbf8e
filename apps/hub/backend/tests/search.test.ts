import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ResourceHub } from '@ephemera/core';
import type { Result, StorageError } from '@ephemera/storage';
import { createApp } from '../src/app.js';

const API_KEY = 'test-api-key';
const T0 = Date.parse('2024-03-01T00:00:00.000Z');
const MINUTE = 60_000;

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function unwrap(result: Result<string, StorageError>): string {
  if (!result.ok) throw new Error(`store failed: ${result.error.type}`);
  return result.value;
}

async function resultUris(res: Response): Promise<string[]> {
  const body: unknown = await res.json();
  const results: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'results') : undefined;
  if (!Array.isArray(results)) {
    throw new Error('Response has no results');
  }
  return results.map((result: unknown) =>
    typeof result === 'object' && result !== null ? String(Reflect.get(result, 'uri')) : ''
  );
}

describe('search routes', () => {
  let dir: string;
  let hub: ResourceHub;
  let app: ReturnType<typeof createApp>;
  let now: number;
  let tableUri: string;
  let chartUri: string;
  let mlUri: string;

  const get = (url: string) => app.request(url, { headers: { Authorization: `Bearer ${API_KEY}` } });

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.stubEnv('API_KEY', API_KEY);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hub-search-test-'));
    now = T0;
    hub = new ResourceHub({ storagePath: dir, logger: mockLogger, clock: () => new Date(now) });
    await hub.init();
    app = createApp(hub, { requestLogging: false });

    tableUri = unwrap(
      await hub.storeTable(
        { columns: ['id', 'amount'], data: [{ id: 1, amount: 9.5 }] },
        { sqlQuery: 'SELECT id, amount FROM orders' }
      )
    );
    now = T0 + MINUTE;
    chartUri = unwrap(await hub.storeChart({ labels: ['q1'] }, 'bar'));
    now = T0 + 2 * MINUTE;
    mlUri = unwrap(await hub.storeMl({ clusters: 3 }, 'clustering'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await hub.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns everything newest first by default', async () => {
    const res = await get('/api/search');
    expect(res.status).toBe(200);
    expect(await resultUris(res)).toEqual([mlUri, chartUri, tableUri]);
  });

  it('matches query text and echoes the criteria', async () => {
    const res = await get('/api/search?q=orders');
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      total_count: 1,
      search_criteria: { query: 'orders' },
      status: 'completed',
    });
    expect(body).toHaveProperty('results.0.uri', tableUri);
  });

  it('filters by type and by every listed tag', async () => {
    expect(await resultUris(await get('/api/search?type=chart'))).toEqual([chartUri]);
    expect(await resultUris(await get('/api/search?tags=chart,bar'))).toEqual([chartUri]);
    expect(await resultUris(await get('/api/search?tags=chart,financial'))).toEqual([]);
  });

  it('filters by creation window', async () => {
    const after = new Date(T0 + MINUTE).toISOString();
    expect(await resultUris(await get(`/api/search?created_after=${after}`))).toEqual([mlUri, chartUri]);
    expect(await resultUris(await get(`/api/search?created_before=${after}`))).toEqual([chartUri, tableUri]);
  });

  it('sorts by name ascending', async () => {
    const res = await get('/api/search?sort_by=name&sort_order=asc');
    expect(await resultUris(res)).toEqual([chartUri, mlUri, tableUri]);
  });

  it('rejects a non-numeric limit', async () => {
    const res = await get('/api/search?limit=abc');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      results: [],
      total_count: 0,
      search_criteria: {},
      status: 'failed',
      error: 'Invalid limit: NaN',
    });
  });

  it('serves the popular view from access counts', async () => {
    await hub.read(chartUri);
    await hub.read(chartUri);
    await hub.read(tableUri);

    expect(await resultUris(await get('/api/search/popular'))).toEqual([chartUri, tableUri]);
  });

  it('serves the recent view with a limit', async () => {
    expect(await resultUris(await get('/api/search/recent?limit=2'))).toEqual([mlUri, chartUri]);
  });

  it('serves category and tag views', async () => {
    expect(await resultUris(await get('/api/search/category/analytics'))).toEqual([mlUri]);
    expect(await resultUris(await get('/api/search/tags?tags=machine-learning,financial'))).toEqual([mlUri, tableUri]);
  });

  it('requires tags for the tag view', async () => {
    const res = await get('/api/search/tags');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Query parameter "tags" is required' });
  });
});
