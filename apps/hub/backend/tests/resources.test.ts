import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ResourceHub } from '@ephemera/core';
import { createApp } from '../src/app.js';

const API_KEY = 'test-api-key';

/**
 * Pull one string field out of a JSON response body
 */
async function field(res: Response, name: string): Promise<string> {
  const body: unknown = await res.json();
  if (typeof body === 'object' && body !== null && name in body) {
    const value: unknown = Reflect.get(body, name);
    if (typeof value === 'string') {
      return value;
    }
  }
  throw new Error(`Response has no string field "${name}"`);
}

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

describe('resource routes', () => {
  let dir: string;
  let hub: ResourceHub;
  let app: ReturnType<typeof createApp>;

  const authed = (init: RequestInit = {}): RequestInit => ({
    ...init,
    headers: { Authorization: `Bearer ${API_KEY}`, 'Content-Type': 'application/json' },
  });

  const resourcePath = (uri: string) => `/api/resources/${encodeURIComponent(uri)}`;

  const storeChart = async () => {
    const res = await app.request(
      '/api/resources/chart',
      authed({
        method: 'POST',
        body: JSON.stringify({ payload: { labels: ['a', 'b'] }, fields: { chartType: 'bar' } }),
      })
    );
    expect(res.status).toBe(201);
    return field(res, 'uri');
  };

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.stubEnv('API_KEY', API_KEY);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hub-routes-test-'));
    hub = new ResourceHub({ storagePath: dir, logger: mockLogger });
    await hub.init();
    app = createApp(hub, { requestLogging: false });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await hub.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reports health without authentication', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', service: 'resource-hub', resources: 0 });
  });

  it('requires the API key', async () => {
    const missing = await app.request('/api/resources');
    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({ error: 'Missing Authorization header' });

    const wrong = await app.request('/api/resources', { headers: { Authorization: 'Bearer nope' } });
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: 'Invalid API key' });
  });

  it('only takes the key from a Bearer header', async () => {
    const query = await app.request(`/api/resources?token=${API_KEY}`);
    expect(query.status).toBe(401);
    expect(await query.json()).toEqual({ error: 'Missing Authorization header' });

    const basic = await app.request('/api/resources', { headers: { Authorization: `Basic ${API_KEY}` } });
    expect(basic.status).toBe(401);
    expect(await basic.json()).toEqual({ error: 'Authorization header must be "Bearer <key>"' });

    const lowercase = await app.request('/api/resources', { headers: { Authorization: `bearer ${API_KEY}` } });
    expect(lowercase.status).toBe(200);
  });

  it('stores and lists a resource', async () => {
    const uri = await storeChart();
    expect(uri).toMatch(/^resource:\/\/charts\//);

    const res = await app.request('/api/resources', authed());
    expect(await res.json()).toEqual({
      resources: [
        {
          uri,
          name: 'Bar Chart',
          description: 'Bar chart visualization. | Category: visualization | Tags: chart, bar, visualization',
          mimeType: 'application/json',
        },
      ],
    });
  });

  it('reads raw and rendered content', async () => {
    const uri = await storeChart();

    const raw = await app.request(`${resourcePath(uri)}?raw=true`, authed());
    expect(raw.status).toBe(200);
    expect(await raw.json()).toEqual({
      uri,
      mimeType: 'application/json',
      text: JSON.stringify({ labels: ['a', 'b'] }, null, 2),
    });

    const rendered = await app.request(resourcePath(uri), authed());
    const text = await field(rendered, 'text');
    expect(text.split('\n')[0]).toBe('# Chart Resource: Bar Chart');
    expect(text).toContain('**Access Count:** 2\n');

    const mime = await app.request(resourcePath(uri), authed());
    expect(await field(mime, 'mimeType')).toBe('text/markdown');
  });

  it('deletes idempotently and then reports not found', async () => {
    const uri = await storeChart();

    const first = await app.request(resourcePath(uri), authed({ method: 'DELETE' }));
    expect(await first.json()).toEqual({ uri, deleted: true });

    const second = await app.request(resourcePath(uri), authed({ method: 'DELETE' }));
    expect(await second.json()).toEqual({ uri, deleted: false });

    const read = await app.request(resourcePath(uri), authed());
    expect(read.status).toBe(404);
    expect(await read.json()).toEqual({ error: `Resource not found: ${uri}`, type: 'not_found' });
  });

  it('stores a schema under a caller-supplied token', async () => {
    const res = await app.request(
      '/api/resources/schema',
      authed({
        method: 'POST',
        body: JSON.stringify({
          payload: {
            database_type: 'sqlite',
            tables: { users: { columns: [{ name: 'id', type: 'INTEGER', primary_key: true }] } },
            relationships: [],
          },
          fields: { schemaUri: 'shop' },
        }),
      })
    );

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ uri: 'resource://schemas/shop.json', type: 'schema' });
    expect(hub.store.get('resource://schemas/shop.json')?.name).toBe('Sqlite Database Schema (1 tables)');
  });

  it('returns a posted schema unchanged on a raw read', async () => {
    const payload = {
      database_type: 'sqlite',
      tables: {
        users: {
          columns: [{ name: 'id', type: 'INTEGER', max_length: 8 }],
          indexes: ['ix_users_id'],
        },
      },
      relationships: [],
      schema_version: 3,
    };
    const stored = await app.request(
      '/api/resources/schema',
      authed({ method: 'POST', body: JSON.stringify({ payload }) })
    );
    const uri = await field(stored, 'uri');

    const raw = await app.request(`${resourcePath(uri)}?raw=true`, authed());
    expect(JSON.parse(await field(raw, 'text'))).toEqual(payload);
  });

  it('keeps a schema without database_type or relationships as posted', async () => {
    const payload = { tables: { events: { columns: [] } } };
    const stored = await app.request(
      '/api/resources/schema',
      authed({ method: 'POST', body: JSON.stringify({ payload }) })
    );
    const uri = await field(stored, 'uri');

    expect(hub.store.get(uri)?.name).toBe('Unknown Database Schema (1 tables)');
    const raw = await app.request(`${resourcePath(uri)}?raw=true`, authed());
    expect(JSON.parse(await field(raw, 'text'))).toEqual(payload);
  });

  it('rejects unknown types and invalid bodies', async () => {
    const unknown = await app.request('/api/resources/video', authed({ method: 'POST', body: '{}' }));
    expect(unknown.status).toBe(400);
    expect(await unknown.json()).toEqual({ error: 'Unknown resource type: video' });

    const missingKind = await app.request(
      '/api/resources/chart',
      authed({ method: 'POST', body: JSON.stringify({ payload: {} }) })
    );
    expect(missingKind.status).toBe(400);
    expect(await missingKind.json()).toEqual({ error: 'Invalid fields.chartType: is required', type: 'validation' });

    const malformed = await app.request('/api/resources/ml', authed({ method: 'POST', body: '{ nope' }));
    expect(malformed.status).toBe(400);
    expect(await field(malformed, 'error')).toBe('Request body must be valid JSON');
  });

  it('answers unknown routes with 404', async () => {
    const res = await app.request('/api/nowhere', authed());
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
