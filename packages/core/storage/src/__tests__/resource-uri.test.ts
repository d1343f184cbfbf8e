import { describe, it, expect } from 'vitest';
import path from 'path';
import {
  buildResourceUri,
  resolvePayloadPath,
  resolveSchemaUri,
  uriTail,
  validateResourceId,
} from '../resource-uri.js';

describe('resource URIs', () => {
  it('builds URIs under the kind directory for each type', () => {
    expect(buildResourceUri('resource', 'table', 'abc')).toBe('resource://tables/abc');
    expect(buildResourceUri('resource', 'chart', 'abc')).toBe('resource://charts/abc');
    expect(buildResourceUri('resource', 'ml', 'abc')).toBe('resource://ml/abc');
    expect(buildResourceUri('resource', 'schema', 'abc')).toBe('resource://schemas/abc.json');
  });

  it('generates distinct identifiers', () => {
    expect(buildResourceUri('resource', 'table')).not.toBe(buildResourceUri('resource', 'table'));
  });

  it('keeps the .json tail of schema ids in the payload path', () => {
    expect(resolvePayloadPath('/data', 'schema', 'resource://schemas/main.json')).toBe(
      path.join('/data', 'schemas', 'main.json')
    );
    expect(resolvePayloadPath('/data', 'table', 'resource://tables/abc')).toBe(
      path.join('/data', 'tables', 'abc.json')
    );
    expect(resolvePayloadPath('/data', 'ml', 'resource://ml/abc')).toBe(path.join('/data', 'ml', 'abc.json'));
  });

  describe('resolveSchemaUri', () => {
    it('keeps a URI already under the schema kind', () => {
      expect(resolveSchemaUri('resource', 'resource://schemas/main.json')).toBe('resource://schemas/main.json');
    });

    it('appends .json to a bare token once', () => {
      expect(resolveSchemaUri('resource', 'warehouse')).toBe('resource://schemas/warehouse.json');
      expect(resolveSchemaUri('resource', 'warehouse.json')).toBe('resource://schemas/warehouse.json');
    });

    it('takes the last segment of a foreign URI', () => {
      expect(resolveSchemaUri('resource', 'file:///tmp/exports/sales')).toBe('resource://schemas/sales.json');
    });

    it('generates an id when nothing usable is supplied', () => {
      expect(resolveSchemaUri('resource', '  ')).toMatch(/^resource:\/\/schemas\/[0-9a-f-]{36}\.json$/);
      expect(resolveSchemaUri('resource', null)).toMatch(/^resource:\/\/schemas\/[0-9a-f-]{36}\.json$/);
    });
  });

  it('rejects ids that would leave the type directory', () => {
    expect(validateResourceId('resource://schemas/..').ok).toBe(false);
    expect(validateResourceId('resource://tables/').ok).toBe(false);
    expect(validateResourceId('resource://tables/a\\b').ok).toBe(false);
    expect(validateResourceId('resource://tables/abc')).toEqual({ ok: true, value: 'abc' });
  });

  it('returns the last path segment', () => {
    expect(uriTail('resource://charts/xyz')).toBe('xyz');
  });
});
