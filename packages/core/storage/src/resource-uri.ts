/**
 * Resource URI construction and payload path resolution
 *
 * URIs have the form `<scheme>://<kind>/<id>`. Schema URIs keep their `.json`
 * tail in the id, so the payload file name is the id itself; every other type
 * gets `.json` appended by the store.
 */

import path from 'path';
import { randomUUID } from 'crypto';
import { ResourceType } from './models.js';
import { Result, StorageError } from './errors.js';

export const KIND_BY_TYPE: Record<ResourceType, string> = {
  table: 'tables',
  chart: 'charts',
  ml: 'ml',
  schema: 'schemas',
};

const JSON_SUFFIX = '.json';

/**
 * Last path segment of a URI
 */
export function uriTail(uri: string): string {
  const segments = uri.split('/');
  return segments[segments.length - 1];
}

/**
 * Build a fresh URI for a generated identifier
 */
export function buildResourceUri(scheme: string, type: ResourceType, id: string = randomUUID()): string {
  const tail = type === 'schema' ? `${id}${JSON_SUFFIX}` : id;
  return `${scheme}://${KIND_BY_TYPE[type]}/${tail}`;
}

/**
 * Resolve the URI for a schema, honouring a caller-supplied URI or token.
 *
 * - absent/blank: a generated `<uuid>.json` id
 * - a URI already under `<scheme>://schemas/`: kept verbatim
 * - anything else: its last segment, with `.json` appended once
 */
export function resolveSchemaUri(scheme: string, supplied?: string | null): string {
  const trimmed = supplied?.trim();
  if (!trimmed) {
    return buildResourceUri(scheme, 'schema');
  }

  const prefix = `${scheme}://${KIND_BY_TYPE.schema}/`;
  if (trimmed.startsWith(prefix) && !trimmed.slice(prefix.length).includes('/')) {
    return trimmed;
  }

  const tail = uriTail(trimmed);
  const id = tail.endsWith(JSON_SUFFIX) ? tail : `${tail}${JSON_SUFFIX}`;
  return `${prefix}${id}`;
}

/**
 * Reject ids that would escape the type directory
 */
export function validateResourceId(uri: string): Result<string, StorageError> {
  const id = uriTail(uri);
  if (!id || id === '.' || id === '..' || id.includes('\\')) {
    return {
      ok: false,
      error: {
        type: 'validation',
        field: 'uri',
        message: `Unsafe resource identifier in ${uri}`,
      },
    };
  }
  return { ok: true, value: id };
}

/**
 * On-disk location of a resource payload
 */
export function resolvePayloadPath(storagePath: string, type: ResourceType, uri: string): string {
  const id = uriTail(uri);
  const filename = type === 'schema' ? id : `${id}${JSON_SUFFIX}`;
  return path.join(storagePath, KIND_BY_TYPE[type], filename);
}
