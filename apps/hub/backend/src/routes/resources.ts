/**
 * Resource routes
 */

import { Hono } from 'hono';
import type { ResourceHub } from '@ephemera/core';
import { RESOURCE_MIME_TYPE, describeStorageError, type StorageError } from '@ephemera/storage';
import type {
  DeleteResourceResponse,
  ErrorResponse,
  ListResourcesResponse,
  ReadResourceResponse,
  StoreResourceResponse,
} from '@ephemera/shared';
import { isResourceType, parseStoreRequest } from '../services/store-request.js';

const RENDERED_MIME_TYPE = 'text/markdown';

function errorBody(error: StorageError): ErrorResponse {
  return { error: describeStorageError(error), type: error.type };
}

/**
 * HTTP status for a storage error
 */
export function statusFor(error: StorageError): 400 | 404 | 500 {
  switch (error.type) {
    case 'not_found':
    case 'payload_missing':
      return 404;
    case 'validation':
      return 400;
    case 'io':
      return 500;
  }
}

export function createResourceRoutes(hub: ResourceHub): Hono {
  const resources = new Hono();

  /**
   * GET /api/resources
   * List live resources (expired ones are swept first)
   */
  resources.get('/', async (c) => {
    const listing = await hub.list();
    const body: ListResourcesResponse = { resources: listing };
    return c.json(body);
  });

  /**
   * GET /api/resources/:uri
   * Read a resource; ?raw=true returns the stored JSON payload
   */
  resources.get('/:uri', async (c) => {
    const uri = c.req.param('uri');
    const raw = c.req.query('raw') === 'true';

    const result = await hub.read(uri, { raw });
    if (!result.ok) {
      return c.json(errorBody(result.error), statusFor(result.error));
    }

    const body: ReadResourceResponse = {
      uri,
      mimeType: raw ? RESOURCE_MIME_TYPE : RENDERED_MIME_TYPE,
      text: result.value,
    };
    return c.json(body);
  });

  /**
   * DELETE /api/resources/:uri
   * Idempotent; deleting an unknown URI reports deleted: false
   */
  resources.delete('/:uri', async (c) => {
    const uri = c.req.param('uri');

    const result = await hub.delete(uri);
    if (!result.ok) {
      return c.json(errorBody(result.error), statusFor(result.error));
    }

    const body: DeleteResourceResponse = { uri, deleted: result.value };
    return c.json(body);
  });

  /**
   * POST /api/resources/:type
   * Store a table, chart, ml or schema payload
   */
  resources.post('/:type', async (c) => {
    const type = c.req.param('type');
    if (!isResourceType(type)) {
      const body: ErrorResponse = { error: `Unknown resource type: ${type}` };
      return c.json(body, 400);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      return c.json({
        error: 'Request body must be valid JSON',
        message: error instanceof Error ? error.message : 'Unknown error',
      }, 400);
    }

    const input = parseStoreRequest(type, body);
    if (!input.ok) {
      return c.json(errorBody(input.error), 400);
    }

    const result = await hub.storeResource(input.value);
    if (!result.ok) {
      return c.json(errorBody(result.error), statusFor(result.error));
    }

    const response: StoreResourceResponse = { uri: result.value, type };
    return c.json(response, 201);
  });

  return resources;
}
