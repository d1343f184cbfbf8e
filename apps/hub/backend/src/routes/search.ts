import { Hono, type Context } from 'hono';
import type { ResourceHub, SearchCriteria, SearchResponse } from '@ephemera/core';
import type { ErrorResponse, SearchResourcesResponse } from '@ephemera/shared';

/**
 * Comma-separated list parameter
 */
function listParam(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function numberParam(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

function respond(c: Context, response: SearchResponse) {
  const body: SearchResourcesResponse = response;
  return c.json(body, response.status === 'failed' ? 400 : 200);
}

export function createSearchRoutes(hub: ResourceHub): Hono {
  const search = new Hono();

  /**
   * GET /api/search
   * Filtered, fuzzy search over resource metadata
   */
  search.get('/', (c) => {
    const criteria: SearchCriteria = {
      query: c.req.query('q') ?? c.req.query('query'),
      allTags: listParam(c.req.query('tags')),
      anyTags: listParam(c.req.query('any_tags')),
      category: c.req.query('category'),
      type: c.req.query('type'),
      createdAfter: c.req.query('created_after'),
      createdBefore: c.req.query('created_before'),
      minAccessCount: numberParam(c.req.query('min_access_count')),
      limit: numberParam(c.req.query('limit')),
      sortBy: c.req.query('sort_by'),
      sortOrder: c.req.query('sort_order'),
    };

    return respond(c, hub.search(criteria));
  });

  /**
   * GET /api/search/popular
   */
  search.get('/popular', (c) => {
    return respond(c, hub.popular(numberParam(c.req.query('limit'))));
  });

  /**
   * GET /api/search/recent
   */
  search.get('/recent', (c) => {
    return respond(c, hub.recent(numberParam(c.req.query('limit'))));
  });

  /**
   * GET /api/search/category/:category
   */
  search.get('/category/:category', (c) => {
    return respond(c, hub.byCategory(c.req.param('category'), numberParam(c.req.query('limit'))));
  });

  /**
   * GET /api/search/tags?tags=a,b
   * Resources carrying any of the tags
   */
  search.get('/tags', (c) => {
    const tags = listParam(c.req.query('tags'));
    if (!tags) {
      const body: ErrorResponse = { error: 'Query parameter "tags" is required' };
      return c.json(body, 400);
    }
    return respond(c, hub.byTags(tags, numberParam(c.req.query('limit'))));
  });

  return search;
}
