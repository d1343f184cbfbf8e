/**
 * Search Engine - Read-only queries over the artifact index
 *
 * Every supplied filter must hold (AND). Sorting is stable, so records with
 * equal keys keep index order in both directions.
 */

import type { Logger, ResourceIndex, ResourceRecord } from '@ephemera/storage';
import { defaultLogger } from '@ephemera/storage';
import { fuzzyMatch } from './fuzzy-match.js';

export const DEFAULT_SEARCH_LIMIT = 50;
export const DEFAULT_VIEW_LIMIT = 10;

/**
 * Search criteria. Unset fields do not filter.
 */
export interface SearchCriteria {
  query?: string;
  /** Record must carry every tag */
  allTags?: string[];
  /** Record must carry at least one tag */
  anyTags?: string[];
  category?: string;
  type?: string;
  /** Inclusive lower bound on created_at (ISO-8601 string comparison) */
  createdAfter?: string;
  /** Inclusive upper bound on created_at */
  createdBefore?: string;
  minAccessCount?: number;
  /** 0 or less means unlimited. Default: 50 */
  limit?: number;
  /** created_at, name, access_count or last_accessed; any other field keeps index order. Default: created_at */
  sortBy?: string;
  /** 'desc' (any case) sorts descending, anything else ascending. Default: desc */
  sortOrder?: string;
}

/**
 * Criteria echoed back with the results, only those actually supplied
 */
export interface EchoedCriteria {
  query?: string;
  tags?: string[];
  any_tags?: string[];
  category?: string;
  resource_type?: string;
  created_after?: string;
  created_before?: string;
  min_access_count?: number;
}

export interface SearchResult {
  uri: string;
  name: string;
  description: string;
  tags: string[];
  category: string;
  type: string;
  created_at: string;
  access_count: number;
  last_accessed: string | null;
}

export interface SearchResponse {
  results: SearchResult[];
  total_count: number;
  search_criteria: EchoedCriteria;
  status: 'completed' | 'failed';
  error?: string;
}

export interface SearchEngineConfig {
  logger?: Logger;
}

type SortKey = string | number;

function sortKey(record: ResourceRecord, field: string): SortKey {
  switch (field) {
    case 'created_at':
      return record.created_at;
    case 'name':
      return record.name.toLowerCase();
    case 'access_count':
      return record.access_count;
    case 'last_accessed':
      return record.last_accessed ?? '';
    default:
      return '';
  }
}

function compareKeys(left: SortKey, right: SortKey): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

function hasText(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

function hasItems(value: string[] | undefined): value is string[] {
  return value !== undefined && value.length > 0;
}

export class SearchEngine {
  private readonly logger: Logger;

  constructor(
    private readonly index: ResourceIndex,
    config: SearchEngineConfig = {}
  ) {
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Filter, sort and truncate the index. Never throws.
   */
  search(criteria: SearchCriteria = {}): SearchResponse {
    const limit = criteria.limit ?? DEFAULT_SEARCH_LIMIT;
    const minAccessCount = criteria.minAccessCount ?? 0;

    if (!Number.isFinite(limit)) {
      return this.failed(`Invalid limit: ${limit}`);
    }
    if (!Number.isFinite(minAccessCount)) {
      return this.failed(`Invalid minAccessCount: ${minAccessCount}`);
    }

    try {
      const matched = this.index.records().filter((record) => this.matches(record, criteria, minAccessCount));

      const field = criteria.sortBy ?? 'created_at';
      const direction = (criteria.sortOrder ?? 'desc').toLowerCase() === 'desc' ? -1 : 1;
      const sorted = matched
        .map((record) => ({ record, key: sortKey(record, field) }))
        .sort((left, right) => direction * compareKeys(left.key, right.key))
        .map((entry) => entry.record);

      const limited = limit > 0 ? sorted.slice(0, limit) : sorted;
      const results = limited.map(toSearchResult);

      return {
        results,
        total_count: results.length,
        search_criteria: echoCriteria(criteria, minAccessCount),
        status: 'completed',
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Search failed', { error: message });
      return this.failed(message);
    }
  }

  /** Most-accessed resources */
  popular(limit: number = DEFAULT_VIEW_LIMIT): SearchResponse {
    return this.search({ minAccessCount: 1, sortBy: 'access_count', sortOrder: 'desc', limit });
  }

  /** Most recently created resources */
  recent(limit: number = DEFAULT_VIEW_LIMIT): SearchResponse {
    return this.search({ sortBy: 'created_at', sortOrder: 'desc', limit });
  }

  byCategory(category: string, limit: number = DEFAULT_SEARCH_LIMIT): SearchResponse {
    return this.search({ category, limit });
  }

  /** Resources carrying any of the tags */
  byTags(tags: string[], limit: number = DEFAULT_SEARCH_LIMIT): SearchResponse {
    return this.search({ anyTags: tags, limit });
  }

  private matches(record: ResourceRecord, criteria: SearchCriteria, minAccessCount: number): boolean {
    if (hasText(criteria.query) && !matchesText(record, criteria.query.toLowerCase())) {
      return false;
    }

    if (hasItems(criteria.allTags)) {
      const tags = new Set(record.tags);
      if (!criteria.allTags.every((tag) => tags.has(tag))) {
        return false;
      }
    }

    if (hasItems(criteria.anyTags)) {
      const tags = new Set(record.tags);
      if (!criteria.anyTags.some((tag) => tags.has(tag))) {
        return false;
      }
    }

    if (hasText(criteria.category) && record.category !== criteria.category) {
      return false;
    }

    if (hasText(criteria.type) && record.type !== criteria.type) {
      return false;
    }

    if (hasText(criteria.createdAfter) && record.created_at < criteria.createdAfter) {
      return false;
    }

    if (hasText(criteria.createdBefore) && record.created_at > criteria.createdBefore) {
      return false;
    }

    if (minAccessCount > 0 && record.access_count < minAccessCount) {
      return false;
    }

    return true;
  }

  private failed(error: string): SearchResponse {
    this.logger.warn('Rejected search criteria', { error });
    return { results: [], total_count: 0, search_criteria: {}, status: 'failed', error };
  }
}

/**
 * Fuzzy-match name, description and tags; for tables also the query text and columns
 */
function matchesText(record: ResourceRecord, query: string): boolean {
  const candidates = [record.name, record.description, ...record.tags];
  if (record.type === 'table') {
    candidates.push(record.type_metadata.sql_query ?? '', ...record.type_metadata.columns);
  }
  return candidates.some((candidate) => fuzzyMatch(candidate.toLowerCase(), query));
}

function toSearchResult(record: ResourceRecord): SearchResult {
  return {
    uri: record.uri,
    name: record.name,
    description: record.description,
    tags: [...record.tags],
    category: record.category,
    type: record.type,
    created_at: record.created_at,
    access_count: record.access_count,
    last_accessed: record.last_accessed,
  };
}

function echoCriteria(criteria: SearchCriteria, minAccessCount: number): EchoedCriteria {
  const echoed: EchoedCriteria = {};
  if (hasText(criteria.query)) echoed.query = criteria.query;
  if (hasItems(criteria.allTags)) echoed.tags = criteria.allTags;
  if (hasItems(criteria.anyTags)) echoed.any_tags = criteria.anyTags;
  if (hasText(criteria.category)) echoed.category = criteria.category;
  if (hasText(criteria.type)) echoed.resource_type = criteria.type;
  if (hasText(criteria.createdAfter)) echoed.created_after = criteria.createdAfter;
  if (hasText(criteria.createdBefore)) echoed.created_before = criteria.createdBefore;
  if (minAccessCount > 0) echoed.min_access_count = minAccessCount;
  return echoed;
}
