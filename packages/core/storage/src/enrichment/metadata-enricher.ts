/**
 * Metadata Enricher - Derives name, description, tags and category from resource content
 *
 * Pure functions only. Callers pass a small content summary, never the full payload.
 */

import { MetadataOverrides, ResourceCategory, ResourceType } from '../models.js';

/**
 * Type-specific content excerpt used for enrichment
 */
export type ContentSummary =
  | { type: 'table'; sqlQuery: string | null; columns: string[]; rowCount: number }
  | { type: 'chart'; chartType: string }
  | { type: 'ml'; mlType: string }
  | { type: 'schema'; databaseType: string; tableCount: number; tableNames: string[] };

/**
 * Enriched metadata attached to every record
 */
export interface EnrichedMetadata {
  name: string;
  description: string;
  tags: string[];
  category: ResourceCategory;
}

export const MAX_QUERY_PREVIEW_LENGTH = 100;

const CATEGORY_BY_TYPE: Record<ResourceType, ResourceCategory> = {
  table: 'data',
  chart: 'visualization',
  ml: 'analytics',
  schema: 'infrastructure',
};

const QUERY_TAG_RULES: ReadonlyArray<{ pattern: RegExp; tag: string }> = [
  { pattern: /select/, tag: 'query' },
  { pattern: /join/, tag: 'join' },
  { pattern: /group\s+by/, tag: 'aggregation' },
  { pattern: /order\s+by/, tag: 'sorted' },
  { pattern: /limit/, tag: 'limited' },
];

const COLUMN_TAG_RULES: ReadonlyArray<{ needles: string[]; tag: string }> = [
  { needles: ['id'], tag: 'identifier' },
  { needles: ['name'], tag: 'name' },
  { needles: ['date', 'time'], tag: 'temporal' },
  { needles: ['amount', 'price', 'cost'], tag: 'financial' },
  { needles: ['count', 'total'], tag: 'metrics' },
];

const FROM_TABLE_PATTERN = /\bfrom\s+[`"[]?([A-Za-z_][\w.$]*)/i;

/**
 * Capitalise the first letter of every alphabetic run, lower-case the rest
 */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

/**
 * Shorten query text for descriptions
 */
export function truncateQuery(query: string, maxLength: number = MAX_QUERY_PREVIEW_LENGTH): string {
  return query.length > maxLength ? `${query.slice(0, maxLength)}...` : query;
}

/**
 * Fixed type → category mapping
 */
export function deriveCategory(type: ResourceType): ResourceCategory {
  return CATEGORY_BY_TYPE[type] ?? 'general';
}

/**
 * Derive a display name
 */
export function deriveName(summary: ContentSummary): string {
  switch (summary.type) {
    case 'table':
      return deriveTableName(summary.sqlQuery);
    case 'schema':
      return `${titleCase(summary.databaseType)} Database Schema (${summary.tableCount} tables)`;
    case 'chart':
      return `${titleCase(summary.chartType)} Chart`;
    case 'ml':
      return `${titleCase(summary.mlType)} Model Results`;
  }
}

function deriveTableName(sqlQuery: string | null): string {
  if (!sqlQuery || !sqlQuery.trim()) {
    return 'Table Resource';
  }

  const match = FROM_TABLE_PATTERN.exec(sqlQuery);
  if (match) {
    return `${titleCase(match[1])} Query Results`;
  }

  if (/\bcount\b/i.test(sqlQuery)) {
    return 'Count Query Results';
  }
  if (/\b(sum|avg)\b/i.test(sqlQuery)) {
    return 'Aggregation Query Results';
  }
  return 'Data Query Results';
}

/**
 * Derive a one-paragraph description
 */
export function deriveDescription(summary: ContentSummary): string {
  switch (summary.type) {
    case 'table': {
      const counts = `Table with ${summary.rowCount} rows and ${summary.columns.length} columns.`;
      if (!summary.sqlQuery || !summary.sqlQuery.trim()) {
        return counts;
      }
      return `${counts} Query: ${truncateQuery(summary.sqlQuery.trim())}`;
    }
    case 'schema': {
      const { tableCount, tableNames } = summary;
      const base = `${titleCase(summary.databaseType)} database schema containing ${tableCount} tables`;
      if (tableNames.length === 0) {
        return `${base}.`;
      }
      const shown = tableNames.slice(0, 3).join(', ');
      const rest = tableCount > 3 ? ` and ${tableCount - 3} more` : '';
      return `${base}: ${shown}${rest}.`;
    }
    case 'chart':
      return `${titleCase(summary.chartType)} chart visualization.`;
    case 'ml':
      return `${titleCase(summary.mlType)} machine learning results.`;
  }
}

/**
 * Derive tags. Always contains the resource type.
 */
export function deriveTags(summary: ContentSummary): string[] {
  const tags = new Set<string>([summary.type]);

  switch (summary.type) {
    case 'table': {
      const query = (summary.sqlQuery ?? '').toLowerCase();
      for (const rule of QUERY_TAG_RULES) {
        if (rule.pattern.test(query)) {
          tags.add(rule.tag);
        }
      }
      for (const column of summary.columns) {
        const lowered = column.toLowerCase();
        for (const rule of COLUMN_TAG_RULES) {
          if (rule.needles.some((needle) => lowered.includes(needle))) {
            tags.add(rule.tag);
          }
        }
      }
      break;
    }
    case 'schema':
      tags.add(summary.databaseType.toLowerCase());
      tags.add('schema');
      if (summary.tableCount > 0) {
        tags.add('structured');
      }
      break;
    case 'chart':
      tags.add(summary.chartType.toLowerCase());
      tags.add('visualization');
      break;
    case 'ml':
      tags.add(summary.mlType.toLowerCase());
      tags.add('machine-learning');
      break;
  }

  return [...tags];
}

/**
 * Trim and de-duplicate caller-supplied tags
 */
export function normalizeTags(tags: readonly string[]): string[] {
  return [...new Set(tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0))];
}

/**
 * Full enrichment. Caller-supplied values replace derived ones (no merge).
 */
export function enrich(summary: ContentSummary, overrides: MetadataOverrides = {}): EnrichedMetadata {
  return {
    name: overrides.name ?? deriveName(summary),
    description: overrides.description ?? deriveDescription(summary),
    tags: overrides.tags !== undefined ? normalizeTags(overrides.tags) : deriveTags(summary),
    category: overrides.category ?? deriveCategory(summary.type),
  };
}
