/**
 * Metadata snapshot - single JSON document holding every record keyed by URI
 *
 * Loading accepts both the current record shape and the older flat shape
 * (type-specific keys at top level, no enrichment or access fields).
 */

import fs from 'fs/promises';
import path from 'path';
import { Logger } from './config.js';
import { Result, StorageError, errorCode } from './errors.js';
import { ContentSummary, enrich } from './enrichment/index.js';
import { computeExpiresAt } from './lifecycle/expiry.js';
import {
  RESOURCE_CATEGORIES,
  RESOURCE_TYPES,
  ResourceCategory,
  ResourceRecord,
  ResourceType,
} from './models.js';
import { validateResourceId } from './resource-uri.js';

type UnknownRecord = Record<string, unknown>;

function isObject(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function asNullableString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function asCount(value: unknown): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : 0;
}

function asStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function isResourceType(value: unknown): value is ResourceType {
  return RESOURCE_TYPES.some((type) => type === value);
}

function isCategory(value: unknown): value is ResourceCategory {
  return RESOURCE_CATEGORIES.some((category) => category === value);
}

/**
 * Content summary for a stored record, used when enrichment must be re-derived
 */
export function summarizeRecord(record: ResourceRecord): ContentSummary {
  switch (record.type) {
    case 'table':
      return {
        type: 'table',
        sqlQuery: record.type_metadata.sql_query,
        columns: record.type_metadata.columns,
        rowCount: record.type_metadata.row_count,
      };
    case 'chart':
      return { type: 'chart', chartType: record.type_metadata.chart_type };
    case 'ml':
      return { type: 'ml', mlType: record.type_metadata.ml_type };
    case 'schema':
      return {
        type: 'schema',
        databaseType: record.type_metadata.database_type,
        tableCount: record.type_metadata.table_count,
        tableNames: [],
      };
  }
}

type RecordBase = Omit<ResourceRecord, 'type' | 'type_metadata'>;

function buildRecord(type: ResourceType, base: RecordBase, meta: UnknownRecord): ResourceRecord {
  switch (type) {
    case 'table':
      return {
        ...base,
        type: 'table',
        type_metadata: {
          sql_query: asNullableString(meta.sql_query),
          columns: asStringArray(meta.columns),
          row_count: asCount(meta.row_count),
          source_schema_uri: asNullableString(meta.source_schema_uri),
        },
      };
    case 'chart':
      return { ...base, type: 'chart', type_metadata: { chart_type: asString(meta.chart_type, 'unknown') } };
    case 'ml':
      return { ...base, type: 'ml', type_metadata: { ml_type: asString(meta.ml_type, 'unknown') } };
    case 'schema':
      return {
        ...base,
        type: 'schema',
        type_metadata: {
          database_type: asString(meta.database_type, 'unknown'),
          table_count: asCount(meta.table_count),
          connection_string: asString(meta.connection_string, ''),
        },
      };
  }
}

/**
 * Turn one snapshot entry into a typed record, or null when it is unusable
 */
export function normalizeRecord(uri: string, raw: unknown, ttlMs: number): ResourceRecord | null {
  if (!isObject(raw)) {
    return null;
  }
  const type = raw.type;
  if (!isResourceType(type) || !validateResourceId(uri).ok) {
    return null;
  }

  const meta = isObject(raw.type_metadata) ? raw.type_metadata : raw;
  const createdAt = asString(raw.created_at, new Date(0).toISOString());
  const createdDate = new Date(createdAt);
  const expiresAt = asString(
    raw.expires_at,
    computeExpiresAt(Number.isNaN(createdDate.getTime()) ? new Date(0) : createdDate, ttlMs)
  );

  const base: RecordBase = {
    uri,
    name: '',
    description: '',
    tags: [],
    category: 'general',
    created_at: createdAt,
    expires_at: expiresAt,
    access_count: asCount(raw.access_count),
    last_accessed: asNullableString(raw.last_accessed),
  };
  const record = buildRecord(type, base, meta);

  // Older entries carry no enrichment; derive whatever is missing
  const derived = enrich(summarizeRecord(record));
  record.name = typeof raw.name === 'string' ? raw.name : derived.name;
  record.description = typeof raw.description === 'string' ? raw.description : derived.description;
  record.tags = Array.isArray(raw.tags) ? [...new Set(asStringArray(raw.tags))] : derived.tags;
  record.category = isCategory(raw.category) ? raw.category : derived.category;

  return record;
}

/**
 * Load the snapshot. A missing or unreadable file yields an empty index.
 */
export async function readSnapshot(
  file: string,
  ttlMs: number,
  logger: Logger
): Promise<Map<string, ResourceRecord>> {
  const records = new Map<string, ResourceRecord>();

  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      logger.warn('Could not load resource metadata', { path: file, error });
    }
    return records;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    logger.warn('Could not load resource metadata', { path: file, error });
    return records;
  }

  if (!isObject(parsed)) {
    logger.warn('Resource metadata is not an object, starting empty', { path: file });
    return records;
  }

  for (const [uri, entry] of Object.entries(parsed)) {
    const record = normalizeRecord(uri, entry, ttlMs);
    if (record) {
      records.set(uri, record);
    } else {
      logger.warn('Skipping invalid metadata entry', { uri });
    }
  }

  return records;
}

/**
 * Write the full index. Goes through a temp file so readers never see half a snapshot.
 */
export async function writeSnapshot(
  file: string,
  records: ReadonlyMap<string, ResourceRecord>
): Promise<Result<void, StorageError>> {
  const tempFile = `${file}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(tempFile, JSON.stringify(Object.fromEntries(records), null, 2), 'utf-8');
    await fs.rename(tempFile, file);
    return { ok: true, value: undefined };
  } catch (error) {
    return {
      ok: false,
      error: {
        type: 'io',
        message: 'Could not save resource metadata',
        path: file,
        cause: error,
      },
    };
  }
}
