/**
 * Validation of store request bodies
 */

import {
  RESOURCE_CATEGORIES,
  RESOURCE_TYPES,
  isJsonObject,
  toSchemaDocument,
  type JsonObject,
  type MetadataOverrides,
  type ResourceCategory,
  type ResourceType,
  type Result,
  type StorageError,
  type StoreInput,
  type TablePayload,
} from '@ephemera/storage';

export function isResourceType(value: string): value is ResourceType {
  return RESOURCE_TYPES.some((type) => type === value);
}

function isCategory(value: unknown): value is ResourceCategory {
  return RESOURCE_CATEGORIES.some((category) => category === value);
}

function invalid(field: string, message: string): { ok: false; error: StorageError } {
  return { ok: false, error: { type: 'validation', field, message } };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

function parseOverrides(body: JsonObject): Result<MetadataOverrides, StorageError> {
  const overrides: MetadataOverrides = {};

  if (body.name !== undefined) {
    if (typeof body.name !== 'string') return invalid('name', 'must be a string');
    overrides.name = body.name;
  }
  if (body.description !== undefined) {
    if (typeof body.description !== 'string') return invalid('description', 'must be a string');
    overrides.description = body.description;
  }
  if (body.tags !== undefined) {
    const tags = body.tags;
    if (!Array.isArray(tags) || !tags.every((tag): tag is string => typeof tag === 'string')) {
      return invalid('tags', 'must be an array of strings');
    }
    overrides.tags = tags;
  }
  if (body.category !== undefined) {
    if (!isCategory(body.category)) {
      return invalid('category', `must be one of ${RESOURCE_CATEGORIES.join(', ')}`);
    }
    overrides.category = body.category;
  }

  return { ok: true, value: overrides };
}

/**
 * Turn a POST /resources/:type body into a store input
 */
export function parseStoreRequest(type: ResourceType, body: unknown): Result<StoreInput, StorageError> {
  if (!isJsonObject(body)) {
    return invalid('body', 'must be a JSON object');
  }
  if (!isJsonObject(body.payload)) {
    return invalid('payload', 'must be a JSON object');
  }
  const payload = body.payload;
  const fields = isJsonObject(body.fields) ? body.fields : {};

  const overrides = parseOverrides(body);
  if (!overrides.ok) {
    return overrides;
  }

  switch (type) {
    case 'table': {
      const columns = payload.columns;
      const data = payload.data;
      if (!Array.isArray(columns) || !columns.every((column): column is string => typeof column === 'string')) {
        return invalid('payload.columns', 'must be an array of strings');
      }
      if (!Array.isArray(data) || !data.every(isJsonObject)) {
        return invalid('payload.data', 'must be an array of row objects');
      }
      const tablePayload: TablePayload = { columns, data: data.filter(isJsonObject) };
      for (const [key, value] of Object.entries(payload)) {
        if (key !== 'columns' && key !== 'data' && key !== 'row_count') {
          tablePayload[key] = value;
        }
      }
      if (payload.row_count !== undefined) {
        if (typeof payload.row_count !== 'number') return invalid('payload.row_count', 'must be a number');
        tablePayload.row_count = payload.row_count;
      }
      return {
        ok: true,
        value: {
          type: 'table',
          payload: tablePayload,
          fields: {
            sqlQuery: nullableString(fields.sqlQuery),
            sourceSchemaUri: nullableString(fields.sourceSchemaUri),
          },
          ...overrides.value,
        },
      };
    }
    case 'chart': {
      const chartType = optionalString(fields.chartType);
      if (!chartType) return invalid('fields.chartType', 'is required');
      return { ok: true, value: { type: 'chart', payload, fields: { chartType }, ...overrides.value } };
    }
    case 'ml': {
      const mlType = optionalString(fields.mlType);
      if (!mlType) return invalid('fields.mlType', 'is required');
      return { ok: true, value: { type: 'ml', payload, fields: { mlType }, ...overrides.value } };
    }
    case 'schema': {
      // Validated only; stored as posted
      if (!toSchemaDocument(payload)) return invalid('payload.tables', 'must be an object keyed by table name');
      return {
        ok: true,
        value: { type: 'schema', payload, fields: { schemaUri: nullableString(fields.schemaUri) }, ...overrides.value },
      };
    }
  }
}
