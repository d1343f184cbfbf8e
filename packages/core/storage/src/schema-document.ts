/**
 * Runtime narrowing of payloads read back from disk
 */

import {
  JsonObject,
  JsonValue,
  SchemaColumn,
  SchemaDocument,
  SchemaForeignKey,
  SchemaRelationship,
  SchemaTable,
} from './models.js';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toColumn(value: JsonValue): SchemaColumn | null {
  if (!isJsonObject(value) || typeof value.name !== 'string') {
    return null;
  }
  const column: SchemaColumn = {
    name: value.name,
    type: typeof value.type === 'string' ? value.type : 'unknown',
  };
  if (typeof value.primary_key === 'boolean') column.primary_key = value.primary_key;
  if (typeof value.nullable === 'boolean') column.nullable = value.nullable;
  if (typeof value.unique === 'boolean') column.unique = value.unique;
  if (value.default !== undefined) column.default = value.default;
  return column;
}

function toForeignKey(value: JsonValue): SchemaForeignKey | null {
  if (
    !isJsonObject(value) ||
    typeof value.column !== 'string' ||
    typeof value.references_table !== 'string' ||
    typeof value.references_column !== 'string'
  ) {
    return null;
  }
  return {
    column: value.column,
    references_table: value.references_table,
    references_column: value.references_column,
  };
}

function toRelationship(value: JsonValue): SchemaRelationship | null {
  if (
    !isJsonObject(value) ||
    typeof value.table !== 'string' ||
    typeof value.column !== 'string' ||
    typeof value.references !== 'string'
  ) {
    return null;
  }
  return { table: value.table, column: value.column, references: value.references };
}

function compact<T>(items: Array<T | null>): T[] {
  return items.filter((item): item is T => item !== null);
}

function toTable(value: JsonValue): SchemaTable {
  if (!isJsonObject(value)) {
    return { columns: [] };
  }
  const table: SchemaTable = {
    columns: Array.isArray(value.columns) ? compact(value.columns.map(toColumn)) : [],
  };
  if (Array.isArray(value.primary_keys)) {
    table.primary_keys = value.primary_keys.filter((key): key is string => typeof key === 'string');
  }
  if (Array.isArray(value.foreign_keys)) {
    table.foreign_keys = compact(value.foreign_keys.map(toForeignKey));
  }
  if (Array.isArray(value.sample_data)) {
    table.sample_data = value.sample_data.filter(isJsonObject);
  }
  if (typeof value.row_count === 'number') {
    table.row_count = value.row_count;
  }
  return table;
}

/**
 * Narrow a parsed JSON value to a schema document, or null if it is not one
 */
export function toSchemaDocument(value: unknown): SchemaDocument | null {
  if (!isJsonObject(value) || !isJsonObject(value.tables)) {
    return null;
  }

  const tables: Record<string, SchemaTable> = {};
  for (const [name, table] of Object.entries(value.tables)) {
    tables[name] = toTable(table);
  }

  const document: SchemaDocument = {
    database_type: optionalString(value.database_type) ?? 'unknown',
    tables,
    relationships: Array.isArray(value.relationships) ? compact(value.relationships.map(toRelationship)) : [],
  };
  const connection = optionalString(value.connection_string);
  if (connection !== undefined) document.connection_string = connection;
  const discoveredAt = optionalString(value.discovered_at);
  if (discoveredAt !== undefined) document.discovered_at = discoveredAt;
  return document;
}
