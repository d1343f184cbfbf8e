/**
 * Rendered schema recovery
 *
 * Best-effort parser for the human-readable schema produced by renderSchemaBody().
 * Lossy: column flags other than the primary-key marker, sample data and row
 * counts are not present in the text and come back empty. Use only when the
 * structured JSON payload is unavailable.
 */

import { SchemaDocument, SchemaTable } from './models.js';

type Section = 'none' | 'columns' | 'foreign_keys' | 'relationships';

const PRIMARY_KEY_MARKER = '(PRIMARY KEY)';

/**
 * Strip markdown bold markers from a "**Label:** value" line, returning the value
 */
function labelledValue(line: string, label: string): string | null {
  const match = new RegExp(`^(?:\\*\\*)?${label}:(?:\\*\\*)?\\s*(.*)$`).exec(line);
  return match ? match[1].trim() : null;
}

/**
 * Split "left -> right" around the arrow
 */
function splitArrow(text: string): [string, string] | null {
  const parts = text.split('->');
  if (parts.length !== 2) return null;
  const left = parts[0].trim();
  const right = parts[1].trim();
  return left && right ? [left, right] : null;
}

/**
 * Split "a.b" into exactly two non-empty parts
 */
function splitQualified(text: string): [string, string] | null {
  const parts = text.split('.');
  if (parts.length !== 2 || !parts[0].trim() || !parts[1].trim()) return null;
  return [parts[0].trim(), parts[1].trim()];
}

export function parseRenderedSchema(text: string): SchemaDocument {
  const schema: SchemaDocument = {
    database_type: 'unknown',
    tables: {},
    relationships: [],
  };

  let currentTable: SchemaTable | null = null;
  let section: Section = 'none';

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();

    if (line.startsWith('## Table Relationships')) {
      currentTable = null;
      section = 'relationships';
      continue;
    }

    if (line.startsWith('## Table:')) {
      const tableName = line.slice('## Table:'.length).trim();
      currentTable = { columns: [], foreign_keys: [] };
      schema.tables[tableName] = currentTable;
      section = 'none';
      continue;
    }

    if (line.startsWith('#')) {
      currentTable = null;
      section = 'none';
      continue;
    }

    const databaseType = labelledValue(line, 'Database Type');
    if (databaseType !== null) {
      schema.database_type = databaseType || 'unknown';
      continue;
    }

    const connection = labelledValue(line, 'Connection String');
    if (connection !== null) {
      if (connection && connection !== 'N/A') {
        schema.connection_string = connection;
      }
      continue;
    }

    if (currentTable && labelledValue(line, 'Columns') !== null) {
      section = 'columns';
      continue;
    }

    if (currentTable && labelledValue(line, 'Foreign Keys') !== null) {
      section = 'foreign_keys';
      continue;
    }

    if (line === '') {
      if (section === 'columns' || section === 'foreign_keys') {
        section = 'none';
      }
      continue;
    }

    if (!line.startsWith('- ')) {
      continue;
    }
    const item = line.slice(2);

    if (section === 'columns' && currentTable) {
      const colon = item.indexOf(':');
      if (colon <= 0) continue;
      const typePart = item.slice(colon + 1).trim();
      currentTable.columns.push({
        name: item.slice(0, colon).trim(),
        type: typePart.replace(PRIMARY_KEY_MARKER, '').trim(),
        primary_key: typePart.includes(PRIMARY_KEY_MARKER),
      });
    } else if (section === 'foreign_keys' && currentTable) {
      const sides = splitArrow(item);
      const target = sides ? splitQualified(sides[1]) : null;
      if (sides && target) {
        currentTable.foreign_keys?.push({
          column: sides[0],
          references_table: target[0],
          references_column: target[1],
        });
      }
    } else if (section === 'relationships') {
      const sides = splitArrow(item);
      const source = sides ? splitQualified(sides[0]) : null;
      if (sides && source && splitQualified(sides[1])) {
        schema.relationships.push({ table: source[0], column: source[1], references: sides[1] });
      }
    }
  }

  for (const table of Object.values(schema.tables)) {
    table.primary_keys = table.columns.filter((column) => column.primary_key).map((column) => column.name);
  }

  return schema;
}
