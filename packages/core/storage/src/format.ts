/**
 * Human-readable rendering of stored resources
 */

import { JsonObject, JsonValue, ResourceRecord, SchemaDocument, TableRecord } from './models.js';
import { isJsonObject, toSchemaDocument } from './schema-document.js';

export const SAMPLE_ROW_LIMIT = 5;

const TITLE_BY_TYPE: Record<ResourceRecord['type'], string> = {
  table: 'Table',
  chart: 'Chart',
  ml: 'ML',
  schema: 'Database Schema',
};

function renderHeader(record: ResourceRecord): string {
  const tags = record.tags.length > 0 ? record.tags.join(', ') : 'none';
  return [
    `# ${TITLE_BY_TYPE[record.type]} Resource: ${record.name}`,
    '',
    `**URI:** ${record.uri}`,
    `**Description:** ${record.description}`,
    `**Category:** ${record.category}`,
    `**Tags:** ${tags}`,
    `**Created:** ${record.created_at}`,
    `**Expires:** ${record.expires_at}`,
    `**Access Count:** ${record.access_count}`,
    `**Last Accessed:** ${record.last_accessed ?? 'Never'}`,
    '',
    '',
  ].join('\n');
}

function renderJsonBlock(data: unknown): string {
  return `\`\`\`json\n${JSON.stringify(data, null, 2)}\n\`\`\`\n`;
}

function renderCell(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

function renderTable(record: TableRecord, data: unknown): string {
  const payload: JsonObject = isJsonObject(data) ? data : {};
  const columns = Array.isArray(payload.columns)
    ? payload.columns.filter((column): column is string => typeof column === 'string')
    : record.type_metadata.columns;
  const rows = Array.isArray(payload.data) ? payload.data.filter(isJsonObject) : [];
  const rowCount = typeof payload.row_count === 'number' ? payload.row_count : record.type_metadata.row_count;

  let formatted = `**SQL Query:** \`${record.type_metadata.sql_query ?? 'Unknown'}\`\n\n`;
  formatted += `**Columns:** ${columns.join(', ')}\n\n`;
  formatted += `**Row Count:** ${rowCount}\n\n`;

  if (rows.length > 0) {
    formatted += '**Sample Data:**\n';
    formatted += `| ${columns.join(' | ')} |\n`;
    formatted += `| ${columns.map(() => '---').join(' | ')} |\n`;

    for (const row of rows.slice(0, SAMPLE_ROW_LIMIT)) {
      formatted += `| ${columns.map((column) => renderCell(row[column])).join(' | ')} |\n`;
    }

    if (rows.length > SAMPLE_ROW_LIMIT) {
      formatted += `\n*... and ${rows.length - SAMPLE_ROW_LIMIT} more rows*\n`;
    }
  }

  return formatted;
}

/**
 * Schema body. Also the input format of parseRenderedSchema().
 */
export function renderSchemaBody(schema: SchemaDocument, connectionFallback = 'N/A'): string {
  const tableEntries = Object.entries(schema.tables);

  let formatted = `**Database Type:** ${schema.database_type}\n\n`;
  formatted += `**Connection String:** ${schema.connection_string || connectionFallback}\n\n`;
  formatted += `**Tables:** ${tableEntries.length}\n\n`;

  for (const [tableName, table] of tableEntries) {
    formatted += `## Table: ${tableName}\n\n`;
    formatted += '**Columns:**\n';
    for (const column of table.columns) {
      const pkMarker = column.primary_key ? ' (PRIMARY KEY)' : '';
      formatted += `- ${column.name}: ${column.type}${pkMarker}\n`;
    }

    const foreignKeys = table.foreign_keys ?? [];
    if (foreignKeys.length > 0) {
      formatted += '\n**Foreign Keys:**\n';
      for (const fk of foreignKeys) {
        formatted += `- ${fk.column} -> ${fk.references_table}.${fk.references_column}\n`;
      }
    }

    formatted += '\n';
  }

  if (schema.relationships.length > 0) {
    formatted += '## Table Relationships\n\n';
    for (const rel of schema.relationships) {
      formatted += `- ${rel.table}.${rel.column} -> ${rel.references}\n`;
    }
  }

  return formatted;
}

/**
 * Render a record and its payload for display
 */
export function renderResource(record: ResourceRecord, data: unknown): string {
  const header = renderHeader(record);

  switch (record.type) {
    case 'table':
      return header + renderTable(record, data);
    case 'chart':
      return `${header}**Chart Type:** ${record.type_metadata.chart_type}\n\n**Chart Data:**\n${renderJsonBlock(data)}`;
    case 'ml':
      return `${header}**ML Type:** ${record.type_metadata.ml_type}\n\n**Results:**\n${renderJsonBlock(data)}`;
    case 'schema': {
      const schema = toSchemaDocument(data);
      if (!schema) {
        return `${header}**Schema Data:**\n${renderJsonBlock(data)}`;
      }
      return header + renderSchemaBody(schema, record.type_metadata.connection_string || 'N/A');
    }
  }
}
