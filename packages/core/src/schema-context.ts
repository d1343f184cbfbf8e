/**
 * Schema prompt context for SQL-generation collaborators
 */

import type { SchemaDocument } from '@ephemera/storage';

/**
 * Render the schema block appended to a SQL-generation prompt
 */
export function buildSchemaContext(schema: SchemaDocument): string {
    let context = '\n\nDatabase Schema Information:\n';
    context += `Database Type: ${schema.database_type || 'unknown'}\n`;
    context += 'Tables and their columns:\n';

    for (const [tableName, table] of Object.entries(schema.tables)) {
        context += `\nTable: ${tableName}\n`;
        for (const column of table.columns) {
            const pkMarker = column.primary_key ? ' (PRIMARY KEY)' : '';
            context += `  - ${column.name}: ${column.type}${pkMarker}\n`;
        }
    }

    if (schema.relationships.length > 0) {
        context += '\nTable Relationships:\n';
        for (const rel of schema.relationships) {
            context += `  - ${rel.table}.${rel.column} -> ${rel.references}\n`;
        }
    }

    return context;
}
