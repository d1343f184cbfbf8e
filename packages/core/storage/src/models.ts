/**
 * Core data models for the artifact store
 */

/**
 * Any value that survives a JSON round trip
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Resource types - closed set, records never move between types
 */
export type ResourceType = 'table' | 'chart' | 'ml' | 'schema';

export const RESOURCE_TYPES: readonly ResourceType[] = ['table', 'chart', 'ml', 'schema'];

/**
 * Fixed category vocabulary derived from type
 */
export type ResourceCategory = 'data' | 'visualization' | 'analytics' | 'infrastructure' | 'general';

export const RESOURCE_CATEGORIES: readonly ResourceCategory[] = [
  'data',
  'visualization',
  'analytics',
  'infrastructure',
  'general',
];

/**
 * Type-specific metadata sub-records
 */
export interface TableMetadata {
  sql_query: string | null;
  columns: string[];
  row_count: number;
  source_schema_uri: string | null;
}

export interface ChartMetadata {
  chart_type: string;
}

export interface MlMetadata {
  ml_type: string;
}

export interface SchemaMetadata {
  database_type: string;
  table_count: number;
  connection_string: string;
}

/**
 * Fields shared by every record in the index
 */
interface ResourceRecordBase {
  uri: string;
  name: string;
  description: string;
  tags: string[];
  category: ResourceCategory;
  created_at: string; // ISO-8601
  expires_at: string; // ISO-8601
  access_count: number;
  last_accessed: string | null;
}

export interface TableRecord extends ResourceRecordBase {
  type: 'table';
  type_metadata: TableMetadata;
}

export interface ChartRecord extends ResourceRecordBase {
  type: 'chart';
  type_metadata: ChartMetadata;
}

export interface MlRecord extends ResourceRecordBase {
  type: 'ml';
  type_metadata: MlMetadata;
}

export interface SchemaRecord extends ResourceRecordBase {
  type: 'schema';
  type_metadata: SchemaMetadata;
}

/**
 * Metadata entry kept in the index, keyed by the `type` discriminant
 */
export type ResourceRecord = TableRecord | ChartRecord | MlRecord | SchemaRecord;

/**
 * Query result table as produced by the SQL execution collaborator
 */
export interface TablePayload {
  columns: string[];
  data: JsonObject[];
  row_count?: number;
  [key: string]: JsonValue | undefined;
}

export interface SchemaColumn {
  name: string;
  type: string;
  primary_key?: boolean;
  nullable?: boolean;
  unique?: boolean;
  default?: JsonValue;
}

export interface SchemaForeignKey {
  column: string;
  references_table: string;
  references_column: string;
}

export interface SchemaTable {
  columns: SchemaColumn[];
  primary_keys?: string[];
  foreign_keys?: SchemaForeignKey[];
  sample_data?: JsonObject[];
  row_count?: number;
}

export interface SchemaRelationship {
  table: string;
  column: string;
  references: string;
}

/**
 * Discovered database schema
 */
export interface SchemaDocument {
  database_type: string;
  connection_string?: string;
  tables: Record<string, SchemaTable>;
  relationships: SchemaRelationship[];
  discovered_at?: string;
}

/**
 * Caller-supplied overrides; each one replaces the derived value
 */
export interface MetadataOverrides {
  name?: string;
  description?: string;
  tags?: string[];
  category?: ResourceCategory;
}

/**
 * Store inputs, one variant per resource type
 */
export interface StoreTableInput extends MetadataOverrides {
  type: 'table';
  payload: TablePayload;
  fields: {
    sqlQuery?: string | null;
    sourceSchemaUri?: string | null;
  };
}

export interface StoreChartInput extends MetadataOverrides {
  type: 'chart';
  payload: JsonObject;
  fields: {
    chartType: string;
  };
}

export interface StoreMlInput extends MetadataOverrides {
  type: 'ml';
  payload: JsonObject;
  fields: {
    mlType: string;
  };
}

export interface StoreSchemaInput extends MetadataOverrides {
  type: 'schema';
  /** Written as given; must hold a `tables` object */
  payload: SchemaDocument | JsonObject;
  fields: {
    /** Caller-supplied URI or token; a fresh one is generated when absent */
    schemaUri?: string | null;
  };
}

export type StoreInput = StoreTableInput | StoreChartInput | StoreMlInput | StoreSchemaInput;

/**
 * Entry returned by list()
 */
export interface ResourceListing {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

/**
 * Options for read()
 */
export interface ReadOptions {
  raw?: boolean;
}
