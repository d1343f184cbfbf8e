/**
 * ArtifactStore - Main entry point for resource storage
 *
 * Owns the in-memory index of resource records, the per-type payload files and
 * the metadata snapshot. Lifecycle: init() → load snapshot (or start empty) →
 * serve → close() for a final flush.
 */

import fs from 'fs/promises';
import path from 'path';
import {
  Logger,
  METADATA_FILENAME,
  ResolvedStoreConfig,
  StoreConfig,
  resolveStoreConfig,
} from './config.js';
import { Result, StorageError, errorCode } from './errors.js';
import { ContentSummary, enrich } from './enrichment/index.js';
import { renderResource } from './format.js';
import { computeExpiresAt, findExpired, ttlHoursToMs } from './lifecycle/expiry.js';
import { MutationLock } from './lifecycle/mutation-lock.js';
import {
  ChartMetadata,
  JsonObject,
  MetadataOverrides,
  MlMetadata,
  ReadOptions,
  ResourceListing,
  ResourceRecord,
  ResourceType,
  SchemaDocument,
  StoreInput,
  TableMetadata,
  TablePayload,
} from './models.js';
import {
  buildResourceUri,
  resolvePayloadPath,
  resolveSchemaUri,
  validateResourceId,
} from './resource-uri.js';
import { toSchemaDocument } from './schema-document.js';
import { readSnapshot, writeSnapshot } from './snapshot.js';

/**
 * Read-only view of the index, consumed by the search layer
 */
export interface ResourceIndex {
  records(): readonly ResourceRecord[];
}

/**
 * A deletion that could not be completed
 */
export interface DeletionFailure {
  uri: string;
  error: StorageError;
}

/**
 * Outcome of a sweep or bulk deletion
 */
export interface DeletionReport {
  deleted: string[];
  errors: DeletionFailure[];
  executionTime: number; // milliseconds
}

export const RESOURCE_MIME_TYPE = 'application/json';

interface PreparedResource {
  record: ResourceRecord;
  payload: JsonObject | TablePayload | SchemaDocument;
}

export class ArtifactStore implements ResourceIndex {
  private readonly config: ResolvedStoreConfig;
  private readonly logger: Logger;
  private readonly lock = new MutationLock();
  private index: Map<string, ResourceRecord> = new Map();
  private ready: Promise<Result<number, StorageError>> | null = null;
  private backgroundJobInterval: NodeJS.Timeout | null = null;

  constructor(config: StoreConfig = {}) {
    this.config = resolveStoreConfig(config);
    this.logger = this.config.logger;
  }

  get storagePath(): string {
    return this.config.storagePath;
  }

  get snapshotPath(): string {
    return path.join(this.config.storagePath, METADATA_FILENAME);
  }

  get ttlMs(): number {
    return ttlHoursToMs(this.config.ttlHours);
  }

  /** Number of indexed records */
  get size(): number {
    return this.index.size;
  }

  /**
   * Load the snapshot once. Every public operation awaits this first.
   * Resolves to the number of records loaded.
   */
  init(): Promise<Result<number, StorageError>> {
    if (!this.ready) {
      this.ready = this.load();
    }
    return this.ready;
  }

  private async load(): Promise<Result<number, StorageError>> {
    try {
      await fs.mkdir(this.config.storagePath, { recursive: true });
    } catch (error) {
      this.logger.error('Could not create resource storage directory', {
        path: this.config.storagePath,
        error,
      });
      return {
        ok: false,
        error: {
          type: 'io',
          message: 'Could not create resource storage directory',
          path: this.config.storagePath,
          cause: error,
        },
      };
    }

    this.index = await readSnapshot(this.snapshotPath, this.ttlMs, this.logger);
    this.logger.info('Loaded resource metadata', {
      path: this.snapshotPath,
      count: this.index.size,
    });

    if (this.config.sweepIntervalMs !== null) {
      this.startBackgroundJobs();
    }

    return { ok: true, value: this.index.size };
  }

  /**
   * Stop background jobs and write the snapshot one last time
   */
  async close(): Promise<Result<void, StorageError>> {
    if (this.backgroundJobInterval !== null) {
      this.stopBackgroundJobs();
    }
    if (!this.ready) {
      return { ok: true, value: undefined };
    }
    await this.init();
    return this.lock.runExclusive(() => writeSnapshot(this.snapshotPath, this.index));
  }

  /**
   * Persist a typed payload with enriched metadata. Returns the new URI.
   */
  async store(input: StoreInput): Promise<Result<string, StorageError>> {
    await this.init();

    const prepared = this.prepare(input);
    if (!prepared.ok) {
      this.logger.error('Rejected resource', { type: input.type, error: prepared.error });
      return prepared;
    }
    const { record, payload } = prepared.value;

    return this.lock.runExclusive(async () => {
      const file = resolvePayloadPath(this.config.storagePath, record.type, record.uri);

      // Payload first, so a crash leaves an orphaned file rather than an orphaned entry
      try {
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(file, JSON.stringify(payload, null, 2), 'utf-8');
      } catch (error) {
        this.logger.error(`Error storing ${record.type} resource`, { uri: record.uri, path: file, error });
        return {
          ok: false,
          error: {
            type: 'io',
            message: `Failed to store ${record.type} resource`,
            path: file,
            cause: error,
          },
        };
      }

      this.index.set(record.uri, record);
      await this.persist();

      this.logger.info('Stored resource', { uri: record.uri, type: record.type });
      return { ok: true, value: record.uri };
    });
  }

  storeTable(
    payload: TablePayload,
    fields: { sqlQuery?: string | null; sourceSchemaUri?: string | null } = {},
    overrides: MetadataOverrides = {}
  ): Promise<Result<string, StorageError>> {
    return this.store({ type: 'table', payload, fields, ...overrides });
  }

  storeChart(
    payload: JsonObject,
    chartType: string,
    overrides: MetadataOverrides = {}
  ): Promise<Result<string, StorageError>> {
    return this.store({ type: 'chart', payload, fields: { chartType }, ...overrides });
  }

  storeMl(
    payload: JsonObject,
    mlType: string,
    overrides: MetadataOverrides = {}
  ): Promise<Result<string, StorageError>> {
    return this.store({ type: 'ml', payload, fields: { mlType }, ...overrides });
  }

  storeSchema(
    payload: SchemaDocument | JsonObject,
    schemaUri?: string | null,
    overrides: MetadataOverrides = {}
  ): Promise<Result<string, StorageError>> {
    return this.store({ type: 'schema', payload, fields: { schemaUri }, ...overrides });
  }

  /**
   * Sweep expired resources, then list what survives
   */
  async list(): Promise<ResourceListing[]> {
    await this.init();
    await this.sweepExpired();

    return [...this.index.values()].map((record) => ({
      uri: record.uri,
      name: record.name,
      description: describeListing(record),
      mimeType: RESOURCE_MIME_TYPE,
    }));
  }

  /**
   * Read a resource and record the access.
   * Returns the raw JSON payload, or a rendering that embeds the enriched metadata.
   */
  async read(uri: string, options: ReadOptions = {}): Promise<Result<string, StorageError>> {
    await this.init();

    return this.lock.runExclusive(async () => {
      const record = this.index.get(uri);
      if (!record) {
        return { ok: false, error: { type: 'not_found', resource: 'resource', id: uri } };
      }

      const file = resolvePayloadPath(this.config.storagePath, record.type, uri);
      let text: string;
      try {
        text = await fs.readFile(file, 'utf-8');
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          this.logger.warn('Resource file not found', { uri, path: file });
          return { ok: false, error: { type: 'payload_missing', uri, path: file } };
        }
        this.logger.error('Error reading resource', { uri, path: file, error });
        return {
          ok: false,
          error: { type: 'io', message: 'Failed to read resource', path: file, cause: error },
        };
      }

      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch (error) {
        this.logger.error('Resource payload is not valid JSON', { uri, path: file, error });
        return {
          ok: false,
          error: { type: 'io', message: 'Resource payload is not valid JSON', path: file, cause: error },
        };
      }

      const now = this.config.clock().toISOString();
      const tracked: ResourceRecord = {
        ...record,
        access_count: record.access_count + 1,
        last_accessed: record.last_accessed !== null && record.last_accessed > now ? record.last_accessed : now,
      };
      this.index.set(uri, tracked);
      await this.persist();

      return {
        ok: true,
        value: options.raw ? JSON.stringify(data, null, 2) : renderResource(tracked, data),
      };
    });
  }

  /**
   * Delete a resource. Resolves to false when the URI was not indexed.
   */
  async delete(uri: string): Promise<Result<boolean, StorageError>> {
    await this.init();

    return this.lock.runExclusive(async () => {
      const result = await this.remove(uri);
      if (result.ok && result.value) {
        await this.persist();
      }
      return result;
    });
  }

  /**
   * Delete every resource of one type
   */
  async deleteByType(type: ResourceType): Promise<DeletionReport> {
    await this.init();
    return this.lock.runExclusive(() =>
      this.removeMany([...this.index.values()].filter((r) => r.type === type).map((r) => r.uri))
    );
  }

  /**
   * Delete every resource
   */
  async deleteAll(): Promise<DeletionReport> {
    await this.init();
    return this.lock.runExclusive(() => this.removeMany([...this.index.keys()]));
  }

  /**
   * Delete every record older than the TTL. Safe to call redundantly.
   */
  async sweepExpired(): Promise<DeletionReport> {
    await this.init();
    return this.lock.runExclusive(async () => {
      const expired = findExpired(this.index.values(), this.config.clock(), this.ttlMs);
      const report = await this.removeMany(expired);
      if (report.deleted.length > 0 || report.errors.length > 0) {
        this.logger.info('Expired resources swept', {
          deleted: report.deleted.length,
          errors: report.errors.length,
          execution_time: report.executionTime,
        });
      }
      return report;
    });
  }

  /**
   * Look up a record without tracking access
   */
  get(uri: string): ResourceRecord | undefined {
    return this.index.get(uri);
  }

  records(): readonly ResourceRecord[] {
    return [...this.index.values()];
  }

  /**
   * Start the optional interval sweep
   */
  startBackgroundJobs(): void {
    const interval = this.config.sweepIntervalMs;
    if (interval === null) {
      this.logger.warn('No sweep interval configured, not starting background jobs');
      return;
    }

    if (this.backgroundJobInterval !== null) {
      this.logger.warn('Background jobs already running');
      return;
    }

    this.logger.info('Starting background expiry sweep', { sweep_interval: interval });
    this.backgroundJobInterval = setInterval(() => {
      this.sweepExpired().catch((error) => {
        this.logger.error('Background sweep failed', { error });
      });
    }, interval);
    this.backgroundJobInterval.unref();
  }

  stopBackgroundJobs(): void {
    if (this.backgroundJobInterval === null) {
      this.logger.warn('Background jobs not running');
      return;
    }

    this.logger.info('Stopping background expiry sweep');
    clearInterval(this.backgroundJobInterval);
    this.backgroundJobInterval = null;
  }

  private prepare(input: StoreInput): Result<PreparedResource, StorageError> {
    const now = this.config.clock();
    const base = {
      created_at: now.toISOString(),
      expires_at: computeExpiresAt(now, this.ttlMs),
      access_count: 0,
      last_accessed: null,
    };
    const overrides: MetadataOverrides = {
      name: input.name,
      description: input.description,
      tags: input.tags,
      category: input.category,
    };
    const scheme = this.config.uriScheme;

    switch (input.type) {
      case 'table': {
        const columns = Array.isArray(input.payload.columns) ? input.payload.columns : [];
        const rows = Array.isArray(input.payload.data) ? input.payload.data : [];
        const metadata: TableMetadata = {
          sql_query: input.fields.sqlQuery ?? null,
          columns,
          row_count: input.payload.row_count ?? rows.length,
          source_schema_uri: input.fields.sourceSchemaUri ?? null,
        };
        const summary: ContentSummary = {
          type: 'table',
          sqlQuery: metadata.sql_query,
          columns,
          rowCount: metadata.row_count,
        };
        return {
          ok: true,
          value: {
            record: {
              uri: buildResourceUri(scheme, 'table'),
              type: 'table',
              type_metadata: metadata,
              ...enrich(summary, overrides),
              ...base,
            },
            payload: input.payload,
          },
        };
      }
      case 'chart': {
        const metadata: ChartMetadata = { chart_type: input.fields.chartType };
        return {
          ok: true,
          value: {
            record: {
              uri: buildResourceUri(scheme, 'chart'),
              type: 'chart',
              type_metadata: metadata,
              ...enrich({ type: 'chart', chartType: metadata.chart_type }, overrides),
              ...base,
            },
            payload: input.payload,
          },
        };
      }
      case 'ml': {
        const metadata: MlMetadata = { ml_type: input.fields.mlType };
        return {
          ok: true,
          value: {
            record: {
              uri: buildResourceUri(scheme, 'ml'),
              type: 'ml',
              type_metadata: metadata,
              ...enrich({ type: 'ml', mlType: metadata.ml_type }, overrides),
              ...base,
            },
            payload: input.payload,
          },
        };
      }
      case 'schema': {
        const uri = resolveSchemaUri(scheme, input.fields.schemaUri);
        const id = validateResourceId(uri);
        if (!id.ok) {
          return id;
        }
        const schema = toSchemaDocument(input.payload);
        if (!schema) {
          return {
            ok: false,
            error: { type: 'validation', field: 'payload.tables', message: 'must be an object keyed by table name' },
          };
        }
        const tableNames = Object.keys(schema.tables);
        const databaseType = schema.database_type || 'unknown';
        return {
          ok: true,
          value: {
            record: {
              uri,
              type: 'schema',
              type_metadata: {
                database_type: databaseType,
                table_count: tableNames.length,
                connection_string: schema.connection_string ?? '',
              },
              ...enrich(
                { type: 'schema', databaseType, tableCount: tableNames.length, tableNames },
                overrides
              ),
              ...base,
            },
            payload: input.payload,
          },
        };
      }
    }
  }

  /**
   * Remove file and index entry. Caller holds the lock and persists afterwards.
   */
  private async remove(uri: string): Promise<Result<boolean, StorageError>> {
    const record = this.index.get(uri);
    if (!record) {
      return { ok: true, value: false };
    }

    const file = resolvePayloadPath(this.config.storagePath, record.type, uri);
    try {
      await fs.unlink(file);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.logger.warn('File not found while deleting resource', { uri, path: file });
      } else {
        this.logger.error('Failed to delete resource file', { uri, path: file, error });
        return {
          ok: false,
          error: { type: 'io', message: 'Failed to delete resource file', path: file, cause: error },
        };
      }
    }

    this.index.delete(uri);
    this.logger.info('Deleted resource', { uri });
    return { ok: true, value: true };
  }

  private async removeMany(uris: string[]): Promise<DeletionReport> {
    const startTime = Date.now();
    const report: DeletionReport = { deleted: [], errors: [], executionTime: 0 };

    for (const uri of uris) {
      const result = await this.remove(uri);
      if (!result.ok) {
        report.errors.push({ uri, error: result.error });
      } else if (result.value) {
        report.deleted.push(uri);
      }
    }

    if (report.deleted.length > 0) {
      await this.persist();
    }
    report.executionTime = Date.now() - startTime;
    return report;
  }

  /**
   * Write-through snapshot. Failures are logged; the in-memory index stays authoritative.
   */
  private async persist(): Promise<void> {
    const result = await writeSnapshot(this.snapshotPath, this.index);
    if (!result.ok) {
      this.logger.error('Could not save resource metadata', { path: this.snapshotPath, error: result.error });
    }
  }
}

/**
 * Listing description with category and tags folded in
 */
export function describeListing(record: ResourceRecord): string {
  const tags = record.tags.length > 0 ? record.tags.join(', ') : 'none';
  return `${record.description} | Category: ${record.category} | Tags: ${tags}`;
}
