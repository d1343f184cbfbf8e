/**
 * @ephemera/core - Simple wrapper for the resource hub
 *
 * Get started in a few lines:
 * ```typescript
 * const hub = new ResourceHub({ storagePath: './data/resources' });
 * await hub.init();
 * const uri = await hub.storeChart({ series: [1, 2, 3] }, 'bar');
 * const results = hub.search({ query: 'bar' });
 * ```
 */

import {
    ArtifactStore,
    defaultLogger,
    loadStoreConfigFromEnv,
    parseRenderedSchema,
    toSchemaDocument,
    type DeletionReport,
    type JsonObject,
    type Logger,
    type MetadataOverrides,
    type ReadOptions,
    type ResourceListing,
    type ResourceType,
    type Result,
    type SchemaDocument,
    type StorageError,
    type StoreConfig,
    type StoreInput,
    type TablePayload,
} from '@ephemera/storage';
import { SearchEngine, type SearchCriteria, type SearchResponse } from '@ephemera/search';

export { buildSchemaContext } from './schema-context.js';

export type ResourceHubConfig = StoreConfig;

/**
 * ResourceHub - One store and its search view, wired together
 */
export class ResourceHub {
    readonly store: ArtifactStore;
    readonly searchEngine: SearchEngine;
    private readonly logger: Logger;

    constructor(config: ResourceHubConfig = {}) {
        this.logger = config.logger ?? defaultLogger;
        this.store = new ArtifactStore(config);
        this.searchEngine = new SearchEngine(this.store, { logger: this.logger });
    }

    /**
     * Build a hub from RESOURCE_* environment variables
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env, logger: Logger = defaultLogger): ResourceHub {
        return new ResourceHub(loadStoreConfigFromEnv(env, logger));
    }

    /**
     * Load the metadata snapshot. Resolves to the number of records loaded.
     */
    init(): Promise<Result<number, StorageError>> {
        return this.store.init();
    }

    /**
     * Stop background jobs and flush the snapshot
     */
    close(): Promise<Result<void, StorageError>> {
        return this.store.close();
    }

    storeResource(input: StoreInput): Promise<Result<string, StorageError>> {
        return this.store.store(input);
    }

    storeTable(
        payload: TablePayload,
        fields: { sqlQuery?: string | null; sourceSchemaUri?: string | null } = {},
        overrides: MetadataOverrides = {}
    ): Promise<Result<string, StorageError>> {
        return this.store.storeTable(payload, fields, overrides);
    }

    storeChart(payload: JsonObject, chartType: string, overrides: MetadataOverrides = {}): Promise<Result<string, StorageError>> {
        return this.store.storeChart(payload, chartType, overrides);
    }

    storeMl(payload: JsonObject, mlType: string, overrides: MetadataOverrides = {}): Promise<Result<string, StorageError>> {
        return this.store.storeMl(payload, mlType, overrides);
    }

    storeSchema(
        payload: SchemaDocument | JsonObject,
        schemaUri?: string | null,
        overrides: MetadataOverrides = {}
    ): Promise<Result<string, StorageError>> {
        return this.store.storeSchema(payload, schemaUri, overrides);
    }

    list(): Promise<ResourceListing[]> {
        return this.store.list();
    }

    read(uri: string, options: ReadOptions = {}): Promise<Result<string, StorageError>> {
        return this.store.read(uri, options);
    }

    delete(uri: string): Promise<Result<boolean, StorageError>> {
        return this.store.delete(uri);
    }

    deleteByType(type: ResourceType): Promise<DeletionReport> {
        return this.store.deleteByType(type);
    }

    deleteAll(): Promise<DeletionReport> {
        return this.store.deleteAll();
    }

    sweepExpired(): Promise<DeletionReport> {
        return this.store.sweepExpired();
    }

    search(criteria: SearchCriteria = {}): SearchResponse {
        return this.searchEngine.search(criteria);
    }

    popular(limit?: number): SearchResponse {
        return this.searchEngine.popular(limit);
    }

    recent(limit?: number): SearchResponse {
        return this.searchEngine.recent(limit);
    }

    byCategory(category: string, limit?: number): SearchResponse {
        return this.searchEngine.byCategory(category, limit);
    }

    byTags(tags: string[], limit?: number): SearchResponse {
        return this.searchEngine.byTags(tags, limit);
    }

    /**
     * Re-read a stored schema for a content consumer.
     * Counts as an access. Falls back to the rendered-text parser when the
     * payload is not a structured schema document.
     */
    async loadSchema(uri: string): Promise<Result<SchemaDocument, StorageError>> {
        const record = this.store.get(uri);
        if (record && record.type !== 'schema') {
            return {
                ok: false,
                error: { type: 'validation', field: 'uri', message: `${uri} is a ${record.type} resource, not a schema` },
            };
        }

        const content = await this.store.read(uri, { raw: true });
        if (!content.ok) {
            return content;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content.value);
        } catch (error) {
            this.logger.warn('Schema payload is not JSON, parsing rendered text', { uri, error });
            return { ok: true, value: parseRenderedSchema(content.value) };
        }

        const schema = toSchemaDocument(parsed);
        if (schema) {
            return { ok: true, value: schema };
        }

        if (typeof parsed === 'string') {
            this.logger.warn('Schema payload holds rendered text, parsing it', { uri });
            return { ok: true, value: parseRenderedSchema(parsed) };
        }

        return {
            ok: false,
            error: { type: 'validation', field: 'schema', message: `${uri} does not contain a schema document` },
        };
    }
}

export type { SearchCriteria, SearchResponse } from '@ephemera/search';
