/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * PostgreSQL vector store implementation with pgvector
 * Provides persistent, collection-scoped vector storage and similarity search
 *
 * @packageDocumentation
 */

import { Pool, PoolClient } from 'pg';
import type { Logger } from 'winston';
import { IVectorStoreAdmin } from '../interfaces';
import { Metadata, PostgresConfig, Vector, VectorFilter, VectorSearchHit } from '../models';
import { CollectionNotFoundError, RAGError, VectorStoreError, errorMessage } from '../errors';
import { isFilterCondition } from './filters';

type SearchRow = {
  id: string;
  metadata: Metadata | null;
  score: number | string;
};

type CountRow = {
  count: string;
};

/**
 * Collects positional parameters while a query is assembled
 */
export class SqlParams {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

/**
 * Compile a metadata filter into a SQL predicate over the `metadata` JSONB column
 */
export function compileFilter(filter: VectorFilter, params: SqlParams): string {
  const clauses: string[] = [];

  for (const [key, expected] of Object.entries(filter)) {
    if (!isFilterCondition(expected)) {
      clauses.push(`metadata @> ${params.add(JSON.stringify({ [key]: expected }))}::jsonb`);
      continue;
    }

    if (expected.$eq !== undefined) {
      clauses.push(`metadata @> ${params.add(JSON.stringify({ [key]: expected.$eq }))}::jsonb`);
    }
    if (expected.$ne !== undefined) {
      clauses.push(`NOT (metadata @> ${params.add(JSON.stringify({ [key]: expected.$ne }))}::jsonb)`);
    }
    if (expected.$in !== undefined) {
      const options = expected.$in.map(value => `metadata @> ${params.add(JSON.stringify({ [key]: value }))}::jsonb`);
      clauses.push(options.length > 0 ? `(${options.join(' OR ')})` : 'FALSE');
    }

    const ranges: Array<[string, number | undefined]> = [
      ['>', expected.$gt],
      ['>=', expected.$gte],
      ['<', expected.$lt],
      ['<=', expected.$lte],
    ];
    for (const [operator, bound] of ranges) {
      if (bound === undefined) {
        continue;
      }
      const field = params.add(key);
      clauses.push(
        `CASE WHEN jsonb_typeof(metadata->${field}) = 'number' ` +
          `THEN (metadata->>${field})::numeric ${operator} ${params.add(bound)} ELSE FALSE END`
      );
    }
  }

  return clauses.length > 0 ? clauses.join(' AND ') : 'TRUE';
}

/**
 * PostgreSQL vector store using pgvector extension
 *
 * Features:
 * - One row per (collection, id) with JSONB metadata
 * - Transactional batch upserts
 * - Connection pooling
 */
export class PgVectorStore implements IVectorStoreAdmin {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private initialized: boolean = false;

  constructor(logger: Logger, config: PostgresConfig, pool?: Pool) {
    this.logger = logger;

    this.pool =
      pool ??
      new Pool({
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl ? { rejectUnauthorized: false } : false,
        max: config.maxConnections || 10,
        idleTimeoutMillis: config.idleTimeoutMillis || 30000,
        connectionTimeoutMillis: config.connectionTimeoutMillis || 5000,
      });

    // Handle pool errors
    this.pool.on('error', err => {
      this.logger.error('Unexpected PostgreSQL pool error', err);
    });
  }

  /**
   * Initialize the vector store (verify connection, extension and schema)
   * Should be called after construction
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug('PgVectorStore already initialized');
      return;
    }

    try {
      this.logger.info('Initializing PgVectorStore...');

      await this.withClient(async client => {
        await client.query('SELECT NOW()');

        const extension = await client.query<{ installed: boolean }>(
          "SELECT EXISTS(SELECT 1 FROM pg_extension WHERE extname = 'vector') as installed"
        );
        if (!extension.rows[0]?.installed) {
          throw new Error('pgvector extension is not installed. Please run: CREATE EXTENSION vector;');
        }

        const tables = await client.query<CountRow>(
          "SELECT COUNT(*) as count FROM information_schema.tables WHERE table_name IN ('vector_collections', 'embeddings')"
        );
        if (parseInt(tables.rows[0]?.count ?? '0', 10) !== 2) {
          throw new Error('Vector tables not found. Run migrations first.');
        }
      });

      this.initialized = true;
      this.logger.info('PgVectorStore initialized successfully');
    } catch (error) {
      this.logger.error('Failed to initialize PgVectorStore', error);
      throw new VectorStoreError(`PgVectorStore initialization failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async createCollection(collectionId: string): Promise<void> {
    this.ensureInitialized();

    await this.withClient(async client => {
      await client.query('INSERT INTO vector_collections (id) VALUES ($1) ON CONFLICT (id) DO NOTHING', [
        collectionId,
      ]);
    }, 'create collection');
    this.logger.debug(`Created collection: ${collectionId}`);
  }

  async dropCollection(collectionId: string): Promise<number> {
    this.ensureInitialized();

    const removed = await this.inTransaction(async client => {
      const result = await client.query('DELETE FROM embeddings WHERE collection_id = $1', [collectionId]);
      await client.query('DELETE FROM vector_collections WHERE id = $1', [collectionId]);
      return result.rowCount ?? 0;
    }, 'drop collection');

    this.logger.info(`Dropped collection ${collectionId} with ${removed} vectors`);
    return removed;
  }

  async hasCollection(collectionId: string): Promise<boolean> {
    this.ensureInitialized();

    return this.withClient(client => this.collectionExists(client, collectionId), 'check collection');
  }

  /**
   * Insert or replace vectors in a single transaction
   */
  async upsert(collectionId: string, ids: string[], vectors: Vector[], metadata?: Metadata[]): Promise<void> {
    this.ensureInitialized();

    if (ids.length !== vectors.length || (metadata && metadata.length !== ids.length)) {
      throw new VectorStoreError(
        `ids, vectors and metadata must have equal lengths (ids=${ids.length}, vectors=${vectors.length}, metadata=${metadata?.length ?? 'none'})`,
        { retryable: false }
      );
    }

    const dimensions = vectors[0]?.length;
    const mismatch = vectors.findIndex(vector => vector.length !== dimensions);
    if (mismatch >= 0) {
      throw new VectorStoreError(
        `Vector ${ids[mismatch]} has ${vectors[mismatch].length} dimensions, expected ${dimensions}`,
        { retryable: false }
      );
    }

    await this.inTransaction(async client => {
      await this.assertCollection(client, collectionId);

      if (ids.length === 0) {
        return;
      }

      // Writers to one collection are serialised so the first batch fixes its dimensions
      await client.query('SELECT id FROM vector_collections WHERE id = $1 FOR UPDATE', [collectionId]);
      const stored = await client.query<{ dimensions: number }>(
        'SELECT vector_dims(vector) AS dimensions FROM embeddings WHERE collection_id = $1 LIMIT 1',
        [collectionId]
      );
      const storedDimensions = stored.rows[0]?.dimensions;
      if (storedDimensions !== undefined && storedDimensions !== dimensions) {
        throw new VectorStoreError(
          `Collection ${collectionId} stores ${storedDimensions}-dimensional vectors, got ${dimensions}`,
          { retryable: false }
        );
      }

      const query = `
        INSERT INTO embeddings (collection_id, id, vector, metadata)
        VALUES ($1, $2, $3, $4)
        ON CONFLICT (collection_id, id)
        DO UPDATE SET
          vector = EXCLUDED.vector,
          metadata = EXCLUDED.metadata,
          updated_at = CURRENT_TIMESTAMP
      `;

      for (let i = 0; i < ids.length; i++) {
        await client.query(query, [
          collectionId,
          ids[i],
          this.vectorToSql(vectors[i]),
          JSON.stringify(metadata?.[i] ?? {}),
        ]);
      }
    }, 'upsert vectors');

    this.logger.debug(`Upserted ${ids.length} vectors into ${collectionId}`);
  }

  /**
   * Search for similar vectors using cosine similarity (pgvector `<=>` is cosine distance)
   */
  async search(
    collectionId: string,
    queryVector: Vector,
    topK: number = 5,
    filters?: VectorFilter
  ): Promise<VectorSearchHit[]> {
    this.ensureInitialized();

    return this.withClient(async client => {
      await this.assertCollection(client, collectionId);

      if (topK <= 0) {
        return [];
      }

      const params = new SqlParams();
      const collection = params.add(collectionId);
      const vector = params.add(this.vectorToSql(queryVector));
      const limit = params.add(topK);
      const where = filters ? compileFilter(filters, params) : 'TRUE';

      const query = `
        SELECT id, metadata, 1 - (vector <=> ${vector}) as score
        FROM embeddings
        WHERE collection_id = ${collection} AND ${where}
        ORDER BY vector <=> ${vector}, id
        LIMIT ${limit}
      `;

      const result = await client.query<SearchRow>(query, params.values);
      this.logger.debug(`Found ${result.rows.length} results in ${collectionId}`);

      return result.rows.map(row => ({
        id: row.id,
        score: typeof row.score === 'number' ? row.score : parseFloat(row.score),
        metadata: row.metadata ?? {},
      }));
    }, 'search vectors');
  }

  /**
   * Delete by ids, by filter, or both (union)
   */
  async delete(collectionId: string, ids?: string[], filters?: VectorFilter): Promise<number> {
    this.ensureInitialized();

    return this.withClient(async client => {
      await this.assertCollection(client, collectionId);

      const params = new SqlParams();
      const collection = params.add(collectionId);
      const predicates: string[] = [];

      if (ids && ids.length > 0) {
        predicates.push(`id = ANY(${params.add(ids)})`);
      }
      if (filters && Object.keys(filters).length > 0) {
        predicates.push(`(${compileFilter(filters, params)})`);
      }
      if (predicates.length === 0) {
        return 0;
      }

      const result = await client.query(
        `DELETE FROM embeddings WHERE collection_id = ${collection} AND (${predicates.join(' OR ')})`,
        params.values
      );
      const removed = result.rowCount ?? 0;

      this.logger.debug(`Deleted ${removed} vectors from ${collectionId}`);
      return removed;
    }, 'delete vectors');
  }

  async count(collectionId: string, filters?: VectorFilter): Promise<number> {
    this.ensureInitialized();

    return this.withClient(async client => {
      await this.assertCollection(client, collectionId);

      const params = new SqlParams();
      const collection = params.add(collectionId);
      const where = filters ? compileFilter(filters, params) : 'TRUE';

      const result = await client.query<CountRow>(
        `SELECT COUNT(*) as count FROM embeddings WHERE collection_id = ${collection} AND ${where}`,
        params.values
      );
      return parseInt(result.rows[0]?.count ?? '0', 10);
    }, 'count vectors');
  }

  /**
   * Close the connection pool
   * Should be called on application shutdown
   */
  async close(): Promise<void> {
    try {
      await this.pool.end();
      this.logger.info('PgVectorStore connection pool closed');
    } catch (error) {
      this.logger.error('Error closing PgVectorStore pool', error);
      throw error;
    }
  }

  /**
   * Health check for the vector store
   */
  async healthCheck(): Promise<boolean> {
    try {
      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
        return true;
      } finally {
        client.release();
      }
    } catch (error) {
      this.logger.error('Health check failed', error);
      return false;
    }
  }

  private async collectionExists(client: PoolClient, collectionId: string): Promise<boolean> {
    const result = await client.query<{ exists: boolean }>(
      'SELECT EXISTS(SELECT 1 FROM vector_collections WHERE id = $1) as exists',
      [collectionId]
    );
    return result.rows[0]?.exists === true;
  }

  private async assertCollection(client: PoolClient, collectionId: string): Promise<void> {
    if (!(await this.collectionExists(client, collectionId))) {
      throw new CollectionNotFoundError(collectionId);
    }
  }

  /**
   * Run work on a pooled client, converting driver failures into VectorStoreError
   */
  private async withClient<T>(work: (client: PoolClient) => Promise<T>, action?: string): Promise<T> {
    const client = await this.connect(action);
    try {
      return await work(client);
    } catch (error) {
      throw this.toStoreError(error, action);
    } finally {
      client.release();
    }
  }

  private async inTransaction<T>(work: (client: PoolClient) => Promise<T>, action: string): Promise<T> {
    const client = await this.connect(action);
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw this.toStoreError(error, action);
    } finally {
      client.release();
    }
  }

  private async connect(action?: string): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw this.toStoreError(error, action);
    }
  }

  private toStoreError(error: unknown, action?: string): Error {
    if (error instanceof RAGError || !action) {
      return error instanceof Error ? error : new Error(String(error));
    }
    this.logger.error(`Failed to ${action}`, error);
    return new VectorStoreError(`Failed to ${action}: ${errorMessage(error)}`, { cause: error });
  }

  /**
   * Convert number array to PostgreSQL vector format
   */
  private vectorToSql(vector: Vector): string {
    return `[${vector.join(',')}]`;
  }

  /**
   * Ensure the store is initialized
   */
  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new VectorStoreError('PgVectorStore not initialized. Call initialize() first.', { retryable: false });
    }
  }
}
