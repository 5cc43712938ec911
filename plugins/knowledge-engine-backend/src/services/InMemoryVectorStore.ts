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
 * In-memory vector store implementation
 * Provides collection-scoped vector storage and similarity search
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IVectorStoreAdmin } from '../interfaces';
import { Metadata, Vector, VectorFilter, VectorSearchHit } from '../models';
import { CollectionNotFoundError, VectorStoreError } from '../errors';
import { isEmptyFilter, matchesFilter } from './filters';

interface StoredVector {
  vector: Vector;
  metadata: Metadata;
}

/**
 * In-memory vector store using cosine similarity
 *
 * Note: For production use, replace with a persistent vector database
 * like PostgreSQL with pgvector
 */
export class InMemoryVectorStore implements IVectorStoreAdmin {
  private readonly logger: Logger;
  private readonly collections: Map<string, Map<string, StoredVector>> = new Map();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async createCollection(collectionId: string): Promise<void> {
    if (!this.collections.has(collectionId)) {
      this.collections.set(collectionId, new Map());
      this.logger.debug(`Created collection: ${collectionId}`);
    }
  }

  async dropCollection(collectionId: string): Promise<number> {
    const collection = this.collections.get(collectionId);
    if (!collection) {
      return 0;
    }

    const count = collection.size;
    this.collections.delete(collectionId);
    this.logger.info(`Dropped collection ${collectionId} with ${count} vectors`);
    return count;
  }

  async hasCollection(collectionId: string): Promise<boolean> {
    return this.collections.has(collectionId);
  }

  async upsert(collectionId: string, ids: string[], vectors: Vector[], metadata?: Metadata[]): Promise<void> {
    const collection = this.getCollection(collectionId);

    if (ids.length !== vectors.length || (metadata && metadata.length !== ids.length)) {
      throw new VectorStoreError(
        `ids, vectors and metadata must have equal lengths (ids=${ids.length}, vectors=${vectors.length}, metadata=${metadata?.length ?? 'none'})`,
        { retryable: false }
      );
    }

    // Whole batch is checked before any write
    const dimensions = this.dimensionsOf(collection);
    vectors.forEach((vector, index) => {
      const expected = dimensions ?? vectors[0].length;
      if (vector.length !== expected) {
        throw new VectorStoreError(
          `Vector ${ids[index]} has ${vector.length} dimensions, expected ${expected}`,
          { retryable: false }
        );
      }
    });

    ids.forEach((id, index) => {
      collection.set(id, {
        vector: [...vectors[index]],
        metadata: { ...(metadata?.[index] ?? {}) },
      });
    });

    this.logger.debug(`Upserted ${ids.length} vectors into ${collectionId}`);
  }

  async search(
    collectionId: string,
    queryVector: Vector,
    topK: number = 5,
    filters?: VectorFilter
  ): Promise<VectorSearchHit[]> {
    const collection = this.getCollection(collectionId);

    if (topK <= 0) {
      return [];
    }

    const hits: VectorSearchHit[] = [];
    for (const [id, stored] of collection) {
      if (!matchesFilter(stored.metadata, filters)) {
        continue;
      }
      hits.push({
        id,
        score: this.cosineSimilarity(queryVector, stored.vector),
        metadata: { ...stored.metadata },
      });
    }

    // Descending score, ties broken by id
    hits.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    const topHits = hits.slice(0, topK);

    this.logger.debug(`Found ${topHits.length} results in ${collectionId}`);
    return topHits;
  }

  async delete(collectionId: string, ids?: string[], filters?: VectorFilter): Promise<number> {
    const collection = this.getCollection(collectionId);

    const toDelete = new Set<string>();
    for (const id of ids ?? []) {
      if (collection.has(id)) {
        toDelete.add(id);
      }
    }
    if (!isEmptyFilter(filters)) {
      for (const [id, stored] of collection) {
        if (matchesFilter(stored.metadata, filters)) {
          toDelete.add(id);
        }
      }
    }

    toDelete.forEach(id => collection.delete(id));

    this.logger.debug(`Deleted ${toDelete.size} vectors from ${collectionId}`);
    return toDelete.size;
  }

  async count(collectionId: string, filters?: VectorFilter): Promise<number> {
    const collection = this.getCollection(collectionId);

    if (isEmptyFilter(filters)) {
      return collection.size;
    }

    let count = 0;
    for (const stored of collection.values()) {
      if (matchesFilter(stored.metadata, filters)) {
        count++;
      }
    }
    return count;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private getCollection(collectionId: string): Map<string, StoredVector> {
    const collection = this.collections.get(collectionId);
    if (!collection) {
      throw new CollectionNotFoundError(collectionId);
    }
    return collection;
  }

  private dimensionsOf(collection: Map<string, StoredVector>): number | undefined {
    for (const stored of collection.values()) {
      return stored.vector.length;
    }
    return undefined;
  }

  /**
   * Calculate cosine similarity between two vectors
   */
  private cosineSimilarity(a: Vector, b: Vector): number {
    if (a.length !== b.length) {
      throw new VectorStoreError(`Query vector has ${a.length} dimensions, stored vectors have ${b.length}`, {
        retryable: false,
      });
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      dotProduct += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);

    if (denominator === 0) {
      return 0;
    }

    return dotProduct / denominator;
  }
}
