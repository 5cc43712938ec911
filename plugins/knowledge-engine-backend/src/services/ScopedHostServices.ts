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
 * Collection-scoped HostServices handed to one plugin instance
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IEmbedder, IFileService, IVectorStore } from '../interfaces';
import { FileStream, FileStreamHandle, Metadata, Vector, VectorFilter, VectorSearchHit } from '../models';
import { CollectionNotFoundError, FileServiceError } from '../errors';
import { HostServices } from '../rag/types';

/**
 * Vector store view that only addresses the bound collection
 */
class CollectionScopedVectorStore implements IVectorStore {
  private readonly inner: IVectorStore;
  private readonly collectionId: string;

  constructor(inner: IVectorStore, collectionId: string) {
    this.inner = inner;
    this.collectionId = collectionId;
  }

  async upsert(collectionId: string, ids: string[], vectors: Vector[], metadata?: Metadata[]): Promise<void> {
    this.assertScope(collectionId);
    return this.inner.upsert(collectionId, ids, vectors, metadata);
  }

  async search(
    collectionId: string,
    queryVector: Vector,
    topK?: number,
    filters?: VectorFilter
  ): Promise<VectorSearchHit[]> {
    this.assertScope(collectionId);
    return this.inner.search(collectionId, queryVector, topK, filters);
  }

  async delete(collectionId: string, ids?: string[], filters?: VectorFilter): Promise<number> {
    this.assertScope(collectionId);
    return this.inner.delete(collectionId, ids, filters);
  }

  async count(collectionId: string, filters?: VectorFilter): Promise<number> {
    this.assertScope(collectionId);
    return this.inner.count(collectionId, filters);
  }

  private assertScope(collectionId: string): void {
    if (collectionId !== this.collectionId) {
      throw new CollectionNotFoundError(
        collectionId,
        `Collection ${collectionId} is outside the scope of this plugin instance (bound to ${this.collectionId})`
      );
    }
  }
}

export interface ScopedHostServicesOptions {
  collectionId: string;
  embedder: IEmbedder;
  vectorStore: IVectorStore;
  fileService: IFileService;
  logger: Logger;
}

/**
 * HostServices bound to a single collection.
 * Only files granted by the host can be opened.
 */
export class ScopedHostServices implements HostServices {
  readonly embedder: IEmbedder;
  readonly vectorStore: IVectorStore;
  readonly collectionId: string;

  private readonly fileService: IFileService;
  private readonly logger: Logger;
  private readonly grantedPaths: Map<string, number> = new Map();
  private readonly openHandles: Set<string> = new Set();

  constructor(options: ScopedHostServicesOptions) {
    this.collectionId = options.collectionId;
    this.embedder = options.embedder;
    this.vectorStore = new CollectionScopedVectorStore(options.vectorStore, options.collectionId);
    this.fileService = options.fileService;
    this.logger = options.logger;
  }

  /**
   * Allow the plugin to open a storage path. Grants are counted;
   * each one is withdrawn by a matching `revokeFile`.
   */
  grantFile(storagePath: string): void {
    this.grantedPaths.set(storagePath, (this.grantedPaths.get(storagePath) ?? 0) + 1);
  }

  revokeFile(storagePath: string): void {
    const grants = this.grantedPaths.get(storagePath) ?? 0;
    if (grants <= 1) {
      this.grantedPaths.delete(storagePath);
    } else {
      this.grantedPaths.set(storagePath, grants - 1);
    }
  }

  async getFileStream(storagePath: string): Promise<FileStream> {
    if (!this.grantedPaths.has(storagePath)) {
      throw new FileServiceError(`File ${storagePath} was not granted to collection ${this.collectionId}`, {
        retryable: false,
      });
    }

    const fileStream = await this.fileService.openStream(storagePath);
    this.openHandles.add(fileStream.handle.id);
    this.logger.debug(`[${this.collectionId}] Opened ${storagePath}`);
    return fileStream;
  }

  async closeFileStream(handle: FileStreamHandle): Promise<void> {
    if (!this.openHandles.has(handle.id)) {
      throw new FileServiceError(`Unknown or already closed file stream: ${handle.id}`, { retryable: false });
    }

    this.openHandles.delete(handle.id);
    await this.fileService.closeStream(handle);
    this.logger.debug(`[${this.collectionId}] Closed ${handle.storagePath}`);
  }

  /**
   * Streams opened through this instance and not yet closed
   */
  get openStreamCount(): number {
    return this.openHandles.size;
  }
}

/**
 * HostServices bound to no collection. Every capability fails.
 * Lets the host call pure methods such as schema getters before any knowledge base exists.
 */
export function detachedHostServices(): HostServices {
  const collectionId = '';
  const unavailable = async (): Promise<never> => {
    throw new CollectionNotFoundError(collectionId, 'No collection is bound to this plugin instance');
  };

  return {
    collectionId,
    embedder: {
      embedDocuments: unavailable,
      embedQuery: unavailable,
    },
    vectorStore: {
      upsert: unavailable,
      search: unavailable,
      delete: unavailable,
      count: unavailable,
    },
    getFileStream: unavailable,
    closeFileStream: unavailable,
  };
}
