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
 * Host capability interfaces
 *
 * Plugins reach these only through HostServices.
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  FileStream,
  FileStreamHandle,
  KnowledgeEngineConfig,
  Metadata,
  Vector,
  VectorFilter,
  VectorSearchHit,
} from '../models';

/**
 * Embedding generation provided by the host
 */
export interface IEmbedder {
  /**
   * Embed a batch of texts. Output index i belongs to input index i.
   * The batch fails as a whole with EmbeddingError.
   */
  embedDocuments(texts: string[]): Promise<Vector[]>;

  /**
   * Embed a single query text
   */
  embedQuery(text: string): Promise<Vector>;
}

/**
 * Vector storage provided by the host. Every call names its collection.
 */
export interface IVectorStore {
  /**
   * Insert or replace vectors by id. `ids`, `vectors` and `metadata` are parallel arrays.
   */
  upsert(collectionId: string, ids: string[], vectors: Vector[], metadata?: Metadata[]): Promise<void>;

  /**
   * At most `topK` hits by descending score, after applying `filters`
   */
  search(collectionId: string, queryVector: Vector, topK?: number, filters?: VectorFilter): Promise<VectorSearchHit[]>;

  /**
   * Delete by ids, by filter, or the union of both. Returns the number removed.
   */
  delete(collectionId: string, ids?: string[], filters?: VectorFilter): Promise<number>;

  /**
   * Count vectors matching `filters`, or the whole collection
   */
  count(collectionId: string, filters?: VectorFilter): Promise<number>;
}

/**
 * Collection administration, used by the host only
 */
export interface IVectorStoreAdmin extends IVectorStore {
  createCollection(collectionId: string): Promise<void>;

  /**
   * Remove a collection and its vectors. Returns the number of vectors removed.
   */
  dropCollection(collectionId: string): Promise<number>;

  hasCollection(collectionId: string): Promise<boolean>;

  healthCheck(): Promise<boolean>;
}

/**
 * File storage provided by the host
 */
export interface IFileService {
  openStream(storagePath: string): Promise<FileStream>;

  closeStream(handle: FileStreamHandle): Promise<void>;
}

/**
 * Interface for configuration management
 */
export interface IConfigService {
  getConfig(): KnowledgeEngineConfig;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}
