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
 * Plugin component contract
 *
 * A plugin provides either a legacy KnowledgeRetriever or a full RAGEngine.
 * The host tells them apart by `kind` alone.
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import type { IEmbedder, IVectorStore } from '../interfaces';
import {
  FileStream,
  FileStreamHandle,
  IngestionContext,
  IngestionResult,
  RetrievalContext,
  RetrievalResponse,
  RetrievalResultEntry,
  SettingsSchema,
} from '../models';

/**
 * Capabilities handed to one plugin instance, bound to one collection
 */
export interface HostServices {
  readonly embedder: IEmbedder;
  readonly vectorStore: IVectorStore;
  readonly collectionId: string;

  /**
   * Open a file for reading. Every successful call must be matched by
   * exactly one `closeFileStream`.
   */
  getFileStream(storagePath: string): Promise<FileStream>;

  closeFileStream(handle: FileStreamHandle): Promise<void>;
}

/**
 * Legacy retrieval-only component.
 * Configuration is opaque to the host.
 */
export interface KnowledgeRetriever {
  readonly kind: 'KnowledgeRetriever';
  readonly name: string;

  /**
   * Results ordered by ascending distance
   */
  retrieve(context: RetrievalContext): Promise<RetrievalResultEntry[]>;
}

/**
 * Full-lifecycle RAG engine.
 *
 * Lifecycle hooks are optional; an engine that omits one gets no-op behaviour.
 */
export interface RAGEngine {
  readonly kind: 'RAGEngine';
  readonly name: string;
  readonly version?: string;

  /**
   * Called once when a knowledge base using this engine is created.
   * `config` has already been validated against the creation settings schema.
   */
  onKnowledgeBaseCreate?(knowledgeBaseId: string, config: Record<string, unknown>): Promise<void>;

  /**
   * Called when a knowledge base is deleted. Release engine-side state only;
   * the host removes the collection's vectors afterwards.
   */
  onKnowledgeBaseDelete?(knowledgeBaseId: string): Promise<void>;

  /**
   * Read, parse, chunk, embed and store one document.
   * The file stream is released and partial writes are rolled back on every failure path.
   *
   * @throws ParsingError, ChunkingError, HostServiceError or IngestionError
   */
  ingest(context: IngestionContext): Promise<IngestionResult>;

  /**
   * Remove every chunk of a document.
   * Resolves false when nothing was stored for it.
   *
   * @throws HostServiceError when the underlying delete fails
   */
  deleteDocument(knowledgeBaseId: string, documentId: string): Promise<boolean>;

  /**
   * @throws RetrievalError or HostServiceError
   */
  retrieve(context: RetrievalContext): Promise<RetrievalResponse>;

  /**
   * JSON Schema (Draft-7) of the knowledge base creation settings.
   * Pure and stable for a given engine version.
   */
  getCreationSettingsSchema(): SettingsSchema;

  /**
   * JSON Schema (Draft-7) of `RetrievalContext.settings`.
   */
  getRetrievalSettingsSchema(): SettingsSchema;
}

export type PluginComponent = KnowledgeRetriever | RAGEngine;

/**
 * Registration entry for a component implementation
 */
export interface ComponentDefinition<C extends PluginComponent = PluginComponent> {
  readonly kind: C['kind'];
  readonly name: string;
  readonly description?: string;
  create(host: HostServices, logger: Logger): C;
}

export function isRAGEngine(component: PluginComponent): component is RAGEngine {
  return component.kind === 'RAGEngine';
}
