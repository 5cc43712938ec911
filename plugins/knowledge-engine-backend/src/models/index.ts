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
 * Domain models exchanged between the host and RAG plugins
 *
 * Scores are cosine similarities (higher is closer). Distances are
 * `1 - score` (lower is closer). Vector store searches are ordered by
 * descending score, retrieval results by ascending distance.
 *
 * @packageDocumentation
 */

import type { Readable } from 'stream';

/**
 * Free-form metadata attached to vectors and results
 */
export type Metadata = Record<string, unknown>;

/**
 * Embedding vector
 */
export type Vector = number[];

/**
 * Reference to a file held by the host storage subsystem.
 * `storagePath` is opaque to plugins.
 */
export interface FileObject {
  storagePath: string;
  documentId: string;
  fileName?: string;
  mimeType?: string;
}

/**
 * Chunking configuration handed to `ingest`. Keys are defined by each engine.
 */
export type ChunkingStrategy = Record<string, unknown>;

/**
 * Everything a plugin needs to ingest a single document
 */
export interface IngestionContext {
  knowledgeBaseId: string;
  fileObject: FileObject;
  chunkingStrategy: ChunkingStrategy;
  /** Stamped onto every stored chunk */
  metadata?: Metadata;
  signal?: AbortSignal;
}

export type IngestionStatus = 'success' | 'failure';

/**
 * Outcome of an ingestion, owned by the host after return
 */
export interface IngestionResult {
  documentId: string;
  status: IngestionStatus;
  chunksCreated: number;
  metadata: Metadata;
  errorMessage?: string;
}

/**
 * Runtime retrieval settings, described by the engine's retrieval schema
 */
export type RetrievalSettings = Record<string, unknown>;

/**
 * Query-time context, read-only to the plugin
 */
export interface RetrievalContext {
  readonly query: string;
  readonly knowledgeBaseId: string;
  readonly collectionId: string;
  readonly settings: Readonly<RetrievalSettings>;
  readonly signal?: AbortSignal;
}

/**
 * A single retrieved item
 */
export interface RetrievalResultEntry {
  readonly id: string;
  readonly metadata: Readonly<Metadata>;
  readonly distance: number;
  readonly score?: number;
  readonly content?: string;
}

export interface RetrievalResponseMetadata {
  tookMs?: number;
  rerankApplied?: boolean;
  [key: string]: unknown;
}

/**
 * Structured retrieval response returned by RAG engines
 */
export interface RetrievalResponse {
  results: RetrievalResultEntry[];
  totalFound: number;
  metadata: RetrievalResponseMetadata;
}

/**
 * Opaque token releasing a file stream
 */
export interface FileStreamHandle {
  readonly id: string;
  readonly storagePath: string;
}

/**
 * A readable stream paired with the handle that releases it
 */
export interface FileStream {
  stream: Readable;
  handle: FileStreamHandle;
}

/**
 * Raw vector store search hit
 */
export interface VectorSearchHit {
  id: string;
  score: number;
  metadata: Metadata;
}

export type FilterPrimitive = string | number | boolean;

/**
 * Comparison operators for a single metadata field. Every operator given must hold.
 */
export interface FilterCondition {
  $eq?: FilterPrimitive;
  $ne?: FilterPrimitive;
  $in?: FilterPrimitive[];
  $gt?: number;
  $gte?: number;
  $lt?: number;
  $lte?: number;
}

/**
 * Metadata filter: a primitive value means equality
 */
export type VectorFilter = Record<string, FilterPrimitive | FilterCondition>;

export type SchemaValueType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

/**
 * A property of a settings schema (JSON Schema Draft-7 subset)
 */
export type SettingsPropertySchema = {
  type: SchemaValueType;
  title?: string;
  description?: string;
  enum?: Array<string | number | boolean>;
  default?: unknown;
  minimum?: number;
  maximum?: number;
  items?: SettingsPropertySchema;
};

/**
 * Settings schema declared by an engine for creation or retrieval settings
 */
export type SettingsSchema = {
  $schema?: string;
  type: 'object';
  title?: string;
  description?: string;
  properties: Record<string, SettingsPropertySchema>;
  required?: string[];
  additionalProperties?: boolean;
};

export type ComponentKind = 'KnowledgeRetriever' | 'RAGEngine';

export type KnowledgeBaseState = 'created' | 'active' | 'deleted';

/**
 * Host-side record of a knowledge base
 */
export interface KnowledgeBase {
  id: string;
  engineName: string;
  kind: ComponentKind;
  collectionId: string;
  config: Record<string, unknown>;
  state: KnowledgeBaseState;
  documentCount: number;
  createdAt: Date;
}

/**
 * Ollama embed API response structure
 */
export interface OllamaEmbedResponse {
  model: string;
  embeddings: number[][];
}

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Vector store configuration
 */
export interface VectorStoreConfig {
  type: 'memory' | 'postgresql';
  postgresql?: PostgresConfig;
  /** Serve from memory when PostgreSQL cannot be initialized; off unless configured */
  fallbackToMemory?: boolean;
}

/**
 * Configuration for the knowledge engine host
 */
export interface KnowledgeEngineConfig {
  embeddingModel: string;
  ollamaBaseUrl: string;
  fileStorage: {
    rootDir: string;
  };
  vectorStore: VectorStoreConfig;
}
