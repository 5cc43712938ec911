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
 * Knowledge base lifecycle service
 * Owns collections, plugin instances and their scoped host services
 *
 * @packageDocumentation
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import { IEmbedder, IFileService, IVectorStoreAdmin } from '../interfaces';
import {
  ChunkingStrategy,
  FileObject,
  IngestionResult,
  KnowledgeBase,
  Metadata,
  RetrievalResponse,
  RetrievalSettings,
} from '../models';
import {
  KnowledgeBaseNotFoundError,
  KnowledgeBaseStateError,
  SettingsValidationError,
  UnsupportedOperationError,
  errorMessage,
} from '../errors';
import { ComponentRegistry, ComponentSchemas, ComponentSummary } from '../rag/ComponentRegistry';
import { PluginComponent, RAGEngine, isRAGEngine } from '../rag/types';
import { ScopedHostServices } from './ScopedHostServices';
import { SchemaValidator } from './SchemaValidator';

const KNOWLEDGE_BASE_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export interface KnowledgeBaseServiceDependencies {
  logger: Logger;
  registry: ComponentRegistry;
  embedder: IEmbedder;
  vectorStore: IVectorStoreAdmin;
  fileService: IFileService;
  validator?: SchemaValidator;
}

export interface CreateKnowledgeBaseRequest {
  id?: string;
  engineName: string;
  config?: Record<string, unknown>;
}

export interface IngestOptions {
  chunkingStrategy?: ChunkingStrategy;
  metadata?: Metadata;
  signal?: AbortSignal;
}

interface KnowledgeBaseEntry {
  record: KnowledgeBase;
  component: PluginComponent;
  host: ScopedHostServices;
  documents: Set<string>;
  inFlight: number;
  deleting: boolean;
}

/**
 * Drives knowledge bases through created, active and deleted
 */
export class KnowledgeBaseService {
  private readonly logger: Logger;
  private readonly registry: ComponentRegistry;
  private readonly embedder: IEmbedder;
  private readonly vectorStore: IVectorStoreAdmin;
  private readonly fileService: IFileService;
  private readonly validator: SchemaValidator;
  private readonly entries: Map<string, KnowledgeBaseEntry> = new Map();
  private readonly creating: Set<string> = new Set();

  constructor(dependencies: KnowledgeBaseServiceDependencies) {
    this.logger = dependencies.logger;
    this.registry = dependencies.registry;
    this.embedder = dependencies.embedder;
    this.vectorStore = dependencies.vectorStore;
    this.fileService = dependencies.fileService;
    this.validator = dependencies.validator ?? new SchemaValidator(dependencies.logger);
  }

  /**
   * Create a knowledge base backed by a registered component
   *
   * @throws ComponentNotFoundError, SettingsValidationError, SchemaDefinitionError
   * or whatever the creation hook raises
   */
  async createKnowledgeBase(request: CreateKnowledgeBaseRequest): Promise<KnowledgeBase> {
    const id = request.id ?? randomUUID();
    if (!KNOWLEDGE_BASE_ID_PATTERN.test(id)) {
      throw new SettingsValidationError('Invalid knowledge base', [
        'id must be 1-64 characters of letters, digits, "_" or "-"',
      ]);
    }
    if (this.entries.has(id) || this.creating.has(id)) {
      throw new KnowledgeBaseStateError(`Knowledge base already exists: ${id}`);
    }

    const definition = this.registry.get(request.engineName);
    let config = request.config ?? {};
    const schemas = this.getEngineSchemas(request.engineName);
    if (schemas) {
      config = this.validator.validateSettings(schemas.creation, config);
    }

    const collectionId = `kb_${id}`;
    this.creating.add(id);
    try {
      await this.vectorStore.createCollection(collectionId);

      const host = new ScopedHostServices({
        collectionId,
        embedder: this.embedder,
        vectorStore: this.vectorStore,
        fileService: this.fileService,
        logger: this.logger,
      });

      let component: PluginComponent;
      try {
        component = this.registry.instantiate(definition.name, host, this.logger);
        if (isRAGEngine(component) && component.onKnowledgeBaseCreate) {
          await component.onKnowledgeBaseCreate(id, config);
        }
      } catch (error) {
        await this.discardCollection(collectionId);
        throw error;
      }

      const record: KnowledgeBase = {
        id,
        engineName: definition.name,
        kind: component.kind,
        collectionId,
        config,
        state: 'created',
        documentCount: 0,
        createdAt: new Date(),
      };
      this.entries.set(id, { record, component, host, documents: new Set(), inFlight: 0, deleting: false });
      this.logger.info(`Created knowledge base ${id} with ${component.kind} ${definition.name}`);

      return { ...record };
    } finally {
      this.creating.delete(id);
    }
  }

  /**
   * Ingest one document through the knowledge base's engine
   *
   * @throws UnsupportedOperationError for retriever-backed knowledge bases
   */
  async ingestDocument(knowledgeBaseId: string, fileObject: FileObject, options: IngestOptions = {}): Promise<IngestionResult> {
    const entry = this.getEntry(knowledgeBaseId);
    const engine = this.requireEngine(entry, 'ingest documents');
    this.assertNotDeleted(entry);

    entry.inFlight++;
    entry.host.grantFile(fileObject.storagePath);
    try {
      const result = await engine.ingest({
        knowledgeBaseId,
        fileObject,
        chunkingStrategy: options.chunkingStrategy ?? {},
        metadata: options.metadata,
        signal: options.signal,
      });

      if (result.status === 'success') {
        entry.documents.add(result.documentId);
        entry.record.documentCount = entry.documents.size;
        entry.record.state = 'active';
      }
      this.logger.info(`Ingested ${fileObject.documentId} into ${knowledgeBaseId}: ${result.status}, ${result.chunksCreated} chunks`);
      return result;
    } finally {
      entry.host.revokeFile(fileObject.storagePath);
      entry.inFlight--;
      if (entry.inFlight === 0 && entry.host.openStreamCount > 0) {
        this.logger.warn(
          `Engine ${engine.name} left ${entry.host.openStreamCount} file stream(s) open in ${knowledgeBaseId}`
        );
      }
    }
  }

  /**
   * Query a knowledge base. Settings are validated for engines and passed
   * untouched to retrievers.
   */
  async retrieve(
    knowledgeBaseId: string,
    query: string,
    settings: RetrievalSettings = {},
    signal?: AbortSignal
  ): Promise<RetrievalResponse> {
    const entry = this.getEntry(knowledgeBaseId);
    this.assertNotDeleted(entry);
    const { component, record } = entry;
    const startedAt = Date.now();

    if (isRAGEngine(component)) {
      const validated = this.validator.validateSettings(component.getRetrievalSettingsSchema(), settings);
      return component.retrieve({
        query,
        knowledgeBaseId,
        collectionId: record.collectionId,
        settings: validated,
        signal,
      });
    }

    const results = await component.retrieve({
      query,
      knowledgeBaseId,
      collectionId: record.collectionId,
      settings,
      signal,
    });
    return {
      results,
      totalFound: results.length,
      metadata: { legacy: true, tookMs: Date.now() - startedAt },
    };
  }

  async deleteDocument(knowledgeBaseId: string, documentId: string): Promise<boolean> {
    const entry = this.getEntry(knowledgeBaseId);
    const engine = this.requireEngine(entry, 'delete documents');
    this.assertNotDeleted(entry);

    const deleted = await engine.deleteDocument(knowledgeBaseId, documentId);
    entry.documents.delete(documentId);
    entry.record.documentCount = entry.documents.size;
    this.logger.info(`Deleted document ${documentId} from ${knowledgeBaseId}: ${deleted}`);
    return deleted;
  }

  /**
   * Remove a knowledge base and its collection. A knowledge base left in
   * state `deleted` by a failed drop can be deleted again; the engine hook
   * is not called a second time.
   *
   * @returns Number of vectors removed
   * @throws KnowledgeBaseStateError while ingestions or another deletion are running
   */
  async deleteKnowledgeBase(knowledgeBaseId: string): Promise<number> {
    const entry = this.getEntry(knowledgeBaseId);
    if (entry.deleting) {
      throw new KnowledgeBaseStateError(`Knowledge base ${knowledgeBaseId} is being deleted`);
    }
    if (entry.inFlight > 0) {
      throw new KnowledgeBaseStateError(
        `Knowledge base ${knowledgeBaseId} has ${entry.inFlight} ingestion(s) in progress`
      );
    }

    const { component, record } = entry;
    entry.deleting = true;
    try {
      if (record.state === 'deleted') {
        this.logger.info(`Resuming deletion of knowledge base ${knowledgeBaseId}`);
      } else {
        const previousState = record.state;
        record.state = 'deleted';
        try {
          if (isRAGEngine(component) && component.onKnowledgeBaseDelete) {
            await component.onKnowledgeBaseDelete(knowledgeBaseId);
          }
        } catch (error) {
          record.state = previousState;
          throw error;
        }
      }

      const removed = await this.vectorStore.dropCollection(record.collectionId);
      this.entries.delete(knowledgeBaseId);
      this.logger.info(`Deleted knowledge base ${knowledgeBaseId} (${removed} vectors)`);
      return removed;
    } finally {
      entry.deleting = false;
    }
  }

  getKnowledgeBase(knowledgeBaseId: string): KnowledgeBase {
    return { ...this.getEntry(knowledgeBaseId).record };
  }

  listKnowledgeBases(): KnowledgeBase[] {
    return Array.from(this.entries.values()).map(entry => ({ ...entry.record }));
  }

  /**
   * Grammar-checked settings schemas of an engine, null for retrievers
   */
  getEngineSchemas(engineName: string): ComponentSchemas | null {
    const schemas = this.registry.getSchemas(engineName);
    if (schemas) {
      this.validator.assertValidSchema(schemas.creation);
      this.validator.assertValidSchema(schemas.retrieval);
    }
    return schemas;
  }

  listEngines(): ComponentSummary[] {
    return this.registry.list();
  }

  private getEntry(knowledgeBaseId: string): KnowledgeBaseEntry {
    const entry = this.entries.get(knowledgeBaseId);
    if (!entry) {
      throw new KnowledgeBaseNotFoundError(knowledgeBaseId);
    }
    return entry;
  }

  private requireEngine(entry: KnowledgeBaseEntry, action: string): RAGEngine {
    const { component, record } = entry;
    if (!isRAGEngine(component)) {
      throw new UnsupportedOperationError(
        `Knowledge base ${record.id} uses retriever ${record.engineName}, which cannot ${action}`
      );
    }
    return component;
  }

  private assertNotDeleted(entry: KnowledgeBaseEntry): void {
    if (entry.record.state === 'deleted') {
      throw new KnowledgeBaseStateError(`Knowledge base ${entry.record.id} is being deleted`);
    }
  }

  private async discardCollection(collectionId: string): Promise<void> {
    try {
      await this.vectorStore.dropCollection(collectionId);
    } catch (error) {
      this.logger.error(`Failed to drop collection ${collectionId}: ${errorMessage(error)}`, { error });
    }
  }
}
