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

import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import {
  ChunkingStrategy,
  IngestionContext,
  IngestionResult,
  Metadata,
  RetrievalContext,
  RetrievalResponse,
  RetrievalResultEntry,
  SettingsSchema,
  VectorSearchHit,
} from '../../models';
import { ChunkingError, IngestionError, ParsingError, RAGError, RetrievalError, errorMessage } from '../../errors';
import { DocumentProcessor } from '../DocumentProcessor';
import { readStream, toHostServiceError, withFileStream } from '../fileStreams';
import { HostServices, RAGEngine } from '../types';

export type IndexMode = 'general' | 'qa' | 'parent_child';

interface KnowledgeBaseSettings {
  indexMode: IndexMode;
  chunkSize: number;
  chunkOverlap: number;
}

const DEFAULT_SETTINGS: KnowledgeBaseSettings = {
  indexMode: 'general',
  chunkSize: 512,
  chunkOverlap: 50,
};

const DEFAULT_TOP_K = 5;
const UPSERT_BATCH_SIZE = 64;
const RERANK_WEIGHT = 0.3;

const CREATION_SCHEMA: SettingsSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  title: 'Simple engine settings',
  properties: {
    index_mode: {
      type: 'string',
      title: 'Index mode',
      enum: ['general', 'qa', 'parent_child'],
      default: 'general',
    },
    chunk_size: {
      type: 'integer',
      title: 'Chunk size (words)',
      minimum: 16,
      maximum: 2000,
      default: 512,
    },
    chunk_overlap: {
      type: 'integer',
      title: 'Chunk overlap (words)',
      minimum: 0,
      maximum: 500,
      default: 50,
    },
  },
  required: ['index_mode'],
  additionalProperties: false,
};

const RETRIEVAL_SCHEMA: SettingsSchema = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  title: 'Simple engine retrieval settings',
  properties: {
    top_k: {
      type: 'integer',
      title: 'Results to return',
      minimum: 1,
      maximum: 100,
      default: DEFAULT_TOP_K,
    },
    similarity_threshold: {
      type: 'number',
      title: 'Minimum similarity',
      minimum: 0,
      maximum: 1,
      default: 0,
    },
    enable_rerank: {
      type: 'boolean',
      title: 'Rerank by query term overlap',
      default: false,
    },
  },
  additionalProperties: false,
};

function numberSetting(settings: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = settings[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function isIndexMode(value: unknown): value is IndexMode {
  return value === 'general' || value === 'qa' || value === 'parent_child';
}

function queryTerms(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter(term => term.length > 1)
  );
}

/**
 * Reference RAG engine: word-window chunking, dense retrieval and optional
 * term-overlap reranking.
 */
export class SimpleRAGEngine implements RAGEngine {
  readonly kind = 'RAGEngine' as const;
  readonly name = 'simple';
  readonly version = '1.0.0';

  private readonly host: HostServices;
  private readonly logger: Logger;
  private readonly processor: DocumentProcessor;
  private readonly knowledgeBases: Map<string, KnowledgeBaseSettings> = new Map();

  constructor(host: HostServices, logger: Logger) {
    this.host = host;
    this.logger = logger;
    this.processor = new DocumentProcessor(logger);
  }

  async onKnowledgeBaseCreate(knowledgeBaseId: string, config: Record<string, unknown>): Promise<void> {
    const indexMode = isIndexMode(config.index_mode) ? config.index_mode : DEFAULT_SETTINGS.indexMode;
    const chunkSize = numberSetting(config, 'chunk_size') ?? DEFAULT_SETTINGS.chunkSize;
    const chunkOverlap = numberSetting(config, 'chunk_overlap') ?? DEFAULT_SETTINGS.chunkOverlap;

    if (chunkOverlap >= chunkSize) {
      throw new ChunkingError(`chunk_overlap (${chunkOverlap}) must be smaller than chunk_size (${chunkSize})`);
    }

    this.knowledgeBases.set(knowledgeBaseId, { indexMode, chunkSize, chunkOverlap });
    this.logger.info(`[SimpleRAG] Knowledge base ${knowledgeBaseId} ready (${indexMode}, ${chunkSize}/${chunkOverlap})`);
  }

  async onKnowledgeBaseDelete(knowledgeBaseId: string): Promise<void> {
    this.knowledgeBases.delete(knowledgeBaseId);
    this.logger.info(`[SimpleRAG] Released state of knowledge base ${knowledgeBaseId}`);
  }

  async ingest(context: IngestionContext): Promise<IngestionResult> {
    const startedAt = Date.now();
    const { knowledgeBaseId, fileObject, signal } = context;
    const { documentId } = fileObject;
    const settings = this.resolveChunking(knowledgeBaseId, context.chunkingStrategy);

    this.logger.info(`[SimpleRAG] Ingesting ${documentId} into ${knowledgeBaseId}`);
    this.checkIngestionCancelled(signal);

    let text: string;
    try {
      text = await withFileStream(this.host, fileObject.storagePath, this.logger, async stream => {
        const content = await readStream(stream);
        this.checkIngestionCancelled(signal);
        return this.processor.parse(content, fileObject.mimeType, fileObject.fileName);
      });
    } catch (error) {
      throw this.toIngestionFailure('read document', error);
    }

    const chunks = this.processor.chunk(text, settings);
    if (chunks.length === 0) {
      throw new ParsingError(`Document ${documentId} has no text content`);
    }

    // Ids are scoped to this attempt; the earlier version goes only after every upsert succeeded
    const ingestionId = randomUUID();
    const written: string[] = [];
    try {
      for (let start = 0; start < chunks.length; start += UPSERT_BATCH_SIZE) {
        this.checkIngestionCancelled(signal);

        const batch = chunks.slice(start, start + UPSERT_BATCH_SIZE);
        const vectors = await this.host.embedder.embedDocuments(batch);
        const ids = batch.map((_, offset) => `${documentId}:${ingestionId}:${start + offset}`);
        const metadata: Metadata[] = batch.map((content, offset) => ({
          ...context.metadata,
          documentId,
          knowledgeBaseId,
          ingestionId,
          ...(fileObject.fileName ? { fileName: fileObject.fileName } : {}),
          chunkIndex: start + offset,
          totalChunks: chunks.length,
          content,
        }));

        written.push(...ids);
        await this.host.vectorStore.upsert(this.host.collectionId, ids, vectors, metadata);
        this.logger.debug(`[SimpleRAG] Stored ${Math.min(start + batch.length, chunks.length)}/${chunks.length} chunks`);
      }

      const replaced = await this.host.vectorStore.delete(this.host.collectionId, undefined, {
        documentId,
        ingestionId: { $ne: ingestionId },
      });
      if (replaced > 0) {
        this.logger.debug(`[SimpleRAG] Replaced ${replaced} chunks of an earlier version of ${documentId}`);
      }
    } catch (error) {
      await this.rollback(documentId, written);
      throw this.toIngestionFailure('store chunks', error);
    }

    const tookMs = Date.now() - startedAt;
    this.logger.info(`[SimpleRAG] Ingested ${documentId}: ${chunks.length} chunks in ${tookMs}ms`);

    return {
      documentId,
      status: 'success',
      chunksCreated: chunks.length,
      metadata: {
        knowledgeBaseId,
        ingestionId,
        indexMode: settings.indexMode,
        chunkSize: settings.chunkSize,
        chunkOverlap: settings.chunkOverlap,
        characters: text.length,
        tookMs,
      },
    };
  }

  async deleteDocument(knowledgeBaseId: string, documentId: string): Promise<boolean> {
    let removed: number;
    try {
      removed = await this.host.vectorStore.delete(this.host.collectionId, undefined, { documentId });
    } catch (error) {
      throw toHostServiceError(`delete document ${documentId}`, error);
    }

    this.logger.info(`[SimpleRAG] Deleted ${removed} chunks of ${documentId} from ${knowledgeBaseId}`);
    return removed > 0;
  }

  async retrieve(context: RetrievalContext): Promise<RetrievalResponse> {
    const startedAt = Date.now();
    const query = context.query.trim();
    if (!query) {
      throw new RetrievalError('Query must not be empty');
    }

    const topK = numberSetting(context.settings, 'top_k') ?? DEFAULT_TOP_K;
    const threshold = numberSetting(context.settings, 'similarity_threshold') ?? 0;
    const rerank = context.settings.enable_rerank === true;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new RetrievalError(`top_k must be a positive integer, got ${topK}`);
    }

    this.logger.info(`[SimpleRAG] Retrieving context (topK=${topK}, rerank=${rerank})`);

    let candidates: VectorSearchHit[];
    try {
      const queryVector = await this.host.embedder.embedQuery(query);
      this.checkRetrievalCancelled(context.signal);
      candidates = await this.host.vectorStore.search(this.host.collectionId, queryVector, rerank ? topK * 2 : topK);
    } catch (error) {
      throw error instanceof RetrievalError ? error : toHostServiceError('search knowledge base', error);
    }

    let hits = candidates.filter(hit => hit.score >= threshold);
    if (rerank) {
      hits = this.rerank(query, hits);
    }

    const results = hits.slice(0, topK).map(hit => this.toEntry(hit));
    this.logger.info(`[SimpleRAG] Retrieved ${results.length} relevant chunks`);

    return {
      results,
      totalFound: hits.length,
      metadata: {
        tookMs: Date.now() - startedAt,
        rerankApplied: rerank,
        candidates: candidates.length,
        topK,
        similarityThreshold: threshold,
      },
    };
  }

  getCreationSettingsSchema(): SettingsSchema {
    return CREATION_SCHEMA;
  }

  getRetrievalSettingsSchema(): SettingsSchema {
    return RETRIEVAL_SCHEMA;
  }

  private resolveChunking(knowledgeBaseId: string, strategy: ChunkingStrategy): KnowledgeBaseSettings {
    const base = this.knowledgeBases.get(knowledgeBaseId) ?? DEFAULT_SETTINGS;
    return {
      indexMode: base.indexMode,
      chunkSize: numberSetting(strategy, 'chunkSize') ?? base.chunkSize,
      chunkOverlap: numberSetting(strategy, 'chunkOverlap') ?? base.chunkOverlap,
    };
  }

  private rerank(query: string, hits: VectorSearchHit[]): VectorSearchHit[] {
    const terms = queryTerms(query);
    if (terms.size === 0) {
      return hits;
    }

    return hits
      .map(hit => {
        const content = typeof hit.metadata.content === 'string' ? hit.metadata.content : '';
        const contentTerms = queryTerms(content);
        let matched = 0;
        terms.forEach(term => {
          if (contentTerms.has(term)) {
            matched++;
          }
        });
        const score = (1 - RERANK_WEIGHT) * hit.score + RERANK_WEIGHT * (matched / terms.size);
        return { ...hit, score };
      })
      .sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  private toEntry(hit: VectorSearchHit): RetrievalResultEntry {
    const { content, ...metadata } = hit.metadata;
    return {
      id: hit.id,
      metadata,
      score: hit.score,
      distance: 1 - hit.score,
      content: typeof content === 'string' ? content : undefined,
    };
  }

  private async rollback(documentId: string, ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    try {
      const removed = await this.host.vectorStore.delete(this.host.collectionId, ids);
      this.logger.warn(`[SimpleRAG] Rolled back ${removed} chunks of ${documentId}`);
    } catch (error) {
      this.logger.error(`[SimpleRAG] Rollback of ${documentId} failed: ${errorMessage(error)}`, { error });
    }
  }

  private toIngestionFailure(action: string, error: unknown): RAGError {
    if (error instanceof ParsingError || error instanceof ChunkingError || error instanceof IngestionError) {
      return error;
    }
    return toHostServiceError(action, error);
  }

  private checkIngestionCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new IngestionError('Ingestion cancelled', { cause: signal.reason });
    }
  }

  private checkRetrievalCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new RetrievalError('Retrieval cancelled', { cause: signal.reason });
    }
  }
}
