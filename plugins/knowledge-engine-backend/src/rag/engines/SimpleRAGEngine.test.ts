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

import { describe, expect, it, jest } from '@jest/globals';
import { SimpleRAGEngine } from './SimpleRAGEngine';
import { IngestionContext } from '../../models';
import {
  ChunkingError,
  EmbeddingError,
  HostServiceError,
  IngestionError,
  ParsingError,
  RetrievalError,
  VectorStoreError,
} from '../../errors';
import { InMemoryVectorStore } from '../../services/InMemoryVectorStore';
import { ScopedHostServices } from '../../services/ScopedHostServices';
import { KeywordEmbedder, MemoryFileService, createTestLogger, repeatWord } from '../../testUtils';

const COLLECTION = 'kb_greek';
const KB_ID = 'greek';
const DOCUMENT = [repeatWord('alpha', 200), repeatWord('beta', 200), repeatWord('gamma', 200)].join(' ');

const setup = async (config: Record<string, unknown> = { index_mode: 'general', chunk_size: 256, chunk_overlap: 50 }) => {
  const logger = createTestLogger();
  const store = new InMemoryVectorStore(logger);
  await store.createCollection(COLLECTION);
  const files = new MemoryFileService();
  files.put('docs/letters.txt', DOCUMENT);
  const embedder = new KeywordEmbedder();
  const host = new ScopedHostServices({ collectionId: COLLECTION, embedder, vectorStore: store, fileService: files, logger });
  host.grantFile('docs/letters.txt');

  const engine = new SimpleRAGEngine(host, logger);
  await engine.onKnowledgeBaseCreate(KB_ID, config);

  return { store, files, embedder, host, engine };
};

const ingestion = (overrides: Partial<IngestionContext> = {}): IngestionContext => ({
  knowledgeBaseId: KB_ID,
  fileObject: { storagePath: 'docs/letters.txt', documentId: 'letters', fileName: 'letters.txt' },
  chunkingStrategy: {},
  ...overrides,
});

describe('SimpleRAGEngine', () => {
  describe('ingest', () => {
    it('chunks, embeds and stores a document', async () => {
      const { store, host, engine } = await setup();

      const result = await engine.ingest(ingestion({ metadata: { source: 'upload' } }));

      expect(result).toMatchObject({
        documentId: 'letters',
        status: 'success',
        chunksCreated: 3,
        metadata: { knowledgeBaseId: KB_ID, indexMode: 'general', chunkSize: 256, chunkOverlap: 50 },
      });
      expect(await store.count(COLLECTION)).toBe(3);
      expect(host.openStreamCount).toBe(0);

      const [hit] = await store.search(COLLECTION, [0, 1, 0, 0], 1, { chunkIndex: 1 });
      expect(hit.id).toBe(`letters:${result.metadata.ingestionId}:1`);
      expect(hit.metadata).toMatchObject({
        source: 'upload',
        documentId: 'letters',
        knowledgeBaseId: KB_ID,
        ingestionId: result.metadata.ingestionId,
        fileName: 'letters.txt',
        chunkIndex: 1,
        totalChunks: 3,
      });
      expect(String(hit.metadata.content).startsWith('beta')).toBe(true);
    });

    it('lets the chunking strategy override the knowledge base settings', async () => {
      const { engine } = await setup();

      const result = await engine.ingest(ingestion({ chunkingStrategy: { chunkSize: 100, chunkOverlap: 0 } }));

      expect(result.chunksCreated).toBe(6);
    });

    it('removes chunks left over from a longer previous version', async () => {
      const { store, files, engine } = await setup();
      await engine.ingest(ingestion());

      files.put('docs/letters.txt', repeatWord('delta', 100));
      const result = await engine.ingest(ingestion());

      expect(result.chunksCreated).toBe(1);
      expect(await store.count(COLLECTION)).toBe(1);
      expect(await store.count(COLLECTION, { ingestionId: String(result.metadata.ingestionId) })).toBe(1);
    });

    it('keeps the stored version when replacing it fails', async () => {
      const { store, files, engine } = await setup();
      const first = await engine.ingest(ingestion());
      files.put('docs/letters.txt', repeatWord('delta', 100));
      jest.spyOn(store, 'delete').mockRejectedValueOnce(new VectorStoreError('lock timeout'));

      await expect(engine.ingest(ingestion())).rejects.toThrow('Failed to store chunks: lock timeout');

      expect(await store.count(COLLECTION, { documentId: 'letters' })).toBe(3);
      expect(await store.count(COLLECTION, { ingestionId: String(first.metadata.ingestionId) })).toBe(3);
    });

    it('keeps the stored version when a re-ingest upsert fails', async () => {
      const { store, engine } = await setup();
      const first = await engine.ingest(ingestion());
      jest.spyOn(store, 'upsert').mockRejectedValueOnce(new VectorStoreError('disk full'));

      await expect(engine.ingest(ingestion())).rejects.toThrow('Failed to store chunks: disk full');

      expect(await store.count(COLLECTION)).toBe(3);
      expect(await store.count(COLLECTION, { ingestionId: String(first.metadata.ingestionId) })).toBe(3);
    });

    it('rejects binary documents and releases the stream', async () => {
      const { store, files, engine } = await setup();
      files.put('docs/letters.txt', Buffer.from([0x00, 0x01, 0x02]));

      await expect(engine.ingest(ingestion())).rejects.toBeInstanceOf(ParsingError);
      expect(files.openStreamCount).toBe(0);
      expect(await store.count(COLLECTION)).toBe(0);
    });

    it('rejects documents without text', async () => {
      const { files, engine } = await setup();
      files.put('docs/letters.txt', '   ');

      await expect(engine.ingest(ingestion())).rejects.toThrow('Document letters has no text content');
    });

    it('rejects unusable chunking strategies', async () => {
      const { engine } = await setup();

      await expect(engine.ingest(ingestion({ chunkingStrategy: { chunkSize: 10, chunkOverlap: 20 } }))).rejects.toBeInstanceOf(
        ChunkingError
      );
    });

    it('surfaces embedding failures as host errors and leaves nothing behind', async () => {
      const { store, files, embedder, engine } = await setup();
      jest.spyOn(embedder, 'embedDocuments').mockRejectedValueOnce(new EmbeddingError('model busy'));

      const error = await engine.ingest(ingestion()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HostServiceError);
      expect(error).toMatchObject({ message: 'Failed to store chunks: model busy', retryable: true });
      expect(files.openStreamCount).toBe(0);
      expect(await store.count(COLLECTION)).toBe(0);
    });

    it('rolls back earlier batches when a later upsert fails', async () => {
      const { store, engine } = await setup();
      const upsert = store.upsert.bind(store);
      jest
        .spyOn(store, 'upsert')
        .mockImplementationOnce(upsert)
        .mockRejectedValueOnce(new VectorStoreError('disk full'));

      const ingest = engine.ingest(ingestion({ chunkingStrategy: { chunkSize: 5, chunkOverlap: 0 } }));

      await expect(ingest).rejects.toThrow('Failed to store chunks: disk full');
      expect(await store.count(COLLECTION)).toBe(0);
    });

    it('stops between batches when cancelled and rolls back', async () => {
      const { store, files, embedder, engine } = await setup();
      const controller = new AbortController();
      const embed = embedder.embedDocuments.bind(embedder);
      jest.spyOn(embedder, 'embedDocuments').mockImplementation(async texts => {
        controller.abort();
        return embed(texts);
      });

      const error = await engine
        .ingest(ingestion({ chunkingStrategy: { chunkSize: 5, chunkOverlap: 0 }, signal: controller.signal }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IngestionError);
      expect(error).toMatchObject({ message: 'Ingestion cancelled' });
      expect(embedder.embedDocuments).toHaveBeenCalledTimes(1);
      expect(files.openStreamCount).toBe(0);
      expect(await store.count(COLLECTION)).toBe(0);
    });

    it('fails to read files the host did not grant', async () => {
      const { host, engine } = await setup();
      host.revokeFile('docs/letters.txt');

      await expect(engine.ingest(ingestion())).rejects.toMatchObject({
        name: 'HostServiceError',
        retryable: false,
      });
    });
  });

  describe('deleteDocument', () => {
    it('leaves the collection as it was before ingestion', async () => {
      const { store, engine } = await setup();
      const before = await store.count(COLLECTION);
      await engine.ingest(ingestion());

      expect(await engine.deleteDocument(KB_ID, 'letters')).toBe(true);
      expect(await store.count(COLLECTION)).toBe(before);
      expect(await engine.deleteDocument(KB_ID, 'letters')).toBe(false);
    });

    it('surfaces store failures', async () => {
      const { store, engine } = await setup();
      jest.spyOn(store, 'delete').mockRejectedValueOnce(new VectorStoreError('timeout'));

      await expect(engine.deleteDocument(KB_ID, 'letters')).rejects.toBeInstanceOf(HostServiceError);
    });
  });

  describe('retrieve', () => {
    const query = (text: string, settings: Record<string, unknown> = {}) => ({
      query: text,
      knowledgeBaseId: KB_ID,
      collectionId: COLLECTION,
      settings,
    });

    it('returns the closest chunks by ascending distance', async () => {
      const { engine } = await setup();
      await engine.ingest(ingestion());

      const response = await engine.retrieve(query('gamma', { top_k: 2 }));

      expect(response.results.map(entry => entry.metadata.chunkIndex)).toEqual([2, 1]);
      expect(response.results[0].distance).toBeCloseTo(0);
      expect(response.results[0].distance).toBeLessThan(response.results[1].distance);
      expect(response.results[0].content?.startsWith('gamma')).toBe(true);
      expect(response.results[0].metadata.content).toBeUndefined();
      expect(response.totalFound).toBe(2);
      expect(response.metadata.rerankApplied).toBe(false);
    });

    it('drops hits below the similarity threshold', async () => {
      const { engine } = await setup();
      await engine.ingest(ingestion());

      const response = await engine.retrieve(query('gamma', { top_k: 5, similarity_threshold: 0.5 }));

      expect(response.results.map(entry => entry.metadata.chunkIndex)).toEqual([2]);
      expect(response.totalFound).toBe(1);
    });

    it('widens the search when reranking', async () => {
      const { store, engine } = await setup();
      await engine.ingest(ingestion());
      const search = jest.spyOn(store, 'search');

      const response = await engine.retrieve(query('gamma', { top_k: 2, enable_rerank: true }));

      expect(search).toHaveBeenCalledWith(COLLECTION, [0, 0, 1, 0], 4, undefined);
      expect(response.metadata).toMatchObject({ rerankApplied: true, candidates: 3 });
      expect(response.results.map(entry => entry.metadata.chunkIndex)).toEqual([2, 1]);
      expect(response.results[0].score).toBeCloseTo(1);
    });

    it('rejects empty queries', async () => {
      const { engine } = await setup();

      await expect(engine.retrieve(query('   '))).rejects.toBeInstanceOf(RetrievalError);
    });

    it('surfaces embedding failures', async () => {
      const { embedder, engine } = await setup();
      jest.spyOn(embedder, 'embedQuery').mockRejectedValueOnce(new EmbeddingError('model busy'));

      await expect(engine.retrieve(query('gamma'))).rejects.toThrow('Failed to search knowledge base: model busy');
    });

    it('stops when cancelled', async () => {
      const { engine } = await setup();
      const controller = new AbortController();
      controller.abort();

      await expect(engine.retrieve({ ...query('gamma'), signal: controller.signal })).rejects.toThrow(
        'Retrieval cancelled'
      );
    });
  });

  describe('lifecycle', () => {
    it('returns the same schemas on every call', async () => {
      const { engine } = await setup();

      expect(engine.getCreationSettingsSchema()).toEqual(engine.getCreationSettingsSchema());
      expect(engine.getRetrievalSettingsSchema()).toEqual(engine.getRetrievalSettingsSchema());
      expect(engine.getCreationSettingsSchema().required).toEqual(['index_mode']);
    });

    it('rejects an overlap that is not smaller than the chunk size', async () => {
      await expect(setup({ index_mode: 'qa', chunk_size: 100, chunk_overlap: 100 })).rejects.toBeInstanceOf(
        ChunkingError
      );
    });

    it('forgets knowledge base settings on delete', async () => {
      const { engine } = await setup();

      await engine.onKnowledgeBaseDelete(KB_ID);

      // 600 words at the default 512/50 window
      expect((await engine.ingest(ingestion())).chunksCreated).toBe(2);
    });
  });
});
