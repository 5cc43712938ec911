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

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { VectorSearchRetriever } from './VectorSearchRetriever';
import { CollectionNotFoundError, HostServiceError, RetrievalError } from '../../errors';
import { InMemoryVectorStore } from '../../services/InMemoryVectorStore';
import { ScopedHostServices } from '../../services/ScopedHostServices';
import { KeywordEmbedder, MemoryFileService, createTestLogger } from '../../testUtils';

describe('VectorSearchRetriever', () => {
  let store: InMemoryVectorStore;
  let retriever: VectorSearchRetriever;

  const context = (query: string, settings: Record<string, unknown> = {}) => ({
    query,
    knowledgeBaseId: 'legacy',
    collectionId: 'kb_legacy',
    settings,
  });

  beforeEach(async () => {
    const logger = createTestLogger();
    store = new InMemoryVectorStore(logger);
    await store.createCollection('kb_legacy');
    await store.upsert(
      'kb_legacy',
      ['a', 'b', 'c'],
      [
        [1, 0, 0, 0],
        [1, 1, 0, 0],
        [0, 0, 1, 0],
      ],
      [{ content: 'alpha' }, { content: 'alpha beta' }, {}]
    );
    const host = new ScopedHostServices({
      collectionId: 'kb_legacy',
      embedder: new KeywordEmbedder(),
      vectorStore: store,
      fileService: new MemoryFileService(),
      logger,
    });
    retriever = new VectorSearchRetriever(host, logger);
  });

  it('returns entries by ascending distance', async () => {
    const results = await retriever.retrieve(context('alpha'));

    expect(results.map(entry => entry.id)).toEqual(['a', 'b', 'c']);
    expect(results[0]).toMatchObject({ distance: 0, score: 1, content: 'alpha' });
    expect(results[1].distance).toBeCloseTo(1 - Math.SQRT1_2);
    expect(results[2]).toMatchObject({ distance: 1, content: undefined });
  });

  it('honours top_k', async () => {
    expect(await retriever.retrieve(context('alpha', { top_k: 1 }))).toHaveLength(1);
  });

  it('rejects empty queries', async () => {
    await expect(retriever.retrieve(context(''))).rejects.toBeInstanceOf(RetrievalError);
  });

  it('wraps store failures', async () => {
    jest.spyOn(store, 'search').mockRejectedValueOnce(new CollectionNotFoundError('kb_legacy'));

    const error = await retriever.retrieve(context('alpha')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HostServiceError);
    expect(error).toMatchObject({ retryable: false });
  });
});
