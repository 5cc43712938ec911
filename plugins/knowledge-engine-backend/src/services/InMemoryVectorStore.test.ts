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

import { beforeEach, describe, expect, it } from '@jest/globals';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { CollectionNotFoundError, VectorStoreError } from '../errors';
import { createTestLogger } from '../testUtils';

describe('InMemoryVectorStore', () => {
  const collection = 'kb_test';
  let store: InMemoryVectorStore;

  beforeEach(async () => {
    store = new InMemoryVectorStore(createTestLogger());
    await store.createCollection(collection);
  });

  describe('upsert and search', () => {
    it('returns an upserted vector first when queried with itself', async () => {
      const vectors = [
        [1, 0, 0],
        [0.9, 0.1, 0],
        [0, 1, 0],
        [0, 0, 1],
      ];
      await store.upsert(collection, ['a', 'b', 'c', 'd'], vectors);

      for (const [index, id] of ['a', 'b', 'c', 'd'].entries()) {
        const hits = await store.search(collection, vectors[index], 2);
        expect(hits[0].id).toBe(id);
        expect(hits[0].score).toBeCloseTo(1);
        expect(hits.length).toBe(2);
      }
    });

    it('orders by descending score and breaks ties by id', async () => {
      await store.upsert(collection, ['z', 'y', 'x'], [
        [1, 0],
        [1, 0],
        [0, 1],
      ]);

      const hits = await store.search(collection, [1, 0], 3);

      expect(hits.map(hit => hit.id)).toEqual(['y', 'z', 'x']);
      expect(hits[2].score).toBe(0);
    });

    it('replaces vectors and metadata by id', async () => {
      await store.upsert(collection, ['a'], [[1, 0]], [{ version: 1 }]);
      await store.upsert(collection, ['a'], [[0, 1]], [{ version: 2 }]);

      const hits = await store.search(collection, [0, 1], 1);

      expect(await store.count(collection)).toBe(1);
      expect(hits).toEqual([{ id: 'a', score: 1, metadata: { version: 2 } }]);
    });

    it('returns nothing for non-positive topK', async () => {
      await store.upsert(collection, ['a'], [[1, 0]]);

      expect(await store.search(collection, [1, 0], 0)).toEqual([]);
      expect(await store.search(collection, [1, 0], -3)).toEqual([]);
    });

    it('defaults to five hits', async () => {
      const ids = ['a', 'b', 'c', 'd', 'e', 'f', 'g'];
      await store.upsert(
        collection,
        ids,
        ids.map((_, index) => [1, index])
      );

      expect(await store.search(collection, [1, 0])).toHaveLength(5);
    });

    it('rejects mismatched parallel arrays without writing', async () => {
      await expect(store.upsert(collection, ['a', 'b'], [[1, 0]])).rejects.toMatchObject({
        name: 'VectorStoreError',
        retryable: false,
      });
      await expect(store.upsert(collection, ['a'], [[1, 0]], [{}, {}])).rejects.toBeInstanceOf(VectorStoreError);
      expect(await store.count(collection)).toBe(0);
    });

    it('rejects a batch with mixed dimensions as a whole', async () => {
      await expect(store.upsert(collection, ['a', 'b'], [[1, 0], [1, 0, 0]])).rejects.toBeInstanceOf(
        VectorStoreError
      );
      expect(await store.count(collection)).toBe(0);
    });

    it('keeps stored data independent of the caller', async () => {
      const vector = [1, 0];
      const metadata = { tag: 'original' };
      await store.upsert(collection, ['a'], [vector], [metadata]);
      vector[0] = 0;
      metadata.tag = 'changed';

      const [hit] = await store.search(collection, [1, 0], 1);
      hit.metadata.tag = 'mutated';

      const [again] = await store.search(collection, [1, 0], 1);
      expect(again.score).toBe(1);
      expect(again.metadata).toEqual({ tag: 'original' });
    });
  });

  describe('filters', () => {
    beforeEach(async () => {
      await store.upsert(
        collection,
        ['doc1:0', 'doc1:1', 'doc2:0'],
        [
          [1, 0],
          [1, 0],
          [1, 0],
        ],
        [
          { documentId: 'doc1', chunkIndex: 0 },
          { documentId: 'doc1', chunkIndex: 1 },
          { documentId: 'doc2', chunkIndex: 0 },
        ]
      );
    });

    it('narrows search candidates by equality', async () => {
      const hits = await store.search(collection, [1, 0], 5, { documentId: 'doc1' });
      expect(hits.map(hit => hit.id)).toEqual(['doc1:0', 'doc1:1']);
    });

    it('supports comparison operators', async () => {
      expect(await store.count(collection, { chunkIndex: { $gte: 1 } })).toBe(1);
      expect(await store.count(collection, { documentId: { $in: ['doc2', 'doc3'] } })).toBe(1);
      expect(await store.count(collection, { documentId: { $ne: 'doc1' } })).toBe(1);
      expect(await store.count(collection, { documentId: 'doc1', chunkIndex: { $lt: 1 } })).toBe(1);
    });

    it('treats range operators on non-numeric values as no match', async () => {
      expect(await store.count(collection, { documentId: { $gt: 0 } })).toBe(0);
    });
  });

  describe('delete', () => {
    beforeEach(async () => {
      await store.upsert(
        collection,
        ['a', 'b', 'c'],
        [
          [1, 0],
          [0, 1],
          [1, 1],
        ],
        [{ group: 'x' }, { group: 'y' }, { group: 'y' }]
      );
    });

    it('never returns deleted ids and is idempotent', async () => {
      expect(await store.delete(collection, ['a', 'missing'])).toBe(1);
      expect(await store.delete(collection, ['a', 'missing'])).toBe(0);

      const hits = await store.search(collection, [1, 0], 10);
      expect(hits.map(hit => hit.id)).not.toContain('a');
      expect(await store.count(collection)).toBe(2);
    });

    it('removes the union of ids and filter matches', async () => {
      expect(await store.delete(collection, ['a'], { group: 'y' })).toBe(3);
      expect(await store.count(collection)).toBe(0);
    });

    it('removes nothing without ids or filters', async () => {
      expect(await store.delete(collection)).toBe(0);
      expect(await store.delete(collection, [], {})).toBe(0);
      expect(await store.count(collection)).toBe(3);
    });
  });

  describe('collections', () => {
    it('keeps collections apart', async () => {
      await store.createCollection('kb_other');
      await store.upsert(collection, ['a'], [[1, 0]]);

      expect(await store.count('kb_other')).toBe(0);
      expect(await store.search('kb_other', [1, 0])).toEqual([]);
    });

    it('raises CollectionNotFoundError for unknown collections', async () => {
      await expect(store.count('kb_missing')).rejects.toBeInstanceOf(CollectionNotFoundError);
      await expect(store.upsert('kb_missing', ['a'], [[1]])).rejects.toMatchObject({
        collectionId: 'kb_missing',
        retryable: false,
      });
    });

    it('drops a collection and reports its size', async () => {
      await store.upsert(collection, ['a', 'b'], [
        [1, 0],
        [0, 1],
      ]);

      expect(await store.dropCollection(collection)).toBe(2);
      expect(await store.hasCollection(collection)).toBe(false);
      expect(await store.dropCollection(collection)).toBe(0);
    });
  });
});
