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
import { ConfigReader } from '@backstage/config';
import type { Pool } from 'pg';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';
import { VectorStoreFactory } from './VectorStoreFactory';
import { createTestLogger } from '../testUtils';

const postgresConfig = (fallbackToMemory = false) =>
  new ConfigService(
    new ConfigReader({
      knowledgeEngine: {
        vectorStore: { type: 'postgresql', fallbackToMemory, postgresql: { password: 'test-secret' } },
      },
    })
  );

const unreachablePool = () =>
  ({
    connect: jest.fn(async () => {
      throw new Error('ECONNREFUSED');
    }),
    on: jest.fn(),
  }) as unknown as Pool;

describe('VectorStoreFactory', () => {
  const logger = createTestLogger();

  it('creates an in-memory store by default', async () => {
    const store = await VectorStoreFactory.create(new ConfigService(new ConfigReader({})), logger);

    expect(store).toBeInstanceOf(InMemoryVectorStore);
  });

  it('fails when PostgreSQL cannot be initialized', async () => {
    await expect(VectorStoreFactory.create(postgresConfig(), logger, unreachablePool())).rejects.toThrow(
      'PgVectorStore initialization failed: ECONNREFUSED'
    );
  });

  it('falls back to memory only when configured to', async () => {
    const warn = jest.spyOn(logger, 'warn');

    const store = await VectorStoreFactory.create(postgresConfig(true), logger, unreachablePool());

    expect(store).toBeInstanceOf(InMemoryVectorStore);
    expect(warn).toHaveBeenCalledWith('Falling back to in-memory vector store; vectors will not survive a restart');
  });

  it('returns a PostgreSQL store once initialized', async () => {
    const client = {
      query: jest.fn(async (text: string) => {
        if (text.includes('pg_extension')) {
          return { rows: [{ installed: true }] };
        }
        if (text.includes('information_schema')) {
          return { rows: [{ count: '2' }] };
        }
        return { rows: [] };
      }),
      release: jest.fn(),
    };
    const pool = { connect: jest.fn(async () => client), on: jest.fn() } as unknown as Pool;

    const store = await VectorStoreFactory.create(postgresConfig(), logger, pool);

    expect(store).toBeInstanceOf(PgVectorStore);
  });
});
