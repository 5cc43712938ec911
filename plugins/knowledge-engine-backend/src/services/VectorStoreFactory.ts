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
 * Builds the host vector store from configuration
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import type { Pool } from 'pg';
import { IVectorStoreAdmin } from '../interfaces';
import { errorMessage } from '../errors';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';

/**
 * Usage:
 * ```typescript
 * const vectorStore = await VectorStoreFactory.create(configService, logger);
 * ```
 */
export class VectorStoreFactory {
  /**
   * Create and initialize the configured store. A PostgreSQL store that
   * fails to initialize is fatal unless `vectorStore.fallbackToMemory` is set.
   *
   * @param pool - Pre-built pool, used instead of one built from config
   * @throws VectorStoreError when PostgreSQL cannot be initialized and no fallback is configured
   */
  static async create(config: ConfigService, logger: Logger, pool?: Pool): Promise<IVectorStoreAdmin> {
    const { vectorStore } = config.getConfig();
    logger.info(`Creating vector store: ${vectorStore.type}`);

    if (vectorStore.type === 'memory') {
      return new InMemoryVectorStore(logger);
    }

    const store = new PgVectorStore(logger, config.getPostgresConfig(), pool);
    try {
      await store.initialize();
    } catch (error) {
      if (!vectorStore.fallbackToMemory) {
        throw error;
      }
      logger.error(`Failed to initialize PostgreSQL vector store: ${errorMessage(error)}`, { error });
      logger.warn('Falling back to in-memory vector store; vectors will not survive a restart');
      return new InMemoryVectorStore(logger);
    }

    logger.info('PostgreSQL vector store initialized');
    return store;
  }
}
