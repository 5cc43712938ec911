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
 * Configuration service implementation
 * Manages host configuration with type-safe access
 *
 * @packageDocumentation
 */

import { Config } from '@backstage/config';
import { IConfigService } from '../interfaces';
import { KnowledgeEngineConfig, PostgresConfig } from '../models';

/**
 * Configuration service that wraps Backstage Config
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: KnowledgeEngineConfig;

  constructor(config: Config) {
    this.config = config;
    this.cachedConfig = this.loadConfig();
  }

  /**
   * Load and validate configuration
   */
  private loadConfig(): KnowledgeEngineConfig {
    return {
      embeddingModel: this.config.getOptionalString('knowledgeEngine.embeddingModel') || 'all-minilm',
      ollamaBaseUrl: this.config.getOptionalString('knowledgeEngine.ollamaBaseUrl') || 'http://localhost:11434',
      fileStorage: {
        rootDir: this.config.getOptionalString('knowledgeEngine.fileStorage.rootDir') || './data/files',
      },
      vectorStore: this.loadVectorStoreConfig(),
    };
  }

  /**
   * Load vector store configuration
   */
  private loadVectorStoreConfig(): KnowledgeEngineConfig['vectorStore'] {
    const type = this.config.getOptionalString('knowledgeEngine.vectorStore.type') ?? 'memory';

    if (type === 'postgresql') {
      return {
        type: 'postgresql',
        postgresql: this.loadPostgresConfig(),
        fallbackToMemory: this.config.getOptionalBoolean('knowledgeEngine.vectorStore.fallbackToMemory') ?? false,
      };
    }
    if (type !== 'memory') {
      throw new Error(`Unsupported vector store type: ${type}`);
    }

    return {
      type: 'memory',
    };
  }

  /**
   * Load PostgreSQL configuration with validation
   */
  private loadPostgresConfig(): PostgresConfig {
    const prefix = 'knowledgeEngine.vectorStore.postgresql';
    const host = this.config.getOptionalString(`${prefix}.host`) || 'localhost';
    const port = this.config.getOptionalNumber(`${prefix}.port`) || 5432;
    const database = this.config.getOptionalString(`${prefix}.database`) || 'knowledge_vectors';
    const user = this.config.getOptionalString(`${prefix}.user`) || 'knowledge';
    const password = this.config.getOptionalString(`${prefix}.password`) || '';
    const ssl = this.config.getOptionalBoolean(`${prefix}.ssl`) ?? false;
    const maxConnections = this.config.getOptionalNumber(`${prefix}.maxConnections`) || 10;
    const idleTimeoutMillis = this.config.getOptionalNumber(`${prefix}.idleTimeoutMillis`) || 30000;
    const connectionTimeoutMillis = this.config.getOptionalNumber(`${prefix}.connectionTimeoutMillis`) || 5000;

    if (!password) {
      throw new Error('PostgreSQL password is required when using postgresql vector store');
    }
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new Error(`PostgreSQL port must be between 1 and 65535, got ${port}`);
    }

    return {
      host,
      port,
      database,
      user,
      password,
      ssl,
      maxConnections,
      idleTimeoutMillis,
      connectionTimeoutMillis,
    };
  }

  getConfig(): KnowledgeEngineConfig {
    return this.cachedConfig;
  }

  /**
   * Get PostgreSQL configuration
   * Throws error if not configured
   */
  getPostgresConfig(): PostgresConfig {
    if (this.cachedConfig.vectorStore.type !== 'postgresql' || !this.cachedConfig.vectorStore.postgresql) {
      throw new Error('PostgreSQL vector store is not configured');
    }
    return this.cachedConfig.vectorStore.postgresql;
  }
}
