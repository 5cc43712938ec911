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
 * Service exports
 *
 * @packageDocumentation
 */

export { ConfigService } from './ConfigService';
export { OllamaEmbedder } from './OllamaEmbedder';
export { InMemoryVectorStore } from './InMemoryVectorStore';
export { PgVectorStore, SqlParams, compileFilter } from './PgVectorStore';
export { VectorStoreFactory } from './VectorStoreFactory';
export { LocalFileService } from './LocalFileService';
export { ScopedHostServices, detachedHostServices } from './ScopedHostServices';
export type { ScopedHostServicesOptions } from './ScopedHostServices';
export { SchemaValidator } from './SchemaValidator';
export { KnowledgeBaseService } from './KnowledgeBaseService';
export type {
  CreateKnowledgeBaseRequest,
  IngestOptions,
  KnowledgeBaseServiceDependencies,
} from './KnowledgeBaseService';
export { matchesFilter } from './filters';
