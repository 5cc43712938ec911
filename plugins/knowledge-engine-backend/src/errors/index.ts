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
 * Error taxonomy shared by the host and plugins
 *
 * Host-origin errors come from infrastructure below HostServices.
 * Plugin-origin errors come from engine logic. The host uses `origin`
 * to tell "infrastructure failed" from "plugin failed".
 *
 * @packageDocumentation
 */

export type ErrorOrigin = 'host' | 'plugin';

export interface RAGErrorOptions {
  cause?: unknown;
  retryable?: boolean;
}

/**
 * Base class of every error crossing the plugin boundary
 */
export abstract class RAGError extends Error {
  abstract readonly origin: ErrorOrigin;
  readonly retryable: boolean;

  protected constructor(message: string, options: RAGErrorOptions = {}, defaultRetryable = false) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.retryable = options.retryable ?? defaultRetryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

// Host-service errors

export abstract class HostOriginError extends RAGError {
  readonly origin = 'host' as const;

  constructor(message: string, options: RAGErrorOptions = {}) {
    super(message, options, true);
  }
}

export class EmbeddingError extends HostOriginError {}

export class VectorStoreError extends HostOriginError {}

export class FileServiceError extends HostOriginError {}

/**
 * The bound collection cannot be reached. Needs host-side reconfiguration.
 */
export class CollectionNotFoundError extends HostOriginError {
  readonly collectionId: string;

  constructor(collectionId: string, message = `Collection not accessible: ${collectionId}`) {
    super(message, { retryable: false });
    this.collectionId = collectionId;
  }
}

/**
 * A host-service failure re-surfaced by a plugin
 */
export class HostServiceError extends RAGError {
  readonly origin = 'host' as const;

  constructor(message: string, cause: unknown) {
    super(message, { cause, retryable: cause instanceof RAGError ? cause.retryable : true });
  }
}

// Plugin-domain errors

export abstract class PluginOriginError extends RAGError {
  readonly origin = 'plugin' as const;

  constructor(message: string, options: RAGErrorOptions = {}) {
    super(message, options, false);
  }
}

export class ParsingError extends PluginOriginError {}

export class ChunkingError extends PluginOriginError {}

export class IngestionError extends PluginOriginError {}

export class RetrievalError extends PluginOriginError {}

/**
 * A plugin declared a settings schema outside the accepted grammar
 */
export class SchemaDefinitionError extends PluginOriginError {}

/**
 * A component factory produced something other than what it registered
 */
export class ComponentContractError extends PluginOriginError {}

// Host orchestration errors

export abstract class OrchestrationError extends RAGError {
  readonly origin = 'host' as const;

  constructor(message: string) {
    super(message, {}, false);
  }
}

export class SettingsValidationError extends OrchestrationError {
  readonly errors: string[];

  constructor(message: string, errors: string[]) {
    super(`${message}: ${errors.join('; ')}`);
    this.errors = errors;
  }
}

export class KnowledgeBaseNotFoundError extends OrchestrationError {
  constructor(knowledgeBaseId: string) {
    super(`Knowledge base not found: ${knowledgeBaseId}`);
  }
}

export class KnowledgeBaseStateError extends OrchestrationError {}

export class ComponentNotFoundError extends OrchestrationError {
  constructor(name: string) {
    super(`Unknown component: ${name}`);
  }
}

export class UnsupportedOperationError extends OrchestrationError {}

/**
 * Error classes a plugin raises from its own logic
 */
export function isPluginError(error: unknown): error is RAGError {
  return error instanceof RAGError && error.origin === 'plugin';
}

/**
 * Host-service failures a plugin must not swallow
 */
export function isHostServiceFailure(error: unknown): error is RAGError {
  return (
    error instanceof EmbeddingError ||
    error instanceof VectorStoreError ||
    error instanceof CollectionNotFoundError ||
    error instanceof FileServiceError ||
    error instanceof HostServiceError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
