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
 * Registry of plugin component implementations
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ComponentKind, SettingsSchema } from '../models';
import { ComponentContractError, ComponentNotFoundError } from '../errors';
import { detachedHostServices } from '../services/ScopedHostServices';
import { SimpleRAGEngine } from './engines/SimpleRAGEngine';
import { VectorSearchRetriever } from './engines/VectorSearchRetriever';
import { ComponentDefinition, HostServices, PluginComponent, isRAGEngine } from './types';

export interface ComponentSummary {
  name: string;
  kind: ComponentKind;
  description?: string;
}

export interface ComponentSchemas {
  creation: SettingsSchema;
  retrieval: SettingsSchema;
}

/**
 * Maps component names to their definitions and builds instances per knowledge base
 */
export class ComponentRegistry {
  private readonly logger: Logger;
  private readonly definitions: Map<string, ComponentDefinition> = new Map();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  register(definition: ComponentDefinition): void {
    if (this.definitions.has(definition.name)) {
      throw new Error(`Component already registered: ${definition.name}`);
    }
    this.definitions.set(definition.name, definition);
    this.logger.info(`Registered ${definition.kind} component: ${definition.name}`);
  }

  /**
   * @throws ComponentNotFoundError
   */
  get(name: string): ComponentDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new ComponentNotFoundError(name);
    }
    return definition;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  list(): ComponentSummary[] {
    return Array.from(this.definitions.values()).map(({ name, kind, description }) => ({ name, kind, description }));
  }

  /**
   * Create a component instance bound to the given host services
   *
   * @throws ComponentContractError when the instance does not carry the registered kind
   */
  instantiate(name: string, host: HostServices, logger: Logger): PluginComponent {
    const definition = this.get(name);
    const component = definition.create(host, logger.child({ component: name }));

    if (component.kind !== definition.kind) {
      throw new ComponentContractError(
        `Component ${name} was registered as ${definition.kind} but produced ${component.kind}`
      );
    }
    return component;
  }

  /**
   * Settings schemas of a RAG engine, read from an instance bound to no collection.
   * Retrievers have none.
   */
  getSchemas(name: string): ComponentSchemas | null {
    const instance = this.instantiate(name, detachedHostServices(), this.logger);
    if (!isRAGEngine(instance)) {
      return null;
    }
    return {
      creation: instance.getCreationSettingsSchema(),
      retrieval: instance.getRetrievalSettingsSchema(),
    };
  }
}

/**
 * Registry holding the bundled components
 */
export function createDefaultRegistry(logger: Logger): ComponentRegistry {
  const registry = new ComponentRegistry(logger);

  registry.register({
    kind: 'RAGEngine',
    name: 'simple',
    description: 'Word-window chunking with dense retrieval and optional reranking',
    create: (host, componentLogger) => new SimpleRAGEngine(host, componentLogger),
  });
  registry.register({
    kind: 'KnowledgeRetriever',
    name: 'vector-search',
    description: 'Nearest-neighbour search over pre-populated vectors',
    create: (host, componentLogger) => new VectorSearchRetriever(host, componentLogger),
  });

  return registry;
}
