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
 * Embedder backed by the Ollama embed API
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import type { Logger } from 'winston';
import { IEmbedder, ServiceDependencies } from '../interfaces';
import { OllamaEmbedResponse, Vector } from '../models';
import { EmbeddingError, errorMessage } from '../errors';

/**
 * Host embedder calling `POST /api/embed`
 */
export class OllamaEmbedder implements IEmbedder {
  private readonly logger: Logger;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    const config = dependencies.config.getConfig();
    this.baseUrl = config.ollamaBaseUrl;
    this.model = config.embeddingModel;
  }

  async embedDocuments(texts: string[]): Promise<Vector[]> {
    if (texts.length === 0) {
      return [];
    }

    this.logger.info(`Generating embeddings for ${texts.length} inputs with model: ${this.model}`);

    let json: OllamaEmbedResponse;
    try {
      const response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          input: texts,
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      json = (await response.json()) as OllamaEmbedResponse;
    } catch (error) {
      this.logger.error(`Failed to generate embeddings: ${errorMessage(error)}`);
      throw new EmbeddingError(`Embedding generation failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!json.embeddings || !Array.isArray(json.embeddings)) {
      throw new EmbeddingError('Invalid embeddings response format from Ollama', { retryable: false });
    }
    if (json.embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Ollama returned ${json.embeddings.length} embeddings for ${texts.length} inputs`,
        { retryable: false }
      );
    }

    this.logger.debug(`Successfully generated ${json.embeddings.length} embeddings`);
    return json.embeddings;
  }

  async embedQuery(text: string): Promise<Vector> {
    const [vector] = await this.embedDocuments([text]);
    return vector;
  }

  /**
   * Health check for Ollama service
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (error) {
      this.logger.error(`Ollama health check failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
