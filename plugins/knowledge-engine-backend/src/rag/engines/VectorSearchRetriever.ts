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

import type { Logger } from 'winston';
import { RetrievalContext, RetrievalResultEntry } from '../../models';
import { RetrievalError } from '../../errors';
import { toHostServiceError } from '../fileStreams';
import { HostServices, KnowledgeRetriever } from '../types';

const DEFAULT_TOP_K = 5;

/**
 * Retrieval-only component: plain nearest-neighbour search over the bound collection
 */
export class VectorSearchRetriever implements KnowledgeRetriever {
  readonly kind = 'KnowledgeRetriever' as const;
  readonly name = 'vector-search';

  private readonly host: HostServices;
  private readonly logger: Logger;

  constructor(host: HostServices, logger: Logger) {
    this.host = host;
    this.logger = logger;
  }

  async retrieve(context: RetrievalContext): Promise<RetrievalResultEntry[]> {
    if (!context.query.trim()) {
      throw new RetrievalError('Query must not be empty');
    }

    const requested = context.settings.top_k;
    const topK = typeof requested === 'number' && Number.isInteger(requested) ? requested : DEFAULT_TOP_K;

    try {
      const queryVector = await this.host.embedder.embedQuery(context.query);
      const hits = await this.host.vectorStore.search(this.host.collectionId, queryVector, topK);
      this.logger.debug(`[VectorSearch] ${hits.length} hits for ${context.knowledgeBaseId}`);

      return hits.map(hit => ({
        id: hit.id,
        metadata: hit.metadata,
        score: hit.score,
        distance: 1 - hit.score,
        content: typeof hit.metadata.content === 'string' ? hit.metadata.content : undefined,
      }));
    } catch (error) {
      throw toHostServiceError('search knowledge base', error);
    }
  }
}
