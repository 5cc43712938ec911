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
 * Express router for the knowledge engine backend
 * Handles HTTP requests and maps failures onto status codes
 *
 * @packageDocumentation
 */

import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response, Router } from 'express';
import type { Logger } from 'winston';
import { Config } from '@backstage/config';
import { IEmbedder, IFileService, IVectorStoreAdmin } from './interfaces';
import { RAGError, errorMessage, isHostServiceFailure, isPluginError } from './errors';
import {
  ConfigService,
  KnowledgeBaseService,
  LocalFileService,
  OllamaEmbedder,
  VectorStoreFactory,
} from './services';
import { ComponentRegistry, createDefaultRegistry } from './rag';

/**
 * Plugin environment interface
 */
export interface PluginEnvironment {
  logger: Logger;
  config: Config;
  /** Replace host infrastructure, mainly for tests and embedding applications */
  overrides?: {
    embedder?: IEmbedder;
    vectorStore?: IVectorStoreAdmin;
    fileService?: IFileService;
    registry?: ComponentRegistry;
  };
}

interface ErrorBody {
  error: string;
  message: string;
}

const ORCHESTRATION_STATUS: Record<string, number> = {
  SettingsValidationError: 400,
  KnowledgeBaseNotFoundError: 404,
  ComponentNotFoundError: 404,
  KnowledgeBaseStateError: 409,
  UnsupportedOperationError: 409,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * HTTP status of an error raised while serving a request
 */
export function statusForError(error: unknown): number {
  if (isPluginError(error)) {
    return 422;
  }
  if (isHostServiceFailure(error)) {
    return error.retryable ? 503 : 502;
  }
  if (error instanceof RAGError) {
    return ORCHESTRATION_STATUS[error.name] ?? 500;
  }
  if (error instanceof SyntaxError) {
    return 400;
  }
  return 500;
}

/**
 * Create and configure the knowledge engine router
 */
export async function createKnowledgeEngineRouter(env: PluginEnvironment): Promise<Router> {
  const router = Router();
  router.use(express.json({ limit: '1mb' }));

  const { logger, config, overrides = {} } = env;

  const configService = new ConfigService(config);
  const appConfig = configService.getConfig();
  const vectorStore = overrides.vectorStore ?? (await VectorStoreFactory.create(configService, logger));
  const embedder = overrides.embedder ?? new OllamaEmbedder({ logger, config: configService });
  const fileService = overrides.fileService ?? new LocalFileService(logger, appConfig.fileStorage.rootDir);
  const registry = overrides.registry ?? createDefaultRegistry(logger);

  const knowledgeBases = new KnowledgeBaseService({
    logger,
    registry,
    embedder,
    vectorStore,
    fileService,
  });

  const sendError = (res: Response, action: string, error: unknown): void => {
    const status = statusForError(error);
    const body: ErrorBody = {
      error: error instanceof Error ? error.name : 'Error',
      message: errorMessage(error),
    };

    if (status >= 500) {
      logger.error(`Failed to ${action}: ${body.message}`, { error });
    } else {
      logger.warn(`Rejected request to ${action}: ${body.message}`);
    }
    res.status(status).json(body);
  };

  const badRequest = (res: Response, message: string): void => {
    res.status(400).json({ error: 'BadRequest', message });
  };

  /**
   * GET /health
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const vectorStoreHealthy = await vectorStore.healthCheck();
      const embedderHealthy = embedder instanceof OllamaEmbedder ? await embedder.healthCheck() : true;

      res.json({
        status: vectorStoreHealthy && embedderHealthy ? 'healthy' : 'degraded',
        vectorStore: vectorStoreHealthy,
        embedder: embedderHealthy,
        knowledgeBases: knowledgeBases.listKnowledgeBases().length,
        config: {
          embeddingModel: appConfig.embeddingModel,
          vectorStore: appConfig.vectorStore.type,
        },
      });
    } catch (error) {
      logger.error(`Health check failed: ${errorMessage(error)}`);
      res.status(500).json({
        status: 'unhealthy',
        error: errorMessage(error),
      });
    }
  });

  /**
   * GET /engines
   */
  router.get('/engines', (_req: Request, res: Response) => {
    res.json({ engines: knowledgeBases.listEngines() });
  });

  /**
   * GET /engines/:name/schemas
   */
  router.get('/engines/:name/schemas', (req: Request, res: Response) => {
    try {
      const schemas = knowledgeBases.getEngineSchemas(req.params.name);
      res.json({
        name: req.params.name,
        creation: schemas?.creation ?? null,
        retrieval: schemas?.retrieval ?? null,
      });
    } catch (error) {
      sendError(res, 'read engine schemas', error);
    }
  });

  /**
   * POST /knowledge-bases
   */
  router.post('/knowledge-bases', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body) || !optionalString(body.engineName)) {
      badRequest(res, 'engineName is required');
      return;
    }
    if (body.config !== undefined && !isRecord(body.config)) {
      badRequest(res, 'config must be an object');
      return;
    }
    if (body.id !== undefined && typeof body.id !== 'string') {
      badRequest(res, 'id must be a string');
      return;
    }

    try {
      const knowledgeBase = await knowledgeBases.createKnowledgeBase({
        id: typeof body.id === 'string' ? body.id : undefined,
        engineName: String(body.engineName),
        config: isRecord(body.config) ? body.config : undefined,
      });
      res.status(201).json(knowledgeBase);
    } catch (error) {
      sendError(res, 'create knowledge base', error);
    }
  });

  /**
   * GET /knowledge-bases
   */
  router.get('/knowledge-bases', (_req: Request, res: Response) => {
    res.json({ knowledgeBases: knowledgeBases.listKnowledgeBases() });
  });

  /**
   * GET /knowledge-bases/:id
   */
  router.get('/knowledge-bases/:id', (req: Request, res: Response) => {
    try {
      res.json(knowledgeBases.getKnowledgeBase(req.params.id));
    } catch (error) {
      sendError(res, 'read knowledge base', error);
    }
  });

  /**
   * DELETE /knowledge-bases/:id
   */
  router.delete('/knowledge-bases/:id', async (req: Request, res: Response) => {
    try {
      const deletedVectors = await knowledgeBases.deleteKnowledgeBase(req.params.id);
      res.json({ deletedVectors });
    } catch (error) {
      sendError(res, 'delete knowledge base', error);
    }
  });

  /**
   * POST /knowledge-bases/:id/documents
   */
  router.post('/knowledge-bases/:id/documents', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body) || !optionalString(body.storagePath)) {
      badRequest(res, 'storagePath is required');
      return;
    }
    if (body.chunkingStrategy !== undefined && !isRecord(body.chunkingStrategy)) {
      badRequest(res, 'chunkingStrategy must be an object');
      return;
    }
    if (body.metadata !== undefined && !isRecord(body.metadata)) {
      badRequest(res, 'metadata must be an object');
      return;
    }

    try {
      const result = await knowledgeBases.ingestDocument(
        req.params.id,
        {
          storagePath: String(body.storagePath),
          documentId: optionalString(body.documentId) ?? randomUUID(),
          fileName: optionalString(body.fileName),
          mimeType: optionalString(body.mimeType),
        },
        {
          chunkingStrategy: isRecord(body.chunkingStrategy) ? body.chunkingStrategy : undefined,
          metadata: isRecord(body.metadata) ? body.metadata : undefined,
        }
      );
      res.status(result.status === 'success' ? 201 : 422).json(result);
    } catch (error) {
      sendError(res, 'ingest document', error);
    }
  });

  /**
   * DELETE /knowledge-bases/:id/documents/:documentId
   */
  router.delete('/knowledge-bases/:id/documents/:documentId', async (req: Request, res: Response) => {
    try {
      const deleted = await knowledgeBases.deleteDocument(req.params.id, req.params.documentId);
      res.json({ deleted });
    } catch (error) {
      sendError(res, 'delete document', error);
    }
  });

  /**
   * POST /knowledge-bases/:id/retrieve
   */
  router.post('/knowledge-bases/:id/retrieve', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.query !== 'string' || body.query.trim().length === 0) {
      badRequest(res, 'query is required');
      return;
    }
    if (body.settings !== undefined && !isRecord(body.settings)) {
      badRequest(res, 'settings must be an object');
      return;
    }

    try {
      const response = await knowledgeBases.retrieve(
        req.params.id,
        String(body.query),
        isRecord(body.settings) ? body.settings : undefined
      );
      res.json(response);
    } catch (error) {
      sendError(res, 'retrieve', error);
    }
  });

  // Malformed JSON bodies surface here
  router.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, 'parse request', error);
  });

  return router;
}
