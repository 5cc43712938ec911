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
 * Knowledge engine backend: RAG plugin contract, host services and bundled engines
 *
 * @packageDocumentation
 */

export * from './models';
export * from './errors';
export * from './interfaces';
export * from './rag';
export * from './services';
export { createKnowledgeEngineRouter, statusForError } from './router';
export type { PluginEnvironment } from './router';
