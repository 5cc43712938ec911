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
 * Shared stand-ins for tests
 */

import { Readable } from 'stream';
import { createLogger, Logger } from 'winston';
import { IEmbedder, IFileService } from './interfaces';
import { FileStream, FileStreamHandle, Vector } from './models';
import { FileServiceError } from './errors';

export function createTestLogger(): Logger {
  return createLogger({ silent: true });
}

export const TEST_VOCABULARY = ['alpha', 'beta', 'gamma', 'delta'];

/**
 * Deterministic embedder: one dimension per vocabulary word, holding its count in the text
 */
export class KeywordEmbedder implements IEmbedder {
  private readonly vocabulary: string[];

  constructor(vocabulary: string[] = TEST_VOCABULARY) {
    this.vocabulary = vocabulary;
  }

  async embedDocuments(texts: string[]): Promise<Vector[]> {
    return texts.map(text => this.embed(text));
  }

  async embedQuery(text: string): Promise<Vector> {
    return this.embed(text);
  }

  private embed(text: string): Vector {
    const words = text.toLowerCase().split(/\W+/);
    return this.vocabulary.map(term => words.filter(word => word === term).length);
  }
}

/**
 * File service over in-memory contents
 */
export class MemoryFileService implements IFileService {
  private readonly files: Map<string, Buffer> = new Map();
  private readonly open: Set<string> = new Set();
  private nextId = 1;

  put(storagePath: string, content: string | Buffer): void {
    this.files.set(storagePath, Buffer.isBuffer(content) ? content : Buffer.from(content, 'utf-8'));
  }

  async openStream(storagePath: string): Promise<FileStream> {
    const content = this.files.get(storagePath);
    if (!content) {
      throw new FileServiceError(`Cannot open ${storagePath}`, { retryable: false });
    }

    const handle: FileStreamHandle = { id: `stream-${this.nextId++}`, storagePath };
    this.open.add(handle.id);
    return { stream: Readable.from([content]), handle };
  }

  async closeStream(handle: FileStreamHandle): Promise<void> {
    if (!this.open.delete(handle.id)) {
      throw new FileServiceError(`Unknown or already closed file stream: ${handle.id}`, { retryable: false });
    }
  }

  get openStreamCount(): number {
    return this.open.size;
  }
}

/**
 * `count` copies of `word`, space separated
 */
export function repeatWord(word: string, count: number): string {
  return Array.from({ length: count }, () => word).join(' ');
}
