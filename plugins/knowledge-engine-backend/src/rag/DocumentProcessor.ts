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
 * Document processor for parsing and chunking
 * Handles document preparation for embedding
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { ChunkingError, ParsingError } from '../errors';

export type DocumentFormat = 'text' | 'markdown' | 'html';

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.txt': 'text',
  '.text': 'text',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.html': 'html',
  '.htm': 'html',
};

/**
 * Parses raw documents into clean text and splits it into word windows
 */
export class DocumentProcessor {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Decode and clean a document
   *
   * @throws ParsingError for binary, non-UTF-8 or unsupported content
   */
  parse(content: Buffer, mimeType?: string, fileName?: string): string {
    const format = this.detectFormat(mimeType, fileName);

    if (content.includes(0)) {
      throw new ParsingError(`Document ${fileName ?? '(unnamed)'} looks binary and cannot be parsed as text`);
    }

    let decoded: string;
    try {
      decoded = new TextDecoder('utf-8', { fatal: true }).decode(content);
    } catch (error) {
      throw new ParsingError('Document is not valid UTF-8 text', { cause: error });
    }

    return this.extractText(decoded, format);
  }

  /**
   * Split text into overlapping word windows
   *
   * @throws ChunkingError when the options cannot produce chunks
   */
  chunk(text: string, options: ChunkOptions): string[] {
    const { chunkSize, chunkOverlap } = options;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ChunkingError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ChunkingError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`);
    }

    const words = text.split(/\s+/).filter(word => word.length > 0);
    if (words.length === 0) {
      return [];
    }

    const chunks: string[] = [];
    const step = chunkSize - chunkOverlap;

    for (let start = 0; start < words.length; start += step) {
      chunks.push(words.slice(start, start + chunkSize).join(' '));
      if (start + chunkSize >= words.length) {
        break;
      }
    }

    this.logger.debug(`Created ${chunks.length} chunks from ${words.length} words`);
    return chunks;
  }

  /**
   * Extract clean text from content
   * Removes markdown, HTML, and excessive whitespace
   */
  extractText(content: string, format: DocumentFormat = 'text'): string {
    let text = content;

    if (format === 'html') {
      text = text.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ');
      text = text.replace(/<[^>]*>/g, ' ');
      text = text
        .replace(/&nbsp;/g, ' ')
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>')
        .replace(/&quot;/g, '"')
        .replace(/&#39;/g, "'")
        .replace(/&amp;/g, '&');
    }

    if (format === 'markdown') {
      // Code blocks go first so their contents are not treated as markup
      text = text.replace(/```[\s\S]*?```/g, ' ');
      text = text.replace(/`([^`]+)`/g, '$1');

      // Remove markdown links but keep the text
      text = text.replace(/\[([^\]]+)\]\([^)]+\)/g, '$1');

      // Remove markdown headers
      text = text.replace(/^#+\s+/gm, '');

      // Remove markdown formatting
      text = text.replace(/[*_~]/g, '');
    }

    // Normalize whitespace
    return text.replace(/\s+/g, ' ').trim();
  }

  private detectFormat(mimeType?: string, fileName?: string): DocumentFormat {
    const mime = mimeType?.split(';')[0].trim().toLowerCase();

    if (mime) {
      if (mime === 'text/html' || mime === 'application/xhtml+xml') {
        return 'html';
      }
      if (mime === 'text/markdown' || mime === 'text/x-markdown') {
        return 'markdown';
      }
      if (mime.startsWith('text/')) {
        return 'text';
      }
      if (mime !== 'application/octet-stream') {
        throw new ParsingError(`Unsupported content type: ${mime}`);
      }
    }

    const extension = fileName?.toLowerCase().match(/\.[a-z0-9]+$/)?.[0];
    return (extension && EXTENSION_FORMATS[extension]) || 'text';
  }
}
