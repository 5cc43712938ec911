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
 * File service reading documents from a local storage directory
 *
 * @packageDocumentation
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { once } from 'events';
import type { Logger } from 'winston';
import { IFileService } from '../interfaces';
import { FileStream, FileStreamHandle } from '../models';
import { FileServiceError, errorMessage } from '../errors';

/**
 * Resolves storage paths below a root directory and tracks open streams by handle
 */
export class LocalFileService implements IFileService {
  private readonly logger: Logger;
  private readonly rootDir: string;
  private readonly openStreams: Map<string, fs.ReadStream> = new Map();

  constructor(logger: Logger, rootDir: string) {
    this.logger = logger;
    this.rootDir = path.resolve(rootDir);
  }

  async openStream(storagePath: string): Promise<FileStream> {
    const fullPath = this.resolve(storagePath);
    const stream = fs.createReadStream(fullPath);

    try {
      await once(stream, 'open');
    } catch (error) {
      stream.destroy();
      throw new FileServiceError(`Cannot open ${storagePath}: ${errorMessage(error)}`, {
        cause: error,
        retryable: false,
      });
    }

    const handle: FileStreamHandle = { id: randomUUID(), storagePath };
    this.openStreams.set(handle.id, stream);
    this.logger.debug(`Opened file stream ${handle.id} for ${storagePath}`);

    return { stream, handle };
  }

  async closeStream(handle: FileStreamHandle): Promise<void> {
    const stream = this.openStreams.get(handle.id);
    if (!stream) {
      throw new FileServiceError(`Unknown or already closed file stream: ${handle.id}`, { retryable: false });
    }

    this.openStreams.delete(handle.id);
    stream.destroy();
    this.logger.debug(`Closed file stream ${handle.id}`);
  }

  get openStreamCount(): number {
    return this.openStreams.size;
  }

  private resolve(storagePath: string): string {
    const fullPath = path.resolve(this.rootDir, storagePath);
    const relative = path.relative(this.rootDir, fullPath);

    if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new FileServiceError(`Storage path escapes the storage root: ${storagePath}`, { retryable: false });
    }
    return fullPath;
  }
}
