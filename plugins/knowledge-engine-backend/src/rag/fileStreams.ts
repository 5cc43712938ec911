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
 * Helpers for plugins working with host file streams and host failures
 *
 * @packageDocumentation
 */

import type { Readable } from 'stream';
import type { Logger } from 'winston';
import { HostServiceError, RAGError, errorMessage, isPluginError } from '../errors';
import { HostServices } from './types';

/**
 * Open a file through the host, run `fn` on its stream and release the
 * handle on every exit path. When both `fn` and the release fail, the
 * release failure is logged and the error from `fn` is rethrown.
 */
export async function withFileStream<T>(
  host: HostServices,
  storagePath: string,
  logger: Logger,
  fn: (stream: Readable) => Promise<T>
): Promise<T> {
  const { stream, handle } = await host.getFileStream(storagePath);

  let result: T;
  try {
    result = await fn(stream);
  } catch (error) {
    try {
      await host.closeFileStream(handle);
    } catch (closeError) {
      logger.error(`Failed to close ${storagePath}: ${errorMessage(closeError)}`, { error: closeError });
    }
    throw error;
  }

  await host.closeFileStream(handle);
  return result;
}

/**
 * Collect a readable stream into a single buffer
 */
export async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * Re-surface a failure seen while calling host services.
 * Plugin-domain errors and already wrapped failures pass through.
 */
export function toHostServiceError(action: string, error: unknown): RAGError {
  if (error instanceof HostServiceError || isPluginError(error)) {
    return error;
  }
  return new HostServiceError(`Failed to ${action}: ${errorMessage(error)}`, error);
}
