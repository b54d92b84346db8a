/**
 * Source readers shared by the file-based adapters.
 *
 * @module services/adapters/sources
 */

import { readFile, stat } from 'fs/promises';
import { z } from 'zod';
import { CollectionError } from '../../core/errors';

export const textSourceSchema = z.object({
  source_type: z.enum(['file', 'string']).default('file'),
  path: z.string().optional(),
  data: z.string().optional(),
  encoding: z.enum(['utf8', 'utf-8', 'latin1', 'ascii', 'utf16le']).default('utf8'),
  max_bytes: z.number().int().positive().optional()
});

export type TextSource = z.output<typeof textSourceSchema>;

const hasCode = (error: unknown): error is Error & { code: string } =>
  error instanceof Error && 'code' in error && typeof error.code === 'string';

/**
 * Read the configured text source. Missing inputs, oversize files and I/O
 * failures become {@link CollectionError}.
 */
export async function readTextSource(source: TextSource, label: string): Promise<string> {
  if (source.source_type === 'string') {
    if (!source.data) {
      throw new CollectionError(`${label} string not provided in config`);
    }
    return source.data;
  }

  if (!source.path) {
    throw new CollectionError('File path not provided in config');
  }

  try {
    if (source.max_bytes !== undefined) {
      const info = await stat(source.path);
      if (info.size > source.max_bytes) {
        throw new CollectionError(`File exceeds max_bytes (${info.size} > ${source.max_bytes})`, {
          path: source.path
        });
      }
    }
    return await readFile(source.path, { encoding: source.encoding });
  } catch (error) {
    if (error instanceof CollectionError) {
      throw error;
    }
    const reason = hasCode(error) ? error.code : error instanceof Error ? error.message : String(error);
    throw new CollectionError(`Failed to read ${label} data: ${reason}`, { path: source.path }, { cause: error });
  }
}
