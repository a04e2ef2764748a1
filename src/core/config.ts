/**
 * Loader configuration schema
 */

import { z } from 'zod';

export const LoaderOptionsSchema = z.object({
  // tokens longer than this are truncated (or rejected, see strictTokenLength)
  maxTokenLength: z.number().int().min(1).optional().default(128),
  strictTokenLength: z.boolean().optional().default(false),
  // starting element capacity of attribute buffers, mesh buffers and vertex maps
  initialCapacity: z.number().int().min(1).optional().default(32),
  // growth ceiling in elements; growing past it fails with out-of-memory
  maxBufferElements: z.number().int().min(1).optional().default(0xffffffff),
  readChunkSize: z.number().int().min(1).optional().default(64 * 1024),
  debug: z.boolean().optional().default(false),
});

/** options as accepted from callers, every field optional */
export type LoaderOptionsInput = z.input<typeof LoaderOptionsSchema>;

/** options with defaults applied */
export type LoaderOptions = z.infer<typeof LoaderOptionsSchema>;

export function resolveLoaderOptions(input: LoaderOptionsInput = {}): LoaderOptions {
  return LoaderOptionsSchema.parse(input);
}
