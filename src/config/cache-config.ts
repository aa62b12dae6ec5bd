/**
 * Cache Configuration
 *
 * Parses and validates environment variables for layout cache storage.
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { FileLayoutStorage } from '../layout/file-layout-storage.js';
import { MemoryLayoutStorage, type LayoutStorage } from '../layout/layout-storage.js';
import { ResultsControllerError } from '../shared/errors/results-controller.error.js';

/** Default directory name under the OS temp directory */
const DEFAULT_CACHE_DIRNAME = 'live-results-cache';

export const CacheConfigSchema = z.object({
  cacheDir: z.string().min(1).describe('Directory holding file-backed layout records'),
  mode: z.enum(['file', 'memory']).describe('Storage used for named caches'),
  debugEvents: z.boolean().describe('Log every delivered change event'),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

/**
 * Parse and validate cache configuration from environment variables.
 *
 * Environment variables:
 * - RESULTS_CACHE_DIR: Directory for cache files (default: <tmpdir>/live-results-cache)
 * - RESULTS_CACHE_MODE: "file" or "memory" (default: file)
 * - RESULTS_DEBUG_EVENTS: Log delivered change events (true/false)
 *
 * @returns Cache configuration
 * @throws ResultsControllerError (CONFIGURATION_ERROR) on invalid values
 */
export function getCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  const result = CacheConfigSchema.safeParse({
    cacheDir: env.RESULTS_CACHE_DIR ?? path.join(os.tmpdir(), DEFAULT_CACHE_DIRNAME),
    mode: env.RESULTS_CACHE_MODE ?? 'file',
    debugEvents: isDebugEventsEnabled(env),
  });

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw ResultsControllerError.configuration(issues.join('; '), { source: 'environment' });
  }
  return result.data;
}

/**
 * Whether RESULTS_DEBUG_EVENTS asks for delivered events to be logged.
 * Reads only that variable, so other invalid settings do not affect it.
 */
export function isDebugEventsEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.RESULTS_DEBUG_EVENTS === 'true';
}

/**
 * Create the storage named caches use under a configuration.
 */
export function createDefaultStorage(config: CacheConfig): LayoutStorage {
  return config.mode === 'memory'
    ? new MemoryLayoutStorage()
    : new FileLayoutStorage(config.cacheDir);
}

let defaultStorage: LayoutStorage | null = null;

/**
 * Process-wide storage for named caches, created from the environment on
 * first use.
 */
export function getDefaultStorage(): LayoutStorage {
  if (!defaultStorage) {
    defaultStorage = createDefaultStorage(getCacheConfig());
  }
  return defaultStorage;
}
