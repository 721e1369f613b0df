/**
 * Memory-Safe Processing Utilities
 */

import { memoryConfig, getMemoryUsage } from '../config/memory.config';
import { logger } from '../lib/logger';

/**
 * Error thrown when a package or part exceeds the configured size limit
 */
export class FileTooLargeError extends Error {
  public readonly code = 'FILE_TOO_LARGE';

  constructor(
    public readonly fileSize: number,
    public readonly maxSize: number,
    message?: string
  ) {
    super(message || `File size ${fileSize} exceeds maximum ${maxSize}`);
    this.name = 'FileTooLargeError';
  }
}

/**
 * Throws FileTooLargeError when the byte length exceeds the limit
 */
export function assertWithinLimit(size: number, maxSize: number, what: string): void {
  if (size > maxSize) {
    throw new FileTooLargeError(
      size,
      maxSize,
      `${what} too large: ${Math.round(size / 1024 / 1024)}MB exceeds ${Math.round(maxSize / 1024 / 1024)}MB limit`
    );
  }
}

/**
 * Track memory usage during an operation
 */
export async function withMemoryTracking<T>(
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const beforeUsage = getMemoryUsage();

  try {
    const result = await fn();

    if (memoryConfig.enableMemoryLogging) {
      const afterUsage = getMemoryUsage();
      logger.info(`[MemoryTracking] ${operation} completed`, {
        memoryDeltaMB: afterUsage.heapUsedMB - beforeUsage.heapUsedMB,
        beforeMB: beforeUsage.heapUsedMB,
        afterMB: afterUsage.heapUsedMB,
      });
    }

    return result;
  } catch (error) {
    const afterUsage = getMemoryUsage();
    logger.error(`[MemoryTracking] ${operation} failed`, {
      memoryUsedMB: afterUsage.heapUsedMB,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    throw error;
  }
}
