import { AppError } from '@/errors/app-error';
import { logger } from '@/lib/logger';
import type { PageWindow } from '@/interfaces/flower.interface';

export const MAX_PAGE_SIZE = 100;

/**
 * Base repository class with common utilities
 */
export abstract class BaseRepository {
  protected abstract tableName: string;

  /**
   * Log repository operation
   */
  protected logOperation(operation: string, metadata: Record<string, unknown> = {}): void {
    logger.debug(`Repository operation: ${operation}`, {
      repository: this.constructor.name,
      table: this.tableName,
      operation,
      ...metadata,
    });
  }

  /**
   * Log a driver failure and rethrow it as a database error
   */
  protected handleError(error: unknown, operation: string): never {
    if (error instanceof AppError) {
      throw error;
    }

    logger.error(`${this.constructor.name}.${operation} failed`, {
      repository: this.constructor.name,
      table: this.tableName,
      error: error instanceof Error ? error.message : String(error),
    });

    throw AppError.database(error);
  }

  /**
   * Clamp a limit/offset pair to sane bounds
   */
  protected validateWindow(window: PageWindow): PageWindow {
    const limit = Math.min(Math.max(Math.trunc(window.limit) || 1, 1), MAX_PAGE_SIZE);
    const offset = Math.min(Math.max(Math.trunc(window.offset) || 0, 0), Number.MAX_SAFE_INTEGER);

    return { limit, offset };
  }

  /**
   * Get current timestamp
   */
  protected getCurrentTimestamp(): Date {
    return new Date();
  }
}
