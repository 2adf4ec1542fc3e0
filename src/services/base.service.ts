import { logger } from '@/lib/logger';
import type { PaginatedResponse, Pagination, PageWindow } from '@/interfaces/flower.interface';

/**
 * Base service class that provides common functionality for all services
 */
export abstract class BaseService {
  protected logger = logger;

  /**
   * Log service operations for debugging and monitoring
   */
  protected logOperation(operation: string, data?: Record<string, unknown>): void {
    this.logger.info(`Service operation: ${operation}`, {
      service: this.constructor.name,
      operation,
      ...data,
    });
  }

  /**
   * Translate a page/per-page pair into a limit/offset window
   */
  protected toWindow(pagination: Pagination): PageWindow {
    return {
      limit: pagination.perPage,
      offset: (pagination.page - 1) * pagination.perPage,
    };
  }

  /**
   * Build a paginated response
   */
  protected createPaginatedResponse<T>(
    data: T[],
    total: number,
    pagination: Pagination
  ): PaginatedResponse<T> {
    return {
      data,
      total,
      page: pagination.page,
      per_page: pagination.perPage,
      total_pages: Math.ceil(total / pagination.perPage),
    };
  }
}
