import type { Request, Response } from 'express';
import { MAX_PAGE_SIZE } from '@/repositories/base.repository';
import type { Pagination } from '@/interfaces/flower.interface';

export const DEFAULT_PAGE_SIZE = 10;

// Keeps `(page - 1) * per_page` a safe integer for every page size
export const MAX_PAGE = Math.floor(Number.MAX_SAFE_INTEGER / MAX_PAGE_SIZE);

export abstract class BaseController {
  /**
   * Handle success response
   */
  protected success<T>(res: Response, data: T, message?: string, statusCode = 200): void {
    res.status(statusCode).json({
      success: true,
      message,
      data,
    });
  }

  /**
   * Respond with an empty body
   */
  protected noContent(res: Response): void {
    res.status(204).end();
  }

  /**
   * Read a single string query parameter; repeated parameters use the first value
   */
  protected getQueryString(req: Request, key: string): string | undefined {
    const value = req.query[key];
    const first = Array.isArray(value) ? value[0] : value;
    return typeof first === 'string' ? first : undefined;
  }

  /**
   * Extract pagination parameters from request
   */
  protected getPagination(req: Request): Pagination {
    const page = Math.min(
      MAX_PAGE,
      Math.max(1, parseInt(this.getQueryString(req, 'page') ?? '', 10) || 1)
    );
    const perPage = Math.min(
      MAX_PAGE_SIZE,
      Math.max(1, parseInt(this.getQueryString(req, 'per_page') ?? '', 10) || DEFAULT_PAGE_SIZE)
    );

    return { page, perPage };
  }

  /**
   * Extract filters from request query
   */
  protected getFilters<K extends string>(req: Request, allowedFilters: readonly K[]): Partial<Record<K, string>> {
    const filters: Partial<Record<K, string>> = {};

    for (const key of allowedFilters) {
      const value = this.getQueryString(req, key);
      if (value !== undefined) {
        filters[key] = value;
      }
    }

    return filters;
  }
}
