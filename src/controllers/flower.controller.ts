import type { Request, Response, NextFunction } from 'express';
import { BaseController } from './base.controller';
import { FlowerError } from '@/errors/flower.errors';
import type { FlowerSearchCriteria } from '@/interfaces/flower.interface';
import {
  CreateFlowerSchema,
  FlowerFiltersSchema,
  FlowerIdParamsSchema,
  StockAdjustmentSchema,
  UpdateFlowerSchema,
} from '@/schemas/flower.schemas';
import type { FlowerService } from '@/services/flower.service';

export class FlowerController extends BaseController {
  constructor(private readonly flowerService: FlowerService) {
    super();
  }

  private parseId(req: Request): string {
    const parsed = FlowerIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw FlowerError.invalidId();
    }
    return parsed.data.id;
  }

  /**
   * GET /api/flowers
   * Plain listing, or a search when `search` or `color` is given
   */
  async listFlowers(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const pagination = this.getPagination(req);
      const { search, color } = FlowerFiltersSchema.parse(this.getFilters(req, ['search', 'color'] as const));

      const criteria: FlowerSearchCriteria = {};
      if (search !== undefined) criteria.query = search;
      if (color !== undefined) criteria.color = color;

      const result =
        search !== undefined || color !== undefined
          ? await this.flowerService.searchFlowers(criteria, pagination)
          : await this.flowerService.listFlowers(pagination);

      this.success(res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/flowers/:id
   */
  async getFlower(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const flower = await this.flowerService.getFlower(this.parseId(req));
      this.success(res, flower);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/flowers
   */
  async createFlower(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const request = CreateFlowerSchema.parse(req.body);
      const flower = await this.flowerService.createFlower(request);
      this.success(res, flower, 'Flower created successfully', 201);
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/flowers/:id
   */
  async updateFlower(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = this.parseId(req);
      const request = UpdateFlowerSchema.parse(req.body);
      const flower = await this.flowerService.updateFlower(id, request);
      this.success(res, flower, 'Flower updated successfully');
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/flowers/:id/stock
   */
  async adjustStock(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = this.parseId(req);
      const request = StockAdjustmentSchema.parse(req.body);
      const flower = await this.flowerService.adjustStock(id, request);
      this.success(res, flower, 'Stock adjusted successfully');
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/flowers/:id
   */
  async deleteFlower(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await this.flowerService.deleteFlower(this.parseId(req));
      this.noContent(res);
    } catch (error) {
      next(error);
    }
  }
}
