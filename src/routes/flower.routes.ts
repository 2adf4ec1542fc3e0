import { Router } from 'express';
import type { FlowerController } from '@/controllers/flower.controller';

export const createFlowerRouter = (flowerController: FlowerController): Router => {
  const router = Router();

  /**
   * GET /flowers
   * List flowers with pagination, search and color filter
   */
  router.get('/', flowerController.listFlowers.bind(flowerController));

  /**
   * POST /flowers
   * Create a new flower
   */
  router.post('/', flowerController.createFlower.bind(flowerController));

  /**
   * GET /flowers/:id
   * Get a flower by ID
   */
  router.get('/:id', flowerController.getFlower.bind(flowerController));

  /**
   * PUT /flowers/:id
   * Update an existing flower
   */
  router.put('/:id', flowerController.updateFlower.bind(flowerController));

  /**
   * POST /flowers/:id/stock
   * Add to or reduce the stock of a flower
   */
  router.post('/:id/stock', flowerController.adjustStock.bind(flowerController));

  /**
   * DELETE /flowers/:id
   * Delete a flower
   */
  router.delete('/:id', flowerController.deleteFlower.bind(flowerController));

  return router;
};
