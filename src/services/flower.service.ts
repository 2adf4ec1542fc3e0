import { v4 as uuidv4 } from 'uuid';
import { FlowerError } from '@/errors/flower.errors';
import type {
  CreateFlowerRequest,
  FlowerChanges,
  FlowerRepositoryPort,
  FlowerResponse,
  FlowerSearchCriteria,
  PaginatedResponse,
  Pagination,
  StockAdjustmentRequest,
  UpdateFlowerRequest,
} from '@/interfaces/flower.interface';
import type { Flower } from '@/types/database';
import { BaseService } from './base.service';

export const NAME_MAX_LENGTH = 100;
export const COLOR_MAX_LENGTH = 50;
export const STOCK_MAX = 2_147_483_647;

const hasNul = (value: string) => value.includes('\u0000');

export const normalizeName = (name: string): string => {
  const trimmed = name.trim();
  if (hasNul(trimmed)) {
    throw FlowerError.invalidName('name cannot contain NUL characters');
  }
  if (trimmed.length === 0) {
    throw FlowerError.invalidName('name cannot be empty');
  }
  if (trimmed.length > NAME_MAX_LENGTH) {
    throw FlowerError.invalidName(`name cannot exceed ${NAME_MAX_LENGTH} characters`);
  }
  return trimmed;
};

export const normalizeColor = (color: string): string => {
  const trimmed = color.trim();
  if (hasNul(trimmed)) {
    throw FlowerError.invalidColor('color cannot contain NUL characters');
  }
  if (trimmed.length === 0) {
    throw FlowerError.invalidColor('color cannot be empty');
  }
  if (trimmed.length > COLOR_MAX_LENGTH) {
    throw FlowerError.invalidColor(`color cannot exceed ${COLOR_MAX_LENGTH} characters`);
  }
  return trimmed.toLowerCase();
};

export const normalizeDescription = (description: string | null): string | null => {
  if (description !== null && hasNul(description)) {
    throw FlowerError.invalidDescription('description cannot contain NUL characters');
  }
  return description;
};

export const toFlowerResponse = (flower: Flower): FlowerResponse => ({
  id: flower.id,
  name: flower.name,
  color: flower.color,
  description: flower.description,
  price: flower.price,
  stock: flower.stock,
  created_at: flower.createdAt.toISOString(),
  updated_at: flower.updatedAt.toISOString(),
});

/**
 * Flower catalog use cases
 */
export class FlowerService extends BaseService {
  constructor(private readonly repository: FlowerRepositoryPort) {
    super();
  }

  private async requireFlower(id: string): Promise<Flower> {
    const flower = await this.repository.findById(id);
    if (!flower) {
      throw FlowerError.notFound(id);
    }
    return flower;
  }

  async getFlower(id: string): Promise<FlowerResponse> {
    return toFlowerResponse(await this.requireFlower(id));
  }

  async listFlowers(pagination: Pagination): Promise<PaginatedResponse<FlowerResponse>> {
    const flowers = await this.repository.findAll(this.toWindow(pagination));
    const total = await this.repository.count();

    return this.createPaginatedResponse(flowers.map(toFlowerResponse), total, pagination);
  }

  async searchFlowers(
    criteria: FlowerSearchCriteria,
    pagination: Pagination
  ): Promise<PaginatedResponse<FlowerResponse>> {
    const flowers = await this.repository.search(criteria, this.toWindow(pagination));
    const total = await this.repository.countSearch(criteria);

    return this.createPaginatedResponse(flowers.map(toFlowerResponse), total, pagination);
  }

  async createFlower(request: CreateFlowerRequest): Promise<FlowerResponse> {
    const now = new Date();
    const created = await this.repository.create({
      id: uuidv4(),
      name: normalizeName(request.name),
      color: normalizeColor(request.color),
      description: normalizeDescription(request.description ?? null),
      price: request.price ?? 0,
      stock: request.stock ?? 0,
      createdAt: now,
      updatedAt: now,
    });

    this.logOperation('createFlower', { id: created.id, name: created.name });
    return toFlowerResponse(created);
  }

  async updateFlower(id: string, request: UpdateFlowerRequest): Promise<FlowerResponse> {
    const flower = await this.requireFlower(id);
    const changes: FlowerChanges = {};

    if (request.name !== undefined) changes.name = normalizeName(request.name);
    if (request.color !== undefined) changes.color = normalizeColor(request.color);
    if (request.description !== undefined) changes.description = normalizeDescription(request.description);
    if (request.price !== undefined) changes.price = request.price;
    if (request.stock !== undefined) changes.stock = request.stock;

    if (Object.keys(changes).length === 0) {
      return toFlowerResponse(flower);
    }

    changes.updatedAt = new Date();
    const updated = await this.repository.update(id, changes);
    if (!updated) {
      throw FlowerError.notFound(id);
    }

    this.logOperation('updateFlower', { id, fields: Object.keys(changes) });
    return toFlowerResponse(updated);
  }

  async adjustStock(id: string, request: StockAdjustmentRequest): Promise<FlowerResponse> {
    const flower = await this.requireFlower(id);
    const delta = request.action === 'add' ? request.quantity : -request.quantity;

    if (request.action === 'reduce' && flower.stock < request.quantity) {
      throw FlowerError.insufficientStock();
    }
    if (request.action === 'add' && flower.stock + request.quantity > STOCK_MAX) {
      throw FlowerError.stockLimitExceeded();
    }

    const updated = await this.repository.adjustStock(id, delta);
    if (!updated) {
      // Lost a race with a concurrent change: tell the caller which case it was
      await this.requireFlower(id);
      throw request.action === 'add' ? FlowerError.stockLimitExceeded() : FlowerError.insufficientStock();
    }

    this.logOperation('adjustStock', { id, action: request.action, quantity: request.quantity });
    return toFlowerResponse(updated);
  }

  async deleteFlower(id: string): Promise<void> {
    await this.requireFlower(id);
    await this.repository.delete(id);
    this.logOperation('deleteFlower', { id });
  }
}
