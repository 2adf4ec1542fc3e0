import type { Flower, NewFlower } from '@/types/database';

export interface FlowerResponse {
  id: string;
  name: string;
  color: string;
  description: string | null;
  price: number;
  stock: number;
  created_at: string;
  updated_at: string;
}

export interface CreateFlowerRequest {
  name: string;
  color: string;
  description?: string | null;
  price?: number;
  stock?: number;
}

/**
 * Omitted fields stay as they are; `description: null` clears the description
 */
export interface UpdateFlowerRequest {
  name?: string;
  color?: string;
  description?: string | null;
  price?: number;
  stock?: number;
}

export type StockAction = 'add' | 'reduce';

export interface StockAdjustmentRequest {
  action: StockAction;
  quantity: number;
}

export interface FlowerSearchCriteria {
  query?: string;
  color?: string;
}

export interface Pagination {
  page: number;
  perPage: number;
}

export interface PageWindow {
  limit: number;
  offset: number;
}

export interface PaginatedResponse<T> {
  data: T[];
  total: number;
  page: number;
  per_page: number;
  total_pages: number;
}

export type FlowerChanges = Partial<Pick<NewFlower, 'name' | 'color' | 'description' | 'price' | 'stock' | 'updatedAt'>>;

/**
 * Persistence port for flowers
 */
export interface FlowerRepositoryPort {
  findById(id: string): Promise<Flower | null>;
  findAll(window: PageWindow): Promise<Flower[]>;
  count(): Promise<number>;
  search(criteria: FlowerSearchCriteria, window: PageWindow): Promise<Flower[]>;
  countSearch(criteria: FlowerSearchCriteria): Promise<number>;
  create(flower: NewFlower): Promise<Flower>;
  update(id: string, changes: FlowerChanges): Promise<Flower | null>;
  /** Adds `delta` to the stock unless the result would be negative */
  adjustStock(id: string, delta: number): Promise<Flower | null>;
  delete(id: string): Promise<boolean>;
}
