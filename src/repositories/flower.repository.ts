import { and, count, desc, eq, gte, ilike, lte, sql, type SQL } from 'drizzle-orm';
import type { Database } from '@/db/connection';
import { flowers } from '@/db/schema';
import type { Flower, NewFlower } from '@/types/database';
import type {
  FlowerChanges,
  FlowerRepositoryPort,
  FlowerSearchCriteria,
  PageWindow,
} from '@/interfaces/flower.interface';
import { STOCK_MAX } from '@/services/flower.service';
import { BaseRepository } from './base.repository';

// Escape LIKE wildcards so user input only ever matches literally
const escapeLike = (value: string) => value.replace(/[\\%_]/g, match => `\\${match}`);

export class FlowerRepository extends BaseRepository implements FlowerRepositoryPort {
  protected tableName = 'flowers';

  constructor(private readonly db: Database) {
    super();
  }

  private buildSearchFilter(criteria: FlowerSearchCriteria): SQL | undefined {
    const conditions: SQL[] = [];

    if (criteria.query !== undefined) {
      conditions.push(ilike(flowers.name, `%${escapeLike(criteria.query)}%`));
    }

    if (criteria.color !== undefined) {
      conditions.push(eq(sql`lower(${flowers.color})`, criteria.color.toLowerCase()));
    }

    return conditions.length > 0 ? and(...conditions) : undefined;
  }

  async findById(id: string): Promise<Flower | null> {
    try {
      const [flower] = await this.db.select().from(flowers).where(eq(flowers.id, id)).limit(1);
      return flower ?? null;
    } catch (error) {
      this.handleError(error, 'findById');
    }
  }

  /**
   * Newest first; rows sharing a timestamp fall back to descending id
   */
  async findAll(window: PageWindow): Promise<Flower[]> {
    return this.search({}, window);
  }

  async count(): Promise<number> {
    return this.countSearch({});
  }

  async search(criteria: FlowerSearchCriteria, window: PageWindow): Promise<Flower[]> {
    const { limit, offset } = this.validateWindow(window);
    this.logOperation('search', { ...criteria, limit, offset });

    try {
      return await this.db
        .select()
        .from(flowers)
        .where(this.buildSearchFilter(criteria))
        .orderBy(desc(flowers.createdAt), desc(flowers.id))
        .limit(limit)
        .offset(offset);
    } catch (error) {
      this.handleError(error, 'search');
    }
  }

  async countSearch(criteria: FlowerSearchCriteria): Promise<number> {
    try {
      const [result] = await this.db
        .select({ total: count() })
        .from(flowers)
        .where(this.buildSearchFilter(criteria));
      return result?.total ?? 0;
    } catch (error) {
      this.handleError(error, 'countSearch');
    }
  }

  async create(flower: NewFlower): Promise<Flower> {
    this.logOperation('create', { id: flower.id });

    try {
      const [created] = await this.db.insert(flowers).values(flower).returning();
      return created;
    } catch (error) {
      this.handleError(error, 'create');
    }
  }

  async update(id: string, changes: FlowerChanges): Promise<Flower | null> {
    this.logOperation('update', { id, fields: Object.keys(changes) });

    try {
      const [updated] = await this.db
        .update(flowers)
        .set({ ...changes, updatedAt: changes.updatedAt ?? this.getCurrentTimestamp() })
        .where(eq(flowers.id, id))
        .returning();
      return updated ?? null;
    } catch (error) {
      this.handleError(error, 'update');
    }
  }

  async adjustStock(id: string, delta: number): Promise<Flower | null> {
    this.logOperation('adjustStock', { id, delta });

    try {
      const [updated] = await this.db
        .update(flowers)
        .set({
          stock: sql`${flowers.stock} + ${delta}`,
          updatedAt: this.getCurrentTimestamp(),
        })
        .where(
          and(
            eq(flowers.id, id),
            gte(sql`${flowers.stock}::bigint + ${delta}`, 0),
            lte(sql`${flowers.stock}::bigint + ${delta}`, STOCK_MAX)
          )
        )
        .returning();
      return updated ?? null;
    } catch (error) {
      this.handleError(error, 'adjustStock');
    }
  }

  async delete(id: string): Promise<boolean> {
    this.logOperation('delete', { id });

    try {
      const deleted = await this.db
        .delete(flowers)
        .where(eq(flowers.id, id))
        .returning({ id: flowers.id });
      return deleted.length > 0;
    } catch (error) {
      this.handleError(error, 'delete');
    }
  }
}
