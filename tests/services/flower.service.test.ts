import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  FlowerService,
  normalizeColor,
  normalizeDescription,
  normalizeName,
  toFlowerResponse,
} from '../../src/services/flower.service';
import { createFlower, MISSING_ID, seedId } from '../fixtures/flowers';
import { InMemoryFlowerRepository } from '../helpers/in-memory-flower.repository';

const at = (iso: string) => new Date(iso);

describe('FlowerService', () => {
  let repository: InMemoryFlowerRepository;
  let service: FlowerService;

  beforeEach(() => {
    repository = new InMemoryFlowerRepository([
      createFlower({ id: seedId(1), name: 'Rose', color: 'red', createdAt: at('2024-01-01T00:00:00Z') }),
      createFlower({ id: seedId(2), name: 'Lily', color: 'white', stock: 5, createdAt: at('2024-01-02T00:00:00Z') }),
      createFlower({ id: seedId(3), name: 'Daisy', color: 'white', createdAt: at('2024-01-03T00:00:00Z') }),
    ]);
    service = new FlowerService(repository);
  });

  describe('NUL characters', () => {
    it('are rejected in names, colors and descriptions', () => {
      expect(() => normalizeName('Ro\u0000se')).toThrow('Invalid flower name: name cannot contain NUL characters');
      expect(() => normalizeColor('re\u0000d')).toThrow('Invalid flower color: color cannot contain NUL characters');
      expect(() => normalizeDescription('\u0000')).toThrow(
        'Invalid flower description: description cannot contain NUL characters'
      );
    });

    it('leave a null description alone', () => {
      expect(normalizeDescription(null)).toBeNull();
    });

    it('stop an update before it reaches the repository', async () => {
      const update = vi.spyOn(repository, 'update');

      await expect(service.updateFlower(seedId(1), { description: 'thorny\u0000' })).rejects.toMatchObject({
        statusCode: 400,
      });
      expect(update).not.toHaveBeenCalled();
    });
  });

  describe('normalizeName / normalizeColor', () => {
    it('trims names', () => {
      expect(normalizeName('  Rose ')).toBe('Rose');
    });

    it('rejects blank and overlong names', () => {
      expect(() => normalizeName('   ')).toThrow('Invalid flower name: name cannot be empty');
      expect(() => normalizeName('x'.repeat(101))).toThrow('Invalid flower name: name cannot exceed 100 characters');
    });

    it('trims and lowercases colors', () => {
      expect(normalizeColor(' Red ')).toBe('red');
    });

    it('rejects blank and overlong colors', () => {
      expect(() => normalizeColor('')).toThrow('Invalid flower color: color cannot be empty');
      expect(() => normalizeColor('y'.repeat(51))).toThrow('Invalid flower color: color cannot exceed 50 characters');
    });
  });

  describe('toFlowerResponse', () => {
    it('maps to snake_case with ISO timestamps', () => {
      expect(toFlowerResponse(createFlower())).toEqual({
        id: seedId(1),
        name: 'Rose',
        color: 'red',
        description: 'A test rose',
        price: 25000,
        stock: 100,
        created_at: '2024-12-11T00:00:00.000Z',
        updated_at: '2024-12-11T00:00:00.000Z',
      });
    });
  });

  describe('getFlower', () => {
    it('returns the flower', async () => {
      const flower = await service.getFlower(seedId(2));

      expect(flower.name).toBe('Lily');
    });

    it('throws a 404 for an unknown id', async () => {
      await expect(service.getFlower(MISSING_ID)).rejects.toMatchObject({
        statusCode: 404,
        message: `Flower not found with id: ${MISSING_ID}`,
      });
    });
  });

  describe('listFlowers', () => {
    it('paginates newest first', async () => {
      const page = await service.listFlowers({ page: 2, perPage: 2 });

      expect(page.data.map(f => f.name)).toEqual(['Rose']);
      expect(page).toMatchObject({ total: 3, page: 2, per_page: 2, total_pages: 2 });
    });

    it('reports zero pages for an empty catalog', async () => {
      const empty = new FlowerService(new InMemoryFlowerRepository());

      expect(await empty.listFlowers({ page: 1, perPage: 10 })).toEqual({
        data: [],
        total: 0,
        page: 1,
        per_page: 10,
        total_pages: 0,
      });
    });
  });

  describe('searchFlowers', () => {
    it('passes the criteria and the computed window to the repository', async () => {
      const search = vi.spyOn(repository, 'search');

      const page = await service.searchFlowers({ color: 'white' }, { page: 1, perPage: 10 });

      expect(search).toHaveBeenCalledWith({ color: 'white' }, { limit: 10, offset: 0 });
      expect(page.data.map(f => f.name)).toEqual(['Daisy', 'Lily']);
      expect(page.total).toBe(2);
    });
  });

  describe('createFlower', () => {
    it('normalizes input and fills defaults', async () => {
      const flower = await service.createFlower({ name: ' Tulip ', color: 'Yellow' });

      expect(flower).toMatchObject({
        name: 'Tulip',
        color: 'yellow',
        description: null,
        price: 0,
        stock: 0,
      });
      expect(flower.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(flower.created_at).toBe(flower.updated_at);
      expect(repository.rows).toHaveLength(4);
    });

    it('rejects an empty name before touching the repository', async () => {
      const create = vi.spyOn(repository, 'create');

      await expect(service.createFlower({ name: ' ', color: 'red' })).rejects.toMatchObject({
        kind: 'validation',
        statusCode: 400,
      });
      expect(create).not.toHaveBeenCalled();
    });
  });

  describe('updateFlower', () => {
    it('applies only the provided fields and bumps updated_at', async () => {
      const flower = await service.updateFlower(seedId(1), { name: 'Red Rose', color: ' CRIMSON ', price: 30000 });

      expect(flower).toMatchObject({ name: 'Red Rose', color: 'crimson', price: 30000, stock: 100 });
      expect(flower.description).toBe('A test rose');
      expect(flower.updated_at).not.toBe('2024-12-11T00:00:00.000Z');
    });

    it('clears the description with null', async () => {
      const flower = await service.updateFlower(seedId(1), { description: null });

      expect(flower.description).toBeNull();
    });

    it('returns the flower unchanged for an empty request', async () => {
      const update = vi.spyOn(repository, 'update');

      const flower = await service.updateFlower(seedId(1), {});

      expect(update).not.toHaveBeenCalled();
      expect(flower.updated_at).toBe('2024-12-11T00:00:00.000Z');
    });

    it('throws a 404 for an unknown id', async () => {
      await expect(service.updateFlower(MISSING_ID, { price: 1 })).rejects.toMatchObject({ statusCode: 404 });
    });

    it('throws a 404 when the row disappears before the update', async () => {
      vi.spyOn(repository, 'update').mockResolvedValueOnce(null);

      await expect(service.updateFlower(seedId(1), { price: 1 })).rejects.toMatchObject({ statusCode: 404 });
    });
  });

  describe('adjustStock', () => {
    it('adds stock', async () => {
      const flower = await service.adjustStock(seedId(2), { action: 'add', quantity: 10 });

      expect(flower.stock).toBe(15);
    });

    it('reduces stock', async () => {
      const flower = await service.adjustStock(seedId(2), { action: 'reduce', quantity: 5 });

      expect(flower.stock).toBe(0);
    });

    it('refuses to reduce below zero', async () => {
      await expect(service.adjustStock(seedId(2), { action: 'reduce', quantity: 6 })).rejects.toMatchObject({
        statusCode: 400,
        message: 'Insufficient stock',
      });
      expect(repository.rows.find(f => f.id === seedId(2))?.stock).toBe(5);
    });

    it('refuses to exceed the integer limit', async () => {
      await expect(
        service.adjustStock(seedId(2), { action: 'add', quantity: 2_147_483_643 })
      ).rejects.toMatchObject({ message: 'Stock limit exceeded' });
    });

    it('reports insufficient stock when a concurrent change wins', async () => {
      vi.spyOn(repository, 'adjustStock').mockResolvedValueOnce(null);

      await expect(service.adjustStock(seedId(2), { action: 'reduce', quantity: 1 })).rejects.toMatchObject({
        message: 'Insufficient stock',
      });
    });

    it('reports the stock limit when a concurrent add wins', async () => {
      vi.spyOn(repository, 'adjustStock').mockResolvedValueOnce(null);

      await expect(service.adjustStock(seedId(2), { action: 'add', quantity: 1 })).rejects.toMatchObject({
        statusCode: 400,
        message: 'Stock limit exceeded',
      });
    });

    it('throws a 404 for an unknown id', async () => {
      await expect(service.adjustStock(MISSING_ID, { action: 'add', quantity: 1 })).rejects.toMatchObject({
        statusCode: 404,
      });
    });
  });

  describe('deleteFlower', () => {
    it('removes the flower', async () => {
      await service.deleteFlower(seedId(3));

      expect(repository.rows.map(f => f.id)).toEqual([seedId(1), seedId(2)]);
    });

    it('throws a 404 for an unknown id without deleting', async () => {
      const remove = vi.spyOn(repository, 'delete');

      await expect(service.deleteFlower(MISSING_ID)).rejects.toMatchObject({ statusCode: 404 });
      expect(remove).not.toHaveBeenCalled();
    });
  });
});
