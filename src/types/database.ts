import type { InferSelectModel, InferInsertModel } from 'drizzle-orm';
import type * as schema from '@/db/schema';

// Flower types
export type Flower = InferSelectModel<typeof schema.flowers>;
export type NewFlower = InferInsertModel<typeof schema.flowers>;
