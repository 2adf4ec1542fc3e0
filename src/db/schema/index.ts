// Catalog schemas
export * from './flowers';

// Migration bookkeeping
export * from './schema-migrations';
