import { OpenAPIRegistry, OpenApiGeneratorV3 } from '@asteasolutions/zod-to-openapi';
import {
  ApiResponseFlowerSchema,
  ApiResponsePaginatedFlowerSchema,
  CreateFlowerSchema,
  ErrorResponseSchema,
  FlowerIdParamsSchema,
  HealthResponseSchema,
  ListFlowersQuerySchema,
  StockAdjustmentSchema,
  UpdateFlowerSchema,
} from '@/schemas/flower.schemas';

type OpenApiDocument = ReturnType<OpenApiGeneratorV3['generateDocument']>;

const json = <T>(schema: T) => ({ 'application/json': { schema } });

const errorResponse = (description: string) => ({
  description,
  content: json(ErrorResponseSchema),
});

const buildRegistry = () => {
  const registry = new OpenAPIRegistry();

  registry.registerPath({
    method: 'get',
    path: '/health',
    tags: ['Health'],
    summary: 'Health check',
    responses: {
      200: { description: 'Service is up', content: json(HealthResponseSchema) },
    },
  });

  registry.registerPath({
    method: 'get',
    path: '/api/flowers',
    tags: ['Flowers'],
    summary: 'List flowers, optionally filtered by name or color',
    request: { query: ListFlowersQuerySchema },
    responses: {
      200: { description: 'Page of flowers', content: json(ApiResponsePaginatedFlowerSchema) },
    },
  });

  registry.registerPath({
    method: 'post',
    path: '/api/flowers',
    tags: ['Flowers'],
    summary: 'Create a flower',
    request: { body: { content: json(CreateFlowerSchema) } },
    responses: {
      201: { description: 'Flower created successfully', content: json(ApiResponseFlowerSchema) },
      400: errorResponse('Invalid request body'),
    },
  });

  registry.registerPath({
    method: 'get',
    path: '/api/flowers/{id}',
    tags: ['Flowers'],
    summary: 'Get a flower by id',
    request: { params: FlowerIdParamsSchema },
    responses: {
      200: { description: 'Flower found', content: json(ApiResponseFlowerSchema) },
      400: errorResponse('Invalid flower id'),
      404: errorResponse('Flower not found'),
    },
  });

  registry.registerPath({
    method: 'put',
    path: '/api/flowers/{id}',
    tags: ['Flowers'],
    summary: 'Update a flower',
    request: { params: FlowerIdParamsSchema, body: { content: json(UpdateFlowerSchema) } },
    responses: {
      200: { description: 'Flower updated successfully', content: json(ApiResponseFlowerSchema) },
      400: errorResponse('Invalid request'),
      404: errorResponse('Flower not found'),
    },
  });

  registry.registerPath({
    method: 'post',
    path: '/api/flowers/{id}/stock',
    tags: ['Flowers'],
    summary: 'Add to or reduce the stock of a flower',
    request: { params: FlowerIdParamsSchema, body: { content: json(StockAdjustmentSchema) } },
    responses: {
      200: { description: 'Stock adjusted successfully', content: json(ApiResponseFlowerSchema) },
      400: errorResponse('Invalid request or insufficient stock'),
      404: errorResponse('Flower not found'),
    },
  });

  registry.registerPath({
    method: 'delete',
    path: '/api/flowers/{id}',
    tags: ['Flowers'],
    summary: 'Delete a flower',
    request: { params: FlowerIdParamsSchema },
    responses: {
      204: { description: 'Flower deleted' },
      404: errorResponse('Flower not found'),
    },
  });

  return registry;
};

let cached: OpenApiDocument | undefined;

/**
 * OpenAPI 3.0 document describing the HTTP API
 */
export const getOpenApiDocument = (serverUrl = 'http://localhost:3000'): OpenApiDocument => {
  if (cached && cached.servers?.[0]?.url === serverUrl) {
    return cached;
  }

  const generator = new OpenApiGeneratorV3(buildRegistry().definitions);
  cached = generator.generateDocument({
    openapi: '3.0.0',
    info: {
      title: 'Flower API',
      version: '1.0.0',
      description: 'RESTful API for managing flower data',
      license: { name: 'MIT', url: 'https://opensource.org/licenses/MIT' },
    },
    servers: [{ url: serverUrl, description: 'API server' }],
    tags: [
      { name: 'Health', description: 'Health check endpoints' },
      { name: 'Flowers', description: 'Flower management endpoints' },
    ],
  });

  return cached;
};
