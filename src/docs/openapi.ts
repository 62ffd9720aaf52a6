// OpenAPI document for the public API. The operational endpoints
// (/metrics, /health) are not listed.

const productIdParam = {
  name: 'productId',
  in: 'path',
  required: true,
  schema: { type: 'string', format: 'uuid' },
};

const simulateErrorParam = {
  name: 'simulate_error',
  in: 'query',
  required: false,
  schema: { type: 'boolean', default: false },
};

const productInput = {
  type: 'object',
  required: ['name', 'price', 'category'],
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 100 },
    description: { type: 'string', maxLength: 500, nullable: true },
    price: { type: 'number', exclusiveMinimum: 0 },
    category: { type: 'string', minLength: 1, maxLength: 50 },
  },
};

const errorResponse = (description: string) => ({
  description,
  content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
});

export const openApiDocument = {
  openapi: '3.0.3',
  info: {
    title: 'RED Metrics API',
    version: '0.1.0',
    description:
      'Example API instrumented with Rate, Errors and Duration metrics. ' +
      'Handlers simulate latency and failures so the dashboards have something to show.',
  },
  tags: [
    { name: 'products', description: 'Fabricated product catalogue' },
    { name: 'ai', description: 'Simulated model predictions' },
  ],
  paths: {
    '/api/v1/products': {
      get: {
        tags: ['products'],
        summary: 'List products',
        parameters: [
          { name: 'page', in: 'query', schema: { type: 'integer', minimum: 1, default: 1 } },
          { name: 'limit', in: 'query', schema: { type: 'integer', minimum: 1, maximum: 100, default: 20 } },
          { name: 'category', in: 'query', schema: { type: 'string' } },
        ],
        responses: {
          '200': { description: 'A page of products' },
          '503': errorResponse('Overloaded (page > 10 and limit > 50)'),
        },
      },
      post: {
        tags: ['products'],
        summary: 'Create a product',
        requestBody: { required: true, content: { 'application/json': { schema: productInput } } },
        responses: {
          '201': { description: 'Created product' },
          '400': errorResponse('Invalid body or price above 1000'),
        },
      },
    },
    '/api/v1/products/{productId}': {
      get: {
        tags: ['products'],
        summary: 'Get a product',
        parameters: [productIdParam],
        responses: { '200': { description: 'Product' }, '404': errorResponse('Not found') },
      },
      put: {
        tags: ['products'],
        summary: 'Replace a product',
        parameters: [productIdParam],
        requestBody: { required: true, content: { 'application/json': { schema: productInput } } },
        responses: {
          '200': { description: 'Updated product' },
          '404': errorResponse('Not found'),
          '409': errorResponse('Concurrent modification'),
        },
      },
      delete: {
        tags: ['products'],
        summary: 'Delete a product',
        parameters: [productIdParam],
        responses: {
          '200': { description: 'Deleted' },
          '404': errorResponse('Not found'),
          '500': errorResponse('Deletion failed'),
        },
      },
    },
    '/api/v1/products/{productId}/process': {
      post: {
        tags: ['products'],
        summary: 'Run a heavy processing job on a product',
        parameters: [productIdParam],
        responses: {
          '200': { description: 'Processing result' },
          '404': errorResponse('Not found'),
          '504': errorResponse('Processing timed out'),
        },
      },
    },
    '/api/v1/ai/predict': {
      post: {
        tags: ['ai'],
        summary: 'Request a prediction',
        parameters: [simulateErrorParam],
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: {
                type: 'object',
                required: ['text'],
                properties: {
                  text: { type: 'string', minLength: 1 },
                  modelVersion: { type: 'string', default: 'v1' },
                },
              },
            },
          },
        },
        responses: {
          '200': { description: 'Prediction' },
          '400': errorResponse('Invalid body or simulated error'),
          '500': errorResponse('Simulated error'),
          '503': errorResponse('Simulated error'),
        },
      },
    },
    '/api/v1/ai/predict/{predictionId}': {
      get: {
        tags: ['ai'],
        summary: 'Fetch a prediction',
        parameters: [
          { name: 'predictionId', in: 'path', required: true, schema: { type: 'string', format: 'uuid' } },
          simulateErrorParam,
        ],
        responses: { '200': { description: 'Prediction' }, '404': errorResponse('Not found') },
      },
    },
  },
  components: {
    schemas: {
      Error: {
        type: 'object',
        properties: {
          error: {
            type: 'object',
            properties: {
              message: { type: 'string' },
              statusCode: { type: 'integer' },
              errorCode: { type: 'string' },
            },
          },
        },
      },
    },
  },
};
