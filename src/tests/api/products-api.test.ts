import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createTestApp } from '../utils/test-helpers';

const FOUND_ID = '25ca8c18-43d4-4da3-ad14-2dc127365b04';
const MISSING_ID = '05ca8c18-43d4-4da3-ad14-2dc127365b04';
const CONFLICT_ID = '15ca8c18-43d4-4da3-ad14-2dc127365b04';
const TIMEOUT_ID = '55ca8c18-43d4-4da3-ad14-2dc127365b04';
const BROKEN_ID = '95ca8c18-43d4-4da3-ad14-2dc127365b04';

const productData = {
  name: 'Desk Lamp',
  description: 'Warm white LED',
  price: 49.5,
  category: 'lighting',
};

describe('Products API', () => {
  let app: Express;

  beforeEach(() => {
    ({ app } = createTestApp());
  });

  describe('GET /api/v1/products', () => {
    it('should list products with pagination', async () => {
      const response = await request(app).get('/api/v1/products?limit=2').expect(200);

      expect(response.body.items).toHaveLength(2);
      expect(response.body).toMatchObject({ total: 100, page: 1, limit: 2 });
    });

    it('should return 503 when overloaded', async () => {
      const response = await request(app).get('/api/v1/products?page=11&limit=60').expect(503);

      expect(response.body.error).toEqual({
        message: 'Service temporarily overloaded. Please reduce page size.',
        statusCode: 503,
        errorCode: 'SERVICE_UNAVAILABLE',
      });
    });

    it('should reject limits above 100', async () => {
      const response = await request(app).get('/api/v1/products?limit=500').expect(400);

      expect(response.body.error.message).toBe('Validation failed');
      expect(response.body.error.errors[0].path).toBe('limit');
    });
  });

  describe('POST /api/v1/products', () => {
    it('should create a product', async () => {
      const response = await request(app).post('/api/v1/products').send(productData).expect(201);

      expect(response.body.data).toMatchObject(productData);
      expect(response.body.data.id).toBeDefined();
    });

    it('should reject prices above the maximum', async () => {
      const response = await request(app)
        .post('/api/v1/products')
        .send({ ...productData, price: 5000 })
        .expect(400);

      expect(response.body.error.message).toBe('Price exceeds maximum allowed value');
    });

    it('should reject invalid product data', async () => {
      const response = await request(app)
        .post('/api/v1/products')
        .send({ name: 'Desk Lamp' })
        .expect(400);

      expect(response.body.error.message).toBe('Validation failed');
    });

    it('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/api/v1/products')
        .set('Content-Type', 'application/json')
        .send('{"name": ')
        .expect(400);

      expect(response.body.error.statusCode).toBe(400);
    });
  });

  describe('GET /api/v1/products/:productId', () => {
    it('should get a product by ID', async () => {
      const response = await request(app).get(`/api/v1/products/${FOUND_ID}`).expect(200);

      expect(response.body.data.id).toBe(FOUND_ID);
    });

    it('should return 404 for a missing product', async () => {
      const response = await request(app).get(`/api/v1/products/${MISSING_ID}`).expect(404);

      expect(response.body.error.message).toBe('Product not found');
    });

    it('should return 400 for an id that is not a UUID', async () => {
      await request(app).get('/api/v1/products/42').expect(400);
    });
  });

  describe('PUT /api/v1/products/:productId', () => {
    it('should update a product', async () => {
      const response = await request(app).put(`/api/v1/products/${FOUND_ID}`).send(productData).expect(200);

      expect(response.body.data).toMatchObject({ id: FOUND_ID, ...productData });
    });

    it('should return 409 on a concurrent modification', async () => {
      const response = await request(app).put(`/api/v1/products/${CONFLICT_ID}`).send(productData).expect(409);

      expect(response.body.error.errorCode).toBe('CONFLICT');
    });
  });

  describe('DELETE /api/v1/products/:productId', () => {
    it('should delete a product', async () => {
      const response = await request(app).delete(`/api/v1/products/${FOUND_ID}`).expect(200);

      expect(response.body).toEqual({ status: 'success', message: `Product ${FOUND_ID} deleted` });
    });

    it('should return 500 when deletion fails', async () => {
      const response = await request(app).delete(`/api/v1/products/${BROKEN_ID}`).expect(500);

      expect(response.body).toEqual({
        error: { message: 'Internal server error during deletion', statusCode: 500 },
      });
    });
  });

  describe('POST /api/v1/products/:productId/process', () => {
    it('should process a product', async () => {
      const response = await request(app).post(`/api/v1/products/${FOUND_ID}/process`).expect(200);

      expect(response.body.data).toMatchObject({ status: 'success', productId: FOUND_ID });
    });

    it('should return 504 when processing times out', async () => {
      const response = await request(app).post(`/api/v1/products/${TIMEOUT_ID}/process`).expect(504);

      expect(response.body.error.message).toBe('Processing timed out');
    });
  });

  describe('documentation routes', () => {
    it('should redirect the root to the OpenAPI document', async () => {
      const response = await request(app).get('/').expect(302);

      expect(response.headers.location).toBe('/openapi.json');
    });

    it('should leave operational endpoints out of the OpenAPI document', async () => {
      const response = await request(app).get('/openapi.json').expect(200);
      const paths = Object.keys(response.body.paths);

      expect(paths).toContain('/api/v1/products');
      expect(paths).not.toContain('/metrics');
      expect(paths).not.toContain('/health');
    });
  });

  it('should return 404 for unknown routes', async () => {
    const response = await request(app).get('/api/v1/nope').expect(404);

    expect(response.body.error.message).toBe('Route GET /api/v1/nope not found');
  });
});
