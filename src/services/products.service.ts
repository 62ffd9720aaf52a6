import { randomUUID } from 'crypto';
import { ConflictError, GatewayTimeoutError, InternalServerError, NotFoundError, ServiceUnavailableError, ValidationError } from '../errors';
import type { PageResponse, Product } from '../types/index';
import type { ListProductsQuery, ProductInput } from '../validators/products.validator';
import type { LatencySimulator } from './latency.service';

export const MAX_PRODUCT_PRICE = 1000;
export const CATALOGUE_SIZE = 100;

export interface ProcessResult {
  status: 'success';
  productId: string;
  processId: string;
  completedAt: string;
}

/**
 * Fabricated product catalogue. Nothing is stored; the leading character
 * of a product id selects the failure a handler simulates.
 */
export class ProductsService {
  constructor(private readonly latency: LatencySimulator) {}

  async listProducts(query: ListProductsQuery): Promise<PageResponse<Product>> {
    await this.latency.wait('read');

    if (query.page > 10 && query.limit > 50) {
      throw new ServiceUnavailableError('Service temporarily overloaded. Please reduce page size.');
    }

    const now = new Date().toISOString();
    const items = Array.from({ length: query.limit }, (_, i) => ({
      id: randomUUID(),
      name: `Product ${i}`,
      description: 'Sample product',
      price: 99.99,
      category: query.category ?? 'electronics',
      createdAt: now,
      updatedAt: now,
    }));

    return { items, total: CATALOGUE_SIZE, page: query.page, limit: query.limit };
  }

  async createProduct(input: ProductInput): Promise<Product> {
    await this.latency.wait('write');

    if (input.price > MAX_PRODUCT_PRICE) {
      throw new ValidationError('Price exceeds maximum allowed value');
    }

    const now = new Date().toISOString();
    return { id: randomUUID(), ...input, createdAt: now, updatedAt: now };
  }

  async getProduct(productId: string): Promise<Product> {
    await this.latency.wait('read');
    this.assertExists(productId);

    const now = new Date().toISOString();
    return {
      id: productId,
      name: 'Sample Product',
      description: 'Detailed description',
      price: 199.99,
      category: 'electronics',
      createdAt: now,
      updatedAt: now,
    };
  }

  async updateProduct(productId: string, input: ProductInput): Promise<Product> {
    await this.latency.wait('write');
    this.assertExists(productId);

    if (productId.startsWith('1')) {
      throw new ConflictError('Product was modified by another request');
    }

    const now = new Date().toISOString();
    return { id: productId, ...input, createdAt: now, updatedAt: now };
  }

  async deleteProduct(productId: string): Promise<{ status: 'success'; message: string }> {
    await this.latency.wait('write');
    this.assertExists(productId);

    if (productId.startsWith('9')) {
      throw new InternalServerError('Internal server error during deletion');
    }

    return { status: 'success', message: `Product ${productId} deleted` };
  }

  async processProduct(productId: string): Promise<ProcessResult> {
    await this.latency.wait('heavy');
    this.assertExists(productId);

    if (productId.startsWith('5')) {
      throw new GatewayTimeoutError();
    }

    return {
      status: 'success',
      productId,
      processId: randomUUID(),
      completedAt: new Date().toISOString(),
    };
  }

  private assertExists(productId: string): void {
    if (productId.startsWith('0')) {
      throw new NotFoundError('Product');
    }
  }
}
