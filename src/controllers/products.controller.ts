import type { Request, Response, NextFunction } from 'express';
import type { ProductsService } from '../services/products.service';
import {
  listProductsQuerySchema,
  productIdSchema,
  productInputSchema,
} from '../validators/products.validator';

export class ProductsController {
  constructor(private readonly service: ProductsService) {}

  listProducts = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listProductsQuerySchema.parse(req.query);
      const page = await this.service.listProducts(query);
      res.json(page);
    } catch (error) {
      next(error);
    }
  };

  createProduct = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = productInputSchema.parse(req.body);
      const product = await this.service.createProduct(input);
      res.status(201).json({ data: product });
    } catch (error) {
      next(error);
    }
  };

  getProduct = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const productId = productIdSchema.parse(req.params.productId);
      const product = await this.service.getProduct(productId);
      res.json({ data: product });
    } catch (error) {
      next(error);
    }
  };

  updateProduct = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const productId = productIdSchema.parse(req.params.productId);
      const input = productInputSchema.parse(req.body);
      const product = await this.service.updateProduct(productId, input);
      res.json({ data: product });
    } catch (error) {
      next(error);
    }
  };

  deleteProduct = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const productId = productIdSchema.parse(req.params.productId);
      const result = await this.service.deleteProduct(productId);
      res.json(result);
    } catch (error) {
      next(error);
    }
  };

  processProduct = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const productId = productIdSchema.parse(req.params.productId);
      const result = await this.service.processProduct(productId);
      res.json({ data: result });
    } catch (error) {
      next(error);
    }
  };
}
