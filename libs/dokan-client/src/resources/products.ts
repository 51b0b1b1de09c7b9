import { taggedQuery, validationError } from '@libs/dokan-http-core';
import type { CallOptions } from '@libs/dokan-http-core';
import { productListParamsSchema } from '../types';
import type { DokanRequester, ListResult, Product, ProductListParams, ProductSummary } from '../types';
import { assertId, assertListParams, requireBody, toListResult } from './shared';

const PRODUCTS_PATH = '/wp-json/dokan/v1/products';

export class ProductsService {
  constructor(private readonly client: DokanRequester) {}

  async create(product: Product, options?: CallOptions): Promise<Product> {
    if (!product.name?.trim()) {
      throw validationError('name', 'required', 'product name is required');
    }

    const response = await this.client.request({ method: 'POST', path: `${PRODUCTS_PATH}/`, body: product }, options);
    return requireBody<Product>(response, 'product');
  }

  async get(id: number, options?: CallOptions): Promise<Product> {
    assertId(id, 'id');
    const response = await this.client.request({ method: 'GET', path: `${PRODUCTS_PATH}/${id}` }, options);
    return requireBody<Product>(response, 'product');
  }

  async list(params: ProductListParams = {}, options?: CallOptions): Promise<ListResult<Product>> {
    assertListParams(params);
    const response = await this.client.request(
      { method: 'GET', path: `${PRODUCTS_PATH}/`, query: taggedQuery(productListParamsSchema, params) },
      options,
    );
    return toListResult<Product>(response, params);
  }

  async update(id: number, product: Partial<Product>, options?: CallOptions): Promise<Product> {
    assertId(id, 'id');
    const response = await this.client.request(
      { method: 'PUT', path: `${PRODUCTS_PATH}/${id}`, body: product },
      options,
    );
    return requireBody<Product>(response, 'product');
  }

  async delete(id: number, options?: CallOptions): Promise<void> {
    assertId(id, 'id');
    await this.client.request({ method: 'DELETE', path: `${PRODUCTS_PATH}/${id}` }, options);
  }

  async getSummary(options?: CallOptions): Promise<ProductSummary> {
    const response = await this.client.request({ method: 'GET', path: `${PRODUCTS_PATH}/summary` }, options);
    return requireBody<ProductSummary>(response, 'product summary');
  }
}
