import { taggedQuery } from '@libs/dokan-http-core';
import type { CallOptions } from '@libs/dokan-http-core';
import { productListParamsSchema, reviewListParamsSchema, storeListParamsSchema } from '../types';
import type {
  DokanRequester,
  ListResult,
  Product,
  ProductListParams,
  Review,
  ReviewListParams,
  Store,
  StoreListParams,
  VendorListResult,
} from '../types';
import { assertId, assertListParams, requireBody, toListResult } from './shared';

const STORES_PATH = '/wp-json/dokan/v1/stores';

export class StoresService {
  constructor(private readonly client: DokanRequester) {}

  async get(vendorId: number, options?: CallOptions): Promise<Store> {
    assertId(vendorId, 'vendor_id');
    const response = await this.client.request({ method: 'GET', path: `${STORES_PATH}/${vendorId}` }, options);
    return requireBody<Store>(response, 'store');
  }

  async list(params: StoreListParams = {}, options?: CallOptions): Promise<ListResult<Store>> {
    assertListParams(params);
    const response = await this.client.request(
      { method: 'GET', path: `${STORES_PATH}/`, query: taggedQuery(storeListParamsSchema, params) },
      options,
    );
    return toListResult<Store>(response, params);
  }

  async getProducts(
    vendorId: number,
    params: ProductListParams = {},
    options?: CallOptions,
  ): Promise<VendorListResult<Product>> {
    assertId(vendorId, 'vendor_id');
    assertListParams(params);
    const response = await this.client.request(
      {
        method: 'GET',
        path: `${STORES_PATH}/${vendorId}/products`,
        query: taggedQuery(productListParamsSchema, params),
      },
      options,
    );
    return { ...toListResult<Product>(response, params), vendorId };
  }

  async getReviews(
    vendorId: number,
    params: ReviewListParams = {},
    options?: CallOptions,
  ): Promise<VendorListResult<Review>> {
    assertId(vendorId, 'vendor_id');
    assertListParams(params);
    const response = await this.client.request(
      {
        method: 'GET',
        path: `${STORES_PATH}/${vendorId}/reviews`,
        query: taggedQuery(reviewListParamsSchema, params),
      },
      options,
    );
    return { ...toListResult<Review>(response, params), vendorId };
  }
}
