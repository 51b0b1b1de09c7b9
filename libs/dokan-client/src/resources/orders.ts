import { taggedQuery } from '@libs/dokan-http-core';
import type { CallOptions } from '@libs/dokan-http-core';
import { orderListParamsSchema } from '../types';
import type { DokanRequester, ListResult, Order, OrderListParams, OrderSummary, OrderUpdate } from '../types';
import { assertId, assertListParams, requireBody, toListResult } from './shared';

const ORDERS_PATH = '/wp-json/dokan/v1/orders';

/** Vendor orders. Orders are created by the storefront, so there is no `create`. */
export class OrdersService {
  constructor(private readonly client: DokanRequester) {}

  async get(id: number, options?: CallOptions): Promise<Order> {
    assertId(id, 'id');
    const response = await this.client.request({ method: 'GET', path: `${ORDERS_PATH}/${id}` }, options);
    return requireBody<Order>(response, 'order');
  }

  async list(params: OrderListParams = {}, options?: CallOptions): Promise<ListResult<Order>> {
    assertListParams(params);
    const response = await this.client.request(
      { method: 'GET', path: `${ORDERS_PATH}/`, query: taggedQuery(orderListParamsSchema, params) },
      options,
    );
    return toListResult<Order>(response, params);
  }

  async update(id: number, changes: OrderUpdate, options?: CallOptions): Promise<Order> {
    assertId(id, 'id');
    const response = await this.client.request({ method: 'PUT', path: `${ORDERS_PATH}/${id}`, body: changes }, options);
    return requireBody<Order>(response, 'order');
  }

  async getSummary(options?: CallOptions): Promise<OrderSummary> {
    const response = await this.client.request({ method: 'GET', path: `${ORDERS_PATH}/summary` }, options);
    return requireBody<OrderSummary>(response, 'order summary');
  }
}
