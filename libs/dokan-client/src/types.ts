import { optionalField, queryField } from '@libs/dokan-http-core';
import type { CallOptions, QuerySchema, RequestDescription, ResponseEnvelope } from '@libs/dokan-http-core';

/**
 * Dokan API wire types.
 *
 * Field names follow the JSON the marketplace sends and accepts; timestamps
 * stay ISO strings as they arrive.
 */

// ============================================================================
// Transport seam used by the resource services
// ============================================================================

export interface DokanRequester {
  request(description: RequestDescription, options?: CallOptions): Promise<ResponseEnvelope>;
}

// ============================================================================
// Enumerations
// ============================================================================

export type ProductType = 'simple' | 'grouped' | 'external' | 'variable';

export type ProductStatus = 'draft' | 'pending' | 'publish';

export type CatalogVisibility = 'visible' | 'catalog' | 'search' | 'hidden';

export type OrderStatus =
  | 'pending'
  | 'processing'
  | 'on-hold'
  | 'completed'
  | 'cancelled'
  | 'refunded'
  | 'failed';

export type SortOrder = 'asc' | 'desc';

// ============================================================================
// Shared
// ============================================================================

export interface MetaData {
  id?: number;
  key: string;
  value: unknown;
}

export interface Address {
  first_name: string;
  last_name: string;
  company?: string;
  address_1: string;
  address_2?: string;
  city: string;
  state: string;
  postcode: string;
  country: string;
  email?: string;
  phone?: string;
}

// ============================================================================
// Products
// ============================================================================

export interface ProductCategory {
  id: number;
  name: string;
  slug: string;
}

export interface ProductTag {
  id: number;
  name: string;
  slug: string;
}

export interface ProductImage {
  id?: number;
  src: string;
  name?: string;
  alt?: string;
  position?: number;
}

export interface ProductAttribute {
  id?: number;
  name: string;
  position?: number;
  visible: boolean;
  variation: boolean;
  options: string[];
}

export interface Product {
  id?: number;
  name: string;
  slug?: string;
  permalink?: string;
  date_created?: string;
  date_created_gmt?: string;
  date_modified?: string;
  date_modified_gmt?: string;
  type?: ProductType;
  status?: ProductStatus;
  featured?: boolean;
  catalog_visibility?: CatalogVisibility;
  description?: string;
  short_description?: string;
  sku?: string;
  price?: string;
  regular_price?: string;
  sale_price?: string;
  date_on_sale_from?: string;
  date_on_sale_to?: string;
  price_html?: string;
  on_sale?: boolean;
  purchasable?: boolean;
  total_sales?: number;
  virtual?: boolean;
  downloadable?: boolean;
  categories?: ProductCategory[];
  tags?: ProductTag[];
  images?: ProductImage[];
  attributes?: ProductAttribute[];
  default_attributes?: ProductAttribute[];
  variations?: number[];
  grouped_products?: number[];
  menu_order?: number;
  meta_data?: MetaData[];
}

export interface ProductSummary {
  total: number;
  published: number;
  draft: number;
  pending: number;
  featured: number;
}

// ============================================================================
// Orders
// ============================================================================

export interface TaxLine {
  id?: number;
  rate_code: string;
  rate_id: number;
  label: string;
  compound: boolean;
  tax_total: string;
  shipping_tax_total: string;
  meta_data?: MetaData[];
}

export interface LineItem {
  id?: number;
  name: string;
  product_id: number;
  variation_id?: number;
  quantity: number;
  tax_class?: string;
  subtotal: string;
  subtotal_tax: string;
  total: string;
  total_tax: string;
  taxes?: TaxLine[];
  meta_data?: MetaData[];
  sku?: string;
  price?: number;
}

export interface ShippingLine {
  id?: number;
  method_title: string;
  method_id: string;
  total: string;
  total_tax: string;
  taxes?: TaxLine[];
  meta_data?: MetaData[];
}

export interface FeeLine {
  id?: number;
  name: string;
  tax_class?: string;
  tax_status: string;
  total: string;
  total_tax: string;
  taxes?: TaxLine[];
  meta_data?: MetaData[];
}

export interface CouponLine {
  id?: number;
  code: string;
  discount: string;
  discount_tax: string;
  meta_data?: MetaData[];
}

export interface Refund {
  id: number;
  reason?: string;
  total: string;
}

export interface Order {
  id?: number;
  parent_id?: number;
  number?: string;
  order_key?: string;
  created_via?: string;
  version?: string;
  status: OrderStatus;
  currency: string;
  date_created?: string;
  date_created_gmt?: string;
  date_modified?: string;
  date_modified_gmt?: string;
  discount_total?: string;
  discount_tax?: string;
  shipping_total?: string;
  shipping_tax?: string;
  cart_tax?: string;
  total?: string;
  total_tax?: string;
  prices_include_tax?: boolean;
  customer_id?: number;
  customer_note?: string;
  billing?: Address;
  shipping?: Address;
  payment_method?: string;
  payment_method_title?: string;
  transaction_id?: string;
  date_paid?: string;
  date_completed?: string;
  line_items?: LineItem[];
  tax_lines?: TaxLine[];
  shipping_lines?: ShippingLine[];
  fee_lines?: FeeLine[];
  coupon_lines?: CouponLine[];
  refunds?: Refund[];
  meta_data?: MetaData[];
}

/** Fields an order update may change. Absent fields are left untouched. */
export interface OrderUpdate {
  status?: OrderStatus;
  customer_note?: string;
  billing?: Address;
  shipping?: Address;
  line_items?: LineItem[];
  shipping_lines?: ShippingLine[];
  fee_lines?: FeeLine[];
  coupon_lines?: CouponLine[];
  meta_data?: MetaData[];
}

export interface OrderSummary {
  total: number;
  totals: Record<string, number>;
  status_counts: Partial<Record<OrderStatus, number>>;
}

// ============================================================================
// Stores
// ============================================================================

export interface Rating {
  rating: string;
  count: number;
}

export interface Store {
  id: number;
  store_name: string;
  first_name: string;
  last_name: string;
  email: string;
  phone?: string;
  show_email?: boolean;
  address?: Address;
  location?: string;
  banner?: string;
  icon?: string;
  gravatar?: string;
  shop_url?: string;
  products_url?: string;
  tocs_url?: string;
  featured?: boolean;
  rating?: Rating;
  enabled?: boolean;
  registered?: string;
  payment?: Record<string, Record<string, string>>;
  social?: Record<string, string>;
}

export interface Review {
  id: number;
  product_id: number;
  status: string;
  reviewer: string;
  reviewer_email: string;
  review: string;
  rating: number;
  verified: boolean;
  date_created: string;
  date_created_gmt: string;
}

// ============================================================================
// List parameters
// ============================================================================

export interface ListParams {
  page?: number;
  perPage?: number;
  search?: string;
  orderBy?: string;
  order?: SortOrder;
}

export const listParamsSchema: QuerySchema<ListParams> = {
  page: optionalField('page'),
  perPage: optionalField('per_page'),
  search: optionalField('search'),
  orderBy: optionalField('orderby'),
  order: optionalField('order'),
};

export interface ProductListParams extends ListParams {
  status?: ProductStatus[];
  type?: ProductType[];
  /** `false` is sent as a filter; leave undefined to not filter. */
  featured?: boolean;
  category?: number[];
  tag?: number[];
  minPrice?: number;
  maxPrice?: number;
  stockStatus?: string;
  sku?: string;
}

export const productListParamsSchema: QuerySchema<ProductListParams> = {
  ...listParamsSchema,
  status: optionalField('status'),
  type: optionalField('type'),
  featured: queryField('featured'),
  category: optionalField('category'),
  tag: optionalField('tag'),
  minPrice: queryField('min_price'),
  maxPrice: queryField('max_price'),
  stockStatus: optionalField('stock_status'),
  sku: optionalField('sku'),
};

export interface OrderListParams extends ListParams {
  status?: OrderStatus[];
  customer?: number;
  product?: number;
  after?: Date;
  before?: Date;
  modifiedAfter?: Date;
  modifiedBefore?: Date;
}

export const orderListParamsSchema: QuerySchema<OrderListParams> = {
  ...listParamsSchema,
  status: optionalField('status'),
  customer: optionalField('customer'),
  product: optionalField('product'),
  after: queryField('after'),
  before: queryField('before'),
  modifiedAfter: queryField('modified_after'),
  modifiedBefore: queryField('modified_before'),
};

export interface StoreListParams extends ListParams {
  featured?: boolean;
  enabled?: boolean;
}

export const storeListParamsSchema: QuerySchema<StoreListParams> = {
  ...listParamsSchema,
  featured: queryField('featured'),
  enabled: queryField('enabled'),
};

export interface ReviewListParams extends ListParams {
  product?: number;
  status?: string;
  reviewer?: string;
  rating?: number;
}

export const reviewListParamsSchema: QuerySchema<ReviewListParams> = {
  ...listParamsSchema,
  product: optionalField('product'),
  status: optionalField('status'),
  reviewer: optionalField('reviewer'),
  rating: optionalField('rating'),
};

// ============================================================================
// List results
// ============================================================================

export interface ListResult<T> {
  items: T[];
  /** From `X-WP-Total`; 0 when the header is missing. */
  totalItems: number;
  /** From `X-WP-TotalPages`; 0 when the header is missing. */
  totalPages: number;
  page: number;
  perPage: number;
}

export interface VendorListResult<T> extends ListResult<T> {
  vendorId: number;
}
