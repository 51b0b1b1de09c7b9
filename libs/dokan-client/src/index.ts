export * from './types';
export * from './config';
export * from './dokanClient';
export { ProductsService } from './resources/products';
export { OrdersService } from './resources/orders';
export { StoresService } from './resources/stores';
export { iterateAll, readIntHeader, MAX_PER_PAGE } from './resources/shared';
