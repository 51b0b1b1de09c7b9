export * from './types';
export * from './errors';
export * from './classifier';
export * from './auth';
export * from './query';
export * from './retry';
export { RequestExecutor, buildRequestUrl, decodeJson } from './executor';
export type { RequestExecutorConfig } from './executor';
export { setHeader } from './headers';
export { ConsoleLogger } from './logger';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
