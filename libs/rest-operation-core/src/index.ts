export * from './types';
export * from './errors';
export * from './descriptor';
export * from './bindings';
export * from './shapes';
export { Deferred } from './deferred';
export { buildRequest } from './requestBuilder';
export { OperationDispatcher } from './OperationDispatcher';
export { OperationRegistry, createOperationRegistry } from './registry';
export { createDefaultDispatcher } from './factories';
export { ConsoleLogger, errorMessage } from './logging';
export { JsonCodec, jsonCodec, JSON_MIME_TYPE } from './codec/jsonCodec';
export { fetchTransport } from './transport/fetchTransport';
export { createAxiosTransport, type AxiosInstanceLike, type AxiosRequestConfigLike } from './transport/axiosTransport';
