export * from './api-client.exception';
export * from './client-closed.exception';
export * from './client-construction.exception';
export * from './decode.exception';
export * from './request-cancelled.exception';
export * from './transport.exception';
