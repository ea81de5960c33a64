export * from './api-config';
export * from './api-request';
export * from './binary-response';
export * from './request-options';
