export const NODE_ENVIRONMENTS = ['development', 'production', 'test'] as const;
export const LOGGER_LEVELS = [
  'error',
  'warn',
  'info',
  'debug',
  'verbose',
] as const;

export const DEFAULT_REQUESTS_PER_SECOND = 10;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_API_KEY_NAME = 'key';

export type NodeEnvironment = (typeof NODE_ENVIRONMENTS)[number];
export type LoggerLevel = (typeof LOGGER_LEVELS)[number];
