import { AxiosInstance } from 'axios';

export const USER_AGENT = 'rate-limited-api-client/1.0';

const decorated = new WeakSet<AxiosInstance>();

export function isDecorated(instance: AxiosInstance): boolean {
  return decorated.has(instance);
}

/**
 * Installs the client's request interceptor on `instance` once. Instances
 * shared between clients are decorated only by the first of them.
 */
export function decorateTransport(instance: AxiosInstance): AxiosInstance {
  if (decorated.has(instance)) {
    return instance;
  }

  instance.interceptors.request.use((config) => {
    config.headers.set('User-Agent', USER_AGENT, false);
    return config;
  });
  decorated.add(instance);

  return instance;
}
