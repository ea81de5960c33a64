import { ApiClientException } from './api-client.exception';

export class TransportException extends ApiClientException {
  constructor(
    public readonly url: string,
    originalError: Error,
    public readonly code?: string,
  ) {
    super(
      `Transport error for ${url}: ${originalError.message}`,
      'TransportException',
      originalError,
    );
  }
}
