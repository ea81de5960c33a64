import { ApiClientException } from './api-client.exception';

export class DecodeException extends ApiClientException {
  constructor(
    public readonly url: string,
    reason: string,
    cause?: unknown,
  ) {
    super(
      `Failed to decode response from ${url}: ${reason}`,
      'DecodeException',
      cause,
    );
  }
}
