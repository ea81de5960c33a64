import { ApiClientException } from './api-client.exception';

export class RequestCancelledException extends ApiClientException {
  constructor(
    public readonly stage: 'acquire' | 'request',
    reason?: unknown,
  ) {
    super(
      stage === 'acquire'
        ? 'Request cancelled while waiting for a rate limit token'
        : 'Request cancelled while in flight',
      'RequestCancelledException',
      reason,
    );
  }
}
