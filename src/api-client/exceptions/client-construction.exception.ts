import { ApiClientException } from './api-client.exception';

export class ClientConstructionException extends ApiClientException {
  constructor(reason: string, cause?: unknown) {
    super(
      `Failed to construct API client: ${reason}`,
      'ClientConstructionException',
      cause,
    );
  }
}
