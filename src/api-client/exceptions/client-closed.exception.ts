import { ApiClientException } from './api-client.exception';

export class ClientClosedException extends ApiClientException {
  constructor() {
    super('API client has been closed', 'ClientClosedException');
  }
}
