/**
 * Identifies one endpoint of the remote API. The request URL is `host + path`,
 * unless the client was built with a base URL, which replaces `host`.
 */
export interface ApiConfig {
  readonly host: string;
  readonly path: string;
}
