export abstract class ApiClientException extends Error {
  protected constructor(message: string, name: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = name;
  }
}
