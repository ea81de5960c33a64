import { Readable } from 'stream';

export interface BinaryResponse {
  statusCode: number;
  contentType: string;
  /** Still open; the caller must consume or destroy it. */
  data: Readable;
}
