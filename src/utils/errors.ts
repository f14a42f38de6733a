import type { ApiErrorBody } from '../types/image.js';

export class OspryClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised for unparseable urls or query values. */
export class UrlParseError extends OspryClientError {
  constructor(
    message: string,
    readonly input: string
  ) {
    super(message);
  }
}

export class RenderOptsValidationError extends OspryClientError {
  constructor(
    message: string,
    readonly field: 'format' | 'maxHeight' | 'maxWidth' | 'timeExpired'
  ) {
    super(message);
  }
}

/**
 * Error reported by the remote api in the `error` field of its response
 * envelope, or synthesized from a non-2xx status that came without one.
 */
export class OspryError extends OspryClientError implements ApiErrorBody {
  httpStatusCode: number;
  // Error.cause is redeclared as the api's cause string
  declare cause: string;

  constructor(body: ApiErrorBody) {
    super(body.message);
    this.httpStatusCode = body.httpStatusCode;
    this.cause = body.cause;
  }
}

export class MetadataDecodeError extends OspryClientError {}

export class DownloadError extends OspryClientError {
  constructor(readonly status: number) {
    super(`download resulted in non-200 status (${status})`);
  }
}
