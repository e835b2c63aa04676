export class InvalidRequestError extends Error {
  readonly statusCode = 400;

  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class UpstreamError extends Error {
  readonly statusCode = 502;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UpstreamError';
  }
}

export class MalformedUpstreamResponseError extends UpstreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedUpstreamResponseError';
  }
}

export class ConfigurationError extends Error {
  readonly statusCode = 500;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
