export type ClientErrorCode =
  | 'INVALID_ARGUMENT'
  | 'PAYLOAD_TOO_LARGE'
  | 'IO_ERROR'
  | 'REQUEST_BUILD'
  | 'TRANSPORT'
  | 'TRANSPORT_TIMEOUT'
  | 'API_ERROR'
  | 'DECODE'
  | 'UNSUPPORTED_FORMAT';

export class ClientError extends Error {
  public readonly code: ClientErrorCode;

  constructor(code: ClientErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClientError';
    this.code = code;
  }
}

export class InvalidArgumentError extends ClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_ARGUMENT', message, options);
    this.name = 'InvalidArgumentError';
  }
}

export class PayloadTooLargeError extends ClientError {
  public readonly size: number;
  public readonly limit: number;

  constructor(path: string, size: number, limit: number) {
    super('PAYLOAD_TOO_LARGE', `${path} is ${size} bytes; up to ${limit} bytes are allowed`);
    this.name = 'PayloadTooLargeError';
    this.size = size;
    this.limit = limit;
  }
}

export class IOError extends ClientError {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('IO_ERROR', message, options);
    this.name = 'IOError';
    this.path = path;
  }
}

export class RequestBuildError extends ClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('REQUEST_BUILD', message, options);
    this.name = 'RequestBuildError';
  }
}

export class TransportError extends ClientError {
  constructor(message: string, options?: { cause?: unknown }, code: 'TRANSPORT' | 'TRANSPORT_TIMEOUT' = 'TRANSPORT') {
    super(code, message, options);
    this.name = 'TransportError';
  }
}

export class TransportTimeoutError extends TransportError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(`request timed out after ${timeoutMs}ms`, options, 'TRANSPORT_TIMEOUT');
    this.name = 'TransportTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ApiError extends ClientError {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string) {
    super('API_ERROR', `request failed with ${status}: ${body || '<empty>'}`);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;
  }
}

export class DecodeError extends ClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE', message, options);
    this.name = 'DecodeError';
  }
}

export class UnsupportedFormatError extends ClientError {
  public readonly filename: string;

  constructor(filename: string, supported: readonly string[]) {
    super('UNSUPPORTED_FORMAT', `cannot save ${filename}: extension must be one of ${supported.join(', ')}`);
    this.name = 'UnsupportedFormatError';
    this.filename = filename;
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
