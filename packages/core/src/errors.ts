export type UpstreamErrorKind = 'UpstreamUnreachable' | 'UpstreamTimeout' | 'UpstreamRejected';

export type GatewayErrorKind =
  | 'InvalidRequest'
  | 'InvalidImage'
  | 'UnsupportedProvider'
  | 'InvalidCustomConfig'
  | 'ConversationNotFound'
  | 'AudioNotFound'
  | 'RateLimited'
  | 'Unauthorized'
  | UpstreamErrorKind
  | 'ModelCallFailed'
  | 'SpeechGenerationFailed'
  | 'StorageFailure'
  | 'RequestCancelled'
  | 'InternalError';

interface ErrorDescriptor {
  code: number;
  httpStatus: number;
  suggestion: string;
}

export const ERROR_CATALOG: Record<GatewayErrorKind, ErrorDescriptor> = {
  InvalidRequest: {
    code: 1001,
    httpStatus: 400,
    suggestion: 'Check the request body against the API schema'
  },
  InvalidImage: {
    code: 5001,
    httpStatus: 400,
    suggestion: 'Send a JPEG, PNG, GIF or WebP image below the size limit'
  },
  UnsupportedProvider: {
    code: 7002,
    httpStatus: 400,
    suggestion: 'Choose one of the supported providers or configure its API key'
  },
  InvalidCustomConfig: {
    code: 7003,
    httpStatus: 400,
    suggestion: 'Check base_url, api_key and model_name of the custom provider'
  },
  ConversationNotFound: {
    code: 6001,
    httpStatus: 404,
    suggestion: 'The conversation does not exist or has expired; start a new one'
  },
  AudioNotFound: {
    code: 3004,
    httpStatus: 404,
    suggestion: 'The audio file does not exist or has expired'
  },
  RateLimited: {
    code: 4001,
    httpStatus: 429,
    suggestion: 'Too many requests; retry after the indicated delay'
  },
  Unauthorized: {
    code: 4002,
    httpStatus: 401,
    suggestion: 'Check the API key sent in the Authorization header'
  },
  UpstreamUnreachable: {
    code: 2001,
    httpStatus: 502,
    suggestion: 'Check network connectivity and credentials'
  },
  UpstreamTimeout: {
    code: 2002,
    httpStatus: 504,
    suggestion: 'The provider took too long to answer; retry later'
  },
  UpstreamRejected: {
    code: 2003,
    httpStatus: 502,
    suggestion: 'Check request parameters and provider configuration'
  },
  ModelCallFailed: {
    code: 2000,
    httpStatus: 502,
    suggestion: 'The model call failed; check the provider configuration and retry'
  },
  SpeechGenerationFailed: {
    code: 3002,
    httpStatus: 502,
    suggestion: 'Check the speech provider configuration'
  },
  StorageFailure: {
    code: 3005,
    httpStatus: 500,
    suggestion: 'Check the audio storage backend'
  },
  RequestCancelled: {
    code: 1002,
    httpStatus: 499,
    suggestion: 'The client closed the connection before the answer was ready'
  },
  InternalError: {
    code: 1000,
    httpStatus: 500,
    suggestion: 'Contact support with the request id'
  }
};

export interface GatewayErrorOptions {
  details?: Record<string, unknown> | undefined;
  cause?: unknown;
  suggestion?: string | undefined;
  httpStatus?: number | undefined;
}

export class GatewayError extends Error {
  public readonly kind: GatewayErrorKind;
  public readonly code: number;
  public readonly httpStatus: number;
  public readonly suggestion: string;
  public readonly details: Record<string, unknown> | undefined;

  public constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'GatewayError';
    this.kind = kind;
    this.code = ERROR_CATALOG[kind].code;
    this.httpStatus = options.httpStatus ?? ERROR_CATALOG[kind].httpStatus;
    this.suggestion = options.suggestion ?? ERROR_CATALOG[kind].suggestion;
    this.details = options.details;
  }
}

export class RateLimitedError extends GatewayError {
  public readonly retryAfterSeconds: number;
  public readonly scope: 'address' | 'credential';

  public constructor(scope: 'address' | 'credential', retryAfterMs: number) {
    const retryAfterSeconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
    super('RateLimited', `Rate limit exceeded for this ${scope}`, {
      details: { scope, retry_after_seconds: retryAfterSeconds }
    });
    this.retryAfterSeconds = retryAfterSeconds;
    this.scope = scope;
  }
}

/** The single error a failed model call surfaces as. */
export class ModelCallFailedError extends GatewayError {
  public readonly upstreamKind: UpstreamErrorKind;
  public readonly vendorMessage: string;

  public constructor(provider: string, cause: GatewayError & { kind: UpstreamErrorKind }) {
    super('ModelCallFailed', `Model call to ${provider} failed: ${cause.message}`, {
      cause,
      httpStatus: cause.httpStatus,
      suggestion: cause.suggestion,
      details: { provider, upstream_kind: cause.kind, vendor_message: cause.message }
    });
    this.upstreamKind = cause.kind;
    this.vendorMessage = cause.message;
  }
}

export class ConfigurationError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid gateway configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

export function isUpstreamError(error: GatewayError): error is GatewayError & { kind: UpstreamErrorKind } {
  return error.kind === 'UpstreamUnreachable'
    || error.kind === 'UpstreamTimeout'
    || error.kind === 'UpstreamRejected';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wraps anything thrown into a GatewayError, keeping existing ones as they are. */
export function toGatewayError(error: unknown, fallback: GatewayErrorKind = 'InternalError'): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  return new GatewayError(fallback, describeError(error), { cause: error });
}

const STATUS_HINTS: Record<number, string> = {
  400: 'bad request',
  401: 'invalid API key',
  403: 'access denied',
  404: 'endpoint or model not found',
  413: 'payload too large',
  429: 'provider rate limit reached'
};

/** Normalizes a non-2xx vendor answer. */
export function upstreamRejected(provider: string, status: number | undefined, detail: string): GatewayError {
  const hint = status !== undefined ? STATUS_HINTS[status] : undefined;
  const prefix = status !== undefined ? `${provider} responded ${status}` : `${provider} rejected the request`;
  const message = [prefix, hint, detail.trim()].filter((part) => part && part.length > 0).join(': ');
  return new GatewayError('UpstreamRejected', message, {
    details: { provider, status }
  });
}
