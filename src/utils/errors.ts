// Custom error classes for consistent error handling

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ProviderNotFoundError extends AppError {
  public readonly requested: string;
  public readonly available: readonly string[];

  constructor(requested: string, available: readonly string[]) {
    super(
      `Unknown provider: '${requested}'. Use: ${available.join(' | ')}`,
      400,
      'PROVIDER_NOT_FOUND',
      { available: [...available] }
    );
    this.name = 'ProviderNotFoundError';
    this.requested = requested;
    this.available = available;
  }
}

export class MissingCredentialError extends AppError {
  public readonly provider: string;
  public readonly envVar: string;

  constructor(provider: string, envVar: string, keyUrl: string) {
    super(
      `${envVar} not found! Get a free key from ${keyUrl} and add it to your .env file: ${envVar}=your_key_here`,
      503,
      'MISSING_CREDENTIAL',
      { provider, env_var: envVar }
    );
    this.name = 'MissingCredentialError';
    this.provider = provider;
    this.envVar = envVar;
  }
}

/**
 * Uniform failure taxonomy for upstream chat calls, whatever the upstream.
 */
export type ProviderFailureKind =
  | 'timeout'
  | 'authentication_failed'
  | 'rate_limited'
  | 'quota_exceeded'
  | 'service_unavailable'
  | 'upstream_error';

const FAILURE_STATUS: Record<ProviderFailureKind, number> = {
  timeout: 504,
  authentication_failed: 502,
  rate_limited: 429,
  quota_exceeded: 402,
  service_unavailable: 503,
  upstream_error: 500,
};

export function statusForFailure(kind: ProviderFailureKind): number {
  return FAILURE_STATUS[kind];
}

function upstreamDetails(details: Record<string, unknown>, status?: number): Record<string, unknown> {
  return status === undefined ? details : { ...details, upstream_status: status };
}

export class ProviderError extends AppError {
  public readonly provider: string;
  public readonly kind: ProviderFailureKind;
  public readonly upstreamStatus?: number;
  public readonly upstreamBody?: string;

  constructor(
    provider: string,
    kind: ProviderFailureKind,
    message: string,
    upstream: { status?: number; body?: string; cause?: unknown } = {}
  ) {
    super(
      `${provider}: ${message}`,
      statusForFailure(kind),
      'PROVIDER_ERROR',
      upstreamDetails({ kind }, upstream.status),
      upstream.cause === undefined ? undefined : { cause: upstream.cause }
    );
    this.name = 'ProviderError';
    this.provider = provider;
    this.kind = kind;
    this.upstreamStatus = upstream.status;
    this.upstreamBody = upstream.body;
  }
}

/**
 * Raised by the chat orchestrator around any adapter failure, so callers
 * always learn which provider failed and why.
 */
export class UpstreamFailureError extends AppError {
  public readonly providerId: string;
  public readonly kind: ProviderFailureKind;

  constructor(providerId: string, cause: unknown) {
    const kind = cause instanceof ProviderError ? cause.kind : 'upstream_error';
    const upstreamStatus = cause instanceof ProviderError ? cause.upstreamStatus : undefined;
    const message = cause instanceof Error ? cause.message : String(cause);

    super(
      message,
      statusForFailure(kind),
      'UPSTREAM_FAILURE',
      upstreamDetails({ provider: providerId, kind }, upstreamStatus),
      { cause }
    );
    this.name = 'UpstreamFailureError';
    this.providerId = providerId;
    this.kind = kind;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
