/**
 * Error taxonomy for the provider.
 *
 * Every error raised by this package is a ProviderError. HTTP-derived errors
 * carry the endpoint, status and a truncated, token-free copy of the body.
 */

const MAX_BODY_LENGTH = 500;

export type ProviderErrorCode =
  | "CONFIGURATION_ERROR"
  | "CRYPTO_ERROR"
  | "AUTH_ERROR"
  | "TRANSPORT_ERROR"
  | "PROTOCOL_ERROR";

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly code: ProviderErrorCode,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

export class ConfigurationError extends ProviderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

export class CryptoError extends ProviderError {
  constructor(message: string, cause?: unknown) {
    super(message, "CRYPTO_ERROR", {}, { cause });
    this.name = "CryptoError";
  }
}

export interface HttpErrorContext {
  endpoint: string;
  status: number;
  body?: unknown;
  cause?: unknown;
}

abstract class HttpProviderError extends ProviderError {
  public readonly endpoint: string;
  public readonly status: number;
  public readonly body: string;

  protected constructor(message: string, code: ProviderErrorCode, ctx: HttpErrorContext) {
    const body = describeBody(ctx.body);
    super(message, code, { endpoint: ctx.endpoint, status: ctx.status, body }, { cause: ctx.cause });
    this.endpoint = ctx.endpoint;
    this.status = ctx.status;
    this.body = body;
  }
}

/** Token issuance (or another App-authenticated call) was rejected. */
export class AuthError extends HttpProviderError {
  constructor(message: string, ctx: HttpErrorContext) {
    super(message, "AUTH_ERROR", ctx);
    this.name = "AuthError";
  }
}

/** Non-2xx from the GraphQL endpoint. */
export class TransportError extends HttpProviderError {
  constructor(message: string, ctx: HttpErrorContext) {
    super(message, "TRANSPORT_ERROR", ctx);
    this.name = "TransportError";
  }
}

/** 2xx with a body that is not a GraphQL envelope. */
export class ProtocolError extends HttpProviderError {
  constructor(message: string, ctx: HttpErrorContext) {
    super(message, "PROTOCOL_ERROR", ctx);
    this.name = "ProtocolError";
  }
}

/** Strip anything that looks like a GitHub token or a JWT. */
export function redactSecrets(text: string): string {
  return text
    .replace(/\b(?:gh[pousr]_|github_pat_)[A-Za-z0-9_]+/g, "[REDACTED]")
    .replace(/\beyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]*/g, "[REDACTED]")
    .replace(/((?:token|bearer)\s+)[^\s"',]+/gi, "$1[REDACTED]")
    .replace(/("(?:token|access_token|refresh_token)"\s*:\s*")[^"]*/gi, "$1[REDACTED]");
}

export function describeBody(body: unknown): string {
  if (body === undefined || body === null || body === "") return "";
  let text: string;
  if (typeof body === "string") {
    text = body;
  } else {
    try {
      text = JSON.stringify(body);
    } catch {
      text = String(body);
    }
  }
  text = redactSecrets(text);
  return text.length > MAX_BODY_LENGTH ? `${text.slice(0, MAX_BODY_LENGTH)}…` : text;
}
