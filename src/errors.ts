export type DohProxyErrorKind =
  | "UnsupportedType"
  | "NetworkError"
  | "DecodeError"
  | "UpstreamRejected"
  | "RecordParseError"
  | "AllUpstreamsFailed"
  | "InvalidRequest"
  | "ConfigError";

export class DohProxyError extends Error {
  constructor(
    message: string,
    public readonly kind: DohProxyErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DohProxyError";
  }
}

export class UnsupportedTypeError extends DohProxyError {
  constructor(public readonly type: number | string) {
    super(`Unsupported type ${type}`, "UnsupportedType");
    this.name = "UnsupportedTypeError";
  }
}

export class NetworkError extends DohProxyError {
  constructor(
    public readonly upstream: string,
    cause: unknown,
  ) {
    super(`Request to ${upstream} failed: ${describeError(cause)}`, "NetworkError", { cause });
    this.name = "NetworkError";
  }
}

export class DecodeError extends DohProxyError {
  constructor(
    public readonly upstream: string,
    cause: unknown,
  ) {
    super(`Malformed DoH response from ${upstream}: ${describeError(cause)}`, "DecodeError", { cause });
    this.name = "DecodeError";
  }
}

export class UpstreamRejectedError extends DohProxyError {
  constructor(
    public readonly upstream: string,
    public readonly status: number,
  ) {
    super(`DoH failed response code ${status}`, "UpstreamRejected");
    this.name = "UpstreamRejectedError";
  }
}

export class RecordParseError extends DohProxyError {
  constructor(
    public readonly text: string,
    reason: string,
  ) {
    super(`Cannot parse record "${text}": ${reason}`, "RecordParseError");
    this.name = "RecordParseError";
  }
}

export type UpstreamFailure = { upstream: string; error: Error };

export class AllUpstreamsFailedError extends DohProxyError {
  constructor(
    public readonly question: string,
    public readonly type: number,
    public readonly failures: readonly UpstreamFailure[],
  ) {
    super(`All ${failures.length} upstreams failed for ${question} (type ${type})`, "AllUpstreamsFailed");
    this.name = "AllUpstreamsFailedError";
  }
}

export class InvalidRequestError extends DohProxyError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(reason, "InvalidRequest", options);
    this.name = "InvalidRequestError";
  }
}

export class ConfigError extends DohProxyError {
  constructor(reason: string) {
    super(reason, "ConfigError");
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
