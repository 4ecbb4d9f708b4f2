// packages/check-engine/src/errors.ts
//
// Error taxonomy of the engine. Disconnect-class errors map to a comparison's
// configured severity; everything else becomes internal_error.

export class ConnectionTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConnectionTimeoutError";
  }
}

/** A data source refused or dropped the connection; `cause` holds the source's own error. */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export class AttributeResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AttributeResolutionError";
  }
}

export class ResultKeyError extends Error {
  public readonly key: string;
  constructor(key: string, message: string) {
    super(message);
    this.name = "ResultKeyError";
    this.key = key;
  }
}

export class ToolResultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToolResultError";
  }
}

export class ReductionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReductionError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DISCONNECT_ERROR_NAMES = new Set(["ConnectionTimeoutError", "ConnectionError", "TimeoutError", "AbortError"]);

const DISCONNECT_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EHOSTUNREACH", "ENOTFOUND"]);

function errorCode(e: unknown): string | undefined {
  if (!e || typeof e !== "object" || !("code" in e)) return undefined;
  return typeof e.code === "string" ? e.code : undefined;
}

/** True for failures to reach a data source (timeouts, refused or dropped connections). */
export function isDisconnectError(e: unknown): boolean {
  if (e instanceof ConnectionTimeoutError || e instanceof ConnectionError) return true;
  if (!(e instanceof Error)) return false;
  if (DISCONNECT_ERROR_NAMES.has(e.name)) return true;
  const code = errorCode(e);
  return code !== undefined && DISCONNECT_ERROR_CODES.has(code);
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  return `Error: ${String(e)}`;
}
