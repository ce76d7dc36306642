/**
 * Errors that abort an analysis. Every other condition (parse failures,
 * ambiguous redactions, provider failures) is reported as a value and degrades
 * the result instead.
 */

export type ErrorCode =
  | "PARSE_FAILURE"
  | "SANITIZATION_AMBIGUOUS"
  | "AUTH_ERROR"
  | "RATE_LIMIT"
  | "NETWORK_ERROR"
  | "QUOTA_EXCEEDED"
  | "MALFORMED_RESPONSE"
  | "CONFIGURATION_INVALID"
  | "INPUT_UNREADABLE";

export class PsyscanError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Thrown before any analysis runs, e.g. for an unknown provider.
 */
export class ConfigurationInvalidError extends PsyscanError {
  /** One entry per offending field, as "path: message". */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super("CONFIGURATION_INVALID", message, options);
    this.issues = issues;
  }
}

export class InputUnreadableError extends PsyscanError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super("INPUT_UNREADABLE", `Cannot read ${path}${reason}`, options);
    this.path = path;
  }
}

/**
 * Raised inside the provider client when the caller's deadline passes.
 * Never escapes the client.
 */
export class ProviderTimeoutError extends PsyscanError {
  constructor(timeoutMs: number) {
    super("NETWORK_ERROR", `Provider did not respond within ${timeoutMs}ms`);
  }
}
