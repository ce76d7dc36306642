/**
 * Map SDK and network errors onto the provider failure taxonomy.
 *
 * Both SDKs expose `status` on HTTP errors, so errors are read by shape
 * rather than by class. Anything without a recognised status or code is a
 * NETWORK_ERROR.
 */

import { ProviderTimeoutError } from "../../errors";
import { PROVIDER_LABELS, ProviderFailure, ProviderFailureKind, ProviderName } from "./types";

function readProperty(error: unknown, key: string): unknown {
  if (typeof error === "object" && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

function readStatus(error: unknown): number | undefined {
  const status = readProperty(error, "status");
  return typeof status === "number" ? status : undefined;
}

/** Error code from the SDK error or its response body. */
function readCode(error: unknown): string | undefined {
  const code = readProperty(error, "code");
  if (typeof code === "string") {
    return code;
  }
  const body = readProperty(error, "error");
  const nested = readProperty(body, "code") ?? readProperty(body, "type");
  return typeof nested === "string" ? nested : undefined;
}

export function classifyErrorKind(error: unknown): ProviderFailureKind {
  const status = readStatus(error);
  const code = readCode(error);

  if (status === 401 || status === 403) {
    return "AUTH_ERROR";
  }
  if (status === 402 || (status === 429 && code === "insufficient_quota")) {
    return "QUOTA_EXCEEDED";
  }
  if (status === 429 || status === 529) {
    return "RATE_LIMIT";
  }

  // Transport errors, server errors and anything unrecognised
  return "NETWORK_ERROR";
}

function describe(kind: ProviderFailureKind, provider: ProviderName, error: unknown): string {
  const label = PROVIDER_LABELS[provider];
  switch (kind) {
    case "AUTH_ERROR":
      return `${label} rejected the API key`;
    case "QUOTA_EXCEEDED":
      return `${label} quota is exhausted`;
    case "RATE_LIMIT":
      return `${label} rate limit reached`;
    case "MALFORMED_RESPONSE":
      return `${label} returned a response that could not be read`;
    case "NETWORK_ERROR":
      return error instanceof ProviderTimeoutError ? `${label}: ${error.message}` : `Could not reach ${label}`;
  }
}

/**
 * Build a ProviderFailure from anything a back end threw. The raw error
 * payload is not carried over.
 */
export function classifyProviderError(error: unknown, provider: ProviderName): ProviderFailure {
  const kind = classifyErrorKind(error);
  const status = readStatus(error);
  const failure: ProviderFailure = { kind, provider, message: describe(kind, provider, error) };
  if (status !== undefined) {
    failure.status = status;
    failure.message += ` (HTTP ${status})`;
  }
  return failure;
}

export function providerFailure(kind: ProviderFailureKind, provider: ProviderName, message: string): ProviderFailure {
  return { kind, provider, message };
}
