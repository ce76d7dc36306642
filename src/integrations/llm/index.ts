/**
 * Remote (LLM) analysis of redacted PsychoPy scripts.
 *
 * - Only redacted text is ever submitted.
 * - Every provider problem is returned as a ProviderFailure; nothing here
 *   throws for network, auth or response errors.
 * - Exactly one attempt per submission. Retry policy belongs to the caller.
 */

export type {
  Completion,
  CompletionRequest,
  PromptConfig,
  ProviderBackend,
  ProviderClient,
  ProviderCredential,
  ProviderCredentials,
  ProviderFailure,
  ProviderFailureKind,
  ProviderName,
  ProviderOutcome,
  SubmitOptions,
} from "./types";

export { DEFAULT_MODELS, MAX_TIMEOUT_MS, PROVIDER_FAILURE_KINDS, PROVIDER_LABELS, PROVIDER_NAMES } from "./types";

export { BackendProviderClient, createProviderClient } from "./client";
export { AnthropicBackend, OpenAICompatibleBackend, createBackend, validateBaseUrl } from "./backends";
export { classifyErrorKind, classifyProviderError } from "./errors";
export { buildAnalysisPrompt, SYSTEM_PROMPT } from "./prompts";
export { attemptJsonRepair, parseProviderResponse } from "./parsing";
export type { ParsedResponse } from "./parsing";
export { requestRemoteAnalysis } from "./analysis";
export type { RemoteAnalysisParams, RemoteOutcome } from "./analysis";
