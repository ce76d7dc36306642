/**
 * Provider integration types and constants.
 */

// ============================================================================
// Providers
// ============================================================================

export const PROVIDER_NAMES = ["openai", "anthropic", "google"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface ProviderCredential {
  apiKey?: string;
  /** Overrides the SDK's default endpoint. Must be https unless it points at localhost. */
  baseUrl?: string;
}

export type ProviderCredentials = Partial<Record<ProviderName, ProviderCredential>>;

export const PROVIDER_LABELS: Record<ProviderName, string> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
  google: "Google Gemini",
};

/** Default model per provider. */
export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-20241022",
  google: "gemini-1.5-flash",
};

/** Gemini's OpenAI-compatible endpoint. */
export const GOOGLE_OPENAI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";

export const DEFAULT_MAX_TOKENS = 2000;

export const DEFAULT_TEMPERATURE = 0.3;

// ============================================================================
// Requests and outcomes
// ============================================================================

/**
 * Prompt and model settings for one submission.
 */
export interface PromptConfig {
  systemPrompt: string;
  userPrompt: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
}

export interface Completion {
  text: string;
  model: string;
  tokensUsed?: number;
}

export const PROVIDER_FAILURE_KINDS = [
  "AUTH_ERROR",
  "RATE_LIMIT",
  "NETWORK_ERROR",
  "QUOTA_EXCEEDED",
  "MALFORMED_RESPONSE",
] as const;

export type ProviderFailureKind = (typeof PROVIDER_FAILURE_KINDS)[number];

/**
 * A provider failure as a value. Never carries the provider's raw error payload.
 */
export interface ProviderFailure {
  kind: ProviderFailureKind;
  provider: ProviderName;
  message: string;
  status?: number;
}

export type ProviderOutcome =
  | { ok: true; raw: string; model: string; tokensUsed?: number }
  | { ok: false; failure: ProviderFailure };

/** Longest delay a Node timer accepts; larger values fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface SubmitOptions {
  /** Clamped to MAX_TIMEOUT_MS. */
  timeoutMs: number;
}

/**
 * One provider SDK behind a common shape. Implementations may throw; the
 * client turns every throw into a ProviderFailure.
 */
export interface ProviderBackend {
  readonly name: ProviderName;
  complete(request: CompletionRequest, signal: AbortSignal): Promise<Completion>;
}

/**
 * The single submission capability the analysis pipeline depends on.
 */
export interface ProviderClient {
  readonly provider: ProviderName;
  submit(sanitizedText: string, prompt: PromptConfig, options: SubmitOptions): Promise<ProviderOutcome>;
}
