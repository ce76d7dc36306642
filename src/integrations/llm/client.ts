/**
 * Provider client: one bounded attempt per submission, failures as values.
 */

import { ProviderTimeoutError } from "../../errors";
import { logger } from "../../logger";
import { createBackend, validateBaseUrl } from "./backends";
import { classifyProviderError, providerFailure } from "./errors";
import {
  CompletionRequest,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODELS,
  DEFAULT_TEMPERATURE,
  MAX_TIMEOUT_MS,
  PROVIDER_LABELS,
  PromptConfig,
  ProviderBackend,
  ProviderClient,
  ProviderCredentials,
  ProviderName,
  ProviderOutcome,
  SubmitOptions,
} from "./types";

const log = logger.child("llm");

/**
 * The user message sent to the provider: instructions followed by the
 * redacted script.
 */
export function buildUserMessage(sanitizedText: string, prompt: PromptConfig): string {
  return `${prompt.userPrompt}\n\n\`\`\`python\n${sanitizedText}\n\`\`\``;
}

/**
 * Wraps a back end with the deadline and error classification every
 * submission gets.
 */
export class BackendProviderClient implements ProviderClient {
  readonly provider: ProviderName;

  constructor(private readonly backend: ProviderBackend) {
    this.provider = backend.name;
  }

  async submit(sanitizedText: string, prompt: PromptConfig, options: SubmitOptions): Promise<ProviderOutcome> {
    const request: CompletionRequest = {
      model: prompt.model ?? DEFAULT_MODELS[this.provider],
      systemPrompt: prompt.systemPrompt,
      userPrompt: buildUserMessage(sanitizedText, prompt),
      maxTokens: prompt.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: prompt.temperature ?? DEFAULT_TEMPERATURE,
    };

    const timeoutMs = Math.min(options.timeoutMs, MAX_TIMEOUT_MS);
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    // The race still settles if a back end ignores the abort signal
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ProviderTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    const started = Date.now();
    try {
      const completion = await Promise.race([this.backend.complete(request, controller.signal), deadline]);

      if (completion.text.trim() === "") {
        log.warn("Empty response from provider", { provider: this.provider, model: request.model });
        return {
          ok: false,
          failure: providerFailure(
            "MALFORMED_RESPONSE",
            this.provider,
            `${PROVIDER_LABELS[this.provider]} returned an empty response`
          ),
        };
      }

      log.info("Provider call succeeded", {
        provider: this.provider,
        model: completion.model,
        tokensUsed: completion.tokensUsed,
        durationMs: Date.now() - started,
      });
      return { ok: true, raw: completion.text, model: completion.model, tokensUsed: completion.tokensUsed };
    } catch (error) {
      const failure = classifyProviderError(error, this.provider);
      log.warn("Provider call failed", {
        provider: this.provider,
        kind: failure.kind,
        status: failure.status,
        durationMs: Date.now() - started,
      });
      return { ok: false, failure };
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * A client for a provider with no API key. Every submission fails with
 * AUTH_ERROR instead of reaching the network.
 */
class UnconfiguredProviderClient implements ProviderClient {
  constructor(readonly provider: ProviderName) {}

  async submit(): Promise<ProviderOutcome> {
    log.warn("No API key configured, skipping remote analysis", { provider: this.provider });
    return {
      ok: false,
      failure: providerFailure(
        "AUTH_ERROR",
        this.provider,
        `No API key configured for ${PROVIDER_LABELS[this.provider]}`
      ),
    };
  }
}

/**
 * Create the client for the configured provider.
 * Throws ConfigurationInvalidError for a base URL that is not https.
 */
export function createProviderClient(provider: ProviderName, credentials: ProviderCredentials = {}): ProviderClient {
  const credential = credentials[provider] ?? {};
  if (credential.baseUrl) {
    validateBaseUrl(provider, credential.baseUrl);
  }
  if (!credential.apiKey) {
    return new UnconfiguredProviderClient(provider);
  }
  return new BackendProviderClient(createBackend(provider, credential.apiKey, credential.baseUrl || undefined));
}
