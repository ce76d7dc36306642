/**
 * Provider back ends. Each wraps one SDK behind ProviderBackend.
 *
 * SDK retries are disabled: a submission is exactly one attempt, and retry
 * policy belongs to the caller.
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";

import { ConfigurationInvalidError } from "../../errors";
import {
  Completion,
  CompletionRequest,
  GOOGLE_OPENAI_BASE_URL,
  ProviderBackend,
  ProviderName,
} from "./types";

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]"]);

/**
 * Reject endpoints that would send code in clear text.
 */
export function validateBaseUrl(provider: ProviderName, baseUrl: string): void {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch (error) {
    throw new ConfigurationInvalidError(`Invalid base URL for ${provider}`, [`${provider}.baseUrl: not a URL`], {
      cause: error,
    });
  }
  if (url.protocol === "https:") {
    return;
  }
  if (url.protocol === "http:" && LOCAL_HOSTS.has(url.hostname)) {
    return;
  }
  throw new ConfigurationInvalidError(`Base URL for ${provider} must use https`, [
    `${provider}.baseUrl: must use https`,
  ]);
}

/**
 * Chat completions through the openai SDK. Also used for Gemini, which serves
 * the same API from its own endpoint.
 */
export class OpenAICompatibleBackend implements ProviderBackend {
  readonly name: ProviderName;
  private readonly client: OpenAI;

  constructor(name: ProviderName, apiKey: string, baseUrl?: string) {
    this.name = name;
    this.client = new OpenAI({
      apiKey,
      baseURL: baseUrl ?? (name === "google" ? GOOGLE_OPENAI_BASE_URL : undefined),
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<Completion> {
    const completion = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: "system", content: request.systemPrompt },
          { role: "user", content: request.userPrompt },
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      },
      { signal }
    );

    return {
      text: completion.choices[0]?.message?.content ?? "",
      model: completion.model || request.model,
      tokensUsed: completion.usage?.total_tokens,
    };
  }
}

/**
 * Messages API through the Anthropic SDK.
 */
export class AnthropicBackend implements ProviderBackend {
  readonly name: ProviderName = "anthropic";
  private readonly client: Anthropic;

  constructor(apiKey: string, baseUrl?: string) {
    this.client = new Anthropic({ apiKey, baseURL: baseUrl, maxRetries: 0 });
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<Completion> {
    const message = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.systemPrompt,
        messages: [{ role: "user", content: request.userPrompt }],
      },
      { signal }
    );

    const text = message.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("");

    return {
      text,
      model: message.model || request.model,
      tokensUsed: message.usage.input_tokens + message.usage.output_tokens,
    };
  }
}

/**
 * Build the back end for a provider. Assumes the key is present and the base
 * URL has been validated.
 */
export function createBackend(provider: ProviderName, apiKey: string, baseUrl?: string): ProviderBackend {
  switch (provider) {
    case "openai":
    case "google":
      return new OpenAICompatibleBackend(provider, apiKey, baseUrl);
    case "anthropic":
      return new AnthropicBackend(apiKey, baseUrl);
  }
}
