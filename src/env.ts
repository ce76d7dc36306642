import dotenv from "dotenv";

import type { ProviderCredentials } from "./integrations/llm/types";

dotenv.config();

export const config = {
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
  ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
  ANTHROPIC_BASE_URL: process.env.ANTHROPIC_BASE_URL,
  // Gemini is reached through its OpenAI-compatible endpoint
  GOOGLE_API_KEY: process.env.GOOGLE_API_KEY,
  GOOGLE_BASE_URL: process.env.GOOGLE_BASE_URL,
};

/**
 * Provider credentials read from the environment (and .env).
 * The library itself never reads the environment; callers such as the CLI pass
 * these in explicitly.
 */
export function credentialsFromEnv(): ProviderCredentials {
  return {
    openai: { apiKey: config.OPENAI_API_KEY, baseUrl: config.OPENAI_BASE_URL },
    anthropic: { apiKey: config.ANTHROPIC_API_KEY, baseUrl: config.ANTHROPIC_BASE_URL },
    google: { apiKey: config.GOOGLE_API_KEY, baseUrl: config.GOOGLE_BASE_URL },
  };
}
