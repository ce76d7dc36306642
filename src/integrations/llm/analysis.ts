/**
 * Remote analysis: submit the redacted script and normalize the reply.
 */

import type { Finding, FindingCategory } from "../../analysis/types";
import { logger } from "../../logger";
import { parseProviderResponse } from "./parsing";
import { buildAnalysisPrompt } from "./prompts";
import { ProviderClient, ProviderFailure } from "./types";

const log = logger.child("llm");

export type RemoteOutcome =
  | { ok: true; findings: Finding[]; summary?: string; model: string; tokensUsed?: number }
  | { ok: false; failure: ProviderFailure };

export interface RemoteAnalysisParams {
  client: ProviderClient;
  /** Output of the sanitizer. Never the original script. */
  redactedText: string;
  enabledCategories: readonly FindingCategory[];
  timeoutMs: number;
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Ask the provider for suggestions. Never throws for provider problems; every
 * failure comes back as a ProviderFailure.
 */
export async function requestRemoteAnalysis(params: RemoteAnalysisParams): Promise<RemoteOutcome> {
  const { client, redactedText } = params;
  const prompt = buildAnalysisPrompt(params.enabledCategories, {
    model: params.model,
    maxTokens: params.maxTokens,
    temperature: params.temperature,
  });

  const outcome = await client.submit(redactedText, prompt, { timeoutMs: params.timeoutMs });
  if (!outcome.ok) {
    return outcome;
  }

  const parsed = parseProviderResponse(outcome.raw, client.provider, redactedText);
  if (!parsed.ok) {
    return parsed;
  }

  log.debug("Remote analysis parsed", { provider: client.provider, findings: parsed.findings.length });
  return {
    ok: true,
    findings: parsed.findings,
    summary: parsed.summary,
    model: outcome.model,
    tokensUsed: outcome.tokensUsed,
  };
}
