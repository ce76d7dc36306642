/**
 * Analysis entry point: sanitize, detect, optionally ask a provider, merge.
 *
 * The detector always sees the original script; the provider only ever sees
 * the sanitizer's redacted copy, and only when the risk report allows it.
 */

import { aggregate, RemoteInput } from "./analysis/aggregator";
import { detect } from "./analysis/detector";
import { SourceDocument, createSourceDocument } from "./analysis/document";
import { AnalysisResult, Finding, createFinding } from "./analysis/types";
import { AnalysisConfig, AnalysisConfigInput, parseAnalysisConfig } from "./config/schema";
import { requestRemoteAnalysis } from "./integrations/llm/analysis";
import { createProviderClient } from "./integrations/llm/client";
import type { ProviderClient, ProviderCredentials } from "./integrations/llm/types";
import { logger } from "./logger";
import { RiskReport, SensitiveCategory, SensitiveSpan, placeholderFor, scan } from "./privacy/sanitizer";

const log = logger.child("analyzer");

export interface AnalyzeDeps {
  /** Replaces the client built from `provider` and `credentials`. */
  client?: ProviderClient;
  credentials?: ProviderCredentials;
  requestId?: number;
  /** Options `config` is layered over, e.g. the analysis section of .psyscan.yml. */
  base?: AnalysisConfig;
}

const SENSITIVE_LABELS: Record<SensitiveCategory, string> = {
  API_KEY: "API key",
  DB_URL: "Database connection URL",
  GENERIC_SECRET: "Hard-coded secret",
  EMAIL: "E-mail address",
  FILE_PATH: "User home path",
};

/**
 * One PRIVACY finding per redacted span and per secret that could not be
 * redacted. Excerpts are left out so the matched text never reaches a report.
 */
export function privacyFindings(spans: readonly SensitiveSpan[], risk: RiskReport): Finding[] {
  const findings: Finding[] = spans.map((span) => {
    const label = SENSITIVE_LABELS[span.category];
    const highRisk = span.category !== "EMAIL" && span.category !== "FILE_PATH";
    return createFinding({
      ruleId: "SENSITIVE_DATA",
      category: "PRIVACY",
      severity: highRisk ? "WARN" : "INFO",
      title: `${label} in script`,
      explanation:
        `Line ${span.line} contains a value that looks like ${label.toLowerCase()}. ` +
        `It is replaced with ${placeholderFor(span.category)} before anything is sent to a provider.`,
      line: span.line,
      endLine: span.endLine,
    });
  });

  for (const line of risk.ambiguousLines) {
    findings.push(
      createFinding({
        ruleId: "SENSITIVE_DATA",
        category: "PRIVACY",
        severity: "WARN",
        title: "Secret assembled at run time",
        explanation:
          `Line ${line} builds a secret-like value with formatting or concatenation, which cannot be redacted reliably. ` +
          "The script is treated as unsafe to transmit.",
        line,
      })
    );
  }

  return findings;
}

/**
 * Analyze one document.
 *
 * @throws ConfigurationInvalidError before any analysis runs when `config`
 *   is invalid or the provider endpoint is not https
 */
export async function analyze(
  document: SourceDocument,
  config: AnalysisConfigInput = {},
  deps: AnalyzeDeps = {}
): Promise<AnalysisResult> {
  const started = Date.now();
  const resolved = parseAnalysisConfig(config, deps.base);
  const client = resolved.remoteEnabled
    ? deps.client ?? createProviderClient(resolved.provider, deps.credentials)
    : null;

  const { redactedText, risk, spans } = scan(document.text, { override: resolved.transmitOverride });
  const detection = detect(document, { rules: resolved.rules });
  const local = [...detection.findings, ...privacyFindings(spans, risk)];

  let remote: RemoteInput = { state: "NOT_REQUESTED" };
  if (client && detection.ran) {
    if (!risk.safeToTransmit) {
      log.info("Remote analysis blocked by risk policy", {
        sourceId: document.sourceId,
        level: risk.level,
        ambiguous: risk.ambiguousCount,
      });
      remote = { state: "BLOCKED" };
    } else {
      const outcome = await requestRemoteAnalysis({
        client,
        redactedText,
        enabledCategories: resolved.enabledCategories,
        timeoutMs: resolved.timeoutMs,
        model: resolved.model,
        maxTokens: resolved.maxTokens,
        temperature: resolved.temperature,
      });
      remote = outcome.ok
        ? { state: "SUCCEEDED", findings: outcome.findings, summary: outcome.summary }
        : { state: "FAILED", failure: outcome.failure };
    }
  }

  const attempted = remote.state === "SUCCEEDED" || remote.state === "FAILED";
  const result = aggregate({
    local,
    remote,
    risk,
    enabledCategories: resolved.enabledCategories,
    localRan: detection.ran,
    parsed: detection.parsed,
    requestId: deps.requestId,
    sourceId: document.sourceId,
    transmissionAcknowledged: risk.overridden && attempted,
    durationMs: Date.now() - started,
  });

  log.debug("Analysis complete", {
    sourceId: result.sourceId,
    requestId: result.requestId,
    status: result.status,
    remote: result.remote,
    findings: result.findings.length,
  });
  return result;
}

/**
 * Shorthand for analyzing raw text.
 */
export function analyzeText(
  text: string,
  sourceId?: string,
  config: AnalysisConfigInput = {},
  deps: AnalyzeDeps = {}
): Promise<AnalysisResult> {
  return analyze(createSourceDocument(text, sourceId), config, deps);
}

/**
 * Numbers analyses so an editor can drop results that a newer request has
 * superseded. Cancellation is advisory: a stale provider call still runs to
 * completion, its result is just not current.
 */
export class AnalysisSession {
  private latestRequestId = 0;

  constructor(private readonly defaults: AnalyzeDeps = {}) {}

  /** Id of the most recent request, 0 before the first. */
  get latestId(): number {
    return this.latestRequestId;
  }

  run(document: SourceDocument, config: AnalysisConfigInput = {}, deps: AnalyzeDeps = {}): Promise<AnalysisResult> {
    this.latestRequestId += 1;
    return analyze(document, config, { ...this.defaults, ...deps, requestId: this.latestRequestId });
  }

  isCurrent(result: AnalysisResult): boolean {
    return result.requestId === this.latestRequestId;
  }

  /**
   * Run an analysis and resolve to null if another request started meanwhile.
   */
  async runLatest(
    document: SourceDocument,
    config: AnalysisConfigInput = {},
    deps: AnalyzeDeps = {}
  ): Promise<AnalysisResult | null> {
    const result = await this.run(document, config, deps);
    return this.isCurrent(result) ? result : null;
  }
}
