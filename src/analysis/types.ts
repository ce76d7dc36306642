/**
 * Core data model shared by the detector, the sanitizer, the provider adapter
 * and the aggregator.
 */

import type { ProviderName } from "../integrations/llm/types";
import type { RiskReport } from "../privacy/sanitizer";
import type { LocalRuleId } from "./rules";

// ============================================================================
// Findings
// ============================================================================

export const FINDING_CATEGORIES = [
  "PERFORMANCE",
  "BEST_PRACTICE",
  "BUILDER_MAPPING",
  "PRIVACY",
] as const;

export type FindingCategory = (typeof FINDING_CATEGORIES)[number];

/**
 * Human-readable labels for each finding category.
 */
export const FINDING_CATEGORY_LABELS: Record<FindingCategory, string> = {
  PERFORMANCE: "Performance",
  BEST_PRACTICE: "Best Practice",
  BUILDER_MAPPING: "Builder Mapping",
  PRIVACY: "Privacy",
};

export const FINDING_SEVERITIES = ["INFO", "WARN", "CRITICAL"] as const;

export type FindingSeverity = (typeof FINDING_SEVERITIES)[number];

/**
 * Where a finding came from. Remote sources carry the provider that produced them.
 */
export type FindingSource = "LOCAL" | `REMOTE_${Uppercase<ProviderName>}`;

/** Status-only findings that describe the analysis rather than the code. */
export type MetaRuleId =
  | "PARSE_FAILURE"
  | "EMPTY_INPUT"
  | "TRANSMISSION_BLOCKED"
  | "REMOTE_UNAVAILABLE";

/** Findings normalized from a provider response. */
export type RemoteRuleId =
  | "REMOTE_BUILDER_MAPPING"
  | "REMOTE_PERFORMANCE"
  | "REMOTE_BEST_PRACTICE"
  | "REMOTE_GENERAL";

export type RuleId = LocalRuleId | MetaRuleId | RemoteRuleId | "SENSITIVE_DATA";

export interface Finding {
  readonly ruleId: RuleId;
  readonly category: FindingCategory;
  readonly severity: FindingSeverity;
  readonly title: string;
  readonly explanation: string;
  /** Code the finding refers to, as it appears in the analyzed text. */
  readonly excerpt?: string;
  /** Suggested replacement or Builder equivalent. */
  readonly replacement?: string;
  /** 1-based first line, when the finding is tied to a location. */
  readonly line?: number;
  /** 1-based last line (inclusive). Defaults to `line`. */
  readonly endLine?: number;
  readonly source: FindingSource;
  readonly meta: boolean;
}

export type FindingInit = Omit<Finding, "meta" | "source"> & {
  source?: FindingSource;
  meta?: boolean;
};

/**
 * Build an immutable finding. Optional fields that are undefined are left off
 * so that serialized findings compare equal.
 */
export function createFinding(init: FindingInit): Finding {
  const finding: {
    -readonly [K in keyof Finding]: Finding[K];
  } = {
    ruleId: init.ruleId,
    category: init.category,
    severity: init.severity,
    title: init.title,
    explanation: init.explanation,
    source: init.source ?? "LOCAL",
    meta: init.meta ?? false,
  };
  if (init.excerpt !== undefined) finding.excerpt = init.excerpt;
  if (init.replacement !== undefined) finding.replacement = init.replacement;
  if (init.line !== undefined) {
    finding.line = init.line;
    finding.endLine = init.endLine ?? init.line;
  }
  return Object.freeze(finding);
}

export function remoteSource(provider: ProviderName): FindingSource {
  switch (provider) {
    case "openai":
      return "REMOTE_OPENAI";
    case "anthropic":
      return "REMOTE_ANTHROPIC";
    case "google":
      return "REMOTE_GOOGLE";
  }
}

// ============================================================================
// Analysis result
// ============================================================================

export type AnalysisStatus = "COMPLETE" | "PARTIAL_LOCAL_ONLY" | "FAILED";

/** What happened to the remote half of an analysis. */
export type RemoteState = "NOT_REQUESTED" | "SUCCEEDED" | "FAILED" | "BLOCKED";

export interface AnalysisResult {
  /** Monotonic id assigned by the caller's session; 0 for one-off analyses. */
  readonly requestId: number;
  readonly sourceId: string;
  readonly status: AnalysisStatus;
  readonly findings: readonly Finding[];
  readonly risk: RiskReport;
  readonly remote: RemoteState;
  /**
   * True when the request's transmit override was what allowed redacted code
   * containing sensitive data to be sent.
   */
  readonly transmissionAcknowledged: boolean;
  /** Provider-written summary of the script, when remote analysis succeeded. */
  readonly summary?: string;
  readonly durationMs: number;
}
