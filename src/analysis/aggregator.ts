/**
 * Merges local and remote findings into one AnalysisResult.
 */

import type { ProviderFailure } from "../integrations/llm/types";
import { PROVIDER_LABELS } from "../integrations/llm/types";
import type { RiskReport } from "../privacy/sanitizer";
import {
  AnalysisResult,
  AnalysisStatus,
  Finding,
  FindingCategory,
  RemoteState,
  createFinding,
} from "./types";

/**
 * What happened on the remote side of an analysis.
 */
export type RemoteInput =
  | { state: "NOT_REQUESTED" }
  | { state: "BLOCKED" }
  | { state: "FAILED"; failure: ProviderFailure }
  | { state: "SUCCEEDED"; findings: readonly Finding[]; summary?: string };

export interface AggregateInput {
  local: readonly Finding[];
  remote: RemoteInput;
  risk: RiskReport;
  enabledCategories: readonly FindingCategory[];
  /** False when the detector could not run at all. */
  localRan: boolean;
  /** False when only text rules ran because the script did not parse. */
  parsed: boolean;
  requestId?: number;
  sourceId?: string;
  transmissionAcknowledged?: boolean;
  durationMs?: number;
}

export function transmissionBlockedFinding(risk: RiskReport): Finding {
  const reasons: string[] = [];
  for (const [category, count] of Object.entries(risk.counts)) {
    if (count > 0) {
      reasons.push(`${count} ${category}`);
    }
  }
  if (risk.ambiguousCount > 0) {
    reasons.push(`${risk.ambiguousCount} ambiguous secret assignment(s)`);
  }
  return createFinding({
    ruleId: "TRANSMISSION_BLOCKED",
    category: "PRIVACY",
    severity: "WARN",
    title: "Remote analysis blocked",
    explanation:
      `The script contains sensitive data (${reasons.join(", ")}), so it was not sent to the provider. ` +
      "Remove the sensitive values or pass the transmit override to send the redacted script anyway.",
    meta: true,
  });
}

export function remoteUnavailableFinding(failure: ProviderFailure): Finding {
  return createFinding({
    ruleId: "REMOTE_UNAVAILABLE",
    category: "PRIVACY",
    severity: "INFO",
    title: `Remote analysis unavailable (${failure.kind})`,
    explanation: `${failure.message}. Only local findings are shown; ${PROVIDER_LABELS[failure.provider]} was not retried.`,
    meta: true,
  });
}

function overlaps(a: Finding, b: Finding): boolean {
  if (a.line === undefined || b.line === undefined) {
    return false;
  }
  const aEnd = a.endLine ?? a.line;
  const bEnd = b.endLine ?? b.line;
  return a.line <= bEnd && b.line <= aEnd;
}

/**
 * Drop findings that repeat an earlier one: same category and overlapping
 * lines, whatever the source. Meta findings and findings without a line are
 * always kept.
 */
export function dedupeFindings(findings: readonly Finding[]): Finding[] {
  const kept: Finding[] = [];
  for (const finding of findings) {
    const duplicate =
      !finding.meta &&
      kept.some((earlier) => !earlier.meta && earlier.category === finding.category && overlaps(earlier, finding));
    if (!duplicate) {
      kept.push(finding);
    }
  }
  return kept;
}

export function resolveStatus(localRan: boolean, parsed: boolean, remote: RemoteState): AnalysisStatus {
  if (!localRan) {
    return "FAILED";
  }
  if (!parsed || remote === "FAILED" || remote === "BLOCKED") {
    return "PARTIAL_LOCAL_ONLY";
  }
  return "COMPLETE";
}

/**
 * Build the final result: local findings, then remote findings, then any
 * status finding about the remote side. Order within each stream is kept.
 */
export function aggregate(input: AggregateInput): AnalysisResult {
  const { remote, risk } = input;

  if (remote.state === "SUCCEEDED" && !risk.safeToTransmit) {
    throw new Error("Remote findings present although the risk report forbids transmission");
  }

  const ordered: Finding[] = [...input.local];
  if (remote.state === "SUCCEEDED") {
    ordered.push(...remote.findings);
  } else if (remote.state === "BLOCKED") {
    ordered.push(transmissionBlockedFinding(risk));
  } else if (remote.state === "FAILED") {
    ordered.push(remoteUnavailableFinding(remote.failure));
  }

  const enabled = new Set(input.enabledCategories);
  const findings = dedupeFindings(ordered.filter((finding) => finding.meta || enabled.has(finding.category)));

  const result: AnalysisResult = {
    requestId: input.requestId ?? 0,
    sourceId: input.sourceId ?? "<buffer>",
    status: resolveStatus(input.localRan, input.parsed, remote.state),
    findings: Object.freeze(findings),
    risk,
    remote: remote.state,
    transmissionAcknowledged: input.transmissionAcknowledged ?? false,
    durationMs: input.durationMs ?? 0,
    ...(remote.state === "SUCCEEDED" && remote.summary ? { summary: remote.summary } : {}),
  };
  return Object.freeze(result);
}
