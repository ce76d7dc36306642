/**
 * Text and JSON renderings of an AnalysisResult. Both carry the same finding
 * content; the text form groups findings by category.
 */

import {
  AnalysisResult,
  FINDING_CATEGORIES,
  FINDING_CATEGORY_LABELS,
  Finding,
  FindingCategory,
} from "../analysis/types";
import { RiskReport } from "../privacy/sanitizer";

export interface FormatTextOptions {
  /** Show at most this many findings. */
  limit?: number;
}

export interface SerializableResult {
  requestId: number;
  sourceId: string;
  status: AnalysisResult["status"];
  remote: AnalysisResult["remote"];
  transmissionAcknowledged: boolean;
  durationMs: number;
  summary?: string;
  risk: RiskReport;
  findingsByCategory: Record<FindingCategory, number>;
  findings: Finding[];
}

export function formatLocation(finding: Finding): string {
  if (finding.line === undefined) {
    return "";
  }
  const endLine = finding.endLine ?? finding.line;
  return endLine > finding.line ? `lines ${finding.line}-${endLine}` : `line ${finding.line}`;
}

function countByCategory(findings: readonly Finding[]): Record<FindingCategory, number> {
  const counts: Record<FindingCategory, number> = {
    PERFORMANCE: 0,
    BEST_PRACTICE: 0,
    BUILDER_MAPPING: 0,
    PRIVACY: 0,
  };
  for (const finding of findings) {
    counts[finding.category]++;
  }
  return counts;
}

function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

function formatFinding(finding: Finding): string {
  const location = formatLocation(finding);
  const source = finding.source === "LOCAL" ? "" : ` {${finding.source}}`;
  const lines = [`[${finding.severity}] ${finding.title}${location ? ` (${location})` : ""}${source}`];
  if (finding.explanation) {
    lines.push(indent(finding.explanation, "  "));
  }
  if (finding.excerpt) {
    lines.push(indent(finding.excerpt, "  > "));
  }
  if (finding.replacement) {
    lines.push(`  Suggested:`);
    lines.push(indent(finding.replacement, "    "));
  }
  return lines.join("\n");
}

/**
 * Human-readable report grouped by category.
 */
export function formatText(result: AnalysisResult, options: FormatTextOptions = {}): string {
  const shown = options.limit !== undefined ? result.findings.slice(0, options.limit) : result.findings;
  const hidden = result.findings.length - shown.length;

  const out: string[] = [
    `psyscan report for ${result.sourceId}`,
    `Status: ${result.status} | Risk: ${result.risk.level} | Remote: ${result.remote}`,
  ];
  if (result.transmissionAcknowledged) {
    out.push("Redacted code was sent to the provider under the transmit override.");
  }
  if (result.summary) {
    out.push(`Summary: ${result.summary}`);
  }
  out.push(`Findings: ${result.findings.length}`);

  for (const category of FINDING_CATEGORIES) {
    const group = shown.filter((finding) => finding.category === category);
    if (group.length === 0) {
      continue;
    }
    out.push("", `== ${FINDING_CATEGORY_LABELS[category]} (${group.length}) ==`);
    for (const finding of group) {
      out.push(formatFinding(finding));
    }
  }

  if (hidden > 0) {
    out.push("", `... ${hidden} more finding${hidden === 1 ? "" : "s"} not shown`);
  }
  return out.join("\n") + "\n";
}

export function toSerializable(result: AnalysisResult): SerializableResult {
  const serializable: SerializableResult = {
    requestId: result.requestId,
    sourceId: result.sourceId,
    status: result.status,
    remote: result.remote,
    transmissionAcknowledged: result.transmissionAcknowledged,
    durationMs: result.durationMs,
    risk: result.risk,
    findingsByCategory: countByCategory(result.findings),
    findings: result.findings.map((finding) => ({ ...finding })),
  };
  if (result.summary !== undefined) {
    serializable.summary = result.summary;
  }
  return serializable;
}

export function formatJson(result: AnalysisResult): string {
  return JSON.stringify(toSerializable(result), null, 2);
}
