/**
 * Library entry point.
 */

export { analyze, analyzeText, AnalysisSession, privacyFindings } from "./analyzer";
export type { AnalyzeDeps } from "./analyzer";

export { createSourceDocument, isBlankDocument, DEFAULT_SOURCE_ID } from "./analysis/document";
export type { SourceDocument } from "./analysis/document";
export { detect } from "./analysis/detector";
export type { DetectOptions, DetectionResult } from "./analysis/detector";
export { aggregate, dedupeFindings, resolveStatus } from "./analysis/aggregator";
export type { AggregateInput, RemoteInput } from "./analysis/aggregator";
export {
  FINDING_CATEGORIES,
  FINDING_CATEGORY_LABELS,
  FINDING_SEVERITIES,
  createFinding,
} from "./analysis/types";
export type {
  AnalysisResult,
  AnalysisStatus,
  Finding,
  FindingCategory,
  FindingSeverity,
  FindingSource,
  RemoteState,
  RuleId,
} from "./analysis/types";
export { ALL_RULE_IDS, RULE_DEFINITIONS } from "./analysis/rules";
export type { LocalRuleId, RuleDefinition, RuleSetting, RuleSettings } from "./analysis/rules";

export { SENSITIVE_CATEGORIES, assessRisk, placeholderFor, privacyRecommendations, scan } from "./privacy/sanitizer";
export type { RiskLevel, RiskReport, ScanOptions, ScanResult, SensitiveCategory, SensitiveSpan } from "./privacy/sanitizer";

export * from "./config";
export * from "./integrations/llm";

export { ConfigurationInvalidError, InputUnreadableError, ProviderTimeoutError, PsyscanError } from "./errors";
export type { ErrorCode } from "./errors";

export { formatJson, formatLocation, formatText, toSerializable } from "./report/format";
export type { FormatTextOptions, SerializableResult } from "./report/format";
