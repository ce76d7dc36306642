/**
 * Local pattern detector.
 *
 * Runs every enabled rule over the same frozen document. Rules that need the
 * syntax tree are skipped when the script does not parse; the text-capable
 * ones fall back to line heuristics and a PARSE_FAILURE finding leads the list.
 */

import { isSuppressed, parseSuppressionDirectives } from "../core/suppression";
import { logger } from "../logger";
import { RULE_IMPLEMENTATIONS, RuleContext, RuleHit } from "./detectors";
import { SourceDocument, isBlankDocument } from "./document";
import { RULE_DEFINITIONS, RuleSettings, resolveRuleSetting } from "./rules";
import { Finding, createFinding } from "./types";

const log = logger.child("detector");

export interface DetectOptions {
  rules?: RuleSettings;
}

export interface DetectionResult {
  readonly findings: readonly Finding[];
  /** False when the script had syntax errors and only text rules ran. */
  readonly parsed: boolean;
  /** False when there was nothing to analyze. */
  readonly ran: boolean;
}

function compareHits(a: RuleHit, b: RuleHit): number {
  if (a.line === undefined || b.line === undefined) {
    // File-level hits go last
    return (a.line === undefined ? 1 : 0) - (b.line === undefined ? 1 : 0);
  }
  return a.line - b.line || (a.column ?? 0) - (b.column ?? 0);
}

function emptyInputFinding(): Finding {
  return createFinding({
    ruleId: "EMPTY_INPUT",
    category: "BEST_PRACTICE",
    severity: "WARN",
    title: "Nothing to analyze",
    explanation: "The script is empty or contains only whitespace.",
    meta: true,
  });
}

function parseFailureFinding(document: SourceDocument): Finding {
  const error = document.parseError;
  return createFinding({
    ruleId: "PARSE_FAILURE",
    category: "BEST_PRACTICE",
    severity: "WARN",
    title: "Script could not be parsed",
    explanation:
      `${error?.message ?? "Syntax error"}. ` +
      "Only the checks that work on plain text were run; fix the syntax error for a full analysis.",
    line: error?.line,
    excerpt: error?.line !== undefined ? document.lines[error.line - 1]?.trim() : undefined,
    meta: true,
  });
}

/**
 * Detect PsychoPy performance, best-practice and Builder-mapping patterns.
 * Never throws for bad input.
 */
export function detect(document: SourceDocument, options: DetectOptions = {}): DetectionResult {
  if (isBlankDocument(document)) {
    return Object.freeze({ findings: Object.freeze([emptyInputFinding()]), parsed: false, ran: false });
  }

  const tree = document.tree;
  const context: RuleContext = { document, content: document.text };
  const directives = parseSuppressionDirectives(document.lines);
  const findings: Finding[] = [];

  if (!tree) {
    findings.push(parseFailureFinding(document));
  }

  for (const rule of RULE_DEFINITIONS) {
    const setting = resolveRuleSetting(rule.id, options.rules);
    if (!setting.enabled) {
      continue;
    }

    const implementation = RULE_IMPLEMENTATIONS[rule.id];
    let hits: RuleHit[];
    try {
      if (tree) {
        hits = implementation.tree(tree.rootNode, context);
      } else if (implementation.text) {
        hits = implementation.text(context);
      } else {
        continue;
      }
    } catch (error) {
      // One failing rule must not take down the others
      log.warn("Rule failed", {
        rule: rule.id,
        sourceId: document.sourceId,
        error: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    for (const hit of [...hits].sort(compareHits)) {
      if (isSuppressed(rule.id, hit.line, directives)) {
        continue;
      }
      findings.push(
        createFinding({
          ruleId: rule.id,
          category: rule.category,
          severity: setting.severity,
          title: hit.title,
          explanation: hit.explanation,
          excerpt: hit.excerpt,
          replacement: hit.replacement,
          line: hit.line,
          endLine: hit.endLine,
        })
      );
    }
  }

  log.debug("Detection complete", {
    sourceId: document.sourceId,
    parsed: tree !== null,
    findings: findings.length,
  });

  return Object.freeze({ findings: Object.freeze(findings), parsed: tree !== null, ran: true });
}
