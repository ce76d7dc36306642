/**
 * Inline suppression directives in Python comments:
 * - # psyscan-ignore-file ALL|RULE_ID[,RULE_ID...]
 * - # psyscan-ignore-line ALL|RULE_ID[,RULE_ID...]
 * - # psyscan-ignore-next-line ALL|RULE_ID[,RULE_ID...]
 */

import { LocalRuleId, isLocalRuleId } from "../analysis/rules";

export type SuppressionScope = "file" | "line" | "next-line";

export interface SuppressionDirective {
  scope: SuppressionScope;
  /** If true, all rules are suppressed for this scope. */
  allRules: boolean;
  /** Specific rule IDs to suppress (empty if allRules is true). */
  rules: LocalRuleId[];
  /** The 1-based line number where this directive appears. */
  line: number;
}

/**
 * Parse all suppression directives from source code.
 */
export function parseSuppressionDirectives(lines: readonly string[]): SuppressionDirective[] {
  const directives: SuppressionDirective[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.includes("psyscan-ignore-")) {
      continue;
    }

    // Fresh regex per line to avoid shared lastIndex state
    const directiveRegex = /#\s*psyscan-ignore-(file|line|next-line)\s+([A-Za-z0-9_,\s]+)/g;

    let match: RegExpExecArray | null;
    while ((match = directiveRegex.exec(line)) !== null) {
      const scope = toScope(match[1].toLowerCase());
      if (!scope) {
        continue;
      }

      const tokens = match[2]
        .split(/[,\s]+/)
        .map((token) => token.trim())
        .filter((token) => token.length > 0);

      if (tokens.some((token) => token.toUpperCase() === "ALL")) {
        directives.push({ scope, allRules: true, rules: [], line: i + 1 });
        continue;
      }

      const rules = tokens.filter(isLocalRuleId);
      if (rules.length > 0) {
        directives.push({ scope, allRules: false, rules, line: i + 1 });
      }
    }
  }

  return directives;
}

function toScope(value: string): SuppressionScope | null {
  switch (value) {
    case "file":
    case "line":
    case "next-line":
      return value;
    default:
      return null;
  }
}

/**
 * Check if a rule is suppressed at a line. Findings without a line can only be
 * suppressed at file scope.
 */
export function isSuppressed(
  ruleId: LocalRuleId,
  line: number | undefined,
  directives: readonly SuppressionDirective[]
): boolean {
  for (const directive of directives) {
    if (!directive.allRules && !directive.rules.includes(ruleId)) {
      continue;
    }

    switch (directive.scope) {
      case "file":
        return true;
      case "line":
        if (directive.line === line) {
          return true;
        }
        break;
      case "next-line":
        if (line !== undefined && directive.line + 1 === line) {
          return true;
        }
        break;
    }
  }

  return false;
}
