/**
 * Rule ids, metadata and default configuration for the local detector.
 *
 * The order of RULE_DEFINITIONS is the order in which findings are emitted.
 * DO NOT reorder existing rules - only extend.
 */

import type { FindingCategory, FindingSeverity } from "./types";

export type LocalRuleId =
  | "STIMULUS_IN_LOOP"
  | "RESOURCE_LOAD_IN_LOOP"
  | "WALL_CLOCK_SLEEP"
  | "REPEATED_LITERAL"
  | "MISSING_RESOURCE_RELEASE"
  | "TRIAL_LOOP";

export interface RuleDefinition {
  id: LocalRuleId;
  category: FindingCategory;
  severity: FindingSeverity;
  description: string;
}

export const RULE_DEFINITIONS: readonly RuleDefinition[] = [
  {
    id: "STIMULUS_IN_LOOP",
    category: "PERFORMANCE",
    severity: "WARN",
    description: "Stimulus constructed on every loop iteration",
  },
  {
    id: "RESOURCE_LOAD_IN_LOOP",
    category: "PERFORMANCE",
    severity: "WARN",
    description: "Sound, movie or image file loaded inside a loop",
  },
  {
    id: "WALL_CLOCK_SLEEP",
    category: "PERFORMANCE",
    severity: "WARN",
    description: "time.sleep() used where core.wait() or frame timing exists",
  },
  {
    id: "REPEATED_LITERAL",
    category: "BEST_PRACTICE",
    severity: "INFO",
    description: "Literal repeated three or more times",
  },
  {
    id: "MISSING_RESOURCE_RELEASE",
    category: "BEST_PRACTICE",
    severity: "WARN",
    description: "Window, file or device opened without a matching close",
  },
  {
    id: "TRIAL_LOOP",
    category: "BUILDER_MAPPING",
    severity: "INFO",
    description: "Fixed-count trial loop that maps to a Builder loop",
  },
];

/**
 * Per-rule settings accepted from configuration.
 */
export interface RuleSetting {
  enabled?: boolean;
  severity?: FindingSeverity;
}

export type RuleSettings = Partial<Record<LocalRuleId, RuleSetting>>;

export interface RequiredRuleSetting {
  enabled: boolean;
  severity: FindingSeverity;
}

export const ALL_RULE_IDS: readonly LocalRuleId[] = RULE_DEFINITIONS.map((rule) => rule.id);

export function isLocalRuleId(id: string): id is LocalRuleId {
  return RULE_DEFINITIONS.some((rule) => rule.id === id);
}

export function getRuleDefinition(id: LocalRuleId): RuleDefinition {
  const rule = RULE_DEFINITIONS.find((candidate) => candidate.id === id);
  if (!rule) {
    throw new Error(`Unknown rule ${id}`);
  }
  return rule;
}

/**
 * Merge configured settings over the rule's defaults.
 */
export function resolveRuleSetting(id: LocalRuleId, settings?: RuleSettings): RequiredRuleSetting {
  const rule = getRuleDefinition(id);
  const configured = settings?.[id];
  return {
    enabled: configured?.enabled ?? true,
    severity: configured?.severity ?? rule.severity,
  };
}
