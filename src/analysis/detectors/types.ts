/**
 * Types for the local detection rules.
 */

import type { SourceDocument } from "../document";
import type { SyntaxNode } from "../ast/python";
import type { LocalRuleId } from "../rules";

/**
 * A rule match before severity and suppression are applied.
 */
export interface RuleHit {
  ruleId: LocalRuleId;
  title: string;
  explanation: string;
  /** Omitted for file-level hits such as a missing core.quit(). */
  line?: number;
  endLine?: number;
  column?: number;
  excerpt?: string;
  replacement?: string;
}

export interface RuleContext {
  document: SourceDocument;
  /** Same as document.text; kept short for the node helpers. */
  content: string;
}

/** Rule body that walks the syntax tree. */
export type TreeRule = (root: SyntaxNode, context: RuleContext) => RuleHit[];

/** Rule body that only needs the raw lines; used when the script does not parse. */
export type TextRule = (context: RuleContext) => RuleHit[];

/** Rules without a text body are skipped when the script does not parse. */
export interface RuleImplementation {
  tree: TreeRule;
  text?: TextRule;
}
