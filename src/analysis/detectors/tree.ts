/**
 * Rule bodies that walk the tree-sitter Python tree.
 */

import {
  SyntaxNode,
  findAllNodes,
  findAncestor,
  findEnclosingLoop,
  getCalleeText,
  getColumn,
  getEnclosingScope,
  getLineNumber,
  getNodeText,
  lastSegment,
} from "../ast/python";
import {
  CONSTANT_NAME_PATTERN,
  PRESENTATION_METHOD_PATTERNS,
  RESOURCE_LOADER_PATTERNS,
  RESOURCE_PATTERNS,
  REPEATED_LITERAL_THRESHOLD,
  SLEEP_IMPORT_PATTERN,
  STIMULUS_CONSTRUCTOR_PATTERNS,
  TRIVIAL_NUMBERS,
  WALL_CLOCK_SLEEP_CALLEES,
  WINDOW_CONSTRUCTORS,
  matchesAnyPattern,
} from "../patterns";
import {
  LiteralKind,
  Location,
  missingCoreQuitHit,
  missingReleaseHit,
  repeatedLiteralHit,
  resourceLoadInLoopHit,
  stimulusInLoopHit,
  trialLoopHit,
  wallClockSleepHit,
} from "./hits";
import { RuleContext, RuleHit } from "./types";

const STRING_LITERAL = /^[A-Za-z]*("""|'''|"|')([\s\S]*)\1$/;
const F_STRING_PREFIX = /^[A-Za-z]*[fF][A-Za-z]*["']/;

function locate(node: SyntaxNode): Location {
  return { line: getLineNumber(node), column: getColumn(node) };
}

function calls(root: SyntaxNode): SyntaxNode[] {
  return findAllNodes(root, ["call"]);
}

/**
 * Calls matching `patterns` that run on every iteration of a loop.
 */
function callsInLoops(
  root: SyntaxNode,
  content: string,
  patterns: readonly (string | RegExp)[]
): Array<{ call: SyntaxNode; callee: string; loop: SyntaxNode }> {
  const results: Array<{ call: SyntaxNode; callee: string; loop: SyntaxNode }> = [];
  for (const call of calls(root)) {
    const callee = getCalleeText(call, content);
    if (!callee || !matchesAnyPattern(callee, patterns)) {
      continue;
    }
    const loop = findEnclosingLoop(call);
    if (loop) {
      results.push({ call, callee, loop });
    }
  }
  return results;
}

export function stimulusInLoop(root: SyntaxNode, { document, content }: RuleContext): RuleHit[] {
  return callsInLoops(root, content, STIMULUS_CONSTRUCTOR_PATTERNS).map(({ call, callee, loop }) =>
    stimulusInLoopHit(callee, getLineNumber(loop), locate(call), document.lines)
  );
}

export function resourceLoadInLoop(root: SyntaxNode, { document, content }: RuleContext): RuleHit[] {
  return callsInLoops(root, content, RESOURCE_LOADER_PATTERNS).map(({ call, callee, loop }) =>
    resourceLoadInLoopHit(callee, getLineNumber(loop), locate(call), document.lines)
  );
}

export function wallClockSleep(root: SyntaxNode, { document, content }: RuleContext): RuleHit[] {
  const bareSleepImported = SLEEP_IMPORT_PATTERN.test(content);
  const hits: RuleHit[] = [];

  for (const call of calls(root)) {
    const callee = getCalleeText(call, content);
    const isSleep =
      matchesAnyPattern(callee, WALL_CLOCK_SLEEP_CALLEES) || (bareSleepImported && callee === "sleep");
    if (!isSleep) {
      continue;
    }
    const args = call.childForFieldName("arguments");
    const argText = args ? getNodeText(args, content) : "()";
    hits.push(wallClockSleepHit(callee, argText, locate(call), document.lines));
  }

  return hits;
}

// ============================================================================
// Literals
// ============================================================================

interface LiteralOccurrence {
  kind: LiteralKind;
  key: string;
  node: SyntaxNode;
}

/** A bare string statement: a docstring or a string used as a comment. */
function isDocstring(node: SyntaxNode): boolean {
  const parent = node.parent;
  return parent !== null && parent.type === "expression_statement" && parent.namedChildCount === 1;
}

function stringOccurrence(node: SyntaxNode, content: string): LiteralOccurrence | null {
  if (findAncestor(node, ["string"]) || isDocstring(node)) {
    return null;
  }
  const text = getNodeText(node, content);
  if (F_STRING_PREFIX.test(text)) {
    return null;
  }
  const match = STRING_LITERAL.exec(text);
  if (!match || match[2] === "") {
    return null;
  }
  return { kind: "string", key: match[2], node };
}

function numberOccurrence(node: SyntaxNode, content: string): LiteralOccurrence | null {
  const parent = node.parent;
  const negated = parent !== null && parent.type === "unary_operator" && getNodeText(parent, content).startsWith("-");
  const key = (negated ? "-" : "") + getNodeText(node, content);
  if (TRIVIAL_NUMBERS.has(key)) {
    return null;
  }
  return { kind: "number", key, node: negated && parent ? parent : node };
}

export function repeatedLiteral(root: SyntaxNode, { document, content }: RuleContext): RuleHit[] {
  const groups = new Map<string, LiteralOccurrence[]>();

  for (const node of findAllNodes(root, ["string", "integer", "float"])) {
    const occurrence =
      node.type === "string" ? stringOccurrence(node, content) : numberOccurrence(node, content);
    if (!occurrence) {
      continue;
    }
    const groupKey = `${occurrence.kind}:${occurrence.key}`;
    const group = groups.get(groupKey);
    if (group) {
      group.push(occurrence);
    } else {
      groups.set(groupKey, [occurrence]);
    }
  }

  const hits: RuleHit[] = [];
  for (const group of groups.values()) {
    if (group.length < REPEATED_LITERAL_THRESHOLD) {
      continue;
    }
    const first = group[0];
    hits.push(repeatedLiteralHit(first.kind, first.key, group.length, locate(first.node), document.lines));
  }
  return hits;
}

// ============================================================================
// Resources
// ============================================================================

function isReleasedLater(scope: SyntaxNode, target: string, releases: string[], after: number, content: string): boolean {
  for (const call of calls(scope)) {
    if (call.startIndex < after) {
      continue;
    }
    const callee = getCalleeText(call, content);
    if (releases.some((release) => callee === `${target}.${release}`)) {
      return true;
    }
  }
  return false;
}

/** The resource leaves its scope through `return`, so its caller owns it. */
function isReturned(scope: SyntaxNode, target: string, content: string): boolean {
  if (scope.type !== "function_definition") {
    return false;
  }
  return findAllNodes(scope, ["return_statement"]).some((statement) => {
    const value = statement.namedChildren[0];
    return value !== undefined && getNodeText(value, content).replace(/\s+/g, "") === target;
  });
}

export function missingResourceRelease(root: SyntaxNode, { document, content }: RuleContext): RuleHit[] {
  const hits: RuleHit[] = [];
  let createsWindow = false;
  let callsQuit = false;

  for (const call of calls(root)) {
    const callee = getCalleeText(call, content);
    if (matchesAnyPattern(callee, WINDOW_CONSTRUCTORS)) {
      createsWindow = true;
    }
    if (callee === "core.quit") {
      callsQuit = true;
    }
  }

  for (const assignment of findAllNodes(root, ["assignment"])) {
    const left = assignment.childForFieldName("left");
    const right = assignment.childForFieldName("right");
    if (!left || !right || right.type !== "call") {
      continue;
    }
    if (left.type !== "identifier" && left.type !== "attribute") {
      continue;
    }

    const callee = getCalleeText(right, content);
    const resource = RESOURCE_PATTERNS.find((candidate) => matchesAnyPattern(callee, candidate.constructors));
    if (!resource) {
      continue;
    }

    const target = getNodeText(left, content).replace(/\s+/g, "");
    const scope = getEnclosingScope(assignment);
    if (isReleasedLater(scope, target, resource.releases, assignment.endIndex, content)) {
      continue;
    }
    if (isReturned(scope, target, content)) {
      continue;
    }
    hits.push(missingReleaseHit(resource, target, callee, locate(assignment), document.lines));
  }

  if (createsWindow && !callsQuit) {
    hits.push(missingCoreQuitHit());
  }
  return hits;
}

// ============================================================================
// Trial loops
// ============================================================================

function constantRangeArgs(forStatement: SyntaxNode, content: string): string[] | null {
  const iterable = forStatement.childForFieldName("right");
  if (!iterable || iterable.type !== "call" || getCalleeText(iterable, content) !== "range") {
    return null;
  }
  const args = iterable.childForFieldName("arguments");
  if (!args || args.namedChildCount === 0) {
    return null;
  }
  const values: string[] = [];
  for (const arg of args.namedChildren) {
    const text = getNodeText(arg, content);
    const constant = arg.type === "integer" || (arg.type === "identifier" && CONSTANT_NAME_PATTERN.test(text));
    if (!constant) {
      return null;
    }
    values.push(text);
  }
  return values;
}

function presentsStimuli(body: SyntaxNode, content: string): boolean {
  return calls(body).some((call) => {
    const callee = getCalleeText(call, content);
    return callee !== "" && matchesAnyPattern(lastSegment(callee), PRESENTATION_METHOD_PATTERNS);
  });
}

export function trialLoop(root: SyntaxNode, { document, content }: RuleContext): RuleHit[] {
  const hits: RuleHit[] = [];
  for (const forStatement of findAllNodes(root, ["for_statement"])) {
    const rangeArgs = constantRangeArgs(forStatement, content);
    const body = forStatement.childForFieldName("body");
    if (!rangeArgs || !body || !presentsStimuli(body, content)) {
      continue;
    }
    hits.push(trialLoopHit(rangeArgs, locate(forStatement), document.lines));
  }
  return hits;
}
