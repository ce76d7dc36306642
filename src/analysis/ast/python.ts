/**
 * Python syntax tree access using tree-sitter.
 *
 * Tree-sitter never throws on bad input; it marks ERROR and MISSING nodes
 * instead. A tree with any such node is reported as a parse failure so the
 * detector can fall back to text-only rules.
 */

import Parser from "tree-sitter";
import Python from "tree-sitter-python";

export type SyntaxNode = Parser.SyntaxNode;
export type SyntaxTree = Parser.Tree;

export interface ParseFailure {
  message: string;
  /** 1-based line of the first error, when one could be located. */
  line?: number;
}

export type ParseOutcome =
  | { ok: true; tree: SyntaxTree }
  | { ok: false; error: ParseFailure };

/** Node types that repeat their body. */
const LOOP_TYPES = [
  "for_statement",
  "while_statement",
  "list_comprehension",
  "set_comprehension",
  "dictionary_comprehension",
  "generator_expression",
];

/** Node types that open a new scope; loops do not reach through them. */
const SCOPE_TYPES = ["function_definition", "class_definition", "lambda"];

let sharedParser: Parser | null = null;

function getParser(): Parser {
  if (!sharedParser) {
    sharedParser = new Parser();
    sharedParser.setLanguage(Python);
  }
  return sharedParser;
}

/**
 * Parse Python source. Parsing is synchronous, so one parser instance is
 * shared by every analysis.
 */
export function parsePython(content: string): ParseOutcome {
  let tree: SyntaxTree | undefined;
  try {
    tree = getParser().parse(content);
  } catch (error) {
    return {
      ok: false,
      error: { message: error instanceof Error ? error.message : "Unknown parse error" },
    };
  }
  if (!tree) {
    return { ok: false, error: { message: "Parser returned no tree" } };
  }

  if (!tree.rootNode.hasError) {
    return { ok: true, tree };
  }

  const errorNode = findFirstNode(tree.rootNode, (node) => node.type === "ERROR" || node.isMissing);
  if (!errorNode) {
    return { ok: false, error: { message: "Syntax error" } };
  }

  const line = getLineNumber(errorNode);
  const message = errorNode.isMissing
    ? `Syntax error: missing ${errorNode.type} on line ${line}`
    : `Syntax error on line ${line}`;
  return { ok: false, error: { message, line } };
}

// ============================================================================
// Node helpers
// ============================================================================

export function getNodeText(node: SyntaxNode, content: string): string {
  return content.slice(node.startIndex, node.endIndex);
}

export function getLineNumber(node: SyntaxNode): number {
  return node.startPosition.row + 1; // tree-sitter is 0-indexed
}

export function getColumn(node: SyntaxNode): number {
  return node.startPosition.column + 1;
}

/** Range containment; node wrappers are not guaranteed to be identical objects. */
export function containsNode(outer: SyntaxNode, inner: SyntaxNode): boolean {
  return inner.startIndex >= outer.startIndex && inner.endIndex <= outer.endIndex;
}

export function findAncestor(node: SyntaxNode, types: string[]): SyntaxNode | null {
  let current = node.parent;
  while (current) {
    if (types.includes(current.type)) {
      return current;
    }
    current = current.parent;
  }
  return null;
}

/**
 * Collect nodes of the given types in document order.
 */
export function findAllNodes(root: SyntaxNode, types: string[]): SyntaxNode[] {
  const results: SyntaxNode[] = [];
  const traverse = (node: SyntaxNode) => {
    if (types.includes(node.type)) {
      results.push(node);
    }
    for (const child of node.children) {
      traverse(child);
    }
  };
  traverse(root);
  return results;
}

function findFirstNode(root: SyntaxNode, predicate: (node: SyntaxNode) => boolean): SyntaxNode | null {
  if (predicate(root)) {
    return root;
  }
  for (const child of root.children) {
    const found = findFirstNode(child, predicate);
    if (found) {
      return found;
    }
  }
  return null;
}

/**
 * The dotted callee of a call node, e.g. "visual.TextStim" or "make_stimulus".
 */
export function getCalleeText(call: SyntaxNode, content: string): string {
  const fn = call.childForFieldName("function");
  return fn ? getNodeText(fn, content).replace(/\s+/g, "") : "";
}

/** Last segment of a dotted name: "visual.TextStim" -> "TextStim". */
export function lastSegment(dotted: string): string {
  const parts = dotted.split(".");
  return parts[parts.length - 1];
}

/**
 * The loop whose body executes `node` on every iteration, if any.
 * Stops at function, class and lambda boundaries, and ignores the iterable
 * expression of a `for`, which only runs once.
 */
export function findEnclosingLoop(node: SyntaxNode): SyntaxNode | null {
  let current = node.parent;
  while (current) {
    if (SCOPE_TYPES.includes(current.type)) {
      return null;
    }
    if (LOOP_TYPES.includes(current.type)) {
      const body = current.childForFieldName("body");
      if (body && containsNode(body, node)) {
        return current;
      }
      if (current.type === "while_statement") {
        const condition = current.childForFieldName("condition");
        if (condition && containsNode(condition, node)) {
          return current;
        }
      }
    }
    current = current.parent;
  }
  return null;
}

/**
 * The function definition that owns `node`, or the module root.
 */
export function getEnclosingScope(node: SyntaxNode): SyntaxNode {
  const fn = findAncestor(node, ["function_definition"]);
  if (fn) {
    return fn;
  }
  let root = node;
  while (root.parent) {
    root = root.parent;
  }
  return root;
}
