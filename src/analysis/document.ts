/**
 * Immutable source document handed to every stage of an analysis.
 */

import { parsePython, ParseFailure, SyntaxTree } from "./ast/python";

export interface SourceDocument {
  readonly text: string;
  /** File name or editor buffer id. */
  readonly sourceId: string;
  /** Parsed tree, or null when the script has syntax errors. */
  readonly tree: SyntaxTree | null;
  readonly parseError?: ParseFailure;
  readonly lines: readonly string[];
}

export const DEFAULT_SOURCE_ID = "<buffer>";

export function createSourceDocument(text: string, sourceId: string = DEFAULT_SOURCE_ID): SourceDocument {
  const lines = Object.freeze(text.split(/\r?\n/));

  if (text.trim() === "") {
    return Object.freeze({ text, sourceId, tree: null, lines });
  }

  const parsed = parsePython(text);
  if (parsed.ok) {
    return Object.freeze({ text, sourceId, tree: parsed.tree, lines });
  }
  return Object.freeze({
    text,
    sourceId,
    tree: null,
    parseError: Object.freeze({ ...parsed.error }),
    lines,
  });
}

export function isBlankDocument(document: SourceDocument): boolean {
  return document.text.trim() === "";
}
