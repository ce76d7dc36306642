/**
 * Line-based fallbacks for rules that can run without a syntax tree.
 * Used only when the script does not parse, so they favour simple
 * single-line heuristics over precision.
 */

import {
  BARE_SLEEP_LINE_PATTERN,
  CORE_QUIT_PATTERN,
  RESOURCE_PATTERNS,
  REPEATED_LITERAL_THRESHOLD,
  SLEEP_IMPORT_PATTERN,
  TRIVIAL_NUMBERS,
  WALL_CLOCK_SLEEP_LINE_PATTERN,
  WINDOW_CONSTRUCTOR_LINE_PATTERN,
  matchesAnyPattern,
} from "../patterns";
import {
  LiteralKind,
  Location,
  missingCoreQuitHit,
  missingReleaseHit,
  repeatedLiteralHit,
  wallClockSleepHit,
} from "./hits";
import { RuleContext, RuleHit } from "./types";

const STRING_IN_LINE = /(?<!\w)([A-Za-z]{0,2})("""|'''|"|')((?:\\.|(?!\2)[^\\\n])*)\2/g;
const NUMBER_IN_LINE = /(?<![\w.])-?\d+(?:\.\d+)?(?![\w.])/g;
const STRING_STATEMENT = /^\s*[A-Za-z]{0,2}("""|'''|"|')[\s\S]*\1\s*$/;
const ASSIGNED_CALL = /^\s*([A-Za-z_][\w.]*)\s*=(?!=)\s*([A-Za-z_][\w.]*)\s*\(/;

/**
 * The code part of a line, with any trailing comment removed.
 */
export function codePortion(line: string): string {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quote) {
      if (char === "\\") {
        i++;
      } else if (char === quote) {
        quote = null;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "#") {
      return line.substring(0, i);
    }
  }
  return line;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** The parenthesised argument text starting at `open`, if it closes on the same line. */
function argumentText(code: string, open: number): string {
  let depth = 0;
  for (let i = open; i < code.length; i++) {
    if (code[i] === "(") depth++;
    if (code[i] === ")") {
      depth--;
      if (depth === 0) {
        return code.substring(open, i + 1);
      }
    }
  }
  return "(...)";
}

export function wallClockSleepText({ document, content }: RuleContext): RuleHit[] {
  const patterns = [new RegExp(WALL_CLOCK_SLEEP_LINE_PATTERN.source, "g")];
  if (SLEEP_IMPORT_PATTERN.test(content)) {
    patterns.push(new RegExp(BARE_SLEEP_LINE_PATTERN.source, "g"));
  }

  const hits: RuleHit[] = [];
  document.lines.forEach((line, index) => {
    const code = codePortion(line);
    if (/^\s*def\s/.test(code)) {
      return;
    }
    for (const pattern of patterns) {
      let match: RegExpExecArray | null;
      while ((match = pattern.exec(code)) !== null) {
        const callee = match[0].replace(/[\s(]/g, "");
        const args = argumentText(code, match.index + match[0].length - 1);
        hits.push(wallClockSleepHit(callee, args, { line: index + 1, column: match.index + 1 }, document.lines));
      }
    }
  });
  return hits;
}

interface TextLiteral {
  kind: LiteralKind;
  key: string;
  at: Location;
  count: number;
}

export function repeatedLiteralText({ document }: RuleContext): RuleHit[] {
  const literals = new Map<string, TextLiteral>();
  const record = (kind: LiteralKind, key: string, at: Location) => {
    const groupKey = `${kind}:${key}`;
    const existing = literals.get(groupKey);
    if (existing) {
      existing.count++;
    } else {
      literals.set(groupKey, { kind, key, at, count: 1 });
    }
  };

  let openDelimiter: string | null = null;
  document.lines.forEach((line, index) => {
    // Skip the body of multi-line triple-quoted strings
    if (openDelimiter) {
      if (line.includes(openDelimiter)) {
        openDelimiter = null;
      }
      return;
    }
    const triple = /("""|''')/.exec(line);
    if (triple && line.split(triple[1]).length === 2) {
      openDelimiter = triple[1];
      return;
    }

    const code = codePortion(line);
    if (STRING_STATEMENT.test(code)) {
      return;
    }

    let masked = code;
    const strings = new RegExp(STRING_IN_LINE.source, "g");
    let match: RegExpExecArray | null;
    while ((match = strings.exec(code)) !== null) {
      masked = masked.substring(0, match.index) + " ".repeat(match[0].length) + masked.substring(match.index + match[0].length);
      if (/[fF]/.test(match[1]) || match[3] === "") {
        continue;
      }
      record("string", match[3], { line: index + 1, column: match.index + 1 });
    }

    const numbers = new RegExp(NUMBER_IN_LINE.source, "g");
    while ((match = numbers.exec(masked)) !== null) {
      if (!TRIVIAL_NUMBERS.has(match[0])) {
        record("number", match[0], { line: index + 1, column: match.index + 1 });
      }
    }
  });

  const hits: RuleHit[] = [];
  for (const literal of literals.values()) {
    if (literal.count >= REPEATED_LITERAL_THRESHOLD) {
      hits.push(repeatedLiteralHit(literal.kind, literal.key, literal.count, literal.at, document.lines));
    }
  }
  return hits;
}

/**
 * Without a tree there is no scope information, so a release anywhere later
 * in the file counts.
 */
export function missingResourceReleaseText({ document }: RuleContext): RuleHit[] {
  const code = document.lines.map(codePortion);
  const hits: RuleHit[] = [];

  code.forEach((line, index) => {
    const match = ASSIGNED_CALL.exec(line);
    if (!match) {
      return;
    }
    const [, target, callee] = match;
    const resource = RESOURCE_PATTERNS.find((candidate) => matchesAnyPattern(callee, candidate.constructors));
    if (!resource) {
      return;
    }
    const release = new RegExp(
      `(?<![\\w.])${escapeRegExp(target)}\\s*\\.\\s*(?:${resource.releases.join("|")})\\s*\\(`
    );
    const rest = code.slice(index + 1).join("\n");
    if (!release.test(rest)) {
      const column = line.length - line.trimStart().length + 1;
      hits.push(missingReleaseHit(resource, target, callee, { line: index + 1, column }, document.lines));
    }
  });

  const createsWindow = code.some((line) => WINDOW_CONSTRUCTOR_LINE_PATTERN.test(line));
  const callsQuit = code.some((line) => CORE_QUIT_PATTERN.test(line));
  if (createsWindow && !callsQuit) {
    hits.push(missingCoreQuitHit());
  }
  return hits;
}
