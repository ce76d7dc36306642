/**
 * Sensitive-data redaction for code that is about to leave the machine.
 *
 * `scan` is pure: it never logs or stores the matched text, only categories and
 * offsets, so its report can be logged as-is.
 */

import { logger } from "../logger";

const log = logger.child("sanitizer");

export const SENSITIVE_CATEGORIES = [
  "API_KEY",
  "DB_URL",
  "GENERIC_SECRET",
  "EMAIL",
  "FILE_PATH",
] as const;

/** Listed in matcher priority order. */
export type SensitiveCategory = (typeof SENSITIVE_CATEGORIES)[number];

export type RiskLevel = "NONE" | "LOW" | "HIGH";

export interface SensitiveSpan {
  readonly category: SensitiveCategory;
  /** UTF-16 offset into the original text. */
  readonly start: number;
  /** Exclusive end offset. */
  readonly end: number;
  readonly line: number;
  readonly endLine: number;
  readonly replacement: string;
}

export interface RiskReport {
  readonly counts: Readonly<Record<SensitiveCategory, number>>;
  /** Secret assignments built by formatting or concatenation, or unpacked from a tuple; never redactable. */
  readonly ambiguousCount: number;
  readonly ambiguousLines: readonly number[];
  readonly level: RiskLevel;
  readonly safeToTransmit: boolean;
  /** True when only the caller's override allows transmission. */
  readonly overridden: boolean;
}

export interface ScanOptions {
  override?: boolean;
}

export interface ScanResult {
  readonly redactedText: string;
  readonly risk: RiskReport;
  readonly spans: readonly SensitiveSpan[];
}

interface Matcher {
  category: SensitiveCategory;
  pattern: RegExp;
}

// Value classes exclude quotes, whitespace and angle brackets so a
// placeholder such as <API_KEY> can never match again.
const VALUE = `[^"'\\s<>]`;

const API_KEY_NAME = `[A-Za-z0-9_]*api[_-]?key[A-Za-z0-9_]*`;

const SECRET_NAME =
  `[A-Za-z0-9_]*(?:secret|token|passw(?:or)?d|pwd|credentials?|private[_-]?key|` +
  `auth[_-]?(?:key|token|header)|bearer)[A-Za-z0-9_]*`;

// Plain assignment, dict entry, or annotated assignment such as `password: str =`
const ASSIGNMENT_OPERATOR = `["']?\\s*(?::\\s*[A-Za-z_][\\w.\\[\\]|, ]*=|[:=])\\s*[rRbBuU]?`;

// Quoted values run to the matching closing quote, spaces included.
function assignedValue(name: string, minLength: number): RegExp {
  const prefix = `\\b${name}${ASSIGNMENT_OPERATOR}`;
  return new RegExp(
    `(?<=${prefix}")[^"\\n<>]{${minLength},}(?=")|(?<=${prefix}')[^'\\n<>]{${minLength},}(?=')`,
    "gi"
  );
}

const MATCHERS: readonly Matcher[] = [
  {
    category: "API_KEY",
    pattern: new RegExp(
      "\\b(?:sk-(?:ant-|proj-)?[A-Za-z0-9_-]{8,}" +
        "|AIza[0-9A-Za-z_-]{20,}" +
        "|gh[pousr]_[A-Za-z0-9]{20,}" +
        "|glpat-[A-Za-z0-9_-]{20,}" +
        "|AKIA[0-9A-Z]{16}" +
        "|sk_(?:live|test)_[A-Za-z0-9]{16,}" +
        "|xox[abprs]-[A-Za-z0-9-]{10,})",
      "g"
    ),
  },
  { category: "API_KEY", pattern: assignedValue(API_KEY_NAME, 6) },
  {
    category: "DB_URL",
    pattern: new RegExp(
      `\\b(?:mysql(?:\\+\\w+)?|postgres(?:ql)?(?:\\+\\w+)?|mongodb(?:\\+srv)?|rediss?|mssql|amqps?)://${VALUE}+`,
      "gi"
    ),
  },
  { category: "GENERIC_SECRET", pattern: assignedValue(SECRET_NAME, 6) },
  {
    category: "GENERIC_SECRET",
    // Only the user:password part of an authenticated URL
    pattern: /(?<=\bhttps?:\/\/)[^\s/:@"'<>]+:[^\s/@"'<>]+(?=@)/gi,
  },
  {
    category: "EMAIL",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  },
  {
    category: "FILE_PATH",
    pattern: new RegExp(
      `(?<![\\w.])/(?:home|Users)/${VALUE}+` + `|\\b[A-Za-z]:\\\\{1,2}Users\\\\{1,2}${VALUE}+`,
      "g"
    ),
  },
];

const PRIORITY: Record<SensitiveCategory, number> = {
  API_KEY: 0,
  DB_URL: 1,
  GENERIC_SECRET: 2,
  EMAIL: 3,
  FILE_PATH: 4,
};

const HIGH_RISK_CATEGORIES: readonly SensitiveCategory[] = ["API_KEY", "DB_URL", "GENERIC_SECRET"];

/** A secret-like name assigned something built at run time. */
const SECRET_ASSIGNMENT_LINE = new RegExp(
  `^\\s*(?:[\\w.]*\\.)?(?:${API_KEY_NAME}|${SECRET_NAME})\\s*(?::[^=\\n]*)?=(?!=)\\s*(.+)$`,
  "i"
);
const SECRET_TARGET = new RegExp(`^(?:[\\w.]*\\.)?(?:${API_KEY_NAME}|${SECRET_NAME})$`, "i");
/** `a, b = ...` or `(a, b) = ...`; the targets are captured. */
const UNPACKING_LINE = /^\s*\(?\s*([\w.]+(?:\s*,\s*[\w.]+)+)\s*,?\s*\)?\s*=(?!=)/;
const F_STRING_START = /^[rRbBuU]?[fF][rRbB]?["']/;
const FORMATTED_LITERAL = /["'][^\n]*(?:\+|\.format\s*\(|%)|(?:\+|%)\s*[rRbBuU]?["']/;

export function placeholderFor(category: SensitiveCategory): string {
  return `<${category}>`;
}

interface Candidate {
  category: SensitiveCategory;
  start: number;
  end: number;
}

function collectCandidates(text: string): Candidate[] {
  const candidates: Candidate[] = [];
  for (const matcher of MATCHERS) {
    // Fresh regex per scan to avoid shared lastIndex state
    const regex = new RegExp(matcher.pattern.source, matcher.pattern.flags);
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
      if (match[0].length === 0) {
        regex.lastIndex++;
        continue;
      }
      candidates.push({
        category: matcher.category,
        start: match.index,
        end: match.index + match[0].length,
      });
    }
  }

  return candidates.sort(
    (a, b) =>
      a.start - b.start ||
      PRIORITY[a.category] - PRIORITY[b.category] ||
      b.end - a.end
  );
}

function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
}

function lineAt(starts: readonly number[], offset: number): number {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if (starts[mid] <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low + 1;
}

function findAmbiguousLines(text: string): number[] {
  const ambiguous: number[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    const unpacking = UNPACKING_LINE.exec(line);
    if (unpacking) {
      // Values cannot be paired with their targets without evaluating the line
      if (unpacking[1].split(",").some((target) => SECRET_TARGET.test(target.trim()))) {
        ambiguous.push(index + 1);
      }
      return;
    }
    const match = SECRET_ASSIGNMENT_LINE.exec(line);
    if (!match) {
      return;
    }
    const value = match[1].trim();
    if (F_STRING_START.test(value) || FORMATTED_LITERAL.test(value)) {
      ambiguous.push(index + 1);
    }
  });
  return ambiguous;
}

function emptyCounts(): Record<SensitiveCategory, number> {
  return { API_KEY: 0, DB_URL: 0, GENERIC_SECRET: 0, EMAIL: 0, FILE_PATH: 0 };
}

export function assessRisk(
  spans: readonly SensitiveSpan[],
  ambiguousLines: readonly number[],
  options: ScanOptions = {}
): RiskReport {
  const counts = emptyCounts();
  for (const span of spans) {
    counts[span.category]++;
  }

  const highRisk = HIGH_RISK_CATEGORIES.some((category) => counts[category] > 0) || ambiguousLines.length > 0;
  const level: RiskLevel = highRisk ? "HIGH" : spans.length > 0 ? "LOW" : "NONE";

  const inherentlySafe = spans.length === 0 && ambiguousLines.length === 0;
  const override = options.override === true;

  return Object.freeze({
    counts: Object.freeze(counts),
    ambiguousCount: ambiguousLines.length,
    ambiguousLines: Object.freeze([...ambiguousLines]),
    level,
    safeToTransmit: inherentlySafe || override,
    overridden: override && !inherentlySafe,
  });
}

/**
 * Redact sensitive substrings in one left-to-right pass.
 * At equal start offsets the higher-priority category wins; a match that
 * overlaps an accepted span is dropped.
 */
export function scan(text: string, options: ScanOptions = {}): ScanResult {
  const starts = lineStarts(text);
  const spans: SensitiveSpan[] = [];
  let cursor = 0;

  for (const candidate of collectCandidates(text)) {
    if (candidate.start < cursor) {
      continue;
    }
    spans.push(
      Object.freeze({
        category: candidate.category,
        start: candidate.start,
        end: candidate.end,
        line: lineAt(starts, candidate.start),
        endLine: lineAt(starts, candidate.end - 1),
        replacement: placeholderFor(candidate.category),
      })
    );
    cursor = candidate.end;
  }

  let redactedText = "";
  let last = 0;
  for (const span of spans) {
    redactedText += text.slice(last, span.start) + span.replacement;
    last = span.end;
  }
  redactedText += text.slice(last);

  const risk = assessRisk(spans, findAmbiguousLines(text), options);

  log.debug("Scan complete", {
    spans: spans.length,
    ambiguous: risk.ambiguousCount,
    level: risk.level,
    safeToTransmit: risk.safeToTransmit,
  });

  return Object.freeze({ redactedText, risk, spans: Object.freeze(spans) });
}

/**
 * Advice for the author of a script, derived from its risk report.
 */
export function privacyRecommendations(risk: RiskReport): string[] {
  const recommendations: string[] = [];

  if (risk.counts.API_KEY > 0) {
    recommendations.push("Move API keys into environment variables or a config file kept out of version control.");
  }
  if (risk.counts.DB_URL > 0) {
    recommendations.push("Read database connection strings from environment variables.");
  }
  if (risk.counts.GENERIC_SECRET > 0) {
    recommendations.push("Remove hard-coded passwords and tokens from the script.");
  }
  if (risk.counts.EMAIL > 0) {
    recommendations.push("Replace e-mail addresses with anonymised participant or contact ids.");
  }
  if (risk.counts.FILE_PATH > 0) {
    recommendations.push("Build file paths relative to the experiment folder instead of a home directory.");
  }
  if (risk.ambiguousCount > 0) {
    recommendations.push("Secrets assembled with f-strings, format() or concatenation, or assigned by tuple unpacking, cannot be redacted; load them at run time.");
  }

  return recommendations;
}
