/**
 * JSON extraction, repair and validation for provider responses.
 */

import { z } from "zod";

import { Finding, createFinding, remoteSource } from "../../analysis/types";
import { MAX_EXCERPT_LENGTH } from "../../analysis/patterns";
import { logger } from "../../logger";
import { providerFailure } from "./errors";
import { PROVIDER_LABELS, ProviderFailure, ProviderName } from "./types";

const log = logger.child("llm");

const responseSchema = z.object({
  summary: z.string().optional(),
  builder_mapping: z.array(z.unknown()).optional(),
  performance_optimizations: z.array(z.unknown()).optional(),
  best_practices: z.array(z.unknown()).optional(),
  general_suggestions: z.array(z.unknown()).optional(),
});

const builderItemSchema = z.object({
  original_code: z.string().optional(),
  description: z.string().optional(),
  builder_equivalent: z.string().optional(),
  explanation: z.string().optional(),
});

const suggestionItemSchema = z.object({
  issue: z.string().optional(),
  original_code: z.string().optional(),
  improved_code: z.string().optional(),
  explanation: z.string().optional(),
});

const generalItemSchema = z.union([
  z.string(),
  z.object({ suggestion: z.string() }).transform((item) => item.suggestion),
]);

export type ParsedResponse =
  | { ok: true; findings: Finding[]; summary?: string }
  | { ok: false; failure: ProviderFailure };

/**
 * Attempt to repair a JSON response cut off by the token limit.
 * Cuts after the last complete array element and closes every open bracket.
 *
 * @returns Repaired JSON string or null if no complete element was found
 */
export function attemptJsonRepair(content: string): string | null {
  const jsonStart = content.indexOf("{");
  if (jsonStart === -1) {
    return null;
  }
  const json = content.slice(jsonStart);

  const stack: string[] = [];
  let inString = false;
  let lastCut: { index: number; open: string[] } | null = null;

  for (let i = 0; i < json.length; i++) {
    const char = json[i];

    if (inString) {
      if (char === "\\") {
        i++;
      } else if (char === '"') {
        inString = false;
        if (stack[stack.length - 1] === "[") {
          lastCut = { index: i + 1, open: [...stack] };
        }
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{" || char === "[") {
      stack.push(char);
    } else if (char === "}" || char === "]") {
      stack.pop();
      if (stack.length === 0) {
        // The object is complete; nothing to repair
        return null;
      }
      if (stack[stack.length - 1] === "[") {
        lastCut = { index: i + 1, open: [...stack] };
      }
    }
  }

  if (!lastCut) {
    return null;
  }

  const closing = lastCut.open
    .reverse()
    .map((open) => (open === "[" ? "]" : "}"))
    .join("");
  return json.slice(0, lastCut.index) + closing;
}

function parseJson(raw: string): unknown {
  // Providers sometimes wrap the object in prose or code fences
  const jsonMatch = raw.match(/\{[\s\S]*\}/);
  const jsonStr = jsonMatch ? jsonMatch[0] : raw;
  try {
    return JSON.parse(jsonStr);
  } catch (parseError) {
    const repaired = attemptJsonRepair(raw);
    if (!repaired) {
      throw parseError;
    }
    const parsed: unknown = JSON.parse(repaired);
    log.warn("Repaired truncated JSON response");
    return parsed;
  }
}

/**
 * Lines of `redactedText` covered by `originalCode`, found by its first
 * non-blank line. Placeholders never span lines, so the numbers match the
 * original script.
 */
export function locateSnippet(originalCode: string | undefined, redactedText: string): { line: number; endLine: number } | null {
  const snippetLines = (originalCode ?? "")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (snippetLines.length === 0) {
    return null;
  }

  const lines = redactedText.split(/\r?\n/);
  const index = lines.findIndex((line) => line.trim() !== "" && line.includes(snippetLines[0]));
  if (index === -1) {
    return null;
  }
  return { line: index + 1, endLine: Math.min(lines.length, index + snippetLines.length) };
}

function excerpt(code: string | undefined): string | undefined {
  const trimmed = code?.trim();
  if (!trimmed) {
    return undefined;
  }
  return trimmed.length > MAX_EXCERPT_LENGTH ? trimmed.substring(0, MAX_EXCERPT_LENGTH) + "..." : trimmed;
}

function nonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.map((value) => value?.trim()).find((value): value is string => value !== undefined && value !== "");
}

function itemsOf<T>(items: unknown[] | undefined, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const valid: T[] = [];
  for (const item of items ?? []) {
    const result = schema.safeParse(item);
    if (result.success) {
      valid.push(result.data);
    }
  }
  return valid;
}

/**
 * Normalize a provider's raw text into Findings attributed to that provider.
 */
export function parseProviderResponse(raw: string, provider: ProviderName, redactedText: string): ParsedResponse {
  const malformed = (reason: string): ParsedResponse => ({
    ok: false,
    failure: providerFailure("MALFORMED_RESPONSE", provider, `${PROVIDER_LABELS[provider]} ${reason}`),
  });

  let parsed: unknown;
  try {
    parsed = parseJson(raw);
  } catch (error) {
    log.warn("Failed to parse provider response", {
      provider,
      error: error instanceof Error ? error.message : "unknown",
      length: raw.length,
    });
    return malformed("returned a response that is not JSON");
  }

  const validated = responseSchema.safeParse(parsed);
  if (!validated.success) {
    return malformed("returned JSON that does not match the response format");
  }
  const response = validated.data;
  const recognised =
    response.builder_mapping ??
    response.performance_optimizations ??
    response.best_practices ??
    response.general_suggestions ??
    response.summary;
  if (recognised === undefined) {
    return malformed("returned JSON without any analysis sections");
  }

  const source = remoteSource(provider);
  const findings: Finding[] = [];

  for (const item of itemsOf(response.builder_mapping, builderItemSchema)) {
    const location = locateSnippet(item.original_code, redactedText);
    findings.push(
      createFinding({
        ruleId: "REMOTE_BUILDER_MAPPING",
        category: "BUILDER_MAPPING",
        severity: "INFO",
        title: nonEmpty(item.description) ?? "Builder equivalent available",
        explanation: nonEmpty(item.explanation, item.description) ?? "",
        excerpt: excerpt(item.original_code),
        replacement: nonEmpty(item.builder_equivalent),
        line: location?.line,
        endLine: location?.endLine,
        source,
      })
    );
  }

  const suggestionSections = [
    { items: response.performance_optimizations, ruleId: "REMOTE_PERFORMANCE", category: "PERFORMANCE", severity: "WARN", fallback: "Performance suggestion" },
    { items: response.best_practices, ruleId: "REMOTE_BEST_PRACTICE", category: "BEST_PRACTICE", severity: "INFO", fallback: "Best practice suggestion" },
  ] as const;

  for (const section of suggestionSections) {
    for (const item of itemsOf(section.items, suggestionItemSchema)) {
      const location = locateSnippet(item.original_code, redactedText);
      findings.push(
        createFinding({
          ruleId: section.ruleId,
          category: section.category,
          severity: section.severity,
          title: nonEmpty(item.issue) ?? section.fallback,
          explanation: nonEmpty(item.explanation, item.issue) ?? "",
          excerpt: excerpt(item.original_code),
          replacement: nonEmpty(item.improved_code),
          line: location?.line,
          endLine: location?.endLine,
          source,
        })
      );
    }
  }

  for (const suggestion of itemsOf(response.general_suggestions, generalItemSchema)) {
    const text = suggestion.trim();
    if (!text) {
      continue;
    }
    findings.push(
      createFinding({
        ruleId: "REMOTE_GENERAL",
        category: "BEST_PRACTICE",
        severity: "INFO",
        title: text.length > 80 ? text.substring(0, 77) + "..." : text,
        explanation: text,
        source,
      })
    );
  }

  return { ok: true, findings, summary: nonEmpty(response.summary) };
}
