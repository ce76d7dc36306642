/**
 * Hit builders shared by the tree and text forms of each rule, so both forms
 * word their findings the same way.
 */

import { MAX_EXCERPT_LENGTH, ResourcePattern } from "../patterns";
import { RuleHit } from "./types";

export interface Location {
  line: number;
  column: number;
}

export function excerptOf(lines: readonly string[], line: number): string {
  const text = (lines[line - 1] ?? "").trim();
  return text.length > MAX_EXCERPT_LENGTH ? text.substring(0, MAX_EXCERPT_LENGTH) + "..." : text;
}

export function stimulusInLoopHit(callee: string, loopLine: number, at: Location, lines: readonly string[]): RuleHit {
  return {
    ruleId: "STIMULUS_IN_LOOP",
    title: `${callee}() created inside a loop`,
    explanation:
      `${callee}() runs on every iteration of the loop starting on line ${loopLine}. ` +
      "Create the stimulus once before the loop and update its attributes inside it.",
    line: at.line,
    column: at.column,
    excerpt: excerptOf(lines, at.line),
    replacement: `Create ${callee}(...) before the loop and set its text, image or position per iteration`,
  };
}

export function resourceLoadInLoopHit(callee: string, loopLine: number, at: Location, lines: readonly string[]): RuleHit {
  return {
    ruleId: "RESOURCE_LOAD_IN_LOOP",
    title: `${callee}() loads media inside a loop`,
    explanation:
      `${callee}() reads from disk on every iteration of the loop starting on line ${loopLine}. ` +
      "Preload the media before the trials start and index into the preloaded objects.",
    line: at.line,
    column: at.column,
    excerpt: excerptOf(lines, at.line),
    replacement: `Preload with ${callee}(...) before the loop`,
  };
}

export function wallClockSleepHit(callee: string, args: string, at: Location, lines: readonly string[]): RuleHit {
  return {
    ruleId: "WALL_CLOCK_SLEEP",
    title: `${callee}() used for timing`,
    explanation:
      `${callee}() is not synchronized with the screen refresh. ` +
      "Use core.wait() for pauses, or count frames with win.flip() for stimulus durations.",
    line: at.line,
    column: at.column,
    excerpt: excerptOf(lines, at.line),
    replacement: `core.wait${args}`,
  };
}

export type LiteralKind = "string" | "number";

export function constantNameFor(kind: LiteralKind, key: string): string {
  if (kind === "number") {
    return "VALUE_" + key.replace(/^-/, "MINUS_").replace(/\W/g, "_");
  }
  const name = key
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (name === "") {
    return "TEXT_CONSTANT";
  }
  return /^\d/.test(name) ? `TEXT_${name}` : name;
}

export function repeatedLiteralHit(
  kind: LiteralKind,
  key: string,
  count: number,
  at: Location,
  lines: readonly string[]
): RuleHit {
  const shown = key.length > 40 ? key.substring(0, 40) + "..." : key;
  const literal = kind === "string" ? `'${shown}'` : shown;
  const value = kind === "string" ? `'${key}'` : key;
  return {
    ruleId: "REPEATED_LITERAL",
    title: `Literal ${literal} repeated ${count} times`,
    explanation:
      `The literal ${literal} appears ${count} times. ` +
      "A named constant keeps the copies in sync and documents what the value means.",
    line: at.line,
    column: at.column,
    excerpt: excerptOf(lines, at.line),
    replacement: `${constantNameFor(kind, key)} = ${value}`,
  };
}

export function missingReleaseHit(
  resource: ResourcePattern,
  target: string,
  callee: string,
  at: Location,
  lines: readonly string[]
): RuleHit {
  const release = `${target}.${resource.releases[0]}()`;
  return {
    ruleId: "MISSING_RESOURCE_RELEASE",
    title: `${resource.label} '${target}' is never released`,
    explanation:
      `${target} is acquired with ${callee}() but ${release} is never called in the same scope. ` +
      "Release it explicitly before the experiment ends.",
    line: at.line,
    column: at.column,
    excerpt: excerptOf(lines, at.line),
    replacement: release,
  };
}

export function missingCoreQuitHit(): RuleHit {
  return {
    ruleId: "MISSING_RESOURCE_RELEASE",
    title: "core.quit() is never called",
    explanation:
      "The script opens a window but never calls core.quit(). " +
      "End the experiment with core.quit() so PsychoPy shuts down its devices and data files.",
    replacement: "core.quit()",
  };
}

export function trialLoopHit(rangeArgs: string[], at: Location, lines: readonly string[]): RuleHit {
  const nReps = rangeArgs.length === 1 ? rangeArgs[0] : `len(range(${rangeArgs.join(", ")}))`;
  return {
    ruleId: "TRIAL_LOOP",
    title: `Fixed-count loop over range(${rangeArgs.join(", ")}) maps to a Builder loop`,
    explanation:
      "This loop runs a fixed number of trials and presents stimuli or collects responses on each pass. " +
      `In Builder it becomes a Loop around a routine with nReps = ${nReps}.`,
    line: at.line,
    endLine: at.line,
    column: at.column,
    excerpt: excerptOf(lines, at.line),
    replacement: `trials = data.TrialHandler(trialList=[{}], nReps=${nReps})\nfor trial in trials:`,
  };
}
