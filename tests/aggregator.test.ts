/**
 * Tests for merging local and remote findings.
 */

import {
  aggregate,
  AggregateInput,
  dedupeFindings,
  remoteUnavailableFinding,
  resolveStatus,
} from "../src/analysis/aggregator";
import { FINDING_CATEGORIES, Finding, FindingInit, createFinding } from "../src/analysis/types";
import { assessRisk, scan } from "../src/privacy/sanitizer";

function finding(overrides: Partial<FindingInit> = {}): Finding {
  return createFinding({
    ruleId: "WALL_CLOCK_SLEEP",
    category: "PERFORMANCE",
    severity: "WARN",
    title: "time.sleep() used for timing",
    explanation: "Use core.wait().",
    line: 3,
    ...overrides,
  });
}

function input(overrides: Partial<AggregateInput> = {}): AggregateInput {
  return {
    local: [],
    remote: { state: "NOT_REQUESTED" },
    risk: assessRisk([], []),
    enabledCategories: [...FINDING_CATEGORIES],
    localRan: true,
    parsed: true,
    ...overrides,
  };
}

describe("aggregate", () => {
  it("should order local findings before remote ones", () => {
    const local = finding();
    const remote = finding({
      ruleId: "REMOTE_BEST_PRACTICE",
      category: "BEST_PRACTICE",
      severity: "INFO",
      title: "Use a conditions file",
      line: 1,
      source: "REMOTE_OPENAI",
    });
    const result = aggregate(input({ local: [local], remote: { state: "SUCCEEDED", findings: [remote], summary: "ok" } }));

    expect(result.findings).toEqual([local, remote]);
    expect(result.status).toBe("COMPLETE");
    expect(result.remote).toBe("SUCCEEDED");
    expect(result.summary).toBe("ok");
  });

  it("should default the request id and source id", () => {
    const result = aggregate(input());

    expect(result.requestId).toBe(0);
    expect(result.sourceId).toBe("<buffer>");
    expect(result.transmissionAcknowledged).toBe(false);
  });

  it("should add a TRANSMISSION_BLOCKED finding when the script was withheld", () => {
    const { risk } = scan('api_key = "sk-ABCDEF123456"');
    const result = aggregate(input({ local: [finding()], remote: { state: "BLOCKED" }, risk }));

    expect(result.status).toBe("PARTIAL_LOCAL_ONLY");
    expect(result.findings.map((f) => f.ruleId)).toEqual(["WALL_CLOCK_SLEEP", "TRANSMISSION_BLOCKED"]);
    expect(result.findings[1].meta).toBe(true);
    expect(result.findings[1].explanation).toContain("(1 API_KEY)");
  });

  it("should add a REMOTE_UNAVAILABLE finding when the provider failed", () => {
    const result = aggregate(
      input({
        local: [finding()],
        remote: { state: "FAILED", failure: { kind: "RATE_LIMIT", provider: "openai", message: "OpenAI rate limit reached" } },
      })
    );

    expect(result.status).toBe("PARTIAL_LOCAL_ONLY");
    expect(result.findings[0]).toEqual(finding());
    expect(result.findings[1].title).toBe("Remote analysis unavailable (RATE_LIMIT)");
    expect(result.findings[1].explanation).toBe(
      "OpenAI rate limit reached. Only local findings are shown; OpenAI was not retried."
    );
  });

  it("should refuse remote findings when the risk report forbids transmission", () => {
    const { risk } = scan('api_key = "sk-ABCDEF123456"');

    expect(() => aggregate(input({ remote: { state: "SUCCEEDED", findings: [] }, risk }))).toThrow(
      "Remote findings present although the risk report forbids transmission"
    );
  });

  it("should drop disabled categories but keep meta findings", () => {
    const literal = finding({ ruleId: "REPEATED_LITERAL", category: "BEST_PRACTICE", severity: "INFO", line: 5 });
    const parseFailure = finding({ ruleId: "PARSE_FAILURE", category: "BEST_PRACTICE", meta: true, line: 1 });
    const result = aggregate(
      input({ local: [parseFailure, finding(), literal], enabledCategories: ["PERFORMANCE"], parsed: false })
    );

    expect(result.findings.map((f) => f.ruleId)).toEqual(["PARSE_FAILURE", "WALL_CLOCK_SLEEP"]);
    expect(result.status).toBe("PARTIAL_LOCAL_ONLY");
  });

  it("should freeze the result", () => {
    const result = aggregate(input({ local: [finding()] }));

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.findings)).toBe(true);
    expect(Object.isFrozen(result.findings[0])).toBe(true);
  });
});

describe("dedupeFindings", () => {
  it("should keep the first of two findings in the same category on the same lines", () => {
    const stimulus = finding({ ruleId: "STIMULUS_IN_LOOP", line: 2 });
    const movie = finding({ ruleId: "RESOURCE_LOAD_IN_LOOP", line: 2 });

    expect(dedupeFindings([stimulus, movie])).toEqual([stimulus]);
  });

  it("should keep findings in different categories or on different lines", () => {
    const a = finding({ line: 2 });
    const b = finding({ ruleId: "TRIAL_LOOP", category: "BUILDER_MAPPING", line: 2 });
    const c = finding({ line: 7 });

    expect(dedupeFindings([a, b, c])).toEqual([a, b, c]);
  });

  it("should treat overlapping line ranges as duplicates", () => {
    const local = finding({ line: 4, endLine: 6 });
    const remote = finding({ ruleId: "REMOTE_PERFORMANCE", line: 6, source: "REMOTE_ANTHROPIC" });

    expect(dedupeFindings([local, remote])).toEqual([local]);
  });

  it("should never drop findings without a line", () => {
    const a = finding({ line: undefined });
    const b = finding({ line: undefined, title: "Another" });

    expect(dedupeFindings([a, b])).toEqual([a, b]);
  });
});

describe("resolveStatus", () => {
  it("should map detector and remote outcomes to a status", () => {
    expect(resolveStatus(true, true, "NOT_REQUESTED")).toBe("COMPLETE");
    expect(resolveStatus(true, true, "SUCCEEDED")).toBe("COMPLETE");
    expect(resolveStatus(true, true, "FAILED")).toBe("PARTIAL_LOCAL_ONLY");
    expect(resolveStatus(true, true, "BLOCKED")).toBe("PARTIAL_LOCAL_ONLY");
    expect(resolveStatus(true, false, "NOT_REQUESTED")).toBe("PARTIAL_LOCAL_ONLY");
    expect(resolveStatus(false, false, "NOT_REQUESTED")).toBe("FAILED");
  });
});

describe("remoteUnavailableFinding", () => {
  it("should be an informational meta finding", () => {
    const result = remoteUnavailableFinding({ kind: "AUTH_ERROR", provider: "google", message: "No API key configured for Google Gemini" });

    expect(result.meta).toBe(true);
    expect(result.category).toBe("PRIVACY");
    expect(result.severity).toBe("INFO");
  });
});
