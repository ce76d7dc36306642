/**
 * Tests for psyscan configuration and the suppression system.
 */

import * as path from "path";
import { loadConfig, loadConfigFromString, createDefaultConfig } from "../src/config/loader";
import { DEFAULT_ANALYSIS_CONFIG, mergeRuleSettings, parseAnalysisConfig } from "../src/config/schema";
import { isSuppressed, parseSuppressionDirectives } from "../src/core/suppression";
import { ConfigurationInvalidError } from "../src/errors";

const FIXTURES_DIR = path.join(__dirname, "fixtures/psyscan-config");

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationInvalidError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("Expected ConfigurationInvalidError");
}

describe("parseAnalysisConfig", () => {
  it("should return the defaults for empty input", () => {
    expect(parseAnalysisConfig({})).toEqual({
      enabledCategories: ["PERFORMANCE", "BEST_PRACTICE", "BUILDER_MAPPING", "PRIVACY"],
      remoteEnabled: false,
      provider: "openai",
      timeoutMs: 30000,
      transmitOverride: false,
      rules: {},
    });
    expect(parseAnalysisConfig(undefined)).toEqual(parseAnalysisConfig({}));
  });

  it("should accept snake_case keys", () => {
    const config = parseAnalysisConfig({ remote_enabled: true, timeout_ms: 500, max_tokens: 800 });

    expect(config.remoteEnabled).toBe(true);
    expect(config.timeoutMs).toBe(500);
    expect(config.maxTokens).toBe(800);
  });

  it("should reject unknown keys", () => {
    expect(issuesOf(() => parseAnalysisConfig({ foo: 1 }))).toEqual(["(root): Unrecognized key(s) in object: 'foo'"]);
  });

  it("should reject unknown providers", () => {
    expect(() => parseAnalysisConfig({ provider: "azure" })).toThrow(ConfigurationInvalidError);
    expect(issuesOf(() => parseAnalysisConfig({ provider: "azure" }))[0]).toMatch(/^provider: /);
  });

  it("should reject timeouts that are not positive integers", () => {
    expect(() => parseAnalysisConfig({ timeoutMs: 0 })).toThrow(ConfigurationInvalidError);
    expect(() => parseAnalysisConfig({ timeoutMs: 1.5 })).toThrow(ConfigurationInvalidError);
  });

  it("should cap timeouts at the largest timer delay", () => {
    expect(parseAnalysisConfig({ timeout_ms: 2_147_483_647 }).timeoutMs).toBe(2_147_483_647);
    expect(issuesOf(() => parseAnalysisConfig({ timeoutMs: 2_147_483_648 }))[0]).toMatch(/^timeoutMs: /);
  });

  it("should reject unknown rules", () => {
    const issues = issuesOf(() => parseAnalysisConfig({ rules: { NOPE: { enabled: false } } }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^rules\.NOPE: Unknown rule/);
  });

  it("should layer input over a base config", () => {
    const base = parseAnalysisConfig({ provider: "google", rules: { TRIAL_LOOP: { severity: "WARN" } } });
    const config = parseAnalysisConfig({ timeoutMs: 2000, rules: { TRIAL_LOOP: { enabled: false } } }, base);

    expect(config.provider).toBe("google");
    expect(config.timeoutMs).toBe(2000);
    expect(config.rules).toEqual({ TRIAL_LOOP: { severity: "WARN", enabled: false } });
  });

  it("should not modify the shared defaults", () => {
    const config = parseAnalysisConfig({});
    config.enabledCategories.push("PRIVACY");

    expect(DEFAULT_ANALYSIS_CONFIG.enabledCategories).toHaveLength(4);
  });
});

describe("mergeRuleSettings", () => {
  it("should merge settings field by field", () => {
    expect(
      mergeRuleSettings({ WALL_CLOCK_SLEEP: { severity: "CRITICAL" } }, { WALL_CLOCK_SLEEP: { enabled: false } })
    ).toEqual({ WALL_CLOCK_SLEEP: { severity: "CRITICAL", enabled: false } });
  });
});

describe("Config Loading", () => {
  describe("loadConfig", () => {
    it("should load config from .psyscan.yml file", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.raw.version).toBe(1);
      expect(config.analysis).toEqual({
        enabledCategories: ["PERFORMANCE", "BEST_PRACTICE"],
        remoteEnabled: true,
        provider: "anthropic",
        timeoutMs: 10000,
        transmitOverride: false,
        rules: {
          REPEATED_LITERAL: { enabled: false },
          WALL_CLOCK_SLEEP: { severity: "CRITICAL" },
        },
      });
    });

    it("should return defaults when no config file exists", () => {
      const config = loadConfig("/nonexistent/path");

      expect(config.raw).toEqual({});
      expect(config.analysis).toEqual(parseAnalysisConfig({}));
    });
  });

  describe("isFileIgnored", () => {
    it("should match the configured globs", () => {
      const config = loadConfig(FIXTURES_DIR);

      expect(config.isFileIgnored("legacy/old_stroop.py")).toBe(true);
      expect(config.isFileIgnored("stroop_lastrun.py")).toBe(true);
      expect(config.isFileIgnored("sessions/stroop_lastrun.py")).toBe(true);
      expect(config.isFileIgnored("stroop.py")).toBe(false);
    });

    it("should normalize Windows separators", () => {
      expect(loadConfig(FIXTURES_DIR).isFileIgnored("legacy\\old_stroop.py")).toBe(true);
    });
  });

  describe("createDefaultConfig", () => {
    it("should ignore nothing and use default analysis options", () => {
      const config = createDefaultConfig();

      expect(config.isFileIgnored("anything.py")).toBe(false);
      expect(config.analysis.remoteEnabled).toBe(false);
    });
  });

  describe("loadConfigFromString", () => {
    it("should parse YAML config string", () => {
      const yaml = `
version: 1
analysis:
  provider: google
  transmit_override: true
rules:
  TRIAL_LOOP:
    enabled: false
`;
      const config = loadConfigFromString(yaml);

      expect(config.analysis.provider).toBe("google");
      expect(config.analysis.transmitOverride).toBe(true);
      expect(config.analysis.rules.TRIAL_LOOP).toEqual({ enabled: false });
    });

    it("should treat an empty file as defaults", () => {
      expect(loadConfigFromString("").analysis).toEqual(parseAnalysisConfig({}));
    });

    it("should reject malformed YAML", () => {
      expect(() => loadConfigFromString("analysis: [unclosed")).toThrow(ConfigurationInvalidError);
    });

    it("should reject unsupported versions and unknown sections", () => {
      expect(() => loadConfigFromString("version: 2")).toThrow(ConfigurationInvalidError);
      expect(() => loadConfigFromString("scoring:\n  threshold: 3")).toThrow(ConfigurationInvalidError);
    });

    it("should name the source in error messages", () => {
      expect(() => loadConfigFromString("analysis:\n  provider: azure", "lab.yml")).toThrow(/^Invalid lab\.yml: /);
    });
  });
});

describe("Suppression Directives", () => {
  describe("parseSuppressionDirectives", () => {
    it("should parse rule lists", () => {
      expect(parseSuppressionDirectives(["x = 5  # psyscan-ignore-line REPEATED_LITERAL, TRIAL_LOOP"])).toEqual([
        { scope: "line", allRules: false, rules: ["REPEATED_LITERAL", "TRIAL_LOOP"], line: 1 },
      ]);
    });

    it("should parse ALL for every scope", () => {
      const directives = parseSuppressionDirectives([
        "# psyscan-ignore-file ALL",
        "x = 1",
        "# psyscan-ignore-next-line all",
      ]);

      expect(directives).toEqual([
        { scope: "file", allRules: true, rules: [], line: 1 },
        { scope: "next-line", allRules: true, rules: [], line: 3 },
      ]);
    });

    it("should ignore unknown rule ids", () => {
      expect(parseSuppressionDirectives(["# psyscan-ignore-line NOT_A_RULE"])).toEqual([]);
    });
  });

  describe("isSuppressed", () => {
    const directives = parseSuppressionDirectives([
      "import time",
      "# psyscan-ignore-next-line WALL_CLOCK_SLEEP",
      "time.sleep(1.5)",
    ]);

    it("should suppress the named rule on the next line only", () => {
      expect(isSuppressed("WALL_CLOCK_SLEEP", 3, directives)).toBe(true);
      expect(isSuppressed("WALL_CLOCK_SLEEP", 4, directives)).toBe(false);
      expect(isSuppressed("REPEATED_LITERAL", 3, directives)).toBe(false);
    });

    it("should not suppress file-level findings with line directives", () => {
      expect(isSuppressed("WALL_CLOCK_SLEEP", undefined, directives)).toBe(false);
    });
  });
});
