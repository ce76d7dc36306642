/**
 * Configuration schema for analysis calls and .psyscan.yml files.
 *
 * Keys are accepted in camelCase or in the snake_case used by the YAML file
 * (`remote_enabled`, `timeout_ms`, ...). Unknown keys are rejected.
 */

import { z } from "zod";

import { ALL_RULE_IDS, RuleSettings, isLocalRuleId } from "../analysis/rules";
import { FINDING_CATEGORIES, FINDING_SEVERITIES, FindingCategory } from "../analysis/types";
import { ConfigurationInvalidError } from "../errors";
import { MAX_TIMEOUT_MS, PROVIDER_NAMES, ProviderName } from "../integrations/llm/types";

/**
 * Resolved options for one analysis.
 */
export interface AnalysisConfig {
  enabledCategories: FindingCategory[];
  remoteEnabled: boolean;
  provider: ProviderName;
  /** Upper bound on the provider call. */
  timeoutMs: number;
  /** Send redacted code even when the risk report says it is unsafe. */
  transmitOverride: boolean;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  rules: RuleSettings;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

const DEFAULTS: AnalysisConfig = {
  enabledCategories: [...FINDING_CATEGORIES],
  remoteEnabled: false,
  provider: "openai",
  timeoutMs: DEFAULT_TIMEOUT_MS,
  transmitOverride: false,
  rules: {},
};

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze(DEFAULTS);

const SNAKE_CASE_ALIASES: Record<string, string> = {
  enabled_categories: "enabledCategories",
  remote_enabled: "remoteEnabled",
  timeout_ms: "timeoutMs",
  transmit_override: "transmitOverride",
  max_tokens: "maxTokens",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Rename snake_case keys to their camelCase form. */
function normalizeKeys(value: unknown): unknown {
  if (!isRecord(value)) {
    return value;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    normalized[SNAKE_CASE_ALIASES[key] ?? key] = entry;
  }
  return normalized;
}

const ruleSettingSchema = z
  .object({
    enabled: z.boolean().optional(),
    severity: z.enum(FINDING_SEVERITIES).optional(),
  })
  .strict();

export const rulesSchema = z
  .record(ruleSettingSchema)
  .superRefine((rules, ctx) => {
    for (const key of Object.keys(rules)) {
      if (!isLocalRuleId(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Unknown rule (expected one of ${ALL_RULE_IDS.join(", ")})`,
        });
      }
    }
  })
  .transform((rules) => {
    const settings: RuleSettings = {};
    for (const [key, setting] of Object.entries(rules)) {
      if (isLocalRuleId(key)) {
        settings[key] = setting;
      }
    }
    return settings;
  });

const analysisFieldsSchema = z
  .object({
    enabledCategories: z.array(z.enum(FINDING_CATEGORIES)),
    remoteEnabled: z.boolean(),
    provider: z.enum(PROVIDER_NAMES),
    timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
    transmitOverride: z.boolean(),
    model: z.string().min(1),
    maxTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
    rules: rulesSchema,
  })
  .partial()
  .strict();

export const analysisConfigSchema = z.preprocess(normalizeKeys, analysisFieldsSchema);

export type AnalysisConfigInput = z.input<typeof analysisFieldsSchema>;

/** The `analysis` section of the YAML file; rules live in their own section. */
const analysisSectionSchema = z.preprocess(normalizeKeys, analysisFieldsSchema.omit({ rules: true }));

export const fileConfigSchema = z
  .object({
    version: z.literal(1).optional(),
    analysis: analysisSectionSchema.optional(),
    rules: rulesSchema.optional(),
    files: z
      .object({
        ignore: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Parsed contents of a .psyscan.yml file.
 */
export type PsyscanFileConfig = z.output<typeof fileConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Merge rule settings field by field, so that overriding `enabled` keeps a
 * configured severity.
 */
export function mergeRuleSettings(base: RuleSettings, overrides: RuleSettings = {}): RuleSettings {
  const merged: RuleSettings = { ...base };
  for (const id of ALL_RULE_IDS) {
    const override = overrides[id];
    if (override) {
      merged[id] = { ...base[id], ...override };
    }
  }
  return merged;
}

/**
 * Validate caller-supplied options and merge them over `base`.
 * Throws ConfigurationInvalidError listing every offending field.
 */
export function parseAnalysisConfig(input: unknown, base: Readonly<AnalysisConfig> = DEFAULT_ANALYSIS_CONFIG): AnalysisConfig {
  const result = analysisConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationInvalidError(`Invalid analysis configuration: ${issues.join("; ")}`, issues);
  }

  const overrides = result.data;
  const merged: AnalysisConfig = {
    enabledCategories: [...(overrides.enabledCategories ?? base.enabledCategories)],
    remoteEnabled: overrides.remoteEnabled ?? base.remoteEnabled,
    provider: overrides.provider ?? base.provider,
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
    transmitOverride: overrides.transmitOverride ?? base.transmitOverride,
    rules: mergeRuleSettings(base.rules, overrides.rules),
  };
  const model = overrides.model ?? base.model;
  const maxTokens = overrides.maxTokens ?? base.maxTokens;
  const temperature = overrides.temperature ?? base.temperature;
  if (model !== undefined) merged.model = model;
  if (maxTokens !== undefined) merged.maxTokens = maxTokens;
  if (temperature !== undefined) merged.temperature = temperature;
  return merged;
}
