/**
 * Configuration loader for psyscan.
 *
 * Loads .psyscan.yml from a directory, validates it and resolves it against
 * the analysis defaults.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";

import { ConfigurationInvalidError } from "../errors";
import { logger } from "../logger";
import {
  AnalysisConfig,
  DEFAULT_ANALYSIS_CONFIG,
  PsyscanFileConfig,
  fileConfigSchema,
  formatIssues,
  parseAnalysisConfig,
} from "./schema";

const log = logger.child("config");

/**
 * Config file name to search for.
 */
export const CONFIG_FILE_NAME = ".psyscan.yml";

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The validated file contents (empty when no file was found).
   */
  raw: PsyscanFileConfig;

  /**
   * Analysis options with defaults applied; callers layer their own options on top.
   */
  analysis: AnalysisConfig;

  /**
   * Check if a file should be completely ignored from analysis.
   * @param filePath - Path relative to the config directory
   */
  isFileIgnored(filePath: string): boolean;
}

/**
 * Check if a file matches any of the given glob patterns.
 */
function matchesAnyGlob(filePath: string, patterns: readonly string[]): boolean {
  const normalizedPath = filePath.replace(/\\/g, "/");
  return patterns.some((pattern) => minimatch(normalizedPath, pattern, { dot: true }));
}

/**
 * Build a LoadedConfig from validated file contents.
 */
function buildLoadedConfig(raw: PsyscanFileConfig): LoadedConfig {
  const analysis = parseAnalysisConfig({ ...raw.analysis, rules: raw.rules ?? {} });
  const ignorePatterns = raw.files?.ignore ?? [];

  return {
    raw,
    analysis,
    isFileIgnored: (filePath) => matchesAnyGlob(filePath, ignorePatterns),
  };
}

/**
 * Load configuration from a YAML string. Does not touch the filesystem.
 *
 * @param source - Where the YAML came from, for error messages
 * @throws ConfigurationInvalidError for malformed YAML or unknown settings
 */
export function loadConfigFromString(yamlContent: string, source = "<string>"): LoadedConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationInvalidError(`Failed to parse ${source}: ${reason}`, [`(root): ${reason}`], {
      cause: err,
    });
  }

  // An empty file means "all defaults"
  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationInvalidError(`Invalid ${source}: ${issues.join("; ")}`, issues);
  }

  return buildLoadedConfig(result.data);
}

/**
 * Load configuration from a directory.
 *
 * @param directory - Directory that may contain .psyscan.yml
 * @returns LoadedConfig with resolved values and helper methods
 */
export function loadConfig(directory: string): LoadedConfig {
  const configPath = path.join(directory, CONFIG_FILE_NAME);

  if (!fs.existsSync(configPath)) {
    log.debug("No config file found, using defaults", { directory });
    return createDefaultConfig();
  }

  const fileContents = fs.readFileSync(configPath, "utf-8");
  const config = loadConfigFromString(fileContents, configPath);
  log.debug("Loaded config", { path: configPath });
  return config;
}

/**
 * Create a default LoadedConfig without any file.
 */
export function createDefaultConfig(): LoadedConfig {
  return {
    raw: {},
    analysis: parseAnalysisConfig({}, DEFAULT_ANALYSIS_CONFIG),
    isFileIgnored: () => false,
  };
}
