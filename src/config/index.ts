export type { AnalysisConfig, AnalysisConfigInput, PsyscanFileConfig } from "./schema";
export { DEFAULT_ANALYSIS_CONFIG, DEFAULT_TIMEOUT_MS, mergeRuleSettings, parseAnalysisConfig } from "./schema";
export type { LoadedConfig } from "./loader";
export { CONFIG_FILE_NAME, createDefaultConfig, loadConfig, loadConfigFromString } from "./loader";
