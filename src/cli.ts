#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 *   psyscan <script.py> [--json] [--remote] [--provider openai|anthropic|google]
 *           [--timeout-ms N] [--allow-sensitive] [--max N] [--categories a,b]
 *           [--config dir]
 *
 * Exit codes: 0 complete, 2 partial or failed analysis, 1 fatal error.
 */

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";

import { createSourceDocument } from "./analysis/document";
import { AnalysisStatus } from "./analysis/types";
import { analyze } from "./analyzer";
import { loadConfig } from "./config/loader";
import { parseAnalysisConfig } from "./config/schema";
import { credentialsFromEnv } from "./env";
import { ConfigurationInvalidError, InputUnreadableError, PsyscanError } from "./errors";
import { ProviderCredentials } from "./integrations/llm/types";
import { logger } from "./logger";
import { formatJson, formatText } from "./report/format";

export const USAGE = `Usage: psyscan <script.py> [options]

Options:
  --json                 Print the result as JSON
  --remote               Also ask the configured LLM provider for suggestions
  --provider <name>      openai, anthropic or google
  --timeout-ms <n>       Provider timeout in milliseconds
  --allow-sensitive      Send redacted code even if sensitive data was found
  --max <n>              Show at most n findings in the text report
  --categories <list>    Comma-separated categories to report
  --config <dir>         Directory containing .psyscan.yml (default: the script's directory)
  -h, --help             Show this help
`;

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Provider credentials; read from the environment by default. */
  credentials?: ProviderCredentials;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export function exitCodeFor(status: AnalysisStatus): number {
  return status === "COMPLETE" ? 0 : 2;
}

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationInvalidError(`${flag} must be a positive integer`, [`${flag}: expected a positive integer`]);
  }
  return parsed;
}

function parseCli(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        json: { type: "boolean" },
        remote: { type: "boolean" },
        provider: { type: "string" },
        "timeout-ms": { type: "string" },
        "allow-sensitive": { type: "boolean" },
        max: { type: "string" },
        categories: { type: "string" },
        config: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationInvalidError(message, [message], { cause: error });
  }
}

function readScript(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new InputUnreadableError(filePath, { cause: error });
  }
}

/**
 * Run the CLI and return its exit code.
 */
export async function main(argv: string[], io: CliIo = defaultIo): Promise<number> {
  try {
    const { values, positionals } = parseCli(argv);

    if (values.help) {
      io.stdout(USAGE);
      return 0;
    }
    const file = positionals[0];
    if (!file) {
      io.stderr(USAGE);
      return 1;
    }

    const configDir = values.config ?? path.dirname(file);
    const loaded = loadConfig(configDir);
    if (loaded.isFileIgnored(path.relative(configDir, file))) {
      io.stderr(`Skipping ${file}: ignored by configuration\n`);
      return 0;
    }

    const overrides: Record<string, unknown> = {};
    if (values.remote) overrides.remoteEnabled = true;
    if (values["allow-sensitive"]) overrides.transmitOverride = true;
    if (values.provider !== undefined) overrides.provider = values.provider;
    if (values["timeout-ms"] !== undefined) overrides.timeoutMs = Number(values["timeout-ms"]);
    if (values.categories !== undefined) {
      overrides.enabledCategories = values.categories
        .split(",")
        .map((category) => category.trim().toUpperCase())
        .filter((category) => category.length > 0);
    }
    const config = parseAnalysisConfig(overrides, loaded.analysis);
    const limit = values.max !== undefined ? parsePositiveInt("--max", values.max) : undefined;

    const document = createSourceDocument(readScript(file), file);
    const result = await analyze(document, config, { credentials: io.credentials ?? credentialsFromEnv() });

    io.stdout(values.json ? formatJson(result) + "\n" : formatText(result, { limit }));
    return exitCodeFor(result.status);
  } catch (error) {
    if (error instanceof PsyscanError) {
      io.stderr(`psyscan: ${error.message}\n`);
      return 1;
    }
    logger.error("Unexpected failure", { error: error instanceof Error ? error.message : String(error) });
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error("Unexpected failure", { error: error instanceof Error ? error.message : String(error) });
      process.exitCode = 1;
    });
}
