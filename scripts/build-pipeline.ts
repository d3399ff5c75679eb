#!/usr/bin/env node
/**
 * CI build pipeline for the platform solution
 *
 * Usage:
 *   tsx scripts/build-pipeline.ts [OPTIONS]
 *
 * Options:
 *   --zip-destination <dir>   Zip each published project into <dir> and package infrastructure
 *   --verbosity <level>       quiet|minimal|normal|detailed|diagnostic (q, m, n, d, diag) [minimal]
 *   --branch <name>           Source branch (default: $BUILD_SOURCEBRANCHNAME, then git)
 *   --build-id <id>           Numeric build id (default: $BUILD_BUILDID, else local build)
 *   --db-prefix <prefix>      Provision the main test database with this name prefix
 *   --apim-db-prefix <prefix> Provision the APIM consumption database with this name prefix
 *   --config <file>           Pipeline configuration [build.config.yaml]
 *   --root <dir>              Repository root (default: directory of the config file)
 *   --help, -h                Show this help message
 *
 * Exit codes:
 *   0 - Success
 *   1 - Provisioning, build, publish or packaging failure
 *   3 - Test failure
 */
import { existsSync, realpathSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { loadBuildConfig, type BuildConfig } from "./config/build-config.js";
import { DEFAULT_CONFIG_FILE, EXIT_CODES } from "./config/pipeline-defaults.js";
import { DEFAULT_VERBOSITY, parseVerbosity } from "./config/verbosity.js";
import { runPipeline, type PipelineOptions } from "./pipeline/pipeline.js";
import { AzurePipelines } from "./utils/azure-pipelines.js";
import { getErrorMessage } from "./utils/errors.js";
import { error } from "./utils/logger.js";

const HELP_TEXT = `
CI build pipeline for the platform solution

Usage:
  tsx scripts/build-pipeline.ts [OPTIONS]

Options:
  --zip-destination <dir>   Zip each published project into <dir> and package infrastructure
  --verbosity <level>       quiet|minimal|normal|detailed|diagnostic (q, m, n, d, diag) [minimal]
  --branch <name>           Source branch (default: $BUILD_SOURCEBRANCHNAME, then git)
  --build-id <id>           Numeric build id (default: $BUILD_BUILDID, else local build)
  --db-prefix <prefix>      Provision the main test database with this name prefix
  --apim-db-prefix <prefix> Provision the APIM consumption database with this name prefix
  --config <file>           Pipeline configuration [${DEFAULT_CONFIG_FILE}]
  --root <dir>              Repository root (default: directory of the config file)
  --help, -h                Show this help message

Exit codes:
  0 - Success
  1 - Provisioning, build, publish or packaging failure
  3 - Test failure
`.trim();

export type CliOptions = Omit<PipelineOptions, "config" | "rootDir"> & {
  configFile: string;
  rootDir?: string;
  help: boolean;
};

/**
 * Parses command line arguments. Paths resolve against `cwd`.
 *
 * @throws Error on unknown options or an invalid verbosity
 */
export function parseCliArgs(argv: string[], cwd: string = process.cwd()): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    options: {
      "zip-destination": { type: "string" },
      verbosity: { type: "string", short: "v" },
      branch: { type: "string" },
      "build-id": { type: "string" },
      "db-prefix": { type: "string" },
      "apim-db-prefix": { type: "string" },
      config: { type: "string" },
      root: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const zipDestination = values["zip-destination"];
  return {
    help: values.help ?? false,
    configFile: resolve(cwd, values.config ?? DEFAULT_CONFIG_FILE),
    rootDir: values.root !== undefined ? resolve(cwd, values.root) : undefined,
    zipDestination: zipDestination ? resolve(cwd, zipDestination) : undefined,
    verbosity: values.verbosity !== undefined ? parseVerbosity(values.verbosity) : DEFAULT_VERBOSITY,
    branch: values.branch,
    buildId: values["build-id"],
    mainDatabasePrefix: values["db-prefix"] || undefined,
    apimDatabasePrefix: values["apim-db-prefix"] || undefined,
  };
}

async function main(): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    error(getErrorMessage(err));
    console.log(`\n${HELP_TEXT}`);
    return EXIT_CODES.buildFailure;
  }

  if (cli.help) {
    console.log(HELP_TEXT);
    return EXIT_CODES.success;
  }

  const ci = new AzurePipelines();
  let config: BuildConfig;
  try {
    config = await loadBuildConfig(cli.configFile);
  } catch (err) {
    const message = `Failed to load ${cli.configFile}: ${getErrorMessage(err)}`;
    error(message);
    ci.logIssue("error", message);
    return EXIT_CODES.buildFailure;
  }

  const { configFile, rootDir, help: _help, ...options } = cli;
  const outcome = await runPipeline({ ...options, config, rootDir: rootDir ?? dirname(configFile) }, { ci });
  return outcome.exitCode;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined || !existsSync(entry)) return false;
  return realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  process.exitCode = await main();
}
