/**
 * Centralized constants for the build pipeline
 *
 * Environment variable names follow the Azure Pipelines predefined variables,
 * so the pipeline picks up branch and build id without extra wiring in the YAML.
 */

/**
 * Process exit codes. A caller distinguishes "build failed" from "tests failed"
 * by these values alone.
 */
export const EXIT_CODES = {
  success: 0,
  buildFailure: 1,
  testFailure: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Pipeline stages in execution order
 */
export const STAGES = ["version", "database", "build", "publish", "archive", "infra", "test"] as const;

export type StageName = (typeof STAGES)[number];

/** Environment variables read as fallbacks for CLI options */
export const ENV_VARS = {
  branch: "BUILD_SOURCEBRANCHNAME",
  buildId: "BUILD_BUILDID",
} as const;

export const VERSIONING = {
  /** Branch whose numbered builds ship without a prerelease suffix */
  releaseBranch: "master",
  /** Revision used when no numeric build id is available (local builds) */
  localRevision: "lo",
  revisionWidth: 5,
  branchPrefixLength: 10,
} as const;

/** Folder name of the API management publish layout */
export const APIM_PUBLISH_DIR = "ApimPublish";

export const DEFAULT_CONFIG_FILE = "build.config.yaml";

/** Build tool driving restore/build/publish/test */
export const DOTNET = "dotnet";
