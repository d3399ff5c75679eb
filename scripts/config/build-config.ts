/**
 * Runtime validation schemas for the pipeline configuration (`build.config.yaml`)
 * using ArkType.
 *
 * The configuration is the declarative table of what the pipeline builds:
 * the solution, the projects to publish (with their role), the test projects,
 * database provisioning commands and the infrastructure package layout.
 *
 * @module build-config
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { type } from "arktype";
import { parse } from "yaml";

/**
 * Approved OpenAPI specifications copied into the API management layout.
 *
 * Each name maps `<fixturesDir>/<name>.approved.json` to
 * `ApimPublish/apis/<name>/<name>-v1.json`.
 */
export const OpenApiSpecSchema = type({
  fixturesDir: "string",
  apis: "string[]",
});

export const ProjectRoleSchema = type("'api'|'service'|'tool'");

/**
 * One row of the publish table. Output goes to `<artifactsDir>/<path>`.
 */
export const PublishProjectSchema = type({
  path: "string",
  role: ProjectRoleSchema,
  "openApi?": OpenApiSpecSchema,
});

export const DatabaseTargetSchema = type({
  /** CI variable receiving the connection string */
  connectionVariable: "string",
  migrationsDir: "string",
});

/**
 * Database provisioning. `adminTool` is the command prefix of the database admin
 * CLI; `create` and `migrate` are appended to it. Arguments and the connection
 * template accept `{name}`, `{connectionString}` and `{scriptsDir}`.
 */
export const DatabaseSettingsSchema = type({
  adminTool: "string[]",
  create: "string[]",
  migrate: "string[]",
  connectionTemplate: "string",
  createdVariable: "string",
  main: DatabaseTargetSchema,
  apimConsumption: DatabaseTargetSchema,
});

export const InfraSettingsSchema = type({
  resourceGroupProject: "string",
  dbAdminTool: "string",
  /** Directory under the artifacts root holding the merged package */
  output: "string",
});

export const BuildConfigSchema = type({
  solution: "string",
  artifactsDir: "string",
  publish: PublishProjectSchema.array(),
  tests: "string[]",
  database: DatabaseSettingsSchema,
  infra: InfraSettingsSchema,
});

export type OpenApiSpec = typeof OpenApiSpecSchema.infer;
export type ProjectRole = typeof ProjectRoleSchema.infer;
export type PublishProject = typeof PublishProjectSchema.infer;
export type DatabaseTarget = typeof DatabaseTargetSchema.infer;
export type DatabaseSettings = typeof DatabaseSettingsSchema.infer;
export type BuildConfig = typeof BuildConfigSchema.infer;

function checkConsistency(config: BuildConfig): string[] {
  const problems: string[] = [];

  if (config.database.adminTool.length === 0) {
    problems.push("database.adminTool must name a command");
  }

  const seen = new Set<string>();
  for (const project of config.publish) {
    if (seen.has(project.path)) problems.push(`publish: duplicate project path "${project.path}"`);
    seen.add(project.path);
  }

  const apiProjects = config.publish.filter((project) => project.openApi !== undefined);
  if (apiProjects.length > 1) {
    problems.push(
      `publish: only one project may carry openApi, found ${apiProjects.map((p) => p.path).join(", ")}`
    );
  }

  // Both migration folders are copied side by side into the infra package
  const mainScripts = basename(config.database.main.migrationsDir);
  if (mainScripts === basename(config.database.apimConsumption.migrationsDir)) {
    problems.push(`database: migration directories must have distinct names, both are "${mainScripts}"`);
  }

  return problems;
}

/**
 * Validates pipeline configuration at runtime.
 *
 * @throws Error if validation fails with detailed error messages
 */
export function validateBuildConfig(data: unknown): BuildConfig {
  const result = BuildConfigSchema(data);
  if (result instanceof type.errors) {
    throw new Error(`Build config validation failed:\n${result.summary}`);
  }

  const problems = checkConsistency(result);
  if (problems.length > 0) {
    throw new Error(`Build config validation failed:\n${problems.join("\n")}`);
  }
  return result;
}

/**
 * Reads and validates a YAML configuration file.
 */
export async function loadBuildConfig(file: string): Promise<BuildConfig> {
  const text = await readFile(file, "utf8");
  return validateBuildConfig(parse(text));
}
