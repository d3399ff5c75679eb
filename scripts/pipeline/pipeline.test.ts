import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { CommandSpec } from "../utils/process.js";
import { AzurePipelines } from "../utils/azure-pipelines.js";
import { createTestConfig } from "../test/config-fixture.js";
import { createRecordingRunner, verb, type RecordingRunner } from "../test/recording-runner.js";
import { runPipeline, type PipelineOptions } from "./pipeline.js";

const NOW = new Date(Date.UTC(2026, 9, 19, 8, 30, 15));
const MAIN_DB = "20261019083015ci_feature-xy-lo-1a2b3c4";
const APIM_DB = "20261019083015apim_feature-xy-lo-1a2b3c4";

let root: string;

async function touch(path: string, content = ""): Promise<void> {
  await mkdir(join(path, ".."), { recursive: true });
  await writeFile(path, content);
}

/** Publishing writes a file into the output folder, as the real tool would */
async function writePublishOutput(spec: CommandSpec): Promise<void> {
  const index = spec.args.indexOf("--output");
  const output = spec.args[index + 1];
  if (verb(spec) === "publish" && index >= 0 && output) {
    await touch(join(output, "app.dll"), "binary");
  }
}

function runner(failOn?: (spec: CommandSpec) => boolean): RecordingRunner {
  return createRecordingRunner({
    exitCode: (spec) => (failOn?.(spec) ? 1 : 0),
    onRun: writePublishOutput,
  });
}

function fullOptions(): PipelineOptions {
  return {
    rootDir: root,
    config: createTestConfig(),
    verbosity: "minimal",
    zipDestination: join(root, "zips"),
    branch: "feature-xyz",
    mainDatabasePrefix: "ci_",
    apimDatabasePrefix: "apim_",
  };
}

async function run(options: PipelineOptions, recording: RecordingRunner) {
  const ciLines: string[] = [];
  const outcome = await runPipeline(options, {
    runner: recording.run,
    ci: new AzurePipelines((line) => ciLines.push(line)),
    env: {},
    now: () => NOW,
  });
  return { outcome, ciLines };
}

function commandVerbs(recording: RecordingRunner): string[] {
  return recording.calls.map((spec) => `${spec.command} ${verb(spec)}`);
}

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  root = await mkdtemp(join(tmpdir(), "pipeline-run-"));
  await touch(join(root, "tests/Shop.Api.Tests/Approved/orders.approved.json"), "{}");
  await touch(join(root, "tests/Shop.Api.Tests/Approved/stock.approved.json"), "{}");
  await touch(join(root, "db/MainMigrations/001_init.sql"));
  await touch(join(root, "db/ApimMigrations/001_init.sql"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(root, { recursive: true, force: true });
});

describe("runPipeline", () => {
  test("runs every stage in order", async () => {
    const recording = runner();
    const { outcome, ciLines } = await run(fullOptions(), recording);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.failedStage).toBeUndefined();
    expect(outcome.completed).toEqual(["version", "database", "build", "publish", "archive", "infra", "test"]);
    expect(commandVerbs(recording)).toEqual([
      "git rev-parse",
      "dbadmin create",
      "dbadmin migrate",
      "dbadmin create",
      "dbadmin migrate",
      "dotnet build",
      "dotnet publish",
      "dotnet publish",
      "dotnet build",
      "dotnet publish",
      "dotnet test",
      "dotnet test",
    ]);
    expect(recording.lines()[5]).toBe("dotnet build Shop.sln --verbosity minimal --version-suffix feature-xy-lo-1a2b3c4");
    expect(outcome.databases.map((db) => db.name)).toEqual([MAIN_DB, APIM_DB]);

    const testEnv = recording.calls.at(-1)?.env;
    expect(testEnv).toEqual({
      ConnectionStrings__Main: `Host=db;Database=${MAIN_DB}`,
      ConnectionStrings__Apim: `Host=db;Database=${APIM_DB}`,
    });

    expect(ciLines.slice(0, 2)).toEqual([
      "##vso[task.setvariable variable=PackageSuffix]feature-xy-lo",
      "##vso[task.setvariable variable=BuildSuffix]feature-xy-lo-1a2b3c4",
    ]);
    const uploads = ciLines
      .filter((line) => line.startsWith("##vso[artifact.upload"))
      .map((line) => /artifactname=([^\]]+)\]/.exec(line)?.[1]);
    expect(uploads).toEqual(["Shop.Api", "Shop.Worker", "Shop.Infrastructure", "ApimPublish"]);
  });

  test("skips optional stages when no prefixes or zip destination are given", async () => {
    const recording = runner();
    const options: PipelineOptions = { rootDir: root, config: createTestConfig(), verbosity: "quiet", branch: "master", buildId: "77" };

    const { outcome, ciLines } = await run(options, recording);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.completed).toEqual(["version", "build", "publish", "test"]);
    expect(commandVerbs(recording)).toEqual([
      "git rev-parse",
      "dotnet build",
      "dotnet publish",
      "dotnet publish",
      "dotnet test",
      "dotnet test",
    ]);
    expect(recording.calls.some((spec) => spec.args.includes("--version-suffix") && verb(spec) === "publish")).toBe(false);
    expect(ciLines.some((line) => line.startsWith("##vso[artifact.upload"))).toBe(false);
  });

  const failures: Array<[string, (spec: CommandSpec) => boolean, string[]]> = [
    ["version", (spec) => spec.command === "git", []],
    ["database", (spec) => spec.command === "dbadmin" && verb(spec) === "migrate", ["version"]],
    ["build", (spec) => spec.command === "dotnet" && verb(spec) === "build", ["version", "database"]],
    ["publish", (spec) => verb(spec) === "publish", ["version", "database", "build"]],
  ];

  test.each(failures)("a failing %s command halts the pipeline with exit code 1", async (stage, failOn, completed) => {
    const recording = runner(failOn);

    const { outcome } = await run(fullOptions(), recording);

    expect(outcome.exitCode).toBe(1);
    expect(outcome.failedStage).toBe(stage);
    expect(outcome.completed).toEqual(completed);
    const last = recording.calls.at(-1);
    expect(last && failOn(last)).toBe(true);
    expect(recording.calls.filter(failOn)).toHaveLength(1);
  });

  test("a stage failure is raised as a build issue through the emitter", async () => {
    const recording = runner((spec) => spec.command === "git");

    const { ciLines } = await run(fullOptions(), recording);

    expect(ciLines).toEqual([
      "##vso[task.logissue type=error]version stage failed: git rev-parse --short HEAD failed with exit code 1",
    ]);
  });

  test("a failing test project halts the pipeline with exit code 3", async () => {
    const recording = runner((spec) => verb(spec) === "test");

    const { outcome } = await run(fullOptions(), recording);

    expect(outcome.exitCode).toBe(3);
    expect(outcome.failedStage).toBe("test");
    expect(outcome.completed).toEqual(["version", "database", "build", "publish", "archive", "infra"]);
    expect(recording.calls.filter((spec) => verb(spec) === "test")).toHaveLength(1);
  });

  test("databases created before a failure are reported", async () => {
    const recording = runner((spec) => spec.command === "dotnet" && verb(spec) === "build");

    const { outcome, ciLines } = await run(fullOptions(), recording);

    expect(outcome.databases.map((db) => db.name)).toEqual([MAIN_DB, APIM_DB]);
    expect(ciLines).toContain(`##vso[task.setvariable variable=DatabasesCreated]${MAIN_DB},${APIM_DB}`);
  });

  test("an unexpected filesystem error fails the current stage with exit code 1", async () => {
    await rm(join(root, "tests"), { recursive: true });
    const recording = runner();

    const { outcome } = await run(fullOptions(), recording);

    expect(outcome.exitCode).toBe(1);
    expect(outcome.failedStage).toBe("publish");
    expect(recording.calls.some((spec) => verb(spec) === "test")).toBe(false);
  });
});
