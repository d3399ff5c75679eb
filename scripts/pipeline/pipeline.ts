/**
 * Build pipeline orchestration.
 *
 * Stages run strictly in order and each one only starts after the previous one
 * succeeded:
 *
 *   version -> database -> build -> publish -> archive -> infra -> test
 *
 * Database, archive and infra stages are optional. Any failure stops the run;
 * the returned exit code is 3 for a test failure and 1 for everything else.
 */
import type { BuildConfig } from "../config/build-config.js";
import { EXIT_CODES, STAGES, type ExitCode, type StageName } from "../config/pipeline-defaults.js";
import type { Verbosity } from "../config/verbosity.js";
import { AzurePipelines } from "../utils/azure-pipelines.js";
import { PipelineStageError, formatError } from "../utils/errors.js";
import { error, formatDuration, info, section, success, type TestResult } from "../utils/logger.js";
import { execaRunner, type CommandRunner } from "../utils/process.js";
import { archivePublishedProjects } from "./archive.js";
import type { StageContext } from "./context.js";
import { DatabaseProvisioner, type ProvisionedDatabase } from "./database.js";
import { packageInfrastructure } from "./infra.js";
import { publishProjects, type PublishedProject } from "./publish.js";
import { buildSolution } from "./solution.js";
import { runTestProjects } from "./tests.js";
import { resolveBuildIdentity, type BuildIdentity } from "./version.js";

export interface PipelineOptions {
  rootDir: string;
  config: BuildConfig;
  verbosity: Verbosity;
  /** Enables the archive and infra stages */
  zipDestination?: string;
  branch?: string;
  buildId?: string;
  mainDatabasePrefix?: string;
  apimDatabasePrefix?: string;
}

export interface PipelineDependencies {
  runner?: CommandRunner;
  ci?: AzurePipelines;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
}

export interface PipelineOutcome {
  exitCode: ExitCode;
  /** Stages that completed, in order */
  completed: StageName[];
  failedStage?: StageName;
  identity?: BuildIdentity;
  databases: ProvisionedDatabase[];
  testResults: TestResult[];
}

function stageTitle(stage: StageName, title: string): string {
  return `[${STAGES.indexOf(stage) + 1}/${STAGES.length}] ${title}`;
}

export async function runPipeline(
  options: PipelineOptions,
  deps: PipelineDependencies = {}
): Promise<PipelineOutcome> {
  const ctx: StageContext = {
    rootDir: options.rootDir,
    config: options.config,
    verbosity: options.verbosity,
    runner: deps.runner ?? execaRunner,
    ci: deps.ci ?? new AzurePipelines(),
  };
  const provisioner = new DatabaseProvisioner(ctx, deps.now);
  const outcome: PipelineOutcome = { exitCode: EXIT_CODES.success, completed: [], databases: [], testResults: [] };
  const startTime = Date.now();

  let current: StageName = "version";
  const enter = (stage: StageName, title: string): void => {
    current = stage;
    section(stageTitle(stage, title));
  };
  const done = (): void => {
    outcome.completed.push(current);
  };

  try {
    enter("version", "Resolving build identity");
    const identity = await resolveBuildIdentity({
      branch: options.branch,
      buildId: options.buildId,
      env: deps.env ?? process.env,
      runner: ctx.runner,
      cwd: ctx.rootDir,
    });
    outcome.identity = identity;
    info(`Branch: ${identity.branch}, revision: ${identity.revision}, commit: ${identity.commitHash}`);
    info(`Package suffix: ${identity.suffix || "(none)"}, build suffix: ${identity.buildSuffix}`);
    ctx.ci.setVariable("PackageSuffix", identity.suffix);
    ctx.ci.setVariable("BuildSuffix", identity.buildSuffix);
    done();

    if (options.mainDatabasePrefix || options.apimDatabasePrefix) {
      enter("database", "Provisioning databases");
      try {
        if (options.mainDatabasePrefix) {
          await provisioner.provision("main", options.mainDatabasePrefix, identity.buildSuffix);
        }
        if (options.apimDatabasePrefix) {
          await provisioner.provision("apimConsumption", options.apimDatabasePrefix, identity.buildSuffix);
        }
      } finally {
        outcome.databases = [...provisioner.databases];
      }
      done();
    }

    enter("build", `Building ${ctx.config.solution}`);
    await buildSolution(ctx, identity.buildSuffix);
    done();

    enter("publish", "Publishing projects");
    const published: PublishedProject[] = await publishProjects(ctx, identity.suffix);
    done();

    if (options.zipDestination) {
      enter("archive", "Archiving published projects");
      await archivePublishedProjects(ctx, published, options.zipDestination);
      done();

      enter("infra", "Packaging infrastructure");
      await packageInfrastructure(ctx, options.zipDestination);
      done();
    }

    enter("test", "Running tests");
    outcome.testResults = await runTestProjects(ctx, provisioner.connectionEnv());
    done();
  } catch (err) {
    const stageError = err instanceof PipelineStageError ? err : undefined;
    outcome.failedStage = current;
    outcome.exitCode = stageError?.exitCode ?? EXIT_CODES.buildFailure;
    const message = formatError(err, `${stageError?.stage ?? current} stage failed`);
    error(message);
    ctx.ci.logIssue("error", message);
    return outcome;
  }

  success(`Pipeline completed in ${formatDuration(Date.now() - startTime)}`);
  return outcome;
}
