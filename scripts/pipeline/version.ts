/**
 * Build identity: the version suffixes stamped into binaries and packages.
 *
 * Numbered builds of the release branch ship without a package suffix; every
 * other build carries `<branch[0..10]>-<revision>` so prerelease packages sort by
 * branch and build number. The build suffix always ends with the commit hash.
 *
 *   master,      build 123  -> suffix ""                , buildSuffix "master-1a2b3c4"
 *   feature-xyz, build 42   -> suffix "feature-xy-00042", buildSuffix "feature-xy-00042-1a2b3c4"
 *   feature-xyz, no build   -> suffix "feature-xy-lo"   , buildSuffix "feature-xy-lo-1a2b3c4"
 */
import { ENV_VARS, VERSIONING } from "../config/pipeline-defaults.js";
import { PipelineStageError } from "../utils/errors.js";
import type { CommandRunner } from "../utils/process.js";

export interface BuildIdentity {
  branch: string;
  /** Zero-padded build id, or "lo" for local builds */
  revision: string;
  /** Package version suffix; empty for release builds */
  suffix: string;
  commitHash: string;
  /** Version suffix embedded into compiled binaries */
  buildSuffix: string;
}

export interface ResolveIdentityOptions {
  branch?: string;
  buildId?: string;
  env: NodeJS.ProcessEnv;
  runner: CommandRunner;
  /** Repository working tree */
  cwd: string;
}

export function resolveRevision(buildId: string | undefined): string {
  const trimmed = buildId?.trim() ?? "";
  if (!/^\d+$/.test(trimmed)) {
    return VERSIONING.localRevision;
  }
  return trimmed.replace(/^0+(?=\d)/, "").padStart(VERSIONING.revisionWidth, "0");
}

export function computeSuffix(branch: string, revision: string): string {
  if (branch === VERSIONING.releaseBranch && revision !== VERSIONING.localRevision) {
    return "";
  }
  return `${branch.slice(0, VERSIONING.branchPrefixLength)}-${revision}`;
}

export function computeBuildSuffix(branch: string, suffix: string, commitHash: string): string {
  return suffix ? `${suffix}-${commitHash}` : `${branch}-${commitHash}`;
}

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
}

async function git(options: ResolveIdentityOptions, args: string[]): Promise<string> {
  const result = await options.runner({ command: "git", args, cwd: options.cwd, capture: true });
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new PipelineStageError(
      "version",
      `git ${args.join(" ")} failed with exit code ${result.exitCode}${detail ? `: ${detail}` : ""}`
    );
  }
  return result.stdout.trim();
}

/**
 * Resolves branch, build id and commit hash, explicit values first, then the
 * agent's environment, then the working tree.
 *
 * @throws PipelineStageError if a git query fails
 */
export async function resolveBuildIdentity(options: ResolveIdentityOptions): Promise<BuildIdentity> {
  const branch =
    nonBlank(options.branch) ??
    nonBlank(options.env[ENV_VARS.branch]) ??
    (await git(options, ["symbolic-ref", "--short", "HEAD"]));

  const revision = resolveRevision(nonBlank(options.buildId) ?? options.env[ENV_VARS.buildId]);
  const suffix = computeSuffix(branch, revision);
  const commitHash = await git(options, ["rev-parse", "--short", "HEAD"]);

  return {
    branch,
    revision,
    suffix,
    commitHash,
    buildSuffix: computeBuildSuffix(branch, suffix, commitHash),
  };
}
