/**
 * Azure Pipelines logging commands.
 *
 * The agent scans stdout for lines of the form `##vso[area.action key=value;...]message`
 * and acts on them (setting variables, uploading artifacts, raising issues).
 * Lines must reach stdout verbatim, so nothing here goes through the colored logger.
 *
 * @see https://learn.microsoft.com/azure/devops/pipelines/scripts/logging-commands
 */
export type LogIssueType = "warning" | "error";

type CommandProperties = Record<string, string | boolean | undefined>;

/**
 * Escapes a logging command property value.
 */
export function escapePropertyValue(value: string): string {
  return value
    .replace(/%/g, "%AZP25")
    .replace(/;/g, "%3B")
    .replace(/\r/g, "%0D")
    .replace(/\n/g, "%0A")
    .replace(/]/g, "%5D");
}

/**
 * Escapes a logging command message body.
 */
export function escapeMessage(value: string): string {
  return value.replace(/%/g, "%AZP25").replace(/\r/g, "%0D").replace(/\n/g, "%0A");
}

/**
 * Formats a single logging command line.
 *
 * Properties with an `undefined` value are omitted; booleans are written as `true`/`false`.
 *
 * @example
 * ```typescript
 * formatLoggingCommand("task", "setvariable", { variable: "BuildSuffix" }, "master-1a2b3c4");
 * // ##vso[task.setvariable variable=BuildSuffix]master-1a2b3c4
 * ```
 */
export function formatLoggingCommand(
  area: string,
  action: string,
  properties: CommandProperties,
  message: string
): string {
  const props = Object.entries(properties)
    .filter((entry): entry is [string, string | boolean] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${escapePropertyValue(String(value))}`);

  const head = props.length > 0 ? `${area}.${action} ${props.join(";")}` : `${area}.${action}`;
  return `##vso[${head}]${escapeMessage(message)}`;
}

export interface SetVariableOptions {
  /** Masks the value in agent logs */
  secret?: boolean;
}

/**
 * Emits logging commands to a line sink (stdout by default).
 */
export class AzurePipelines {
  constructor(private readonly sink: (line: string) => void = (line) => console.log(line)) {}

  setVariable(name: string, value: string, options: SetVariableOptions = {}): void {
    this.sink(
      formatLoggingCommand(
        "task",
        "setvariable",
        { variable: name, issecret: options.secret ? true : undefined },
        value
      )
    );
  }

  /**
   * Registers a file or folder for upload into the build's artifact storage.
   */
  uploadArtifact(containerFolder: string, artifactName: string, path: string): void {
    this.sink(
      formatLoggingCommand("artifact", "upload", { containerfolder: containerFolder, artifactname: artifactName }, path)
    );
  }

  /**
   * Raises a warning or error on the build summary.
   */
  logIssue(type: LogIssueType, message: string): void {
    this.sink(formatLoggingCommand("task", "logissue", { type }, message));
  }
}
