/**
 * Ephemeral PostgreSQL databases for the test stage.
 *
 * Databases are created through the database admin CLI and migrated from a
 * scripts directory. They are never dropped here: the comma-joined list of
 * created names is published as a CI variable for the cleanup job.
 */
import { resolve } from "node:path";
import type { DatabaseTarget } from "../config/build-config.js";
import { PipelineStageError } from "../utils/errors.js";
import { info, success } from "../utils/logger.js";
import { runStep } from "../utils/process.js";
import { fillTemplate } from "../utils/template.js";
import type { StageContext } from "./context.js";

export type DatabaseRole = "main" | "apimConsumption";

export interface ProvisionedDatabase {
  role: DatabaseRole;
  name: string;
  connectionString: string;
  /** Variable the connection string is exposed under */
  variable: string;
}

/**
 * UTC timestamp with second precision, e.g. `20261019083015`.
 */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/\D/g, "").slice(0, 14);
}

/**
 * Database name: UTC timestamp + prefix + build suffix.
 *
 * Unique across concurrent runs only when they start in different seconds or
 * use different prefixes.
 */
export function generateDatabaseName(prefix: string, buildSuffix: string, now: Date): string {
  return `${formatUtcTimestamp(now)}${prefix}${buildSuffix}`;
}

export class DatabaseProvisioner {
  private readonly created: ProvisionedDatabase[] = [];

  constructor(
    private readonly ctx: StageContext,
    private readonly now: () => Date = () => new Date()
  ) {}

  get databases(): readonly ProvisionedDatabase[] {
    return this.created;
  }

  /**
   * Connection strings keyed by variable name, for child process environments.
   */
  connectionEnv(): Record<string, string> {
    return Object.fromEntries(this.created.map((db) => [db.variable, db.connectionString]));
  }

  /**
   * Creates and migrates one database.
   *
   * @throws PipelineStageError if the create or migrate command fails
   */
  async provision(role: DatabaseRole, prefix: string, buildSuffix: string): Promise<ProvisionedDatabase> {
    const settings = this.ctx.config.database;
    const target: DatabaseTarget = settings[role];
    const [tool, ...toolArgs] = settings.adminTool;
    if (!tool) {
      throw new PipelineStageError("database", "database.adminTool is empty");
    }

    const name = generateDatabaseName(prefix, buildSuffix, this.now());
    const connectionString = fillTemplate(settings.connectionTemplate, { name });
    const values = {
      name,
      connectionString,
      scriptsDir: resolve(this.ctx.rootDir, target.migrationsDir),
    };
    const spec = (args: readonly string[]) => ({
      command: tool,
      args: [...toolArgs, ...args.map((arg) => fillTemplate(arg, values))],
      cwd: this.ctx.rootDir,
    });

    info(`Creating ${role} database ${name}`);
    await runStep(this.ctx.runner, spec(settings.create), "database");

    const database: ProvisionedDatabase = { role, name, connectionString, variable: target.connectionVariable };
    this.created.push(database);
    this.ctx.ci.setVariable(settings.createdVariable, this.created.map((db) => db.name).join(","));

    info(`Applying migrations from ${values.scriptsDir}`);
    await runStep(this.ctx.runner, spec(settings.migrate), "database");

    this.ctx.ci.setVariable(target.connectionVariable, connectionString);
    success(`Database ${name} ready`);
    return database;
  }
}
