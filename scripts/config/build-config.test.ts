import { fileURLToPath } from "node:url";
import { describe, expect, test } from "vitest";
import { createTestConfig } from "../test/config-fixture.js";
import { loadBuildConfig, validateBuildConfig } from "./build-config.js";
import { parseVerbosity } from "./verbosity.js";

describe("Build config validation", () => {
  test("repository configuration loads", async () => {
    const file = fileURLToPath(new URL("../../build.config.yaml", import.meta.url));
    const config = await loadBuildConfig(file);

    expect(config.solution).toBe("Platform.sln");
    expect(config.publish).toHaveLength(11);
    expect(config.tests).toHaveLength(8);
    expect(config.publish[0]?.role).toBe("api");
    expect(config.publish[0]?.openApi?.apis).toEqual(["orders", "customers", "billing"]);
  });

  test("valid configuration passes through unchanged", () => {
    const config = createTestConfig();
    expect(validateBuildConfig(config)).toEqual(config);
  });

  test("missing fields are reported", () => {
    const { solution: _solution, ...incomplete } = createTestConfig();
    expect(() => validateBuildConfig(incomplete)).toThrow("Build config validation failed");
  });

  test("unknown project role is rejected", () => {
    const config = { ...createTestConfig(), publish: [{ path: "src/X", role: "library" }] };
    expect(() => validateBuildConfig(config)).toThrow("Build config validation failed");
  });

  test("duplicate project paths are rejected", () => {
    const config = createTestConfig({
      publish: [
        { path: "src/Shop.Worker", role: "service" },
        { path: "src/Shop.Worker", role: "tool" },
      ],
    });
    expect(() => validateBuildConfig(config)).toThrow('publish: duplicate project path "src/Shop.Worker"');
  });

  test("only one project may carry openApi", () => {
    const openApi = { fixturesDir: "specs", apis: ["a"] };
    const config = createTestConfig({
      publish: [
        { path: "src/A", role: "api", openApi },
        { path: "src/B", role: "api", openApi },
      ],
    });
    expect(() => validateBuildConfig(config)).toThrow("publish: only one project may carry openApi, found src/A, src/B");
  });

  test("migration directories need distinct names", () => {
    const base = createTestConfig();
    const config = createTestConfig({
      database: {
        ...base.database,
        main: { connectionVariable: "A", migrationsDir: "db/main/migrations" },
        apimConsumption: { connectionVariable: "B", migrationsDir: "db/apim/migrations" },
      },
    });
    expect(() => validateBuildConfig(config)).toThrow(
      'database: migration directories must have distinct names, both are "migrations"'
    );
  });

  test("admin tool must name a command", () => {
    const base = createTestConfig();
    const config = createTestConfig({ database: { ...base.database, adminTool: [] } });
    expect(() => validateBuildConfig(config)).toThrow("database.adminTool must name a command");
  });
});

describe("parseVerbosity", () => {
  test("accepts full names", () => {
    expect(parseVerbosity("quiet")).toBe("quiet");
    expect(parseVerbosity("Diagnostic")).toBe("diagnostic");
  });

  test("accepts abbreviations and longer prefixes", () => {
    expect(parseVerbosity("q")).toBe("quiet");
    expect(parseVerbosity("m")).toBe("minimal");
    expect(parseVerbosity("n")).toBe("normal");
    expect(parseVerbosity("d")).toBe("detailed");
    expect(parseVerbosity("det")).toBe("detailed");
    expect(parseVerbosity("diag")).toBe("diagnostic");
    expect(parseVerbosity("min")).toBe("minimal");
  });

  test("rejects ambiguous and unknown values", () => {
    expect(() => parseVerbosity("di")).toThrow('Invalid verbosity "di"');
    expect(() => parseVerbosity("verbose")).toThrow('Invalid verbosity "verbose"');
    expect(() => parseVerbosity("")).toThrow("Invalid verbosity");
  });
});
