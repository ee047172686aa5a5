import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { loadAllScenarios, filterScenarios } from "../loader.js";
import { writeScenarioFile } from "../writer.js";
import { ConfigError } from "../../errors.js";

describe("loadAllScenarios", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("should load nested files in path order", () => {
    dir = mkdtempSync(join(tmpdir(), "trailcheck-scenarios-"));
    mkdirSync(join(dir, "ledger"));
    writeFileSync(join(dir, "ledger", "account.md"), "# Account\n\n## Steps\n1. Go to /accounts\n");
    writeFileSync(join(dir, "a-login.md"), "# Login\n\n## Expected\n- `main` is visible\n");
    writeFileSync(join(dir, "notes.txt"), "ignored");

    const scenarios = loadAllScenarios(dir);

    expect(scenarios.map((s) => s.id)).toEqual(["a-login", "account"]);
  });

  it("should refuse duplicate ids", () => {
    dir = mkdtempSync(join(tmpdir(), "trailcheck-scenarios-"));
    writeScenarioFile({ id: "dup", name: "One", steps: ["Go to /"], expected: [] }, dir);
    writeFileSync(join(dir, "other.md"), '---\nid: dup\n---\n# Two\n\n## Steps\n1. Go to /\n');

    expect(() => loadAllScenarios(dir ?? "")).toThrow('Scenario id "dup" is used by both');
  });

  it("should fail on a missing directory", () => {
    expect(() => loadAllScenarios("/nonexistent/trailcheck")).toThrow(ConfigError);
  });
});

describe("filterScenarios", () => {
  const scenarios = [
    { id: "login", name: "Log in", filePath: "/a.md", steps: [], expected: [] },
    { id: "create_account", name: "Create a ledger account", filePath: "/b.md", steps: [], expected: [] },
  ];

  it("should match id or name, ignoring case", () => {
    expect(filterScenarios(scenarios, "LEDGER").map((s) => s.id)).toEqual(["create_account"]);
    expect(filterScenarios(scenarios, "log").map((s) => s.id)).toEqual(["login"]);
  });

  it("should keep everything without a pattern", () => {
    expect(filterScenarios(scenarios)).toHaveLength(2);
  });
});
