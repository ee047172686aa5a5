import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { executeScenario } from "../executor.js";
import { parseScenario } from "../../scenarios/parser.js";
import { resolveConfig } from "../../config/loader.js";
import { FakeDriver, el, type FakeElement } from "../../driver/tests/fake-driver.js";
import { installLoginApp, NOW } from "../../auth/tests/login-app.js";
import type { DriverFactory } from "../../driver/types.js";

const config = resolveConfig(
  {
    environments: {
      stage: {
        baseUrl: "https://x",
        username: "u",
        password: "p",
        otpSecret: "BASE32SECRET",
      },
    },
    auth: { challengeTimeoutMs: 200, verifyTimeoutMs: 200, pollIntervalMs: 5 },
    resolver: { timeoutMs: 30, pollIntervalMs: 5 },
  },
  "/work"
);

function scenario(id: string, steps: string[], expected: string[] = []) {
  const body = [
    "---",
    `id: ${id}`,
    "---",
    `# ${id}`,
    "",
    "## Steps",
    ...steps.map((s, i) => `${i + 1}. ${s}`),
    "",
    "## Expected",
    ...expected.map((s) => `- ${s}`),
    "",
  ].join("\n");
  return parseScenario(body, `/s/${id}.md`);
}

describe("executeScenario", () => {
  let driver: FakeDriver;
  let closed: number;
  let artifactsDir: string;
  let open: DriverFactory<FakeElement>;

  beforeEach(() => {
    driver = new FakeDriver();
    installLoginApp(driver, { secret: "BASE32SECRET", challenge: true });
    closed = 0;
    artifactsDir = mkdtempSync(join(tmpdir(), "trailcheck-artifacts-"));
    open = async () => ({
      driver,
      close: async () => {
        closed++;
      },
    });
  });

  afterEach(() => {
    rmSync(artifactsDir, { recursive: true, force: true });
  });

  const run = (s: ReturnType<typeof scenario>, signal?: AbortSignal) =>
    executeScenario(s, config, open, { artifactsDir, signal, clock: () => NOW });

  it("should stop at a missing element and never run later steps", async () => {
    driver.place("#first", el("first"));
    driver.place("#third", el("third"));

    const result = await run(
      scenario("three_steps", ["Click `#first`", "Click `#missing` or `.also-missing`", "Click `#third`"])
    );

    expect(result.status).toBe("error");
    expect(result.failedStep).toBe(2);
    expect(result.failureDetail).toContain("`#missing` -> `.also-missing`");
    expect(driver.calls).toContain("click first");
    expect(driver.calls).not.toContain("click third");
    expect(closed).toBe(1);
  });

  it("should keep a screenshot and the page markup of a failure", async () => {
    const result = await run(scenario("three_steps", ["Click `#missing`"]));

    const base = join(artifactsDir, "failure_three_steps_20231114T221330Z");
    expect(result.artifacts).toEqual([`${base}.png`, `${base}.html`]);
    expect(driver.screenshots).toEqual([`${base}.png`]);
    expect(readFileSync(`${base}.html`, "utf-8")).toBe(
      '<html><body data-url="https://x/home"></body></html>'
    );
  });

  it("should pass when every step and check holds", async () => {
    driver.place("h1", el("title", { text: "Accounts" }));

    const result = await run(scenario("accounts", ["Go to /accounts"], ['`h1` reads "Accounts"', 'URL contains "/accounts"']));

    expect(result.status).toBe("passed");
    expect(result.failureDetail).toBeUndefined();
    expect(result.artifacts).toEqual([]);
    expect(driver.calls).toContain("navigate https://x/accounts");
    expect(closed).toBe(1);
  });

  it("should fail on a value mismatch with both values in the detail", async () => {
    driver.place("h1", el("title", { text: "Accounts" }));

    const result = await run(scenario("title", [], ['`h1` shows "Ledger"']));

    expect(result.status).toBe("failed");
    expect(result.failedStep).toBe(1);
    expect(result.failureDetail).toBe(
      'Step 1 (`h1` shows "Ledger"): `h1` does not show the expected text\n  expected: "Ledger"\n  observed: "Accounts"'
    );
  });

  it("should fail when an expected element is not visible", async () => {
    const result = await run(scenario("toast", [], ["`.toast` is visible"]));

    expect(result.status).toBe("failed");
  });

  it("should error when a checked element is missing", async () => {
    const result = await run(scenario("missing_title", [], ['`h1` reads "Accounts"']));

    expect(result.status).toBe("error");
    expect(result.failureDetail).toContain("No visible, enabled element for `h1`");
  });

  it("should error without running steps when login fails", async () => {
    installLoginApp(driver, { secret: "JBSWY3DPEHPK3PXP", challenge: true });
    driver.place("#first", el("first"));

    const result = await run(scenario("login_fails", ["Click `#first`"]));

    expect(result.status).toBe("error");
    expect(result.failureDetail).toBe("One-time code was rejected");
    expect(driver.calls).not.toContain("click first");
    expect(closed).toBe(1);
  });

  it("should error on a driver exception and still release the session", async () => {
    driver.place(
      "#boom",
      el("boom", {
        onClick: () => {
          throw new Error("Target page, context or browser has been closed");
        },
      })
    );

    const result = await run(scenario("boom", ["Click `#boom`"]));

    expect(result.status).toBe("error");
    expect(result.failureDetail).toBe(
      "Step 1 (Click `#boom`): Target page, context or browser has been closed"
    );
    expect(closed).toBe(1);
  });

  it("should record an abort at the next step boundary and capture artifacts", async () => {
    const controller = new AbortController();
    driver.place("#first", el("first", { onClick: () => controller.abort() }));
    driver.place("#second", el("second"));

    const result = await run(scenario("aborted", ["Click `#first`", "Click `#second`"]), controller.signal);

    expect(result.status).toBe("error");
    expect(result.failureDetail).toBe("aborted");
    expect(result.failedStep).toBe(2);
    expect(result.artifacts).toHaveLength(2);
    expect(driver.calls).not.toContain("click second");
    expect(closed).toBe(1);
  });

  it("should not open a session when aborted up front", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await run(scenario("early", ["Go to /"]), controller.signal);

    expect(result.failureDetail).toBe("aborted");
    expect(driver.calls).toEqual([]);
    expect(closed).toBe(0);
  });

  it("should return a result when artifact capture fails", async () => {
    driver.failArtifacts = true;

    const result = await run(scenario("no_artifacts", ["Click `#missing`"]));

    expect(result.status).toBe("error");
    expect(result.artifacts).toEqual([]);
    expect(closed).toBe(1);
  });

  it("should report a session that cannot be opened", async () => {
    open = async () => {
      throw new Error("browserType.launch: Executable doesn't exist");
    };

    const result = await run(scenario("no_browser", ["Go to /"]));

    expect(result).toMatchObject({
      scenarioId: "no_browser",
      status: "error",
      failureDetail: "Could not open a browser session: browserType.launch: Executable doesn't exist",
    });
  });
});
