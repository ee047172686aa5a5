import type { BrowserDriver, DriverFactory, DriverSession } from "../driver/types.js";
import type { ResolvedConfig } from "../config/schema.js";
import type { Scenario, ScenarioResult, ScenarioStatus, Step } from "../scenarios/types.js";
import { isAssertion } from "../scenarios/types.js";
import { AuthenticationFlowController } from "../auth/flow.js";
import { DynamicElementResolver } from "../resolver/resolver.js";
import { describeQuery } from "../resolver/query.js";
import {
  AssertionMismatchError,
  NavigationError,
  errorMessage,
  type TrailcheckError,
} from "../errors.js";
import { ok, err, type Result } from "../utils/result.js";
import { pollUntil } from "../utils/wait.js";
import { log } from "../utils/logger.js";
import { captureArtifacts } from "./artifacts.js";

export interface ExecutorOptions {
  artifactsDir: string;
  /** Checked at every step boundary. */
  signal?: AbortSignal;
  /** Milliseconds since epoch, for one-time codes and artifact names. */
  clock?: () => number;
}

interface Outcome {
  status: Exclude<ScenarioStatus, "passed">;
  detail: string;
  failedStep?: number;
}

/**
 * Run one scenario in its own driver session and return exactly one result.
 * The session is opened before anything else and closed on every exit path;
 * nothing here throws past the result.
 */
export async function executeScenario<H>(
  scenario: Scenario,
  config: ResolvedConfig,
  openSession: DriverFactory<H>,
  options: ExecutorOptions
): Promise<ScenarioResult> {
  const clock = options.clock ?? Date.now;
  const start = Date.now();
  const finish = (outcome: Outcome | undefined, artifacts: string[] = []): ScenarioResult =>
    Object.freeze({
      scenarioId: scenario.id,
      name: scenario.name,
      status: outcome?.status ?? "passed",
      duration: Date.now() - start,
      failureDetail: outcome?.detail,
      failedStep: outcome?.failedStep,
      artifacts: Object.freeze(artifacts),
    });

  if (options.signal?.aborted) {
    return finish({ status: "error", detail: "aborted" });
  }

  let session: DriverSession<H>;
  try {
    session = await openSession();
  } catch (error) {
    return finish({ status: "error", detail: `Could not open a browser session: ${errorMessage(error)}` });
  }

  try {
    const outcome = await runInSession(scenario, config, session.driver, options, clock);
    if (!outcome) return finish(undefined);
    const artifacts = await captureArtifacts(session.driver, options.artifactsDir, scenario.id, clock());
    return finish(outcome, artifacts);
  } finally {
    await release(session, scenario.id);
  }
}

async function runInSession<H>(
  scenario: Scenario,
  config: ResolvedConfig,
  driver: BrowserDriver<H>,
  options: ExecutorOptions,
  clock: () => number
): Promise<Outcome | undefined> {
  try {
    const flow = new AuthenticationFlowController(driver, config.environment, {
      auth: config.auth,
      otp: config.otp,
      resolver: config.resolver,
      clock,
    });
    const session = await flow.authenticate();
    if (!session.ok) {
      return { status: "error", detail: session.error.message };
    }

    const resolver = new DynamicElementResolver(driver, config.resolver);
    const steps = [...scenario.steps, ...scenario.expected];
    for (let i = 0; i < steps.length; i++) {
      const step = steps[i];
      if (options.signal?.aborted) {
        return { status: "error", detail: "aborted", failedStep: i + 1 };
      }

      const result = await runStep(step, { driver, resolver, config }).catch((error: unknown) => err(error));
      if (!result.ok) {
        const mismatch = isAssertion(step) && result.error instanceof AssertionMismatchError;
        return {
          status: mismatch ? "failed" : "error",
          detail: `Step ${i + 1} (${step.source}): ${errorMessage(result.error)}`,
          failedStep: i + 1,
        };
      }
    }
    return undefined;
  } catch (error) {
    return { status: "error", detail: errorMessage(error) };
  }
}

interface StepContext<H> {
  driver: BrowserDriver<H>;
  resolver: DynamicElementResolver<H>;
  config: ResolvedConfig;
}

async function runStep<H>(
  step: Step,
  { driver, resolver, config }: StepContext<H>
): Promise<Result<void, TrailcheckError>> {
  const settled = (result: Result<unknown, TrailcheckError>): Result<void, TrailcheckError> =>
    result.ok ? ok(undefined) : err(result.error);
  const bound = { timeoutMs: config.resolver.timeoutMs, intervalMs: config.resolver.pollIntervalMs };

  switch (step.kind) {
    case "navigate": {
      const url = new URL(step.path, config.environment.baseUrl).href;
      try {
        await driver.navigate(url, config.auth.navigationTimeoutMs);
      } catch (error) {
        return err(new NavigationError(url, `Could not load ${url}: ${errorMessage(error)}`, { cause: error }));
      }
      return ok(undefined);
    }
    case "click":
      return settled(await resolver.click(step.target));
    case "fill":
      return settled(await resolver.fill(step.target, step.value));
    case "select":
      return settled(await resolver.select(step.target, step.value));
    case "wait":
      return settled(await resolver.resolve(step.target));
    case "visible": {
      const found = await resolver.resolve(step.target);
      if (found.ok) return ok(undefined);
      return err(new AssertionMismatchError(`${describeQuery(step.target)} is not visible`, "visible", "not visible"));
    }
    case "url": {
      if (await driver.waitFor({ kind: "url", includes: step.includes }, config.resolver.timeoutMs)) {
        return ok(undefined);
      }
      return err(new AssertionMismatchError("URL does not contain the expected text", step.includes, driver.currentUrl()));
    }
    case "text": {
      let observed = "";
      const { target, expected, match } = step;
      const matched = await pollUntil(async () => {
        const read = await resolver.readText(target);
        if (!read.ok) return read;
        observed = read.value;
        const hit = match === "equals" ? observed.trim() === expected : observed.includes(expected);
        return hit ? read : undefined;
      }, bound);
      if (matched && !matched.ok) return err(matched.error);
      if (matched) return ok(undefined);
      return err(
        new AssertionMismatchError(
          `${describeQuery(target)} ${match === "equals" ? "does not read" : "does not show"} the expected text`,
          expected,
          observed
        )
      );
    }
  }
}

async function release<H>(session: DriverSession<H>, scenarioId: string): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    log.warn(`Closing the browser session for ${scenarioId} failed: ${errorMessage(error)}`);
  }
}
