import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { loadAllScenarios, filterScenarios } from "../scenarios/loader.js";
import { executeScenario } from "./executor.js";
import { PlaywrightLauncher } from "../driver/playwright.js";
import { createReportingBridge } from "../testrail/index.js";
import type { TestRailReportingBridge, ReportingSummary } from "../testrail/bridge.js";
import type { DriverFactory } from "../driver/types.js";
import type { Scenario, ScenarioResult, ScenarioStatus } from "../scenarios/types.js";
import type { ResolvedConfig } from "../config/schema.js";
import { ConfigError } from "../errors.js";
import { log, spinner } from "../utils/logger.js";

export interface VerificationSummary {
  environment: string;
  startedAt: string;
  /** Milliseconds. */
  duration: number;
  totals: Record<ScenarioStatus, number> & { total: number };
  results: ScenarioResult[];
  reporting?: ReportingSummary;
}

export interface RunScenariosOptions<H> {
  openSession: DriverFactory<H>;
  reporter?: TestRailReportingBridge;
  signal?: AbortSignal;
  clock?: () => number;
}

/**
 * Run scenarios one after another, each in its own session, and report every
 * result as soon as it exists. A failing scenario never stops the batch; an
 * abort does, and scenarios it prevented from starting leave no result.
 */
export async function runScenarios<H>(
  scenarios: Scenario[],
  config: ResolvedConfig,
  options: RunScenariosOptions<H>
): Promise<VerificationSummary> {
  const start = Date.now();
  const results: ScenarioResult[] = [];

  log.heading(`Running ${scenarios.length} scenarios against ${config.environmentName}\n`);

  for (let i = 0; i < scenarios.length; i++) {
    if (options.signal?.aborted) {
      log.warn(`Interrupted; ${scenarios.length - i} of ${scenarios.length} scenarios not run`);
      break;
    }
    const scenario = scenarios[i];
    const result = await executeScenario(scenario, config, options.openSession, {
      artifactsDir: config.artifactsDir,
      signal: options.signal,
      clock: options.clock,
    });
    results.push(result);

    log.scenario(`[${i + 1}/${scenarios.length}] ${scenario.name}`, result.status);
    if (result.failureDetail) {
      log.dim(`      ${result.failureDetail.split("\n")[0].slice(0, 160)}`);
    }

    if (options.reporter) await options.reporter.report(result);
  }

  if (options.reporter && config.testrail?.closeRun) {
    await options.reporter.closeRun();
  }

  const count = (status: ScenarioStatus) => results.filter((r) => r.status === status).length;
  return {
    environment: config.environmentName,
    startedAt: new Date(start).toISOString(),
    duration: Date.now() - start,
    totals: {
      total: results.length,
      passed: count("passed"),
      failed: count("failed"),
      error: count("error"),
    },
    results,
    reporting: options.reporter?.summary(),
  };
}

export interface RunnerOptions {
  headed?: boolean;
  filter?: string;
  /** Publish results to TestRail when the config has a `testrail` block. */
  report?: boolean;
  signal?: AbortSignal;
}

/**
 * Load the scenarios of a resolved config and run them in Chromium.
 */
export async function runAllScenarios(
  config: ResolvedConfig,
  options: RunnerOptions = {}
): Promise<VerificationSummary> {
  const scenarios = filterScenarios(loadAllScenarios(config.scenariosDir), options.filter);
  if (scenarios.length === 0) {
    throw new ConfigError(
      options.filter
        ? `No scenarios match filter "${options.filter}"`
        : `No scenarios found in ${config.scenariosDir}. Run \`trailcheck init\` to create an example.`
    );
  }
  log.info(`Found ${scenarios.length} scenarios`);

  let reporter: TestRailReportingBridge | undefined;
  if (options.report !== false && config.testrail) {
    reporter = createReportingBridge(config.testrail);
  } else if (options.report !== false) {
    log.dim("No testrail block in config; results stay local");
  }

  const launcher = new PlaywrightLauncher({ headed: options.headed });
  const s = spinner("Launching Chromium...");
  try {
    await launcher.ensureBrowser();
    s.succeed("Chromium ready");
  } catch (error) {
    s.fail("Could not launch Chromium");
    throw error;
  }

  try {
    return await runScenarios(scenarios, config, {
      openSession: launcher.sessionFactory(config.environment),
      reporter,
      signal: options.signal,
    });
  } finally {
    await launcher.close();
  }
}

/** Write `report.json` next to the artifacts and return its path. */
export function writeReport(summary: VerificationSummary, artifactsDir: string): string {
  mkdirSync(artifactsDir, { recursive: true });
  const reportPath = join(artifactsDir, "report.json");
  writeFileSync(reportPath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  return reportPath;
}

/**
 * Format a verification summary for terminal display.
 */
export function printSummary(summary: VerificationSummary): void {
  const { total, passed, failed, error } = summary.totals;

  log.heading("Results");

  if (passed === total) {
    log.success(`All ${total} scenarios passing`);
  } else {
    log.fail(`${failed} failed, ${error} errored, ${passed}/${total} passed`);

    log.heading("Failures:");
    for (const result of summary.results.filter((r) => r.status !== "passed")) {
      console.log("");
      log.fail(`${result.name} (${result.scenarioId}) [${result.status}]`);
      if (result.failureDetail) {
        log.dim(`  ${result.failureDetail.replace(/\n/g, "\n  ")}`);
      }
      for (const artifact of result.artifacts) {
        log.dim(`  Artifact: ${artifact}`);
      }
    }
  }

  if (summary.reporting) {
    const { reported, skipped, failed: notReported, warnings } = summary.reporting;
    log.heading("TestRail");
    log.info(`${reported} reported, ${skipped} unmapped, ${notReported} not reported`);
    for (const warning of warnings) log.warn(warning);
  }

  log.dim(`\nDuration: ${(summary.duration / 1000).toFixed(1)}s`);
}

/** Non-zero when any scenario failed or errored; reporting problems never count. */
export function exitCodeFor(summary: VerificationSummary): number {
  return summary.totals.failed + summary.totals.error > 0 ? 1 : 0;
}
