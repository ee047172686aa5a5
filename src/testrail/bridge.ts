import type { TestRailConfig } from "../config/schema.js";
import type { ScenarioResult, ScenarioStatus } from "../scenarios/types.js";
import { ReportingError, errorMessage } from "../errors.js";
import { ok, err, type Result } from "../utils/result.js";
import { log } from "../utils/logger.js";
import type { CaseMapping } from "./case-mapping.js";
import type { Section, TestRailClient } from "./client.js";

export const STATUS_IDS: Record<ScenarioStatus, number> = {
  passed: 1,
  failed: 5,
  error: 5,
};

export type ReportOutcome = "reported" | "skipped" | "failed";

export interface ReportingSummary {
  reported: number;
  /** Results with no case mapping entry. */
  skipped: number;
  failed: number;
  warnings: string[];
  /** Suite id to run id, for runs created in this process. */
  runs: Record<number, number>;
}

export interface DeleteSummary {
  deleted: number[];
  failed: Array<{ caseId: number; error: string }>;
}

export type RunSettings = Pick<
  TestRailConfig,
  "projectId" | "suiteId" | "runName" | "runDescription" | "includeAll"
>;

/**
 * Publishes scenario results to TestRail. One run per suite per process,
 * created on first use. Every failure is caught here, counted and logged as
 * a warning; no method throws.
 */
export class TestRailReportingBridge {
  private readonly runs = new Map<number, Promise<Result<number, ReportingError>>>();
  private readonly counters: ReportingSummary = {
    reported: 0,
    skipped: 0,
    failed: 0,
    warnings: [],
    runs: {},
  };

  constructor(
    private readonly client: TestRailClient,
    private readonly settings: RunSettings,
    private readonly mapping: CaseMapping
  ) {}

  /**
   * Run id for `suiteId`, creating the run on the first call. Later calls,
   * concurrent ones included, share the first call's answer.
   */
  ensureRun(
    suiteId: number = this.settings.suiteId,
    caseIds: number[] = this.mapping.caseIds
  ): Promise<Result<number, ReportingError>> {
    const existing = this.runs.get(suiteId);
    if (existing) return existing;

    const created = this.createRun(suiteId, caseIds);
    this.runs.set(suiteId, created);
    return created;
  }

  async report(result: ScenarioResult): Promise<ReportOutcome> {
    const caseId = this.mapping.lookup(result.scenarioId);
    if (caseId === undefined) {
      this.counters.skipped++;
      this.warn(`No TestRail case mapped to ${result.scenarioId}; result not reported`);
      return "skipped";
    }

    const run = await this.ensureRun();
    if (!run.ok) {
      this.counters.failed++;
      this.warn(`Result for ${result.scenarioId} (C${caseId}) not reported: no run (${run.error.message})`);
      return "failed";
    }

    const posted = await this.call("add_result_for_case", () =>
      this.client.addResultForCase(run.value, caseId, {
        status_id: STATUS_IDS[result.status],
        comment: comment(result),
        elapsed: elapsed(result.duration),
      })
    );
    if (!posted.ok) {
      this.counters.failed++;
      this.warn(`Result for ${result.scenarioId} (C${caseId}) not reported: ${posted.error.message}`);
      return "failed";
    }
    this.counters.reported++;
    return "reported";
  }

  /** Close the run for `suiteId` if this process created one. */
  async closeRun(suiteId: number = this.settings.suiteId): Promise<boolean> {
    const pending = this.runs.get(suiteId);
    if (!pending) return false;
    const run = await pending;
    if (!run.ok) return false;

    const closed = await this.call("close_run", () => this.client.closeRun(run.value));
    if (!closed.ok) {
      this.warn(`Could not close TestRail run ${run.value}: ${closed.error.message}`);
      return false;
    }
    return true;
  }

  async listSections(suiteId: number = this.settings.suiteId): Promise<Result<Section[], ReportingError>> {
    const sections = await this.call("get_sections", () =>
      this.client.getSections(this.settings.projectId, suiteId)
    );
    if (!sections.ok) this.warn(`Could not list sections of suite ${suiteId}: ${sections.error.message}`);
    return sections;
  }

  /** One request per case; failures are collected and the batch goes on. */
  async deleteCases(caseIds: readonly number[]): Promise<DeleteSummary> {
    const summary: DeleteSummary = { deleted: [], failed: [] };
    for (const caseId of caseIds) {
      const deleted = await this.call("delete_case", () => this.client.deleteCase(caseId));
      if (deleted.ok) {
        summary.deleted.push(caseId);
      } else {
        summary.failed.push({ caseId, error: deleted.error.message });
        this.warn(`Could not delete C${caseId}: ${deleted.error.message}`);
      }
    }
    return summary;
  }

  summary(): ReportingSummary {
    return { ...this.counters, warnings: [...this.counters.warnings], runs: { ...this.counters.runs } };
  }

  private async createRun(suiteId: number, caseIds: number[]): Promise<Result<number, ReportingError>> {
    const { projectId, runName, runDescription, includeAll } = this.settings;
    const created = await this.call("add_run", () =>
      this.client.addRun(projectId, {
        suite_id: suiteId,
        name: runName,
        description: runDescription,
        include_all: includeAll,
        ...(includeAll ? {} : { case_ids: caseIds }),
      })
    );
    if (!created.ok) {
      this.warn(`Could not create a TestRail run for suite ${suiteId}: ${created.error.message}`);
      return created;
    }
    this.counters.runs[suiteId] = created.value.id;
    log.dim(`  testrail: run ${created.value.id} created for suite ${suiteId}`);
    return ok(created.value.id);
  }

  /** Folds anything a client call throws into the same Result it would have returned. */
  private async call<T>(
    what: string,
    request: () => Promise<Result<T, ReportingError>>
  ): Promise<Result<T, ReportingError>> {
    try {
      return await request();
    } catch (error) {
      return err(new ReportingError("network", `${what} failed: ${errorMessage(error)}`, undefined, { cause: error }));
    }
  }

  private warn(message: string): void {
    this.counters.warnings.push(message);
    log.warn(message);
  }
}

/** Whole seconds, at least one; TestRail rejects a zero timespan. */
export function elapsed(durationMs: number): string {
  return `${Math.max(1, Math.round(durationMs / 1000))}s`;
}

function comment(result: ScenarioResult): string {
  if (result.status === "passed") return `Passed: ${result.name}`;
  const lines = [`${result.status === "failed" ? "Failed" : "Error"}: ${result.name}`];
  if (result.failureDetail) lines.push("", result.failureDetail);
  if (result.artifacts.length > 0) lines.push("", "Artifacts:", ...result.artifacts.map((a) => `- ${a}`));
  return lines.join("\n");
}
