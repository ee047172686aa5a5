import type { TestRailConfig } from "../config/schema.js";
import { TestRailReportingBridge } from "./bridge.js";
import { CaseMapping } from "./case-mapping.js";
import { TestRailClient } from "./client.js";

export function createReportingBridge(
  config: TestRailConfig,
  fetchImpl?: typeof fetch
): TestRailReportingBridge {
  const client = new TestRailClient({
    url: config.url,
    username: config.username,
    password: config.password,
    timeoutMs: config.timeoutMs,
    fetchImpl,
  });
  return new TestRailReportingBridge(client, config, CaseMapping.load(config.caseMapping));
}

export {
  TestRailReportingBridge,
  STATUS_IDS,
  elapsed,
  type ReportOutcome,
  type ReportingSummary,
  type DeleteSummary,
  type RunSettings,
} from "./bridge.js";
export { CaseMapping, parseCaseId, parseSuiteId, caseMappingSchema } from "./case-mapping.js";
export {
  TestRailClient,
  type TestRailClientOptions,
  type TestRun,
  type TestResult,
  type Section,
  type AddRunPayload,
  type AddResultPayload,
} from "./client.js";
