import type { TrailcheckConfig } from "./config/schema.js";

export type {
  TrailcheckConfig,
  ResolvedConfig,
  EnvironmentConfig,
  AuthConfig,
  ResolverConfig,
  OtpConfig,
  TestRailConfig,
} from "./config/schema.js";
export { loadConfig, resolveConfig } from "./config/loader.js";
export { currentCode, hotp, decodeBase32, secondsRemaining, millisecondsRemaining } from "./otp/totp.js";
export type { BrowserDriver, DriverSession, DriverFactory, WaitCondition } from "./driver/types.js";
export { PlaywrightDriver, PlaywrightLauncher } from "./driver/playwright.js";
export { DynamicElementResolver, query, within, type ElementQuery } from "./resolver/index.js";
export { AuthenticationFlowController, type AuthState, type Session } from "./auth/flow.js";
export type { Scenario, ScenarioResult, ScenarioStatus, Step } from "./scenarios/types.js";
export { parseScenario, loadAllScenarios } from "./scenarios/index.js";
export {
  executeScenario,
  runScenarios,
  runAllScenarios,
  exitCodeFor,
  type VerificationSummary,
} from "./runner/index.js";
export {
  TestRailClient,
  TestRailReportingBridge,
  CaseMapping,
  createReportingBridge,
} from "./testrail/index.js";
export * from "./errors.js";
export { ok, err, type Result } from "./utils/result.js";

/**
 * Helper for defining a trailcheck config with type checking.
 */
export function defineConfig(config: TrailcheckConfig): TrailcheckConfig {
  return config;
}
