import type { ElementQuery } from "../resolver/query.js";
import type { OutcomeStatus } from "../utils/logger.js";

/** Steps that may change page state. */
export type ActionStep =
  | { kind: "navigate"; path: string }
  | { kind: "click"; target: ElementQuery }
  | { kind: "fill"; target: ElementQuery; value: string }
  | { kind: "select"; target: ElementQuery; value: string }
  | { kind: "wait"; target: ElementQuery };

/** Read-only checks. */
export type AssertionStep =
  | { kind: "text"; target: ElementQuery; expected: string; match: "contains" | "equals" }
  | { kind: "visible"; target: ElementQuery }
  | { kind: "url"; includes: string };

/** `source` is the line as written, used in logs and failure detail. */
export type Step = (ActionStep | AssertionStep) & { source: string };

export interface Scenario {
  /** Identifier used for case mapping, e.g. `create_account[type=asset]`. */
  id: string;
  name: string;
  filePath: string;
  steps: Step[];
  /** Final assertions, checked after every step ran. */
  expected: Step[];
}

export type ScenarioStatus = OutcomeStatus;

/** Outcome of one scenario run. Created once and never modified. */
export interface ScenarioResult {
  readonly scenarioId: string;
  readonly name: string;
  readonly status: ScenarioStatus;
  /** Milliseconds. */
  readonly duration: number;
  readonly failureDetail?: string;
  /** 1-based position across steps then expectations. */
  readonly failedStep?: number;
  readonly artifacts: readonly string[];
}

export function isAssertion(step: Step): boolean {
  return step.kind === "text" || step.kind === "visible" || step.kind === "url";
}
