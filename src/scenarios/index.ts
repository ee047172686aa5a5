export type {
  Scenario,
  ScenarioResult,
  ScenarioStatus,
  Step,
  ActionStep,
  AssertionStep,
} from "./types.js";
export { isAssertion } from "./types.js";
export { parseScenarioFile, parseScenario, parseStepLine, parseTarget } from "./parser.js";
export { writeScenarioFile, formatScenario, type ScenarioInput } from "./writer.js";
export { loadAllScenarios, filterScenarios } from "./loader.js";
