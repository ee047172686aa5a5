export { executeScenario, type ExecutorOptions } from "./executor.js";
export { captureArtifacts, artifactBaseName } from "./artifacts.js";
export {
  runScenarios,
  runAllScenarios,
  writeReport,
  printSummary,
  exitCodeFor,
  type VerificationSummary,
  type RunScenariosOptions,
  type RunnerOptions,
} from "./scenario-runner.js";
