import { loadConfig } from "../config/loader.js";
import { runAllScenarios, printSummary, writeReport, exitCodeFor } from "../runner/scenario-runner.js";
import { errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";

export async function verifyCommand(options: {
  env?: string;
  filter?: string;
  headed?: boolean;
  report: boolean;
}): Promise<void> {
  const cwd = process.cwd();
  const controller = new AbortController();
  const interrupt = () => {
    log.warn("Interrupted; stopping after the current step");
    controller.abort();
  };
  process.once("SIGINT", interrupt);

  try {
    const config = await loadConfig(cwd, { environment: options.env });
    const summary = await runAllScenarios(config, {
      headed: options.headed,
      filter: options.filter,
      report: options.report,
      signal: controller.signal,
    });

    const reportPath = writeReport(summary, config.artifactsDir);
    printSummary(summary);
    log.dim(`Report: ${reportPath}`);

    process.exit(exitCodeFor(summary));
  } catch (error) {
    log.fail(errorMessage(error));
    process.exit(1);
  } finally {
    process.off("SIGINT", interrupt);
  }
}
