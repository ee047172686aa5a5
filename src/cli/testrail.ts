import { loadConfig } from "../config/loader.js";
import { createReportingBridge, parseCaseId, parseSuiteId, type TestRailReportingBridge } from "../testrail/index.js";
import { ConfigError, errorMessage } from "../errors.js";
import { log, spinner } from "../utils/logger.js";

async function openBridge(env?: string): Promise<TestRailReportingBridge> {
  const config = await loadConfig(process.cwd(), { environment: env });
  if (!config.testrail) {
    throw new ConfigError("The config has no testrail block");
  }
  return createReportingBridge(config.testrail);
}

export async function sectionsCommand(options: { env?: string; suite?: string }): Promise<void> {
  try {
    const suiteId = options.suite === undefined ? undefined : parseSuiteId(options.suite);
    if (options.suite !== undefined && suiteId === undefined) {
      throw new ConfigError(`Not a suite id: ${options.suite}`);
    }
    const bridge = await openBridge(options.env);

    const s = spinner("Fetching sections...");
    const sections = await bridge.listSections(suiteId);
    if (!sections.ok) {
      s.fail(sections.error.message);
      process.exit(1);
    }
    s.succeed(`${sections.value.length} sections`);

    for (const section of sections.value) {
      console.log(`${"  ".repeat(section.depth ?? 0)}${section.id}  ${section.name}`);
    }
  } catch (error) {
    log.fail(errorMessage(error));
    process.exit(1);
  }
}

export async function deleteCasesCommand(
  ids: string[],
  options: { env?: string; yes?: boolean }
): Promise<void> {
  try {
    const caseIds: number[] = [];
    for (const raw of ids) {
      const id = parseCaseId(raw);
      if (id === undefined) throw new ConfigError(`Not a case id: ${raw}`);
      caseIds.push(id);
    }
    if (!options.yes) {
      log.warn(`Refusing to delete ${caseIds.length} case(s) without --yes`);
      process.exit(1);
    }

    const bridge = await openBridge(options.env);
    const summary = await bridge.deleteCases(caseIds);

    log.heading("Deleted");
    for (const id of summary.deleted) log.success(`C${id}`);
    if (summary.failed.length > 0) {
      log.heading("Not deleted");
      for (const { caseId, error } of summary.failed) log.fail(`C${caseId}: ${error}`);
    }
    log.info(`${summary.deleted.length} deleted, ${summary.failed.length} failed`);

    if (summary.failed.length > 0) process.exit(1);
  } catch (error) {
    log.fail(errorMessage(error));
    process.exit(1);
  }
}
