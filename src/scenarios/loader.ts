import { existsSync, readdirSync, statSync } from "fs";
import { join, extname } from "path";
import { parseScenarioFile } from "./parser.js";
import type { Scenario } from "./types.js";
import { ConfigError } from "../errors.js";

/**
 * Recursively find and parse all scenario .md files in the scenarios directory.
 * Scenario ids must be unique across the tree.
 */
export function loadAllScenarios(scenariosDir: string): Scenario[] {
  if (!existsSync(scenariosDir)) {
    throw new ConfigError(`Scenarios directory ${scenariosDir} does not exist`);
  }
  const scenarios = findMarkdownFiles(scenariosDir).map((f) => parseScenarioFile(f));

  const seen = new Map<string, string>();
  for (const scenario of scenarios) {
    const previous = seen.get(scenario.id);
    if (previous) {
      throw new ConfigError(
        `Scenario id "${scenario.id}" is used by both ${previous} and ${scenario.filePath}`
      );
    }
    seen.set(scenario.id, scenario.filePath);
  }
  return scenarios;
}

/** Case-insensitive substring match on id or name. */
export function filterScenarios(scenarios: Scenario[], pattern?: string): Scenario[] {
  if (!pattern) return scenarios;
  const needle = pattern.toLowerCase();
  return scenarios.filter(
    (s) => s.id.toLowerCase().includes(needle) || s.name.toLowerCase().includes(needle)
  );
}

function findMarkdownFiles(dir: string): string[] {
  const results: string[] = [];

  for (const entry of readdirSync(dir)) {
    const fullPath = join(dir, entry);
    const stat = statSync(fullPath);

    if (stat.isDirectory()) {
      results.push(...findMarkdownFiles(fullPath));
    } else if (extname(entry) === ".md") {
      results.push(fullPath);
    }
  }

  return results.sort();
}
