import { mkdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";

export interface ScenarioInput {
  id: string;
  name: string;
  steps: string[];
  expected: string[];
}

export function writeScenarioFile(scenario: ScenarioInput, scenariosDir: string): string {
  const fileName = slugify(scenario.id) + ".md";
  const filePath = join(scenariosDir, fileName);

  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, formatScenario(scenario), "utf-8");

  return filePath;
}

export function formatScenario(scenario: ScenarioInput): string {
  const lines: string[] = [];

  lines.push("---");
  lines.push(`id: ${JSON.stringify(scenario.id)}`);
  lines.push("---");
  lines.push("");
  lines.push(`# ${scenario.name}`);
  lines.push("");

  lines.push("## Steps");
  scenario.steps.forEach((step, i) => {
    lines.push(`${i + 1}. ${step}`);
  });
  lines.push("");

  lines.push("## Expected");
  for (const item of scenario.expected) {
    lines.push(`- ${item}`);
  }
  lines.push("");

  return lines.join("\n");
}

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "");
}
