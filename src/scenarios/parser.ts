import { readFileSync } from "fs";
import { basename } from "path";
import matter from "gray-matter";
import { query, within, type ElementQuery } from "../resolver/query.js";
import { ScenarioFormatError } from "../errors.js";
import { isAssertion, type Scenario, type Step } from "./types.js";

/**
 * Parse a scenario markdown file into a structured Scenario object.
 *
 * Expected format:
 * ---
 * id: create_account[type=asset]
 * ---
 * # Create a ledger account
 *
 * ## Steps
 * 1. Go to /accounts
 * 2. Click `button:has-text('Add')` or `button.add-action`
 * 3. Fill `input[name="name"]` within `tr.new-row` with "Cash"
 * 4. Select "Current Assets" in `td.type` within `tr.new-row`
 *
 * ## Expected
 * - `tr.new-row td.name` reads "Cash"
 */
export function parseScenarioFile(filePath: string): Scenario {
  const raw = readFileSync(filePath, "utf-8");
  return parseScenario(raw, filePath);
}

export function parseScenario(raw: string, filePath: string): Scenario {
  const { data: frontmatter, content } = matter(raw);

  const id =
    typeof frontmatter.id === "string" && frontmatter.id.trim()
      ? frontmatter.id.trim()
      : basename(filePath, ".md");

  const headingMatch = content.match(/^#\s+(.+)$/m);
  const name = headingMatch ? headingMatch[1].trim() : id;

  const steps = extractSection(content, "Steps").map((line) => parseStepLine(line, filePath));
  const expected = extractSection(content, "Expected").map((line) => parseStepLine(line, filePath));

  if (steps.length === 0 && expected.length === 0) {
    throw new ScenarioFormatError(filePath, "no steps under ## Steps or ## Expected");
  }
  const action = expected.find((step) => !isAssertion(step));
  if (action) {
    throw new ScenarioFormatError(
      filePath,
      `## Expected may only hold checks, found action "${action.source}"`
    );
  }

  return { id, name, filePath, steps, expected };
}

type StepRule = [RegExp, (m: RegExpExecArray) => Step | undefined];

/** Tried in order; the first pattern that matches decides. */
function rules(source: string): StepRule[] {
  const targeted = (text: string, build: (target: ElementQuery) => Step) => {
    const target = parseTarget(text);
    return target ? build(target) : undefined;
  };
  return [
    [/^(?:go|navigate) to\s+(\S+)$/i, (m) => ({ kind: "navigate", path: m[1], source })],
    [/^url contains\s+"(.*)"$/i, (m) => ({ kind: "url", includes: m[1], source })],
    [
      /^fill\s+(.+?)\s+with\s+"(.*)"$/i,
      (m) => targeted(m[1], (target) => ({ kind: "fill", target, value: m[2], source })),
    ],
    [
      /^select\s+"(.*?)"\s+in\s+(.+)$/i,
      (m) => targeted(m[2], (target) => ({ kind: "select", target, value: m[1], source })),
    ],
    [/^click\s+(.+)$/i, (m) => targeted(m[1], (target) => ({ kind: "click", target, source }))],
    [/^wait for\s+(.+)$/i, (m) => targeted(m[1], (target) => ({ kind: "wait", target, source }))],
    [
      /^(.+?)\s+shows\s+"(.*)"$/i,
      (m) =>
        targeted(m[1], (target) => ({ kind: "text", target, expected: m[2], match: "contains", source })),
    ],
    [
      /^(.+?)\s+reads\s+"(.*)"$/i,
      (m) =>
        targeted(m[1], (target) => ({ kind: "text", target, expected: m[2], match: "equals", source })),
    ],
    [/^(.+?)\s+is visible$/i, (m) => targeted(m[1], (target) => ({ kind: "visible", target, source }))],
  ];
}

export function parseStepLine(line: string, filePath: string): Step {
  for (const [pattern, build] of rules(line)) {
    const match = pattern.exec(line);
    if (!match) continue;
    const step = build(match);
    if (step) return step;
    throw new ScenarioFormatError(filePath, `cannot read the target in "${line}"`);
  }
  throw new ScenarioFormatError(filePath, `unrecognised step "${line}"`);
}

/**
 * `` `a` or `b` `` with an optional `` within `c` or `d` `` container.
 */
export function parseTarget(text: string): ElementQuery | undefined {
  const parts = text.trim().split(/\s+within\s+(?=`)/);
  if (parts.length > 2) return undefined;
  const target = parseChain(parts[0]);
  if (!target || parts.length === 1) return target;
  const scope = parseChain(parts[1]);
  return scope ? within(target, scope) : undefined;
}

function parseChain(text: string): ElementQuery | undefined {
  const match = /^`([^`]+)`((?:\s+or\s+`[^`]+`)*)$/.exec(text.trim());
  if (!match) return undefined;
  const fallbacks = [...match[2].matchAll(/`([^`]+)`/g)].map((m) => m[1]);
  return query(match[1], ...fallbacks);
}

function extractSection(content: string, sectionName: string): string[] {
  const lines = content.split(/\r?\n/);
  const heading = new RegExp(`^##\\s+${sectionName}\\s*$`, "i");
  const start = lines.findIndex((line) => heading.test(line.trim()));
  if (start === -1) return [];

  const body: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (/^##\s/.test(line)) break;
    body.push(line);
  }
  return body
    .map((line) => line.replace(/^\s*[-*]\s+/, "").replace(/^\s*\d+\.\s+/, "").trim())
    .filter((line) => line.length > 0);
}
