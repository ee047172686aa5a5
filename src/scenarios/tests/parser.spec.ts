import { describe, it, expect } from "vitest";
import { parseScenario, parseStepLine, parseTarget } from "../parser.js";
import { formatScenario } from "../writer.js";
import { ScenarioFormatError } from "../../errors.js";

const FILE = "/s/create-account.md";

describe("parseTarget", () => {
  it("should read a single selector", () => {
    expect(parseTarget("`#save`")).toEqual({ primary: "#save", fallbacks: [] });
  });

  it("should keep fallbacks in order", () => {
    expect(parseTarget("`button:has-text('Add')` or `button.add-action` or `.add`")).toEqual({
      primary: "button:has-text('Add')",
      fallbacks: ["button.add-action", ".add"],
    });
  });

  it("should attach a container", () => {
    expect(parseTarget('`input[name="name"]` within `tr.new` or `tr.draft`')).toEqual({
      primary: 'input[name="name"]',
      fallbacks: [],
      scope: { primary: "tr.new", fallbacks: ["tr.draft"] },
    });
  });

  it("should reject text without backticks", () => {
    expect(parseTarget("the save button")).toBeUndefined();
  });
});

describe("parseStepLine", () => {
  it("should read navigation in both spellings", () => {
    expect(parseStepLine("Go to /accounts", FILE)).toEqual({
      kind: "navigate",
      path: "/accounts",
      source: "Go to /accounts",
    });
    expect(parseStepLine("Navigate to /home", FILE)).toMatchObject({ kind: "navigate", path: "/home" });
  });

  it("should read fill and select values", () => {
    expect(parseStepLine('Fill `#name` with "Cash"', FILE)).toMatchObject({
      kind: "fill",
      target: { primary: "#name" },
      value: "Cash",
    });
    expect(parseStepLine('Select "US Dollar" in `#currency`', FILE)).toMatchObject({
      kind: "select",
      target: { primary: "#currency" },
      value: "US Dollar",
    });
  });

  it("should tell contains from equals", () => {
    expect(parseStepLine('`h1` shows "Accounts"', FILE)).toMatchObject({ kind: "text", match: "contains" });
    expect(parseStepLine('`h1` reads "Accounts"', FILE)).toMatchObject({ kind: "text", match: "equals" });
  });

  it("should read visibility and URL checks", () => {
    expect(parseStepLine("`.toast` is visible", FILE)).toMatchObject({ kind: "visible" });
    expect(parseStepLine('URL contains "/accounts"', FILE)).toEqual({
      kind: "url",
      includes: "/accounts",
      source: 'URL contains "/accounts"',
    });
  });

  it("should reject unknown steps with the file path", () => {
    expect(() => parseStepLine("Dance", FILE)).toThrow('/s/create-account.md: unrecognised step "Dance"');
  });

  it("should reject a known verb with an unreadable target", () => {
    expect(() => parseStepLine("Click the button", FILE)).toThrow(ScenarioFormatError);
  });
});

describe("parseScenario", () => {
  const raw = [
    "---",
    "id: create_account[type=asset]",
    "---",
    "# Create a ledger account",
    "",
    "## Steps",
    "1. Go to /accounts",
    "2. Click `button:has-text('Add')` or `button.add-action`",
    "",
    "## Expected",
    '- `tr.new td.name` reads "Cash"',
    "",
  ].join("\n");

  it("should read id, title and both sections", () => {
    const scenario = parseScenario(raw, FILE);

    expect(scenario.id).toBe("create_account[type=asset]");
    expect(scenario.name).toBe("Create a ledger account");
    expect(scenario.steps.map((s) => s.kind)).toEqual(["navigate", "click"]);
    expect(scenario.expected.map((s) => s.kind)).toEqual(["text"]);
  });

  it("should fall back to the file name for the id", () => {
    const scenario = parseScenario("# Smoke\n\n## Steps\n1. Go to /\n", FILE);

    expect(scenario.id).toBe("create-account");
  });

  it("should refuse actions under Expected", () => {
    expect(() => parseScenario("# X\n\n## Expected\n- Click `#a`\n", FILE)).toThrow(
      'may only hold checks, found action "Click `#a`"'
    );
  });

  it("should refuse a file without steps", () => {
    expect(() => parseScenario("# Empty\n", FILE)).toThrow("no steps");
  });

  it("should read back what the writer produces", () => {
    const written = formatScenario({
      id: "smoke",
      name: "Smoke",
      steps: ["Go to /", "Click `#go`"],
      expected: ["`main` is visible"],
    });

    const scenario = parseScenario(written, FILE);

    expect(scenario.id).toBe("smoke");
    expect(scenario.steps).toHaveLength(2);
    expect(scenario.expected).toHaveLength(1);
  });
});
