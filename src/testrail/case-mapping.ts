import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors.js";

function parseId(value: string | number, prefix: RegExp): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value > 0 ? value : undefined;
  }
  const match = prefix.exec(value.trim());
  if (!match) return undefined;
  const id = Number(match[1]);
  return id > 0 ? id : undefined;
}

/** Accepts `371` or `"C371"`. */
export function parseCaseId(value: string | number): number | undefined {
  return parseId(value, /^C?(\d+)$/i);
}

/** Accepts `4` or `"S4"`. */
export function parseSuiteId(value: string | number): number | undefined {
  return parseId(value, /^S?(\d+)$/i);
}

const caseIdSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const id = parseCaseId(value);
  if (id === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a case id: ${JSON.stringify(value)}` });
    return z.NEVER;
  }
  return id;
});

export const caseMappingSchema = z.record(caseIdSchema);

/**
 * Scenario id to TestRail case id. Fixed once loaded; lookups are exact, so
 * `create_account[type=asset]` and `create_account` are different entries.
 */
export class CaseMapping {
  private readonly entries: ReadonlyMap<string, number>;

  private constructor(entries: Map<string, number>) {
    this.entries = entries;
  }

  static fromObject(raw: unknown, source = "case mapping"): CaseMapping {
    const parsed = caseMappingSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("\n");
      throw new ConfigError(`Invalid ${source}:\n${issues}`);
    }
    return new CaseMapping(new Map(Object.entries(parsed.data)));
  }

  static load(path: string): CaseMapping {
    if (!existsSync(path)) {
      throw new ConfigError(`Case mapping ${path} does not exist`);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new ConfigError(`Could not parse ${path}: ${errorMessage(error)}`);
    }
    return CaseMapping.fromObject(raw, path);
  }

  lookup(scenarioId: string): number | undefined {
    return this.entries.get(scenarioId);
  }

  get caseIds(): number[] {
    return [...new Set(this.entries.values())].sort((a, b) => a - b);
  }

  get size(): number {
    return this.entries.size;
  }
}
