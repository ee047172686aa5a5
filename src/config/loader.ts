import { readFileSync, existsSync } from "fs";
import { resolve, dirname, isAbsolute } from "path";
import { pathToFileURL } from "url";
import { ZodError } from "zod";
import { configSchema, type ParsedConfig, type ResolvedConfig } from "./schema.js";
import { ConfigError } from "../errors.js";

export const CONFIG_FILENAMES = [
  "trailcheck.config.json",
  "trailcheck.config.mjs",
  "trailcheck.config.js",
];

export interface LoadConfigOptions {
  environment?: string;
  env?: NodeJS.ProcessEnv;
}

export function findConfigFile(cwd: string): string | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const candidate = resolve(cwd, filename);
    if (existsSync(candidate)) return candidate;
  }
  return undefined;
}

export async function loadConfig(
  cwd: string,
  options: LoadConfigOptions = {}
): Promise<ResolvedConfig> {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    throw new ConfigError(
      "No trailcheck config file found. Run `trailcheck init` to create one."
    );
  }

  const raw = await readRawConfig(configPath);
  const substituted = substituteEnv(raw, options.env ?? process.env);
  return resolveConfig(substituted, dirname(configPath), options.environment);
}

/**
 * Validate a raw config object and select one environment from it.
 * Relative paths resolve against `baseDir`.
 */
export function resolveConfig(
  raw: unknown,
  baseDir: string,
  environmentName?: string
): ResolvedConfig {
  let parsed: ParsedConfig;
  try {
    parsed = configSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("\n");
      throw new ConfigError(`Invalid trailcheck config:\n${issues}`);
    }
    throw error;
  }

  const names = Object.keys(parsed.environments);
  const selected =
    environmentName ?? parsed.defaultEnvironment ?? (names.length === 1 ? names[0] : undefined);
  if (!selected) {
    throw new ConfigError(
      `Several environments are defined (${names.join(", ")}); pick one with --env or set defaultEnvironment`
    );
  }
  const environment = parsed.environments[selected];
  if (!environment) {
    throw new ConfigError(
      `Unknown environment "${selected}". Defined: ${names.join(", ")}`
    );
  }

  const absolute = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));

  return Object.freeze({
    environmentName: selected,
    environment: Object.freeze({ ...environment }),
    auth: parsed.auth,
    resolver: parsed.resolver,
    otp: parsed.otp,
    scenariosDir: absolute(parsed.scenariosDir),
    artifactsDir: absolute(parsed.artifactsDir),
    testrail: parsed.testrail
      ? { ...parsed.testrail, caseMapping: absolute(parsed.testrail.caseMapping) }
      : undefined,
  });
}

/**
 * Replace `${NAME}` placeholders in every string of the config tree with the
 * matching environment variable. A placeholder with no variable is an error,
 * so secrets never silently end up as literal `${...}` text.
 */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => {
      const replacement = env[name];
      if (replacement === undefined) {
        throw new ConfigError(`Environment variable ${name} is referenced by the config but not set`);
      }
      return replacement;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnv(item, env));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substituteEnv(item, env)])
    );
  }
  return value;
}

async function readRawConfig(configPath: string): Promise<unknown> {
  if (configPath.endsWith(".json")) {
    try {
      return JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new ConfigError(
        `Could not parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  const mod: unknown = await import(pathToFileURL(configPath).href);
  if (typeof mod === "object" && mod !== null && "default" in mod) {
    return mod.default;
  }
  return mod;
}
