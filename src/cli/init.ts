import { existsSync, writeFileSync, readFileSync } from "fs";
import { resolve } from "path";
import type { TrailcheckConfig } from "../config/schema.js";
import { writeScenarioFile } from "../scenarios/writer.js";
import { log } from "../utils/logger.js";

const EXAMPLE_CONFIG: TrailcheckConfig = {
  environments: {
    stage: {
      baseUrl: "https://stage.example.com",
      loginPath: "/login",
      username: "${TEST_USERNAME}",
      password: "${TEST_PASSWORD}",
      otpSecret: "${TEST_TOTP_SECRET}",
    },
  },
  defaultEnvironment: "stage",
  scenariosDir: "scenarios",
  artifactsDir: ".trailcheck/artifacts",
};

const EXAMPLE_SCENARIO = {
  id: "example_login",
  name: "Landing page after login",
  steps: ["Go to /", "Wait for `main` or `div[role=\"main\"]`"],
  expected: ["`main` is visible"],
};

const GITIGNORE_ENTRY = `
# trailcheck
.trailcheck/
`;

export async function initCommand(): Promise<void> {
  const cwd = process.cwd();

  log.heading("Initializing trailcheck...");

  const configPath = resolve(cwd, "trailcheck.config.json");
  if (existsSync(configPath)) {
    log.warn("trailcheck.config.json already exists, skipping");
  } else {
    writeFileSync(configPath, JSON.stringify(EXAMPLE_CONFIG, null, 2) + "\n");
    log.success("Created trailcheck.config.json");
  }

  const scenariosDir = resolve(cwd, "scenarios");
  if (existsSync(resolve(scenariosDir, "example-login.md"))) {
    log.warn("scenarios/example-login.md already exists, skipping");
  } else {
    writeScenarioFile(EXAMPLE_SCENARIO, scenariosDir);
    log.success("Created example scenario: scenarios/example-login.md");
  }

  const mappingPath = resolve(cwd, "case-mapping.json");
  if (!existsSync(mappingPath)) {
    writeFileSync(mappingPath, "{}\n");
    log.success("Created case-mapping.json");
  }

  const gitignorePath = resolve(cwd, ".gitignore");
  if (existsSync(gitignorePath)) {
    const gitignore = readFileSync(gitignorePath, "utf-8");
    if (!gitignore.includes(".trailcheck/")) {
      writeFileSync(gitignorePath, gitignore + GITIGNORE_ENTRY);
      log.success("Added .trailcheck/ to .gitignore");
    }
  } else {
    writeFileSync(gitignorePath, GITIGNORE_ENTRY.trim() + "\n");
    log.success("Created .gitignore with .trailcheck/");
  }

  log.heading("Done! Next steps:");
  log.info("1. Export TEST_USERNAME, TEST_PASSWORD and TEST_TOTP_SECRET");
  log.info("2. Point environments.stage.baseUrl at your app");
  log.info("3. Add a testrail block and fill case-mapping.json to publish results");
  log.info("4. Run `trailcheck verify`");
}
