#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./init.js";
import { verifyCommand } from "./verify.js";
import { otpCommand } from "./otp.js";
import { sectionsCommand, deleteCasesCommand } from "./testrail.js";

const program = new Command();

program
  .name("trailcheck")
  .description(
    "Log in through 2FA, run UI scenarios and publish the results to TestRail"
  )
  .version("0.1.0");

program
  .command("init")
  .description("Write an example config, scenario and case mapping")
  .action(initCommand);

program
  .command("verify")
  .description("Run all scenarios against one environment")
  .option("-e, --env <name>", "Environment from the config to run against")
  .option("-f, --filter <pattern>", "Only run scenarios whose id or title contains pattern")
  .option("--headed", "Run browser in headed mode (visible)")
  .option("--no-report", "Do not publish results to TestRail")
  .action(verifyCommand);

program
  .command("otp")
  .description("Print the current one-time code for an environment")
  .option("-e, --env <name>", "Environment from the config")
  .action(otpCommand);

const testrail = program
  .command("testrail")
  .description("TestRail housekeeping");

testrail
  .command("sections")
  .description("List the sections of a suite")
  .option("-e, --env <name>", "Environment from the config")
  .option("-s, --suite <id>", "Suite id such as 4 or S4 (defaults to testrail.suiteId)")
  .action(sectionsCommand);

testrail
  .command("delete-cases")
  .description("Delete test cases, one request per case")
  .argument("<ids...>", "Case ids, e.g. 371 or C371")
  .option("-e, --env <name>", "Environment from the config")
  .option("-y, --yes", "Confirm the deletion")
  .action(deleteCasesCommand);

program.parse();
