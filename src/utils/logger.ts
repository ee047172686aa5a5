import chalk from "chalk";
import ora, { type Ora } from "ora";

export type OutcomeStatus = "passed" | "failed" | "error";

const MARKS: Record<OutcomeStatus, string> = {
  passed: chalk.green("✓"),
  failed: chalk.red("✗"),
  error: chalk.magenta("!"),
};

export const log = {
  info: (msg: string) => console.log(chalk.blue("info") + " " + msg),
  success: (msg: string) => console.log(chalk.green("pass") + " " + msg),
  fail: (msg: string) => console.log(chalk.red("fail") + " " + msg),
  warn: (msg: string) => console.log(chalk.yellow("warn") + " " + msg),
  dim: (msg: string) => console.log(chalk.dim(msg)),
  heading: (msg: string) => console.log("\n" + chalk.bold(msg)),
  scenario: (name: string, status: OutcomeStatus) =>
    console.log(`  ${MARKS[status]} ${name}`),
};

export function spinner(text: string): Ora {
  return ora({ text, color: "cyan" }).start();
}
