import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { BrowserDriver } from "../driver/types.js";
import { log } from "../utils/logger.js";
import { errorMessage } from "../errors.js";

export function artifactBaseName(scenarioId: string, at: number): string {
  const safe = scenarioId.replace(/[^A-Za-z0-9_-]+/g, "_").replace(/^_|_$/g, "");
  const stamp = new Date(at).toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  return `failure_${safe}_${stamp}`;
}

/**
 * Screenshot and markup of the page as it is now. Each capture that fails is
 * logged and left out; this never throws.
 */
export async function captureArtifacts<H>(
  driver: BrowserDriver<H>,
  dir: string,
  scenarioId: string,
  at: number
): Promise<string[]> {
  const base = join(dir, artifactBaseName(scenarioId, at));
  const captured: string[] = [];

  try {
    mkdirSync(dir, { recursive: true });
  } catch (error) {
    log.warn(`Could not create artifacts directory ${dir}: ${errorMessage(error)}`);
    return captured;
  }

  try {
    await driver.screenshot(`${base}.png`);
    captured.push(`${base}.png`);
  } catch (error) {
    log.warn(`Screenshot for ${scenarioId} failed: ${errorMessage(error)}`);
  }

  try {
    writeFileSync(`${base}.html`, await driver.pageContent(), "utf-8");
    captured.push(`${base}.html`);
  } catch (error) {
    log.warn(`Page snapshot for ${scenarioId} failed: ${errorMessage(error)}`);
  }

  return captured;
}
