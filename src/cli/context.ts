import { readFile } from "node:fs/promises";
import { createLogger } from "../logging/logger.js";
import type { Logger } from "../logging/logger.js";
import { InvalidScenarioError, parseScenario } from "./scenario.js";
import type { Scenario } from "./scenario.js";

/**
 * Logger for CLI runs. Engine logs go to stdout alongside command output, so
 * the default stays quiet.
 */
export function createCliLogger(opts: { logLevel?: string }): Logger {
  return createLogger({ level: opts.logLevel ?? "warn", pretty: true, name: "sengine" });
}

export async function loadScenario(path: string): Promise<Scenario> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidScenarioError(path, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  return parseScenario(raw);
}
