import { Command } from "commander";
import { DEFAULT_PARAMS } from "../config.js";
import { calculateHealthFactor, HEALTH_FACTOR_MAX } from "../solvency/guard.js";
import { toFixed } from "../utils/math.js";
import { createCliLogger, loadScenario } from "./context.js";
import { formatHealthFactor, formatTable, formatUsd, output } from "./output.js";
import { runScenario } from "./scenario.js";

interface ProgramOptions {
  logLevel?: string;
  json?: boolean;
}

function parseDecimal(raw: string, label: string): bigint {
  if (!/^\d+(\.\d+)?$/.test(raw)) {
    throw new Error(`Invalid ${label} "${raw}". Expected a non-negative decimal number.`);
  }
  return toFixed(raw);
}

function parsePercent(raw: string, label: string): bigint {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0 || value > 100) {
    throw new Error(`Invalid ${label} "${raw}". Expected an integer between 1 and 100.`);
  }
  return BigInt(value);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("sengine")
    .description("Collateral-backed synthetic dollar engine: scenario runner and calculators")
    .version("0.1.0")
    .option("--log-level <level>", "Log level", "warn")
    .option("--json", "Output as JSON", false);

  program
    .command("simulate")
    .description("Replay a JSON scenario against an in-memory engine")
    .argument("<file>", "Scenario file")
    .action(async (file: string) => {
      const opts = program.opts<ProgramOptions>();
      const scenario = await loadScenario(file);
      const report = await runScenario(scenario, createCliLogger(opts));

      if (opts.json) {
        output(report, true);
      } else {
        console.log(`\nScenario: ${file}`);
        console.log("=".repeat(60));
        for (const outcome of report.outcomes) {
          const status = outcome.ok ? "ok" : `FAILED ${outcome.error}`;
          const mismatch = outcome.mismatch ? `  <-- ${outcome.mismatch}` : "";
          console.log(`  #${outcome.index} ${outcome.op}: ${status}${mismatch}`);
        }
        console.log("");
        console.log(formatTable(
          ["Account", "Debt", "Collateral USD", "Health"],
          report.accounts.map((a) => [
            a.account,
            formatUsd(a.debt),
            formatUsd(a.collateralUsd),
            formatHealthFactor(a.healthFactor),
          ]),
        ));
      }

      if (report.mismatches > 0) {
        process.exitCode = 1;
      }
    });

  program
    .command("health")
    .description("Compute a health factor from a collateral value and a debt")
    .argument("<collateralUsd>", "Collateral value in USD")
    .argument("<debt>", "Outstanding debt")
    .option(
      "-t, --threshold <pct>",
      "Liquidation threshold in percent",
      DEFAULT_PARAMS.liquidationThresholdPct.toString(),
    )
    .action((collateralRaw: string, debtRaw: string, cmdOpts: { threshold: string }) => {
      const opts = program.opts<ProgramOptions>();
      const hf = calculateHealthFactor(
        parseDecimal(debtRaw, "debt"),
        parseDecimal(collateralRaw, "collateral value"),
        parsePercent(cmdOpts.threshold, "threshold"),
      );
      const value = hf === HEALTH_FACTOR_MAX ? null : hf;
      if (opts.json) {
        output({ healthFactor: value, liquidatable: value !== null && value < DEFAULT_PARAMS.minHealthFactor }, true);
        return;
      }
      console.log(`Health factor: ${formatHealthFactor(value)}`);
    });

  return program;
}
