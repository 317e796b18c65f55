import { fromFixed } from "../utils/math.js";

/**
 * Output formatting for CLI commands.
 */

export function formatJson(data: unknown): string {
  return JSON.stringify(
    data,
    (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
    2,
  );
}

export function formatTable(
  headers: string[],
  rows: string[][],
): string {
  const colWidths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)),
  );

  const sep = colWidths.map((w) => "-".repeat(w)).join("-+-");
  const line = (cells: string[]) =>
    cells.map((c, i) => (c ?? "").padEnd(colWidths[i] ?? 0)).join(" | ").trimEnd();

  return [line(headers), sep, ...rows.map(line)].join("\n");
}

/** 18-decimal value as a fixed number of fraction digits, rounded down. */
export function formatUsd(value: bigint, digits = 2): string {
  const [whole, fraction = ""] = fromFixed(value).split(".");
  if (digits === 0) return whole ?? "0";
  return `${whole}.${fraction.padEnd(digits, "0").slice(0, digits)}`;
}

export function formatHealthFactor(value: bigint | null): string {
  return value === null ? "∞" : formatUsd(value, 4);
}

export function output(data: unknown, json: boolean): void {
  if (json || typeof data !== "string") {
    console.log(formatJson(data));
  } else {
    console.log(data);
  }
}
