import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  /** Bound to every line as `name`. */
  name?: string;
}

function prettyTransportAvailable(): boolean {
  try {
    import.meta.resolve("pino-pretty");
    return true;
  } catch {
    return false;
  }
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const usePretty = opts.pretty === true && prettyTransportAvailable();
  return pino({
    name: opts.name ?? "stable-engine",
    level: opts.level ?? "info",
    // bigint amounts are not JSON-serializable
    formatters: {
      log: (fields) => stringifyBigints(fields),
    },
    transport: usePretty
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
  });
}

function stringifyBigints(fields: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}
