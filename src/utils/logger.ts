import pino from "pino";
import { parseLogLevel } from "../config/env.js";

let _logger: pino.Logger | null = null;

/** Process-wide logger. Writes to stderr so stdout stays free for CLI output. */
export function getLogger(): pino.Logger {
  if (_logger) return _logger;
  _logger = pino(
    {
      name: "pinpoint-review",
      level: parseLogLevel(process.env.LOG_LEVEL),
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.destination(2)
  );
  return _logger;
}

export function createChildLogger(
  bindings: Record<string, unknown>
): pino.Logger {
  return getLogger().child(bindings);
}
