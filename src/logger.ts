/**
 * Centralized Logger
 *
 * Provides a shared pino logger. Pretty output when attached to a terminal
 * (or LOG_PRETTY=true), newline-delimited JSON otherwise so log shippers can
 * parse it. Quiet under Vitest unless LOG_LEVEL says otherwise.
 */
import pino from "pino";
import { config } from "./config";

function resolveLevel(): string {
  if (config.LOG_LEVEL) return config.LOG_LEVEL;
  return process.env.VITEST ? "silent" : "info";
}

/**
 * Pretty output is for humans at a terminal
 */
function shouldPrettyPrint(): boolean {
  if (process.env.VITEST) return false;
  return config.LOG_PRETTY ?? process.stdout.isTTY ?? false;
}

/**
 * Create the appropriate logger for the current environment
 */
function createLogger(): pino.Logger {
  const level = resolveLevel();

  if (shouldPrettyPrint()) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    });
  }

  return pino({ level });
}

// Create and export the singleton logger
export const logger = createLogger();

/**
 * Child logger bound to a component name
 */
export function componentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
