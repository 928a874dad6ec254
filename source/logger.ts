import { join } from "node:path";
import pino from "pino";
import { appDirectory } from "./config.ts";

// Created on first use so that rendering without any log call never opens a
// file.
let loggerInstance: pino.Logger | null = null;

function loggingDisabled(): boolean {
  // The prompt is printed on stdout, so logs only ever go to a file, and
  // never while the Node.js test runner is driving the process.
  return (
    process.env["PROMPT_PATH_LOG"] === "off" ||
    process.env["NODE_TEST_CONTEXT"] !== undefined
  );
}

function silentLogger(): pino.Logger {
  return pino({
    level: "silent",
    enabled: false,
  });
}

function createLogger(): pino.Logger {
  if (loggingDisabled()) {
    return silentLogger();
  }
  let destination: ReturnType<typeof pino.transport>;
  try {
    destination = pino.transport({
      target: "pino-roll",
      options: {
        file: join(appDirectory().ensurePathSync("logs"), "prompt-path.log"),
        size: "10m",
        symlink: true,
        limit: {
          count: 3,
        },
        mkdir: true,
      },
    });
  } catch {
    // No writable log directory: a log call must never break the prompt.
    return silentLogger();
  }
  return pino(
    {
      level: process.env["LOG_LEVEL"] ?? "warn",
      formatters: {
        level: (label) => {
          return { level: label.toUpperCase() };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}

function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}

export const logger = {
  warn: (obj: object, msg?: string) => getLogger().warn(obj, msg),
  error: (obj: object, msg?: string) => getLogger().error(obj, msg),
};
