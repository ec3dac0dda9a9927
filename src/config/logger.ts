/**
 * Logger setup
 * Pino-based logging
 *
 * Features:
 * - Console + file output with the same content
 * - One log file per process (SERVICE_NAME)
 * - Daily rotation into date directories
 * - Structured JSON
 *
 * Console:
 * - Everything at or above LOG_LEVEL
 * - development + LOG_PRETTY=true: coloured lines
 * - otherwise: JSON
 *
 * Files (date directory + per service):
 * - logs/YYYY-MM-DD/server.log (API server)
 * - logs/YYYY-MM-DD/checker.log (status check runner)
 * - logs/YYYY-MM-DD/error.log (all errors)
 * - disabled when NODE_ENV=test or LOG_TO_FILE=false
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getTimestampWithTimezone } from "@/utils/timestamp";

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL || (NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = NODE_ENV !== "test" && process.env.LOG_TO_FILE !== "false";
const SERVICE_NAME = process.env.SERVICE_NAME || "server";

/**
 * Date directory name (YYYY-MM-DD)
 */
function getDateDir(): string {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Log file inside the date directory
 * Layout: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateDir();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: LOG_DIR,
      maxFiles: 90,
      maxSize: "100M",
    },
  );
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "listing_status_tracker",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

const serviceStreams = new Map<string, RotatingFileStream>();

function getOrCreateStream(serviceName: string): RotatingFileStream {
  const existing = serviceStreams.get(serviceName);
  if (existing) {
    return existing;
  }
  const stream = createRotatingStream(serviceName);
  serviceStreams.set(serviceName, stream);
  return stream;
}

/**
 * Routes each line to its service file
 * Errors are copied into error.log, skip_file_log lines stay on the console
 */
class ServiceRoutingStream implements DestinationStream {
  private errorStream: RotatingFileStream | null = null;

  write(chunk: string): boolean {
    let serviceName = "server";
    let isError = false;
    let skipFile = false;

    try {
      const parsed: unknown = JSON.parse(chunk);
      if (typeof parsed === "object" && parsed !== null) {
        if ("service_name" in parsed && typeof parsed.service_name === "string") {
          serviceName = parsed.service_name;
        }
        if ("level" in parsed) {
          isError = parsed.level === "error" || parsed.level === "fatal";
        }
        skipFile = "skip_file_log" in parsed && parsed.skip_file_log === true;
      }
    } catch {
      // unparseable lines go to server.log
      serviceName = "server";
    }

    // console only (health checks)
    if (skipFile) {
      return true;
    }

    if (isError) {
      if (!this.errorStream) {
        this.errorStream = createRotatingStream("error");
      }
      this.errorStream.write(chunk);
    }

    getOrCreateStream(serviceName).write(chunk);
    return true;
  }
}

const LOG_LEVELS = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
} as const;

const shouldLogToConsole = (level: number): boolean => {
  const levelThreshold =
    LOG_LEVEL === "debug"
      ? LOG_LEVELS.DEBUG
      : LOG_LEVEL === "info"
        ? LOG_LEVELS.INFO
        : LOG_LEVEL === "warn"
          ? LOG_LEVELS.WARN
          : LOG_LEVELS.ERROR;
  return level >= levelThreshold;
};

type ConsoleFormatter = (logObj: Record<string, unknown>, level: number) => void;

/**
 * Development console (colours)
 */
const formatConsolePretty: ConsoleFormatter = (logObj, level) => {
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";
  const star = logObj.important === true ? " ⭐" : "";
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR
      ? "\x1b[31m"
      : level >= LOG_LEVELS.WARN
        ? "\x1b[33m"
        : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : "INFO";

  console.error(
    `[${time}] ${levelColor}${levelText}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
  );

  const excludedFields = ["msg", "important", "skip_file_log"];
  for (const field of Object.keys(logObj)) {
    if (excludedFields.includes(field)) continue;
    const value = logObj[field];
    const rendered =
      typeof value === "object"
        ? JSON.stringify(value, null, 2)
            .split("\n")
            .map((l) => "  " + l)
            .join("\n")
        : String(value);
    console.error(`  ${field}: ${rendered}`);
  }
};

/**
 * Production console (JSON)
 */
const formatConsoleJson: ConsoleFormatter = (logObj, level) => {
  console.log(JSON.stringify({ ...logObj, level }));
};

function createConsoleHook(
  formatter: ConsoleFormatter,
): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      // logger.info(msg) or logger.info({ ... }, msg)
      const [first, second] = inputArgs;
      const logObj: Record<string, unknown> = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      if (shouldLogToConsole(level)) {
        formatter(logObj, level);
      }
    },
  };
}

function createLogger(): pino.Logger {
  if (NODE_ENV === "test") {
    return pino({ ...baseConfig, level: process.env.LOG_LEVEL || "silent" });
  }

  const formatter =
    NODE_ENV === "development" && LOG_PRETTY
      ? formatConsolePretty
      : formatConsoleJson;
  const hooks = createConsoleHook(formatter);

  if (!LOG_TO_FILE) {
    // console only: the hook prints, the destination discards
    return pino({ ...baseConfig, hooks }, { write: () => undefined });
  }

  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }

  const streams: pino.StreamEntry[] = [
    { level: "debug", stream: new ServiceRoutingStream() },
  ];
  return pino({ ...baseConfig, hooks }, pino.multistream(streams));
}

const logger = createLogger();

export { logger };

export type Logger = pino.Logger;
