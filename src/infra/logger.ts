/**
 * Structured logger: thin pino wrapper with file output support.
 *
 * Log format: JSON with human-readable `level` (label) and `time` (ISO 8601).
 * This applies to ALL outputs (file, console, any transport) so logs are
 * always grep-friendly and human-scannable without extra tooling.
 */
import pino from "pino";
import type { TransportSingleOptions, TransportMultiOptions } from "pino";
import { existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { errorToString } from "./errors.ts";

// Bootstrap phase: read log level from env before config is available.
// Will be overridden when reinitLogger() is called with loaded config.
const bootLevel = process.env["LARDER_LOG_LEVEL"] ?? "info";

/**
 * Shared pino options for human-readable level and timestamp.
 *
 * NOTE: pino disallows `formatters.level` with multi-target transports,
 * so the label formatter is only applied in single-target (file-only) mode.
 * pino-pretty renders the level itself on the console.
 */
function createLoggerOptions(
  level: string,
  transport: TransportSingleOptions | TransportMultiOptions,
  isMultiTarget: boolean,
): pino.LoggerOptions {
  const opts: pino.LoggerOptions = {
    level,
    transport,
    base: undefined, // no pid/hostname
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!isMultiTarget) {
    opts.formatters = {
      level(label) {
        return { level: label };
      },
    };
  }

  return opts;
}

/**
 * Remove rotated log files (e.g. larder.log.2026-01-15) older than the retention period.
 */
function cleanupOldLogs(logFile: string, retentionDays = 30): void {
  const logDir = dirname(logFile);
  if (!existsSync(logDir)) return;

  const rotatedLogPattern = new RegExp(`^${basename(logFile).replace(/\./g, "\\.")}\\.`);
  const retentionMs = retentionDays * 24 * 60 * 60 * 1000;
  const now = Date.now();

  try {
    for (const file of readdirSync(logDir)) {
      if (!rotatedLogPattern.test(file)) continue;
      const filePath = join(logDir, file);
      if (now - statSync(filePath).mtimeMs > retentionMs) {
        unlinkSync(filePath);
      }
    }
  } catch (err) {
    // The logger is not up yet; report on stderr and keep starting.
    process.stderr.write(`larder: log cleanup skipped: ${errorToString(err)}\n`);
  }
}

/**
 * Resolve transports based on environment and configuration.
 * File logging is always enabled. Console output is optional.
 */
export function resolveTransports(
  nodeEnv: string | undefined,
  logFile: string,
  logConsoleEnabled?: boolean,
): { transport: TransportSingleOptions | TransportMultiOptions; isMultiTarget: boolean } {
  const transports: TransportSingleOptions[] = [];

  if (logConsoleEnabled) {
    if (nodeEnv !== "production") {
      transports.push({
        target: "pino-pretty",
        options: { colorize: true },
      });
    } else {
      transports.push({
        target: "pino/file",
        options: { destination: 1 }, // stdout
      });
    }
  }

  const logDir = dirname(logFile);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }
  cleanupOldLogs(logFile, 30);

  transports.push({
    target: "pino-roll",
    options: {
      file: logFile,
      frequency: "daily",
      size: "10m",
      mkdir: true,
    },
  });

  const [only] = transports;
  if (transports.length === 1 && only) {
    return { transport: only, isMultiTarget: false };
  }

  return {
    transport: { targets: transports },
    isMultiTarget: true,
  };
}

function buildLogger(
  level: string,
  logFile: string,
  logConsoleEnabled: boolean,
  nodeEnv: string | undefined,
): pino.Logger {
  // "silent" needs no sink; tests run with it so no transport worker is spawned.
  if (level === "silent") {
    return pino({ level: "silent" });
  }
  const { transport, isMultiTarget } = resolveTransports(nodeEnv, logFile, logConsoleEnabled);
  return pino(createLoggerOptions(level, transport, isMultiTarget));
}

/**
 * Initialize the root logger.
 *
 * Bootstrap phase: config is not yet loaded, so env vars are read directly.
 * reinitLogger() replaces it once settings are available.
 */
function initRootLogger(): pino.Logger {
  const dataDir = process.env["LARDER_DATA_DIR"] || "data";
  return buildLogger(
    bootLevel,
    join(dataDir, "logs/larder.log"),
    process.env["LARDER_LOG_CONSOLE_ENABLED"] === "true",
    process.env["NODE_ENV"],
  );
}

const rootLogger = initRootLogger();

/**
 * Get a child logger with a module name.
 */
export function getLogger(name: string): pino.Logger {
  return rootLogger.child({ module: name });
}

/**
 * Reinitialize logger with loaded configuration (called by config.ts after settings are ready).
 * All parameters come from config: no direct env var reads.
 */
export function reinitLogger(
  logFile: string,
  opts: { level?: string; logConsoleEnabled?: boolean; nodeEnv?: string } = {},
): void {
  const newLogger = buildLogger(
    opts.level ?? rootLogger.level,
    logFile,
    opts.logConsoleEnabled ?? false,
    opts.nodeEnv,
  );

  // Child loggers inherit from the root, so swapping its internals re-targets them too.
  Object.assign(rootLogger, newLogger);
  rootLogger.level = newLogger.level;
}

export { rootLogger };
