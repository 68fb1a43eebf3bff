import pino from "pino";
import { LOG_FILE_NAME } from "../constants/naming.js";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVELS: readonly pino.LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function resolveLevel(raw: string | undefined): pino.LevelWithSilent {
  const level = raw?.trim().toLowerCase();
  return LEVELS.find((candidate) => candidate === level) ?? "info";
}

// stdout carries the stdio transport, so logs always go to stderr.
function createDestination(level: pino.LevelWithSilent): pino.DestinationStream {
  const stderr = pino.destination({ dest: 2, sync: true });
  if (level === "silent" || process.env.LOG_TO_FILE?.toLowerCase() !== "true") {
    return stderr;
  }
  return pino.multistream([
    { level, stream: stderr },
    { level, stream: pino.destination({ dest: LOG_FILE_NAME, sync: false }) },
  ]);
}

const level = resolveLevel(process.env.LOGGING_LEVEL);

const rootLogger = pino(
  {
    name: process.env.LOGGER_NAME || "assisted-installer-mcp",
    level,
    redact: {
      paths: [
        "pull_secret",
        "*.pull_secret",
        "ssh_public_key",
        "*.ssh_public_key",
        "offlineToken",
        "accessToken",
        "refresh_token",
        "authorization",
        "*.authorization",
      ],
      censor: "***",
    },
  },
  createDestination(level),
);

export function getLogger(component: string): Logger {
  const child = rootLogger.child({ component });
  return {
    debug: (message, context) => child.debug(context ?? {}, message),
    info: (message, context) => child.info(context ?? {}, message),
    warn: (message, context) => child.warn(context ?? {}, message),
    error: (message, context) => child.error(context ?? {}, message),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
