import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for both local dev and AWS Lambda.
 * - Local/dev: pretty-printed logs for readability
 * - Lambda/prod: JSON logs for CloudWatch
 * - Tests: silent unless LOG_LEVEL is set
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

// Lambda events are logged under `event`; their headers carry bearer tokens
export const REDACT_OPTIONS = {
  paths: [
    "*.password",
    "*.secret",
    "*.token",
    "*.apiKey",
    "event.headers.authorization",
    "event.headers.Authorization",
    "event.multiValueHeaders.authorization",
    "event.multiValueHeaders.Authorization",
  ],
  remove: true,
};

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "glossary-lookup",
    stage: getStage(),
  },
  redact: REDACT_OPTIONS,
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const transport =
  isLocal() && !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
        },
      }
    : undefined;

const rootLogger: Logger = pino({ ...baseOptions, transport });

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger augmented with AWS Lambda request context fields.
 * Use inside Lambda handlers when `context` is available.
 */
export function withRequestContext(
  moduleName: string | undefined,
  request: {
    awsRequestId?: string;
    functionName?: string;
    functionVersion?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    requestId: request.awsRequestId,
    functionName: request.functionName,
    functionVersion: request.functionVersion,
  });
}
