import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
} from "pino";

export type { Logger } from "pino";

export interface LoggerConfig {
  /** Service name for log identification */
  service: string;
  /** Log level (default: "info") */
  level?: string;
  /** App version for log metadata */
  version?: string;
  /** Environment name (default: "development") */
  environment?: string;
  /** Enable pretty printing (default: only in development) */
  pretty?: boolean;
  /** Custom message format for pretty printing */
  messageFormat?: string;
  /** Fields to ignore in pretty output */
  ignoreFields?: string;
  /** Where JSON lines go when not pretty printing (default: stdout) */
  destination?: DestinationStream;
}

/**
 * Creates a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    service,
    level = "info",
    version = "0.1.0",
    environment = "development",
    pretty = environment === "development",
    messageFormat = "[{module}] {msg}",
    ignoreFields = "pid,hostname,service,version,environment",
    destination = process.stdout,
  } = config;

  const base = {
    service,
    version,
    environment,
  };

  const options: LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ level: label }),
      log: (object) => ({
        ...object,
        ...base,
      }),
    },
  };

  if (pretty) {
    return pino(
      options,
      pino.transport({
        target: "pino-pretty",
        options: {
          destination: 1, // stdout
          colorize: true,
          translateTime: "SYS:standard",
          messageFormat,
          ignore: ignoreFields,
        },
      }),
    );
  }

  return pino(options, destination);
}

/**
 * Creates a child logger with an additional context field
 * @param parent - The parent logger instance
 * @param name - The name/module identifier for this child logger
 * @param contextKey - The key to use for the context (default: "module")
 */
export function createChildLogger(
  parent: Logger,
  name: string,
  contextKey = "module",
): Logger {
  return parent.child({ [contextKey]: name });
}
