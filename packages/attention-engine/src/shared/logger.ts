/* eslint-disable no-console */
// Console output mirrors the structured payload shipped to Better Stack.
import {
  LOG_LEVELS,
  type LogLevel,
  monitoringConfig,
} from "./config/monitoring";

export type LoggerProcessType = "engine" | "host";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  processType: LoggerProcessType;
  minLevel?: LogLevel;
};

const levelRank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

type LogtailAdapter = {
  log: (
    message: string,
    level: LogLevel,
    metadata: LoggerMetadata,
  ) => Promise<void>;
  flush?: () => Promise<void>;
};

const createLogtailAdapter = (client: object): LogtailAdapter => {
  const log = async (
    message: string,
    level: LogLevel,
    metadata: LoggerMetadata,
  ) => {
    const logFn: unknown = Reflect.get(client, "log");
    if (typeof logFn !== "function") {
      return;
    }

    // Better Stack has no "fatal" level; it is reported as error.
    const logtailLevel = level === "fatal" ? "error" : level;
    await Reflect.apply(logFn, client, [message, logtailLevel, metadata]);
  };

  const flushFn: unknown = Reflect.get(client, "flush");
  const flush =
    typeof flushFn === "function"
      ? async () => {
          await Reflect.apply(flushFn, client, []);
        }
      : undefined;

  return { log, flush };
};

let logtailInstance: Promise<LogtailAdapter | null> | null = null;

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
};

const loadLogtail = async (): Promise<LogtailAdapter | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return null;
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail } = await import("@logtail/node");
      const client = new Logtail(monitoringConfig.logtail.token);
      return createLogtailAdapter(client);
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

export const formatConsolePayload = (
  level: LogLevel,
  message: string,
  metadata?: LoggerMetadata,
) => {
  const timestamp = new Date().toISOString();
  return [
    `[${timestamp}] [${level.toUpperCase()}] ${message}`,
    metadata ?? {},
  ] as const;
};

const emitLogtail = async (
  message: string,
  level: LogLevel,
  metadata: LoggerMetadata,
) => {
  try {
    const instance = await loadLogtail();
    if (!instance) {
      return;
    }

    await instance.log(message, level, metadata);
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  (options: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    const { module, processType } = options;
    const minLevel = options.minLevel ?? monitoringConfig.logLevel;
    if (levelRank(level) < levelRank(minLevel)) {
      return;
    }

    const enrichedMetadata = {
      ...metadata,
      module,
      processType,
      environment: monitoringConfig.environment,
      level,
    };

    const [consoleMessage, consoleMetadata] = formatConsolePayload(
      level,
      message,
      enrichedMetadata,
    );

    consoleWriters[level](consoleMessage, consoleMetadata);

    if (monitoringConfig.logtail.enabled) {
      void emitLogtail(message, level, enrichedMetadata);
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const debug = createEmitter(options, "debug");
  const info = createEmitter(options, "info");
  const warn = createEmitter(options, "warn");
  const error = createEmitter(options, "error");
  const fatal = createEmitter(options, "fatal");

  const flush = async () => {
    const instance = await loadLogtail();
    await instance?.flush?.();
  };

  return {
    debug,
    info,
    warn,
    error,
    fatal,
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (
  module: string,
  processType: LoggerProcessType = "engine",
): Logger => {
  const cacheKey = `${processType}:${module}`;

  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, processType });
  loggerCache.set(cacheKey, logger);
  return logger;
};
