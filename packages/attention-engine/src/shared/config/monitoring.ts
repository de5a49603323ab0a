import { parseBooleanFlag } from "../env";

type Environment = string;
type RuntimeEnv = Record<string, string | undefined>;

const getProcessEnv = (): RuntimeEnv | undefined => {
  if (typeof process === "undefined") {
    return undefined;
  }
  return process.env;
};

const resolveEnvironment = (env: RuntimeEnv): Environment => {
  const explicitEnv = env.APP_ENV ?? env.ATTENTION_ENV;

  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv;
  }

  const nodeEnv = env.NODE_ENV ?? "development";
  if (nodeEnv && nodeEnv.trim().length > 0) {
    return nodeEnv;
  }

  return "development";
};

// Candidate identifiers and session tokens travel in frame context metadata.
const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "auth",
  "candidate",
  "email",
  "phone",
];

const isSensitiveKey = (key: string): boolean => {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey));
};

export const scrubValue = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (typeof value === "object") {
    const result: Record<string, unknown> = {};

    Object.entries(value).forEach(([key, nestedValue]) => {
      if (isSensitiveKey(key)) {
        result[key] = "[redacted]";
        return;
      }

      result[key] = scrubValue(nestedValue);
    });

    return result;
  }

  if (typeof value === "string" && isSensitiveKey(value)) {
    return "[redacted]";
  }

  return value;
};

export const scrubRecord = (
  record: Record<string, unknown>,
): Record<string, unknown> => {
  const result: Record<string, unknown> = {};
  Object.entries(record).forEach(([key, nestedValue]) => {
    result[key] = isSensitiveKey(key) ? "[redacted]" : scrubValue(nestedValue);
  });
  return result;
};

export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

// Per-frame debug lines are noisy, so deployed sessions start at info.
const resolveLogLevel = (
  raw: string | undefined,
  isProductionLike: boolean,
): LogLevel => {
  const normalized = raw?.trim().toLowerCase() ?? "";
  if (isLogLevel(normalized)) {
    return normalized;
  }
  return isProductionLike ? "info" : "debug";
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  logLevel: LogLevel;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
  };
  logtail: {
    token: string;
    enabled: boolean;
  };
};

export const createMonitoringConfig = (
  runtimeEnv: RuntimeEnv = getProcessEnv() ?? {},
): MonitoringConfig => {
  const environment = resolveEnvironment(runtimeEnv);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = runtimeEnv.SENTRY_DSN ?? "";
  const sentryEnabled =
    Boolean(sentryDsn) &&
    (isProductionLike ||
      parseBooleanFlag(runtimeEnv.ENABLE_SENTRY_IN_DEV, false));

  const logtailToken = runtimeEnv.BETTER_STACK_TOKEN ?? "";
  const logtailEnabled =
    Boolean(logtailToken) &&
    (isProductionLike ||
      parseBooleanFlag(runtimeEnv.ENABLE_BETTER_STACK_IN_DEV, false));

  return {
    environment,
    release: runtimeEnv.npm_package_version,
    logLevel: resolveLogLevel(
      runtimeEnv.ATTENTION_LOG_LEVEL,
      isProductionLike,
    ),
    sentry: {
      dsn: sentryDsn,
      enabled: sentryEnabled,
      tracesSampleRate: (() => {
        const parsedValue = Number.parseFloat(
          runtimeEnv.SENTRY_TRACES_SAMPLE_RATE ?? "0.1",
        );
        return Number.isNaN(parsedValue) ? 0.1 : parsedValue;
      })(),
    },
    logtail: {
      token: logtailToken,
      enabled: logtailEnabled,
    },
  };
};

export const monitoringConfig: MonitoringConfig = createMonitoringConfig();
