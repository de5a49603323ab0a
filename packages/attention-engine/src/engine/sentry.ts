import * as Sentry from "@sentry/node";
import type { NodeOptions } from "@sentry/node";
import { monitoringConfig, scrubRecord } from "../shared/config/monitoring";
import { getLogger } from "../shared/logger";

const logger = getLogger("sentry-engine");

let engineSentryInitialised = false;

type BeforeSend = NonNullable<NodeOptions["beforeSend"]>;

const beforeSend: BeforeSend = (event) => ({
  ...event,
  request: undefined,
  extra: event.extra ? scrubRecord(event.extra) : undefined,
  breadcrumbs: event.breadcrumbs?.map((breadcrumb) =>
    breadcrumb.data
      ? { ...breadcrumb, data: scrubRecord(breadcrumb.data) }
      : breadcrumb,
  ),
  user:
    event.user?.id !== undefined ? { id: String(event.user.id) } : undefined,
});

export const initEngineSentry = (): boolean => {
  if (engineSentryInitialised) {
    return true;
  }
  if (!monitoringConfig.sentry.enabled) {
    logger.debug("Engine Sentry disabled by configuration");
    return false;
  }

  Sentry.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
    beforeSend,
  });
  Sentry.setTag("process", "engine");

  engineSentryInitialised = true;
  return true;
};

export type EngineExceptionContext = Record<string, unknown>;

export const captureEngineException = (
  error: unknown,
  context: EngineExceptionContext = {},
) => {
  if (!engineSentryInitialised && !initEngineSentry()) {
    return;
  }

  const normalisedError =
    error instanceof Error ? error : new Error(String(error));

  Sentry.captureException(normalisedError, { extra: context });
};
