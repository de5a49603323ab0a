import { describe, expect, it } from "vitest";
import { createMonitoringConfig, scrubRecord, scrubValue } from "../monitoring";

describe("createMonitoringConfig", () => {
  it("keeps remote sinks off in development by default", () => {
    const config = createMonitoringConfig({
      NODE_ENV: "development",
      SENTRY_DSN: "https://public@example.invalid/1",
      BETTER_STACK_TOKEN: "test-token",
    });

    expect(config.environment).toBe("development");
    expect(config.sentry.enabled).toBe(false);
    expect(config.logtail.enabled).toBe(false);
    expect(config.logLevel).toBe("debug");
  });

  it("enables sinks in production when credentials exist", () => {
    const config = createMonitoringConfig({
      APP_ENV: "production",
      SENTRY_DSN: "https://public@example.invalid/1",
      BETTER_STACK_TOKEN: "test-token",
      SENTRY_TRACES_SAMPLE_RATE: "0.5",
    });

    expect(config.sentry.enabled).toBe(true);
    expect(config.sentry.tracesSampleRate).toBe(0.5);
    expect(config.logtail.enabled).toBe(true);
    expect(config.logLevel).toBe("info");
  });

  it("reads the minimum log level case-insensitively", () => {
    expect(
      createMonitoringConfig({ ATTENTION_LOG_LEVEL: " WARN " }).logLevel,
    ).toBe("warn");
    expect(
      createMonitoringConfig({ ATTENTION_LOG_LEVEL: "verbose" }).logLevel,
    ).toBe("debug");
  });

  it("honours the development opt-in flags", () => {
    const config = createMonitoringConfig({
      ATTENTION_ENV: "development",
      SENTRY_DSN: "https://public@example.invalid/1",
      ENABLE_SENTRY_IN_DEV: "true",
    });

    expect(config.sentry.enabled).toBe(true);
    expect(config.sentry.tracesSampleRate).toBe(0.1);
  });

  it("stays disabled without credentials", () => {
    const config = createMonitoringConfig({ APP_ENV: "production" });

    expect(config.sentry.enabled).toBe(false);
    expect(config.logtail.enabled).toBe(false);
  });
});

describe("scrubbing", () => {
  it("redacts sensitive keys at any depth", () => {
    expect(
      scrubRecord({
        frameId: 12,
        candidateId: "c-1",
        session: { authToken: "test-secret", stage: "pupils" },
      }),
    ).toEqual({
      frameId: 12,
      candidateId: "[redacted]",
      session: { authToken: "[redacted]", stage: "pupils" },
    });
  });

  it("walks arrays and leaves primitives alone", () => {
    expect(scrubValue([{ password: "x" }, 3, null])).toEqual([
      { password: "[redacted]" },
      3,
      null,
    ]);
  });
});
