import { DEFAULT_ENDPOINT_URL, isTimeUnit, type TimeUnit } from "@docsubmit/submission-client";

export interface AppConfig {
  port: number;
  host: string;
  controlAuthToken: string;
  submissionEndpointUrl: string;
  throttlePeriod: TimeUnit;
  throttleLimit: number;
  acquireTimeoutMs: number;
  transportTimeoutMs: number;
  logLevel: string;
  prettyLogs: boolean;
}

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var ${name}`);
  }
  return value;
}

function stringEnv(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

function numberEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed;
}

function timeUnitEnv(name: string, fallback: TimeUnit): TimeUnit {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  if (!isTimeUnit(value)) {
    throw new Error(`Invalid time unit env var ${name}: ${value}`);
  }
  return value;
}

function booleanEnv(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  if (value === "true" || value === "1") {
    return true;
  }
  if (value === "false" || value === "0") {
    return false;
  }
  throw new Error(`Invalid boolean env var ${name}: ${value}`);
}

export function loadConfig(): AppConfig {
  return {
    port: numberEnv("PORT", 8080),
    host: stringEnv("HOST", "0.0.0.0"),
    controlAuthToken: required("CONTROL_AUTH_TOKEN"),
    submissionEndpointUrl: stringEnv("SUBMISSION_ENDPOINT_URL", DEFAULT_ENDPOINT_URL),
    throttlePeriod: timeUnitEnv("THROTTLE_PERIOD", "minute"),
    throttleLimit: numberEnv("THROTTLE_LIMIT", 100),
    acquireTimeoutMs: numberEnv("ACQUIRE_TIMEOUT_MS", 120_000),
    transportTimeoutMs: numberEnv("TRANSPORT_TIMEOUT_MS", 30_000),
    logLevel: stringEnv("LOG_LEVEL", "info"),
    prettyLogs: booleanEnv("PRETTY_LOGS", process.env.NODE_ENV !== "production"),
  };
}
