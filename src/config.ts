import { err, ok, Result } from "neverthrow";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://jira.example.com/jira";
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
export const DEFAULT_READ_TIMEOUT_MS = 30_000;

export interface JiraConfig {
  baseUrl: string;
  username: string;
  token: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  defaultAssignee: string;
}

export function loadJiraConfig(
  env: NodeJS.ProcessEnv = process.env
): Result<JiraConfig, ConfigurationError> {
  return Result.combine([
    readRequired(env.JIRA_USERNAME, "JIRA_USERNAME"),
    readRequired(env.JIRA_TOKEN, "JIRA_TOKEN"),
    normalizeBaseUrl(normalizeOptional(env.JIRA_BASE_URL) ?? DEFAULT_BASE_URL),
    readTimeout(env.JIRA_CONNECT_TIMEOUT_MS, "JIRA_CONNECT_TIMEOUT_MS", DEFAULT_CONNECT_TIMEOUT_MS),
    readTimeout(env.JIRA_READ_TIMEOUT_MS, "JIRA_READ_TIMEOUT_MS", DEFAULT_READ_TIMEOUT_MS)
  ]).map(([username, token, baseUrl, connectTimeoutMs, readTimeoutMs]) => ({
    baseUrl,
    username,
    token,
    connectTimeoutMs,
    readTimeoutMs,
    defaultAssignee: normalizeOptional(env.JIRA_DEFAULT_ASSIGNEE) ?? username
  }));
}

function readTimeout(
  raw: string | undefined,
  name: string,
  fallback: number
): Result<number, ConfigurationError> {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return ok(fallback);
  }

  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return err(new ConfigurationError(`${name} must be a positive integer.`));
  }

  return ok(parsed);
}

function normalizeBaseUrl(raw: string): Result<string, ConfigurationError> {
  const trimmed = raw.trim().replace(/\/+$/, "");

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return err(
      new ConfigurationError("JIRA_BASE_URL must be a valid URL, e.g. https://jira.example.com/jira")
    );
  }

  if (parsed.protocol !== "https:") {
    return err(new ConfigurationError("JIRA_BASE_URL must use HTTPS."));
  }

  return ok(parsed.toString().replace(/\/+$/, ""));
}

function normalizeOptional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readRequired(value: string | undefined, name: string): Result<string, ConfigurationError> {
  const trimmed = value?.trim();
  if (!trimmed) {
    return err(new ConfigurationError(`${name} environment variable is not set`));
  }

  return ok(trimmed);
}
