import { describe, expect, it } from "vitest";
import { DEFAULT_BASE_URL, loadJiraConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

const credentials = { JIRA_USERNAME: "jdoe", JIRA_TOKEN: "test-token" };

describe("loadJiraConfig", () => {
  it("fills in defaults around the required credentials", () => {
    const config = loadJiraConfig(credentials)._unsafeUnwrap();

    expect(config).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      username: "jdoe",
      token: "test-token",
      connectTimeoutMs: 10_000,
      readTimeoutMs: 30_000,
      defaultAssignee: "jdoe"
    });
  });

  it("fails when the username is missing", () => {
    const error = loadJiraConfig({ JIRA_TOKEN: "test-token" })._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.message).toBe("JIRA_USERNAME environment variable is not set");
  });

  it("fails when the token is blank", () => {
    const error = loadJiraConfig({ JIRA_USERNAME: "jdoe", JIRA_TOKEN: "   " })._unsafeUnwrapErr();

    expect(error.message).toBe("JIRA_TOKEN environment variable is not set");
  });

  it("reports the username first when both credentials are missing", () => {
    expect(loadJiraConfig({})._unsafeUnwrapErr().message).toBe(
      "JIRA_USERNAME environment variable is not set"
    );
  });

  it("strips trailing slashes from the base URL", () => {
    const config = loadJiraConfig({
      ...credentials,
      JIRA_BASE_URL: "https://tracker.example.org/"
    })._unsafeUnwrap();

    expect(config.baseUrl).toBe("https://tracker.example.org");
  });

  it("rejects a plain HTTP base URL", () => {
    const error = loadJiraConfig({
      ...credentials,
      JIRA_BASE_URL: "http://tracker.example.org"
    })._unsafeUnwrapErr();

    expect(error.message).toBe("JIRA_BASE_URL must use HTTPS.");
  });

  it("rejects an unparseable base URL", () => {
    const error = loadJiraConfig({ ...credentials, JIRA_BASE_URL: "not a url" })._unsafeUnwrapErr();

    expect(error.message).toBe(
      "JIRA_BASE_URL must be a valid URL, e.g. https://jira.example.com/jira"
    );
  });

  it("reads timeout overrides", () => {
    const config = loadJiraConfig({
      ...credentials,
      JIRA_CONNECT_TIMEOUT_MS: "2500",
      JIRA_READ_TIMEOUT_MS: "5000"
    })._unsafeUnwrap();

    expect(config.connectTimeoutMs).toBe(2500);
    expect(config.readTimeoutMs).toBe(5000);
  });

  it("rejects a non-integer timeout", () => {
    const error = loadJiraConfig({
      ...credentials,
      JIRA_READ_TIMEOUT_MS: "1.5"
    })._unsafeUnwrapErr();

    expect(error.message).toBe("JIRA_READ_TIMEOUT_MS must be a positive integer.");
  });

  it("uses JIRA_DEFAULT_ASSIGNEE when set", () => {
    const config = loadJiraConfig({
      ...credentials,
      JIRA_DEFAULT_ASSIGNEE: "release-bot"
    })._unsafeUnwrap();

    expect(config.defaultAssignee).toBe("release-bot");
  });
});
