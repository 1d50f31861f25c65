import { err, ok, ResultAsync, type Result } from "neverthrow";
import { Agent, fetch } from "undici";
import * as z from "zod/v4";
import type { JiraConfig } from "./config.js";
import { JiraApiError, ResponseParseError, TransportError, type SearchError } from "./errors.js";
import { buildSearchQuery } from "./jql.js";
import type { Issue, SearchQuery, SearchQueryOptions, SearchResult } from "./types.js";

export const SEARCH_PATH = "/rest/api/2/search";
export const MAX_ERROR_BODY_CHARS = 4_000;

const namedRefSchema = z
  .object({
    name: z.string().nullish()
  })
  .nullish();

const issueSchema = z.object({
  key: z.string(),
  fields: z
    .object({
      summary: z.string().nullish(),
      status: namedRefSchema,
      priority: namedRefSchema,
      updated: z.string().nullish()
    })
    .nullish()
});

const searchResponseSchema = z.object({
  total: z.number().int().nonnegative().nullish(),
  issues: z.array(issueSchema).nullish()
});

type JiraIssueResponse = z.infer<typeof issueSchema>;

type TimeoutPhase = "response" | "body";

export class JiraClient {
  constructor(private readonly config: JiraConfig) {}

  findIssuesAssignedTo(
    username: string,
    options: SearchQueryOptions = {}
  ): ResultAsync<SearchResult, SearchError> {
    return this.search(buildSearchQuery({ kind: "assignee", username }, options));
  }

  findIssuesByLabel(
    label: string,
    options: SearchQueryOptions = {}
  ): ResultAsync<SearchResult, SearchError> {
    return this.search(buildSearchQuery({ kind: "label", label }, options));
  }

  findIssuesByLabels(
    labels: [string, ...string[]],
    matchAll = false,
    options: SearchQueryOptions = {}
  ): ResultAsync<SearchResult, SearchError> {
    return this.search(buildSearchQuery({ kind: "labels", labels, matchAll }, options));
  }

  search(query: SearchQuery): ResultAsync<SearchResult, SearchError> {
    return new ResultAsync(this.execute(query));
  }

  buildSearchUrl(query: SearchQuery): URL {
    const url = new URL(`${this.config.baseUrl}${SEARCH_PATH}`);
    url.search = new URLSearchParams({
      jql: query.jql,
      maxResults: String(query.maxResults),
      fields: query.fields.join(",")
    }).toString();
    return url;
  }

  browseUrl(issueKey: string): string {
    return `${this.config.baseUrl}/browse/${issueKey}`;
  }

  private async execute(query: SearchQuery): Promise<Result<SearchResult, SearchError>> {
    const url = this.buildSearchUrl(query);
    const dispatcher = new Agent({
      connect: { timeout: this.config.connectTimeoutMs },
      headersTimeout: this.config.readTimeoutMs,
      bodyTimeout: this.config.readTimeoutMs
    });

    const controller = new AbortController();
    let phase: TimeoutPhase = "response";
    let timeout = setTimeout(() => controller.abort(), this.config.readTimeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${this.config.token}`,
          "Content-Type": "application/json",
          Accept: "application/json"
        },
        signal: controller.signal,
        dispatcher
      });
      controller.signal.throwIfAborted();

      clearTimeout(timeout);
      phase = "body";
      timeout = setTimeout(() => controller.abort(), this.config.readTimeoutMs);

      const body = await response.text();
      controller.signal.throwIfAborted();

      if (response.status !== 200) {
        return err(JiraApiError.fromStatus(response.status, body.slice(0, MAX_ERROR_BODY_CHARS)));
      }

      return parseSearchResponse(body);
    } catch (error) {
      return err(this.toTransportError(error, url, phase));
    } finally {
      clearTimeout(timeout);
      await dispatcher.close();
    }
  }

  private toTransportError(error: unknown, url: URL, phase: TimeoutPhase): TransportError {
    const code = undiciErrorCode(error);

    if (code === "UND_ERR_CONNECT_TIMEOUT") {
      return new TransportError(
        `Could not connect to Jira at ${url.host} within ${this.config.connectTimeoutMs}ms.`,
        { cause: error }
      );
    }

    if (code === "UND_ERR_HEADERS_TIMEOUT" || (phase === "response" && isAbortError(error))) {
      return new TransportError(
        `Jira did not respond within ${this.config.readTimeoutMs}ms (${url.host}).`,
        { cause: error }
      );
    }

    if (code === "UND_ERR_BODY_TIMEOUT" || isAbortError(error)) {
      return new TransportError(
        `Timed out reading the Jira response after ${this.config.readTimeoutMs}ms.`,
        { cause: error }
      );
    }

    const detail = error instanceof Error ? describeFetchFailure(error) : String(error);
    return new TransportError(`Could not reach Jira at ${url.host}: ${detail}`, { cause: error });
  }
}

export function parseSearchResponse(body: string): Result<SearchResult, ResponseParseError> {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ResponseParseError(`Jira returned malformed JSON: ${reason}`, { cause: error }));
  }

  const parsed = searchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    return err(new ResponseParseError(`Unexpected Jira search response: ${details}`));
  }

  const issues = (parsed.data.issues ?? []).map(toIssue);
  return ok({
    total: parsed.data.total ?? 0,
    issues
  });
}

function toIssue(issue: JiraIssueResponse): Issue {
  const fields = issue.fields;

  return {
    key: issue.key,
    summary: fields?.summary ?? "",
    status: fields?.status?.name ?? "Unknown",
    priority: fields?.priority?.name ?? "None",
    updated: fields?.updated ?? ""
  };
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

// fetch wraps undici failures in a TypeError whose cause carries the error code.
function undiciErrorCode(error: unknown): string | undefined {
  const candidates: unknown[] = [error, error instanceof Error ? error.cause : undefined];
  for (const candidate of candidates) {
    if (candidate instanceof Error && "code" in candidate && typeof candidate.code === "string") {
      return candidate.code;
    }
  }

  return undefined;
}

function describeFetchFailure(error: Error): string {
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message} (${cause.message})`;
  }

  return error.message;
}
