export type JiraApiErrorKind = "unauthorized" | "forbidden" | "not_found" | "other";

export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";
}

export class TransportError extends Error {
  override readonly name = "TransportError";
}

export class ResponseParseError extends Error {
  override readonly name = "ResponseParseError";
}

export class JiraApiError extends Error {
  override readonly name = "JiraApiError";

  constructor(
    public readonly kind: JiraApiErrorKind,
    public readonly status: number,
    public readonly body: string
  ) {
    super(describeApiError(kind, status, body));
  }

  static fromStatus(status: number, body: string): JiraApiError {
    return new JiraApiError(kindForStatus(status), status, body);
  }
}

export type SearchError = TransportError | ResponseParseError | JiraApiError;

export function kindForStatus(status: number): JiraApiErrorKind {
  switch (status) {
    case 401:
      return "unauthorized";
    case 403:
      return "forbidden";
    case 404:
      return "not_found";
    default:
      return "other";
  }
}

function describeApiError(kind: JiraApiErrorKind, status: number, body: string): string {
  switch (kind) {
    case "unauthorized":
      return "Authentication failed. Check your JIRA_TOKEN.";
    case "forbidden":
      return "Access forbidden. You may not have permission to access this resource.";
    case "not_found":
      return "Resource not found. Check the Jira URL.";
    case "other":
      return `Request failed with status ${status}: ${body}`;
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
