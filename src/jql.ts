import type { FilterIntent, SearchQuery, SearchQueryOptions } from "./types.js";

export const DEFAULT_MAX_RESULTS = 50;

export const DEFAULT_SEARCH_FIELDS: readonly string[] = [
  "summary",
  "status",
  "assignee",
  "priority",
  "created",
  "updated"
];

const ORDER_BY_UPDATED = "ORDER BY updated DESC";

export function buildSearchQuery(
  intent: FilterIntent,
  options: SearchQueryOptions = {}
): SearchQuery {
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  if (!Number.isInteger(maxResults) || maxResults <= 0) {
    throw new RangeError(`maxResults must be a positive integer, got ${maxResults}.`);
  }

  return Object.freeze({
    jql: buildJql(intent),
    maxResults,
    fields: Object.freeze([...(options.fields ?? DEFAULT_SEARCH_FIELDS)])
  });
}

export function buildJql(intent: FilterIntent): string {
  switch (intent.kind) {
    case "assignee":
      // Unquoted on purpose: Jira reads a bare literal as a user identifier.
      return `assignee = ${intent.username} ${ORDER_BY_UPDATED}`;
    case "label":
      return `${labelClause(intent.label)} ${ORDER_BY_UPDATED}`;
    case "labels": {
      const operator = intent.matchAll ? " AND " : " OR ";
      const conditions = intent.labels.map(labelClause).join(operator);
      return `(${conditions}) ${ORDER_BY_UPDATED}`;
    }
  }
}

export function describeFilter(intent: FilterIntent): string {
  switch (intent.kind) {
    case "assignee":
      return `assignee=${intent.username}`;
    case "label":
      return `label=${intent.label}`;
    case "labels":
      return `labels(${intent.matchAll ? "all" : "any"})=${intent.labels.join(",")}`;
  }
}

// Embedded double quotes are not escaped.
function labelClause(label: string): string {
  return `labels = "${label}"`;
}
