export type FilterIntent =
  | { kind: "assignee"; username: string }
  | { kind: "label"; label: string }
  | { kind: "labels"; labels: [string, ...string[]]; matchAll: boolean };

export interface SearchQuery {
  readonly jql: string;
  readonly maxResults: number;
  readonly fields: readonly string[];
}

export interface SearchQueryOptions {
  maxResults?: number;
  fields?: readonly string[];
}

export interface Issue {
  key: string;
  summary: string;
  status: string;
  priority: string;
  updated: string;
}

export interface SearchResult {
  total: number;
  issues: Issue[];
}
