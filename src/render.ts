import type { Issue, SearchResult } from "./types.js";

const RULE = "=".repeat(80);

export interface RenderOptions {
  title?: string;
  browseUrl: (issueKey: string) => string;
}

export function renderSearchResult(result: SearchResult, options: RenderOptions): string[] {
  const heading =
    options.title === undefined
      ? `Found ${result.total} issue(s)`
      : `Found ${result.total} issue(s) for: ${options.title}`;

  const lines = [RULE, heading, RULE, ""];

  if (result.issues.length === 0) {
    lines.push("No issues found.");
    return lines;
  }

  result.issues.forEach((issue, index) => {
    lines.push(...renderIssue(issue, index + 1, options.browseUrl(issue.key)), "");
  });

  return lines;
}

function renderIssue(issue: Issue, position: number, url: string): string[] {
  return [
    `${position}. [${issue.key}] ${issue.summary}`,
    `   Status: ${issue.status} | Priority: ${issue.priority}`,
    `   Updated: ${issue.updated}`,
    `   URL: ${url}`
  ];
}
