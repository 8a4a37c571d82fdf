/**
 * Human-readable output for the CLI
 */

import type { SearchResponse, SearchResult } from "../core/types";

const SNIPPET_LENGTH = 200;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}

/**
 * Render one result as indented lines, numbered from 1
 */
export function formatResult(result: SearchResult, position: number): string[] {
  const lines = [`${position}. ${result.title} [${result.kind}]`, `   ${result.url ?? "(no url)"}`];

  if (result.content) {
    lines.push(`   ${truncate(result.content, SNIPPET_LENGTH)}`);
  }

  const sources = result.engines.length > 0 ? result.engines.join(", ") : (result.engine ?? "?");
  lines.push(`   engines: ${sources} | score: ${result.score}`);

  return lines;
}

export function formatResults(query: string, results: SearchResult[]): string {
  const lines = [`Query: "${query}"`, `Found ${results.length} results`];

  if (results.length === 0) {
    lines.push("", "No results found.");
  }
  results.forEach((result, index) => {
    lines.push("", ...formatResult(result, index + 1));
  });

  return lines.join("\n");
}

/**
 * Render a single page, including the extras only a page carries
 */
export function formatPage(response: SearchResponse, page: number): string {
  const lines = [
    formatResults(response.query, response.results),
    "",
    `Page ${page} (about ${response.number_of_results} results in total)`,
  ];

  if (response.corrections.length > 0) {
    lines.push(`Did you mean: ${response.corrections.join(", ")}`);
  }
  if (response.suggestions.length > 0) {
    lines.push(`Suggestions: ${response.suggestions.join(", ")}`);
  }

  const answerCount = response.answers.reduce((total, set) => total + set.length, 0);
  if (answerCount > 0) {
    lines.push(`Answers: ${answerCount}`);
  }
  for (const infobox of response.infoboxes) {
    lines.push(`Infobox: ${infobox.infobox} (${infobox.engine})`);
  }
  for (const failure of response.unresponsive_engines) {
    lines.push(`Unresponsive: ${failure.engine} - ${failure.message}`);
  }

  return lines.join("\n");
}
