/**
 * Terminal output helpers for the CLI.
 */

import chalk from "chalk";

import type { EngineStats, SearchResult } from "../core/index.js";

export function header(text: string): void {
  console.log("");
  console.log(chalk.bold.cyan(`  ${text}`));
  console.log(chalk.gray("  " + "─".repeat(text.length + 4)));
}

export function success(text: string): void {
  console.log(chalk.green(`  ✓ ${text}`));
}

export function error(text: string): void {
  console.log(chalk.red(`  ✗ ${text}`));
}

export function dim(text: string): void {
  console.log(chalk.gray(`  ${text}`));
}

/** Terminal stand-in for the snippet's emphasis markup. */
export function renderSnippet(snippet: string): string {
  return snippet.replace(/<strong>(.*?)<\/strong>/g, (_m, word: string) => chalk.bold.yellow(word));
}

export function stats(s: EngineStats): void {
  console.log(`  Total documents:         ${s.totalDocuments}`);
  console.log(`  Total terms:             ${s.totalTerms}`);
  console.log(`  Average document length: ${s.averageDocumentLength.toFixed(2)} words`);
}

export function results(query: string, hits: SearchResult[]): void {
  header(`Query: "${query}"`);
  if (!hits.length) {
    dim("No results found.");
    return;
  }
  for (const h of hits) {
    console.log(`  ${chalk.bold(h.title)} ${chalk.gray(`#${h.documentId}`)}  ${chalk.magenta(`score ${h.score}`)}`);
    console.log(`    ${renderSnippet(h.snippet)}`);
  }
}
