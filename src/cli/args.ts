/**
 * Command line argument parsing
 */

import type { ValidatedCliInput } from "../config/validation";
import { CliInputSchema, formatValidationErrors } from "../config/validation";

export const USAGE = `
searxng-pager - paginated search against a SearXNG instance

USAGE:
    searxng-pager <query> [options]

OPTIONS:
    --num <number>              Collect this many results across pages (default: 10)
    --page <number>             Fetch a single page and show answers and suggestions too
    --categories <a,b>          Restrict to categories (comma-separated)
    --engines <a,b>             Restrict to engines (comma-separated)
    --language <tag>            Language tag, e.g. en or de-CH
    --safesearch <0|1|2>        Safe search level
    --url <base-url>            SearXNG base URL (overrides config)
    --config <path>             Path to configuration file
    --json                      Output results as JSON
    --help, -h                  Show this help message

EXAMPLES:
    searxng-pager "typescript generics" --num 25
    searxng-pager "rust async" --page 2 --engines duckduckgo,brave --json
    searxng-pager "aurora" --categories images --safesearch 2

CONFIGURATION:
    Config files are searched in order:
    1. ./searxng-pager.config.json
    2. $XDG_CONFIG_HOME/searxng-pager/config.json
    3. ~/.config/searxng-pager/config.json
    Without a config file SEARXNG_URL (or http://localhost:8888) is used.
`;

export type CliCommand = { command: "help" } | { command: "search"; input: ValidatedCliInput };

/**
 * Thrown for arguments that cannot be turned into a search
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

const OPTIONS_WITH_VALUES = [
  "--num",
  "--page",
  "--categories",
  "--engines",
  "--language",
  "--safesearch",
  "--url",
  "--config",
] as const;

type ValueOption = (typeof OPTIONS_WITH_VALUES)[number];

function isValueOption(arg: string): arg is ValueOption {
  return OPTIONS_WITH_VALUES.some((option) => option === arg);
}

function splitList(value: string | undefined): string[] | undefined {
  return value
    ?.split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Parse CLI arguments (without the node and script entries)
 *
 * @throws CliUsageError for unknown options, missing values or invalid input
 */
export function parseCliArgs(argv: string[]): CliCommand {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    return { command: "help" };
  }

  const values = new Map<ValueOption, string>();
  const queryParts: string[] = [];
  let json = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }

    if (arg === "--json") {
      json = true;
    } else if (isValueOption(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new CliUsageError(`${arg} requires a value`);
      }
      values.set(arg, value);
      i++;
    } else if (arg.startsWith("--")) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      queryParts.push(arg);
    }
  }

  const result = CliInputSchema.safeParse({
    query: queryParts.join(" ").trim(),
    num: toNumber(values.get("--num")),
    page: toNumber(values.get("--page")),
    categories: splitList(values.get("--categories")),
    engines: splitList(values.get("--engines")),
    language: values.get("--language"),
    safeSearch: toNumber(values.get("--safesearch")),
    baseUrl: values.get("--url"),
    configPath: values.get("--config"),
    json,
  });

  if (!result.success) {
    throw new CliUsageError(formatValidationErrors(result.error).join("\n"));
  }

  return { command: "search", input: result.data };
}
