/**
 * CLI execution, separated from process handling so it can be driven in tests
 */

import type { BootstrapOptions } from "../bootstrap";
import { bootstrap } from "../bootstrap";
import type { ValidatedCliInput } from "../config/validation";
import { parseLanguageTag } from "../core/request";
import type { SearxngClient } from "../providers/searchxng";
import { parseCliArgs, USAGE } from "./args";
import { formatPage, formatResults } from "./format";

/** Results collected when neither --num nor --page is given */
export const DEFAULT_NUM = 10;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Passed through to bootstrap; tests supply a fake transport here */
  bootstrapOptions?: BootstrapOptions;
}

function buildRequest(client: SearxngClient, input: ValidatedCliInput) {
  let request = client.search(input.query);
  if (input.categories) {
    request = request.withCategories(input.categories);
  }
  if (input.engines) {
    request = request.withEngines(input.engines);
  }
  if (input.language) {
    request = request.withLanguage(parseLanguageTag(input.language));
  }
  if (input.safeSearch !== undefined) {
    request = request.withSafeSearch(input.safeSearch);
  }
  return request;
}

/**
 * Run the CLI
 *
 * @returns Process exit code
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  try {
    const parsed = parseCliArgs(argv);
    if (parsed.command === "help") {
      io.stdout(USAGE);
      return 0;
    }

    const { input } = parsed;
    const { client } = bootstrap(input.configPath, {
      ...io.bootstrapOptions,
      baseUrl: input.baseUrl ?? io.bootstrapOptions?.baseUrl,
    });
    const request = buildRequest(client, input);

    if (input.page !== undefined) {
      const response = await client.send(request.withPage(input.page));
      io.stdout(input.json ? JSON.stringify(response, null, 2) : formatPage(response, input.page));
      return 0;
    }

    const results = await client.sendGetNum(request, input.num ?? DEFAULT_NUM);
    io.stdout(
      input.json
        ? JSON.stringify({ query: input.query, results }, null, 2)
        : formatResults(input.query, results),
    );
    return 0;
  } catch (error) {
    io.stderr(`Search failed: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
