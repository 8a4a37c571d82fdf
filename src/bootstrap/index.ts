/**
 * Bootstrap
 *
 * Builds the process-wide transport once and the clients that share it.
 */

import { loadConfig } from "../config/load";
import type { SearxngPagerConfig, ValidatedSearchDefaults } from "../config/validation";
import { createLogger } from "../core/logger";
import { parseLanguageTag } from "../core/request";
import type { SearchDefaults } from "../providers/searchxng";
import { SearxngClient } from "../providers/searchxng";
import type { HttpTransport } from "../providers/utils";
import { FetchTransport } from "../providers/utils";

const log = createLogger("Bootstrap");

/**
 * Bootstrap options
 */
export interface BootstrapOptions {
  /** Reuse an existing transport instead of creating one */
  transport?: HttpTransport;
  /** Override the configured base URL */
  baseUrl?: string;
}

export interface Bootstrapped {
  config: SearxngPagerConfig;
  transport: HttpTransport;
  client: SearxngClient;
}

/**
 * Convert validated config defaults into request defaults
 *
 * @throws SearchError if the configured language is not a valid tag
 */
export function toSearchDefaults(defaults: ValidatedSearchDefaults = {}): SearchDefaults {
  const { language, ...rest } = defaults;
  return language === undefined ? rest : { ...rest, language: parseLanguageTag(language) };
}

/**
 * Create a client for a configuration over a given transport
 */
export function createClient(
  config: SearxngPagerConfig,
  transport: HttpTransport,
  baseUrl: string = config.baseUrl,
): SearxngClient {
  return new SearxngClient({
    baseUrl,
    transport,
    userAgent: config.userAgent,
    defaults: toSearchDefaults(config.defaults),
    pagination: config.pagination,
  });
}

/**
 * Load configuration and wire the transport and client
 *
 * @param configOrPath - Either a config file path or a config object
 */
export function bootstrap(
  configOrPath?: string | SearxngPagerConfig,
  options: BootstrapOptions = {},
): Bootstrapped {
  const config = typeof configOrPath === "object" ? configOrPath : loadConfig(configOrPath);
  const transport = options.transport ?? new FetchTransport({ timeoutMs: config.timeoutMs });
  const client = createClient(config, transport, options.baseUrl);

  log.debug(`Client ready for ${client.endpoint}`);

  return { config, transport, client };
}
