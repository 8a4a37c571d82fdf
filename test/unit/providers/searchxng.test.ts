/**
 * SearXNG Client Tests
 *
 * Tests for src/providers/searchxng.ts
 */

import { describe, expect, test } from "vitest";
import { parseLanguageTag } from "../../../src/core/request";
import { DEFAULT_USER_AGENT, SearxngClient } from "../../../src/providers/searchxng";
import {
  createLegacyPayload,
  createMainPayload,
  createPagedTransport,
  createResponsePayload,
  FakeTransport,
  networkError,
} from "../../__helpers__";

describe("SearxngClient", () => {
  describe("Endpoint", () => {
    test("should post to /search under the base URL", async () => {
      const transport = createPagedTransport([1]);
      const client = new SearxngClient({ baseUrl: "https://searx.test/", transport });

      await client.send(client.search("rust"));

      expect(client.endpoint).toBe("https://searx.test/search");
      expect(transport.requests[0]?.url).toBe("https://searx.test/search");
    });
  });

  describe("Headers", () => {
    test("should send the default User-Agent and accept JSON", async () => {
      const transport = createPagedTransport([1]);
      const client = new SearxngClient({ baseUrl: "http://searx.test", transport });

      await client.send(client.search("rust"));

      expect(transport.requests[0]?.headers).toEqual({
        Accept: "application/json",
        "User-Agent": DEFAULT_USER_AGENT,
      });
    });

    test("should send a configured User-Agent", async () => {
      const transport = createPagedTransport([1]);
      const client = new SearxngClient({
        baseUrl: "http://searx.test",
        transport,
        userAgent: "custom-agent/2.0",
      });

      await client.send(client.search("rust"));

      expect(transport.requests[0]?.headers["User-Agent"]).toBe("custom-agent/2.0");
    });
  });

  describe("search()", () => {
    test("should start from the client defaults", () => {
      const client = new SearxngClient({
        baseUrl: "http://searx.test",
        transport: createPagedTransport([]),
        defaults: { engines: ["duckduckgo"], language: parseLanguageTag("en"), safeSearch: 1 },
      });

      expect(client.search("rust").parameters).toEqual({
        engines: ["duckduckgo"],
        language: "en",
        safeSearch: 1,
        query: "rust",
        format: "json",
      });
    });

    test("should let the request override a default", async () => {
      const transport = createPagedTransport([1]);
      const client = new SearxngClient({
        baseUrl: "http://searx.test",
        transport,
        defaults: { engines: ["duckduckgo"] },
      });

      await client.send(client.search("rust").withEngines(["brave", "qwant"]));

      expect(transport.requests[0]?.form.get("engines")).toBe("brave,qwant");
    });
  });

  describe("send()", () => {
    test("should encode the request as a form", async () => {
      const transport = createPagedTransport([1, 1]);
      const client = new SearxngClient({ baseUrl: "http://searx.test", transport });

      await client.send(client.search("rust async").withPage(2).withCategories(["it"]));

      expect(transport.requests[0]?.form.toString()).toBe(
        "q=rust+async&format=json&pageno=2&categories=it",
      );
    });

    test("should decode both result shapes in order", async () => {
      const transport = new FakeTransport(() =>
        createResponsePayload({
          number_of_results: 1200,
          results: [
            createLegacyPayload({ url: "https://a.example" }),
            createMainPayload({ url: "https://b.example" }),
          ],
        }),
      );
      const client = new SearxngClient({ baseUrl: "http://searx.test", transport });

      const response = await client.send(client.search("rust"));

      expect(response.number_of_results).toBe(1200);
      expect(response.results.map((result) => [result.kind, result.url])).toEqual([
        ["legacy", "https://a.example"],
        ["main", "https://b.example"],
      ]);
    });

    test("should not retry a single page request", async () => {
      const transport = new FakeTransport(() => {
        throw networkError();
      });
      const client = new SearxngClient({ baseUrl: "http://searx.test", transport });

      await expect(client.send(client.search("rust"))).rejects.toMatchObject({
        reason: "network_error",
      });
      expect(transport.requests).toHaveLength(1);
    });
  });

  describe("sendGetNum()", () => {
    test("should apply the configured empty-page retry budget", async () => {
      const transport = createPagedTransport([10]);
      const client = new SearxngClient({
        baseUrl: "http://searx.test",
        transport,
        pagination: { emptyRetries: 1 },
      });

      const results = await client.sendGetNum(client.search("rust"), 15);

      expect(results).toHaveLength(10);
      expect(transport.pages).toEqual([1, 2]);
    });

    test("should carry the client defaults onto every page", async () => {
      const transport = createPagedTransport([10, 10]);
      const client = new SearxngClient({
        baseUrl: "http://searx.test",
        transport,
        defaults: { categories: ["news"] },
      });

      await client.sendGetNum(client.search("rust"), 15);

      expect(transport.requests.map((request) => request.form.get("categories"))).toEqual([
        "news",
        "news",
      ]);
    });
  });
});
