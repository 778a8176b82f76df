import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { silentLogger } from "../../__tests__/harness.js";
import { ChatModelClient } from "../ChatModelClient.js";
import { ChatStructuredModel } from "../StructuredModel.js";

const schema = z.object({ value: z.number() }).strict();

function jsonResponse(body: unknown, status = 200, statusText = "OK"): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "Content-Type": "application/json" },
  });
}

function client(apiKey = "test-key"): ChatModelClient {
  return new ChatModelClient({
    provider: "openai",
    apiKey,
    baseURL: "http://llm.test/v1/",
    model: "test-model",
    logger: silentLogger,
  });
}

describe("ChatStructuredModel", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("validates fenced JSON replies and reports usage", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({
        choices: [{ message: { content: '```json\n{"value":2}\n```' } }],
        usage: { prompt_tokens: 10, completion_tokens: 5 },
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await new ChatStructuredModel(client()).call({
      purpose: "step",
      schema,
      messages: [{ role: "user", content: "Give me a number" }],
    });

    expect(result).toEqual({
      kind: "ok",
      value: { value: 2 },
      raw: '{"value":2}',
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://llm.test/v1/chat/completions");
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: "test-model",
      response_format: { type: "json_object" },
    });
  });

  it("returns schema issues instead of throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({ choices: [{ message: { content: '{"value":"two"}' } }] })
      )
    );

    const result = await new ChatStructuredModel(client()).call({
      purpose: "step",
      schema,
      messages: [{ role: "user", content: "Give me a number" }],
    });

    expect(result).toEqual({
      kind: "schema_violation",
      issues: ["value: Expected number, received string"],
      raw: '{"value":"two"}',
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    });
  });

  it("marks HTTP 429 as rate limited", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response("slow down", { status: 429, statusText: "Too Many Requests" })
      )
    );

    const result = await new ChatStructuredModel(client()).call({
      purpose: "watchdog",
      schema,
      messages: [{ role: "user", content: "Classify" }],
    });

    expect(result).toEqual({
      kind: "transport_error",
      message: "Openai request failed with status 429 Too Many Requests: slow down",
      rateLimited: true,
      aborted: false,
    });
  });

  it("fails without calling the endpoint when no key is configured", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}));
    vi.stubGlobal("fetch", fetchMock);

    const result = await new ChatStructuredModel(client("")).call({
      purpose: "guest",
      schema,
      messages: [{ role: "user", content: "Hello" }],
    });

    expect(result).toMatchObject({
      kind: "transport_error",
      message: "ChatModelClient (openai) is not configured with an API key",
      rateLimited: false,
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
