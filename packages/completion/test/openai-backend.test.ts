/**
 * OpenAIBackend against an in-process fetch — no network.
 */

import { describe, it, expect } from "vitest";
import { CommandSetWireSchema } from "@cmdfor/protocol";
import { DEFAULT_POLICY, OpenAIBackend, type StructuredRequest } from "../src/index.js";

// =============================================================================
// Fake fetch
// =============================================================================

interface RecordedCall {
  url: string;
  body: Record<string, unknown>;
}

function fakeFetch(status: number, payload: unknown) {
  const calls: RecordedCall[] = [];
  const fetch = async (...args: Parameters<typeof globalThis.fetch>): Promise<Response> => {
    const [input, init] = args;
    const body = typeof init?.body === "string" ? (JSON.parse(init.body) as Record<string, unknown>) : {};
    calls.push({ url: String(input), body });
    return new Response(JSON.stringify(payload), {
      status,
      headers: { "content-type": "application/json" },
    });
  };
  return { fetch, calls };
}

function chatCompletion(content: string) {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1_700_000_000,
    model: "gpt-4o",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content },
        finish_reason: "stop",
      },
    ],
    usage: {
      prompt_tokens: 1000,
      completion_tokens: 500,
      total_tokens: 1500,
      prompt_tokens_details: { cached_tokens: 100 },
    },
  };
}

const REQUEST: StructuredRequest = {
  model: "gpt-4o",
  system: "You are a helpful system admin.",
  prompt: "what is the command for listing files?",
  schema: CommandSetWireSchema,
  schemaName: "cmds",
  schemaDescription: "A list of commands and associated comments to execute.",
  policy: DEFAULT_POLICY,
};

const BODY = { cmds: [{ cmd: "ls -lt", comment: "sorted by mtime" }] };

// =============================================================================
// Tests
// =============================================================================

describe("OpenAIBackend", () => {
  it("returns the decoded body and usage", async () => {
    const { fetch } = fakeFetch(200, chatCompletion(JSON.stringify(BODY)));
    const backend = new OpenAIBackend({ apiKey: "test-key", fetch });

    const result = await backend.complete(REQUEST);

    expect(result).toEqual({
      ok: true,
      value: {
        body: BODY,
        usage: { inputTokens: 1000, cachedInputTokens: 100, outputTokens: 500 },
      },
    });
  });

  it("sends one strict json_schema chat completion request", async () => {
    const { fetch, calls } = fakeFetch(200, chatCompletion(JSON.stringify(BODY)));
    const backend = new OpenAIBackend({ apiKey: "test-key", fetch });

    await backend.complete(REQUEST);

    expect(calls).toHaveLength(1);
    const call = calls[0]!;
    expect(call.url.endsWith("/chat/completions")).toBe(true);
    expect(call.body.model).toBe("gpt-4o");
    expect(call.body.temperature).toBe(0.1);
    expect(call.body.top_p).toBe(1);

    expect(call.body.presence_penalty).toBe(0);
    expect(call.body.frequency_penalty).toBe(0);
    expect(call.body.max_tokens).toBe(2048);

    const format = call.body.response_format as Record<string, unknown>;
    expect(format.type).toBe("json_schema");
    const schema = format.json_schema as Record<string, unknown>;
    expect(schema.name).toBe("cmds");
    expect(schema.strict).toBe(true);
  });

  it("sends a schema strict mode accepts", async () => {
    const { fetch, calls } = fakeFetch(200, chatCompletion(JSON.stringify(BODY)));
    const backend = new OpenAIBackend({ apiKey: "test-key", fetch });

    await backend.complete(REQUEST);

    const format = calls[0]!.body.response_format as Record<string, unknown>;
    const sent = JSON.stringify(format.json_schema);
    expect(sent).toContain('"cmd"');
    expect(sent).not.toContain("minLength");
  });

  it("gives up after timeoutMs with BACKEND_REQUEST", async () => {
    const calls: string[] = [];
    const hangingFetch = (...args: Parameters<typeof globalThis.fetch>): Promise<Response> => {
      const [input, init] = args;
      calls.push(String(input));
      return new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        signal?.addEventListener("abort", () => reject(signal.reason));
      });
    };
    const backend = new OpenAIBackend({ apiKey: "test-key", fetch: hangingFetch });

    const result = await backend.complete({ ...REQUEST, policy: { ...DEFAULT_POLICY, timeoutMs: 20 } });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("BACKEND_REQUEST");
    expect(calls).toHaveLength(1);
  });

  it("maps HTTP errors to BACKEND_REQUEST without retrying", async () => {
    const { fetch, calls } = fakeFetch(500, { error: { message: "boom", type: "server_error" } });
    const backend = new OpenAIBackend({ apiKey: "test-key", fetch });

    const result = await backend.complete(REQUEST);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("BACKEND_REQUEST");
    expect(calls).toHaveLength(1);
  });

  it("maps a non-JSON answer to RESPONSE_PARSE", async () => {
    const { fetch } = fakeFetch(200, chatCompletion('{"cmds": [{"cmd": "ls"'));
    const backend = new OpenAIBackend({ apiKey: "test-key", fetch });

    const result = await backend.complete(REQUEST);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("RESPONSE_PARSE");
  });

  it("maps a schema violation to RESPONSE_PARSE", async () => {
    const { fetch } = fakeFetch(200, chatCompletion(JSON.stringify({ cmds: [{ cmd: 1 }] })));
    const backend = new OpenAIBackend({ apiKey: "test-key", fetch });

    const result = await backend.complete(REQUEST);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("RESPONSE_PARSE");
  });
});
