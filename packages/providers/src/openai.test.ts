import test from "node:test";
import assert from "node:assert/strict";
import { BackendError, BoundedChannel, silentLogger } from "@parley/core";
import { OpenAIBackend } from "./openai.js";

function completion(content: string): Response {
    return new Response(JSON.stringify({
        id: "chatcmpl-test",
        object: "chat.completion",
        created: 1,
        model: "test-model",
        choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }]
    }), { status: 200, headers: { "content-type": "application/json" } });
}

function chunk(content: string): string {
    return `data: ${JSON.stringify({
        id: "chatcmpl-test",
        object: "chat.completion.chunk",
        created: 1,
        model: "test-model",
        choices: [{ index: 0, delta: { content }, finish_reason: null }]
    })}\n\n`;
}

function openai(handler: (body: Record<string, unknown>) => Response): OpenAIBackend {
    return new OpenAIBackend({
        apiKey: "test-key",
        model: "test-model",
        maxRetries: 0,
        logger: silentLogger,
        fetch: async (_input, init) => handler(JSON.parse(String(init?.body)))
    });
}

test("generate sends the prompt as a single user message", async () => {
    const bodies: Record<string, unknown>[] = [];
    const backend = openai((body) => {
        bodies.push(body);
        return completion("Hi!");
    });

    assert.equal(await backend.generate("user: hello\n\nassistant: "), "Hi!");
    assert.equal(bodies[0].model, "test-model");
    assert.deepEqual(bodies[0].messages, [{ role: "user", content: "user: hello\n\nassistant: " }]);
    assert.equal(bodies[0].max_tokens, 1000);
});

test("API errors become http backend errors", async () => {
    const backend = openai(() => new Response(JSON.stringify({ error: { message: "bad key" } }), {
        status: 401,
        headers: { "content-type": "application/json" }
    }));

    await assert.rejects(backend.generate("x"), (error: unknown) => error instanceof BackendError && error.reason === "http");
});

test("streaming relays chunk deltas into the sink", async () => {
    const backend = openai((body) => {
        assert.equal(body.stream, true);
        return new Response(`${chunk("Hel")}${chunk("lo")}data: [DONE]\n\n`, {
            status: 200,
            headers: { "content-type": "text/event-stream" }
        });
    });
    const sink = new BoundedChannel<string>(10);

    await backend.generateStream("hi", sink);
    assert.equal(sink.closed, true);
    assert.deepEqual(await sink.drain(), ["Hel", "lo"]);
});
