import test from "node:test";
import assert from "node:assert/strict";
import * as http from "node:http";
import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import {
    AgentEngine,
    BackendError,
    CapabilityRegistry,
    ChannelSink,
    ConversationBinder,
    GenerateOptions,
    InMemoryConversationStore,
    ModelBackend,
    formatSseFrame,
    silentLogger,
    thinkingEvent
} from "@parley/core";
import { ChatServer, statusFor, titleFor } from "./chat-server.js";

class ScriptedBackend implements ModelBackend {
    readonly name = "scripted";
    readonly prompts: string[] = [];

    constructor(private readonly replies: string[], private readonly chunks: string[] = []) {}

    async generate(prompt: string): Promise<string> {
        this.prompts.push(prompt);
        const reply = this.replies.shift();
        if (reply === undefined) throw new BackendError("empty", "script exhausted");
        return reply;
    }

    async generateStream(_prompt: string, sink: ChannelSink<string>, options: GenerateOptions = {}): Promise<void> {
        try {
            for (const chunk of this.chunks) {
                await sink.send(chunk, options.signal);
            }
        } finally {
            sink.close();
        }
    }
}

/**
 * Backend whose generate call hangs until its signal is aborted.
 */
class HangingBackend implements ModelBackend {
    readonly name = "hanging";
    private markStarted: () => void = () => undefined;
    private markAborted: () => void = () => undefined;
    readonly started = new Promise<void>((resolve) => {
        this.markStarted = resolve;
    });
    readonly aborted = new Promise<void>((resolve) => {
        this.markAborted = resolve;
    });

    generate(_prompt: string, options: GenerateOptions = {}): Promise<string> {
        this.markStarted();
        return new Promise((_resolve, reject) => {
            options.signal?.addEventListener("abort", () => {
                this.markAborted();
                reject(new BackendError("aborted", "Request aborted"));
            }, { once: true });
        });
    }

    async generateStream(_prompt: string, sink: ChannelSink<string>): Promise<void> {
        sink.close();
    }
}

/**
 * Backend that streams `total` large chunks and counts how many the sink accepted.
 */
class FloodBackend implements ModelBackend {
    readonly name = "flood";
    sent = 0;
    private markFinished: () => void = () => undefined;
    readonly finished = new Promise<void>((resolve) => {
        this.markFinished = resolve;
    });

    constructor(readonly total: number, private readonly chunkSize: number) {}

    async generate(): Promise<string> {
        return "No tool needed.";
    }

    async generateStream(_prompt: string, sink: ChannelSink<string>, options: GenerateOptions = {}): Promise<void> {
        const chunk = "x".repeat(this.chunkSize);
        try {
            for (let i = 0; i < this.total; i++) {
                await sink.send(chunk, options.signal);
                this.sent++;
            }
        } finally {
            sink.close();
            this.markFinished();
        }
    }
}

/**
 * Polls until the counter holds still for one interval.
 */
async function settled(read: () => number, intervalMs = 200): Promise<number> {
    let before = read();
    for (;;) {
        await delay(intervalMs);
        const now = read();
        if (now === before) return now;
        before = now;
    }
}

const healthSchema = z.object({ status: z.string(), timestamp: z.number() });
const chatResponseSchema = z.object({
    conversation_id: z.string(),
    agent_conversation_id: z.string(),
    message: z.object({ role: z.string(), content: z.string() })
});
const listSchema = z.object({
    conversations: z.array(z.object({
        id: z.string(),
        agent_conversation_id: z.string(),
        title: z.string(),
        created_at: z.string(),
        message_count: z.number()
    })),
    total: z.number()
});
const detailSchema = z.object({
    id: z.string(),
    messages: z.array(z.object({ role: z.string(), content: z.string(), timestamp: z.string() }))
});

function calculatorRegistry(): CapabilityRegistry {
    const registry = new CapabilityRegistry();
    registry.add({
        name: "calculator",
        description: "Basic arithmetic",
        async execute(params) {
            return Number(params.a) + Number(params.b);
        }
    });
    return registry;
}

async function withServer(
    backend: ModelBackend,
    run: (baseURL: string, engine: AgentEngine, server: ChatServer) => Promise<void>,
    options: { channelCapacity?: number } = {}
): Promise<void> {
    const store = new InMemoryConversationStore();
    const engine = new AgentEngine({ store, logger: silentLogger, channelCapacity: options.channelCapacity });
    await engine.initialize(backend, calculatorRegistry());
    let counter = 0;
    const binder = new ConversationBinder({
        sessions: engine,
        logger: silentLogger,
        mintHandle: () => `conv_test_${++counter}`
    });
    const server = new ChatServer({
        engine,
        binder,
        store,
        logger: silentLogger,
        channelCapacity: options.channelCapacity
    });
    const port = await server.listen(0, "127.0.0.1");
    try {
        await run(`http://127.0.0.1:${port}`, engine, server);
    } finally {
        await server.close();
    }
}

function postChat(baseURL: string, body: unknown): Promise<Response> {
    return fetch(`${baseURL}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body)
    });
}

test("health reports healthy", async () => {
    await withServer(new ScriptedBackend([]), async (baseURL) => {
        const response = await fetch(`${baseURL}/health`);
        assert.equal(response.status, 200);
        const body = healthSchema.parse(await response.json());
        assert.equal(body.status, "healthy");
        assert.ok(Number.isInteger(body.timestamp));
    });
});

test("POST /api/chat binds a new conversation and keeps it across turns", async () => {
    const backend = new ScriptedBackend(["Hello there.", "Still here."]);
    await withServer(backend, async (baseURL, engine, server) => {
        const first = await postChat(baseURL, { message: "Hi" });
        assert.equal(first.status, 200);
        assert.deepEqual(await first.json(), {
            conversation_id: "conv_test_1",
            agent_conversation_id: engine.getConversationId(),
            message: { role: "assistant", content: "Hello there." }
        });

        const second = await postChat(baseURL, { conversation_id: "conv_test_1", message: "Are you there?" });
        const body = chatResponseSchema.parse(await second.json());
        assert.equal(body.agent_conversation_id, engine.getConversationId());
        assert.equal(body.message.content, "Still here.");
        assert.ok(backend.prompts[1].includes("user: Hi\n\nassistant: Hello there.\n\nuser: Are you there?"));
        assert.equal(server.activeTurns, 0);
    });
});

test("conversation listing and detail hide tool output", async () => {
    const backend = new ScriptedBackend([
        '{"tool":"calculator","params":{"a":2,"b":3}}',
        "It is 5."
    ]);
    await withServer(backend, async (baseURL, engine) => {
        await postChat(baseURL, { message: "What is two plus three, please tell me?" });

        const list = listSchema.parse(await (await fetch(`${baseURL}/api/conversations`)).json());
        assert.equal(list.total, 1);
        assert.deepEqual(
            { ...list.conversations[0], created_at: "" },
            {
                id: "conv_test_1",
                agent_conversation_id: engine.getConversationId(),
                title: "What is two plus three, please...",
                created_at: "",
                message_count: 2
            }
        );

        const detail = detailSchema.parse(await (await fetch(`${baseURL}/api/conversations/conv_test_1`)).json());
        assert.equal(detail.id, "conv_test_1");
        assert.deepEqual(
            detail.messages.map((message) => `${message.role}:${message.content}`),
            ["user:What is two plus three, please tell me?", "assistant:It is 5."]
        );
    });
});

test("invalid requests map to 400, 404 and 405", async () => {
    await withServer(new ScriptedBackend([]), async (baseURL) => {
        const empty = await postChat(baseURL, { message: "   " });
        assert.equal(empty.status, 400);
        assert.deepEqual(await empty.json(), { error: "message is required" });

        const malformed = await fetch(`${baseURL}/api/chat`, { method: "POST", body: "{not json" });
        assert.equal(malformed.status, 400);
        assert.deepEqual(await malformed.json(), { error: "Invalid request" });

        const wrongMethod = await fetch(`${baseURL}/api/chat`);
        assert.equal(wrongMethod.status, 405);
        await wrongMethod.body?.cancel();

        const missing = await fetch(`${baseURL}/api/conversations/conv_unknown`);
        assert.equal(missing.status, 404);
        assert.deepEqual(await missing.json(), { error: "Conversation not found: conv_unknown" });

        const streamWithoutMessage = await fetch(`${baseURL}/api/chat/stream`);
        assert.equal(streamWithoutMessage.status, 400);
        await streamWithoutMessage.body?.cancel();
    });
});

test("backend failures on POST /api/chat become 500", async () => {
    await withServer(new ScriptedBackend([]), async (baseURL) => {
        const response = await postChat(baseURL, { message: "Hi" });
        assert.equal(response.status, 500);
        assert.deepEqual(await response.json(), { error: "script exhausted" });
    });
});

test("GET /api/chat/stream relays the event sequence as SSE", async () => {
    const backend = new ScriptedBackend(["No tool needed."], ["The answer", " is 7."]);
    await withServer(backend, async (baseURL, engine) => {
        const response = await fetch(`${baseURL}/api/chat/stream?message=${encodeURIComponent("2+5?")}`);
        assert.equal(response.status, 200);
        assert.equal(response.headers.get("content-type"), "text/event-stream");

        const expected = [
            formatSseFrame({
                type: "meta",
                conversationId: "conv_test_1",
                agentConversationId: engine.getConversationId()
            }),
            formatSseFrame(thinkingEvent("analyzing")),
            formatSseFrame(thinkingEvent("generating")),
            'data: "The answer"\n\n',
            'data: " is 7."\n\n',
            "event: done\ndata: [DONE]\n\n"
        ].join("");
        assert.equal(await response.text(), expected);
    });
});

test("stream failures end with an error frame", async () => {
    await withServer(new ScriptedBackend([]), async (baseURL) => {
        const response = await fetch(`${baseURL}/api/chat/stream?message=hello`);
        const text = await response.text();
        assert.ok(text.endsWith('event: error\ndata: {"message":"script exhausted"}\n\n'));
    });
});

test("closing the stream aborts the running turn", async () => {
    const backend = new HangingBackend();
    await withServer(backend, async (baseURL, _engine, server) => {
        const controller = new AbortController();
        const response = await fetch(`${baseURL}/api/chat/stream?message=hello`, { signal: controller.signal });
        assert.equal(response.status, 200);
        await backend.started;
        assert.equal(server.activeTurns, 1);
        controller.abort();
        await backend.aborted;
        while (server.activeTurns > 0) await delay(10);
        assert.equal(server.activeTurns, 0);
    });
});

test("a client that stops reading blocks the producer instead of buffering the reply", async () => {
    const backend = new FloodBackend(400, 64 * 1024);
    await withServer(backend, async (baseURL) => {
        const response = await new Promise<http.IncomingMessage>((resolve, reject) => {
            http.get(`${baseURL}/api/chat/stream?message=flood`, resolve).on("error", reject);
        });
        response.pause();
        // Tearing the connection down mid-stream may surface as a reset.
        response.on("error", () => undefined);

        while (backend.sent === 0) await delay(10);
        const produced = await settled(() => backend.sent);
        assert.ok(produced < backend.total, `producer ran ahead of the client: ${produced} of ${backend.total} chunks`);

        response.destroy();
        await backend.finished;
        assert.ok(backend.sent < backend.total);
    }, { channelCapacity: 2 });
});

test("statusFor and titleFor", () => {
    assert.equal(statusFor(new BackendError("timeout", "slow")), 500);
    assert.equal(statusFor(new Error("plain")), 500);
    assert.equal(titleFor([]), "New conversation");
    assert.equal(titleFor([{ role: "user", content: "short", timestamp: "" }]), "short");
});
