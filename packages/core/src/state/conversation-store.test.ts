import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InMemoryConversationStore } from "./conversation-store.js";
import { FileConversationStore } from "./file-conversation-store.js";
import { createConversationStore } from "./create-conversation-store.js";
import { NotFoundError } from "../types/errors.js";
import type { Role } from "../types/messages.js";

const TRANSCRIPT: Array<[Role, string]> = [
    ["user", "m1"],
    ["assistant", "m2"],
    ["system", "Tool(calculator) output: 3"],
    ["assistant", "m4"]
];

test("appended messages come back in order with role and content unchanged", async () => {
    const store = new InMemoryConversationStore();
    const id = await store.createConversation("New conversation");
    assert.match(id, /^conv_[0-9a-f]{32}$/);
    for (const [role, content] of TRANSCRIPT) {
        await store.addMessage(id, role, content);
    }
    const conversation = await store.getConversation(id);
    assert.deepEqual(conversation.messages.map((m) => [m.role, m.content]), TRANSCRIPT);
});

test("unknown ids reject with NotFoundError", async () => {
    const store = new InMemoryConversationStore();
    await assert.rejects(store.getConversation("conv_missing"), NotFoundError);
    await assert.rejects(store.addMessage("conv_missing", "user", "hi"), NotFoundError);
});

test("returned conversations are copies", async () => {
    const store = new InMemoryConversationStore();
    const id = await store.createConversation("t");
    await store.addMessage(id, "user", "hello");
    const copy = await store.getConversation(id);
    copy.messages.push({ role: "user", content: "injected", timestamp: copy.createdAt });
    assert.equal((await store.getConversation(id)).messages.length, 1);
});

test("listing is most recent first and honours the limit", async () => {
    const store = new InMemoryConversationStore();
    const first = await store.createConversation("first");
    const second = await store.createConversation("second");
    await new Promise((resolve) => setTimeout(resolve, 5));
    await store.addMessage(first, "user", "bump");

    const all = await store.listConversations();
    assert.deepEqual(all.map((c) => c.id), [first, second]);
    assert.equal((await store.listConversations(1)).length, 1);
    assert.equal((await store.listConversations(0)).length, 2);
});

test("file store writes one JSON file per conversation and reloads it", async () => {
    const dataDir = await mkdtemp(join(tmpdir(), "parley-store-"));
    const store = new FileConversationStore({ dataDir });
    await store.load();
    const id = await store.createConversation("Saved");
    for (const [role, content] of TRANSCRIPT) {
        await store.addMessage(id, role, content);
    }

    const onDisk = JSON.parse(await readFile(join(dataDir, `${id}.json`), "utf8"));
    assert.equal(onDisk.title, "Saved");
    assert.equal(onDisk.messages.length, TRANSCRIPT.length);

    const reopened = new FileConversationStore({ dataDir });
    assert.equal(await reopened.load(), 1);
    const conversation = await reopened.getConversation(id);
    assert.deepEqual(conversation.messages.map((m) => [m.role, m.content]), TRANSCRIPT);
});

test("file store skips malformed files", async () => {
    const dataDir = await mkdtemp(join(tmpdir(), "parley-store-bad-"));
    await writeFile(join(dataDir, "broken.json"), "{not json", "utf8");
    await writeFile(join(dataDir, "wrong-shape.json"), JSON.stringify({ id: "x" }), "utf8");
    const store = new FileConversationStore({ dataDir });
    assert.equal(await store.load(), 0);
    assert.deepEqual(await store.listConversations(), []);
});

test("createConversationStore picks the configured strategy", async () => {
    const memory = await createConversationStore({ type: "memory", dataDir: "unused" });
    assert.ok(memory instanceof InMemoryConversationStore);
    assert.ok(!(memory instanceof FileConversationStore));

    const dataDir = await mkdtemp(join(tmpdir(), "parley-store-factory-"));
    const file = await createConversationStore({ type: "file", dataDir });
    assert.ok(file instanceof FileConversationStore);
});
