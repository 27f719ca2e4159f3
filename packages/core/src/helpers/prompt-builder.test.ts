import test from "node:test";
import assert from "node:assert/strict";
import { buildPrompt, buildSystemInstruction, selectRecentHistory } from "./prompt-builder.js";
import type { ChatMessage, Role } from "../types/messages.js";

function messages(count: number): ChatMessage[] {
    return Array.from({ length: count }, (_, i) => {
        const role: Role = i % 2 === 0 ? "user" : "assistant";
        return { role, content: `m${i + 1}`, timestamp: "2026-01-01T00:00:00.000Z" };
    });
}

test("history longer than the limit keeps only the most recent ten, oldest first", () => {
    const recent = selectRecentHistory(messages(13));
    assert.deepEqual(recent.map((m) => m.content), ["m4", "m5", "m6", "m7", "m8", "m9", "m10", "m11", "m12", "m13"]);
});

test("history at or under the limit is kept whole", () => {
    assert.equal(selectRecentHistory(messages(10)).length, 10);
    assert.deepEqual(selectRecentHistory(messages(3)).map((m) => m.content), ["m1", "m2", "m3"]);
    assert.deepEqual(selectRecentHistory(messages(3), 0), []);
});

test("buildPrompt renders role-prefixed transcript ending with the assistant cue", () => {
    const prompt = buildPrompt("Be brief.", messages(2));
    assert.equal(prompt, "system: Be brief.\n\nuser: m1\n\nassistant: m2\n\nassistant: ");
});

test("buildPrompt omits an empty system instruction and honours the limit", () => {
    const prompt = buildPrompt("", messages(12), 10);
    assert.equal(prompt.startsWith("user: m3\n\n"), true);
    assert.equal(prompt.includes("m2\n"), false);
});

test("buildSystemInstruction lists capabilities", () => {
    const instruction = buildSystemInstruction("You are helpful.", [
        { name: "calculator", description: "Basic arithmetic" }
    ]);
    assert.equal(instruction.startsWith("You are helpful.\n\nYou can use the following tools:\n\n1. calculator: Basic arithmetic\n\n"), true);
    assert.equal(buildSystemInstruction("Plain.", []), "Plain.");
});
