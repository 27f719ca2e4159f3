import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { NotFoundError, ValidationError } from "@parley/core";
import { KnowledgeBase, knowledgeBaseTool } from "./knowledge-base.js";

async function withBase(run: (dir: string) => Promise<void>): Promise<void> {
    const dir = await mkdtemp(join(tmpdir(), "parley-kb-"));
    try {
        await run(dir);
    } finally {
        await rm(dir, { recursive: true, force: true });
    }
}

test("a missing knowledge base directory is created with an example document", async () => {
    await withBase(async (dir) => {
        const base = join(dir, "kb");
        const kb = new KnowledgeBase(base);
        assert.deepEqual(await kb.list(), ["example.md"]);
        assert.deepEqual(await readdir(base), ["example.md"]);
    });
});

test("list returns supported documents in name order", async () => {
    await withBase(async (dir) => {
        await writeFile(join(dir, "b.txt"), "beta", "utf8");
        await writeFile(join(dir, "a.md"), "alpha", "utf8");
        await writeFile(join(dir, "image.png"), "binary", "utf8");
        const tool = knowledgeBaseTool(dir);
        assert.deepEqual(await tool.execute({ operation: "list" }), ["a.md", "b.txt"]);
    });
});

test("read returns content and refuses paths outside the base", async () => {
    await withBase(async (dir) => {
        await writeFile(join(dir, "notes.txt"), "remember the milk", "utf8");
        const tool = knowledgeBaseTool(dir);
        assert.equal(await tool.execute({ operation: "read", document: "notes.txt" }), "remember the milk");
        await assert.rejects(tool.execute({ operation: "read", document: "missing.txt" }), NotFoundError);
        await assert.rejects(tool.execute({ operation: "read", document: "../outside.txt" }), ValidationError);
    });
});

test("search matches case-insensitively and keeps CSV headers", async () => {
    await withBase(async (dir) => {
        await writeFile(join(dir, "guide.md"), "# Guide\nPlants need Water\nSoil matters", "utf8");
        await writeFile(join(dir, "plants.csv"), "name,water\nfern,often water\ncactus,rarely", "utf8");
        const kb = new KnowledgeBase(dir);
        assert.deepEqual(await kb.search("WATER"), [
            { document: "guide.md", matches: ["Plants need Water"] },
            { document: "plants.csv", header: "name,water", matches: ["Row 2: fern,often water"] }
        ]);
    });
});

test("search reports when nothing matches", async () => {
    await withBase(async (dir) => {
        await writeFile(join(dir, "guide.md"), "nothing relevant", "utf8");
        const tool = knowledgeBaseTool(dir);
        assert.equal(await tool.execute({ operation: "search", query: "volcano" }), "No matching content found");
    });
});
