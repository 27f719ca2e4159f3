import test from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";
import { createLogger, silentLogger } from "./logger.js";

const entrySchema = z
    .object({
        level: z.string(),
        time: z.string(),
        component: z.string().optional(),
        msg: z.string()
    })
    .passthrough();

function capture(): { lines: string[]; destination: { write(line: string): void } } {
    const lines: string[] = [];
    return { lines, destination: { write: (line: string) => void lines.push(line) } };
}

test("createLogger writes JSON lines with component and fields above the threshold", () => {
    const { lines, destination } = capture();
    const logger = createLogger("AgentEngine", "info", destination);

    logger.debug("Turn phase: executing");
    logger.info("Tool call detected", { tool: "calculator" });

    assert.equal(lines.length, 1);
    const entry = entrySchema.parse(JSON.parse(lines[0]));
    assert.equal(entry.level, "info");
    assert.equal(entry.component, "AgentEngine");
    assert.equal(entry.msg, "Tool call detected");
    assert.equal(entry.tool, "calculator");
    assert.ok(!Number.isNaN(Date.parse(entry.time)));
});

test("child loggers replace the component binding", () => {
    const { lines, destination } = capture();
    createLogger("Parley", "debug", destination).child("ChatServer").child("Relay").warn("Slow client");

    assert.equal(lines.length, 1);
    assert.equal(lines[0].split('"component"').length, 2);
    const entry = entrySchema.parse(JSON.parse(lines[0]));
    assert.equal(entry.level, "warn");
    assert.equal(entry.component, "Relay");
});

test("silentLogger accepts calls and children", () => {
    silentLogger.error("ignored", { reason: "silent" });
    silentLogger.child("Anything").info("ignored");
});
