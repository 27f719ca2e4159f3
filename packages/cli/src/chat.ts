import { createInterface } from "node:readline/promises";
import chalk, { Chalk, ChalkInstance } from "chalk";
import { AgentEngine, AgentStreamEvent, BoundedChannel, renderEventText, toErrorMessage } from "@parley/core";

export interface ChatLoopOptions {
    engine: AgentEngine;
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    stream?: boolean;
    /** Colour output; off gives plain text. */
    color?: boolean;
}

const EXIT_COMMAND = "exit";
const FEEDBACK_PREFIX = "/feedback ";

/**
 * Interactive loop: one turn per input line until `exit` or end of input.
 * `/feedback <text>` records a note on the conversation instead of running a turn.
 */
export async function runChat(options: ChatLoopOptions): Promise<void> {
    const { engine, input, output } = options;
    const paint = options.color === false ? new Chalk({ level: 0 }) : chalk;
    const rl = createInterface({ input, terminal: false });

    output.write(paint.bold.green("Parley chat. Type 'exit' to quit.\n"));
    try {
        for await (const rawLine of rl) {
            const line = rawLine.trim();
            if (!line) continue;
            if (line === EXIT_COMMAND) break;

            if (line.startsWith(FEEDBACK_PREFIX)) {
                await runSafely(output, paint, async () => {
                    await engine.recordFeedback(line.slice(FEEDBACK_PREFIX.length).trim());
                    output.write(paint.gray("Feedback recorded.\n"));
                });
                continue;
            }

            await runSafely(output, paint, () =>
                options.stream ? streamTurn(engine, line, output, paint) : replyTurn(engine, line, output)
            );
        }
    } finally {
        rl.close();
    }
}

async function replyTurn(engine: AgentEngine, line: string, output: NodeJS.WritableStream): Promise<void> {
    const reply = await engine.process(line);
    output.write(`${reply}\n`);
}

async function streamTurn(
    engine: AgentEngine,
    line: string,
    output: NodeJS.WritableStream,
    paint: ChalkInstance
): Promise<void> {
    const channel = new BoundedChannel<AgentStreamEvent>();
    const [turn] = await Promise.allSettled([
        engine.processStream(line, channel),
        (async () => {
            for await (const event of channel) {
                output.write(renderStreamEvent(event, paint));
            }
        })()
    ]);
    if (turn.status === "rejected") {
        throw turn.reason;
    }
}

export function renderStreamEvent(event: AgentStreamEvent, paint: ChalkInstance = chalk): string {
    const text = renderEventText(event);
    return event.type === "thinking" ? paint.dim(text) : text;
}

async function runSafely(output: NodeJS.WritableStream, paint: ChalkInstance, fn: () => Promise<void>): Promise<void> {
    try {
        await fn();
    } catch (error) {
        output.write(paint.red(`Error: ${toErrorMessage(error)}\n`));
    }
}
