#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { loadAgentConfig } from "@parley/core";
import { ChatServer } from "@parley/server";
import { runChat } from "./chat.js";
import { createRuntime } from "./runtime.js";

async function runServe(configPath: string | undefined, port: number | undefined): Promise<void> {
    const config = await loadAgentConfig(configPath);
    const runtime = await createRuntime(config);
    const server = new ChatServer({
        engine: runtime.engine,
        binder: runtime.binder,
        store: runtime.store,
        logger: runtime.logger.child("ChatServer")
    });
    const bound = await server.listen(port ?? config.server.port);
    console.log(chalk.bold.green(`Parley listening on http://localhost:${bound}`));

    const shutdown = () => {
        runtime.logger.info("Shutting down");
        server.close().then(
            () => process.exit(0),
            (error: unknown) => {
                runtime.logger.error("Shutdown failed", { error: String(error) });
                process.exit(1);
            }
        );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

async function runChatCommand(configPath: string | undefined, stream: boolean): Promise<void> {
    const config = await loadAgentConfig(configPath);
    const runtime = await createRuntime(config);
    await runChat({ engine: runtime.engine, input: process.stdin, output: process.stdout, stream });
}

async function runToolsCommand(configPath: string | undefined): Promise<void> {
    const config = await loadAgentConfig(configPath);
    const runtime = await createRuntime(config);
    for (const entry of runtime.registry.list()) {
        console.log(`${chalk.bold(entry.name)}\t${entry.description}`);
    }
}

async function main() {
    await yargs(hideBin(process.argv))
        .scriptName("parley")
        .option("config", {
            type: "string",
            description: "Path to a YAML or JSON config file"
        })
        .command(
            "serve",
            "Start the HTTP chat server",
            (y) => y.option("port", { type: "number", description: "Port to listen on (overrides config)" }),
            (argv) => runServe(argv.config, argv.port)
        )
        .command(
            "chat",
            "Interactive chat in the terminal",
            (y) => y.option("stream", { type: "boolean", default: false, description: "Stream replies with thinking markers" }),
            (argv) => runChatCommand(argv.config, argv.stream)
        )
        .command(
            "tools",
            "List the registered capabilities",
            (y) => y,
            (argv) => runToolsCommand(argv.config)
        )
        .demandCommand(1)
        .strict()
        .help()
        .parseAsync();
}

main().catch((err: unknown) => {
    console.error(chalk.red("\nFatal Error:"), err instanceof Error ? err.message : String(err));
    process.exit(1);
});
