import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { Capability, ExecutionError, NotFoundError, defineCapability, toErrorMessage } from "@parley/core";
import { resolveWorkspacePath } from "./utils/workspace-path.js";

export const KNOWLEDGE_BASE_EXTENSIONS = [".txt", ".md", ".csv", ".tsv"];

const knowledgeBaseParams = z.discriminatedUnion("operation", [
    z.object({ operation: z.literal("list") }),
    z.object({ operation: z.literal("read"), document: z.string().min(1) }),
    z.object({ operation: z.literal("search"), query: z.string().min(1) })
]);

export interface DocumentMatches {
    document: string;
    /** First line of a CSV/TSV document, so matched rows can be read against it. */
    header?: string;
    matches: string[];
}

const EXAMPLE_DOCUMENT = `# Example knowledge base document

Put .txt, .md, .csv or .tsv files in this directory and query them with the knowledge_base tool.

- List documents: {"operation": "list"}
- Read a document: {"operation": "read", "document": "example.md"}
- Search: {"operation": "search", "query": "example"}
`;

function isDocument(name: string): boolean {
    return KNOWLEDGE_BASE_EXTENSIONS.includes(path.extname(name).toLowerCase());
}

function isTabular(name: string): boolean {
    const ext = path.extname(name).toLowerCase();
    return ext === ".csv" || ext === ".tsv";
}

/**
 * Read-only access to plain-text documents in one directory.
 */
export class KnowledgeBase {
    constructor(private readonly basePath: string) {}

    async list(): Promise<string[]> {
        await this.ensureExists();
        const entries = await fs.readdir(this.basePath, { withFileTypes: true });
        return entries
            .filter((entry) => entry.isFile() && isDocument(entry.name))
            .map((entry) => entry.name)
            .sort();
    }

    async read(document: string): Promise<string> {
        await this.ensureExists();
        const filePath = resolveWorkspacePath(this.basePath, document);
        try {
            return await fs.readFile(filePath, "utf8");
        } catch (error) {
            throw new NotFoundError(`Document not found: ${document}`, { cause: error, details: { document } });
        }
    }

    async search(query: string): Promise<DocumentMatches[]> {
        const needle = query.toLowerCase();
        const results: DocumentMatches[] = [];
        for (const document of await this.list()) {
            const content = await fs.readFile(path.join(this.basePath, document), "utf8");
            const lines = content.split(/\r?\n/);
            const tabular = isTabular(document);
            const matches: string[] = [];
            lines.forEach((line, index) => {
                if (tabular && index === 0) return;
                if (!line.toLowerCase().includes(needle)) return;
                matches.push(tabular ? `Row ${index + 1}: ${line}` : line);
            });
            if (matches.length > 0) {
                results.push(tabular ? { document, header: lines[0], matches } : { document, matches });
            }
        }
        return results;
    }

    private async ensureExists(): Promise<void> {
        const exists = await fs.access(this.basePath).then(() => true, () => false);
        if (exists) return;
        try {
            await fs.mkdir(this.basePath, { recursive: true });
            await fs.writeFile(path.join(this.basePath, "example.md"), EXAMPLE_DOCUMENT, "utf8");
        } catch (error) {
            throw new ExecutionError(`Cannot create knowledge base at ${this.basePath}: ${toErrorMessage(error)}`, { cause: error });
        }
    }
}

export const knowledgeBaseTool = (basePath: string): Capability => {
    const knowledgeBase = new KnowledgeBase(basePath);
    return defineCapability({
        name: "knowledge_base",
        description:
            'Local document library. Parameters: operation ("list" | "read" | "search"), document (for read), query (for search).',
        parameters: knowledgeBaseParams,
        run: async (args) => {
            switch (args.operation) {
                case "list": {
                    const documents = await knowledgeBase.list();
                    return documents.length > 0 ? documents : "The knowledge base has no documents";
                }
                case "read":
                    return knowledgeBase.read(args.document);
                case "search": {
                    const results = await knowledgeBase.search(args.query);
                    return results.length > 0 ? results : "No matching content found";
                }
            }
        }
    });
};
