import { z } from "zod";
import { Capability, ExecutionError, ValidationError, defineCapability, toErrorMessage } from "@parley/core";

export type SearchEngine = "duckduckgo" | "searchapi" | "mock";

export interface SearchResult {
    title: string;
    link: string;
    description: string;
}

export interface WebSearchOptions {
    engine?: SearchEngine;
    apiKey?: string;
    maxResults?: number;
    fetch?: typeof fetch;
    duckDuckGoURL?: string;
    searchApiURL?: string;
}

const topicSchema = z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional()
}).passthrough();

const duckDuckGoSchema = z.object({
    AbstractText: z.string().optional(),
    AbstractURL: z.string().optional(),
    RelatedTopics: z.array(topicSchema).optional(),
    Results: z.array(topicSchema).optional()
}).passthrough();

const searchApiSchema = z.object({
    results: z.array(z.object({
        title: z.string().default(""),
        link: z.string().default(""),
        description: z.string().default("")
    })).default([])
}).passthrough();

const NO_RESULTS = "No relevant results found";

/**
 * Web search over DuckDuckGo's Instant Answer API, SearchApi, or canned results.
 */
export class WebSearch {
    private readonly engine: SearchEngine;
    private readonly apiKey?: string;
    private readonly maxResults: number;
    private readonly fetchImpl: typeof fetch;
    private readonly duckDuckGoURL: string;
    private readonly searchApiURL: string;

    constructor(options: WebSearchOptions = {}) {
        this.engine = options.engine ?? (options.apiKey ? "searchapi" : "duckduckgo");
        this.apiKey = options.apiKey;
        this.maxResults = options.maxResults ?? 5;
        this.fetchImpl = options.fetch ?? fetch;
        this.duckDuckGoURL = options.duckDuckGoURL ?? "https://api.duckduckgo.com/";
        this.searchApiURL = options.searchApiURL ?? "https://www.searchapi.io/api/v1/search";
    }

    async search(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
        let results: SearchResult[];
        switch (this.engine) {
            case "mock":
                results = mockResults(query);
                break;
            case "searchapi":
                results = await this.searchWithSearchApi(query, signal);
                break;
            case "duckduckgo":
                results = await this.searchWithDuckDuckGo(query, signal);
                break;
        }
        return results.slice(0, this.maxResults);
    }

    private async searchWithDuckDuckGo(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
        const url = new URL(this.duckDuckGoURL);
        url.searchParams.set("q", query);
        url.searchParams.set("format", "json");
        url.searchParams.set("no_html", "1");
        url.searchParams.set("no_redirect", "1");

        const parsed = duckDuckGoSchema.safeParse(await this.getJson(url, signal));
        if (!parsed.success) {
            throw new ExecutionError("Unexpected DuckDuckGo response");
        }
        const payload = parsed.data;
        const results: SearchResult[] = [];
        if (payload.AbstractText && payload.AbstractURL) {
            results.push({ title: "Summary", link: payload.AbstractURL, description: payload.AbstractText });
        }
        for (const topic of [...(payload.RelatedTopics ?? []), ...(payload.Results ?? [])]) {
            if (topic.Text && topic.FirstURL) {
                results.push({ title: topic.Text.split(" - ")[0], link: topic.FirstURL, description: topic.Text });
            }
        }
        return results;
    }

    private async searchWithSearchApi(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
        if (!this.apiKey) {
            throw new ValidationError("The searchapi engine needs an API key");
        }
        const url = new URL(this.searchApiURL);
        url.searchParams.set("q", query);
        url.searchParams.set("api_key", this.apiKey);

        const parsed = searchApiSchema.safeParse(await this.getJson(url, signal));
        if (!parsed.success) {
            throw new ExecutionError("Unexpected SearchApi response");
        }
        return parsed.data.results;
    }

    private async getJson(url: URL, signal?: AbortSignal): Promise<unknown> {
        let response: Response;
        try {
            response = await this.fetchImpl(url, { signal });
        } catch (error) {
            throw new ExecutionError(`Search request failed: ${toErrorMessage(error)}`, { cause: error });
        }
        if (!response.ok) {
            const body = await response.text();
            throw new ExecutionError(`Search request failed with status ${response.status}: ${body}`);
        }
        try {
            return await response.json();
        } catch (error) {
            throw new ExecutionError(`Search response is not JSON: ${toErrorMessage(error)}`, { cause: error });
        }
    }
}

function mockResults(query: string): SearchResult[] {
    return [
        { title: `Result 1 - ${query}`, link: "https://example.com/result1", description: `First result about ${query}.` },
        { title: `Result 2 - ${query}`, link: "https://example.com/result2", description: `Second result about ${query}.` }
    ];
}

export const webSearchTool = (options: WebSearchOptions = {}): Capability => {
    const webSearch = new WebSearch(options);
    return defineCapability({
        name: "web_search",
        description: "Searches the web. Parameters: query (string).",
        parameters: z.object({ query: z.string().trim().min(1) }),
        run: async ({ query }, context) => {
            const results = await webSearch.search(query, context.signal);
            return results.length > 0 ? results : NO_RESULTS;
        }
    });
};
