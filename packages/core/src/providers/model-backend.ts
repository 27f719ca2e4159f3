import { ChannelSink } from "../events/stream-channel.js";

export interface GenerateOptions {
    signal?: AbortSignal;
}

/**
 * Text-completion backend. `generateStream` pushes content deltas into the
 * sink and closes it before returning, whether it succeeds or fails.
 */
export interface ModelBackend {
    readonly name: string;
    generate(prompt: string, options?: GenerateOptions): Promise<string>;
    generateStream(prompt: string, sink: ChannelSink<string>, options?: GenerateOptions): Promise<void>;
}
