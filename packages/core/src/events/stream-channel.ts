import { BackendError } from "../types/errors.js";

/**
 * Producer side of a channel. Backends receive this for content deltas.
 */
export interface ChannelSink<T> {
    send(item: T, signal?: AbortSignal): Promise<void>;
    close(): void;
    readonly closed: boolean;
}

export const DEFAULT_CHANNEL_CAPACITY = 100;

export class ChannelClosedError extends Error {
    constructor() {
        super("Channel is closed");
        this.name = "ChannelClosedError";
    }
}

interface PendingSend<T> {
    item: T;
    resolve: () => void;
    reject: (error: Error) => void;
}

/**
 * Bounded async channel with backpressure: `send` resolves once the item is
 * buffered, and waits while `capacity` items are already pending. One consumer
 * drains it with `for await`. Closing is idempotent; buffered items are still
 * delivered after `close()`, blocked senders are rejected.
 */
export class BoundedChannel<T> implements ChannelSink<T>, AsyncIterable<T> {
    private readonly capacity: number;
    private readonly buffer: T[] = [];
    private readonly blockedSenders: PendingSend<T>[] = [];
    private waitingReceiver: ((result: IteratorResult<T, undefined>) => void) | null = null;
    private isClosed = false;

    constructor(capacity: number = DEFAULT_CHANNEL_CAPACITY) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    get closed(): boolean {
        return this.isClosed;
    }

    get size(): number {
        return this.buffer.length;
    }

    send(item: T, signal?: AbortSignal): Promise<void> {
        if (this.isClosed) {
            return Promise.reject(new ChannelClosedError());
        }
        if (signal?.aborted) {
            return Promise.reject(abortedError());
        }

        if (this.waitingReceiver) {
            const receive = this.waitingReceiver;
            this.waitingReceiver = null;
            receive({ value: item, done: false });
            return Promise.resolve();
        }

        if (this.buffer.length < this.capacity) {
            this.buffer.push(item);
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            const pending: PendingSend<T> = { item, resolve, reject };
            const onAbort = () => {
                const index = this.blockedSenders.indexOf(pending);
                if (index !== -1) this.blockedSenders.splice(index, 1);
                reject(abortedError());
            };
            pending.resolve = () => {
                signal?.removeEventListener("abort", onAbort);
                resolve();
            };
            pending.reject = (error) => {
                signal?.removeEventListener("abort", onAbort);
                reject(error);
            };
            signal?.addEventListener("abort", onAbort, { once: true });
            this.blockedSenders.push(pending);
        });
    }

    close(): void {
        if (this.isClosed) return;
        this.isClosed = true;

        for (const pending of this.blockedSenders.splice(0)) {
            pending.reject(new ChannelClosedError());
        }
        if (this.waitingReceiver) {
            const receive = this.waitingReceiver;
            this.waitingReceiver = null;
            receive({ value: undefined, done: true });
        }
    }

    next(): Promise<IteratorResult<T, undefined>> {
        if (this.buffer.length > 0) {
            const value = this.buffer[0];
            this.buffer.shift();
            this.admitBlockedSender();
            return Promise.resolve({ value, done: false });
        }
        if (this.isClosed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
            this.waitingReceiver = resolve;
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return { next: () => this.next() };
    }

    /**
     * Collects everything until the channel closes.
     */
    async drain(): Promise<T[]> {
        const items: T[] = [];
        for await (const item of this) {
            items.push(item);
        }
        return items;
    }

    private admitBlockedSender(): void {
        const pending = this.blockedSenders.shift();
        if (!pending) return;
        this.buffer.push(pending.item);
        pending.resolve();
    }
}

function abortedError(): BackendError {
    return new BackendError("aborted", "Delivery aborted by the consumer");
}
