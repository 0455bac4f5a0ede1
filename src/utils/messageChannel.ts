export type SendResult = 'sent' | 'closed';

interface PendingSend<T> {
    item: T;
    resolve: (result: SendResult) => void;
}

/**
 * Bounded in-process channel with one consumer and any number of producers.
 *
 * Sending never throws: once the channel is closed `send` resolves to
 * `'closed'` and the item is dropped. `close()` ends the stream after the
 * consumer has drained what is already buffered; `cancel()` (also triggered
 * by breaking out of a `for await` loop) ends it immediately and discards the
 * buffer.
 */
export class MessageChannel<T extends object> implements AsyncIterable<T> {
    private readonly buffer: T[] = [];
    private readonly pendingSends: PendingSend<T>[] = [];
    private waitingReceiver: ((result: IteratorResult<T, undefined>) => void) | null = null;
    private isClosed = false;

    constructor(private readonly capacity = 100) {
        if (capacity < 1) {
            throw new Error('MessageChannel capacity must be at least 1');
        }
    }

    get closed(): boolean {
        return this.isClosed;
    }

    send(item: T): Promise<SendResult> {
        if (this.isClosed) {
            return Promise.resolve('closed');
        }
        if (this.waitingReceiver) {
            const receiver = this.waitingReceiver;
            this.waitingReceiver = null;
            receiver({ value: item, done: false });
            return Promise.resolve('sent');
        }
        if (this.buffer.length < this.capacity) {
            this.buffer.push(item);
            return Promise.resolve('sent');
        }
        return new Promise<SendResult>(resolve => this.pendingSends.push({ item, resolve }));
    }

    receive(): Promise<IteratorResult<T, undefined>> {
        const next = this.buffer.shift();
        if (next !== undefined) {
            this.admitPendingSend();
            return Promise.resolve({ value: next, done: false });
        }
        if (this.isClosed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        if (this.waitingReceiver) {
            throw new Error('MessageChannel supports a single consumer');
        }
        return new Promise(resolve => {
            this.waitingReceiver = resolve;
        });
    }

    close(): void {
        if (this.isClosed) {
            return;
        }
        this.isClosed = true;
        for (const pending of this.pendingSends.splice(0)) {
            pending.resolve('closed');
        }
        if (this.waitingReceiver) {
            const receiver = this.waitingReceiver;
            this.waitingReceiver = null;
            receiver({ value: undefined, done: true });
        }
    }

    cancel(): void {
        this.buffer.length = 0;
        this.close();
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.receive(),
            return: () => {
                this.cancel();
                return Promise.resolve({ value: undefined, done: true });
            },
        };
    }

    private admitPendingSend(): void {
        const pending = this.pendingSends.shift();
        if (!pending) {
            return;
        }
        this.buffer.push(pending.item);
        pending.resolve('sent');
    }
}
