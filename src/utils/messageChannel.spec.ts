import { MessageChannel } from './messageChannel';

type Item = { n: number };

async function collect(channel: MessageChannel<Item>): Promise<number[]> {
    const seen: number[] = [];
    for await (const item of channel) {
        seen.push(item.n);
    }
    return seen;
}

describe('MessageChannel', () => {
    it('delivers buffered items in order and ends after close', async () => {
        const channel = new MessageChannel<Item>();
        await channel.send({ n: 1 });
        await channel.send({ n: 2 });
        channel.close();

        expect(await collect(channel)).toEqual([1, 2]);
    });

    it('hands an item straight to a waiting receiver', async () => {
        const channel = new MessageChannel<Item>();
        const next = channel.receive();

        await expect(channel.send({ n: 7 })).resolves.toBe('sent');
        await expect(next).resolves.toEqual({ value: { n: 7 }, done: false });
    });

    it('resolves sends after close to closed without throwing', async () => {
        const channel = new MessageChannel<Item>();
        channel.close();

        await expect(channel.send({ n: 1 })).resolves.toBe('closed');
        expect(channel.closed).toBe(true);
    });

    it('holds senders back while the buffer is full', async () => {
        const channel = new MessageChannel<Item>(1);
        await channel.send({ n: 1 });
        let secondResult: string | null = null;
        const second = channel.send({ n: 2 }).then(result => {
            secondResult = result;
        });

        await Promise.resolve();
        expect(secondResult).toBeNull();

        await expect(channel.receive()).resolves.toEqual({ value: { n: 1 }, done: false });
        await second;
        expect(secondResult).toBe('sent');
        await expect(channel.receive()).resolves.toEqual({ value: { n: 2 }, done: false });
    });

    it('releases blocked senders as closed when the channel closes', async () => {
        const channel = new MessageChannel<Item>(1);
        await channel.send({ n: 1 });
        const blocked = channel.send({ n: 2 });

        channel.close();

        await expect(blocked).resolves.toBe('closed');
        expect(await collect(channel)).toEqual([1]);
    });

    it('discards the buffer when the consumer breaks out of iteration', async () => {
        const channel = new MessageChannel<Item>();
        await channel.send({ n: 1 });
        await channel.send({ n: 2 });

        for await (const item of channel) {
            expect(item.n).toBe(1);
            break;
        }

        expect(channel.closed).toBe(true);
        await expect(channel.send({ n: 3 })).resolves.toBe('closed');
        await expect(channel.receive()).resolves.toEqual({ value: undefined, done: true });
    });

    it('ends a pending receive when closed', async () => {
        const channel = new MessageChannel<Item>();
        const next = channel.receive();

        channel.close();

        await expect(next).resolves.toEqual({ value: undefined, done: true });
    });

    it('rejects a second concurrent consumer', () => {
        const channel = new MessageChannel<Item>();
        void channel.receive();

        expect(() => channel.receive()).toThrow('MessageChannel supports a single consumer');
        channel.close();
    });

    it('rejects a capacity below one', () => {
        expect(() => new MessageChannel<Item>(0)).toThrow('MessageChannel capacity must be at least 1');
    });
});
