import { EventChannel } from '../utils/queue';

describe('EventChannel', () => {
  it('delivers items in push order', async () => {
    const channel = new EventChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.push(3);
    channel.close();

    const received: number[] = [];
    for await (const item of channel) {
      received.push(item);
    }

    expect(received).toEqual([1, 2, 3]);
  });

  it('wakes a waiting consumer when an item arrives', async () => {
    const channel = new EventChannel<string>();
    const pending = channel.next();

    channel.push('late');

    await expect(pending).resolves.toEqual({ value: 'late', done: false });
    expect(channel.getQueueDepth()).toBe(0);
  });

  it('ends a waiting consumer on close', async () => {
    const channel = new EventChannel<string>();
    const pending = channel.next();

    channel.close();

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
  });

  it('drops items pushed after close', async () => {
    const channel = new EventChannel<string>();
    channel.push('kept');
    channel.close();

    expect(channel.push('dropped')).toBe(false);
    expect(channel.isClosed()).toBe(true);
    await expect(channel.next()).resolves.toEqual({ value: 'kept', done: false });
    await expect(channel.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('allows a single consumer only', async () => {
    const channel = new EventChannel<string>('single');
    const first = channel.next();

    await expect(channel.next()).rejects.toThrow('Channel single already has a waiting consumer');
    expect(() => channel[Symbol.asyncIterator]()).not.toThrow();
    expect(() => channel[Symbol.asyncIterator]()).toThrow('Channel single supports a single consumer');

    channel.close();
    await expect(first).resolves.toEqual({ value: undefined, done: true });
  });

  it('keeps falsy items', async () => {
    const channel = new EventChannel<number>();
    channel.push(0);

    await expect(channel.next()).resolves.toEqual({ value: 0, done: false });
  });
});
