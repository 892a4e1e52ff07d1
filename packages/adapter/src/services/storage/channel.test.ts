import { describe, expect, it } from 'vitest';
import { Channel } from './channel';
import { Mutex } from './mutex';

describe('Channel', () => {
  it('hands values over in send order', async () => {
    const channel = new Channel<number>();
    const first = channel.send(1);
    const second = channel.send(2);

    expect(await channel.receive()).toEqual({ value: 1, done: false });
    expect(await channel.receive()).toEqual({ value: 2, done: false });
    expect(await first).toBe(true);
    expect(await second).toBe(true);
  });

  it('does not let a sender run ahead of its receiver', async () => {
    const channel = new Channel<string>();
    let delivered = false;
    const sending = channel.send('a').then((result) => {
      delivered = result;
    });

    await Promise.resolve();
    expect(delivered).toBe(false);

    await channel.receive();
    await sending;
    expect(delivered).toBe(true);
  });

  it('drops pending values and ends iteration on close', async () => {
    const channel = new Channel<string>();
    const pending = channel.send('lost');
    channel.close();

    expect(await pending).toBe(false);
    expect(await channel.send('late')).toBe(false);
    expect(await channel.receive()).toEqual({ value: undefined, done: true });
    expect(channel.isClosed).toBe(true);
  });

  it('wakes waiting receivers when closed', async () => {
    const channel = new Channel<number>();
    const received: number[] = [];
    const consuming = (async () => {
      for await (const value of channel) {
        received.push(value);
      }
    })();

    await channel.send(7);
    channel.close();
    await consuming;

    expect(received).toEqual([7]);
  });
});

describe('Mutex', () => {
  it('runs callbacks one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = mutex.runExclusive(() => {
      order.push('second');
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(mutex.isLocked).toBe(true);
    expect(order).toEqual(['first:start']);

    release();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked).toBe(false);
  });

  it('releases the lock when a callback rejects', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
  });
});
