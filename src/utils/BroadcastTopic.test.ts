/**
 * @fileoverview Tests for BroadcastTopic
 */

import { describe, it, expect } from '@jest/globals';
import { BroadcastTopic } from './BroadcastTopic';
import { AppError, ErrorCode } from './error.utils';

describe('BroadcastTopic', () => {
  it('should report zero receivers when nobody subscribed', () => {
    const topic = new BroadcastTopic<number>(4);
    expect(topic.publish(1)).toBe(0);
  });

  it('should deliver every value to every receiver', async () => {
    const topic = new BroadcastTopic<number>(4);
    const first = topic.subscribe();
    const second = topic.subscribe();

    expect(topic.publish(1)).toBe(2);
    expect(topic.publish(2)).toBe(2);

    expect([await first.recv(), await first.recv()]).toEqual([1, 2]);
    expect([await second.recv(), await second.recv()]).toEqual([1, 2]);
  });

  it('should resolve a waiting receiver on publish', async () => {
    const topic = new BroadcastTopic<string>(4);
    const receiver = topic.subscribe();

    const pending = receiver.recv();
    topic.publish('frame');

    await expect(pending).resolves.toBe('frame');
  });

  it('should drop the oldest entries when a receiver falls behind', async () => {
    const topic = new BroadcastTopic<number>(2);
    const receiver = topic.subscribe();

    topic.publish(1);
    topic.publish(2);
    topic.publish(3);
    topic.publish(4);

    expect(receiver.droppedCount).toBe(2);
    expect(await receiver.recv()).toBe(3);
    expect(await receiver.recv()).toBe(4);
  });

  it('should stop counting a receiver once it closes', async () => {
    const topic = new BroadcastTopic<number>(2);
    const receiver = topic.subscribe();
    const pending = receiver.recv();

    receiver.close();

    await expect(pending).resolves.toBeNull();
    expect(topic.publish(1)).toBe(0);
    expect(topic.receiverCount).toBe(0);
  });

  it('should reject with TIMEOUT when nothing arrives in time', async () => {
    const topic = new BroadcastTopic<number>(2);
    const receiver = topic.subscribe();

    await expect(receiver.recv(20)).rejects.toMatchObject({ code: ErrorCode.TIMEOUT });
    // the timed-out wait must not swallow the next value
    topic.publish(7);
    expect(await receiver.recv()).toBe(7);
  });

  it('should fail attached receivers and keep the topic usable', async () => {
    const topic = new BroadcastTopic<number>(2);
    const receiver = topic.subscribe();
    const pending = receiver.recv();
    const failure = new AppError('upstream gone', ErrorCode.CAMERA_UNAVAILABLE);

    expect(topic.failReceivers(failure)).toBe(1);
    await expect(pending).rejects.toBe(failure);
    await expect(receiver.recv()).rejects.toBe(failure);

    const later = topic.subscribe();
    expect(topic.publish(5)).toBe(1);
    expect(await later.recv()).toBe(5);
  });

  it('should iterate until closed', async () => {
    const topic = new BroadcastTopic<number>(4);
    const receiver = topic.subscribe();
    topic.publish(1);
    topic.publish(2);
    topic.close();

    const seen: number[] = [];
    for await (const value of receiver) {
      seen.push(value);
    }

    expect(seen).toEqual([1, 2]);
  });
});
