import { describe, it, expect, vi } from 'vitest';
import { createMessage, isQoS, toReceiver } from './messages.js';

describe('isQoS', () => {
  it('should accept the three delivery levels', () => {
    expect(isQoS(0)).toBe(true);
    expect(isQoS(1)).toBe(true);
    expect(isQoS(2)).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isQoS(3)).toBe(false);
    expect(isQoS('1')).toBe(false);
    expect(isQoS(undefined)).toBe(false);
  });
});

describe('createMessage', () => {
  it('should freeze the message', () => {
    const message = createMessage({
      topic: 'sensors/1',
      payload: new Uint8Array([1, 2]),
      qos: 1,
      receivedAt: 10,
    });

    expect(Object.isFrozen(message)).toBe(true);
    expect(message.receivedAt).toBe(10);
    expect(message.payload).toEqual(new Uint8Array([1, 2]));
  });
});

describe('toReceiver', () => {
  it('should wrap a function', async () => {
    const handler = vi.fn();
    const receiver = toReceiver(handler);
    const message = createMessage({ topic: 't', payload: new Uint8Array(), qos: 0 });

    await receiver.accept(message);

    expect(handler).toHaveBeenCalledWith(message);
  });

  it('should return receivers unchanged', () => {
    const receiver = { accept: vi.fn() };
    expect(toReceiver(receiver)).toBe(receiver);
  });
});
