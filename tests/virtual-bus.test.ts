import { afterEach, describe, expect, it, vi } from 'vitest';
import { BusClosedError, InvalidFrameError } from '../src/errors.js';
import { VirtualBus } from '../src/transport/virtual-bus.js';
import type { Frame } from '../src/types/signal-types.js';
import { createFrame } from '../src/utils/utils.js';

const nextTurn = () => new Promise(resolve => setImmediate(resolve));

describe('VirtualBus', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers sent frames on a later turn', async () => {
    const bus = new VirtualBus();
    const handler = vi.fn();
    bus.onFrame(handler);

    await bus.send(createFrame(0x123, [1, 2]));
    expect(handler).not.toHaveBeenCalled();

    await vi.waitFor(() => {
      expect(handler).toHaveBeenCalledTimes(1);
    });
    expect(bus.framesSent).toBe(1);
  });

  it('delivers copies stamped with a timestamp', async () => {
    const bus = new VirtualBus();
    const received: Frame[] = [];
    bus.onFrame(frame => received.push(frame));

    const frame = createFrame(0x123, [1, 2]);
    await bus.send(frame);
    frame.data[0] = 0xff;
    await nextTurn();

    expect(received).toHaveLength(1);
    expect(Array.from(received[0]?.data ?? [])).toEqual([1, 2]);
    expect(typeof received[0]?.timestamp).toBe('number');
    expect(frame.timestamp).toBeUndefined();
  });

  it('sends several frames in order', async () => {
    const bus = new VirtualBus();
    const ids: number[] = [];
    bus.onFrame(frame => ids.push(frame.id));

    await bus.sendMultiple([createFrame(1, [0]), createFrame(2, [0]), createFrame(3, [0])]);
    await nextTurn();

    expect(ids).toEqual([1, 2, 3]);
  });

  it('stops delivering to an unsubscribed handler', async () => {
    const bus = new VirtualBus();
    const handler = vi.fn();
    const unsubscribe = bus.onFrame(handler);
    unsubscribe();

    await bus.send(createFrame(1, [0]));
    await nextTurn();

    expect(handler).not.toHaveBeenCalled();
  });

  it('reaches connected peers and skips its own subscribers when asked', async () => {
    const sender = new VirtualBus({ receiveOwnMessages: false });
    const receiver = new VirtualBus();
    sender.connect(receiver);
    const own = vi.fn();
    const remote = vi.fn();
    sender.onFrame(own);
    receiver.onFrame(remote);

    await sender.send(createFrame(0x42, [7]));
    await nextTurn();

    expect(own).not.toHaveBeenCalled();
    expect(remote).toHaveBeenCalledTimes(1);
  });

  it('refuses to connect buses on different channels', () => {
    const a = new VirtualBus({ channel: 'vcan0' });
    const b = new VirtualBus({ channel: 'vcan1' });
    expect(() => a.connect(b)).toThrow('Cannot connect "vcan0" to "vcan1"');
  });

  it('validates frames before sending', async () => {
    const bus = new VirtualBus();
    await expect(bus.send(createFrame(0x20000000, [0]))).rejects.toBeInstanceOf(InvalidFrameError);
    await expect(bus.send({ id: 1, data: new Uint8Array(9), dlc: 8 })).rejects.toThrow(
      'Invalid frame: payload of 9 bytes exceeds 8'
    );
    expect(bus.framesSent).toBe(0);
  });

  it('keeps delivering when a handler throws', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const bus = new VirtualBus();
    const healthy = vi.fn();
    bus.onFrame(() => {
      throw new Error('handler failed');
    });
    bus.onFrame(healthy);

    await bus.send(createFrame(1, [0]));
    await nextTurn();

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('rejects sends after shutdown', async () => {
    const bus = new VirtualBus({ channel: 'vcan3' });
    await bus.shutdown();
    await bus.shutdown();

    expect(bus.isShutdown).toBe(true);
    await expect(bus.send(createFrame(1, [0]))).rejects.toBeInstanceOf(BusClosedError);
    await expect(bus.send(createFrame(1, [0]))).rejects.toThrow('Bus "vcan3" is shut down');
  });

  it('drops frames still in flight when shut down', async () => {
    const bus = new VirtualBus();
    const handler = vi.fn();
    bus.onFrame(handler);

    await bus.send(createFrame(1, [0]));
    await bus.shutdown();
    await nextTurn();

    expect(handler).not.toHaveBeenCalled();
  });
});
