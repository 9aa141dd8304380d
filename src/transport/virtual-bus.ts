// src/transport/virtual-bus.ts

import { BusClosedError } from '../errors.js';
import Logger from '../logger.js';
import type {
  Frame,
  FrameHandler,
  FrameSink,
  FrameSource,
  LoggerInstance,
  VirtualBusOptions,
} from '../types/signal-types.js';
import { cloneFrame, formatFrame, validateFrame } from '../utils/utils.js';

/**
 * In-process bus. Sent frames are delivered to subscribers on a later
 * turn of the event loop, the way a socket transport calls back from its
 * own receive context.
 */
export class VirtualBus implements FrameSource, FrameSink {
  readonly channel: string;
  private readonly receiveOwnMessages: boolean;
  private readonly handlers = new Set<FrameHandler>();
  private readonly peers = new Set<VirtualBus>();
  private closed = false;
  private sentCount = 0;
  private logger: LoggerInstance;

  constructor(options: VirtualBusOptions = {}) {
    this.channel = options.channel ?? 'vcan0';
    this.receiveOwnMessages = options.receiveOwnMessages ?? true;

    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('VirtualBus');
    this.logger.setLevel(options.logLevel ?? 'error');
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  get framesSent(): number {
    return this.sentCount;
  }

  /**
   * Links two buses on the same channel so that frames sent on one reach the
   * subscribers of the other.
   */
  connect(peer: VirtualBus): void {
    if (peer === this) return;
    if (peer.channel !== this.channel) {
      throw new RangeError(`Cannot connect "${this.channel}" to "${peer.channel}"`);
    }
    this.peers.add(peer);
    peer.peers.add(this);
  }

  /**
   * Subscribes to received frames.
   * @returns function that removes the subscription
   */
  onFrame(handler: FrameHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Validates and copies the frame, then schedules its delivery.
   * @throws BusClosedError, InvalidFrameError
   */
  async send(frame: Frame): Promise<void> {
    if (this.closed) throw new BusClosedError(this.channel);
    validateFrame(frame);

    const copy = cloneFrame(frame);
    copy.timestamp ??= Date.now();
    this.sentCount++;
    this.logger.trace(`TX ${formatFrame(copy)}`, { frameId: copy.id });

    if (this.receiveOwnMessages) this.schedule(copy);
    for (const peer of this.peers) {
      if (!peer.closed) peer.schedule(copy);
    }
  }

  /**
   * Sends frames in order; stops at the first failure.
   */
  async sendMultiple(frames: Iterable<Frame>): Promise<void> {
    for (const frame of frames) {
      await this.send(frame);
    }
  }

  /**
   * Stops delivery and drops all subscribers. Repeated calls do nothing.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.handlers.clear();
    for (const peer of this.peers) peer.peers.delete(this);
    this.peers.clear();
    this.logger.info(`Bus "${this.channel}" shut down after ${this.sentCount} frame(s)`);
  }

  private schedule(frame: Frame): void {
    setImmediate(() => this.deliver(frame));
  }

  private deliver(frame: Frame): void {
    if (this.closed) return;
    for (const handler of [...this.handlers]) {
      try {
        handler(cloneFrame(frame));
      } catch (error: unknown) {
        this.logger.error('Frame handler failed', {
          frameId: frame.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
