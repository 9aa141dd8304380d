// src/frame-buffer.ts

import { Mutex } from 'async-mutex';
import Logger from './logger.js';
import type { Frame, FrameBufferOptions, FrameSource, LoggerInstance } from './types/signal-types.js';
import { cloneFrame, formatFrame, formatFrameId, parseIdentifier, validateFrame } from './utils/utils.js';

/**
 * Bounded store of the most recent frames.
 * Поддерживает:
 * - Кольцевой буфер фиксированной ёмкости (старые кадры вытесняются)
 * - Потокобезопасность через `async-mutex`
 * - Необратимое завершение через `shutdown()`
 * - Подписку на источник кадров
 */
export class FrameBuffer {
  private readonly _capacity: number;
  private readonly _slots: Array<Frame | undefined>;
  private _head = 0;
  private _count = 0;
  private _shutdown = false;
  private _detach?: () => void;
  private readonly _mutex = new Mutex();
  private readonly logger: LoggerInstance;

  /**
   * @param capacity Максимальное число хранимых кадров, целое > 0
   * @param options.logLevel Уровень логирования категории `FrameBuffer`, по умолчанию: `'error'`
   */
  constructor(capacity: number, options: FrameBufferOptions = {}) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${String(capacity)}`);
    }
    this._capacity = capacity;
    this._slots = new Array<Frame | undefined>(capacity).fill(undefined);

    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('FrameBuffer');
    this.logger.setLevel(options.logLevel ?? 'error');
  }

  get capacity(): number {
    return this._capacity;
  }

  get isShutdown(): boolean {
    return this._shutdown;
  }

  /**
   * Stores a copy of the frame, evicting the oldest one when full.
   * @returns `false` when the buffer is shut down
   * @throws InvalidFrameError
   */
  public async push(frame: Frame): Promise<boolean> {
    validateFrame(frame);
    const copy = cloneFrame(frame);

    const release = await this._mutex.acquire();
    try {
      if (this._shutdown) {
        this.logger.debug('Frame rejected after shutdown', { frameId: frame.id });
        return false;
      }

      const tail = (this._head + this._count) % this._capacity;
      this._slots[tail] = copy;
      if (this._count < this._capacity) {
        this._count++;
      } else {
        this._head = (this._head + 1) % this._capacity;
      }
      return true;
    } finally {
      release();
    }
  }

  /**
   * Most recently pushed frame with the given identifier, as a copy.
   */
  public async getLatest(id: number): Promise<Frame | undefined> {
    const release = await this._mutex.acquire();
    try {
      for (let i = this._count - 1; i >= 0; i--) {
        const frame = this.slotAt(i);
        if (frame?.id === id) return cloneFrame(frame);
      }
      return undefined;
    } finally {
      release();
    }
  }

  /**
   * Copy of the buffer contents, oldest first.
   */
  public async snapshot(): Promise<Frame[]> {
    const release = await this._mutex.acquire();
    try {
      return this.collect();
    } finally {
      release();
    }
  }

  /**
   * Frames in arrival order, optionally only those with the given identifier.
   * @param id Число или шестнадцатеричная строка (`'0x100'`, `'100'`)
   * @throws TypeError when `id` is not an identifier
   */
  public async getAll(id?: number | string): Promise<Frame[]> {
    let filter: number | undefined;
    if (id !== undefined) {
      filter = parseIdentifier(id);
      if (filter === undefined) {
        throw new TypeError(`Invalid frame identifier: ${String(id)}`);
      }
    }

    const frames = await this.snapshot();
    return filter === undefined ? frames : frames.filter(frame => frame.id === filter);
  }

  public size(): number {
    return this._count;
  }

  /**
   * One formatted line per stored frame, oldest first.
   */
  public async dump(): Promise<string[]> {
    const frames = await this.snapshot();
    return frames.map(formatFrame);
  }

  /**
   * Feeds frames delivered by `source` into {@link push}.
   * Only one source is attached at a time; the previous one is detached.
   */
  public attach(source: FrameSource): void {
    if (this._shutdown) {
      throw new Error('Cannot attach a source to a shut down buffer');
    }
    this.detach();
    this._detach = source.onFrame(frame => {
      this.push(frame).then(
        accepted => {
          if (!accepted) this.logger.trace('Delivered frame dropped', { frameId: frame.id });
        },
        (error: unknown) => {
          this.logger.warn('Delivered frame rejected', {
            frameId: frame.id,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      );
    });
    this.logger.debug('Frame source attached');
  }

  public detach(): void {
    if (this._detach) {
      this._detach();
      this._detach = undefined;
      this.logger.debug('Frame source detached');
    }
  }

  /**
   * Переводит буфер в состояние Shutdown. Повторный вызов ничего не делает.
   * Содержимое остаётся доступным для чтения.
   */
  public async shutdown(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      if (this._shutdown) return;
      this._shutdown = true;
      this.detach();
      this.logger.info(`Buffer shut down with ${this._count} frame(s)`);
    } finally {
      release();
    }
  }

  private slotAt(index: number): Frame | undefined {
    return this._slots[(this._head + index) % this._capacity];
  }

  private collect(): Frame[] {
    const frames: Frame[] = [];
    for (let i = 0; i < this._count; i++) {
      const frame = this.slotAt(i);
      if (frame) frames.push(cloneFrame(frame));
    }
    return frames;
  }

  public toString(): string {
    const ids = this.collect().map(frame => formatFrameId(frame.id));
    return `FrameBuffer(${this._count}/${this._capacity}) [${ids.join(', ')}]`;
  }
}
