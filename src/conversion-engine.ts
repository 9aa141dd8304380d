// src/conversion-engine.ts

import { decodeMessage } from './codec/message-codec.js';
import { ConversionFault } from './errors.js';
import Logger from './logger.js';
import { MappingTable } from './mapping/mapping-table.js';
import type {
  ConversionEngineOptions,
  ConversionResult,
  ConversionStatisticsDetails,
  ConversionStatisticsSnapshot,
  Frame,
  LoadOptions,
  LoadSummary,
  LoggerInstance,
  LogLevel,
  MessageDefinition,
  ResolvedMessageDefinition,
  SignalValue,
  TelemetrySink,
} from './types/signal-types.js';
import { ConversionStatistics } from './utils/statistics.js';
import { formatFrameId, payloadOf, validateFrame } from './utils/utils.js';

/**
 * Turns frames into destination-path -> value maps using a {@link MappingTable}.
 *
 * `convert` never throws: a signal that cannot be decoded is skipped, and any
 * other failure is counted as an error and yields an empty result.
 */
class ConversionEngine {
  private mappingTable: MappingTable;
  private stats: ConversionStatistics;
  private logger: LoggerInstance;

  constructor(options: ConversionEngineOptions = {}) {
    const loggerInstance = options.logger ?? new Logger();
    this.logger = loggerInstance.createLogger('ConversionEngine');
    this.logger.setLevel(options.logLevel ?? 'error');

    this.mappingTable =
      options.mappingTable ?? new MappingTable({ logger: loggerInstance, logLevel: options.logLevel });
    this.stats = new ConversionStatistics();

    if (options.useDefaultMappings) {
      this.mappingTable.useDefaults();
    }
  }

  /**
   * Decodes a frame and returns the values of its mapped signals keyed by
   * destination path. Frames without a definition or without any mapping
   * produce `{}`. A frame that breaks the frame contract is counted as an error.
   */
  convert(frame: Frame): ConversionResult {
    let frameId: number | undefined;

    try {
      frameId = frame.id;
      this.stats.recordReceived(frameId);
      validateFrame(frame);

      const { messages, mappings } = this.mappingTable.view();
      const definition = messages.get(frame.id);
      const destinations = mappings.get(frame.id);
      if (!definition || !destinations) {
        this.logger.trace('No definition or mapping for frame', { frameId: frame.id });
        return {};
      }

      const decoded = decodeMessage(definition, payloadOf(frame));
      for (const failure of decoded.failures) {
        this.logger.debug('Signal skipped', {
          frameId: frame.id,
          signal: failure.signal,
          reason: failure.error.reason,
        });
      }

      const entries: Array<[string, SignalValue]> = [];
      for (const [name, value] of decoded.values) {
        const destination = destinations.get(name);
        if (destination !== undefined) {
          entries.push([destination, value]);
        }
      }
      // destinations are arbitrary strings, `__proto__` included
      const result: ConversionResult = Object.fromEntries(entries);

      const count = Object.keys(result).length;
      if (count > 0) {
        this.stats.recordConverted(count);
        this.logger.trace('Frame converted', { frameId: frame.id, signals: count });
      }
      return result;
    } catch (error: unknown) {
      const fault = new ConversionFault(frameId, error);
      this.stats.recordError(fault);
      this.logger.error(fault.message, frameId === undefined ? {} : { frameId });
      return {};
    }
  }

  /**
   * Converts a frame and hands a non-empty result to the sink.
   * A failing sink is counted as an error.
   * @returns `true` when the sink accepted values
   */
  async publish(frame: Frame, sink: TelemetrySink): Promise<boolean> {
    const values = this.convert(frame);
    if (Object.keys(values).length === 0) return false;

    try {
      await sink.setCurrentValues(values);
      return true;
    } catch (error: unknown) {
      this.stats.recordError(error);
      this.logger.error('Telemetry sink rejected values', {
        frameId: frame.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Publishes frames one after another, in order.
   * @returns number of frames whose values reached the sink
   */
  async publishAll(frames: Iterable<Frame>, sink: TelemetrySink): Promise<number> {
    let published = 0;
    for (const frame of frames) {
      if (await this.publish(frame, sink)) published++;
    }
    return published;
  }

  registerMessage(definition: MessageDefinition): ResolvedMessageDefinition {
    return this.mappingTable.registerMessage(definition);
  }

  addMapping(id: number, signalName: string, destination: string): void {
    this.mappingTable.addMapping(id, signalName, destination);
  }

  load(payload: unknown, options?: LoadOptions): LoadSummary {
    return this.mappingTable.load(payload, options);
  }

  loadFile(path: string, options?: LoadOptions): Promise<LoadSummary> {
    return this.mappingTable.loadFile(path, options);
  }

  getMappingTable(): MappingTable {
    return this.mappingTable;
  }

  /**
   * Copy of the counters; later conversions do not change it.
   */
  statistics(): ConversionStatisticsSnapshot {
    return this.stats.snapshot();
  }

  /**
   * Counters with the error history, as a copy. Use {@link resetStatistics} to reset.
   */
  statisticsDetails(): ConversionStatisticsDetails {
    return this.stats.details();
  }

  resetStatistics(): void {
    this.stats.reset();
    this.logger.info('Statistics reset');
  }

  printStatistics(): void {
    const stats = this.stats.snapshot();
    this.logger.info('=== Conversion statistics ===');
    this.logger.info(`Frames received: ${stats.received}`);
    this.logger.info(`Frames converted: ${stats.converted}`);
    this.logger.info(`Signals emitted: ${stats.signalsEmitted}`);
    this.logger.info(`Errors: ${stats.errors}`);
    const lastError = this.stats.lastError;
    if (lastError) {
      this.logger.info(`Last error: ${lastError.message} at ${lastError.timestamp}`);
    }
    for (const [id, count] of this.stats.receivedByFrameId()) {
      this.logger.debug(`${formatFrameId(id)}: ${count}`);
    }
  }

  setLogLevel(level: LogLevel): void {
    this.logger.setLevel(level);
  }
}

export default ConversionEngine;
