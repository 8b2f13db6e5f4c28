// src/framers/etherlink-protocol.ts

import { ParserState, RejectReason } from '../constants/constants.js';
import { EtherlinkConfigError } from '../errors.js';
import { rootLogger } from '../logger.js';
import { FrameEncoder } from './frame-encoder.js';
import { FrameParser } from './frame-parser.js';
import type {
  ByteReceiver,
  ByteSink,
  ByteSinkCallback,
  EtherlinkConfig,
  EtherlinkStats,
  LoggerInstance,
  MessageCallback,
  MessageHandler,
} from '../types/etherlink-types.js';

const U32 = 0x1_0000_0000;

function toMessageCallback(handler: MessageHandler | undefined): MessageCallback {
  if (typeof handler === 'function') return handler;
  if (handler && typeof handler.handleMessage === 'function') {
    return (msgId, payload, length) => handler.handleMessage(msgId, payload, length);
  }
  throw new EtherlinkConfigError('onMessage callback is required');
}

function toSinkCallback(sink: ByteSink | undefined): ByteSinkCallback {
  if (typeof sink === 'function') return sink;
  if (sink && typeof sink.sendBytes === 'function') {
    return data => sink.sendBytes(data);
  }
  throw new EtherlinkConfigError('sendBytes callback is required');
}

/**
 * Protocol context: one parser, one encoder and the link statistics.
 *
 * Not synchronised. Drive each instance from a single caller; the message
 * handler runs synchronously inside processByte/processBytes.
 */
export class EtherlinkProtocol implements ByteReceiver {
  private readonly parser: FrameParser;
  private readonly encoder: FrameEncoder;
  private readonly onMessage: MessageCallback;
  private readonly logger: LoggerInstance;

  private _rxFrames: number = 0;
  private _rxErrors: number = 0;
  private _txFrames: number = 0;
  private _statsGeneration: number = 0;

  constructor(config: EtherlinkConfig) {
    if (!config) {
      throw new EtherlinkConfigError('Configuration is required');
    }
    this.onMessage = toMessageCallback(config.onMessage);
    const sink = toSinkCallback(config.sendBytes);

    this.logger = rootLogger.createLogger(config.name ?? 'Etherlink');
    if (config.logLevel) {
      this.logger.setLevel(config.logLevel);
    }

    this.parser = new FrameParser({
      onFrame: (msgId, payload, length) => {
        this._rxFrames = (this._rxFrames + 1) % U32;
        this.logger.trace('Frame received', { msgId, length });
        this.onMessage(msgId, payload, length);
      },
      onReject: (reason, msgId, length) => {
        this._rxErrors = (this._rxErrors + 1) % U32;
        this.logger.debug(
          reason === RejectReason.LengthOverflow ? 'Length overflow' : 'CRC mismatch',
          { msgId, length }
        );
      },
    });

    this.encoder = new FrameEncoder(sink, () => {
      this._txFrames = (this._txFrames + 1) % U32;
    });
  }

  public get state(): ParserState {
    return this.parser.state;
  }

  public get rxFrames(): number {
    return this._rxFrames;
  }

  public get rxErrors(): number {
    return this._rxErrors;
  }

  public get txFrames(): number {
    return this._txFrames;
  }

  /** Bumped by every resetStats() */
  public get statsGeneration(): number {
    return this._statsGeneration;
  }

  public getStats(): Readonly<EtherlinkStats> {
    return Object.freeze({
      rxFrames: this._rxFrames,
      rxErrors: this._rxErrors,
      txFrames: this._txFrames,
    });
  }

  public resetStats(): void {
    this._rxFrames = 0;
    this._rxErrors = 0;
    this._txFrames = 0;
    this._statsGeneration++;
  }

  /**
   * Drops any partially received frame. Counters are untouched.
   * Call on reconnect so bytes from an old session cannot merge with new ones.
   */
  public reset(): void {
    this.parser.reset();
  }

  public processByte(byte: number): void {
    this.parser.processByte(byte);
  }

  public processBytes(data: ArrayLike<number>): void {
    this.parser.processBytes(data);
  }

  /**
   * Encodes a frame and passes it to the byte sink.
   * @param payload - may be omitted when length is 0
   * @param length - defaults to payload.length
   * @returns false if the payload is too large or missing; nothing is sent in that case
   */
  public send(msgId: number, payload?: Uint8Array | null, length?: number): boolean {
    return this.encoder.send(msgId, payload, length);
  }
}
