// src/types/etherlink-types.ts

import type { ParserState, RejectReason } from '../constants/constants.js';

// !=============================================================================
// ! Protocol callbacks
// !=============================================================================

/**
 * Called once per valid frame. `payload` is a view into the parser's receive
 * buffer and is only valid until the callback returns; copy it to keep it.
 */
export type MessageCallback = (msgId: number, payload: Uint8Array, length: number) => void;

export interface MessageHandlerObject {
  handleMessage(msgId: number, payload: Uint8Array, length: number): void;
}

export type MessageHandler = MessageCallback | MessageHandlerObject;

/** Transmits a complete encoded frame. May fail without telling the encoder. */
export type ByteSinkCallback = (data: Uint8Array) => void | Promise<void>;

export interface ByteSinkObject {
  sendBytes(data: Uint8Array): void | Promise<void>;
}

export type ByteSink = ByteSinkCallback | ByteSinkObject;

/** Anything a transport can push received bytes into */
export interface ByteReceiver {
  processBytes(data: Uint8Array): void;
  reset(): void;
}

// !=============================================================================
// ! Protocol context
// !=============================================================================

export interface EtherlinkConfig {
  onMessage: MessageHandler;
  sendBytes: ByteSink;
  /**
   * Logger category, defaults to 'Etherlink'. Categories live on the shared
   * root logger, so protocols with the same name share one level.
   */
  name?: string;
  /** Sets the level of the `name` category; give each link its own name to tune it alone */
  logLevel?: LogLevel;
}

export interface EtherlinkStats {
  rxFrames: number;
  rxErrors: number;
  txFrames: number;
}

/** Notifications raised by the frame parser */
export interface ParserEvents {
  onFrame(msgId: number, payload: Uint8Array, length: number): void;
  onReject(reason: RejectReason, msgId: number, length: number): void;
}

export interface ParserSnapshot {
  state: ParserState;
  messageId: number;
  length: number;
  cursor: number;
  runningCrc: number;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  logger?: string;
  msgId?: number;
  length?: number;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}

// !=============================================================================
// ! Transports
// !=============================================================================

export enum ConnectionErrorType {
  UnknownError = 'UnknownError',
  PortClosed = 'PortClosed',
  ConnectionLost = 'ConnectionLost',
  MaxReconnect = 'MaxReconnect',
  ManualDisconnect = 'ManualDisconnect',
  Destroyed = 'Destroyed',
}

export type PortStateHandler = (
  connected: boolean,
  error?: { type: ConnectionErrorType; message: string }
) => void;

export type RawDataHandler = (data: Uint8Array) => void;

/** A physical link that feeds a receiver and transmits frames */
export interface LinkTransport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  destroy(): void;
  /** Writes bytes; rejects if the link is down or the write fails */
  sendBytes(data: Uint8Array): Promise<void>;
  /** Fire-and-forget variant suitable as a ByteSink; failures are only logged */
  sendRaw(data: Uint8Array): void;
  attach(receiver: ByteReceiver | null): void;
  setRawDataHandler(handler: RawDataHandler | null): void;
  setPortStateHandler(handler: PortStateHandler): Promise<void>;
}

export interface ReconnectOptions {
  reconnectInterval?: number;
  maxReconnectAttempts?: number;
}

/** Minimal surface of a serialport instance used by the transport */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  write(data: Uint8Array, callback: (err: Error | null | undefined) => void): boolean;
  drain(callback: (err: Error | null | undefined) => void): void;
  on(event: 'data', listener: (chunk: Uint8Array) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'close', listener: () => void): this;
  removeAllListeners(event?: string): this;
}

export interface SerialPortFactoryOptions {
  path: string;
  baudRate: number;
  dataBits: 5 | 6 | 7 | 8;
  stopBits: 1 | 1.5 | 2;
  parity: 'none' | 'even' | 'mark' | 'odd' | 'space';
}

export type SerialPortFactory = (options: SerialPortFactoryOptions) => SerialPortLike;

export interface NodeSerialTransportOptions extends ReconnectOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 1.5 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  receiver?: ByteReceiver;
  portFactory?: SerialPortFactory;
}

/** Minimal surface of a net.Socket used by the transport */
export interface SocketLike {
  setNoDelay(noDelay?: boolean): this;
  write(data: Uint8Array, callback: (err?: Error | null) => void): boolean;
  end(callback?: () => void): this;
  destroy(): this;
  on(event: 'data', listener: (chunk: Uint8Array) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'close', listener: () => void): this;
  removeAllListeners(event?: string): this;
}

export type SocketFactory = (
  options: { host: string; port: number },
  onConnect: () => void
) => SocketLike;

export interface NodeTcpTransportOptions extends ReconnectOptions {
  receiver?: ByteReceiver;
  socketFactory?: SocketFactory;
}
