// src/transport/node-transports/node-serialport.ts

import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { rootLogger } from '../../logger.js';
import {
  EtherlinkConfigError,
  TransportConnectionError,
  TransportError,
  TransportMaxReconnectError,
  TransportNotConnectedError,
  TransportWriteError,
  toTransportError,
} from '../../errors.js';
import { ConnectionErrorType } from '../../types/etherlink-types.js';
import type {
  ByteReceiver,
  LinkTransport,
  NodeSerialTransportOptions,
  PortStateHandler,
  RawDataHandler,
  SerialPortFactory,
  SerialPortLike,
} from '../../types/etherlink-types.js';
import { asUint8Array } from '../../utils/utils.js';
import { PortConnectionTracker } from '../trackers/PortConnectionTracker.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 921600,
  DEFAULT_BAUD_RATE: 115200,
  DEFAULT_RECONNECT_INTERVAL_MS: 3000,
} as const;

// ========== LOGGER ==========
const logger = rootLogger.createLogger('NodeSerialTransport');

type SerialSettings = Required<Omit<NodeSerialTransportOptions, 'receiver' | 'portFactory'>>;

const defaultPortFactory: SerialPortFactory = options =>
  new SerialPort({ ...options, autoOpen: false });

/**
 * Serial link over `serialport`.
 *
 * Received chunks are pushed, in arrival order, into the attached receiver
 * (normally an EtherlinkProtocol). The receiver is reset whenever the link
 * drops or is reopened so a half-parsed frame never spans two sessions.
 */
export class NodeSerialTransport implements LinkTransport {
  private readonly path: string;
  private readonly options: SerialSettings;
  private readonly portFactory: SerialPortFactory;
  private port: SerialPortLike | null = null;
  private receiver: ByteReceiver | null;
  private rawDataHandler: RawDataHandler | null = null;

  private _isOpen: boolean = false;
  private _reconnectAttempts: number = 0;
  private _shouldReconnect: boolean = true;
  private _reconnectTimeout: NodeJS.Timeout | null = null;
  private _connectionPromise: Promise<void> | null = null;
  private readonly _writeMutex: Mutex = new Mutex();
  private readonly portConnectionTracker = new PortConnectionTracker({ debounceMs: 300 });

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    if (!path) {
      throw new EtherlinkConfigError('Serial port path is required');
    }
    const { receiver, portFactory, ...settings } = options;
    this.path = path;
    this.receiver = receiver ?? null;
    this.portFactory = portFactory ?? defaultPortFactory;
    this.options = {
      baudRate: NODE_SERIAL_CONSTANTS.DEFAULT_BAUD_RATE,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      reconnectInterval: NODE_SERIAL_CONSTANTS.DEFAULT_RECONNECT_INTERVAL_MS,
      maxReconnectAttempts: Infinity,
      ...settings,
    };

    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new EtherlinkConfigError(`Invalid baud rate: ${this.options.baudRate}`);
    }
  }

  public get isOpen(): boolean {
    return this._isOpen;
  }

  public get reconnectAttempts(): number {
    return this._reconnectAttempts;
  }

  public attach(receiver: ByteReceiver | null): void {
    this.receiver = receiver;
  }

  public setRawDataHandler(handler: RawDataHandler | null): void {
    this.rawDataHandler = handler;
  }

  public async setPortStateHandler(handler: PortStateHandler): Promise<void> {
    await this.portConnectionTracker.setHandler(handler);
  }

  async connect(): Promise<void> {
    if (this._isOpen) return;
    if (this._connectionPromise) {
      logger.warn('Connection attempt already in progress', { transport: this.path });
      return this._connectionPromise;
    }

    this._shouldReconnect = true;
    this._clearReconnectTimeout();
    this._connectionPromise = this._open();
    try {
      await this._connectionPromise;
    } catch (err: unknown) {
      const error = toTransportError(err, TransportConnectionError);
      logger.error(`Failed to open serial port: ${error.message}`, { transport: this.path });
      throw error;
    } finally {
      this._connectionPromise = null;
    }
  }

  private async _open(): Promise<void> {
    await this._releasePort();

    const port = this.portFactory({
      path: this.path,
      baudRate: this.options.baudRate,
      dataBits: this.options.dataBits,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
    });
    this.port = port;

    await new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => (err ? reject(err) : resolve()));
    });

    port.on('data', (chunk: Uint8Array) => this._onData(chunk));
    port.on('error', (err: Error) => this._onError(err));
    port.on('close', () => this._onClose());

    this._isOpen = true;
    this._reconnectAttempts = 0;
    this.receiver?.reset();
    logger.info(`Serial port opened at ${this.options.baudRate} baud`, { transport: this.path });
    await this.portConnectionTracker.notifyConnected();
  }

  private async _releasePort(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (!port) return;

    port.removeAllListeners('data');
    port.removeAllListeners('error');
    port.removeAllListeners('close');
    if (!port.isOpen) return;

    await new Promise<void>((resolve, reject) => {
      port.close((err: Error | null) => (err ? reject(err) : resolve()));
    });
    logger.debug('Port closed', { transport: this.path });
  }

  private _onData(chunk: Uint8Array): void {
    if (!this._isOpen) return;
    const data = asUint8Array(chunk);
    try {
      this.rawDataHandler?.(data);
      this.receiver?.processBytes(data);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Receiver failed while processing ${data.length} bytes: ${message}`, {
        transport: this.path,
      });
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port error: ${err.message}`, { transport: this.path });
    this._handleConnectionLoss(ConnectionErrorType.ConnectionLost, err.message);
  }

  private _onClose(): void {
    logger.info('Serial port closed', { transport: this.path });
    this._handleConnectionLoss(ConnectionErrorType.PortClosed, 'Port was closed');
  }

  private _handleConnectionLoss(type: ConnectionErrorType, reason: string): void {
    if (!this._isOpen) return;

    logger.warn(`Connection loss detected: ${reason}`, { transport: this.path });
    this._isOpen = false;
    this.receiver?.reset();
    this._notifyDisconnected(type, reason);

    if (this._shouldReconnect) this._scheduleReconnect();
  }

  private _notifyDisconnected(type: ConnectionErrorType, reason: string): void {
    this.portConnectionTracker.notifyDisconnected(type, reason).catch((err: unknown) => {
      logger.error(`Port state notification failed: ${String(err)}`, { transport: this.path });
    });
  }

  private _scheduleReconnect(): void {
    if (!this._shouldReconnect || this._reconnectTimeout) return;
    if (this._reconnectAttempts >= this.options.maxReconnectAttempts) {
      const error = new TransportMaxReconnectError(this.options.maxReconnectAttempts);
      logger.error(error.message, { transport: this.path });
      this._shouldReconnect = false;
      this.portConnectionTracker
        .notifyFailed(ConnectionErrorType.MaxReconnect, error.message)
        .catch((err: unknown) => {
          logger.error(`Port state notification failed: ${String(err)}`, { transport: this.path });
        });
      return;
    }

    this._reconnectAttempts++;
    logger.info(
      `Reconnecting in ${this.options.reconnectInterval}ms (attempt ${this._reconnectAttempts})`,
      { transport: this.path }
    );
    this._reconnectTimeout = setTimeout(() => {
      this._reconnectTimeout = null;
      this._attemptReconnect().catch((err: unknown) => {
        logger.error(`Reconnect failed: ${String(err)}`, { transport: this.path });
      });
    }, this.options.reconnectInterval);
  }

  private async _attemptReconnect(): Promise<void> {
    // A manual connect may have got there first
    if (!this._shouldReconnect || this._isOpen || this._connectionPromise) return;
    this._connectionPromise = this._open();
    try {
      await this._connectionPromise;
    } catch (err: unknown) {
      const error = toTransportError(err, TransportConnectionError);
      logger.warn(`Reconnect attempt ${this._reconnectAttempts} failed: ${error.message}`, {
        transport: this.path,
      });
      this._scheduleReconnect();
    } finally {
      this._connectionPromise = null;
    }
  }

  private _clearReconnectTimeout(): void {
    if (this._reconnectTimeout) {
      clearTimeout(this._reconnectTimeout);
      this._reconnectTimeout = null;
    }
  }

  /**
   * Writes bytes and waits for them to be drained to the device.
   * Concurrent calls are serialised so frames never interleave.
   */
  async sendBytes(data: Uint8Array): Promise<void> {
    await this._writeMutex.runExclusive(async () => {
      const port = this.port;
      if (!this._isOpen || !port) throw new TransportNotConnectedError(this.path);

      await new Promise<void>((resolve, reject) => {
        port.write(data, (writeErr: Error | null | undefined) => {
          if (writeErr) {
            reject(toTransportError(writeErr, TransportWriteError));
            return;
          }
          port.drain((drainErr: Error | null | undefined) => {
            if (drainErr) reject(toTransportError(drainErr, TransportWriteError));
            else resolve();
          });
        });
      });
    });
  }

  /**
   * Byte-sink form of sendBytes: never throws, failures are logged.
   */
  sendRaw(data: Uint8Array): void {
    this.sendBytes(data).catch((err: unknown) => {
      const message = err instanceof TransportError ? err.message : String(err);
      logger.warn(`Dropped ${data.length} bytes: ${message}`, { transport: this.path });
    });
  }

  async disconnect(): Promise<void> {
    this._shouldReconnect = false;
    this._clearReconnectTimeout();

    const wasOpen = this._isOpen;
    this._isOpen = false;
    await this._releasePort();
    this.receiver?.reset();

    if (wasOpen) {
      logger.info('Serial port closed by user', { transport: this.path });
      await this.portConnectionTracker.notifyDisconnected(
        ConnectionErrorType.ManualDisconnect,
        'Port closed by user'
      );
    }
  }

  destroy(): void {
    this._shouldReconnect = false;
    this._clearReconnectTimeout();
    this._isOpen = false;
    this.receiver = null;
    this.rawDataHandler = null;
    this._releasePort().catch((err: unknown) => {
      logger.error(`Failed to release port: ${String(err)}`, { transport: this.path });
    });
    this.portConnectionTracker.clear().catch((err: unknown) => {
      logger.error(`Failed to clear port state: ${String(err)}`, { transport: this.path });
    });
  }
}

export default NodeSerialTransport;
