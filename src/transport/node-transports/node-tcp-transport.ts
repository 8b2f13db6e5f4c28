// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { Mutex } from 'async-mutex';
import { rootLogger } from '../../logger.js';
import {
  EtherlinkConfigError,
  TransportConnectionError,
  TransportMaxReconnectError,
  TransportNotConnectedError,
  TransportWriteError,
  toTransportError,
} from '../../errors.js';
import { ConnectionErrorType } from '../../types/etherlink-types.js';
import type {
  ByteReceiver,
  LinkTransport,
  NodeTcpTransportOptions,
  PortStateHandler,
  RawDataHandler,
  SocketFactory,
  SocketLike,
} from '../../types/etherlink-types.js';
import { asUint8Array } from '../../utils/utils.js';
import { PortConnectionTracker } from '../trackers/PortConnectionTracker.js';

const logger = rootLogger.createLogger('NodeTcpTransport');

const defaultSocketFactory: SocketFactory = (options, onConnect) => net.connect(options, onConnect);

/**
 * TCP link, for devices reachable through a Wi-Fi module or a serial-to-TCP bridge.
 * Same receiver/reset/reconnect behaviour as the serial transport.
 */
export class NodeTcpTransport implements LinkTransport {
  private readonly host: string;
  private readonly port: number;
  private readonly reconnectInterval: number;
  private readonly maxReconnectAttempts: number;
  private readonly socketFactory: SocketFactory;
  private socket: SocketLike | null = null;
  private receiver: ByteReceiver | null;
  private rawDataHandler: RawDataHandler | null = null;

  private _isOpen: boolean = false;
  private _reconnectAttempts: number = 0;
  private _shouldReconnect: boolean = true;
  private _reconnectTimeout: NodeJS.Timeout | null = null;
  private _connectionPromise: Promise<void> | null = null;
  private readonly _writeMutex: Mutex = new Mutex();
  private readonly portConnectionTracker = new PortConnectionTracker();

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    if (!host) {
      throw new EtherlinkConfigError('TCP host is required');
    }
    if (!Number.isInteger(port) || port <= 0 || port > 0xffff) {
      throw new EtherlinkConfigError(`Invalid TCP port: ${port}`);
    }
    this.host = host;
    this.port = port;
    this.receiver = options.receiver ?? null;
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
    this.reconnectInterval = options.reconnectInterval ?? 3000;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? Infinity;
  }

  private get target(): string {
    return `${this.host}:${this.port}`;
  }

  public get isOpen(): boolean {
    return this._isOpen;
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

  public async connect(): Promise<void> {
    if (this._isOpen) return;
    if (this._connectionPromise) return this._connectionPromise;

    this._shouldReconnect = true;
    this._clearReconnectTimeout();
    this._connectionPromise = this._open();
    try {
      await this._connectionPromise;
    } catch (err: unknown) {
      const error = toTransportError(err, TransportConnectionError);
      logger.error(`Failed to connect: ${error.message}`, { transport: this.target });
      throw error;
    } finally {
      this._connectionPromise = null;
    }
  }

  private async _open(): Promise<void> {
    this._releaseSocket();
    logger.info('Connecting...', { transport: this.target });

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const socket = this.socketFactory({ host: this.host, port: this.port }, () => {
        settled = true;
        socket.setNoDelay(true);
        resolve();
      });
      this.socket = socket;

      socket.on('error', (err: Error) => {
        if (!settled) {
          settled = true;
          reject(err);
          return;
        }
        this._onError(err);
      });
      socket.on('data', (chunk: Uint8Array) => this._onData(chunk));
      socket.on('close', () => this._onClose());
    });

    this._isOpen = true;
    this._reconnectAttempts = 0;
    this.receiver?.reset();
    logger.info('Connected', { transport: this.target });
    await this.portConnectionTracker.notifyConnected();
  }

  private _releaseSocket(): void {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    socket.removeAllListeners('data');
    socket.removeAllListeners('error');
    socket.removeAllListeners('close');
    socket.destroy();
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
        transport: this.target,
      });
    }
  }

  private _onError(err: Error): void {
    logger.error(`Socket error: ${err.message}`, { transport: this.target });
    this._handleConnectionLoss(ConnectionErrorType.ConnectionLost, err.message);
  }

  private _onClose(): void {
    this._handleConnectionLoss(ConnectionErrorType.PortClosed, 'Connection closed by peer');
  }

  private _handleConnectionLoss(type: ConnectionErrorType, reason: string): void {
    if (!this._isOpen) return;

    logger.warn(`Connection lost: ${reason}`, { transport: this.target });
    this._isOpen = false;
    this.receiver?.reset();
    this.portConnectionTracker.notifyDisconnected(type, reason).catch((err: unknown) => {
      logger.error(`Port state notification failed: ${String(err)}`, { transport: this.target });
    });
    this._scheduleReconnect();
  }

  private _scheduleReconnect(): void {
    if (!this._shouldReconnect || this._reconnectTimeout) return;
    if (this._reconnectAttempts >= this.maxReconnectAttempts) {
      const error = new TransportMaxReconnectError(this.maxReconnectAttempts);
      logger.error(error.message, { transport: this.target });
      this._shouldReconnect = false;
      this.portConnectionTracker
        .notifyFailed(ConnectionErrorType.MaxReconnect, error.message)
        .catch((err: unknown) => {
          logger.error(`Port state notification failed: ${String(err)}`, { transport: this.target });
        });
      return;
    }
    this._reconnectAttempts++;
    this._reconnectTimeout = setTimeout(() => {
      this._reconnectTimeout = null;
      this._attemptReconnect().catch((err: unknown) => {
        logger.error(`Reconnect failed: ${String(err)}`, { transport: this.target });
      });
    }, this.reconnectInterval);
  }

  private async _attemptReconnect(): Promise<void> {
    if (!this._shouldReconnect || this._isOpen || this._connectionPromise) return;
    this._connectionPromise = this._open();
    try {
      await this._connectionPromise;
    } catch (err: unknown) {
      logger.warn(`Reconnect attempt ${this._reconnectAttempts} failed: ${String(err)}`, {
        transport: this.target,
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

  public async sendBytes(data: Uint8Array): Promise<void> {
    await this._writeMutex.runExclusive(async () => {
      const socket = this.socket;
      if (!this._isOpen || !socket) throw new TransportNotConnectedError(this.target);

      await new Promise<void>((resolve, reject) => {
        socket.write(data, (err?: Error | null) => {
          if (err) reject(toTransportError(err, TransportWriteError));
          else resolve();
        });
      });
    });
  }

  public sendRaw(data: Uint8Array): void {
    this.sendBytes(data).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`Dropped ${data.length} bytes: ${message}`, { transport: this.target });
    });
  }

  public async disconnect(): Promise<void> {
    this._shouldReconnect = false;
    this._clearReconnectTimeout();

    const wasOpen = this._isOpen;
    this._isOpen = false;
    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.removeAllListeners('close');
      await new Promise<void>(resolve => {
        socket.end(() => resolve());
      });
      socket.removeAllListeners('data');
      socket.removeAllListeners('error');
    }
    this.receiver?.reset();

    if (wasOpen) {
      logger.info('Disconnected by user', { transport: this.target });
      await this.portConnectionTracker.notifyDisconnected(
        ConnectionErrorType.ManualDisconnect,
        'Connection closed by user'
      );
    }
  }

  public destroy(): void {
    this._shouldReconnect = false;
    this._clearReconnectTimeout();
    this._isOpen = false;
    this.receiver = null;
    this.rawDataHandler = null;
    this._releaseSocket();
    this.portConnectionTracker.clear().catch((err: unknown) => {
      logger.error(`Failed to clear port state: ${String(err)}`, { transport: this.target });
    });
  }
}

export default NodeTcpTransport;
