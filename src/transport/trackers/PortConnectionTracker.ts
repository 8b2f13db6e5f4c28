// src/transport/trackers/PortConnectionTracker.ts

import { Mutex } from 'async-mutex';
import { ConnectionErrorType } from '../../types/etherlink-types.js';
import type { PortStateHandler } from '../../types/etherlink-types.js';

/**
 * Connection state of a physical link
 */
export interface PortConnectionState {
  /** Link is open and passing bytes */
  isConnected: boolean;
  errorType?: ConnectionErrorType;
  errorMessage?: string;
  /** Time of the last state change (ms) */
  timestamp: number;
}

export interface PortConnectionTrackerOptions {
  /** Trailing debounce for disconnect notifications (ms), default 300 */
  debounceMs?: number;
}

/**
 * Tracks whether a link is up and tells a handler when that changes.
 *
 * Connects are reported immediately. Disconnects are debounced: if the link
 * comes back within `debounceMs` the handler is not told anything.
 */
export class PortConnectionTracker {
  private _handler?: PortStateHandler;
  private _state: PortConnectionState;
  private readonly _debounceMs: number;
  private readonly _mutex = new Mutex();
  private _debounceTimeout: NodeJS.Timeout | null = null;

  constructor(options: PortConnectionTrackerOptions = {}) {
    this._debounceMs = options.debounceMs ?? 300;
    this._state = {
      isConnected: false,
      timestamp: Date.now(),
    };
  }

  /**
   * Sets the handler and immediately reports the current state to it.
   */
  public async setHandler(handler: PortStateHandler): Promise<void> {
    await this._mutex.runExclusive(() => {
      this._handler = handler;
      const { isConnected, errorType, errorMessage } = this._state;
      if (isConnected || errorType === undefined) {
        handler(isConnected);
      } else {
        handler(false, { type: errorType, message: errorMessage ?? '' });
      }
    });
  }

  public async notifyConnected(): Promise<void> {
    await this._mutex.runExclusive(() => {
      // The handler never heard about the drop, so it needn't hear about the recovery
      const disconnectPending = this._debounceTimeout !== null;
      if (this._debounceTimeout) {
        clearTimeout(this._debounceTimeout);
        this._debounceTimeout = null;
      }

      if (this._state.isConnected) return;

      this._state = { isConnected: true, timestamp: Date.now() };
      if (!disconnectPending) this._handler?.(true);
    });
  }

  /**
   * Records a disconnect; the handler hears about it after `debounceMs`
   * unless the link comes back first.
   */
  public async notifyDisconnected(
    errorType: ConnectionErrorType = ConnectionErrorType.UnknownError,
    errorMessage: string = 'Port disconnected'
  ): Promise<void> {
    await this._mutex.runExclusive(() => {
      if (!this._state.isConnected) return;

      this._state = {
        isConnected: false,
        errorType,
        errorMessage,
        timestamp: Date.now(),
      };

      if (this._debounceTimeout) clearTimeout(this._debounceTimeout);
      this._debounceTimeout = setTimeout(() => {
        this._debounceTimeout = null;
        this._handler?.(false, { type: errorType, message: errorMessage });
      }, this._debounceMs);
    });
  }

  /**
   * Records a failure the link will not recover from and reports it at once,
   * replacing any disconnect still waiting on the debounce.
   */
  public async notifyFailed(errorType: ConnectionErrorType, errorMessage: string): Promise<void> {
    await this._mutex.runExclusive(() => {
      if (this._debounceTimeout) {
        clearTimeout(this._debounceTimeout);
        this._debounceTimeout = null;
      }
      this._state = {
        isConnected: false,
        errorType,
        errorMessage,
        timestamp: Date.now(),
      };
      this._handler?.(false, { type: errorType, message: errorMessage });
    });
  }

  public async getState(): Promise<PortConnectionState> {
    return this._mutex.runExclusive(() => ({ ...this._state }));
  }

  public async isConnected(): Promise<boolean> {
    return this._mutex.runExclusive(() => this._state.isConnected);
  }

  /**
   * Cancels a pending disconnect notification and forgets the state.
   */
  public async clear(): Promise<void> {
    await this._mutex.runExclusive(() => {
      if (this._debounceTimeout) {
        clearTimeout(this._debounceTimeout);
        this._debounceTimeout = null;
      }
      this._state = {
        isConnected: false,
        timestamp: Date.now(),
      };
    });
  }
}
