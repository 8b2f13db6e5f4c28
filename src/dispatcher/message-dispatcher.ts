// src/dispatcher/message-dispatcher.ts

import { PROTOCOL_VERSION, SystemMessageId } from '../constants/constants.js';
import { rootLogger } from '../logger.js';
import { toHex } from '../utils/utils.js';
import type { FrameSender } from '../payload/payload-layout.js';
import type { MessageCallback, MessageHandlerObject } from '../types/etherlink-types.js';

const logger = rootLogger.createLogger('MessageDispatcher');

/**
 * Routes received frames to a handler per message ID.
 * Pass an instance as `onMessage` to EtherlinkProtocol.
 */
export class MessageDispatcher implements MessageHandlerObject {
  private readonly handlers = new Map<number, MessageCallback>();
  private fallback: MessageCallback | null = null;
  private _unhandled: number = 0;

  public on(msgId: number, handler: MessageCallback): this {
    this.handlers.set(msgId & 0xff, handler);
    return this;
  }

  public off(msgId: number): this {
    this.handlers.delete(msgId & 0xff);
    return this;
  }

  /** Called for IDs with no dedicated handler */
  public onAny(handler: MessageCallback | null): this {
    this.fallback = handler;
    return this;
  }

  public has(msgId: number): boolean {
    return this.handlers.has(msgId & 0xff);
  }

  public get unhandled(): number {
    return this._unhandled;
  }

  public handleMessage(msgId: number, payload: Uint8Array, length: number): void {
    const handler = this.handlers.get(msgId) ?? this.fallback;
    if (!handler) {
      this._unhandled++;
      logger.debug('No handler for message', { msgId, length });
      return;
    }
    handler(msgId, payload, length);
  }
}

/**
 * Answers the reserved system messages: PING gets a PONG echoing the payload,
 * VERSION gets a one-byte protocol version. ERROR frames are logged.
 */
export class SystemResponder {
  constructor(
    private readonly sender: FrameSender,
    private readonly version: number = PROTOCOL_VERSION
  ) {}

  public attach(dispatcher: MessageDispatcher): void {
    dispatcher
      .on(SystemMessageId.PING, (_id, payload, length) => this.handlePing(payload, length))
      .on(SystemMessageId.VERSION, () => this.handleVersion())
      .on(SystemMessageId.ERROR, (_id, payload, length) => this.handleError(payload, length));
  }

  public handlePing(payload: Uint8Array, length: number): boolean {
    return this.sender.send(SystemMessageId.PONG, payload, length);
  }

  public handleVersion(): boolean {
    return this.sender.send(SystemMessageId.VERSION, Uint8Array.of(this.version & 0xff));
  }

  public handleError(payload: Uint8Array, length: number): void {
    const hex = toHex(payload.subarray(0, length), ' ');
    logger.warn(`Peer reported error: ${hex || '(empty)'}`, { msgId: SystemMessageId.ERROR, length });
  }
}
