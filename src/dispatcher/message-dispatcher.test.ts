import { describe, it, expect, vi } from 'vitest';
import { MessageDispatcher, SystemResponder } from './message-dispatcher.js';
import { EtherlinkProtocol } from '../framers/etherlink-protocol.js';
import { PROTOCOL_VERSION, SystemMessageId } from '../constants/constants.js';
import { rootLogger } from '../logger.js';
import type { LogRecord } from '../types/etherlink-types.js';

interface Received {
  msgId: number;
  payload: number[];
}

describe('MessageDispatcher', () => {
  it('routes by message id', () => {
    const dispatcher = new MessageDispatcher();
    const a = vi.fn();
    const b = vi.fn();
    dispatcher.on(0x10, a).on(0x11, b);

    const payload = Uint8Array.of(1, 2);
    dispatcher.handleMessage(0x11, payload, 2);
    expect(a).not.toHaveBeenCalled();
    expect(b).toHaveBeenCalledWith(0x11, payload, 2);
  });

  it('falls back to onAny and counts the rest', () => {
    const dispatcher = new MessageDispatcher();
    dispatcher.handleMessage(0x20, new Uint8Array(0), 0);
    expect(dispatcher.unhandled).toBe(1);

    const fallback = vi.fn();
    dispatcher.onAny(fallback);
    dispatcher.handleMessage(0x21, new Uint8Array(0), 0);
    expect(fallback).toHaveBeenCalledTimes(1);
    expect(dispatcher.unhandled).toBe(1);
  });

  it('off removes a handler', () => {
    const dispatcher = new MessageDispatcher();
    dispatcher.on(0x110, vi.fn());
    expect(dispatcher.has(0x10)).toBe(true);
    dispatcher.off(0x10);
    expect(dispatcher.has(0x10)).toBe(false);
  });

  it('can be used directly as the protocol message handler', () => {
    const dispatcher = new MessageDispatcher();
    const handler = vi.fn();
    dispatcher.on(0x10, handler);
    const protocol = new EtherlinkProtocol({ onMessage: dispatcher, sendBytes: () => {} });
    protocol.processBytes([0xa5, 0x10, 0x00, 0x57]);
    expect(handler).toHaveBeenCalledTimes(1);
  });
});

describe('SystemResponder', () => {
  function createDevice() {
    const replies: Received[] = [];
    const host = new EtherlinkProtocol({
      onMessage: (msgId, payload) => replies.push({ msgId, payload: Array.from(payload) }),
      sendBytes: data => device.processBytes(data),
    });
    const dispatcher = new MessageDispatcher();
    const device: EtherlinkProtocol = new EtherlinkProtocol({
      onMessage: dispatcher,
      sendBytes: data => host.processBytes(data),
    });
    new SystemResponder(device).attach(dispatcher);
    return { host, device, replies };
  }

  it('answers PING with a PONG echoing the payload', () => {
    const { host, replies } = createDevice();
    host.send(SystemMessageId.PING, Uint8Array.of(0xca, 0xfe));
    expect(replies).toEqual([{ msgId: SystemMessageId.PONG, payload: [0xca, 0xfe] }]);
  });

  it('answers an empty PING with an empty PONG', () => {
    const { host, replies } = createDevice();
    host.send(SystemMessageId.PING);
    expect(replies).toEqual([{ msgId: SystemMessageId.PONG, payload: [] }]);
  });

  it('answers VERSION with the protocol version', () => {
    const { host, replies } = createDevice();
    host.send(SystemMessageId.VERSION);
    expect(replies).toEqual([{ msgId: SystemMessageId.VERSION, payload: [PROTOCOL_VERSION] }]);
  });

  it('reports a custom version', () => {
    const send = vi.fn((_msgId: number, _payload?: Uint8Array | null, _length?: number) => true);
    new SystemResponder({ send }, 7).handleVersion();
    expect(send.mock.calls[0][0]).toBe(SystemMessageId.VERSION);
    expect(Array.from(send.mock.calls[0][1] ?? [])).toEqual([7]);
  });

  it('logs ERROR frames without replying', () => {
    const records: LogRecord[] = [];
    rootLogger.watch(record => records.push(record));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { host, replies } = createDevice();
    try {
      host.send(SystemMessageId.ERROR, Uint8Array.of(0x03, 0x1f));
    } finally {
      rootLogger.clearWatch();
    }
    expect(replies).toEqual([]);
    expect(records).toEqual([
      {
        level: 'warn',
        args: ['Peer reported error: 03 1f'],
        context: { msgId: SystemMessageId.ERROR, length: 2, logger: 'MessageDispatcher' },
      },
    ]);
  });
});
