import { describe, it, expect, vi } from 'vitest';
import { createLink, createTransport } from './factory.js';
import type { TransportConfig } from './factory.js';
import { NodeSerialTransport } from './node-transports/node-serialport.js';
import { NodeTcpTransport } from './node-transports/node-tcp-transport.js';
import { EtherlinkConfigError } from '../errors.js';
import type {
  ByteReceiver,
  LinkTransport,
  PortStateHandler,
  RawDataHandler,
} from '../types/etherlink-types.js';

/** In-memory transport that loops sent bytes into a second receiver */
class LoopbackTransport implements LinkTransport {
  public isOpen = true;
  public receiver: ByteReceiver | null = null;
  public readonly sent: number[][] = [];

  async connect(): Promise<void> {
    this.isOpen = true;
  }
  async disconnect(): Promise<void> {
    this.isOpen = false;
  }
  destroy(): void {
    this.isOpen = false;
  }
  async sendBytes(data: Uint8Array): Promise<void> {
    this.sent.push(Array.from(data));
  }
  sendRaw(data: Uint8Array): void {
    this.sent.push(Array.from(data));
  }
  attach(receiver: ByteReceiver | null): void {
    this.receiver = receiver;
  }
  setRawDataHandler(_handler: RawDataHandler | null): void {}
  async setPortStateHandler(_handler: PortStateHandler): Promise<void> {}
}

describe('createTransport', () => {
  it('creates a serial transport', () => {
    const transport = createTransport({ type: 'serial', path: '/dev/ttyTEST0', baudRate: 57600 });
    expect(transport).toBeInstanceOf(NodeSerialTransport);
    expect(transport.isOpen).toBe(false);
  });

  it('creates a tcp transport', () => {
    const transport = createTransport({ type: 'tcp', host: 'localhost', port: 5555 });
    expect(transport).toBeInstanceOf(NodeTcpTransport);
  });

  it('rejects missing fields and unknown types', () => {
    expect(() => createTransport({ type: 'serial', path: '' })).toThrow(
      new EtherlinkConfigError('Missing "path" option for serial transport')
    );
    expect(() => createTransport({ type: 'tcp', host: '', port: 1 })).toThrow(
      new EtherlinkConfigError('Missing "host" option for tcp transport')
    );

    const bogus: unknown = { type: 'ble' };
    expect(() => Reflect.apply(createTransport, undefined, [bogus])).toThrow(
      new EtherlinkConfigError('Unknown transport type: ble')
    );
  });

  it('passes options through to the transport', async () => {
    const portFactory = vi.fn(() => {
      throw new Error('factory called');
    });
    const config: TransportConfig = { type: 'serial', path: '/dev/ttyTEST1', portFactory };
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await expect(createTransport(config).connect()).rejects.toThrow('factory called');
    expect(portFactory).toHaveBeenCalledTimes(1);
  });
});

describe('createLink', () => {
  it('wires the protocol to the transport in both directions', () => {
    const transport = new LoopbackTransport();
    const received: number[] = [];
    const { protocol, transport: linked } = createLink({
      transport,
      onMessage: msgId => received.push(msgId),
    });

    expect(linked).toBe(transport);
    expect(transport.receiver).toBe(protocol);

    protocol.send(0x10);
    expect(transport.sent).toEqual([[0xa5, 0x10, 0x00, 0x57]]);

    transport.receiver?.processBytes(Uint8Array.of(0xa5, 0x10, 0x00, 0x57));
    expect(received).toEqual([0x10]);
    expect(protocol.getStats()).toEqual({ rxFrames: 1, rxErrors: 0, txFrames: 1 });
  });

  it('builds the transport from a config', () => {
    const { transport } = createLink({
      transport: { type: 'tcp', host: 'localhost', port: 5555 },
      onMessage: () => {},
    });
    expect(transport).toBeInstanceOf(NodeTcpTransport);
  });
});
