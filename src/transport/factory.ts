// src/transport/factory.ts

import { EtherlinkConfigError } from '../errors.js';
import { EtherlinkProtocol } from '../framers/etherlink-protocol.js';
import { rootLogger } from '../logger.js';
import { NodeSerialTransport } from './node-transports/node-serialport.js';
import { NodeTcpTransport } from './node-transports/node-tcp-transport.js';
import type {
  EtherlinkConfig,
  LinkTransport,
  NodeSerialTransportOptions,
  NodeTcpTransportOptions,
} from '../types/etherlink-types.js';

const logger = rootLogger.createLogger('TransportFactory');

export interface SerialTransportConfig extends NodeSerialTransportOptions {
  type: 'serial';
  path: string;
}

export interface TcpTransportConfig extends NodeTcpTransportOptions {
  type: 'tcp';
  host: string;
  port: number;
}

export type TransportConfig = SerialTransportConfig | TcpTransportConfig;

/**
 * Creates a transport for the given link type.
 *
 * @throws {EtherlinkConfigError} If the type is unknown or a required option is missing.
 */
export function createTransport(options: TransportConfig): LinkTransport {
  if (!options) {
    throw new EtherlinkConfigError('Transport options are required');
  }

  switch (options.type) {
    case 'serial': {
      const { type: _type, path, ...rest } = options;
      if (!path) {
        throw new EtherlinkConfigError('Missing "path" option for serial transport');
      }
      logger.debug(`Creating serial transport for ${path}`);
      return new NodeSerialTransport(path, rest);
    }

    case 'tcp': {
      const { type: _type, host, port, ...rest } = options;
      if (!host) {
        throw new EtherlinkConfigError('Missing "host" option for tcp transport');
      }
      if (port === undefined) {
        throw new EtherlinkConfigError('Missing "port" option for tcp transport');
      }
      logger.debug(`Creating tcp transport for ${host}:${port}`);
      return new NodeTcpTransport(host, port, rest);
    }

    default: {
      const unknownType: unknown = Reflect.get(options, 'type');
      throw new EtherlinkConfigError(`Unknown transport type: ${String(unknownType)}`);
    }
  }
}

export interface LinkOptions {
  transport: TransportConfig | LinkTransport;
  onMessage: EtherlinkConfig['onMessage'];
  name?: string;
  logLevel?: EtherlinkConfig['logLevel'];
}

export interface Link {
  protocol: EtherlinkProtocol;
  transport: LinkTransport;
}

function isLinkTransport(value: TransportConfig | LinkTransport): value is LinkTransport {
  return !('type' in value) && typeof Reflect.get(value, 'sendRaw') === 'function';
}

/**
 * Builds a protocol context wired to a transport in both directions:
 * received bytes go into the parser, encoded frames go out via `sendRaw`.
 * The transport is not connected; call `transport.connect()`.
 */
export function createLink(options: LinkOptions): Link {
  if (!options) {
    throw new EtherlinkConfigError('Link options are required');
  }
  const transport = isLinkTransport(options.transport)
    ? options.transport
    : createTransport(options.transport);

  const protocol = new EtherlinkProtocol({
    onMessage: options.onMessage,
    sendBytes: data => transport.sendRaw(data),
    name: options.name,
    logLevel: options.logLevel,
  });
  transport.attach(protocol);

  return { protocol, transport };
}
