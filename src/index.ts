// src/index.ts

export * from './constants/constants.js';
export * from './errors.js';
export { default as Logger, rootLogger } from './logger.js';

export { CRC8_TABLE, crc8, crc8Update } from './utils/crc.js';
export { asUint8Array, fromBytes, fromHex, toHex } from './utils/utils.js';
export { LinkDiagnostics, analyze } from './utils/diagnostics.js';
export type {
  AnalysisResult,
  DiagnosticsOptions,
  DiagnosticsSample,
  StatsSource,
} from './utils/diagnostics.js';

export { FrameParser } from './framers/frame-parser.js';
export { FrameEncoder, encodeFrame, validatePayload } from './framers/frame-encoder.js';
export type { EncodeValidation } from './framers/frame-encoder.js';
export { EtherlinkProtocol } from './framers/etherlink-protocol.js';

export {
  bytes,
  defineLayout,
  f32,
  f64,
  i16,
  i32,
  i8,
  sendTyped,
  u16,
  u32,
  u8,
} from './payload/payload-layout.js';
export type {
  BytesField,
  FieldSpec,
  FieldType,
  FrameSender,
  LayoutOptions,
  LayoutValue,
  NumericField,
  PayloadLayout,
} from './payload/payload-layout.js';

export { MessageDispatcher, SystemResponder } from './dispatcher/message-dispatcher.js';

export { NodeSerialTransport } from './transport/node-transports/node-serialport.js';
export { NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { PortConnectionTracker } from './transport/trackers/PortConnectionTracker.js';
export type {
  PortConnectionState,
  PortConnectionTrackerOptions,
} from './transport/trackers/PortConnectionTracker.js';
export { createLink, createTransport } from './transport/factory.js';
export type {
  Link,
  LinkOptions,
  SerialTransportConfig,
  TcpTransportConfig,
  TransportConfig,
} from './transport/factory.js';

export { ConnectionErrorType } from './types/etherlink-types.js';
export type * from './types/etherlink-types.js';
