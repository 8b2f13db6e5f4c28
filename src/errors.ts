// src/errors.ts

import { EncodeFailureReason } from './constants/constants.js';

/**
 * Base class for all Etherlink errors
 */
export class EtherlinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EtherlinkError';
  }
}

/**
 * Error class for invalid or missing configuration
 */
export class EtherlinkConfigError extends EtherlinkError {
  constructor(message: string = 'Invalid Etherlink configuration') {
    super(message);
    this.name = 'EtherlinkConfigError';
  }
}

const ENCODE_FAILURE_MESSAGES: Record<EncodeFailureReason, string> = {
  [EncodeFailureReason.PayloadTooLarge]: 'payload exceeds maximum size',
  [EncodeFailureReason.MissingPayload]: 'payload is missing but length is non-zero',
  [EncodeFailureReason.LengthExceedsPayload]: 'length is larger than the supplied payload',
  [EncodeFailureReason.InvalidLength]: 'length must be a non-negative integer',
};

/**
 * Error class for arguments the frame encoder refuses
 */
export class EtherlinkEncodeError extends EtherlinkError {
  reason: EncodeFailureReason;

  constructor(reason: EncodeFailureReason, length?: number) {
    const detail = length === undefined ? '' : ` (length ${length})`;
    super(`Cannot encode frame: ${ENCODE_FAILURE_MESSAGES[reason]}${detail}`);
    this.name = 'EtherlinkEncodeError';
    this.reason = reason;
  }
}

/**
 * Error class for payload layout definition and conversion failures
 */
export class EtherlinkLayoutError extends EtherlinkError {
  constructor(message: string) {
    super(message);
    this.name = 'EtherlinkLayoutError';
  }
}

// --- Errors for Connection and Transport ---

/**
 * Base error class for transports
 */
export class TransportError extends EtherlinkError {
  constructor(message: string = 'Transport error') {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Error class for writes attempted while the link is down
 */
export class TransportNotConnectedError extends TransportError {
  constructor(target: string) {
    super(`Not connected: ${target}`);
    this.name = 'TransportNotConnectedError';
  }
}

/**
 * Error class for failures while opening a link
 */
export class TransportConnectionError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportConnectionError';
  }
}

/**
 * Error class for failed writes
 */
export class TransportWriteError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportWriteError';
  }
}

/**
 * Error class for giving up after repeated reconnect failures
 */
export class TransportMaxReconnectError extends TransportConnectionError {
  constructor(attempts: number) {
    super(`Max reconnect attempts (${attempts}) reached`);
    this.name = 'TransportMaxReconnectError';
  }
}

/**
 * Maps an error raised by serialport or net onto a transport error.
 * @param err - raw error
 * @param fallback - constructor used when the message matches nothing specific
 */
export function toTransportError(
  err: unknown,
  fallback: new (message: string) => TransportError = TransportError
): TransportError {
  if (err instanceof TransportError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const lower = message.toLowerCase();
  if (lower.includes('permission') || lower.includes('access denied')) {
    return new TransportConnectionError('Permission denied');
  }
  if (lower.includes('busy') || lower.includes('resource temporarily unavailable')) {
    return new TransportConnectionError('Port is busy');
  }
  if (lower.includes('no such file') || lower.includes('file not found')) {
    return new TransportConnectionError('Port does not exist');
  }
  if (lower.includes('econnrefused')) {
    return new TransportConnectionError(`Connection refused: ${message}`);
  }
  return new fallback(message);
}
