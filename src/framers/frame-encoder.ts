// src/framers/frame-encoder.ts

import {
  EncodeFailureReason,
  FRAME_OVERHEAD,
  MAX_PAYLOAD,
  SYNC_BYTE,
} from '../constants/constants.js';
import { crc8 } from '../utils/crc.js';
import { EtherlinkEncodeError } from '../errors.js';
import { rootLogger } from '../logger.js';
import type { ByteSinkCallback } from '../types/etherlink-types.js';

const logger = rootLogger.createLogger('FrameEncoder');

export type EncodeValidation =
  | { ok: true; length: number }
  | { ok: false; reason: EncodeFailureReason };

/**
 * Checks encoder arguments. `length` defaults to the payload's own length
 * (or 0 when there is no payload).
 */
export function validatePayload(
  payload: Uint8Array | null | undefined,
  length: number = payload ? payload.length : 0
): EncodeValidation {
  if (!Number.isInteger(length) || length < 0) {
    return { ok: false, reason: EncodeFailureReason.InvalidLength };
  }
  if (length > MAX_PAYLOAD) {
    return { ok: false, reason: EncodeFailureReason.PayloadTooLarge };
  }
  if (length > 0 && !payload) {
    return { ok: false, reason: EncodeFailureReason.MissingPayload };
  }
  if (payload && length > payload.length) {
    return { ok: false, reason: EncodeFailureReason.LengthExceedsPayload };
  }
  return { ok: true, length };
}

function buildFrame(msgId: number, payload: Uint8Array | null | undefined, length: number): Uint8Array {
  const frame = new Uint8Array(FRAME_OVERHEAD + length);
  frame[0] = SYNC_BYTE;
  frame[1] = msgId & 0xff;
  frame[2] = length;
  if (payload && length > 0) {
    frame.set(payload.subarray(0, length), 3);
  }
  // CRC over msg_id + len + payload
  frame[3 + length] = crc8(frame.subarray(1), 2 + length);
  return frame;
}

/**
 * Builds a complete wire frame: [SYNC][MSG_ID][LEN][PAYLOAD...][CRC8].
 * @throws EtherlinkEncodeError if the payload/length pair is invalid
 */
export function encodeFrame(
  msgId: number,
  payload?: Uint8Array | null,
  length?: number
): Uint8Array {
  const check = validatePayload(payload, length);
  if (!check.ok) {
    throw new EtherlinkEncodeError(check.reason, length ?? payload?.length);
  }
  return buildFrame(msgId, payload, check.length);
}

/**
 * Encodes frames and hands each one to a byte sink in a single call.
 */
export class FrameEncoder {
  constructor(
    private readonly sink: ByteSinkCallback,
    private readonly onTransmit: () => void = () => {}
  ) {}

  /**
   * @returns false if the arguments were rejected and nothing was sent
   */
  public send(msgId: number, payload?: Uint8Array | null, length?: number): boolean {
    const check = validatePayload(payload, length);
    if (!check.ok) {
      logger.debug(`Send rejected: ${check.reason}`, { msgId, length: length ?? payload?.length });
      return false;
    }

    const frame = buildFrame(msgId, payload, check.length);
    this.transmit(msgId, frame);
    // Counted regardless of what the sink did with the bytes
    this.onTransmit();
    return true;
  }

  private transmit(msgId: number, frame: Uint8Array): void {
    try {
      const result = this.sink(frame);
      if (result instanceof Promise) {
        result.catch((err: unknown) => this.logSinkFailure(msgId, err));
      }
    } catch (err: unknown) {
      this.logSinkFailure(msgId, err);
    }
  }

  private logSinkFailure(msgId: number, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Byte sink failed: ${message}`, { msgId });
  }
}
