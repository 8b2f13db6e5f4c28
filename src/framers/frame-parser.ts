// src/framers/frame-parser.ts

import { MAX_PAYLOAD, ParserState, RejectReason, SYNC_BYTE } from '../constants/constants.js';
import { crc8Update } from '../utils/crc.js';
import type { ParserEvents, ParserSnapshot } from '../types/etherlink-types.js';

/**
 * Incremental frame parser.
 *
 * Consumes one byte per call and never looks back: memory is bounded by a
 * single MAX_PAYLOAD receive buffer regardless of the input. A valid frame is
 * reported through `events.onFrame` with a view into that buffer, which is
 * only valid for the duration of the call.
 *
 * A sync byte inside a payload is payload. If a frame was corrupted, the bytes
 * it swallowed are not rescanned; the parser resynchronises on the next sync
 * byte seen while idle.
 */
export class FrameParser {
  private readonly rxBuffer: Uint8Array = new Uint8Array(MAX_PAYLOAD);
  private _state: ParserState = ParserState.Idle;
  private _msgId: number = 0;
  private _payloadLen: number = 0;
  private _payloadIdx: number = 0;
  private _runningCrc: number = 0;

  constructor(private readonly events: ParserEvents) {}

  public get state(): ParserState {
    return this._state;
  }

  public get messageId(): number {
    return this._msgId;
  }

  public get length(): number {
    return this._payloadLen;
  }

  public get cursor(): number {
    return this._payloadIdx;
  }

  public get runningCrc(): number {
    return this._runningCrc;
  }

  public snapshot(): ParserSnapshot {
    return {
      state: this._state,
      messageId: this._msgId,
      length: this._payloadLen,
      cursor: this._payloadIdx,
      runningCrc: this._runningCrc,
    };
  }

  /**
   * Drops any in-progress frame. Buffer contents are left in place.
   */
  public reset(): void {
    this._state = ParserState.Idle;
    this._payloadIdx = 0;
    this._runningCrc = 0;
  }

  public processByte(value: number): void {
    const byte = value & 0xff;

    switch (this._state) {
      case ParserState.Idle:
        if (byte === SYNC_BYTE) {
          this._runningCrc = 0;
          this._state = ParserState.GotSync;
        }
        break;

      case ParserState.GotSync:
        this._msgId = byte;
        this._runningCrc = crc8Update(this._runningCrc, byte);
        this._state = ParserState.GotId;
        break;

      case ParserState.GotId:
        this._payloadLen = byte;
        this._runningCrc = crc8Update(this._runningCrc, byte);
        this._payloadIdx = 0;

        if (byte > MAX_PAYLOAD) {
          this._state = ParserState.Idle;
          this.events.onReject(RejectReason.LengthOverflow, this._msgId, byte);
        } else if (byte === 0) {
          this._state = ParserState.GotPayload;
        } else {
          this._state = ParserState.GotLen;
        }
        break;

      case ParserState.GotLen:
        this.rxBuffer[this._payloadIdx++] = byte;
        this._runningCrc = crc8Update(this._runningCrc, byte);
        if (this._payloadIdx >= this._payloadLen) {
          this._state = ParserState.GotPayload;
        }
        break;

      case ParserState.GotPayload:
        // Idle before the callback runs
        this._state = ParserState.Idle;
        if (byte === this._runningCrc) {
          this.events.onFrame(
            this._msgId,
            this.rxBuffer.subarray(0, this._payloadLen),
            this._payloadLen
          );
        } else {
          this.events.onReject(RejectReason.ChecksumMismatch, this._msgId, this._payloadLen);
        }
        break;
    }
  }

  public processBytes(data: ArrayLike<number>): void {
    for (let i: number = 0; i < data.length; i++) {
      this.processByte(data[i]);
    }
  }
}
