// src/constants/constants.ts

/** Leading byte of every frame */
export const SYNC_BYTE = 0xa5;

/** Largest payload a single frame can carry */
export const MAX_PAYLOAD = 250;

/** SYNC + MSG_ID + LEN + CRC */
export const FRAME_OVERHEAD = 4;

export const MAX_FRAME_SIZE = FRAME_OVERHEAD + MAX_PAYLOAD;

/** Value reported in response to a VERSION request */
export const PROTOCOL_VERSION = 1;

/**
 * Reserved system message IDs (0x00 - 0x0F)
 */
export enum SystemMessageId {
  PING = 0x00,
  PONG = 0x01,
  VERSION = 0x02,
  ERROR = 0x0f,
}

/**
 * Message ID conventions. Not enforced by the parser or encoder.
 */
export const MESSAGE_ID_RANGES = {
  system: { min: 0x00, max: 0x0f },
  telemetry: { min: 0x10, max: 0x7f }, // device -> host
  command: { min: 0x80, max: 0xfe }, // host -> device
  reserved: { min: 0xff, max: 0xff },
} as const;

export type MessageIdClass = keyof typeof MESSAGE_ID_RANGES;

export function classifyMessageId(msgId: number): MessageIdClass {
  const id = msgId & 0xff;
  if (id <= MESSAGE_ID_RANGES.system.max) return 'system';
  if (id <= MESSAGE_ID_RANGES.telemetry.max) return 'telemetry';
  if (id <= MESSAGE_ID_RANGES.command.max) return 'command';
  return 'reserved';
}

/**
 * Parser state machine states
 */
export enum ParserState {
  Idle = 'Idle', // waiting for sync byte
  GotSync = 'GotSync', // waiting for msg_id
  GotId = 'GotId', // waiting for length
  GotLen = 'GotLen', // receiving payload
  GotPayload = 'GotPayload', // waiting for CRC
}

/**
 * Why the parser dropped an in-progress frame
 */
export enum RejectReason {
  LengthOverflow = 'LengthOverflow',
  ChecksumMismatch = 'ChecksumMismatch',
}

/**
 * Why the encoder refused to build a frame
 */
export enum EncodeFailureReason {
  PayloadTooLarge = 'PayloadTooLarge',
  MissingPayload = 'MissingPayload',
  LengthExceedsPayload = 'LengthExceedsPayload',
  InvalidLength = 'InvalidLength',
}
