// src/payload/payload-layout.ts

import { MAX_PAYLOAD } from '../constants/constants.js';
import { EtherlinkLayoutError } from '../errors.js';

/**
 * Fixed-layout payload definitions.
 *
 * A layout is an ordered list of fields with a fixed size and byte order.
 * Decoding a payload shorter than the layout yields `null` instead of reading
 * past the end.
 */

type NumericKind = 'u8' | 'i8' | 'u16' | 'i16' | 'u32' | 'i32' | 'f32' | 'f64';

export interface NumericField {
  kind: NumericKind;
  size: number;
}

export interface BytesField {
  kind: 'bytes';
  size: number;
}

export type FieldType = NumericField | BytesField;

export const u8: NumericField = { kind: 'u8', size: 1 };
export const i8: NumericField = { kind: 'i8', size: 1 };
export const u16: NumericField = { kind: 'u16', size: 2 };
export const i16: NumericField = { kind: 'i16', size: 2 };
export const u32: NumericField = { kind: 'u32', size: 4 };
export const i32: NumericField = { kind: 'i32', size: 4 };
export const f32: NumericField = { kind: 'f32', size: 4 };
export const f64: NumericField = { kind: 'f64', size: 8 };

export function bytes(size: number): BytesField {
  if (!Number.isInteger(size) || size <= 0) {
    throw new EtherlinkLayoutError(`Invalid bytes field size: ${size}`);
  }
  return { kind: 'bytes', size };
}

const INTEGER_RANGES: Record<Exclude<NumericKind, 'f32' | 'f64'>, [number, number]> = {
  u8: [0, 0xff],
  i8: [-0x80, 0x7f],
  u16: [0, 0xffff],
  i16: [-0x8000, 0x7fff],
  u32: [0, 0xffffffff],
  i32: [-0x80000000, 0x7fffffff],
};

type FieldValue<F extends FieldType> = F extends BytesField ? Uint8Array : number;

export type FieldSpec = readonly [name: string, type: FieldType];

export type LayoutValue<Fields extends readonly FieldSpec[]> = {
  [K in Fields[number] as K[0]]: FieldValue<K[1]>;
};

export interface LayoutOptions {
  /** Defaults to true, the native order of the usual embedded targets */
  littleEndian?: boolean;
}

export interface PayloadLayout<T> {
  readonly size: number;
  readonly littleEndian: boolean;
  readonly fields: readonly FieldSpec[];
  encode(value: T): Uint8Array;
  /** Returns null when fewer than `size` bytes are available */
  decode(payload: Uint8Array, length?: number): T | null;
}

function writeField(
  view: DataView,
  offset: number,
  name: string,
  type: FieldType,
  value: unknown,
  le: boolean
): void {
  if (type.kind === 'bytes') {
    if (!(value instanceof Uint8Array) || value.length !== type.size) {
      throw new EtherlinkLayoutError(`Field "${name}" must be a Uint8Array of ${type.size} bytes`);
    }
    new Uint8Array(view.buffer, view.byteOffset + offset, type.size).set(value);
    return;
  }

  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new EtherlinkLayoutError(`Field "${name}" must be a number`);
  }

  const kind = type.kind;
  if (kind === 'f32') {
    view.setFloat32(offset, value, le);
    return;
  }
  if (kind === 'f64') {
    view.setFloat64(offset, value, le);
    return;
  }

  const [min, max] = INTEGER_RANGES[kind];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new EtherlinkLayoutError(
      `Field "${name}" (${kind}) out of range: ${value}, expected ${min}..${max}`
    );
  }

  switch (kind) {
    case 'u8':
      view.setUint8(offset, value);
      break;
    case 'i8':
      view.setInt8(offset, value);
      break;
    case 'u16':
      view.setUint16(offset, value, le);
      break;
    case 'i16':
      view.setInt16(offset, value, le);
      break;
    case 'u32':
      view.setUint32(offset, value, le);
      break;
    case 'i32':
      view.setInt32(offset, value, le);
      break;
  }
}

function readField(view: DataView, offset: number, type: FieldType, le: boolean): number | Uint8Array {
  switch (type.kind) {
    case 'bytes':
      // Copy: the source is usually the parser's borrowed buffer
      return new Uint8Array(view.buffer, view.byteOffset + offset, type.size).slice();
    case 'u8':
      return view.getUint8(offset);
    case 'i8':
      return view.getInt8(offset);
    case 'u16':
      return view.getUint16(offset, le);
    case 'i16':
      return view.getInt16(offset, le);
    case 'u32':
      return view.getUint32(offset, le);
    case 'i32':
      return view.getInt32(offset, le);
    case 'f32':
      return view.getFloat32(offset, le);
    case 'f64':
      return view.getFloat64(offset, le);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Defines a fixed payload layout.
 *
 * ```ts
 * const Telemetry = defineLayout([
 *   ['temperature', i16],
 *   ['humidity', u8],
 * ] as const);
 * protocol.send(0x10, Telemetry.encode({ temperature: -40, humidity: 55 }));
 * ```
 */
export function defineLayout<const Fields extends readonly FieldSpec[]>(
  fields: Fields,
  options: LayoutOptions = {}
): PayloadLayout<LayoutValue<Fields>> {
  const littleEndian = options.littleEndian ?? true;
  const names = new Set<string>();
  let size = 0;
  for (const [name, type] of fields) {
    if (names.has(name)) {
      throw new EtherlinkLayoutError(`Duplicate field name: ${name}`);
    }
    names.add(name);
    size += type.size;
  }
  if (size === 0) {
    throw new EtherlinkLayoutError('Layout must contain at least one field');
  }
  if (size > MAX_PAYLOAD) {
    throw new EtherlinkLayoutError(`Layout size ${size} exceeds maximum payload ${MAX_PAYLOAD}`);
  }

  type Decoded = Record<string, number | Uint8Array> & LayoutValue<Fields>;
  const hasAllFields = (record: Record<string, number | Uint8Array>): record is Decoded =>
    fields.every(([name]) => name in record);

  const decode = (payload: Uint8Array, length: number = payload.length): LayoutValue<Fields> | null => {
    if (Math.min(length, payload.length) < size) return null;
    const view = new DataView(payload.buffer, payload.byteOffset, size);
    const result: Record<string, number | Uint8Array> = {};
    let offset = 0;
    for (const [name, type] of fields) {
      result[name] = readField(view, offset, type, littleEndian);
      offset += type.size;
    }
    return hasAllFields(result) ? result : null;
  };

  return {
    size,
    littleEndian,
    fields,
    encode(value: LayoutValue<Fields>): Uint8Array {
      const out = new Uint8Array(size);
      const view = new DataView(out.buffer);
      const record: unknown = value;
      if (!isRecord(record)) {
        throw new EtherlinkLayoutError('Layout value must be an object');
      }
      let offset = 0;
      for (const [name, type] of fields) {
        writeField(view, offset, name, type, record[name], littleEndian);
        offset += type.size;
      }
      return out;
    },
    decode,
  };
}

/** Anything with the protocol's send signature */
export interface FrameSender {
  send(msgId: number, payload?: Uint8Array | null, length?: number): boolean;
}

/**
 * Encodes `value` with `layout` and sends it as one frame.
 */
export function sendTyped<T>(
  sender: FrameSender,
  msgId: number,
  layout: PayloadLayout<T>,
  value: T
): boolean {
  return sender.send(msgId, layout.encode(value));
}
