// src/utils/crc.ts

/**
 * CRC-8/CCITT lookup table (polynomial 0x07, MSB first)
 */
export const CRC8_TABLE: Uint8Array = new Uint8Array(256);
(function initCrc8Table(): void {
  for (let i: number = 0; i < 256; i++) {
    let crc: number = i;
    for (let j: number = 0; j < 8; j++) {
      crc = crc & 0x80 ? ((crc << 1) ^ 0x07) & 0xff : (crc << 1) & 0xff;
    }
    CRC8_TABLE[i] = crc;
  }
})();

/**
 * Folds one byte into a running CRC-8 value.
 * @param crc - CRC computed so far (0x00 to start)
 * @param byte - next byte
 * @returns updated CRC
 */
export function crc8Update(crc: number, byte: number): number {
  return CRC8_TABLE[(crc ^ byte) & 0xff];
}

/**
 * Calculates CRC-8/CCITT (polynomial 0x07, init 0x00, no reflection, no final XOR).
 * @param data - input bytes
 * @param length - number of bytes from the start of `data` to cover; defaults to all of it
 * @returns CRC-8 value
 */
export function crc8(data: Uint8Array, length: number = data.length): number {
  const end = Math.min(Math.max(0, length), data.length);
  let crc: number = 0x00;
  for (let i: number = 0; i < end; i++) {
    crc = CRC8_TABLE[crc ^ data[i]];
  }
  return crc;
}
