// src/utils/utils.ts

import { CobotInvalidParameterError } from '../errors.js';

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Narrows any number to a signed 16-bit integer the way a fixed-width cast does:
 * the fraction is truncated toward zero and overflow wraps. NaN and infinities give 0.
 */
export function toInt16(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const wrapped = ((Math.trunc(value) % 0x10000) + 0x10000) % 0x10000;
  return wrapped >= 0x8000 ? wrapped - 0x10000 : wrapped;
}

/**
 * Converts a signed 16-bit integer to two bytes in Big Endian order.
 */
export function int16ToBytesBE(value: number): Uint8Array {
  const buf = new Uint8Array(2);
  new DataView(buf.buffer).setInt16(0, toInt16(value), false);
  return buf;
}

/**
 * Encodes a list of signed 16-bit integers back to back in Big Endian order.
 */
export function int16ArrayToBytesBE(values: readonly number[]): Uint8Array {
  const buf = new Uint8Array(values.length * 2);
  const view = new DataView(buf.buffer);
  values.forEach((value, i) => view.setInt16(i * 2, toInt16(value), false));
  return buf;
}

/**
 * Reads a signed 16-bit Big Endian integer.
 * @param buf - source bytes, at least offset + 2 long
 * @param offset - position of the high byte
 */
export function bytesToInt16BE(buf: Uint8Array, offset: number = 0): number {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength).getInt16(offset, false);
}

/**
 * Reads consecutive signed 16-bit Big Endian integers. A trailing odd byte is ignored.
 */
export function bytesToInt16ArrayBE(buf: Uint8Array): number[] {
  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  const result: number[] = [];
  for (let offset = 0; offset + 1 < buf.length; offset += 2) {
    result.push(view.getInt16(offset, false));
  }
  return result;
}

/**
 * Reads one byte as a signed 8-bit integer.
 */
export function byteToInt8(buf: Uint8Array, offset: number = 0): number {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength).getInt8(offset);
}

/**
 * Checks that a value fits a single unsigned wire byte.
 * @throws CobotInvalidParameterError if the value is not an integer in 0-255
 */
export function validateByte(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new CobotInvalidParameterError(name, value, 'integer between 0 and 255');
  }
}

/**
 * Converts a Uint8Array to a hex string (optimized with lookup table).
 * @param uint8arr - The Uint8Array to convert.
 * @param separator - Placed between bytes, empty by default.
 */
export function toHex(uint8arr: Uint8Array, separator: string = ''): string {
  const parts: string[] = [];
  for (const b of uint8arr) {
    parts.push(`${HEX_TABLE.charAt((b >> 4) & 0xf)}${HEX_TABLE.charAt(b & 0xf)}`);
  }
  return parts.join(separator);
}
