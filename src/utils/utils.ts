// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Creates a Uint8Array from byte values.
 */
export function fromBytes(...bytes: number[]): Uint8Array {
  return Uint8Array.from(bytes);
}

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
 * Returns a view over a slice of the input array (shares the buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

export function allocUint8Array(size: number, fill: number = 0): Uint8Array {
  const arr: Uint8Array = new Uint8Array(size);
  if (fill !== 0) {
    arr.fill(fill);
  }
  return arr;
}

/**
 * Converts a Uint8Array to a compact lower-case hex string.
 * @param uint8arr - The Uint8Array to convert.
 * @returns A hex string representation of the input Uint8Array.
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (const b of uint8arr) {
    hex += HEX_TABLE.charAt((b >> 4) & 0xf) + HEX_TABLE.charAt(b & 0xf);
  }
  return hex;
}

/**
 * Formats bytes the way device manuals print frames: upper-case, space separated.
 * @example formatHexBytes(fromBytes(0xf6, 0x01)) // 'F6 01'
 */
export function formatHexBytes(bytes: Iterable<number>): string {
  const parts: string[] = [];
  for (const b of bytes) {
    parts.push(b.toString(16).toUpperCase().padStart(2, '0'));
  }
  return parts.join(' ');
}

/**
 * Checks that a value is an integer in [min, max].
 */
export function isIntInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
