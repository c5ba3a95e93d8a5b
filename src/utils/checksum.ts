// src/utils/checksum.ts

/**
 * 8-bit additive checksum: seed plus every byte, modulo 256.
 * @param seed - starting value (the MKS bus uses the device id)
 * @param buffer - bytes to sum
 * @returns checksum byte
 */
export function sum8(seed: number, buffer: Uint8Array): number {
  let sum: number = seed & 0xff;
  for (const byte of buffer) {
    sum = (sum + byte) & 0xff;
  }
  return sum;
}
