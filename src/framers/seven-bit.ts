// src/framers/seven-bit.ts
import { MalformedFrameError } from '../errors.js';

/**
 * Splits every byte into a (low 7 bits, high bit) pair so the payload fits a link that only
 * carries 7 data bits per byte.
 * @returns a buffer twice the payload length
 */
export function encodeSevenBit(payload: Uint8Array): Uint8Array {
  const frame = new Uint8Array(payload.length * 2);
  let i = 0;
  for (const p of payload) {
    frame[i++] = p & 0x7f;
    frame[i++] = (p & 0x80) >> 7;
  }
  return frame;
}

/**
 * Joins (lo, hi) pairs back into bytes: `lo | (hi << 7)`.
 * @throws MalformedFrameError on odd length, `hi` other than 0 or 1, or `lo` above 0x7f
 */
export function decodeSevenBit(frame: Uint8Array): Uint8Array {
  if (frame.length % 2 !== 0) {
    throw new MalformedFrameError(
      `7-bit frame must have even length, got ${frame.length}`,
      frame
    );
  }

  const payload = new Uint8Array(frame.length / 2);
  for (let i = 0; i < payload.length; i++) {
    const lo = frame[2 * i];
    const hi = frame[2 * i + 1];
    if (lo > 0x7f || hi > 1) {
      throw new MalformedFrameError(
        `Invalid 7-bit pair at byte ${i}: lo=0x${lo.toString(16)}, hi=0x${hi.toString(16)}`,
        frame
      );
    }
    payload[i] = lo | (hi << 7);
  }
  return payload;
}
