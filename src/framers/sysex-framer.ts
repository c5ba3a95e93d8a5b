// src/framers/sysex-framer.ts
import { START_SYSEX, END_SYSEX } from '../constants/constants.js';
import { FieldRangeError, MalformedFrameError } from '../errors.js';
import { rootLogger } from '../logger.js';
import type { SysexMessage } from '../types/stepper-types.js';
import { concatUint8Arrays, fromBytes, sliceUint8Array, toHex } from '../utils/utils.js';
import { decodeSevenBit, encodeSevenBit } from './seven-bit.js';

const logger = rootLogger.createLogger('SysexFramer');

const DEFAULT_MAX_MESSAGE_SIZE = 1024;

function validateCommand(command: number): void {
  if ((command | 0) !== command || command < 0 || command > 0x7f) {
    throw new FieldRangeError('sysex command', command, 0, 0x7f);
  }
}

/**
 * Wraps a binary payload in a sysex message: `F0 command encode7(payload) F7`.
 * @throws FieldRangeError if the command does not fit 7 bits
 */
export function buildSysexMessage(command: number, payload: Uint8Array): Uint8Array {
  validateCommand(command);
  return concatUint8Arrays([
    fromBytes(START_SYSEX, command),
    encodeSevenBit(payload),
    fromBytes(END_SYSEX),
  ]);
}

/**
 * Splits a complete sysex message into its command and 7-bit data.
 * @throws MalformedFrameError if the start/end bytes are missing or a data byte has bit 7 set
 */
export function parseSysexMessage(message: Uint8Array): SysexMessage {
  if (message.length < 3 || message[0] !== START_SYSEX || message[message.length - 1] !== END_SYSEX) {
    throw new MalformedFrameError(`Not a sysex message: ${toHex(message)}`, message);
  }
  const body = sliceUint8Array(message, 1, -1);
  for (const byte of body) {
    if (byte > 0x7f) {
      throw new MalformedFrameError(`Status byte 0x${byte.toString(16)} inside sysex`, message);
    }
  }
  return { command: body[0], data: sliceUint8Array(body, 1) };
}

/**
 * Recovers the binary payload of a received sysex message.
 * @throws MalformedFrameError if the data is not a valid 7-bit frame
 */
export function decodeSysexPayload(message: SysexMessage): Uint8Array {
  return decodeSevenBit(message.data);
}

/**
 * Encodes text for STRING_DATA: two 7-bit bytes per character, low bits first.
 */
export function encodeSysexString(text: string): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    out.push(code & 0x7f, (code >> 7) & 0x7f);
  }
  return Uint8Array.from(out);
}

export function decodeSysexString(data: Uint8Array): string {
  if (data.length % 2 !== 0) {
    throw new MalformedFrameError(`String data must have even length, got ${data.length}`, data);
  }
  let text = '';
  for (let i = 0; i < data.length; i += 2) {
    text += String.fromCharCode((data[i] & 0x7f) | ((data[i + 1] & 0x7f) << 7));
  }
  return text;
}

/**
 * Reassembles sysex messages from an arbitrarily chunked byte stream.
 *
 * Bytes outside a message are dropped. A status byte inside a message aborts it; a new
 * START_SYSEX restarts it. Messages longer than `maxMessageSize` are discarded.
 */
export class SysexStreamParser {
  private collecting: boolean = false;
  private body: number[] = [];
  private discarded: number = 0;

  constructor(private readonly maxMessageSize: number = DEFAULT_MAX_MESSAGE_SIZE) {}

  /**
   * Feeds received bytes.
   * @returns messages completed by this chunk, in arrival order
   */
  push(chunk: Uint8Array): SysexMessage[] {
    const messages: SysexMessage[] = [];
    for (const byte of chunk) {
      if (byte === START_SYSEX) {
        if (this.collecting) {
          logger.warn(`Sysex restarted after ${this.body.length} bytes`);
        }
        this.collecting = true;
        this.body = [];
        continue;
      }

      if (!this.collecting) {
        this.discarded++;
        continue;
      }

      if (byte === END_SYSEX) {
        this.collecting = false;
        if (this.body.length === 0) {
          logger.warn('Empty sysex message dropped');
          continue;
        }
        const body = Uint8Array.from(this.body);
        messages.push({ command: body[0], data: sliceUint8Array(body, 1) });
        this.body = [];
        continue;
      }

      if (byte > 0x7f) {
        logger.warn(`Status byte 0x${byte.toString(16)} aborted sysex message`);
        this.collecting = false;
        this.body = [];
        this.discarded++;
        continue;
      }

      if (this.body.length >= this.maxMessageSize) {
        logger.warn(`Sysex message exceeds ${this.maxMessageSize} bytes, dropped`);
        this.collecting = false;
        this.body = [];
        continue;
      }
      this.body.push(byte);
    }
    return messages;
  }

  /** Bytes dropped outside of any message since the last reset */
  get discardedBytes(): number {
    return this.discarded;
  }

  reset(): void {
    this.collecting = false;
    this.body = [];
    this.discarded = 0;
  }
}
