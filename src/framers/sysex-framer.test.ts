import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
  SysexStreamParser,
  buildSysexMessage,
  decodeSysexPayload,
  decodeSysexString,
  encodeSysexString,
  parseSysexMessage,
} from './sysex-framer.js';
import { FieldRangeError, MalformedFrameError } from '../errors.js';
import { rootLogger } from '../logger.js';

beforeAll(() => rootLogger.disable());
afterAll(() => rootLogger.enable());

describe('buildSysexMessage', () => {
  it('wraps the 7-bit encoded payload in start/end bytes', () => {
    const message = buildSysexMessage(0x01, Uint8Array.of(0x40, 0xc8));
    expect(Array.from(message)).toEqual([0xf0, 0x01, 0x40, 0x00, 0x48, 0x01, 0xf7]);
  });

  it('rejects commands that do not fit 7 bits', () => {
    expect(() => buildSysexMessage(0x80, new Uint8Array(0))).toThrow(FieldRangeError);
  });
});

describe('parseSysexMessage', () => {
  it('splits command and data and decodes the payload', () => {
    const message = parseSysexMessage(Uint8Array.of(0xf0, 0x01, 0x40, 0x00, 0x48, 0x01, 0xf7));
    expect(message.command).toBe(0x01);
    expect(Array.from(message.data)).toEqual([0x40, 0x00, 0x48, 0x01]);
    expect(Array.from(decodeSysexPayload(message))).toEqual([0x40, 0xc8]);
  });

  it('rejects a message without END_SYSEX', () => {
    expect(() => parseSysexMessage(Uint8Array.of(0xf0, 0x01, 0x02))).toThrow(MalformedFrameError);
  });

  it('rejects status bytes inside the message', () => {
    expect(() => parseSysexMessage(Uint8Array.of(0xf0, 0x01, 0x90, 0xf7))).toThrow(
      MalformedFrameError
    );
  });
});

describe('sysex strings', () => {
  it('encodes two 7-bit bytes per character', () => {
    expect(Array.from(encodeSysexString('Hi'))).toEqual([0x48, 0x00, 0x69, 0x00]);
    expect(decodeSysexString(Uint8Array.of(0x48, 0x00, 0x69, 0x00))).toBe('Hi');
  });
});

describe('SysexStreamParser', () => {
  it('reassembles a message split across chunks', () => {
    const parser = new SysexStreamParser();
    expect(parser.push(Uint8Array.of(0x90, 0xf0, 0x05))).toEqual([]);
    const messages = parser.push(Uint8Array.of(0x01, 0x00, 0xf7));
    expect(messages).toHaveLength(1);
    expect(messages[0]?.command).toBe(0x05);
    expect(Array.from(messages[0]?.data ?? [])).toEqual([0x01, 0x00]);
    expect(parser.discardedBytes).toBe(1);
  });

  it('returns several messages from one chunk in order', () => {
    const parser = new SysexStreamParser();
    const messages = parser.push(Uint8Array.of(0xf0, 0x01, 0xf7, 0xf0, 0x02, 0x0a, 0x00, 0xf7));
    expect(messages.map(m => m.command)).toEqual([0x01, 0x02]);
  });

  it('aborts a message on a status byte', () => {
    const parser = new SysexStreamParser();
    expect(parser.push(Uint8Array.of(0xf0, 0x01, 0x02, 0x90, 0x03, 0xf7))).toEqual([]);
    expect(parser.discardedBytes).toBe(3);
  });

  it('restarts on a new START_SYSEX', () => {
    const parser = new SysexStreamParser();
    const messages = parser.push(Uint8Array.of(0xf0, 0x01, 0x02, 0xf0, 0x03, 0xf7));
    expect(messages).toHaveLength(1);
    expect(messages[0]?.command).toBe(0x03);
    expect(messages[0]?.data.length).toBe(0);
  });

  it('drops messages longer than the limit', () => {
    const parser = new SysexStreamParser(2);
    expect(parser.push(Uint8Array.of(0xf0, 0x01, 0x02, 0x03, 0xf7))).toEqual([]);
    expect(parser.push(Uint8Array.of(0xf0, 0x01, 0xf7))).toHaveLength(1);
  });
});
