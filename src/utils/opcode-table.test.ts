import { describe, it, expect } from 'vitest';
import { defineOpcodeTable } from './opcode-table.js';
import { MKS_OPCODES, SYSEX_COMMANDS } from '../constants/constants.js';
import { ConfigError } from '../errors.js';

describe('defineOpcodeTable', () => {
  it('returns the defaults when nothing is overridden', () => {
    const table = defineOpcodeTable(MKS_OPCODES);
    expect(table).toEqual(MKS_OPCODES);
    expect(Object.isFrozen(table)).toBe(true);
  });

  it('applies overrides', () => {
    const table = defineOpcodeTable(MKS_OPCODES, { SET_SPEED: 0xe6 });
    expect(table.SET_SPEED).toBe(0xe6);
    expect(table.SEND_STEP).toBe(0xfd);
  });

  it('rejects values outside the command range', () => {
    expect(() => defineOpcodeTable(SYSEX_COMMANDS, { ECHO: 0x80 }, 0x7f)).toThrow(ConfigError);
    expect(() => defineOpcodeTable(MKS_OPCODES, { GO_HOME: 1.5 })).toThrow(
      'Opcode for GO_HOME must be 0-255, got 1.5'
    );
  });

  it('rejects two commands sharing an opcode', () => {
    expect(() => defineOpcodeTable(SYSEX_COMMANDS, { ECHO: 0x01 }, 0x7f)).toThrow(
      'Opcode 0x1 assigned to both ECHO and SET_SPEED'
    );
  });
});
