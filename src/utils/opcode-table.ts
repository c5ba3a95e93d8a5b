// src/utils/opcode-table.ts

import { ConfigError } from '../errors.js';

/**
 * Returns a frozen copy of `base` with `overrides` applied.
 * Every value must be an integer in [0, maxValue] and no two commands may share a value.
 * @param maxValue - 0xff for bus opcodes, 0x7f for sysex commands
 * @throws ConfigError
 */
export function defineOpcodeTable<K extends string>(
  base: Readonly<Record<K, number>>,
  overrides: Partial<Record<K, number>> = {},
  maxValue: number = 0xff
): Readonly<Record<K, number>> {
  const table: Record<K, number> = { ...base, ...overrides };

  const seen = new Map<number, string>();
  for (const name in table) {
    const value: unknown = table[name];
    if (typeof value !== 'number' || (value | 0) !== value || value < 0 || value > maxValue) {
      throw new ConfigError(`Opcode for ${name} must be 0-${maxValue}, got ${String(value)}`);
    }
    const other = seen.get(value);
    if (other !== undefined) {
      throw new ConfigError(
        `Opcode 0x${value.toString(16)} assigned to both ${other} and ${name}`
      );
    }
    seen.set(value, name);
  }
  return Object.freeze(table);
}
