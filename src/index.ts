// src/index.ts

export * from './constants/constants.js';
export * from './errors.js';
export { Logger, rootLogger } from './logger.js';

export { packInt, unpackInt, intFitsWidth, intBounds } from './utils/int-codec.js';
export { sum8 } from './utils/checksum.js';
export { UNCALIBRATED, normalize, assertCalibration } from './utils/calibration.js';
export { defineOpcodeTable } from './utils/opcode-table.js';
export { toHex, formatHexBytes, concatUint8Arrays } from './utils/utils.js';

export { encodeSevenBit, decodeSevenBit } from './framers/seven-bit.js';
export {
  buildSysexMessage,
  parseSysexMessage,
  decodeSysexPayload,
  encodeSysexString,
  decodeSysexString,
  SysexStreamParser,
} from './framers/sysex-framer.js';
export {
  busChecksum,
  buildFrame,
  parseResponse,
  verifyChecksum,
  packSpeedProperties,
  unpackSpeedProperties,
  formatFrame,
} from './framers/bus-framer.js';

export * from './command-codes/set-speed.js';
export * from './command-codes/send-step.js';
export * from './command-codes/seek-position.js';
export * from './command-codes/read-encoder.js';
export * from './command-codes/read-motion-state.js';
export * from './command-codes/read-status.js';
export * from './command-codes/control.js';
export * from './command-codes/configure.js';

export * from './sysex-codes/motor-speed.js';
export * from './sysex-codes/motion.js';
export * from './sysex-codes/position.js';
export * from './sysex-codes/gripper.js';

export { MksBusClient } from './bus-client.js';
export { FirmataStepperClient } from './firmata-client.js';
export { NodeSerialTransport } from './transport/node-serial-transport.js';

export type * from './types/stepper-types.js';
