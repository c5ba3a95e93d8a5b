// src/types/stepper-types.ts

import type { RotationDirection, MKS_OPCODES, SYSEX_COMMANDS } from '../constants/constants.js';

// !=============================================================================
// ! Integer and frame fields
// !=============================================================================

export type ByteOrder = 'le' | 'be';

/** Field widths in bytes */
export type IntWidth = 1 | 2 | 3 | 4 | 6;

export interface PackIntOptions {
  /** Throw FieldRangeError instead of truncating to the width */
  strict?: boolean;
  /** Name reported in range errors */
  field?: string;
}

/** Fixed-width integer field of a command frame */
export interface PackedField {
  kind: 'int';
  value: number | bigint;
  width: IntWidth;
  order: ByteOrder;
  signed: boolean;
  /** Name reported in range errors */
  name?: string;
}

/** 12-bit speed plus direction bit packed into two bytes */
export interface SpeedField {
  kind: 'speed';
  speed: number;
  direction: RotationDirection;
}

export type FrameField = PackedField | SpeedField;

export interface SpeedProperties {
  speed: number;
  direction: RotationDirection;
}

/** Opcode echo plus the field bytes of a verified response frame */
export interface BusResponse {
  opcode: number;
  fields: Uint8Array;
}

export interface BusMessage extends BusResponse {
  deviceId: number;
}

/** Multiplier applied to speed and step fields before packing */
export interface MotionCalibration {
  normFactor: number;
}

// !=============================================================================
// ! Opcode tables
// !=============================================================================

export type MksCommandName = keyof typeof MKS_OPCODES;
export type MksOpcodeTable = Readonly<Record<MksCommandName, number>>;

export type SysexCommandName = keyof typeof SYSEX_COMMANDS;
export type SysexCommandTable = Readonly<Record<SysexCommandName, number>>;

// !=============================================================================
// ! MKS command parameters and results
// !=============================================================================

export interface SpeedModeParams {
  speed: number;
  direction: RotationDirection;
  acceleration: number;
}

export interface RelativeStepParams {
  speed: number;
  direction: RotationDirection;
  acceleration: number;
  steps: number;
}

export interface AbsolutePositionParams {
  speed: number;
  acceleration: number;
  position: number;
}

export interface AngleMoveParams {
  speed: number;
  acceleration: number;
  angle: number;
}

export interface EncoderSplitValue {
  carry: number;
  value: number;
}

export interface IoStatus {
  in1: boolean;
  in2: boolean;
  out1: boolean;
  out2: boolean;
}

// !=============================================================================
// ! Sysex command payloads
// !=============================================================================

export interface SysexMessage {
  command: number;
  /** 7-bit data bytes between the command and END_SYSEX */
  data: Uint8Array;
}

export interface MotorSpeedPayload {
  motor: number;
  speed: number;
}

export interface MotorStepPayload {
  motor: number;
  steps: number;
  speed: number;
}

export interface MotorSeekPayload {
  motor: number;
  position: number;
  speed: number;
}

export interface MotorPositionPayload {
  motor: number;
  position: number;
}

// !=============================================================================
// ! Transports
// !=============================================================================

/** Message-oriented bus (CAN and similar): one frame per device id */
export interface BusTransport {
  send(deviceId: number, frame: Uint8Array): Promise<void>;
  /** Subscribe to incoming frames; returns an unsubscribe function */
  onFrame(handler: (deviceId: number, frame: Uint8Array) => void): () => void;
}

/** Byte-stream link (serial) */
export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  read(length: number, timeout?: number): Promise<Uint8Array>;
  flush?(): Promise<void>;
}

/** Options for the Node.js SerialPort transport */
export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  readTimeout?: number;
  maxBufferSize?: number;
}

// !=============================================================================
// ! Clients
// !=============================================================================

export interface ClientRetryOptions {
  /** Response timeout per attempt, ms */
  timeout?: number;
  retryCount?: number;
  retryDelay?: number;
}

export interface BusClientOptions extends ClientRetryOptions {
  opcodes?: MksOpcodeTable;
}

export interface FirmataClientOptions extends ClientRetryOptions {
  commands?: SysexCommandTable;
  /** Largest sysex message accepted from the link */
  maxMessageSize?: number;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  deviceId?: number;
  opcode?: number;
  command?: string;
  responseTime?: number;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField = 'timestamp' | 'level' | 'logger' | 'deviceId' | 'opcode' | 'responseTime';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel | 'none'): void;
  pause(): void;
  resume(): void;
}
