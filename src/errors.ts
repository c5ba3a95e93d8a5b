// src/errors.ts

/**
 * Base class for all stepper-link errors
 */
export class StepperLinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StepperLinkError';
  }
}

/**
 * A value does not fit the width/signedness of its field, or a command's documented range.
 * Extends the built-in RangeError so callers can catch either.
 */
export class FieldRangeError extends RangeError {
  readonly field: string;
  readonly value: number | bigint;
  readonly min: number | bigint;
  readonly max: number | bigint;

  constructor(field: string, value: number | bigint, min: number | bigint, max: number | bigint) {
    super(`${field} must be ${min}-${max}, got ${value}`);
    this.name = 'FieldRangeError';
    this.field = field;
    this.value = value;
    this.min = min;
    this.max = max;
  }
}

/**
 * Error class for structurally invalid frames (wrong length, odd 7-bit pair count, stray bits)
 */
export class MalformedFrameError extends StepperLinkError {
  readonly frame: Uint8Array | undefined;

  constructor(message: string = 'Malformed frame', frame?: Uint8Array) {
    super(message);
    this.name = 'MalformedFrameError';
    this.frame = frame;
  }
}

/**
 * Error class for a response frame whose length does not match the command's field width
 */
export class InvalidFrameLengthError extends MalformedFrameError {
  readonly received: number;
  readonly expected: number;

  constructor(received: number, expected: number, frame?: Uint8Array) {
    super(`Invalid frame length: expected ${expected} bytes, got ${received}`, frame);
    this.name = 'InvalidFrameLengthError';
    this.received = received;
    this.expected = expected;
  }
}

/**
 * Error class for a response that does not echo the opcode of the request
 */
export class UnexpectedOpcodeError extends MalformedFrameError {
  readonly sent: number;
  readonly received: number;

  constructor(sent: number, received: number) {
    super(
      `Unexpected opcode in response: sent 0x${sent.toString(16)}, received 0x${received.toString(16)}`
    );
    this.name = 'UnexpectedOpcodeError';
    this.sent = sent;
    this.received = received;
  }
}

/**
 * Error class for checksum mismatch
 */
export class ChecksumError extends StepperLinkError {
  readonly received: number;
  readonly expected: number;

  constructor(received: number, expected: number) {
    super(
      `Checksum mismatch: received 0x${received.toString(16).padStart(2, '0')}, expected 0x${expected.toString(16).padStart(2, '0')}`
    );
    this.name = 'ChecksumError';
    this.received = received;
    this.expected = expected;
  }
}

/**
 * Error class for requests that got no response in time
 */
export class StepperTimeoutError extends StepperLinkError {
  constructor(message: string = 'Request timed out') {
    super(message);
    this.name = 'StepperTimeoutError';
  }
}

/**
 * Error class for invalid client, transport or opcode-table configuration
 */
export class ConfigError extends StepperLinkError {
  constructor(message: string = 'Invalid configuration') {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Error class for operations on a transport that is not connected
 */
export class NotConnectedError extends StepperLinkError {
  constructor(message: string = 'Transport is not connected') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

/**
 * Error class for receive buffer overflow
 */
export class BufferOverflowError extends StepperLinkError {
  constructor(size: number, max: number) {
    super(`Buffer overflow: ${size} bytes exceeds maximum of ${max} bytes`);
    this.name = 'BufferOverflowError';
  }
}

// --- Transport errors ---

export class TransportError extends StepperLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

export class SerialTransportError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialTransportError';
  }
}

export class SerialConnectionError extends SerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialConnectionError';
  }
}

export class SerialReadError extends SerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialReadError';
  }
}

export class SerialWriteError extends SerialTransportError {
  constructor(message: string) {
    super(message);
    this.name = 'SerialWriteError';
  }
}
