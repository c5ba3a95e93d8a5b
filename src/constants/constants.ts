// src/constants/constants.ts

/**
 * Default MKS SERVO bus opcodes. Clients take a table in their options;
 * codecs only ever receive the opcode byte.
 */
export const MKS_OPCODES = {
  // Readouts
  ENCODER_SPLIT: 0x30,
  ENCODER_ADDITIVE: 0x31,
  MOTOR_SPEED: 0x32,
  CURRENT_POS: 0x33,
  IO_STATUS: 0x34,
  ENCODER_RAW: 0x35,
  TARGET_ANGLE_ERROR: 0x39,
  ENABLE_STATUS: 0x3a,
  GO_HOME_STATUS: 0x3b,
  RELEASE_SHAFT_LOCK: 0x3d,
  SHAFT_LOCK_STATUS: 0x3e,
  QUERY_STATUS: 0xf1,
  // Configuration
  SET_WORK_MODE: 0x82,
  SET_WORKING_CURRENT: 0x83,
  SET_MICROSTEP: 0x84,
  GO_HOME: 0x91,
  SET_ZERO: 0x92,
  // Motion
  ENABLE_MOTOR: 0xf3,
  SEND_ANGLE: 0xf4,
  SEEK_POS_BY_ANGLE: 0xf5,
  SET_SPEED: 0xf6,
  EMERGENCY_STOP: 0xf7,
  SEND_STEP: 0xfd,
  SEEK_POS_BY_STEPS: 0xfe,
} as const;

/**
 * Default sysex commands of the microcontroller link
 */
export const SYSEX_COMMANDS = {
  ECHO: 0x00,
  SET_SPEED: 0x01,
  GET_SPEED: 0x02,
  SEND_STEP: 0x03,
  SEEK_POS: 0x04,
  GET_POS: 0x05,
  SET_GRIPPER: 0x06,
} as const;

/**
 * Firmata framing bytes
 */
export const START_SYSEX = 0xf0;
export const END_SYSEX = 0xf7;
export const STRING_DATA = 0x71;

/** Direction bit of the speed field: CW clears bit 7, CCW sets it */
export enum RotationDirection {
  CW = 0,
  CCW = 1,
}

export enum MoveStatus {
  FAILED = 0,
  MOVING = 1,
  COMPLETED = 2,
  LIMIT_REACHED = 3,
}

export enum MotorStatus {
  QUERY_FAILED = 0,
  STOPPED = 1,
  ACCELERATING = 2,
  DECELERATING = 3,
  FULL_SPEED = 4,
  HOMING = 5,
  CALIBRATING = 6,
}

export enum HomeStatus {
  FAILED = 0,
  STARTED = 1,
  COMPLETED = 2,
}

export enum WorkMode {
  CR_OPEN = 0x00,
  CR_CLOSE = 0x01,
  CR_VFOC = 0x02,
  SR_OPEN = 0x03,
  SR_CLOSE = 0x04,
  SR_VFOC = 0x05,
}

/** 12-bit speed field */
export const MAX_SPEED_VALUE = 0xfff;

/** CAN standard identifiers */
export const MIN_DEVICE_ID = 0x000;
export const MAX_DEVICE_ID = 0x7ff;
