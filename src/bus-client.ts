// src/bus-client.ts

import { Mutex } from 'async-mutex';
import {
  MKS_OPCODES,
  type HomeStatus,
  type MotorStatus,
  type MoveStatus,
  type WorkMode,
} from './constants/constants.js';
import { ChecksumError, NotConnectedError, StepperTimeoutError } from './errors.js';
import { busChecksum, formatFrame, verifyChecksum } from './framers/bus-framer.js';
import { rootLogger } from './logger.js';
import { buildSetSpeedRequest, parseSetSpeedResponse } from './command-codes/set-speed.js';
import { buildSendStepRequest, parseSendStepResponse } from './command-codes/send-step.js';
import {
  buildAngleMoveRequest,
  buildSeekPositionRequest,
  parseMoveResponse,
} from './command-codes/seek-position.js';
import {
  buildReadEncoderRequest,
  parseReadEncoderAdditiveResponse,
  parseReadEncoderSplitResponse,
} from './command-codes/read-encoder.js';
import {
  buildReadMotionStateRequest,
  parseReadAngleErrorResponse,
  parseReadMotorSpeedResponse,
  parseReadPositionResponse,
} from './command-codes/read-motion-state.js';
import {
  buildReadStatusRequest,
  parseFlagResponse,
  parseIoStatusResponse,
  parseQueryStatusResponse,
} from './command-codes/read-status.js';
import {
  buildControlRequest,
  buildEnableMotorRequest,
  parseControlResponse,
  parseGoHomeResponse,
} from './command-codes/control.js';
import {
  buildSetMicrostepRequest,
  buildSetWorkModeRequest,
  buildSetWorkingCurrentRequest,
  parseConfigureResponse,
} from './command-codes/configure.js';
import type {
  AbsolutePositionParams,
  AngleMoveParams,
  BusClientOptions,
  BusMessage,
  BusTransport,
  EncoderSplitValue,
  IoStatus,
  MksCommandName,
  MksOpcodeTable,
  MotionCalibration,
  RelativeStepParams,
  SpeedModeParams,
} from './types/stepper-types.js';
import { delay, sliceUint8Array } from './utils/utils.js';

const logger = rootLogger.createLogger('MksBusClient');

interface PendingRequest {
  opcode: number;
  resolve: (frame: Uint8Array) => void;
  reject: (err: Error) => void;
}

/**
 * Request/response client for MKS SERVO drivers on a shared bus.
 *
 * One command is in flight per device id; different devices run concurrently. A response is
 * the next frame from the same device whose first byte echoes the request opcode.
 */
export class MksBusClient {
  private readonly transport: BusTransport;
  private readonly opcodes: MksOpcodeTable;
  private readonly defaultTimeout: number;
  private readonly retryCount: number;
  private readonly retryDelay: number;
  private readonly _mutexes = new Map<number, Mutex>();
  private readonly _pending = new Map<number, PendingRequest>();
  private readonly _unsolicitedHandlers = new Set<(message: BusMessage) => void>();
  private readonly _unsubscribe: () => void;
  private _closed: boolean = false;

  constructor(transport: BusTransport, options: BusClientOptions = {}) {
    this.transport = transport;
    this.opcodes = options.opcodes ?? MKS_OPCODES;
    this.defaultTimeout = options.timeout ?? 1000;
    this.retryCount = options.retryCount ?? 0;
    this.retryDelay = options.retryDelay ?? 100;
    this._unsubscribe = transport.onFrame((deviceId, frame) => this._onFrame(deviceId, frame));
  }

  /**
   * Receives verified frames no request was waiting for (e.g. "move completed" notices).
   * @returns unsubscribe function
   */
  onUnsolicited(handler: (message: BusMessage) => void): () => void {
    this._unsolicitedHandlers.add(handler);
    return () => {
      this._unsolicitedHandlers.delete(handler);
    };
  }

  /**
   * Stops listening to the transport and fails any request still waiting.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    this._unsubscribe();
    for (const [deviceId, pending] of this._pending) {
      pending.reject(new NotConnectedError(`Client closed while waiting for device ${deviceId}`));
    }
    this._pending.clear();
  }

  private _mutexFor(deviceId: number): Mutex {
    let mutex = this._mutexes.get(deviceId);
    if (!mutex) {
      mutex = new Mutex();
      this._mutexes.set(deviceId, mutex);
    }
    return mutex;
  }

  private _onFrame(deviceId: number, frame: Uint8Array): void {
    const pending = this._pending.get(deviceId);
    if (pending && frame.length > 0 && frame[0] === pending.opcode) {
      this._pending.delete(deviceId);
      if (!verifyChecksum(deviceId, frame)) {
        const expected = busChecksum(deviceId, sliceUint8Array(frame, 0, -1));
        pending.reject(new ChecksumError(frame[frame.length - 1], expected));
        return;
      }
      pending.resolve(frame);
      return;
    }

    if (!verifyChecksum(deviceId, frame)) {
      logger.warn(`Dropping frame with bad checksum: ${formatFrame(deviceId, frame)}`, { deviceId });
      return;
    }
    const message: BusMessage = {
      deviceId,
      opcode: frame[0],
      fields: sliceUint8Array(frame, 1, -1),
    };
    logger.debug(`Unsolicited frame ${formatFrame(deviceId, frame)}`, {
      deviceId,
      opcode: message.opcode,
    });
    for (const handler of this._unsolicitedHandlers) {
      try {
        handler(message);
      } catch (err: unknown) {
        logger.error('Unsolicited frame handler failed:', err, { deviceId, opcode: message.opcode });
      }
    }
  }

  private _awaitResponse(
    deviceId: number,
    opcode: number,
    frame: Uint8Array,
    timeout: number
  ): Promise<Uint8Array> {
    return new Promise<Uint8Array>((resolve, reject) => {
      const timer = setTimeout(() => {
        this._pending.delete(deviceId);
        reject(new StepperTimeoutError(`No response from device ${deviceId} within ${timeout}ms`));
      }, timeout);

      this._pending.set(deviceId, {
        opcode,
        resolve: response => {
          clearTimeout(timer);
          resolve(response);
        },
        reject: err => {
          clearTimeout(timer);
          reject(err);
        },
      });

      this.transport.send(deviceId, frame).catch((err: unknown) => {
        clearTimeout(timer);
        this._pending.delete(deviceId);
        reject(err instanceof Error ? err : new Error(String(err)));
      });
    });
  }

  /**
   * Sends a request and returns the raw response frame, retrying on timeout or bad checksum.
   */
  private async _sendRequest(
    deviceId: number,
    command: MksCommandName,
    frame: Uint8Array,
    timeout: number = this.defaultTimeout
  ): Promise<Uint8Array> {
    const opcode = this.opcodes[command];
    if (this._closed) throw new NotConnectedError('Client is closed');
    const release = await this._mutexFor(deviceId).acquire();
    try {
      let lastError: unknown;
      const startTime = Date.now();

      for (let attempt = 0; attempt <= this.retryCount; attempt++) {
        if (this._closed) throw new NotConnectedError('Client is closed');
        try {
          logger.debug(`Attempt #${attempt + 1}: ${formatFrame(deviceId, frame)}`, {
            deviceId,
            opcode,
            command,
          });
          const response = await this._awaitResponse(deviceId, opcode, frame, timeout);
          logger.debug(`Response ${formatFrame(deviceId, response)}`, {
            deviceId,
            opcode,
            command,
            responseTime: Date.now() - startTime,
          });
          return response;
        } catch (err: unknown) {
          lastError = err;
          if (!(err instanceof StepperTimeoutError || err instanceof ChecksumError)) throw err;

          logger.warn(`Attempt #${attempt + 1} failed: ${err.message}`, {
            deviceId,
            opcode,
            command,
          });
          if (attempt < this.retryCount) {
            await delay(this.retryDelay);
          }
        }
      }

      logger.error(`All ${this.retryCount + 1} attempts exhausted`, { deviceId, opcode, command });
      throw lastError instanceof Error ? lastError : new Error(String(lastError));
    } finally {
      release();
    }
  }

  // --- Motion ---

  /**
   * Runs the motor at constant speed. A speed of 0 stops it.
   */
  async setSpeed(
    deviceId: number,
    params: SpeedModeParams,
    calibration: MotionCalibration
  ): Promise<boolean> {
    const opcode = this.opcodes.SET_SPEED;
    const frame = buildSetSpeedRequest(deviceId, opcode, params, calibration);
    const response = await this._sendRequest(deviceId, 'SET_SPEED', frame);
    return parseSetSpeedResponse(deviceId, opcode, response);
  }

  /**
   * Moves a number of steps relative to the current position.
   */
  async sendStep(
    deviceId: number,
    params: RelativeStepParams,
    calibration: MotionCalibration
  ): Promise<MoveStatus> {
    const opcode = this.opcodes.SEND_STEP;
    const frame = buildSendStepRequest(deviceId, opcode, params, calibration);
    const response = await this._sendRequest(deviceId, 'SEND_STEP', frame);
    return parseSendStepResponse(deviceId, opcode, response);
  }

  /**
   * Moves to an absolute step position.
   */
  async seekPosition(
    deviceId: number,
    params: AbsolutePositionParams,
    calibration: MotionCalibration
  ): Promise<MoveStatus> {
    const opcode = this.opcodes.SEEK_POS_BY_STEPS;
    const frame = buildSeekPositionRequest(deviceId, opcode, params, calibration);
    const response = await this._sendRequest(deviceId, 'SEEK_POS_BY_STEPS', frame);
    return parseMoveResponse(deviceId, opcode, response);
  }

  async sendAngle(
    deviceId: number,
    params: AngleMoveParams,
    calibration: MotionCalibration
  ): Promise<MoveStatus> {
    const opcode = this.opcodes.SEND_ANGLE;
    const frame = buildAngleMoveRequest(deviceId, opcode, params, calibration);
    const response = await this._sendRequest(deviceId, 'SEND_ANGLE', frame);
    return parseMoveResponse(deviceId, opcode, response);
  }

  async seekAngle(
    deviceId: number,
    params: AngleMoveParams,
    calibration: MotionCalibration
  ): Promise<MoveStatus> {
    const opcode = this.opcodes.SEEK_POS_BY_ANGLE;
    const frame = buildAngleMoveRequest(deviceId, opcode, params, calibration);
    const response = await this._sendRequest(deviceId, 'SEEK_POS_BY_ANGLE', frame);
    return parseMoveResponse(deviceId, opcode, response);
  }

  // --- Readouts ---

  async readEncoder(deviceId: number): Promise<EncoderSplitValue> {
    const opcode = this.opcodes.ENCODER_SPLIT;
    const response = await this._sendRequest(
      deviceId,
      'ENCODER_SPLIT',
      buildReadEncoderRequest(deviceId, opcode)
    );
    return parseReadEncoderSplitResponse(deviceId, opcode, response);
  }

  async readEncoderAdditive(deviceId: number): Promise<number> {
    const opcode = this.opcodes.ENCODER_ADDITIVE;
    const response = await this._sendRequest(
      deviceId,
      'ENCODER_ADDITIVE',
      buildReadEncoderRequest(deviceId, opcode)
    );
    return parseReadEncoderAdditiveResponse(deviceId, opcode, response);
  }

  async readEncoderRaw(deviceId: number): Promise<number> {
    const opcode = this.opcodes.ENCODER_RAW;
    const response = await this._sendRequest(
      deviceId,
      'ENCODER_RAW',
      buildReadEncoderRequest(deviceId, opcode)
    );
    return parseReadEncoderAdditiveResponse(deviceId, opcode, response);
  }

  async readMotorSpeed(deviceId: number): Promise<number> {
    const opcode = this.opcodes.MOTOR_SPEED;
    const response = await this._sendRequest(
      deviceId,
      'MOTOR_SPEED',
      buildReadMotionStateRequest(deviceId, opcode)
    );
    return parseReadMotorSpeedResponse(deviceId, opcode, response);
  }

  async readPosition(deviceId: number): Promise<number> {
    const opcode = this.opcodes.CURRENT_POS;
    const response = await this._sendRequest(
      deviceId,
      'CURRENT_POS',
      buildReadMotionStateRequest(deviceId, opcode)
    );
    return parseReadPositionResponse(deviceId, opcode, response);
  }

  async readAngleError(deviceId: number): Promise<number> {
    const opcode = this.opcodes.TARGET_ANGLE_ERROR;
    const response = await this._sendRequest(
      deviceId,
      'TARGET_ANGLE_ERROR',
      buildReadMotionStateRequest(deviceId, opcode)
    );
    return parseReadAngleErrorResponse(deviceId, opcode, response);
  }

  async readIoStatus(deviceId: number): Promise<IoStatus> {
    const opcode = this.opcodes.IO_STATUS;
    const response = await this._sendRequest(
      deviceId,
      'IO_STATUS',
      buildReadStatusRequest(deviceId, opcode)
    );
    return parseIoStatusResponse(deviceId, opcode, response);
  }

  async queryStatus(deviceId: number): Promise<MotorStatus> {
    const opcode = this.opcodes.QUERY_STATUS;
    const response = await this._sendRequest(
      deviceId,
      'QUERY_STATUS',
      buildReadStatusRequest(deviceId, opcode)
    );
    return parseQueryStatusResponse(deviceId, opcode, response);
  }

  async isEnabled(deviceId: number): Promise<boolean> {
    const opcode = this.opcodes.ENABLE_STATUS;
    const response = await this._sendRequest(
      deviceId,
      'ENABLE_STATUS',
      buildReadStatusRequest(deviceId, opcode)
    );
    return parseFlagResponse(deviceId, opcode, response);
  }

  async readHomeStatus(deviceId: number): Promise<HomeStatus> {
    const opcode = this.opcodes.GO_HOME_STATUS;
    const response = await this._sendRequest(
      deviceId,
      'GO_HOME_STATUS',
      buildReadStatusRequest(deviceId, opcode)
    );
    return parseGoHomeResponse(deviceId, opcode, response);
  }

  async isShaftLocked(deviceId: number): Promise<boolean> {
    const opcode = this.opcodes.SHAFT_LOCK_STATUS;
    const response = await this._sendRequest(
      deviceId,
      'SHAFT_LOCK_STATUS',
      buildReadStatusRequest(deviceId, opcode)
    );
    return parseFlagResponse(deviceId, opcode, response);
  }

  // --- Control ---

  async enableMotor(deviceId: number, enable: boolean): Promise<boolean> {
    const opcode = this.opcodes.ENABLE_MOTOR;
    const response = await this._sendRequest(
      deviceId,
      'ENABLE_MOTOR',
      buildEnableMotorRequest(deviceId, opcode, enable)
    );
    return parseControlResponse(deviceId, opcode, response);
  }

  async emergencyStop(deviceId: number): Promise<boolean> {
    return this._control(deviceId, 'EMERGENCY_STOP');
  }

  /**
   * Makes the current position the zero point.
   */
  async setZero(deviceId: number): Promise<boolean> {
    return this._control(deviceId, 'SET_ZERO');
  }

  async releaseShaftLock(deviceId: number): Promise<boolean> {
    return this._control(deviceId, 'RELEASE_SHAFT_LOCK');
  }

  async goHome(deviceId: number): Promise<HomeStatus> {
    const opcode = this.opcodes.GO_HOME;
    const response = await this._sendRequest(
      deviceId,
      'GO_HOME',
      buildControlRequest(deviceId, opcode)
    );
    return parseGoHomeResponse(deviceId, opcode, response);
  }

  private async _control(deviceId: number, command: MksCommandName): Promise<boolean> {
    const opcode = this.opcodes[command];
    const response = await this._sendRequest(
      deviceId,
      command,
      buildControlRequest(deviceId, opcode)
    );
    return parseControlResponse(deviceId, opcode, response);
  }

  // --- Configuration ---

  async setWorkMode(deviceId: number, mode: WorkMode): Promise<boolean> {
    const opcode = this.opcodes.SET_WORK_MODE;
    const response = await this._sendRequest(
      deviceId,
      'SET_WORK_MODE',
      buildSetWorkModeRequest(deviceId, opcode, mode)
    );
    return parseConfigureResponse(deviceId, opcode, response);
  }

  async setWorkingCurrent(deviceId: number, milliamps: number): Promise<boolean> {
    const opcode = this.opcodes.SET_WORKING_CURRENT;
    const response = await this._sendRequest(
      deviceId,
      'SET_WORKING_CURRENT',
      buildSetWorkingCurrentRequest(deviceId, opcode, milliamps)
    );
    return parseConfigureResponse(deviceId, opcode, response);
  }

  async setMicrostep(deviceId: number, microsteps: number): Promise<boolean> {
    const opcode = this.opcodes.SET_MICROSTEP;
    const response = await this._sendRequest(
      deviceId,
      'SET_MICROSTEP',
      buildSetMicrostepRequest(deviceId, opcode, microsteps)
    );
    return parseConfigureResponse(deviceId, opcode, response);
  }
}
