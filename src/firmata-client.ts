// src/firmata-client.ts

import { Mutex } from 'async-mutex';
import { STRING_DATA, SYSEX_COMMANDS } from './constants/constants.js';
import { MalformedFrameError, NotConnectedError, StepperTimeoutError } from './errors.js';
import {
  SysexStreamParser,
  buildSysexMessage,
  decodeSysexPayload,
  decodeSysexString,
} from './framers/sysex-framer.js';
import { rootLogger } from './logger.js';
import { buildGetSpeedPayload, buildSetSpeedPayload, parseMotorSpeedPayload } from './sysex-codes/motor-speed.js';
import {
  buildSeekPositionPayload,
  buildSendStepPayload,
  parseSeekPositionPayload,
  parseSendStepPayload,
} from './sysex-codes/motion.js';
import { buildGetPositionPayload, parseMotorPositionPayload } from './sysex-codes/position.js';
import { buildSetGripperPayload, parseGripperPayload } from './sysex-codes/gripper.js';
import type {
  FirmataClientOptions,
  MotorPositionPayload,
  MotorSeekPayload,
  MotorSpeedPayload,
  MotorStepPayload,
  SysexCommandName,
  SysexCommandTable,
  Transport,
} from './types/stepper-types.js';
import { delay, formatHexBytes } from './utils/utils.js';

const logger = rootLogger.createLogger('FirmataStepperClient');

/**
 * Request/response client for a microcontroller that drives steppers and answers sysex
 * commands. Requests are serialized over the link; each reply echoes the request's command.
 */
export class FirmataStepperClient {
  private readonly transport: Transport;
  private readonly commands: SysexCommandTable;
  private readonly defaultTimeout: number;
  private readonly retryCount: number;
  private readonly retryDelay: number;
  private readonly parser: SysexStreamParser;
  private readonly _mutex: Mutex = new Mutex();
  private readonly _stringHandlers = new Set<(text: string) => void>();

  constructor(transport: Transport, options: FirmataClientOptions = {}) {
    this.transport = transport;
    this.commands = options.commands ?? SYSEX_COMMANDS;
    this.defaultTimeout = options.timeout ?? 2000;
    this.retryCount = options.retryCount ?? 0;
    this.retryDelay = options.retryDelay ?? 100;
    this.parser = new SysexStreamParser(options.maxMessageSize);
  }

  /**
   * Receives STRING_DATA text the board sends while a request is in flight.
   * @returns unsubscribe function
   */
  onString(handler: (text: string) => void): () => void {
    this._stringHandlers.add(handler);
    return () => {
      this._stringHandlers.delete(handler);
    };
  }

  async connect(): Promise<void> {
    await this.transport.connect();
    this.parser.reset();
  }

  async disconnect(): Promise<void> {
    await this.transport.disconnect();
  }

  /**
   * Reads bytes until a sysex message with `command` arrives and returns its decoded payload.
   * Other messages are handed to the string handlers or dropped.
   */
  private async _readReply(command: number, timeout: number): Promise<Uint8Array> {
    const start = Date.now();
    for (;;) {
      const timeLeft = timeout - (Date.now() - start);
      if (timeLeft <= 0) {
        throw new StepperTimeoutError(`No reply to sysex command 0x${command.toString(16)}`);
      }
      const chunk = await this.transport.read(1, timeLeft);
      for (const message of this.parser.push(chunk)) {
        if (message.command === command) {
          return decodeSysexPayload(message);
        }
        if (message.command === STRING_DATA) {
          this._onString(message.data);
          continue;
        }
        logger.debug(`Discarding sysex 0x${message.command.toString(16)} while waiting for 0x${command.toString(16)}`);
      }
    }
  }

  private _onString(data: Uint8Array): void {
    let text: string;
    try {
      text = decodeSysexString(data);
    } catch (err: unknown) {
      if (!(err instanceof MalformedFrameError)) throw err;
      logger.warn(`Ignoring string message: ${err.message}`);
      return;
    }
    logger.info(`Board says: ${text}`);
    for (const handler of this._stringHandlers) handler(text);
  }

  /**
   * Writes the request and parses the reply, retrying timeouts and malformed replies.
   * @param parse - turns the decoded reply payload into the result; its MalformedFrameError is retried too
   */
  private async _sendRequest<T>(
    name: SysexCommandName,
    payload: Uint8Array,
    parse: (reply: Uint8Array) => T,
    timeout: number = this.defaultTimeout
  ): Promise<T> {
    if (!this.transport.isOpen) {
      throw new NotConnectedError('Transport is not connected');
    }
    const command = this.commands[name];
    const message = buildSysexMessage(command, payload);

    const release = await this._mutex.acquire();
    try {
      let lastError: unknown;
      const startTime = Date.now();

      for (let attempt = 0; attempt <= this.retryCount; attempt++) {
        try {
          logger.debug(`Attempt #${attempt + 1}: ${formatHexBytes(message)}`, { command: name });
          await this.transport.write(message);
          const reply = await this._readReply(command, timeout);
          logger.debug(`Reply ${formatHexBytes(reply)}`, {
            command: name,
            responseTime: Date.now() - startTime,
          });
          return parse(reply);
        } catch (err: unknown) {
          lastError = err;
          if (!(err instanceof StepperTimeoutError || err instanceof MalformedFrameError)) throw err;

          logger.warn(`Attempt #${attempt + 1} failed: ${err.message}`, { command: name });
          if (attempt < this.retryCount) {
            this.parser.reset();
            if (this.transport.flush) await this.transport.flush();
            await delay(this.retryDelay);
          }
        }
      }

      logger.error(`All ${this.retryCount + 1} attempts exhausted`, { command: name });
      throw lastError instanceof Error ? lastError : new Error(String(lastError));
    } finally {
      release();
    }
  }

  /**
   * Sends bytes the board returns unchanged.
   */
  async echo(payload: Uint8Array): Promise<Uint8Array> {
    return this._sendRequest('ECHO', payload, reply => reply);
  }

  async setSpeed(request: MotorSpeedPayload): Promise<MotorSpeedPayload> {
    return this._sendRequest('SET_SPEED', buildSetSpeedPayload(request), parseMotorSpeedPayload);
  }

  async getSpeed(motor: number): Promise<MotorSpeedPayload> {
    return this._sendRequest('GET_SPEED', buildGetSpeedPayload(motor), parseMotorSpeedPayload);
  }

  async sendStep(request: MotorStepPayload): Promise<MotorStepPayload> {
    return this._sendRequest('SEND_STEP', buildSendStepPayload(request), parseSendStepPayload);
  }

  async seekPosition(request: MotorSeekPayload): Promise<MotorSeekPayload> {
    return this._sendRequest(
      'SEEK_POS',
      buildSeekPositionPayload(request),
      parseSeekPositionPayload
    );
  }

  async getPosition(motor: number): Promise<MotorPositionPayload> {
    return this._sendRequest('GET_POS', buildGetPositionPayload(motor), parseMotorPositionPayload);
  }

  async setGripper(position: number): Promise<number> {
    return this._sendRequest('SET_GRIPPER', buildSetGripperPayload(position), parseGripperPayload);
  }
}
