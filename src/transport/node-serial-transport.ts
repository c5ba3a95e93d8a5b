// src/transport/node-serial-transport.ts
import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { allocUint8Array, concatUint8Arrays, sliceUint8Array } from '../utils/utils.js';
import { rootLogger } from '../logger.js';
import {
  BufferOverflowError,
  ConfigError,
  NotConnectedError,
  SerialConnectionError,
  SerialReadError,
  SerialWriteError,
  StepperTimeoutError,
} from '../errors.js';
import type { NodeSerialTransportOptions, Transport } from '../types/stepper-types.js';

const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 1000000,
  DEFAULT_MAX_BUFFER_SIZE: 4096,
  POLL_INTERVAL_MS: 10,
} as const;

const logger = rootLogger.createLogger('NodeSerialTransport');

/**
 * Byte-stream transport over a local serial port. Firmata boards default to 57600 baud.
 */
export class NodeSerialTransport implements Transport {
  private readonly path: string;
  private readonly options: Required<NodeSerialTransportOptions>;
  private port: SerialPort | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    this.path = path;
    this.options = {
      baudRate: 57600,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      readTimeout: 1000,
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      ...options,
    };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    if (this._isOpen) {
      logger.debug(`Serial port ${this.path} already open`);
      return;
    }
    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new ConfigError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    await this._createAndOpenPort();
    logger.info(`Serial port ${this.path} opened at ${this.options.baudRate} baud`);
  }

  private _createAndOpenPort(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.options.baudRate,
        dataBits: this.options.dataBits,
        stopBits: this.options.stopBits,
        parity: this.options.parity,
        autoOpen: false,
      });
      this.port = port;

      port.open((err: Error | null) => {
        if (err) {
          this._isOpen = false;
          this.port = null;
          const message = err.message.toLowerCase();
          if (message.includes('permission')) {
            reject(new SerialConnectionError(`Permission denied: ${this.path}`));
          } else if (message.includes('busy')) {
            reject(new SerialConnectionError(`Serial port is busy: ${this.path}`));
          } else if (message.includes('no such file')) {
            reject(new SerialConnectionError(`Serial port does not exist: ${this.path}`));
          } else {
            reject(new SerialConnectionError(err.message));
          }
          return;
        }

        this._isOpen = true;
        port.on('data', (data: Buffer) => this._onData(data));
        port.on('error', (error: Error) => this._onError(error));
        port.on('close', () => this._onClose());
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    if (this.readBuffer.length + chunk.length > this.options.maxBufferSize) {
      const overflow = new BufferOverflowError(
        this.readBuffer.length + chunk.length,
        this.options.maxBufferSize
      );
      logger.warn(`${overflow.message}; keeping the newest bytes`);
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      this.readBuffer = sliceUint8Array(this.readBuffer, -this.options.maxBufferSize);
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
  }

  private _onClose(): void {
    logger.info(`Serial port ${this.path} closed`);
    this._isOpen = false;
  }

  /**
   * Drops everything received but not yet read.
   */
  async flush(): Promise<void> {
    const release = await this._operationMutex.acquire();
    try {
      this.readBuffer = allocUint8Array(0);
    } finally {
      release();
    }
  }

  async write(buffer: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this._isOpen || !port?.isOpen) throw new NotConnectedError(`Port ${this.path} is closed`);
    if (buffer.length === 0) return;
    const release = await this._operationMutex.acquire();
    try {
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(buffer), (err: Error | null | undefined) => {
          if (err) {
            reject(new SerialWriteError(err.message));
            return;
          }
          port.drain((drainErr: Error | null) => {
            if (drainErr) {
              reject(new SerialWriteError(drainErr.message));
              return;
            }
            resolve();
          });
        });
      });
    } finally {
      release();
    }
  }

  /**
   * Waits until `length` bytes have been received and returns them.
   * @throws StepperTimeoutError if they do not arrive within `timeout` ms
   */
  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if ((length | 0) !== length || length <= 0) {
      throw new SerialReadError(`Read length must be a positive integer, got ${length}`);
    }
    const release = await this._operationMutex.acquire();
    const start = Date.now();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = (): void => {
          if (!this._isOpen) {
            reject(new NotConnectedError(`Port ${this.path} is closed`));
            return;
          }
          if (this.readBuffer.length >= length) {
            const data = sliceUint8Array(this.readBuffer, 0, length);
            this.readBuffer = sliceUint8Array(this.readBuffer, length);
            resolve(data);
            return;
          }
          if (Date.now() - start >= timeout) {
            reject(new StepperTimeoutError(`Read timeout after ${timeout}ms`));
            return;
          }
          setTimeout(check, NODE_SERIAL_CONSTANTS.POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    this.port = null;
    this.readBuffer = allocUint8Array(0);
    if (!port || !port.isOpen) {
      this._isOpen = false;
      return;
    }
    port.removeAllListeners('data');
    port.removeAllListeners('error');
    await new Promise<void>((resolve, reject) => {
      port.close((err: Error | null) => {
        if (err) {
          reject(new SerialConnectionError(err.message));
          return;
        }
        resolve();
      });
    });
    this._isOpen = false;
    logger.debug(`Serial port ${this.path} released`);
  }
}
