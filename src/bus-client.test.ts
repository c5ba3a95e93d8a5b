import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { MksBusClient } from './bus-client.js';
import { MKS_OPCODES, MoveStatus, RotationDirection } from './constants/constants.js';
import { ChecksumError, NotConnectedError } from './errors.js';
import { formatFrame } from './framers/bus-framer.js';
import { rootLogger } from './logger.js';
import type { BusMessage, BusTransport } from './types/stepper-types.js';
import { UNCALIBRATED } from './utils/calibration.js';
import { defineOpcodeTable } from './utils/opcode-table.js';

type Responder = (deviceId: number, frame: Uint8Array, attempt: number) => Uint8Array | null;

/** In-process bus: answers each sent frame through `responder` on the next tick */
class FakeBus implements BusTransport {
  readonly sent: string[] = [];
  private readonly handlers = new Set<(deviceId: number, frame: Uint8Array) => void>();
  sendError: Error | null = null;

  constructor(private readonly responder: Responder = () => null) {}

  async send(deviceId: number, frame: Uint8Array): Promise<void> {
    if (this.sendError) throw this.sendError;
    const attempt = this.sent.length;
    this.sent.push(formatFrame(deviceId, frame));
    const reply = this.responder(deviceId, frame, attempt);
    if (reply) {
      setTimeout(() => this.emit(deviceId, reply), 0);
    }
  }

  onFrame(handler: (deviceId: number, frame: Uint8Array) => void): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  emit(deviceId: number, frame: Uint8Array): void {
    for (const handler of this.handlers) handler(deviceId, frame);
  }

  get listenerCount(): number {
    return this.handlers.size;
  }
}

describe('MksBusClient', () => {
  beforeAll(() => {
    rootLogger.disable();
  });

  afterAll(() => {
    rootLogger.enable();
  });

  it('sends a speed-mode frame and reads the status', async () => {
    const bus = new FakeBus(() => Uint8Array.of(0xf6, 0x01, 0xf8));
    const client = new MksBusClient(bus);

    const accepted = await client.setSpeed(
      1,
      { speed: 320, direction: RotationDirection.CW, acceleration: 2 },
      UNCALIBRATED
    );

    expect(accepted).toBe(true);
    expect(bus.sent).toEqual(['01 F6 01 40 02 3A']);
  });

  it('sends an absolute seek with a negative target', async () => {
    const bus = new FakeBus(() => Uint8Array.of(0xfe, 0x02, 0x01));
    const client = new MksBusClient(bus);

    const status = await client.seekPosition(
      1,
      { speed: 600, acceleration: 2, position: -0x4000 },
      UNCALIBRATED
    );

    expect(status).toBe(MoveStatus.COMPLETED);
    expect(bus.sent).toEqual(['01 FE 02 58 02 FF C0 00 1A']);
  });

  it('retries after a bad checksum', async () => {
    const bus = new FakeBus((_id, _frame, attempt) =>
      attempt === 0 ? Uint8Array.of(0xf6, 0x01, 0xf9) : Uint8Array.of(0xf6, 0x01, 0xf8)
    );
    const client = new MksBusClient(bus, { retryCount: 1, retryDelay: 0 });

    await expect(
      client.setSpeed(1, { speed: 0, direction: RotationDirection.CW, acceleration: 0 }, UNCALIBRATED)
    ).resolves.toBe(true);
    expect(bus.sent).toHaveLength(2);
  });

  it('fails with ChecksumError when retries are exhausted', async () => {
    const bus = new FakeBus(() => Uint8Array.of(0xf6, 0x01, 0xf9));
    const client = new MksBusClient(bus);

    await expect(
      client.setSpeed(1, { speed: 0, direction: RotationDirection.CW, acceleration: 0 }, UNCALIBRATED)
    ).rejects.toThrow(ChecksumError);
  });

  it('times out when the device stays silent', async () => {
    const bus = new FakeBus();
    const client = new MksBusClient(bus, { timeout: 20, retryCount: 1, retryDelay: 0 });

    await expect(client.queryStatus(5)).rejects.toThrow('No response from device 5 within 20ms');
    expect(bus.sent).toEqual(['05 F1 F6', '05 F1 F6']);
  });

  it('propagates transport send failures without retrying', async () => {
    const bus = new FakeBus();
    bus.sendError = new Error('bus down');
    const client = new MksBusClient(bus, { retryCount: 3, retryDelay: 0 });

    await expect(client.emergencyStop(1)).rejects.toThrow('bus down');
  });

  it('matches responses to devices independently', async () => {
    const bus = new FakeBus(deviceId =>
      deviceId === 1
        ? Uint8Array.of(0x33, 0x00, 0x00, 0x00, 0x07, 0x3b)
        : Uint8Array.of(0x33, 0x00, 0x00, 0x00, 0x05, 0x3a)
    );
    const client = new MksBusClient(bus);

    const [first, second] = await Promise.all([client.readPosition(1), client.readPosition(2)]);
    expect(first).toBe(7);
    expect(second).toBe(5);
  });

  it('uses an injected opcode table', async () => {
    const bus = new FakeBus(() => Uint8Array.of(0xe6, 0x01, 0xe8));
    const client = new MksBusClient(bus, {
      opcodes: defineOpcodeTable(MKS_OPCODES, { SET_SPEED: 0xe6 }),
    });

    await client.setSpeed(
      1,
      { speed: 320, direction: RotationDirection.CCW, acceleration: 2 },
      UNCALIBRATED
    );
    expect(bus.sent).toEqual(['01 E6 81 40 02 AA']);
  });

  it('hands unrequested frames to unsolicited handlers', () => {
    const bus = new FakeBus();
    const client = new MksBusClient(bus);
    const received: BusMessage[] = [];
    client.onUnsolicited(message => received.push(message));

    bus.emit(1, Uint8Array.of(0xfd, 0x02, 0x00));
    bus.emit(1, Uint8Array.of(0xfd, 0x02, 0x01));

    expect(received).toEqual([{ deviceId: 1, opcode: 0xfd, fields: Uint8Array.of(0x02) }]);
  });

  it('detaches from the transport on close', async () => {
    const bus = new FakeBus();
    const client = new MksBusClient(bus, { timeout: 1000 });
    const pending = client.readMotorSpeed(1);

    await new Promise(resolve => setTimeout(resolve, 0));
    client.close();

    await expect(pending).rejects.toThrow(NotConnectedError);
    expect(bus.listenerCount).toBe(0);
  });

  it('does not resend a request after close', async () => {
    const bus = new FakeBus();
    const client = new MksBusClient(bus, { timeout: 50, retryCount: 3, retryDelay: 0 });
    const pending = client.readMotorSpeed(1);

    await new Promise(resolve => setTimeout(resolve, 0));
    client.close();

    await expect(pending).rejects.toThrow('Client closed while waiting for device 1');
    expect(bus.sent).toEqual(['01 32 33']);
    await expect(client.readMotorSpeed(1)).rejects.toThrow(NotConnectedError);
    expect(bus.sent).toHaveLength(1);
  });

  it('keeps delivering unsolicited frames when a handler throws', () => {
    const bus = new FakeBus();
    const client = new MksBusClient(bus);
    const received: number[] = [];
    client.onUnsolicited(() => {
      throw new Error('handler failed');
    });
    client.onUnsolicited(message => received.push(message.opcode));

    expect(() => bus.emit(1, Uint8Array.of(0xfd, 0x02, 0x00))).not.toThrow();
    expect(received).toEqual([0xfd]);
  });
});
