import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from './logger.js';
import type { LogRecord } from './types/stepper-types.js';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger();
    logger.disableColors();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats tagged context fields into the header', () => {
    logger.setLogFormat(['level', 'logger', 'deviceId', 'opcode']);
    expect(
      logger.format('info', ['hello'], {
        logger: 'Bus',
        deviceId: 1,
        opcode: 0xf6,
        command: 'SET_SPEED',
      })
    ).toEqual(['[INFO][Bus][D:1][OP:0xf6/SET_SPEED]', 'hello']);
  });

  it('appends unknown context as JSON', () => {
    logger.setLogFormat(['level']);
    expect(logger.format('warn', ['x'], { bytes: 3 })).toEqual(['[WARN]', 'x', '{"bytes":3}']);
  });

  it('applies custom field formatters', () => {
    logger.setLogFormat(['deviceId', 'responseTime']);
    logger.setCustomFormatter('deviceId', v => `<dev ${v}>`);
    expect(logger.format('debug', ['m'], { deviceId: 7, responseTime: 12 })).toEqual([
      '<dev 7>[RT:12ms]',
      'm',
    ]);
  });

  it('drops records below the level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    logger.setLevel('warn');
    logger.info('quiet');
    logger.warn('loud');
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(logger.getCounts()).toEqual({ trace: 0, debug: 0, info: 0, warn: 1, error: 0 });
  });

  it('treats a trailing plain object as context', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const records: LogRecord[] = [];
    logger.watch(record => records.push(record));
    logger.error('failed', { deviceId: 3 });
    expect(records).toEqual([{ level: 'error', args: ['failed'], context: { deviceId: 3 } }]);
  });

  it('lets categories override the root level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const bus = logger.createLogger('Bus');
    const serial = logger.createLogger('Serial');
    bus.setLevel('trace');
    serial.pause();

    bus.trace('traced');
    serial.error('silenced');
    expect(debug).toHaveBeenCalledTimes(1);
    expect(logger.getCounts().error).toBe(0);

    serial.resume();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    serial.error('heard');
    expect(logger.getCounts().error).toBe(1);
  });

  it('mutes records by device id', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    logger.mute({ deviceId: 2 });
    logger.warn('muted', { deviceId: 2 });
    logger.warn('kept', { deviceId: 1 });
    expect(warn).toHaveBeenCalledTimes(1);
    logger.unmute({ deviceId: 2 });
    logger.warn('back', { deviceId: 2 });
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('does nothing while disabled', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    logger.disable();
    logger.warn('nothing');
    expect(warn).not.toHaveBeenCalled();
    expect(logger.isEnabled()).toBe(false);
  });
});
