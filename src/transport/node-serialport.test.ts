import { SerialPortMock } from 'serialport';
import { afterEach, describe, expect, it } from 'vitest';

import { RobotCommand } from '../constants/constants.js';
import { CobotConfigError, SerialConnectionError, SerialWriteError } from '../errors.js';
import { buildFrame } from '../framers/frame.js';
import CobotOperator from '../operator.js';
import type { SerialPortFactory } from '../types/cobot-types.js';
import SerialConnection from './node-serialport.js';

const PATH = '/dev/ROBOT';

const mockFactory: SerialPortFactory = settings => new SerialPortMock(settings);

function createConnection(echo: boolean): SerialConnection {
  SerialPortMock.binding.createPort(PATH, { echo });
  return new SerialConnection(PATH, { readTimeout: 50, interByteTimeout: 10 }, mockFactory);
}

describe('SerialConnection', () => {
  let connection: SerialConnection | null = null;

  afterEach(async () => {
    if (connection) await connection.close();
    connection = null;
    SerialPortMock.binding.reset();
  });

  it('opens and closes the port', async () => {
    connection = createConnection(false);
    expect(connection.isOpen).toBe(false);

    await connection.open();
    expect(connection.isOpen).toBe(true);

    await connection.close();
    expect(connection.isOpen).toBe(false);
  });

  it('collects the reply window after a write', async () => {
    connection = createConnection(true);
    await connection.open();

    const frame = buildFrame(RobotCommand.IS_POWER_ON);
    await expect(connection.writeAndRead(frame)).resolves.toEqual(frame);
  });

  it('drops bytes that arrived outside a transaction', async () => {
    connection = createConnection(true);
    await connection.open();

    await connection.write(buildFrame(RobotCommand.POWER_ON));
    await new Promise(resolve => setTimeout(resolve, 20));

    const frame = buildFrame(RobotCommand.GET_ANGLES);
    await expect(connection.writeAndRead(frame)).resolves.toEqual(frame);
  });

  it('returns an empty reply when the line stays quiet', async () => {
    connection = createConnection(false);
    await connection.open();

    const reply = await connection.writeAndRead(buildFrame(RobotCommand.IS_POWER_ON));
    expect(reply).toHaveLength(0);
  });

  it('refuses to write on a closed port', async () => {
    connection = createConnection(false);
    await expect(connection.write(buildFrame(RobotCommand.STOP))).rejects.toBeInstanceOf(
      SerialWriteError
    );
  });

  it('rejects a baud rate out of range', async () => {
    const slow = new SerialConnection(PATH, { baudRate: 100 }, mockFactory);
    const fast = new SerialConnection(PATH, { baudRate: 2_000_000 }, mockFactory);

    await expect(slow.open()).rejects.toBeInstanceOf(CobotConfigError);
    await expect(fast.open()).rejects.toBeInstanceOf(CobotConfigError);
  });

  it('reports a port that cannot be opened', async () => {
    const missing = new SerialConnection('/dev/MISSING', {}, mockFactory);
    await expect(missing.open()).rejects.toBeInstanceOf(SerialConnectionError);
    expect(missing.isOpen).toBe(false);
  });

  it('drives an operator end to end', async () => {
    connection = createConnection(true);
    await connection.open();
    const operator = new CobotOperator(connection);

    // An echoed request carries no payload, so the query decodes to nothing
    await expect(operator.isPowerOn()).resolves.toBe(-1);
    await expect(operator.getAngles()).resolves.toEqual([]);
  });
});
