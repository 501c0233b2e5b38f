import { afterEach, describe, expect, it, vi } from 'vitest';

import { RobotCommand } from '../constants/constants.js';
import { Diagnostics } from './diagnostics.js';

describe('Diagnostics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts empty', () => {
    const stats = new Diagnostics().getStats();
    expect(stats.totalRequests).toBe(0);
    expect(stats.averageResponseTime).toBeNull();
    expect(stats.commandCounts).toEqual({});
    expect(stats.lastError).toBeNull();
  });

  it('separates write-only commands from transactions', () => {
    const diagnostics = new Diagnostics();

    diagnostics.recordRequest(RobotCommand.GET_ANGLES, 5, true);
    diagnostics.recordRequest(RobotCommand.POWER_ON, 5, false);
    diagnostics.recordReply(17, 12);
    diagnostics.recordReply(5, 4);

    const stats = diagnostics.getStats();
    expect(stats.totalRequests).toBe(2);
    expect(stats.transactions).toBe(1);
    expect(stats.writeOnly).toBe(1);
    expect(stats.bytesSent).toBe(10);
    expect(stats.bytesReceived).toBe(22);
    expect(stats.lastResponseTime).toBe(4);
    expect(stats.minResponseTime).toBe(4);
    expect(stats.maxResponseTime).toBe(12);
    expect(stats.averageResponseTime).toBe(8);
    expect(stats.commandCounts).toEqual({ GET_ANGLES: 1, POWER_ON: 1 });
  });

  it('warns once when replies keep decoding to nothing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const diagnostics = new Diagnostics({ emptyDecodeThreshold: 2 });

    diagnostics.recordEmptyDecode(RobotCommand.IS_POWER_ON);
    expect(warn).not.toHaveBeenCalled();
    diagnostics.recordEmptyDecode(RobotCommand.IS_POWER_ON);
    diagnostics.recordEmptyDecode(RobotCommand.IS_POWER_ON);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(diagnostics.getStats().emptyDecodes).toBe(3);
  });

  it('restarts the empty streak after a decoded reply', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const diagnostics = new Diagnostics({ emptyDecodeThreshold: 2 });

    diagnostics.recordEmptyDecode(RobotCommand.GET_COORDS);
    diagnostics.recordDecoded();
    diagnostics.recordEmptyDecode(RobotCommand.GET_COORDS);

    expect(warn).not.toHaveBeenCalled();
  });

  it('keeps the last transport error', () => {
    const diagnostics = new Diagnostics();

    diagnostics.recordTransportError(new Error('Port closed'));
    diagnostics.recordTransportError('timeout');

    const stats = diagnostics.getStats();
    expect(stats.transportErrors).toBe(2);
    expect(stats.lastError).toBe('timeout');
  });

  it('clears everything on reset', () => {
    const diagnostics = new Diagnostics();
    diagnostics.recordRequest(RobotCommand.STOP, 5, false);
    diagnostics.recordTransportError(new Error('Port closed'));

    diagnostics.reset();

    const stats = diagnostics.getStats();
    expect(stats.totalRequests).toBe(0);
    expect(stats.transportErrors).toBe(0);
    expect(stats.commandCounts).toEqual({});
    expect(stats.lastError).toBeNull();
  });
});
