import { describe, expect, it } from 'vitest';

import { RobotCommand } from '../constants/constants.js';
import { CobotInvalidParameterError } from '../errors.js';
import {
  buildFrame,
  decodePayload,
  findFrameHeader,
  locateFrame,
  parseFrame,
  processReceived,
} from './frame.js';

describe('buildFrame', () => {
  it('wraps a payload with header, length, genre and footer', () => {
    const frame = buildFrame(RobotCommand.SEND_ANGLE, new Uint8Array([0x01, 0x11, 0x94, 0x32]));
    expect(frame).toEqual(
      new Uint8Array([0xfe, 0xfe, 0x06, 0x21, 0x01, 0x11, 0x94, 0x32, 0xfa])
    );
  });

  it('builds a bare command', () => {
    expect(buildFrame(RobotCommand.GET_ANGLES)).toEqual(
      new Uint8Array([0xfe, 0xfe, 0x02, 0x20, 0xfa])
    );
  });

  it('rejects a payload the length byte cannot describe', () => {
    expect(buildFrame(RobotCommand.SEND_ANGLES, new Uint8Array(253))[2]).toBe(0xff);
    expect(() => buildFrame(RobotCommand.SEND_ANGLES, new Uint8Array(254))).toThrow(
      CobotInvalidParameterError
    );
  });
});

describe('findFrameHeader', () => {
  it('finds the first pair of header bytes anywhere in the buffer', () => {
    expect(findFrameHeader(new Uint8Array([0x01, 0xfe, 0x02, 0xfe, 0xfe]))).toBe(3);
  });

  it('returns -1 without a pair', () => {
    expect(findFrameHeader(new Uint8Array([0xfe, 0x00, 0xfe]))).toBe(-1);
    expect(findFrameHeader(new Uint8Array(0))).toBe(-1);
  });
});

describe('parseFrame', () => {
  const powerReply = [0xfe, 0xfe, 0x03, 0x12, 0x01, 0xfa];

  it('extracts the payload of a matching reply', () => {
    expect(parseFrame(new Uint8Array(powerReply), RobotCommand.IS_POWER_ON)).toEqual(
      new Uint8Array([0x01])
    );
  });

  it('skips leading noise', () => {
    const raw = new Uint8Array([0x00, 0x13, ...powerReply]);
    expect(parseFrame(raw, RobotCommand.IS_POWER_ON)).toEqual(new Uint8Array([0x01]));
  });

  it('returns nothing for a reply to another command', () => {
    expect(parseFrame(new Uint8Array(powerReply), RobotCommand.IS_PAUSED)).toHaveLength(0);
  });

  it('returns nothing when no header is present', () => {
    expect(parseFrame(new Uint8Array([0x00, 0x01]), RobotCommand.IS_POWER_ON)).toHaveLength(0);
  });

  it('returns nothing for truncated frames', () => {
    expect(parseFrame(new Uint8Array([0xfe, 0xfe]), RobotCommand.GET_ANGLES)).toHaveLength(0);
    expect(
      parseFrame(new Uint8Array([0xfe, 0xfe, 0x0e, 0x20, 0x00, 0x00]), RobotCommand.GET_ANGLES)
    ).toHaveLength(0);
  });

  it('returns nothing when the declared length is below 2', () => {
    expect(parseFrame(new Uint8Array([0xfe, 0xfe, 0x01, 0x20]), RobotCommand.GET_ANGLES)).toHaveLength(0);
  });

  it('returns every payload length the length byte can describe', () => {
    for (let length = 0; length <= 253; length++) {
      const payload = Uint8Array.from({ length }, (_, i) => (i * 7) & 0xff);
      expect(parseFrame(buildFrame(RobotCommand.SEND_ANGLES, payload), RobotCommand.SEND_ANGLES)).toEqual(
        payload
      );
    }
  });

  it('gives the same payload whatever noise comes first', () => {
    const payload = new Uint8Array([0, 0x0a, 0xfe, 0xfe, 0x13, 0x88, 0xff, 0x38, 0, 0, 0x01, 0x02]);
    const frame = buildFrame(RobotCommand.GET_ANGLES, payload);
    const noises = [
      [],
      [0x00],
      [0xfe, 0x00],
      [0xfa, 0xfe, 0x20, 0xfe, 0x01],
      [0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff],
      [0x20, 0x02, 0xfa, 0x0e],
    ];

    for (const noise of noises) {
      const raw = new Uint8Array([...noise, ...frame]);
      expect(parseFrame(raw, RobotCommand.GET_ANGLES)).toEqual(payload);
    }
  });

  it('does not look at the footer', () => {
    const raw = new Uint8Array([0xfe, 0xfe, 0x03, 0x12, 0x01]);
    expect(parseFrame(raw, RobotCommand.IS_POWER_ON)).toEqual(new Uint8Array([0x01]));
  });
});

describe('locateFrame', () => {
  it('reports where the frame starts and its genre', () => {
    const located = locateFrame(new Uint8Array([0x07, 0xfe, 0xfe, 0x03, 0x27, 0x00, 0xfa]));
    expect(located).toEqual({ start: 1, genre: 0x27, payload: new Uint8Array([0x00]) });
  });

  it('returns null without a header', () => {
    expect(locateFrame(new Uint8Array([0x01, 0x02, 0x03]))).toBeNull();
  });
});

describe('decodePayload', () => {
  it('decodes twelve bytes as six int16 values', () => {
    const payload = new Uint8Array([0, 0, 0, 0, 0, 0, 0, 0, 0x13, 0x88, 0xff, 0x38]);
    expect(decodePayload(payload, RobotCommand.GET_ANGLES)).toEqual([0, 0, 0, 0, 5000, -200]);
  });

  it('decodes two bytes as one int16', () => {
    expect(decodePayload(new Uint8Array([0xff, 0x38]), RobotCommand.GET_ENCODER)).toEqual([-200]);
  });

  it('decodes only the state byte of a servo reply', () => {
    expect(decodePayload(new Uint8Array([0x03, 0x01]), RobotCommand.IS_SERVO_ENABLE)).toEqual([1]);
    expect(decodePayload(new Uint8Array([0x03, 0xff]), RobotCommand.IS_SERVO_ENABLE)).toEqual([-1]);
  });

  it('decodes the first byte of any other size as int8', () => {
    expect(decodePayload(new Uint8Array([0xff]), RobotCommand.IS_POWER_ON)).toEqual([-1]);
    expect(decodePayload(new Uint8Array([0x05, 0xaa, 0xbb]), RobotCommand.GET_SPEED)).toEqual([5]);
  });

  it('decodes an empty payload to nothing', () => {
    expect(decodePayload(new Uint8Array(0), RobotCommand.IS_POWER_ON)).toEqual([]);
  });
});

describe('processReceived', () => {
  it('finds and decodes an angle reply', () => {
    const raw = new Uint8Array([
      0xfe, 0xfe, 0x0e, 0x20, 0, 0, 0, 0, 0, 0, 0, 0, 0x13, 0x88, 0, 0, 0xfa,
    ]);
    expect(processReceived(raw, RobotCommand.GET_ANGLES)).toEqual([0, 0, 0, 0, 5000, 0]);
  });

  it('decodes an echoed request to nothing', () => {
    const raw = buildFrame(RobotCommand.IS_POWER_ON);
    expect(processReceived(raw, RobotCommand.IS_POWER_ON)).toEqual([]);
  });
});
