import { describe, expect, it } from 'vitest';

import {
  coordsToInt,
  decodeAngle,
  decodeCoord,
  encodeAngle,
  encodeCoord,
  intToCoords,
} from './units.js';
import { toInt16 } from './utils.js';

describe('toInt16', () => {
  it('keeps values inside the int16 range', () => {
    expect(toInt16(32767)).toBe(32767);
    expect(toInt16(-32768)).toBe(-32768);
    expect(toInt16(0)).toBe(0);
  });

  it('truncates toward zero', () => {
    expect(toInt16(1.9)).toBe(1);
    expect(toInt16(-1.9)).toBe(-1);
  });

  it('wraps on overflow', () => {
    expect(toInt16(32768)).toBe(-32768);
    expect(toInt16(-32769)).toBe(32767);
    expect(toInt16(65536)).toBe(0);
  });

  it('maps non-finite input to 0', () => {
    expect(toInt16(Number.NaN)).toBe(0);
    expect(toInt16(Number.POSITIVE_INFINITY)).toBe(0);
    expect(toInt16(Number.NEGATIVE_INFINITY)).toBe(0);
  });
});

describe('angle and coordinate scaling', () => {
  it('encodes degrees in hundredths', () => {
    expect(encodeAngle(45)).toBe(4500);
    expect(encodeAngle(-12.345)).toBe(-1234);
  });

  it('encodes millimetres in tenths', () => {
    expect(encodeCoord(100.5)).toBe(1005);
    expect(encodeCoord(-20)).toBe(-200);
  });

  it('wraps values that do not fit 16 bits', () => {
    expect(encodeAngle(1234.567)).toBe(-7616);
    expect(encodeCoord(4000)).toBe(-25536);
  });

  it('decodes back to physical units', () => {
    expect(decodeAngle(5000)).toBe(50);
    expect(decodeAngle(-2050)).toBe(-20.5);
    expect(decodeCoord(1005)).toBe(100.5);
  });
});

describe('pose vectors', () => {
  const pose = [100.5, -20, 300, 90, -45.5, 0];
  const wire = [1005, -200, 3000, 9000, -4550, 0];

  it('scales x, y, z by 10 and rotations by 100', () => {
    expect(coordsToInt(pose)).toEqual(wire);
  });

  it('inverts the scaling by index', () => {
    expect(intToCoords(wire)).toEqual(pose);
  });

  it('treats a short vector by the same index rule', () => {
    expect(coordsToInt([1, 2, 3, 4])).toEqual([10, 20, 30, 400]);
    expect(intToCoords([])).toEqual([]);
  });
});

describe('codec accuracy', () => {
  it('decodes any degree value to within 0.01°', () => {
    for (let d = -327.67; d <= 327.67; d += 0.173) {
      expect(Math.abs(decodeAngle(encodeAngle(d)) - d)).toBeLessThan(0.01);
    }
  });

  it('decodes any millimetre value to within 0.1 mm', () => {
    for (let m = -3276.7; m <= 3276.7; m += 1.37) {
      expect(Math.abs(decodeCoord(encodeCoord(m)) - m)).toBeLessThan(0.1);
    }
  });

  it('re-encodes every wire value it decodes', () => {
    for (let value = -32768; value <= 32767; value++) {
      expect(encodeAngle(decodeAngle(value))).toBe(value);
      expect(encodeCoord(decodeCoord(value))).toBe(value);
    }
  });

  it('round-trips poses through the index rule', () => {
    for (let step = 0; step < 200; step++) {
      const wire = [
        step * 163 - 16000,
        -step * 97,
        step * 29 + 7,
        step * 131 - 13000,
        -step * 151 + 15000,
        step,
      ];
      const pose = intToCoords(wire);
      expect(coordsToInt(pose)).toEqual(wire);
      expect(intToCoords(coordsToInt(pose))).toEqual(pose);
    }
  });
});
