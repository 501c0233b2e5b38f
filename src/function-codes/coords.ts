// src/function-codes/coords.ts

import { Coord, CoordMode, RobotCommand } from '../constants/constants.js';
import { processReceived } from '../framers/frame.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { coordsToInt, encodeCoord, intToCoords } from '../utils/units.js';
import { int16ArrayToBytesBE, validateByte } from '../utils/utils.js';
import { validateJointList } from './angles.js';
import { buildEmptyRequest } from './status.js';

const SEND_COORD_SIZE = 4;

export function buildGetCoordsRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.GET_COORDS);
}

/**
 * Разбирает ответ с координатами
 * @returns [x, y, z] in mm then [rx, ry, rz] in degrees, or [] when no pose frame was found
 */
export function parseGetCoordsResponse(raw: Uint8Array): number[] {
  return intToCoords(processReceived(raw, RobotCommand.GET_COORDS));
}

/**
 * Payload: `[axis - 1, value_hi, value_lo, speed]`.
 * The value is always scaled as a coordinate (×10), whichever axis is addressed.
 */
export function buildSendCoordRequest(axis: Coord, value: number, speed: number): CommandRequest {
  validateByte(axis - 1, 'axis id');
  validateByte(speed, 'speed');

  const buffer = new ArrayBuffer(SEND_COORD_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, axis - 1);
  view.setInt16(1, encodeCoord(value), false);
  view.setUint8(3, speed);

  return { genre: RobotCommand.SEND_COORD, payload: new Uint8Array(buffer) };
}

/**
 * Payload: the pose as mixed-scale int16 values, then speed and mode bytes.
 */
export function buildSendCoordsRequest(
  coords: readonly number[],
  speed: number,
  mode: CoordMode
): CommandRequest {
  validateJointList(coords, 'coords');
  validateByte(speed, 'speed');
  validateByte(mode, 'mode');

  const pose = int16ArrayToBytesBE(coordsToInt(coords));
  const payload = new Uint8Array(pose.length + 2);
  payload.set(pose, 0);
  payload[pose.length] = speed;
  payload[pose.length + 1] = mode;

  return { genre: RobotCommand.SEND_COORDS, payload };
}
