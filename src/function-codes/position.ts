// src/function-codes/position.ts

import { POSE_LENGTH, PositionKind, RobotCommand } from '../constants/constants.js';
import { CobotInvalidParameterError } from '../errors.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { coordsToInt, encodeAngle } from '../utils/units.js';
import { int16ArrayToBytesBE } from '../utils/utils.js';
import { validateJointList } from './angles.js';

function withKind(values: Uint8Array, kind: PositionKind): Uint8Array {
  const payload = new Uint8Array(values.length + 1);
  payload.set(values, 0);
  payload[values.length] = kind;
  return payload;
}

/**
 * Asks whether the arm has reached the given joint angles.
 * Payload: six int16 angles, then 0.
 */
export function buildIsInAnglePositionRequest(degrees: readonly number[]): CommandRequest {
  if (degrees.length !== POSE_LENGTH) {
    throw new CobotInvalidParameterError('angles length', degrees.length, `${POSE_LENGTH}`);
  }
  const angles = int16ArrayToBytesBE(degrees.map(encodeAngle));
  return { genre: RobotCommand.IS_IN_POSITION, payload: withKind(angles, PositionKind.Angles) };
}

/**
 * Asks whether the arm has reached the given pose.
 * Payload: mixed-scale int16 pose, then 1.
 */
export function buildIsInCoordPositionRequest(coords: readonly number[]): CommandRequest {
  validateJointList(coords, 'coords');
  const pose = int16ArrayToBytesBE(coordsToInt(coords));
  return { genre: RobotCommand.IS_IN_POSITION, payload: withKind(pose, PositionKind.Coords) };
}
