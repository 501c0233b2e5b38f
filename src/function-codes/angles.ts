// src/function-codes/angles.ts

import { Angle, POSE_LENGTH, RobotCommand } from '../constants/constants.js';
import { CobotInvalidParameterError } from '../errors.js';
import { processReceived } from '../framers/frame.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { decodeAngle, encodeAngle } from '../utils/units.js';
import { int16ArrayToBytesBE, validateByte } from '../utils/utils.js';
import { buildEmptyRequest } from './status.js';

const SEND_ANGLE_SIZE = 4;

/**
 * Checks a list of joint values: 1 to 6 entries.
 * @throws CobotInvalidParameterError
 */
export function validateJointList(values: readonly number[], name: string): void {
  if (values.length < 1 || values.length > POSE_LENGTH) {
    throw new CobotInvalidParameterError(
      `${name} length`,
      values.length,
      `between 1 and ${POSE_LENGTH}`
    );
  }
}

export function buildGetAnglesRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.GET_ANGLES);
}

/**
 * Разбирает ответ с углами суставов
 * @returns six angles in degrees, or [] when the reply held no angle frame
 */
export function parseGetAnglesResponse(raw: Uint8Array): number[] {
  return processReceived(raw, RobotCommand.GET_ANGLES).map(decodeAngle);
}

/**
 * Payload: `[joint, angle_hi, angle_lo, speed]`
 * @param joint - joint id (1-6)
 * @param degree - target angle, sent in 0.01° units
 * @param speed - 0-255
 */
export function buildSendAngleRequest(joint: Angle, degree: number, speed: number): CommandRequest {
  validateByte(joint, 'joint id');
  validateByte(speed, 'speed');

  const buffer = new ArrayBuffer(SEND_ANGLE_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, joint);
  view.setInt16(1, encodeAngle(degree), false); // Big-endian
  view.setUint8(3, speed);

  return { genre: RobotCommand.SEND_ANGLE, payload: new Uint8Array(buffer) };
}

/**
 * Payload: one int16 per angle followed by the speed byte.
 */
export function buildSendAnglesRequest(degrees: readonly number[], speed: number): CommandRequest {
  validateJointList(degrees, 'angles');
  validateByte(speed, 'speed');

  const angles = int16ArrayToBytesBE(degrees.map(encodeAngle));
  const payload = new Uint8Array(angles.length + 1);
  payload.set(angles, 0);
  payload[angles.length] = speed;

  return { genre: RobotCommand.SEND_ANGLES, payload };
}
