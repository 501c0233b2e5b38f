// src/function-codes/servo.ts

import { Angle, RobotCommand } from '../constants/constants.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { validateByte } from '../utils/utils.js';
import { buildEmptyRequest } from './status.js';

/**
 * Payload: `[joint]`. The controller answers `[joint, state]`; only the state byte is decoded.
 */
export function buildIsServoEnabledRequest(joint: Angle): CommandRequest {
  validateByte(joint, 'joint id');
  return { genre: RobotCommand.IS_SERVO_ENABLE, payload: new Uint8Array([joint]) };
}

export function buildIsAllServoEnabledRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.IS_ALL_SERVO_ENABLE);
}
