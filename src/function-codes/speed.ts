// src/function-codes/speed.ts

import { RobotCommand } from '../constants/constants.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { validateByte } from '../utils/utils.js';
import { buildEmptyRequest } from './status.js';

export function buildGetSpeedRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.GET_SPEED);
}

/**
 * Default speed the controller uses for moves. Payload: `[speed]`
 */
export function buildSetSpeedRequest(speed: number): CommandRequest {
  validateByte(speed, 'speed');
  return { genre: RobotCommand.SET_SPEED, payload: new Uint8Array([speed]) };
}
