// src/function-codes/jog.ts

import { Angle, Coord, Direction, RobotCommand } from '../constants/constants.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { validateByte } from '../utils/utils.js';
import { buildEmptyRequest } from './status.js';

function buildJog(
  genre: RobotCommand.JOG_ANGLE | RobotCommand.JOG_COORD,
  id: number,
  direction: Direction,
  speed: number
): CommandRequest {
  validateByte(id, 'id');
  validateByte(direction, 'direction');
  validateByte(speed, 'speed');
  return { genre, payload: new Uint8Array([id, direction, speed]) };
}

/**
 * Starts moving one joint until {@link buildJogStopRequest} is sent.
 * Payload: `[joint, direction, speed]`
 */
export function buildJogAngleRequest(joint: Angle, direction: Direction, speed: number): CommandRequest {
  return buildJog(RobotCommand.JOG_ANGLE, joint, direction, speed);
}

/**
 * Starts moving along one axis. Unlike `sendCoord`, the axis goes out as its ordinal.
 * Payload: `[axis, direction, speed]`
 */
export function buildJogCoordRequest(axis: Coord, direction: Direction, speed: number): CommandRequest {
  return buildJog(RobotCommand.JOG_COORD, axis, direction, speed);
}

export function buildJogStopRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.JOG_STOP);
}
