// src/function-codes/motion.ts

import { RobotCommand } from '../constants/constants.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { buildEmptyRequest } from './status.js';

export function buildPauseRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.PAUSE);
}

export function buildIsPausedRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.IS_PAUSED);
}

export function buildResumeRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.RESUME);
}

export function buildStopRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.STOP);
}

export function buildIsMovingRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.IS_MOVING);
}
