// src/function-codes/power.ts

import { RobotCommand } from '../constants/constants.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { buildEmptyRequest } from './status.js';

export function buildPowerOnRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.POWER_ON);
}

export function buildPowerOffRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.POWER_OFF);
}

export function buildIsPowerOnRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.IS_POWER_ON);
}

/**
 * Relaxes every joint so the arm can be moved by hand.
 */
export function buildReleaseAllServosRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.RELEASE_ALL_SERVOS);
}

export function buildIsControllerConnectedRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.IS_CONTROLLER_CONNECTED);
}

/**
 * @param enabled - free (hand-guiding) mode on or off
 */
export function buildSetFreeModeRequest(enabled: boolean): CommandRequest {
  return { genre: RobotCommand.SET_FREE_MODE, payload: new Uint8Array([enabled ? 1 : 0]) };
}

export function buildIsFreeModeRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.IS_FREE_MODE);
}
