// src/function-codes/version.ts

import { RobotCommand } from '../constants/constants.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { buildEmptyRequest } from './status.js';

/**
 * Строит запрос версии прошивки
 */
export function buildVersionRequest(): CommandRequest {
  return buildEmptyRequest(RobotCommand.VERSION);
}

/**
 * The controller's version reply is read as text, one character per raw byte,
 * with no frame or length check.
 */
export function parseVersionResponse(raw: Uint8Array): string {
  return Array.from(raw, byte => String.fromCharCode(byte)).join('');
}
