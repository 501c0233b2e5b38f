// src/function-codes/status.ts

import type { RobotCommand } from '../constants/constants.js';
import { processReceived } from '../framers/frame.js';
import type { CommandRequest } from '../types/cobot-types.js';

/** Scalar result reported when the reply held nothing to decode */
export const NO_DATA = -1;

/**
 * Builds a request that carries no payload.
 */
export function buildEmptyRequest(genre: RobotCommand): CommandRequest {
  return { genre, payload: new Uint8Array(0) };
}

/**
 * Decodes a scalar status reply (0/1 flags, speed, encoder value).
 * @returns the first decoded value, or -1 when nothing could be decoded
 */
export function parseStatusResponse(raw: Uint8Array, genre: RobotCommand): number {
  const [value] = processReceived(raw, genre);
  return value ?? NO_DATA;
}
