// src/function-codes/color.ts

import { RobotCommand } from '../constants/constants.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { validateByte } from '../utils/utils.js';

/**
 * Sets the RGB light on the end of the arm. Payload: `[r, g, b]`
 */
export function buildSetColorRequest(r: number, g: number, b: number): CommandRequest {
  validateByte(r, 'red');
  validateByte(g, 'green');
  validateByte(b, 'blue');
  return { genre: RobotCommand.SET_COLOR, payload: new Uint8Array([r, g, b]) };
}
