// src/function-codes/encoder.ts

import { Angle, RobotCommand } from '../constants/constants.js';
import type { CommandRequest } from '../types/cobot-types.js';
import { int16ToBytesBE, validateByte } from '../utils/utils.js';

/**
 * Payload: `[joint, encoder_hi, encoder_lo]`. The encoder value is sent as a wrapping int16.
 */
export function buildSetEncoderRequest(joint: Angle, encoder: number): CommandRequest {
  validateByte(joint, 'joint id');
  const payload = new Uint8Array(3);
  payload[0] = joint;
  payload.set(int16ToBytesBE(encoder), 1);
  return { genre: RobotCommand.SET_ENCODER, payload };
}

/**
 * Payload: `[joint]`. The reply is decoded with {@link parseStatusResponse}.
 */
export function buildGetEncoderRequest(joint: Angle): CommandRequest {
  validateByte(joint, 'joint id');
  return { genre: RobotCommand.GET_ENCODER, payload: new Uint8Array([joint]) };
}
