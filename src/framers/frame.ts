// src/framers/frame.ts

import {
  FRAME_FOOTER,
  FRAME_HEADER,
  FRAME_OVERHEAD,
  MAX_PAYLOAD_LENGTH,
  RobotCommand,
} from '../constants/constants.js';
import { CobotInvalidParameterError } from '../errors.js';
import { byteToInt8, bytesToInt16ArrayBE, bytesToInt16BE } from '../utils/utils.js';

/** Payload size of a six-value pose or angle reply */
const VECTOR_PAYLOAD_SIZE = 12;
const SHORT_PAYLOAD_SIZE = 2;

const LENGTH_OFFSET = 2;
const GENRE_OFFSET = 3;
const PAYLOAD_OFFSET = 4;

export interface LocatedFrame {
  /** Index of the first header byte within the raw buffer */
  start: number;
  genre: number;
  payload: Uint8Array;
}

/**
 * Wraps a payload into a request frame:
 * `[HEADER, HEADER, payload.length + 2, genre, ...payload, FOOTER]`
 * FOOTER (0xFA) is its own byte, not a repeat of the 0xFE header; replies are
 * accepted whatever their last byte is.
 * @throws CobotInvalidParameterError if the payload does not fit the length byte
 */
export function buildFrame(genre: number, payload: Uint8Array = new Uint8Array(0)): Uint8Array {
  if (payload.length > MAX_PAYLOAD_LENGTH) {
    throw new CobotInvalidParameterError(
      'payload length',
      payload.length,
      `at most ${MAX_PAYLOAD_LENGTH} bytes`
    );
  }

  const frame = new Uint8Array(payload.length + FRAME_OVERHEAD);
  frame[0] = FRAME_HEADER;
  frame[1] = FRAME_HEADER;
  frame[LENGTH_OFFSET] = payload.length + 2;
  frame[GENRE_OFFSET] = genre;
  frame.set(payload, PAYLOAD_OFFSET);
  frame[frame.length - 1] = FRAME_FOOTER;
  return frame;
}

/**
 * Index of the first pair of consecutive header bytes, or -1.
 * The search is not anchored at 0, so leading line noise is skipped.
 */
export function findFrameHeader(raw: Uint8Array): number {
  for (let i = 0; i + 1 < raw.length; i++) {
    if (raw[i] === FRAME_HEADER && raw[i + 1] === FRAME_HEADER) {
      return i;
    }
  }
  return -1;
}

/**
 * Finds the first frame in a raw buffer regardless of its genre.
 * The footer is not checked. Returns null when no header pair is found or the frame is cut short.
 */
export function locateFrame(raw: Uint8Array): LocatedFrame | null {
  const start = findFrameHeader(raw);
  if (start < 0) return null;

  const declaredLength = raw[start + LENGTH_OFFSET];
  const genre = raw[start + GENRE_OFFSET];
  if (declaredLength === undefined || genre === undefined || declaredLength < 2) {
    return null;
  }

  const payloadStart = start + PAYLOAD_OFFSET;
  const payloadEnd = payloadStart + declaredLength - 2;
  if (payloadEnd > raw.length) return null;

  return { start, genre, payload: raw.slice(payloadStart, payloadEnd) };
}

/**
 * Extracts the payload of the first frame in `raw` if it answers `expectedGenre`.
 * A missing header, a reply to another command or a truncated frame all give an empty payload.
 */
export function parseFrame(raw: Uint8Array, expectedGenre: number): Uint8Array {
  const frame = locateFrame(raw);
  if (!frame || frame.genre !== expectedGenre) {
    return new Uint8Array(0);
  }
  return frame.payload;
}

/**
 * Decodes a reply payload by its size:
 * - 12 bytes: six int16 (pose or angle vector)
 * - 2 bytes: one int16, except servo state replies where only byte 1 counts, as int8
 * - any other size: byte 0 as int8
 * An empty payload decodes to an empty list.
 */
export function decodePayload(payload: Uint8Array, genre: number): number[] {
  if (payload.length === 0) return [];

  switch (payload.length) {
    case VECTOR_PAYLOAD_SIZE:
      return bytesToInt16ArrayBE(payload);
    case SHORT_PAYLOAD_SIZE:
      return genre === RobotCommand.IS_SERVO_ENABLE
        ? [byteToInt8(payload, 1)]
        : [bytesToInt16BE(payload)];
    default:
      return [byteToInt8(payload)];
  }
}

/**
 * Locates the reply frame for `genre` in raw transport bytes and decodes its payload.
 */
export function processReceived(raw: Uint8Array, genre: number): number[] {
  return decodePayload(parseFrame(raw, genre), genre);
}
