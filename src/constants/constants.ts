// src/constants/constants.ts

/**
 * Frame delimiters. Two HEADER bytes open every frame, one FOOTER byte closes it.
 */
export const FRAME_HEADER = 0xfe;
export const FRAME_FOOTER = 0xfa;

/** Bytes a frame carries around its payload: header×2, length, genre, footer */
export const FRAME_OVERHEAD = 5;

/** The length byte counts genre + payload, so a payload can take at most 253 bytes */
export const MAX_PAYLOAD_LENGTH = 0xff - 2;

/** Number of joints on the arm, and of values in a pose vector */
export const POSE_LENGTH = 6;

/**
 * Controller command codes (genres). Fixed by the controller firmware.
 */
export enum RobotCommand {
  VERSION = 0x00,

  POWER_ON = 0x10,
  POWER_OFF = 0x11,
  IS_POWER_ON = 0x12,
  RELEASE_ALL_SERVOS = 0x13,
  IS_CONTROLLER_CONNECTED = 0x14,
  SET_FREE_MODE = 0x1a,
  IS_FREE_MODE = 0x1b,

  GET_ANGLES = 0x20,
  SEND_ANGLE = 0x21,
  SEND_ANGLES = 0x22,
  GET_COORDS = 0x23,
  SEND_COORD = 0x24,
  SEND_COORDS = 0x25,
  PAUSE = 0x26,
  IS_PAUSED = 0x27,
  RESUME = 0x28,
  STOP = 0x29,
  IS_IN_POSITION = 0x2a,
  IS_MOVING = 0x2b,

  JOG_ANGLE = 0x30,
  JOG_COORD = 0x31,
  JOG_STOP = 0x34,
  SET_ENCODER = 0x3a,
  GET_ENCODER = 0x3b,

  GET_SPEED = 0x40,
  SET_SPEED = 0x41,

  IS_SERVO_ENABLE = 0x50,
  IS_ALL_SERVO_ENABLE = 0x51,

  SET_COLOR = 0x6a,
}

/**
 * Returns the catalog name of a genre byte, or undefined for codes the catalog does not know.
 */
export function getCommandName(genre: number): string | undefined {
  return RobotCommand[genre];
}

/**
 * Joint ids. Sent on the wire as their ordinal.
 */
export enum Angle {
  J1 = 1,
  J2 = 2,
  J3 = 3,
  J4 = 4,
  J5 = 5,
  J6 = 6,
}

/**
 * Pose axes. `sendCoord` sends them as ordinal - 1, `jogCoord` as the ordinal.
 */
export enum Coord {
  X = 1,
  Y = 2,
  Z = 3,
  RX = 4,
  RY = 5,
  RZ = 6,
}

export enum Direction {
  Decrease = 0,
  Increase = 1,
}

/** Path mode byte of `sendCoords` */
export enum CoordMode {
  Angular = 0,
  Linear = 1,
}

/** Trailing byte of an `IS_IN_POSITION` request */
export enum PositionKind {
  Angles = 0,
  Coords = 1,
}
