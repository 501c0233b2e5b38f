// src/index.ts

export { default as CobotOperator } from './operator.js';
export { default as SerialConnection } from './transport/node-serialport.js';
export { default as DeviceEmulator } from './emulator/device-emulator.js';
export { default as Logger } from './logger.js';
export { Diagnostics } from './utils/diagnostics.js';

export {
  Angle,
  Coord,
  CoordMode,
  Direction,
  FRAME_FOOTER,
  FRAME_HEADER,
  POSE_LENGTH,
  PositionKind,
  RobotCommand,
  getCommandName,
} from './constants/constants.js';

export {
  buildFrame,
  decodePayload,
  locateFrame,
  parseFrame,
  processReceived,
} from './framers/frame.js';
export type { LocatedFrame } from './framers/frame.js';

export {
  ANGLE_SCALE,
  COORD_SCALE,
  coordsToInt,
  decodeAngle,
  decodeCoord,
  encodeAngle,
  encodeCoord,
  intToCoords,
} from './utils/units.js';

export * from './errors.js';
export type * from './types/cobot-types.js';
