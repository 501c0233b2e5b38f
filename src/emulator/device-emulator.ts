// src/emulator/device-emulator.ts

import { POSE_LENGTH, RobotCommand, getCommandName } from '../constants/constants.js';
import { CobotInvalidParameterError } from '../errors.js';
import { buildFrame, locateFrame } from '../framers/frame.js';
import Logger from '../logger.js';
import type {
  ActiveJog,
  Connection,
  DeviceEmulatorOptions,
  DeviceState,
  LedColor,
  LoggerInstance,
} from '../types/cobot-types.js';
import {
  ANGLE_SCALE,
  COORD_AXES,
  COORD_SCALE,
  coordsToInt,
  decodeAngle,
  encodeAngle,
  intToCoords,
} from '../utils/units.js';
import {
  bytesToInt16ArrayBE,
  bytesToInt16BE,
  concatUint8Arrays,
  int16ArrayToBytesBE,
  int16ToBytesBE,
  toHex,
  toInt16,
} from '../utils/utils.js';

const DEFAULT_ENCODER = 2048;
const DEFAULT_SPEED = 50;
const DEFAULT_VERSION = 'CobotEmu 1.0';

function checkPose(values: number[] | undefined, name: string): number[] {
  if (values === undefined) return new Array<number>(POSE_LENGTH).fill(0);
  if (values.length !== POSE_LENGTH) {
    throw new CobotInvalidParameterError(`${name} length`, values.length, `${POSE_LENGTH}`);
  }
  return [...values];
}

function flag(value: boolean): Uint8Array {
  return new Uint8Array([value ? 1 : 0]);
}

/**
 * In-process stand-in for the arm controller. Answers framed commands the way
 * the firmware does and keeps enough state for queries to reflect earlier moves.
 * Moves complete instantly.
 */
class DeviceEmulator implements Connection {
  private poweredOn: boolean = true;
  private paused: boolean = false;
  private freeMode: boolean = false;
  private servosEnabled: boolean = true;
  private speed: number;
  // Poses are held in wire units, as received
  private angles: number[];
  private coords: number[];
  private encoders: number[] = new Array<number>(POSE_LENGTH).fill(DEFAULT_ENCODER);
  private color: LedColor = { r: 0, g: 0, b: 0 };
  private jog: ActiveJog | null = null;
  private version: string;

  private replyNoise: Uint8Array = new Uint8Array(0);
  private crossTalkGenre: number | null = null;
  private transportError: Error | null = null;
  private receivedFrames: Uint8Array[] = [];

  private loggerEnabled: boolean;
  private logger: LoggerInstance;

  constructor(options: DeviceEmulatorOptions = {}) {
    this.angles = checkPose(options.angles, 'angles').map(encodeAngle);
    this.coords = coordsToInt(checkPose(options.coords, 'coords'));
    this.version = options.version ?? DEFAULT_VERSION;
    this.speed = options.speed ?? DEFAULT_SPEED;

    this.loggerEnabled = !!options.loggerEnabled;
    const loggerInstance = new Logger();
    this.logger = loggerInstance.createLogger('DeviceEmulator');
    this.logger.setLevel(this.loggerEnabled ? 'info' : 'error');
  }

  enableLogger(): void {
    if (!this.loggerEnabled) {
      this.loggerEnabled = true;
      this.logger.setLevel('info');
    }
  }

  disableLogger(): void {
    if (this.loggerEnabled) {
      this.loggerEnabled = false;
      this.logger.setLevel('error');
    }
  }

  // !=============================================================================
  // ! Test hooks
  // !=============================================================================

  /** Bytes put in front of every reply, as line noise would be */
  setReplyNoise(noise: Uint8Array): void {
    this.replyNoise = new Uint8Array(noise);
  }

  /**
   * Frames every reply with `genre` instead of the genre asked for.
   * `null` restores normal replies.
   */
  setCrossTalk(genre: number | null): void {
    this.crossTalkGenre = genre;
  }

  /** Makes every write fail with `error` until cleared with `null` */
  setTransportError(error: Error | null): void {
    this.transportError = error;
  }

  getReceivedFrames(): Uint8Array[] {
    return this.receivedFrames.map(frame => new Uint8Array(frame));
  }

  clearReceivedFrames(): void {
    this.receivedFrames = [];
  }

  getState(): DeviceState {
    return {
      poweredOn: this.poweredOn,
      paused: this.paused,
      freeMode: this.freeMode,
      servosEnabled: this.servosEnabled,
      speed: this.speed,
      angles: this.angles.map(decodeAngle),
      coords: intToCoords(this.coords),
      encoders: [...this.encoders],
      color: { ...this.color },
      jog: this.jog ? { ...this.jog } : null,
    };
  }

  // !=============================================================================
  // ! Connection
  // !=============================================================================

  async write(buffer: Uint8Array): Promise<void> {
    if (this.transportError) throw this.transportError;
    this.handleRequest(buffer);
  }

  async writeAndRead(buffer: Uint8Array): Promise<Uint8Array> {
    if (this.transportError) throw this.transportError;
    return this.handleRequest(buffer) ?? new Uint8Array(0);
  }

  /**
   * Processes one request frame.
   * @returns the bytes the controller would send back, or null when it stays silent
   */
  handleRequest(buffer: Uint8Array): Uint8Array | null {
    const frame = locateFrame(buffer);
    if (!frame) {
      this.logger.warn('Request without a valid frame ignored', { frame: toHex(buffer, ' ') });
      return null;
    }
    this.receivedFrames.push(new Uint8Array(buffer));

    this.logger.info('Request received', {
      genre: frame.genre,
      data: toHex(frame.payload, ' '),
    });

    const reply = this._processCommand(frame.genre, frame.payload);
    if (reply === null) return null;
    if (this.replyNoise.length === 0) return reply;
    return concatUint8Arrays([this.replyNoise, reply]);
  }

  private _reply(genre: number, payload: Uint8Array): Uint8Array {
    return buildFrame(this.crossTalkGenre ?? genre, payload);
  }

  private _canMove(genre: number): boolean {
    if (this.poweredOn && !this.paused) return true;
    this.logger.info('Move ignored', {
      genre,
      poweredOn: this.poweredOn,
      paused: this.paused,
    });
    return false;
  }

  private _processCommand(genre: number, payload: Uint8Array): Uint8Array | null {
    switch (genre) {
      case RobotCommand.VERSION:
        // Answered as bare text, not framed
        return new Uint8Array(Array.from(this.version, ch => ch.charCodeAt(0) & 0xff));

      case RobotCommand.POWER_ON:
        this.poweredOn = true;
        this.servosEnabled = true;
        return null;
      case RobotCommand.POWER_OFF:
        this.poweredOn = false;
        this.jog = null;
        return null;
      case RobotCommand.IS_POWER_ON:
        return this._reply(genre, flag(this.poweredOn));
      case RobotCommand.RELEASE_ALL_SERVOS:
        this.servosEnabled = false;
        return null;
      case RobotCommand.IS_CONTROLLER_CONNECTED:
        return this._reply(genre, flag(true));
      case RobotCommand.SET_FREE_MODE:
        this.freeMode = payload[0] === 1;
        return null;
      case RobotCommand.IS_FREE_MODE:
        return this._reply(genre, flag(this.freeMode));

      case RobotCommand.GET_ANGLES:
        return this._reply(genre, int16ArrayToBytesBE(this.angles));
      case RobotCommand.SEND_ANGLE:
        this._sendAngle(genre, payload);
        return null;
      case RobotCommand.SEND_ANGLES:
        this._sendAngles(genre, payload);
        return null;

      case RobotCommand.GET_COORDS:
        return this._reply(genre, int16ArrayToBytesBE(this.coords));
      case RobotCommand.SEND_COORD:
        this._sendCoord(genre, payload);
        return null;
      case RobotCommand.SEND_COORDS:
        this._sendCoords(genre, payload);
        return null;

      case RobotCommand.PAUSE:
        this.paused = true;
        return null;
      case RobotCommand.IS_PAUSED:
        return this._reply(genre, flag(this.paused));
      case RobotCommand.RESUME:
        this.paused = false;
        return null;
      case RobotCommand.STOP:
        this.jog = null;
        return null;
      case RobotCommand.IS_IN_POSITION:
        return this._reply(genre, flag(this._isInPosition(payload)));
      case RobotCommand.IS_MOVING:
        return this._reply(genre, flag(this.jog !== null));

      case RobotCommand.JOG_ANGLE:
      case RobotCommand.JOG_COORD:
        this._startJog(genre, payload);
        return null;
      case RobotCommand.JOG_STOP:
        this.jog = null;
        return null;

      case RobotCommand.SET_ENCODER: {
        const index = (payload[0] ?? 0) - 1;
        if (payload.length >= 3 && index >= 0 && index < POSE_LENGTH) {
          this.encoders[index] = bytesToInt16BE(payload, 1);
        }
        return null;
      }
      case RobotCommand.GET_ENCODER: {
        const encoder = this.encoders[(payload[0] ?? 0) - 1];
        return encoder === undefined ? null : this._reply(genre, int16ToBytesBE(encoder));
      }

      case RobotCommand.GET_SPEED:
        return this._reply(genre, new Uint8Array([this.speed]));
      case RobotCommand.SET_SPEED:
        this.speed = payload[0] ?? this.speed;
        return null;

      case RobotCommand.IS_SERVO_ENABLE: {
        const id = payload[0] ?? 0;
        return this._reply(genre, new Uint8Array([id, this.servosEnabled ? 1 : 0]));
      }
      case RobotCommand.IS_ALL_SERVO_ENABLE:
        return this._reply(genre, flag(this.servosEnabled));

      case RobotCommand.SET_COLOR: {
        const [r = 0, g = 0, b = 0] = payload;
        this.color = { r, g, b };
        return null;
      }

      default:
        this.logger.warn('Unsupported command', { genre, name: getCommandName(genre) ?? null });
        return null;
    }
  }

  private _sendAngle(genre: number, payload: Uint8Array): void {
    const index = (payload[0] ?? 0) - 1;
    if (payload.length < 4 || index < 0 || index >= POSE_LENGTH) return;
    if (!this._canMove(genre)) return;
    this.angles[index] = bytesToInt16BE(payload, 1);
  }

  private _sendAngles(genre: number, payload: Uint8Array): void {
    if (!this._canMove(genre)) return;
    // Trailing byte is the speed
    const values = bytesToInt16ArrayBE(payload.subarray(0, payload.length - 1));
    values.slice(0, POSE_LENGTH).forEach((value, i) => {
      this.angles[i] = value;
    });
  }

  private _sendCoord(genre: number, payload: Uint8Array): void {
    const index = payload[0] ?? POSE_LENGTH;
    if (payload.length < 4 || index >= POSE_LENGTH) return;
    if (!this._canMove(genre)) return;
    // A single axis always travels in coordinate units, rotations included
    const value = bytesToInt16BE(payload, 1);
    this.coords[index] =
      index < COORD_AXES ? value : toInt16((value * ANGLE_SCALE) / COORD_SCALE);
  }

  private _sendCoords(genre: number, payload: Uint8Array): void {
    if (!this._canMove(genre)) return;
    // Trailing bytes are speed and mode
    const values = bytesToInt16ArrayBE(payload.subarray(0, payload.length - 2));
    values.slice(0, POSE_LENGTH).forEach((value, i) => {
      this.coords[i] = value;
    });
  }

  private _isInPosition(payload: Uint8Array): boolean {
    const kind = payload[payload.length - 1];
    const target = bytesToInt16ArrayBE(payload.subarray(0, payload.length - 1));
    const current = kind === 1 ? this.coords : this.angles;
    if (target.length === 0) return false;
    return target.every((value, i) => current[i] === value);
  }

  private _startJog(genre: number, payload: Uint8Array): void {
    const [id, direction, speed] = payload;
    if (id === undefined || direction === undefined || speed === undefined) return;
    if (!this._canMove(genre)) return;
    this.jog = {
      kind: genre === RobotCommand.JOG_ANGLE ? 'angle' : 'coord',
      id,
      direction,
      speed,
    };
  }
}

export default DeviceEmulator;
