// src/operator.ts

import { Mutex } from 'async-mutex';

import { Angle, Coord, CoordMode, Direction, RobotCommand } from './constants/constants.js';
import { buildFrame, parseFrame } from './framers/frame.js';
import {
  buildGetAnglesRequest,
  buildSendAngleRequest,
  buildSendAnglesRequest,
  parseGetAnglesResponse,
} from './function-codes/angles.js';
import { buildSetColorRequest } from './function-codes/color.js';
import {
  buildGetCoordsRequest,
  buildSendCoordRequest,
  buildSendCoordsRequest,
  parseGetCoordsResponse,
} from './function-codes/coords.js';
import { buildGetEncoderRequest, buildSetEncoderRequest } from './function-codes/encoder.js';
import {
  buildJogAngleRequest,
  buildJogCoordRequest,
  buildJogStopRequest,
} from './function-codes/jog.js';
import {
  buildIsMovingRequest,
  buildIsPausedRequest,
  buildPauseRequest,
  buildResumeRequest,
  buildStopRequest,
} from './function-codes/motion.js';
import {
  buildIsInAnglePositionRequest,
  buildIsInCoordPositionRequest,
} from './function-codes/position.js';
import {
  buildIsControllerConnectedRequest,
  buildIsFreeModeRequest,
  buildIsPowerOnRequest,
  buildPowerOffRequest,
  buildPowerOnRequest,
  buildReleaseAllServosRequest,
  buildSetFreeModeRequest,
} from './function-codes/power.js';
import { buildGetSpeedRequest, buildSetSpeedRequest } from './function-codes/speed.js';
import {
  buildIsAllServoEnabledRequest,
  buildIsServoEnabledRequest,
} from './function-codes/servo.js';
import { parseStatusResponse } from './function-codes/status.js';
import { buildVersionRequest, parseVersionResponse } from './function-codes/version.js';
import Logger from './logger.js';
import type {
  CommandRequest,
  Connection,
  DiagnosticsStats,
  LogContext,
  LogLevel,
  OperatorOptions,
} from './types/cobot-types.js';
import { Diagnostics } from './utils/diagnostics.js';
import { toHex } from './utils/utils.js';

const logger = new Logger();
logger.setLevel('error');

const DEFAULT_POLL_INTERVAL_MS = 100;

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * High-level API of the arm controller. Every call is one framed command over
 * the owned {@link Connection}; calls are serialised so that a write-then-read
 * never interleaves with another command.
 *
 * Queries never fail on a bad reply: a missing, truncated or foreign frame
 * yields `-1` for scalar queries and `[]` for vector queries. Transport errors
 * are rethrown as they are.
 */
class CobotOperator<T extends Connection = Connection> {
  private readonly _connection: T;
  private pollIntervalMs: number;
  private diagnosticsEnabled: boolean;
  private diagnostics: Diagnostics;
  private _mutex: Mutex;

  constructor(connection: T, options: OperatorOptions = {}) {
    this._connection = connection;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.diagnosticsEnabled = !!options.diagnostics;
    this.diagnostics = new Diagnostics({ loggerName: 'CobotOperator' });
    this._mutex = new Mutex();

    if (options.logLevel) {
      logger.setLevel(options.logLevel);
    }
  }

  /** The connection this operator drives */
  get connection(): T {
    return this._connection;
  }

  /**
   * Enables the CobotOperator logger
   * @param level - Logging level
   */
  enableLogger(level: LogLevel = 'info'): void {
    logger.setLevel(level);
  }

  /**
   * Disables the CobotOperator logger (sets the highest level - error)
   */
  disableLogger(): void {
    logger.setLevel('error');
  }

  /**
   * Adds fields (port name, arm label...) to every log line of the operator.
   */
  setLoggerContext(context: LogContext): void {
    logger.addGlobalContext(context);
  }

  getDiagnostics(): DiagnosticsStats {
    return this.diagnostics.getStats();
  }

  resetDiagnostics(): void {
    this.diagnostics.reset();
  }

  // !=============================================================================
  // ! Transactions
  // !=============================================================================

  private _handleTransportError(genre: RobotCommand, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    if (this.diagnosticsEnabled) this.diagnostics.recordTransportError(err);
    logger.warn('Transport error', { genre, error: message });
  }

  /**
   * Sends a command that the controller does not answer.
   */
  private async _send(request: CommandRequest): Promise<void> {
    const frame = buildFrame(request.genre, request.payload);
    const release = await this._mutex.acquire();
    try {
      logger.debug('Sending command', { genre: request.genre, frame: toHex(frame, ' ') });
      if (this.diagnosticsEnabled) {
        this.diagnostics.recordRequest(request.genre, frame.length, false);
      }
      await this._connection.write(frame);
    } catch (err: unknown) {
      this._handleTransportError(request.genre, err);
      throw err;
    } finally {
      release();
    }
  }

  /**
   * Sends a command and returns the raw bytes of the reply window.
   */
  private async _transaction(request: CommandRequest): Promise<Uint8Array> {
    const frame = buildFrame(request.genre, request.payload);
    const release = await this._mutex.acquire();
    try {
      logger.debug('Sending query', { genre: request.genre, frame: toHex(frame, ' ') });
      if (this.diagnosticsEnabled) {
        this.diagnostics.recordRequest(request.genre, frame.length, true);
      }

      const startTime = Date.now();
      const raw = await this._connection.writeAndRead(frame);
      const responseTime = Date.now() - startTime;

      if (this.diagnosticsEnabled) this.diagnostics.recordReply(raw.length, responseTime);
      logger.debug('Reply received', {
        genre: request.genre,
        bytes: raw.length,
        responseTime,
        frame: toHex(raw, ' '),
      });
      return raw;
    } catch (err: unknown) {
      this._handleTransportError(request.genre, err);
      throw err;
    } finally {
      release();
    }
  }

  /**
   * Records whether the reply carried a frame for the command sent.
   */
  private _trackDecode(genre: RobotCommand, raw: Uint8Array): void {
    if (parseFrame(raw, genre).length > 0) {
      if (this.diagnosticsEnabled) this.diagnostics.recordDecoded();
      return;
    }
    logger.debug('Reply holds no frame for the command', { genre, bytes: raw.length });
    if (this.diagnosticsEnabled) this.diagnostics.recordEmptyDecode(genre);
  }

  private async _queryStatus(request: CommandRequest): Promise<number> {
    const raw = await this._transaction(request);
    this._trackDecode(request.genre, raw);
    return parseStatusResponse(raw, request.genre);
  }

  /**
   * Polls `check` until it reports 1 or the timeout passes.
   * @returns whether the target was reached
   */
  private async _waitFor(check: () => Promise<number>, timeoutSec: number): Promise<boolean> {
    const deadline = Date.now() + timeoutSec * 1000;
    while (Date.now() < deadline) {
      if ((await check()) === 1) return true;
      await sleep(this.pollIntervalMs);
    }
    logger.info('Target position not confirmed before timeout', { timeoutSec });
    return false;
  }

  // !=============================================================================
  // ! System & power
  // !=============================================================================

  /**
   * Firmware version. The reply window is turned into text byte for byte,
   * without looking for a frame.
   */
  async version(): Promise<string> {
    const raw = await this._transaction(buildVersionRequest());
    return parseVersionResponse(raw);
  }

  async powerOn(): Promise<void> {
    await this._send(buildPowerOnRequest());
  }

  async powerOff(): Promise<void> {
    await this._send(buildPowerOffRequest());
  }

  /** 1 powered, 0 not, -1 no answer */
  async isPowerOn(): Promise<number> {
    return this._queryStatus(buildIsPowerOnRequest());
  }

  async releaseAllServos(): Promise<void> {
    await this._send(buildReleaseAllServosRequest());
  }

  async isControllerConnected(): Promise<number> {
    return this._queryStatus(buildIsControllerConnectedRequest());
  }

  async setFreeMode(enabled: boolean): Promise<void> {
    await this._send(buildSetFreeModeRequest(enabled));
  }

  async isFreeMode(): Promise<number> {
    return this._queryStatus(buildIsFreeModeRequest());
  }

  // !=============================================================================
  // ! Angles
  // !=============================================================================

  /**
   * Current joint angles in degrees, J1 first. Empty when the controller did not answer.
   */
  async getAngles(): Promise<number[]> {
    const raw = await this._transaction(buildGetAnglesRequest());
    this._trackDecode(RobotCommand.GET_ANGLES, raw);
    return parseGetAnglesResponse(raw);
  }

  async sendAngle(id: Angle, degree: number, speed: number): Promise<void> {
    await this._send(buildSendAngleRequest(id, degree, speed));
  }

  async sendAngles(degrees: readonly number[], speed: number): Promise<void> {
    await this._send(buildSendAnglesRequest(degrees, speed));
  }

  /**
   * Sends the angles, then waits until the controller reports the arm in position.
   * Resolves normally when `timeoutSec` passes first.
   */
  async syncSendAngles(degrees: readonly number[], speed: number, timeoutSec: number): Promise<void> {
    // Built before the move: a pose the position query rejects must not reach the wire
    const positionRequest = buildIsInAnglePositionRequest(degrees);
    await this.sendAngles(degrees, speed);
    await this._waitFor(() => this._queryStatus(positionRequest), timeoutSec);
  }

  // !=============================================================================
  // ! Coordinates
  // !=============================================================================

  /**
   * Current pose: x, y, z in mm then rx, ry, rz in degrees.
   */
  async getCoords(): Promise<number[]> {
    const raw = await this._transaction(buildGetCoordsRequest());
    this._trackDecode(RobotCommand.GET_COORDS, raw);
    return parseGetCoordsResponse(raw);
  }

  async sendCoord(id: Coord, value: number, speed: number): Promise<void> {
    await this._send(buildSendCoordRequest(id, value, speed));
  }

  async sendCoords(coords: readonly number[], speed: number, mode: CoordMode): Promise<void> {
    await this._send(buildSendCoordsRequest(coords, speed, mode));
  }

  async syncSendCoords(
    coords: readonly number[],
    speed: number,
    mode: CoordMode,
    timeoutSec: number
  ): Promise<void> {
    const positionRequest = buildIsInCoordPositionRequest(coords);
    await this.sendCoords(coords, speed, mode);
    await this._waitFor(() => this._queryStatus(positionRequest), timeoutSec);
  }

  // !=============================================================================
  // ! Motion state
  // !=============================================================================

  async pause(): Promise<void> {
    await this._send(buildPauseRequest());
  }

  async isPaused(): Promise<number> {
    return this._queryStatus(buildIsPausedRequest());
  }

  async resume(): Promise<void> {
    await this._send(buildResumeRequest());
  }

  async stop(): Promise<void> {
    await this._send(buildStopRequest());
  }

  /** @param degrees - exactly six joint angles */
  async isInAnglePosition(degrees: readonly number[]): Promise<number> {
    return this._queryStatus(buildIsInAnglePositionRequest(degrees));
  }

  async isInCoordPosition(coords: readonly number[]): Promise<number> {
    return this._queryStatus(buildIsInCoordPositionRequest(coords));
  }

  async isMoving(): Promise<number> {
    return this._queryStatus(buildIsMovingRequest());
  }

  // !=============================================================================
  // ! Jog
  // !=============================================================================

  async jogAngle(id: Angle, direction: Direction, speed: number): Promise<void> {
    await this._send(buildJogAngleRequest(id, direction, speed));
  }

  async jogCoord(id: Coord, direction: Direction, speed: number): Promise<void> {
    await this._send(buildJogCoordRequest(id, direction, speed));
  }

  async jogStop(): Promise<void> {
    await this._send(buildJogStopRequest());
  }

  // !=============================================================================
  // ! Servos, speed & LED
  // !=============================================================================

  async setEncoder(id: Angle, encoder: number): Promise<void> {
    await this._send(buildSetEncoderRequest(id, encoder));
  }

  async getEncoder(id: Angle): Promise<number> {
    return this._queryStatus(buildGetEncoderRequest(id));
  }

  async getSpeed(): Promise<number> {
    return this._queryStatus(buildGetSpeedRequest());
  }

  async setSpeed(speed: number): Promise<void> {
    await this._send(buildSetSpeedRequest(speed));
  }

  async isServoEnabled(id: Angle): Promise<number> {
    return this._queryStatus(buildIsServoEnabledRequest(id));
  }

  async isAllServoEnabled(): Promise<number> {
    return this._queryStatus(buildIsAllServoEnabledRequest());
  }

  async setColor(r: number, g: number, b: number): Promise<void> {
    await this._send(buildSetColorRequest(r, g, b));
  }
}

export default CobotOperator;
