// src/types/cobot-types.ts

import type { RobotCommand } from '../constants/constants.js';

// !=============================================================================
// ! Transport
// !=============================================================================

/**
 * Half-duplex byte channel to the controller. Anything that can do these two
 * operations can drive a {@link CobotOperator}.
 */
export interface Connection {
  /** Writes the whole buffer. Rejects on a transport fault. */
  write(buffer: Uint8Array): Promise<void>;

  /**
   * Writes the whole buffer, then resolves with whatever arrived in the reply window.
   * The result may be empty or contain noise around the reply frame.
   */
  writeAndRead(buffer: Uint8Array): Promise<Uint8Array>;
}

/** Options for the serialport-backed connection */
export interface SerialConnectionOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  /** Window for the first reply byte, in ms */
  readTimeout?: number;
  /** Quiet time after which a reply counts as complete, in ms */
  interByteTimeout?: number;
  maxBufferSize?: number;
}

/** Settings handed to a {@link SerialPortFactory} */
export interface SerialPortSettings {
  path: string;
  baudRate: number;
  dataBits: 5 | 6 | 7 | 8;
  stopBits: 1 | 2;
  parity: 'none' | 'even' | 'mark' | 'odd' | 'space';
  autoOpen: false;
}

/** The part of a serialport stream the serial connection drives */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback?: (err: Error | null) => void): void;
  close(callback?: (err: Error | null) => void): void;
  write(data: Uint8Array, callback?: (err: Error | null | undefined) => void): boolean;
  drain(callback?: (err: Error | null) => void): void;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  removeAllListeners(event?: string | symbol): unknown;
}

export type SerialPortFactory = (settings: SerialPortSettings) => SerialPortLike;

// !=============================================================================
// ! Operator
// !=============================================================================

/** Payload of one command, before framing */
export interface CommandRequest {
  genre: RobotCommand;
  payload: Uint8Array;
}

export interface OperatorOptions {
  /** Collect request statistics, see {@link Diagnostics} */
  diagnostics?: boolean;
  /** Delay between position checks of the synchronous moves, in ms */
  pollIntervalMs?: number;
  /**
   * Level of the shared `CobotOperator` logger. It is one logger for the module,
   * so the last operator constructed with this option sets it for all of them.
   */
  logLevel?: LogLevel;
}

// !=============================================================================
// ! Emulator
// !=============================================================================

export interface DeviceEmulatorOptions {
  /** Initial joint angles in degrees */
  angles?: number[];
  /** Initial pose: x, y, z in mm then rx, ry, rz in degrees */
  coords?: number[];
  /** String the emulator answers VERSION with */
  version?: string;
  /** Default speed reported by GET_SPEED */
  speed?: number;
  loggerEnabled?: boolean;
}

export interface LedColor {
  r: number;
  g: number;
  b: number;
}

/** A jog started by JOG_ANGLE or JOG_COORD and not yet stopped */
export interface ActiveJog {
  kind: 'angle' | 'coord';
  id: number;
  direction: number;
  speed: number;
}

/** Snapshot of the emulated controller */
export interface DeviceState {
  poweredOn: boolean;
  paused: boolean;
  freeMode: boolean;
  servosEnabled: boolean;
  speed: number;
  angles: number[];
  coords: number[];
  encoders: number[];
  color: LedColor;
  jog: ActiveJog | null;
}

// !=============================================================================
// ! Diagnostics
// !=============================================================================

export interface DiagnosticsStats {
  uptimeMs: number;
  totalRequests: number;
  writeOnly: number;
  transactions: number;
  emptyDecodes: number;
  transportErrors: number;
  bytesSent: number;
  bytesReceived: number;
  lastResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  averageResponseTime: number | null;
  commandCounts: Record<string, number>;
  lastError: string | null;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Контекст для логирования */
export interface LogContext {
  genre?: number;
  port?: string;
  bytes?: number;
  responseTime?: number;
  logger?: string;
  [key: string]: string | number | boolean | null | undefined;
}

export type LogField = 'timestamp' | 'level' | 'logger' | 'genre' | 'port' | 'responseTime';

/** Интерфейс для экземпляра логгера */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}
