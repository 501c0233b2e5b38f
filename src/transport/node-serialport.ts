// src/transport/node-serialport.ts

import { Mutex } from 'async-mutex';
import { SerialPort } from 'serialport';

import {
  CobotConfigError,
  SerialConnectionError,
  SerialReadError,
  SerialWriteError,
} from '../errors.js';
import Logger from '../logger.js';
import type {
  Connection,
  SerialConnectionOptions,
  SerialPortFactory,
  SerialPortLike,
} from '../types/cobot-types.js';
import { concatUint8Arrays } from '../utils/utils.js';

// ========== CONSTANTS ==========
const SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 1_000_000,
  DEFAULT_BAUD_RATE: 115200,
  DEFAULT_READ_TIMEOUT_MS: 300,
  DEFAULT_INTER_BYTE_TIMEOUT_MS: 20,
  DEFAULT_MAX_BUFFER_SIZE: 1024,
  POLL_INTERVAL_MS: 5,
} as const;

// ========== LOGGER ==========
const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger', 'port']);
const logger = loggerInstance.createLogger('SerialConnection');
logger.setLevel('error');

const defaultPortFactory: SerialPortFactory = settings => new SerialPort(settings);

/**
 * {@link Connection} over a serial line, backed by the `serialport` package.
 *
 * A reply window opens once the request is fully written. It closes when the
 * line has been quiet for `interByteTimeout` after the first byte, or after
 * `readTimeout` if nothing arrived at all.
 */
class SerialConnection implements Connection {
  private path: string;
  private options: Required<SerialConnectionOptions>;
  private portFactory: SerialPortFactory;
  private port: SerialPortLike | null = null;
  private readBuffer: Uint8Array = new Uint8Array(0);
  private _isOpen: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(
    path: string,
    options: SerialConnectionOptions = {},
    portFactory: SerialPortFactory = defaultPortFactory
  ) {
    this.path = path;
    this.options = {
      baudRate: SERIAL_CONSTANTS.DEFAULT_BAUD_RATE,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      readTimeout: SERIAL_CONSTANTS.DEFAULT_READ_TIMEOUT_MS,
      interByteTimeout: SERIAL_CONSTANTS.DEFAULT_INTER_BYTE_TIMEOUT_MS,
      maxBufferSize: SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      ...options,
    };
    this.portFactory = portFactory;
  }

  get isOpen(): boolean {
    return this._isOpen && this.port !== null && this.port.isOpen;
  }

  /**
   * Opens the port. Calling it on an open connection does nothing.
   * @throws CobotConfigError if the baud rate is out of range
   * @throws SerialConnectionError if the port cannot be opened
   */
  async open(): Promise<void> {
    if (this.isOpen) return;

    const { baudRate } = this.options;
    if (baudRate < SERIAL_CONSTANTS.MIN_BAUD_RATE || baudRate > SERIAL_CONSTANTS.MAX_BAUD_RATE) {
      throw new CobotConfigError(`Invalid baud rate: ${baudRate}`);
    }

    if (this.port) {
      await this._releaseAllResources();
    }

    const port = this.portFactory({
      path: this.path,
      baudRate,
      dataBits: this.options.dataBits,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
      autoOpen: false,
    });
    this.port = port;

    await new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => {
        if (err) {
          this._isOpen = false;
          this.port = null;
          reject(new SerialConnectionError(err.message));
          return;
        }
        resolve();
      });
    });

    this._isOpen = true;
    this._removeAllListeners();
    port.on('data', (chunk: Buffer) => this._onData(chunk));
    port.on('error', (err: Error) => this._onError(err));
    port.on('close', () => this._onClose());
    logger.info('Serial port opened', { port: this.path, baudRate });
  }

  /**
   * Closes the port and drops any buffered bytes.
   */
  async close(): Promise<void> {
    const release = await this._operationMutex.acquire();
    try {
      await this._releaseAllResources();
      logger.info('Serial port closed by user', { port: this.path });
    } finally {
      release();
    }
  }

  async write(buffer: Uint8Array): Promise<void> {
    const release = await this._operationMutex.acquire();
    try {
      await this._writeRaw(buffer);
    } finally {
      release();
    }
  }

  /**
   * Discards stale input, writes the request and collects the reply window.
   * @returns every byte received in the window, possibly none
   */
  async writeAndRead(buffer: Uint8Array): Promise<Uint8Array> {
    const release = await this._operationMutex.acquire();
    try {
      this.readBuffer = new Uint8Array(0);
      await this._writeRaw(buffer);
      return await this._collectReply();
    } finally {
      release();
    }
  }

  private _writeRaw(buffer: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this.isOpen || !port) {
      return Promise.reject(new SerialWriteError('Port closed'));
    }

    return new Promise<void>((resolve, reject) => {
      port.write(buffer, (err: Error | null | undefined) => {
        if (err) {
          logger.error(`Write failed: ${err.message}`, { port: this.path });
          reject(new SerialWriteError(err.message));
          return;
        }
        port.drain((drainErr: Error | null) => {
          if (drainErr) {
            logger.error(`Drain failed: ${drainErr.message}`, { port: this.path });
            reject(new SerialWriteError(drainErr.message));
            return;
          }
          logger.debug('Bytes written', { port: this.path, bytes: buffer.length });
          resolve();
        });
      });
    });
  }

  private _collectReply(): Promise<Uint8Array> {
    const { readTimeout, interByteTimeout } = this.options;
    const start = Date.now();
    let lastLength = 0;
    let lastChange = start;

    return new Promise<Uint8Array>((resolve, reject) => {
      const check = (): void => {
        if (!this.isOpen) {
          reject(new SerialReadError('Port closed'));
          return;
        }

        const now = Date.now();
        const received = this.readBuffer.length;

        if (received !== lastLength) {
          lastLength = received;
          lastChange = now;
        }

        const quiet = received > 0 && now - lastChange >= interByteTimeout;
        const full = received >= this.options.maxBufferSize;
        if (quiet || full) {
          const reply = this.readBuffer;
          this.readBuffer = new Uint8Array(0);
          logger.debug('Reply window closed', {
            port: this.path,
            bytes: reply.length,
            responseTime: now - start,
          });
          resolve(reply);
          return;
        }

        if (received === 0 && now - start >= readTimeout) {
          logger.debug('No reply within read timeout', { port: this.path, readTimeout });
          resolve(new Uint8Array(0));
          return;
        }

        setTimeout(check, SERIAL_CONSTANTS.POLL_INTERVAL_MS);
      };
      check();
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      logger.warn('Read buffer overflow, oldest bytes dropped', {
        port: this.path,
        bytes: this.readBuffer.length,
      });
      this.readBuffer = this.readBuffer.slice(-this.options.maxBufferSize);
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port error: ${err.message}`, { port: this.path });
    this._isOpen = false;
  }

  private _onClose(): void {
    logger.info('Serial port closed', { port: this.path });
    this._isOpen = false;
  }

  private _removeAllListeners(): void {
    if (this.port) {
      this.port.removeAllListeners('data');
      this.port.removeAllListeners('error');
      this.port.removeAllListeners('close');
    }
  }

  private async _releaseAllResources(): Promise<void> {
    const port = this.port;
    this._removeAllListeners();
    this._isOpen = false;
    this.port = null;
    this.readBuffer = new Uint8Array(0);

    if (port && port.isOpen) {
      await new Promise<void>((resolve, reject) => {
        port.close((err: Error | null) => {
          if (err) reject(new SerialConnectionError(err.message));
          else resolve();
        });
      });
    }
  }
}

export default SerialConnection;
