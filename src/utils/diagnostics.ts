// src/utils/diagnostics.ts

import { getCommandName } from '../constants/constants.js';
import Logger from '../logger.js';
import type { DiagnosticsStats, LoggerInstance } from '../types/cobot-types.js';

const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger']);

export interface DiagnosticsOptions {
  loggerName?: string;
  /** Warn once this many replies in a row decoded to nothing */
  emptyDecodeThreshold?: number;
}

/**
 * Collects statistics about the traffic of one operator.
 */
export class Diagnostics {
  private logger: LoggerInstance;
  private emptyDecodeThreshold: number;
  private startTime: number = Date.now();

  private totalRequests: number = 0;
  private writeOnly: number = 0;
  private transactions: number = 0;
  private emptyDecodes: number = 0;
  private consecutiveEmptyDecodes: number = 0;
  private transportErrors: number = 0;
  private bytesSent: number = 0;
  private bytesReceived: number = 0;
  private lastResponseTime: number | null = null;
  private minResponseTime: number | null = null;
  private maxResponseTime: number | null = null;
  private totalResponseTime: number = 0;
  private replies: number = 0;
  private commandCounts: Record<string, number> = {};
  private lastError: string | null = null;

  constructor(options: DiagnosticsOptions = {}) {
    this.logger = loggerInstance.createLogger(options.loggerName ?? 'Diagnostics');
    this.logger.setLevel('warn');
    this.emptyDecodeThreshold = options.emptyDecodeThreshold ?? 10;
  }

  /**
   * Resets all statistics and counters to their initial state.
   */
  reset(): void {
    this.startTime = Date.now();
    this.totalRequests = 0;
    this.writeOnly = 0;
    this.transactions = 0;
    this.emptyDecodes = 0;
    this.consecutiveEmptyDecodes = 0;
    this.transportErrors = 0;
    this.bytesSent = 0;
    this.bytesReceived = 0;
    this.lastResponseTime = null;
    this.minResponseTime = null;
    this.maxResponseTime = null;
    this.totalResponseTime = 0;
    this.replies = 0;
    this.commandCounts = {};
    this.lastError = null;
  }

  recordRequest(genre: number, bytes: number, expectsReply: boolean): void {
    this.totalRequests++;
    if (expectsReply) this.transactions++;
    else this.writeOnly++;
    this.bytesSent += bytes;
    const name = getCommandName(genre) ?? `0x${genre.toString(16)}`;
    this.commandCounts[name] = (this.commandCounts[name] ?? 0) + 1;
  }

  recordReply(bytes: number, responseTime: number): void {
    this.replies++;
    this.bytesReceived += bytes;
    this.lastResponseTime = responseTime;
    this.totalResponseTime += responseTime;
    this.minResponseTime =
      this.minResponseTime === null ? responseTime : Math.min(this.minResponseTime, responseTime);
    this.maxResponseTime =
      this.maxResponseTime === null ? responseTime : Math.max(this.maxResponseTime, responseTime);
  }

  /**
   * Counts a reply that held no frame for the command sent (no data, cross-talk or truncation).
   */
  recordEmptyDecode(genre: number): void {
    this.emptyDecodes++;
    this.consecutiveEmptyDecodes++;
    if (this.consecutiveEmptyDecodes === this.emptyDecodeThreshold) {
      this.logger.warn('Controller keeps answering with no usable frame', {
        genre,
        count: this.consecutiveEmptyDecodes,
      });
    }
  }

  recordDecoded(): void {
    this.consecutiveEmptyDecodes = 0;
  }

  recordTransportError(error: unknown): void {
    this.transportErrors++;
    this.lastError = error instanceof Error ? error.message : String(error);
  }

  get averageResponseTime(): number | null {
    return this.replies > 0 ? this.totalResponseTime / this.replies : null;
  }

  getStats(): DiagnosticsStats {
    return {
      uptimeMs: Date.now() - this.startTime,
      totalRequests: this.totalRequests,
      writeOnly: this.writeOnly,
      transactions: this.transactions,
      emptyDecodes: this.emptyDecodes,
      transportErrors: this.transportErrors,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      lastResponseTime: this.lastResponseTime,
      minResponseTime: this.minResponseTime,
      maxResponseTime: this.maxResponseTime,
      averageResponseTime: this.averageResponseTime,
      commandCounts: { ...this.commandCounts },
      lastError: this.lastError,
    };
  }
}
