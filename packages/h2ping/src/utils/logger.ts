/**
 * Console logging with a debug switch
 */

import { config } from '../config.js';

export class Logger {
  private debugEnabled: boolean;

  constructor(debugEnabled: boolean = config.debug) {
    this.debugEnabled = debugEnabled;
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  /**
   * Debug logs (only when enabled)
   */
  debug(message: string, meta?: unknown): void {
    if (!this.debugEnabled) return;

    const metaStr = meta !== undefined ? ` ${JSON.stringify(meta)}` : '';
    console.debug(`[${new Date().toISOString()}] [DEBUG] ${message}${metaStr}`);
  }
}

export const logger = new Logger();
