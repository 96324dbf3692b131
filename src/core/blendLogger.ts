/**
 * World Distance Blend - Console Logger
 *
 * Prefixed, level-gated console output. Disabled until enabled explicitly.
 */

import type { BlendLogLevel } from '../distance-blend/types';

export class BlendConsoleLogger {
  private enabled: boolean = false;
  private logLevel: BlendLogLevel = 'normal';
  private prefix: string;

  constructor(prefix: string = '[DistanceBlend]') {
    this.prefix = prefix;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  setLogLevel(level: BlendLogLevel): void {
    this.logLevel = level;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getLogLevel(): BlendLogLevel {
    return this.logLevel;
  }

  /** True when verbose output would be written; guards costly formatting */
  isVerbose(): boolean {
    return this.enabled && this.logLevel === 'verbose';
  }

  verbose(message: string, ...args: unknown[]): void {
    if (this.isVerbose()) {
      console.log(`${this.prefix} ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled && this.logLevel !== 'errors') {
      console.info(`${this.prefix} ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled) {
      console.warn(`${this.prefix} ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled) {
      console.error(`${this.prefix} ${message}`, ...args);
    }
  }

  table(data: unknown): void {
    if (this.isVerbose()) {
      console.table(data);
    }
  }
}

// ============ GLOBAL LOGGER INSTANCE ============

export const blendLogger = new BlendConsoleLogger();
