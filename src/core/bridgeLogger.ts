/**
 * Bridge console logger. Silent until enabled from settings.
 */

export type BridgeLogLevel = 'verbose' | 'normal' | 'errors';

export class BridgeConsoleLogger {
  private enabled: boolean = false;
  private logLevel: BridgeLogLevel = 'normal';
  private prefix: string;

  constructor(prefix: string = '[HapticBridge]') {
    this.prefix = prefix;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  setLogLevel(level: BridgeLogLevel): void {
    this.logLevel = level;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  verbose(message: string, ...args: unknown[]): void {
    if (this.enabled && this.logLevel === 'verbose') {
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
      console.warn(`${this.prefix} ⚠️ ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled) {
      console.error(`${this.prefix} ❌ ${message}`, ...args);
    }
  }
}

// ============ GLOBAL LOGGER INSTANCE ============

export const bridgeLogger = new BridgeConsoleLogger();
