/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DebugLoggerConfig {
  enabled: boolean;
  level: LogLevel;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isTruthyFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

let globalConfig: DebugLoggerConfig = {
  enabled: isTruthyFlag(process.env['GENLANG_SDK_DEBUG']),
  level: 'debug',
};

/**
 * Component-scoped logger writing to stderr. Warnings and errors are always
 * written; debug and info only once logging is enabled.
 */
export class DebugLogger {
  constructor(private readonly component: string) {}

  private shouldLog(level: LogLevel): boolean {
    if (!globalConfig.enabled) {
      return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn;
    }
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[globalConfig.level];
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const text = args.length > 0 ? format(message, ...args) : message;
    process.stderr.write(
      `[${level.toUpperCase()}] [${this.component}] ${text}\n`,
    );
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }
}

export function setDebugLoggerConfig(config: Partial<DebugLoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getDebugLoggerConfig(): DebugLoggerConfig {
  return { ...globalConfig };
}

export function createDebugLogger(component: string): DebugLogger {
  return new DebugLogger(component);
}
