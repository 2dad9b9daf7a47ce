/**
 * Structured logging for ICP Prospector
 * Outputs JSON logs suitable for parsing and analysis
 */

import * as fs from 'fs';
import * as path from 'path';
import { env, ensureDir } from './env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  stage?: string;
  runId?: string;
  message: string;
  data?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function parseLevel(value: string | undefined): LogLevel {
  return isLogLevel(value) ? value : 'info';
}

class Logger {
  private logFile: string;
  private fileEnabled: boolean;
  private stage?: string;
  private runId?: string;
  private minLevel: LogLevel;

  constructor() {
    const today = new Date().toISOString().split('T')[0];
    this.logFile = path.join(env.LOG_DIR, `icp-prospector-${today}.log`);
    this.fileEnabled = env.NODE_ENV !== 'test';
    this.minLevel = parseLevel(process.env.LOG_LEVEL);
  }

  setContext(stage?: string, runId?: string): void {
    this.stage = stage;
    this.runId = runId;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: EntryLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel];
  }

  private formatEntry(level: EntryLevel, message: string, data?: Record<string, unknown>): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      stage: this.stage,
      runId: this.runId,
      message,
      data,
    };
  }

  private write(entry: LogEntry): void {
    if (this.fileEnabled) {
      ensureDir(path.dirname(this.logFile));
      fs.appendFileSync(this.logFile, JSON.stringify(entry) + '\n');
    }

    const colors: Record<EntryLevel, string> = {
      debug: '\x1b[90m',  // gray
      info: '\x1b[36m',   // cyan
      warn: '\x1b[33m',   // yellow
      error: '\x1b[31m',  // red
    };
    const reset = '\x1b[0m';
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const context = entry.stage ? ` [${entry.stage}]` : '';

    console.log(`${colors[entry.level]}${prefix}${context}${reset} ${entry.message}`);
    if (entry.data && Object.keys(entry.data).length > 0) {
      console.log(`  ${JSON.stringify(entry.data)}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.write(this.formatEntry('debug', message, data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.write(this.formatEntry('info', message, data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.write(this.formatEntry('warn', message, data));
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      this.write(this.formatEntry('error', message, data));
    }
  }

  // A record left the funnel at the current stage
  logExclusion(
    name: string,
    reason: string,
    details?: Record<string, unknown>
  ): void {
    this.debug(`Excluded: ${name}`, {
      reason,
      ...details,
    });
  }
}

export const logger = new Logger();
