/**
 * Cohort Intake CLI Logging
 *
 * JSON lines for machine consumption, colored single lines for interactive
 * use. Tracks the running command and its duration.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata } from '../../core/utils/logger.js';

export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = config;
    this.startTime = Date.now();
  }

  get json(): boolean {
    return this.config.json;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      service: 'cohort-intake',
      ...(this.commandContext ? { command: this.commandContext } : {}),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    });
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);

    // stdout is reserved for command output
    console.error(formatted);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  commandStart(command: string, options?: LogMetadata): void {
    this.commandContext = command;
    this.startTime = Date.now();
    this.debug(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const baseMetadata = { duration_ms: Date.now() - this.startTime, ...metadata };
    if (success) {
      this.debug('Command completed', baseMetadata);
    } else {
      this.error('Command failed', baseMetadata);
    }
  }
}

export function createCLILogger(config: CLILoggerConfig): CLILogger {
  return new CLILogger(config);
}
