/**
 * Structured Logging for the POS host
 *
 * - Leveled output (DEBUG, INFO, WARN, ERROR, FATAL)
 * - Colored console lines for the terminal running the host
 * - JSON lines appended to a daily file, rotated by size and count
 * - Named child loggers per service
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  logDir: string;
  maxFileSizeMB: number;
  maxFiles: number;
  minLevel: LogLevel;
  consoleOutput: boolean;
  fileOutput: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFileSizeMB: 10,
  maxFiles: 5,
  minLevel: 'INFO',
  consoleOutput: true,
  fileOutput: true,
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const LOG_FILE_PREFIX = 'pos-host-';

const sharedConfig: LoggerConfig = { ...DEFAULT_CONFIG };

export class Logger {
  private config: LoggerConfig;
  private serviceName: string;
  private currentLogFile: string | null = null;
  private currentDate: string | null = null;
  private rotation = 0;

  /** Without an explicit config the logger follows the process-wide one set by initializeLogger. */
  constructor(serviceName: string, config?: Partial<LoggerConfig>) {
    this.serviceName = serviceName;
    this.config = config ? { ...sharedConfig, ...config } : sharedConfig;
  }

  private ensureLogDirectory(): void {
    if (!fs.existsSync(this.config.logDir)) {
      fs.mkdirSync(this.config.logDir, { recursive: true });
    }
  }

  private getLogFileName(date: string): string {
    const suffix = this.rotation > 0 ? `.${this.rotation}` : '';
    return path.join(this.config.logDir, `${LOG_FILE_PREFIX}${date}${suffix}.log`);
  }

  private shouldRotate(file: string): boolean {
    if (!fs.existsSync(file)) {
      return false;
    }
    const stats = fs.statSync(file);
    return stats.size > this.config.maxFileSizeMB * 1024 * 1024;
  }

  private rotateIfNeeded(): void {
    const date = new Date().toISOString().split('T')[0];
    if (date !== this.currentDate) {
      this.currentDate = date;
      this.rotation = 0;
    }

    let next = this.getLogFileName(date);
    while (this.shouldRotate(next)) {
      this.rotation++;
      next = this.getLogFileName(date);
    }

    if (this.currentLogFile !== next) {
      this.currentLogFile = next;
      this.cleanupOldLogs();
    }
  }

  private cleanupOldLogs(): void {
    try {
      const files = fs.readdirSync(this.config.logDir)
        .filter(f => f.startsWith(LOG_FILE_PREFIX) && f.endsWith('.log'))
        .map(f => ({
          name: f,
          path: path.join(this.config.logDir, f),
          mtime: fs.statSync(path.join(this.config.logDir, f)).mtime,
        }))
        .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());

      while (files.length > this.config.maxFiles) {
        const oldest = files.pop();
        if (oldest) {
          fs.unlinkSync(oldest.path);
        }
      }
    } catch (error) {
      console.error('Failed to cleanup old logs:', error);
    }
  }

  private formatForConsole(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      DEBUG: '\x1b[90m',
      INFO: '\x1b[36m',
      WARN: '\x1b[33m',
      ERROR: '\x1b[31m',
      FATAL: '\x1b[35m',
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];

    let msg = `${color}[${entry.timestamp}] [${entry.level}] [${entry.service}]${reset} ${entry.message}`;
    if (entry.context) {
      msg += ` ${JSON.stringify(entry.context)}`;
    }
    if (entry.error) {
      msg += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
      if (entry.error.stack) {
        msg += `\n  ${entry.error.stack.split('\n').slice(1, 4).join('\n  ')}`;
      }
    }
    return msg;
  }

  private writeToFile(entry: LogEntry): void {
    try {
      this.ensureLogDirectory();
      this.rotateIfNeeded();
      if (!this.currentLogFile) return;
      fs.appendFileSync(this.currentLogFile, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error('Failed to write log:', error);
    }
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      message,
      context,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    if (this.config.consoleOutput) {
      console.log(this.formatForConsole(entry));
    }

    if (this.config.fileOutput) {
      this.writeToFile(entry);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('WARN', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('ERROR', message, context, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('FATAL', message, context, error);
  }

  child(childService: string): Logger {
    const child = new Logger(`${this.serviceName}:${childService}`);
    child.config = this.config;
    return child;
  }
}

let defaultLogger: Logger | null = null;
const childLoggers = new Map<string, Logger>();

function rootLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger('PosHost');
  }
  return defaultLogger;
}

export function getLogger(serviceName: string = 'PosHost'): Logger {
  const root = rootLogger();
  if (serviceName === 'PosHost') {
    return root;
  }

  let logger = childLoggers.get(serviceName);
  if (!logger) {
    logger = root.child(serviceName);
    childLoggers.set(serviceName, logger);
  }
  return logger;
}

export function initializeLogger(config: Partial<LoggerConfig>): Logger {
  Object.assign(sharedConfig, DEFAULT_CONFIG, config);
  return rootLogger();
}
