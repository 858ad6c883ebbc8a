import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LogLevel } from '../config';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: unknown;
}

export class Logger {
  private config: LoggingConfig;
  private logFilePath: string;
  private errorLogPath: string;
  private levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    fatal: 4,
  };

  constructor(config: LoggingConfig) {
    this.config = config;

    if (config.toFile && !fs.existsSync(config.directory)) {
      fs.mkdirSync(config.directory, { recursive: true });
    }

    this.logFilePath = path.join(config.directory, 'temperature-log.log');
    this.errorLogPath = path.join(config.directory, 'errors.jsonl');
  }

  get filePath(): string {
    return this.logFilePath;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.config.level];
  }

  private formatEntry(entry: LogEntry): string {
    return JSON.stringify(entry, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value
    ) + '\n';
  }

  private writeToFile(content: string, filePath: string): void {
    if (this.config.toFile) {
      try {
        fs.appendFileSync(filePath, content);
        this.checkFileSize(filePath);
      } catch (error) {
        console.error('Failed to write to log file:', error);
      }
    }
  }

  private checkFileSize(filePath: string): void {
    const stats = fs.statSync(filePath, { throwIfNoEntry: false });
    if (!stats) {
      return;
    }

    const maxSize = this.config.maxFileSize * 1024 * 1024; // MB to bytes
    if (stats.size > maxSize) {
      this.rotateLog(filePath);
    }
  }

  private rotateLog(filePath: string): void {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    let rotatedPath = `${filePath}.${timestamp}`;
    // rotations within the same millisecond get a counter
    for (let n = 1; fs.existsSync(rotatedPath); n++) {
      rotatedPath = `${filePath}.${timestamp}.${n}`;
    }

    try {
      fs.renameSync(filePath, rotatedPath);
    } catch (error) {
      console.error('Failed to rotate log:', error);
    }
  }

  log(level: LogLevel, component: string, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      data,
    };

    const formatted = this.formatEntry(entry);

    this.writeToFile(formatted, this.logFilePath);

    if (level === 'error' || level === 'fatal') {
      this.writeToFile(formatted, this.errorLogPath);
    }

    if (this.config.toConsole) {
      const color = this.getColor(level);
      console.error(
        `${color}[${entry.timestamp}] ${level.toUpperCase()} [${component}]:${'\x1b[0m'} ${message}`
      );
      if (data !== undefined) {
        console.error(data);
      }
    }
  }

  private getColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // Cyan
      info: '\x1b[32m',  // Green
      warn: '\x1b[33m',  // Yellow
      error: '\x1b[31m', // Red
      fatal: '\x1b[35m', // Magenta
    };
    return colors[level];
  }

  debug(component: string, message: string, data?: unknown): void {
    this.log('debug', component, message, data);
  }

  info(component: string, message: string, data?: unknown): void {
    this.log('info', component, message, data);
  }

  warn(component: string, message: string, data?: unknown): void {
    this.log('warn', component, message, data);
  }

  fatal(component: string, message: string, data?: unknown): void {
    this.log('fatal', component, message, data);
  }
}
