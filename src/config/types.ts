export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LoggingConfig {
  level: LogLevel;
  toFile: boolean;
  toConsole: boolean;
  directory: string;
  // MB before the log file is rotated
  maxFileSize: number;
}

export interface DatabaseConfig {
  path: string;
}

export interface ChartConfig {
  outputDirectory: string;
  referenceTemperature: number;
  width: number;
  height: number;
}

export interface Config {
  database: DatabaseConfig;
  logging: LoggingConfig;
  chart: ChartConfig;
}
