import * as dotenv from 'dotenv';
import { Config, LogLevel, LOG_LEVELS } from './types';
import * as fs from 'fs';
import * as path from 'path';

dotenv.config();

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim();
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const num = parseFloat(value);
  if (isNaN(num)) {
    throw new Error(`Invalid number for ${key}: ${value}`);
  }
  return num;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim().toLowerCase() === 'true';
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function getLogLevel(env: Env): LogLevel {
  const level = getEnv(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(level)) {
    throw new Error(`Invalid LOG_LEVEL: ${level} (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return level;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    database: {
      path: getEnv(env, 'DATABASE_PATH', './data/temperature.db'),
    },

    logging: {
      level: getLogLevel(env),
      toFile: getEnvBoolean(env, 'LOG_TO_FILE', true),
      toConsole: getEnvBoolean(env, 'LOG_TO_CONSOLE', false),
      directory: getEnv(env, 'LOG_DIRECTORY', './logs'),
      maxFileSize: getEnvNumber(env, 'MAX_LOG_FILE_SIZE', 10),
    },

    chart: {
      outputDirectory: getEnv(env, 'CHART_OUTPUT_DIR', '.'),
      referenceTemperature: getEnvNumber(env, 'CHART_REFERENCE_TEMPERATURE', 98.6),
      width: getEnvNumber(env, 'CHART_WIDTH', 1000),
      height: getEnvNumber(env, 'CHART_HEIGHT', 500),
    },
  };
}

export function validateConfig(config: Config): void {
  if (config.logging.maxFileSize <= 0) {
    throw new Error('MAX_LOG_FILE_SIZE must be positive');
  }

  if (config.chart.width <= 0 || config.chart.height <= 0) {
    throw new Error('Chart width and height must be positive');
  }

  // Create necessary directories
  const dirs = [path.dirname(config.database.path), config.chart.outputDirectory];
  if (config.logging.toFile) {
    dirs.push(config.logging.directory);
  }

  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}

export * from './types';
