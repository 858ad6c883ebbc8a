import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, validateConfig } from '../src/config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.database.path).toBe('./data/temperature.db');
    expect(config.logging).toEqual({
      level: 'info',
      toFile: true,
      toConsole: false,
      directory: './logs',
      maxFileSize: 10,
    });
    expect(config.chart).toEqual({
      outputDirectory: '.',
      referenceTemperature: 98.6,
      width: 1000,
      height: 500,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      DATABASE_PATH: '/tmp/t.db',
      LOG_LEVEL: 'DEBUG',
      LOG_TO_CONSOLE: 'true',
      CHART_REFERENCE_TEMPERATURE: '37',
    });

    expect(config.database.path).toBe('/tmp/t.db');
    expect(config.logging.level).toBe('debug');
    expect(config.logging.toConsole).toBe(true);
    expect(config.chart.referenceTemperature).toBe(37);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow('Invalid LOG_LEVEL: loud');
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ CHART_WIDTH: 'wide' })).toThrow('Invalid number for CHART_WIDTH: wide');
  });
});

describe('validateConfig', () => {
  let root: string | undefined;

  afterEach(() => {
    if (root) fs.rmSync(root, { recursive: true, force: true });
    root = undefined;
  });

  it('rejects a non-positive log size', () => {
    const config = loadConfig({ MAX_LOG_FILE_SIZE: '0' });
    expect(() => validateConfig(config)).toThrow('MAX_LOG_FILE_SIZE must be positive');
  });

  it('creates missing directories', () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'temperature-config-'));
    const config = loadConfig({
      DATABASE_PATH: path.join(root, 'db', 'temperature.db'),
      LOG_DIRECTORY: path.join(root, 'logs'),
      CHART_OUTPUT_DIR: path.join(root, 'charts'),
    });

    validateConfig(config);

    expect(fs.statSync(path.join(root, 'db')).isDirectory()).toBe(true);
    expect(fs.statSync(path.join(root, 'logs')).isDirectory()).toBe(true);
    expect(fs.statSync(path.join(root, 'charts')).isDirectory()).toBe(true);
    expect(fs.existsSync(path.join(root, 'db', 'temperature.db'))).toBe(false);
  });

  it('rejects a non-positive chart size', () => {
    const config = loadConfig({ CHART_WIDTH: '0' });
    expect(() => validateConfig(config)).toThrow('Chart width and height must be positive');
  });
});
