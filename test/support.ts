import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Config } from '../src/config';
import { Logger } from '../src/logging/logger';
import { CommandContext } from '../src/commands/context';

export interface TestContext {
  ctx: CommandContext;
  lines: string[];
  dir: string;
  cleanup(): void;
}

export function createTestContext(): TestContext {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'temperature-log-'));
  const config: Config = {
    database: { path: path.join(dir, 'temperature.db') },
    logging: {
      level: 'debug',
      toFile: false,
      toConsole: false,
      directory: path.join(dir, 'logs'),
      maxFileSize: 1,
    },
    chart: {
      outputDirectory: dir,
      referenceTemperature: 98.6,
      width: 600,
      height: 300,
    },
  };

  const lines: string[] = [];
  return {
    ctx: { config, logger: new Logger(config.logging), print: line => lines.push(line) },
    lines,
    dir,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
