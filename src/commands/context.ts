import { Config } from '../config';
import { Logger } from '../logging/logger';

export interface CommandContext {
  config: Config;
  logger: Logger;
  // user-facing outcome lines, console.log outside of tests
  print: (line: string) => void;
}
