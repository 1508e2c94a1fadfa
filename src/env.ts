import { config } from 'dotenv';
import type { LogLevel } from './ports/sys/LoggerPort';
import { isLogLevel } from './ports/sys/LoggerPort';

config();

const rawLogLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
export const LOG_LEVEL: LogLevel | undefined = isLogLevel(rawLogLevel) ? rawLogLevel : undefined;
export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';

const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined;
let logFileArg: string | undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    default:
      break;
  }
}

export const CONFIG_PATH = configPathArg;
export const LOG_FILE = logFileArg;

if (rawLogLevel && !LOG_LEVEL) {
  console.warn(`Ignoring unknown LOG_LEVEL "${process.env.LOG_LEVEL}".`);
}
