#!/usr/bin/env node
import { DEBUG_MODE, CONFIG_PATH, LOG_FILE, LOG_LEVEL } from './env';
import { loadConfig } from './config';
import { initializeLogging } from './runtime/logging';
import { buildApplication } from './composition/container';
import { runTimerCommand } from './app/TimerCommand';
import { CliUsageError, USAGE, parseCommandLine } from './cli/args';

async function main() {
  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  try {
    const { config: appConfig, path: loadedConfigPath } = loadConfig(CONFIG_PATH);
    if (loadedConfigPath) {
      console.log(`Loaded config from ${loadedConfigPath}`);
    } else if (CONFIG_PATH) {
      console.warn(`Config file ${CONFIG_PATH} not found; proceeding with defaults.`);
    }

    const command = parseCommandLine(process.argv.slice(2), appConfig.defaults);
    const app = buildApplication({
      logLevel: DEBUG_MODE ? 'debug' : LOG_LEVEL ?? appConfig.logLevel ?? 'info',
    });

    process.once('SIGINT', () => {
      console.log('\nExiting…');
      app.shutdown();
      void loggingHandle.shutdown().finally(() => process.exit(130));
    });

    const fires = await runTimerCommand(app.timers, command, (line) => console.log(line));
    app.logger.info(`Done after ${fires} fire${fires === 1 ? '' : 's'}.`);
    app.shutdown();
  } finally {
    await loggingHandle.shutdown();
  }
}

main().catch((err) => {
  if (err instanceof CliUsageError) {
    console.error(err.message);
    console.error(USAGE);
  } else {
    console.error('loop-timers failed:', err);
  }
  process.exitCode = 1;
});
