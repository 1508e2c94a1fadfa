import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { NodeRunLoop } from '../adapters/sys/NodeRunLoop';
import { EasyTimer } from '../app/EasyTimer';
import type { LogLevel, LoggerPort } from '../ports/sys/LoggerPort';

export interface ApplicationOptions {
  logLevel: LogLevel;
  keepAlive?: boolean;
}

export interface ApplicationInstance {
  readonly loop: NodeRunLoop;
  readonly timers: EasyTimer;
  readonly logger: LoggerPort;
  shutdown(): void;
}

export function buildApplication(options: ApplicationOptions): ApplicationInstance {
  const logger = new ConsoleLogger(options.logLevel);
  const loop = new NodeRunLoop({ keepAlive: options.keepAlive ?? true, logger });
  const timers = new EasyTimer(loop, logger);

  return {
    loop,
    timers,
    logger,
    shutdown: () => {
      const pending = loop.pendingCount();
      if (pending > 0) {
        logger.debug('Detaching pending timers', { pending });
      }
      loop.shutdown();
    },
  };
}
