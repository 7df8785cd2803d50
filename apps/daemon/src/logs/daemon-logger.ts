import { ConsoleLogger, type LogLevel } from '@nestjs/common';
import { logLevelsFrom } from '../settings/settings.service';
import { serverLogStore, type ServerLogLevel, type ServerLogStore } from './server-logs.store';

/** Console logger that honours LOG_LEVEL and mirrors printed lines into the log store. */
export class DaemonLogger extends ConsoleLogger {
  constructor(
    level: LogLevel,
    private readonly store: ServerLogStore = serverLogStore,
  ) {
    super();
    this.setLogLevels(logLevelsFrom(level));
  }

  private record(
    level: LogLevel,
    storeLevel: ServerLogLevel,
    message: unknown,
    context?: string,
    stack?: string,
  ) {
    if (!this.isLevelEnabled(level)) return;
    this.store.add({ level: storeLevel, message, stack, context });
  }

  override log(message: unknown, context?: string) {
    super.log(message, context);
    this.record('log', 'info', message, context);
  }

  override warn(message: unknown, context?: string) {
    super.warn(message, context);
    this.record('warn', 'warn', message, context);
  }

  override error(message: unknown, stack?: string, context?: string) {
    super.error(message, stack, context);
    this.record('error', 'error', message, context, stack);
  }

  override debug(message: unknown, context?: string) {
    super.debug(message, context);
    this.record('debug', 'debug', message, context);
  }

  override verbose(message: unknown, context?: string) {
    super.verbose(message, context);
    this.record('verbose', 'debug', message, context);
  }
}
