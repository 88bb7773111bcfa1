import type { HarnessEvent } from '../types/events';
import type { Logger, LoggerOptions } from './types';

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly stderr: boolean;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stderr = options.stderr ?? false;
  }

  log(event: HarnessEvent): void {
    this.debug(JSON.stringify(event));
  }

  trace(event: HarnessEvent, message: string): void {
    this.log(event);
    this.info(message);
  }

  debug(message: string): void {
    if (!this.verbose) return;
    if (this.stderr) {
      console.error(message);
    } else {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (this.stderr) {
      console.error(message);
    } else {
      console.info(message);
    }
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }
}
