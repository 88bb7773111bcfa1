import * as fs from 'fs/promises';
import type { HarnessEvent } from '../types/events';
import { ConsoleLogger } from './consoleLogger';
import type { Logger, LoggerOptions } from './types';

/**
 * Appends every event to a JSON Lines file and forwards messages to the console.
 */
export class JsonlLogger implements Logger {
  private readonly console: ConsoleLogger;

  constructor(
    private readonly filePath: string,
    options: LoggerOptions = {},
  ) {
    this.console = new ConsoleLogger(options);
  }

  async log(event: HarnessEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      console.error(`Failed to write to event log at ${this.filePath}`, error);
    }
  }

  async trace(event: HarnessEvent, message: string): Promise<void> {
    await this.log(event);
    this.console.info(message);
  }

  debug(message: string): void {
    this.console.debug(message);
  }

  error(error: Error, message?: string): void {
    this.console.error(error, message);
  }
}
