import type { HarnessEvent, Logger } from '@examplecheck/shared';

/**
 * Logger that keeps everything in memory so tests can assert on it.
 */
export class RecordingLogger implements Logger {
  readonly events: HarnessEvent[] = [];
  readonly messages: string[] = [];
  readonly errors: Array<{ error: Error; message?: string }> = [];

  log(event: HarnessEvent): void {
    this.events.push(event);
  }

  trace(event: HarnessEvent, message: string): void {
    this.events.push(event);
    this.messages.push(message);
  }

  debug(message: string): void {
    this.messages.push(message);
  }

  error(error: Error, message?: string): void {
    this.errors.push({ error, message });
  }

  eventTypes(): string[] {
    return this.events.map((e) => e.type);
  }
}
