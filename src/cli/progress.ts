/**
 * ProgressReporter
 *
 * One-line status messages for the render command. Tracks the task in
 * progress so a failure can be reported against it.
 */

import { ErrorHandler } from '../errors/error-handler.js';

/** Where status lines go; `console` by default. */
export interface StatusOutput {
  log(message: string): void;
  error(message: string): void;
  warn(message: string): void;
}

export class ProgressReporter {
  private current: string | undefined;

  constructor(private readonly out: StatusOutput = console) {}

  startTask(name: string): void {
    this.current = name;
    this.out.log(`⏳ ${name}...`);
  }

  completeTask(outcome: string): void {
    this.current = undefined;
    this.out.log(`✅ ${outcome}`);
  }

  failTask(err: unknown): void {
    const name = this.current ?? 'Task';
    this.current = undefined;
    this.out.error(`❌ ${name} failed: ${ErrorHandler.toUserMessage(err)}`);
  }

  warn(message: string): void {
    this.out.warn(`⚠️  ${message}`);
  }
}
