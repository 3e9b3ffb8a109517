import type { Logger } from "./logger.js";

/**
 * Logger that records every line; `task` just runs the step.
 */
export class RecordingLogger implements Logger {
  readonly infos: string[] = [];
  readonly verboses: string[] = [];
  readonly tasks: string[] = [];

  info(message: string): void {
    this.infos.push(message);
  }

  verbose(message: string): void {
    this.verboses.push(message);
  }

  async task<T>(label: string, fn: () => Promise<T>): Promise<T> {
    this.tasks.push(label);
    return fn();
  }
}
