/**
 * Output sink for the pipeline. `verbose` lines are only shown when the
 * user asked for them; `task` wraps a slow remote step so the CLI can show
 * progress while it runs.
 */
export interface Logger {
  info(message: string): void;
  verbose(message: string): void;
  task<T>(label: string, fn: () => Promise<T>): Promise<T>;
}

export function formatDuration(startedAt: number, now: number = Date.now()): string {
  return `${Math.max(0, Math.round(now - startedAt))}ms`;
}
