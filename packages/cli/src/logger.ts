import chalk from "chalk";
import ora, { Ora } from "ora";
import type { Logger } from "@gist-new/core";

/**
 * Logger for the terminal. Long remote steps get an ora spinner; lines
 * logged while it spins are printed above it.
 */
export class ConsoleLogger implements Logger {
  private spinner: Ora | undefined;

  constructor(private readonly verboseEnabled: boolean) {}

  info(message: string): void {
    this.print(message);
  }

  verbose(message: string): void {
    if (this.verboseEnabled) {
      this.print(chalk.dim(message));
    }
  }

  async task<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const spinner = ora(label).start();
    this.spinner = spinner;
    try {
      const result = await fn();
      spinner.succeed();
      return result;
    } catch (err) {
      spinner.fail();
      throw err;
    } finally {
      this.spinner = undefined;
    }
  }

  private print(line: string): void {
    if (this.spinner?.isSpinning) {
      this.spinner.clear();
      console.log(line);
      this.spinner.render();
      return;
    }
    console.log(line);
  }
}
