import { spawn } from "child_process";

export interface CommandResult {
  exitCode: number;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

/**
 * Run a command to completion, capturing stdout and stderr together.
 * A command that can't be started resolves with exit code 127 and the
 * spawn error in the output.
 */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve) => {
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    let output = "";
    let settled = false;

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    // Decoders keep multi-byte characters intact across chunk boundaries.
    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");

    proc.stdout.on("data", (data: string) => {
      output += data;
    });

    proc.stderr.on("data", (data: string) => {
      output += data;
    });

    proc.on("error", (err) => {
      finish({ exitCode: 127, output: `${output}${err.message}` });
    });

    proc.on("close", (code) => {
      finish({ exitCode: code ?? 1, output });
    });
  });
