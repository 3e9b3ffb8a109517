import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { GistNewError, RunOptions, ValidationError, describeError, validateName } from "@gist-new/core";

export const VERSION = "1.0.0";

export interface CliFlags {
  public?: boolean;
  description?: string;
  verbose?: boolean;
}

export interface CliIO {
  writeOut(str: string): void;
  writeErr(str: string): void;
}

export type RunFn = (options: RunOptions) => Promise<void>;

const defaultIO: CliIO = {
  writeOut: (str) => process.stdout.write(str),
  writeErr: (str) => process.stderr.write(str),
};

/**
 * Turn the raw positional arguments and flags into immutable run options,
 * or throw a ValidationError describing what is wrong.
 */
export function parseRunOptions(names: string[], flags: CliFlags): RunOptions {
  if (names.length === 0) {
    throw new ValidationError("missing required [name] argument");
  }
  if (names.length > 1) {
    throw new ValidationError("only one [name] argument is supported");
  }
  const name = names[0].trim();
  validateName(name);

  let description: string | undefined;
  if (flags.description !== undefined) {
    description = flags.description.trim();
    if (description === "") {
      throw new ValidationError("description cannot be empty when provided");
    }
  }

  return Object.freeze({
    name,
    public: flags.public ?? false,
    description,
    verbose: flags.verbose ?? false,
  });
}

export function createProgram(run: RunFn, io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name("gist-new")
    .description(
      "Create a new gist from all regular, non-dot files inside [name] and turn\n" +
        "[name] into a clone of it. Use '.' for the current directory. The directory\n" +
        "must not contain subdirectories or directory symlinks."
    )
    .version(VERSION)
    .argument("[name...]", "directory to publish ('.' for the current directory)")
    .option("--public", "create the gist as public (defaults to secret)")
    .option("-d, --description <text>", "description to attach to the gist (must not be empty)")
    .option("--verbose", "show detailed per-file logs and timing information")
    .helpOption("-h, --help", "show this message")
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: io.writeOut,
      writeErr: io.writeErr,
      outputError: (str, write) => write(chalk.red(`Error: ${str.replace(/^error: /, "")}`)),
    })
    .action(async (names: string[] | undefined, flags: CliFlags) => {
      await run(parseRunOptions(names ?? [], flags));
    });

  return program;
}

/**
 * Parse `argv`, run the pipeline, and return the process exit code.
 * Help and version output count as success.
 */
export async function main(argv: string[], run: RunFn, io: CliIO = defaultIO): Promise<number> {
  const program = createProgram(run, io);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already printed its own message
      return err.exitCode;
    }
    if (err instanceof GistNewError && err.kind === "validation") {
      program.outputHelp({ error: true });
    }
    io.writeErr(chalk.red(`Error: ${describeError(err)}`) + "\n");
    return 1;
  }
}
