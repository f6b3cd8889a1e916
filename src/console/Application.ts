import { Command, CommanderError } from 'commander';
import type { ArchiveDifferOptions } from '../diff/ArchiveDiffer.js';
import type { CommandContext } from '../commands/context.js';
import { IO, Verbosity } from './IO.js';
import { createCompileCommand } from '../commands/compile.js';
import { createDiffCommand } from '../commands/diff.js';
import { createExtractCommand } from '../commands/extract.js';
import { createInfoCommand } from '../commands/info.js';
import { ExitCode } from '../types/enums.js';

export const VERSION = '0.1.0';

export interface ApplicationOptions {
  cwd?: string;
  differ?: ArchiveDifferOptions;
}

interface GlobalOptions {
  quiet?: boolean;
  verbose: number;
}

export function createProgram(context: CommandContext): Command {
  const program = new Command('pharsmith')
    .description('Builds, inspects and compares PHAR archives')
    .version(VERSION, '-V, --version')
    .option('-q, --quiet', 'Do not output any message')
    .option('-v, --verbose', 'Increase the verbosity of messages (repeatable)', (_value: string, previous: number) => previous + 1, 0)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => context.io.write(text),
      writeErr: (text) => context.io.stderr(text.replace(/\n$/, ''))
    })
    .hook('preAction', (command) => {
      const options = command.opts<GlobalOptions>();
      context.io.verbosity = options.quiet === true ? Verbosity.QUIET : Math.min(Verbosity.NORMAL + options.verbose, Verbosity.DEBUG);
    });

  for (const command of [createCompileCommand(context), createDiffCommand(context), createExtractCommand(context), createInfoCommand(context)]) {
    program.addCommand(command.copyInheritedSettings(program));
  }
  return program;
}

/** Runs the command line `args` (without the node and script paths) and resolves with the exit code. */
export async function runApplication(args: readonly string[], io: IO, options: ApplicationOptions = {}): Promise<number> {
  let exitCode: number = ExitCode.SUCCESS;
  const context: CommandContext = {
    io,
    cwd: options.cwd ?? process.cwd(),
    differ: options.differ ?? {},
    setExitCode: (code) => {
      exitCode = code;
    }
  };

  try {
    await createProgram(context).parseAsync([...args], { from: 'user' });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    renderError(io, err);
    return ExitCode.FAILURE;
  }
}

function renderError(io: IO, err: unknown): void {
  if (!(err instanceof Error)) {
    io.error(String(err));
    return;
  }
  io.error(err.message);
  if (io.isDebug() && err.stack !== undefined) {
    io.stderr(err.stack);
  }
}
