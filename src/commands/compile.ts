import path from 'node:path';
import { Command } from 'commander';
import type { CommandContext } from './context.js';
import { Compiler } from '../compile/Compiler.js';
import { loadConfiguration } from '../config/Configuration.js';
import { CompilerLogger } from '../console/CompilerLogger.js';
import { Verbosity } from '../console/IO.js';
import { ExitCode } from '../types/enums.js';

interface CompileCommandOptions {
  /** `false` when `--no-config` is given. */
  config?: string | false;
  workingDir?: string;
  dev?: boolean;
  debug?: boolean;
}

export function createCompileCommand(context: CommandContext): Command {
  return new Command('compile')
    .description('Compiles an application into a PHAR')
    .option('-c, --config <file>', 'The alternative configuration file path')
    .option('--no-config', 'Ignores the config file even when one is found')
    .option('-d, --working-dir <dir>', 'If specified, use the given directory as working directory')
    .option('--dev', 'Skips the compression step')
    .option('--debug', 'Dumps the files added to the PHAR into .pharsmith_dump')
    .action((options: CompileCommandOptions) => {
      const { io } = context;
      if (options.debug === true) {
        io.verbosity = Verbosity.DEBUG;
      }
      const workingDir = path.resolve(context.cwd, options.workingDir ?? '.');
      const config = loadConfiguration({
        cwd: workingDir,
        configPath: typeof options.config === 'string' ? options.config : undefined,
        noConfig: options.config === false
      });
      io.debug(`Loaded the configuration ${config.configPath === null ? '(defaults)' : `from "${config.configPath}"`}`);

      new Compiler(new CompilerLogger(io)).compile(config, {
        workingDir,
        dev: options.dev === true,
        debug: options.debug === true
      });
      context.setExitCode(ExitCode.SUCCESS);
    });
}
