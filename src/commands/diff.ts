import { Command, Option } from 'commander';
import { resolveExistingFile, type CommandContext } from './context.js';
import { parseDiffMode, resolveDiffMode, type DiffModeInput } from './diffOptions.js';
import { ArchiveDiffer } from '../diff/ArchiveDiffer.js';
import { renderDiffReport } from '../diff/renderer.js';
import { ExitCode } from '../types/enums.js';

interface DiffCommandOptions extends DiffModeInput {
  check?: boolean;
}

export function createDiffCommand(context: CommandContext): Command {
  return new Command('diff')
    .description('Displays the differences between all of the files in two PHARs')
    .argument('<pharA>', 'The first PHAR')
    .argument('<pharB>', 'The second PHAR')
    .addOption(new Option('--diff <mode>', 'The diff mode to use: file-name, gnu or git').argParser(parseDiffMode))
    .addOption(new Option('--list-diff', 'Deprecated, use "--diff=file-name" instead').hideHelp())
    .addOption(new Option('--gnu-diff', 'Deprecated, use "--diff=gnu" instead').hideHelp())
    .addOption(new Option('--git-diff', 'Deprecated, use "--diff=git" instead').hideHelp())
    .option('-c, --check', 'Only checks whether the two archives contain the same files (experimental)')
    .action(async (pharA: string, pharB: string, options: DiffCommandOptions) => {
      context.setExitCode(await executeDiff(context, pharA, pharB, options));
    });
}

async function executeDiff(context: CommandContext, pharA: string, pharB: string, options: DiffCommandOptions): Promise<ExitCode> {
  const { io } = context;
  const { mode, deprecations } = resolveDiffMode(options);
  for (const message of deprecations) {
    io.deprecation(message);
  }

  const pathA = resolveExistingFile(context, pharA);
  const pathB = resolveExistingFile(context, pharB);
  const differ = new ArchiveDiffer(context.differ);

  if (options.check === true) {
    const result = await differ.check(pathA, pathB);
    if (result.identical) {
      io.writeln('No differences encountered.');
      return ExitCode.SUCCESS;
    }
    io.writeln(`Differences encountered: ${result.differences} file(s).`);
    return ExitCode.FAILURE;
  }

  return renderDiffReport(await differ.diff(pathA, pathB, mode), io);
}
