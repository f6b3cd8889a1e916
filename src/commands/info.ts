import { Command } from 'commander';
import { resolveExistingFile, type CommandContext } from './context.js';
import { createArchiveRegistry } from '../archive/ArchiveRegistry.js';
import { describeEntry, renderArchiveSummary } from '../diff/summary.js';
import { ExitCode } from '../types/enums.js';

export function createInfoCommand(context: CommandContext): Command {
  return new Command('info')
    .description('Displays information about a PHAR')
    .argument('<archive>', 'The PHAR to inspect')
    .option('-l, --list', 'Lists the files of the archive')
    .action(async (archive: string, options: { list?: boolean }) => {
      const registry = context.differ.registry ?? createArchiveRegistry();
      const handle = await registry.open(resolveExistingFile(context, archive));
      try {
        context.io.writeln(renderArchiveSummary(handle.metadata(), handle.path));
        if (options.list === true) {
          context.io.newLine();
          context.io.writeln(handle.listEntries().map(describeEntry));
        }
      } finally {
        handle.close();
      }
      context.setExitCode(ExitCode.SUCCESS);
    });
}
