import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { resolveExistingFile, type CommandContext } from './context.js';
import { createArchiveRegistry } from '../archive/ArchiveRegistry.js';
import { extractArchive } from '../archive/extract.js';
import { PharsmithError } from '../errors.js';
import { ErrorCode, ExitCode } from '../types/enums.js';

export function createExtractCommand(context: CommandContext): Command {
  return new Command('extract')
    .description('Extracts a PHAR into a directory')
    .argument('<archive>', 'The PHAR to extract')
    .argument('<directory>', 'The output directory')
    .option('-f, --force', 'Empties the output directory first when it is not empty')
    .action(async (archive: string, directory: string, options: { force?: boolean }) => {
      const archivePath = resolveExistingFile(context, archive);
      const target = path.resolve(context.cwd, directory);
      prepareTarget(target, directory, options.force === true);

      const registry = context.differ.registry ?? createArchiveRegistry();
      const handle = await registry.open(archivePath);
      try {
        const count = await extractArchive(handle, target);
        context.io.debug(`Extracted ${count} file(s)`);
      } finally {
        handle.close();
      }
      context.io.success(`The archive has been extracted into "${directory}".`);
      context.setExitCode(ExitCode.SUCCESS);
    });
}

function prepareTarget(target: string, given: string, force: boolean): void {
  if (!fs.existsSync(target)) return;
  if (!fs.statSync(target).isDirectory()) {
    throw new PharsmithError(ErrorCode.INVALID_OPERATION, `The path "${given}" exists and is not a directory.`);
  }
  if (fs.readdirSync(target).length === 0) return;
  if (!force) {
    throw new PharsmithError(ErrorCode.INVALID_OPERATION, `The directory "${given}" is not empty. Use "--force" to overwrite it.`);
  }
  fs.rmSync(target, { recursive: true, force: true });
}
