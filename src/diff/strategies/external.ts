import type { ContentSection } from '../report.js';
import type { ContentDiffContext } from './types.js';
import { gnuExcludeFlag } from '../comparator.js';
import { quoteShellArgument, withExtractedArchives } from './workspace.js';
import { ExternalToolFailure } from '../../errors.js';
import { ExitCode } from '../../types/enums.js';

export async function diffWithGnu(context: ContentDiffContext): Promise<ContentSection> {
  return withExtractedArchives(context, { metadataSidecar: true }, async ({ root, dirA, dirB }) => {
    const commandLine = [
      'diff',
      gnuExcludeFlag(context.platform),
      quoteShellArgument(dirA, context.platform),
      quoteShellArgument(dirB, context.platform)
    ].join(' ');
    const stdout = await runDiffTool(context, commandLine, root);
    if (stdout === undefined) {
      return { kind: 'no-difference' };
    }
    return {
      kind: 'difference',
      lines: dropTrailingEmptyLines(splitLines(stdout).map((line) => line.trimEnd())),
      exitCode: ExitCode.FAILURE
    };
  });
}

export async function diffWithGit(context: ContentDiffContext): Promise<ContentSection> {
  return withExtractedArchives(context, { metadataSidecar: false }, async ({ root, dirA, dirB }) => {
    const commandLine = [
      'git diff --no-index --find-renames --no-color',
      quoteShellArgument(dirA, context.platform),
      quoteShellArgument(dirB, context.platform)
    ].join(' ');
    const stdout = await runDiffTool(context, commandLine, root);
    if (stdout === undefined) {
      return { kind: 'no-difference' };
    }
    const lines = dropTrailingEmptyLines(splitLines(stdout));
    return { kind: 'difference', lines, exitCode: isRenameOnly(lines) ? ExitCode.CONTENT_DIFFERENCE : ExitCode.FAILURE };
  });
}

/** Renames are recorded with `rename from` lines; any content change brings a `@@` hunk. */
export function isRenameOnly(lines: readonly string[]): boolean {
  return lines.some((line) => line.startsWith('rename from ')) && !lines.some((line) => line.startsWith('@@'));
}

/** Returns the tool output when it reports a difference, `undefined` when it reports none. */
async function runDiffTool(context: ContentDiffContext, commandLine: string, cwd: string): Promise<string | undefined> {
  const result = await context.comparator.run({ commandLine, cwd });
  switch (result.exitCode) {
    case 0:
      return undefined;
    case 1:
      return result.stdout;
    default:
      throw new ExternalToolFailure(commandLine, result.exitCode, result.stderr);
  }
}

function splitLines(output: string): string[] {
  return output.replace(/\r\n/g, '\n').split('\n');
}

function dropTrailingEmptyLines(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1].trim() === '') end -= 1;
  return lines.slice(0, end);
}
