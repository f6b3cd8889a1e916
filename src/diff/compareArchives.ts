import { ArchiveDiffer, type ArchiveDifferOptions } from './ArchiveDiffer.js';
import { renderDiffReport } from './renderer.js';
import { BufferedIO } from '../console/IO.js';
import { DiffMode, type ExitCode } from '../types/enums.js';

export interface ComparisonOutput {
  output: string;
  exitCode: ExitCode;
}

/** Runs a comparison and returns the text the `diff` command would print. */
export async function compareArchives(
  pathA: string,
  pathB: string,
  mode: DiffMode = DiffMode.FILE_NAME,
  options: ArchiveDifferOptions = {}
): Promise<ComparisonOutput> {
  const report = await new ArchiveDiffer(options).diff(pathA, pathB, mode);
  const io = new BufferedIO();
  const exitCode = renderDiffReport(report, io);
  return { output: io.fetch(), exitCode };
}
