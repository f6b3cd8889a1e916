import os from 'node:os';
import type { ArchiveHandle } from '../archive/types.js';
import type { CheckResult, ContentSection, DiffReport } from './report.js';
import type { ExternalComparator } from './comparator.js';
import { ArchiveRegistry, assertFileExists, createArchiveRegistry } from '../archive/ArchiveRegistry.js';
import { ProcessComparator } from './comparator.js';
import { countEntryDifferences, sameLines } from './equality.js';
import { renderArchiveSummary, summaryBody } from './summary.js';
import { diffSummaries } from './summaryDiff.js';
import { compareContents } from './strategies/index.js';
import { DiffMode, ExitCode } from '../types/enums.js';

export interface ArchiveDifferOptions {
  registry?: ArchiveRegistry;
  comparator?: ExternalComparator;
  platform?: NodeJS.Platform;
  tmpDir?: string;
}

export class ArchiveDiffer {
  private readonly registry: ArchiveRegistry;
  private readonly comparator: ExternalComparator;
  private readonly platform: NodeJS.Platform;
  private readonly tmpDir: string;

  constructor(options: ArchiveDifferOptions = {}) {
    this.registry = options.registry ?? createArchiveRegistry();
    this.comparator = options.comparator ?? new ProcessComparator();
    this.platform = options.platform ?? process.platform;
    this.tmpDir = options.tmpDir ?? os.tmpdir();
  }

  async diff(pathA: string, pathB: string, mode: DiffMode = DiffMode.FILE_NAME): Promise<DiffReport> {
    return this.withArchives(pathA, pathB, async (archiveA, archiveB) => {
      const summaryA = renderArchiveSummary(archiveA.metadata(), archiveA.path);
      const summaryB = renderArchiveSummary(archiveB.metadata(), archiveB.path);
      const identical =
        sameLines(summaryBody(summaryA), summaryBody(summaryB)) && (await countEntryDifferences(archiveA, archiveB)) === 0;

      const summaryDiff = identical ? [] : diffSummaries(summaryA, summaryB);
      const content: ContentSection = identical
        ? { kind: 'identical' }
        : await compareContents(mode, {
            archiveA,
            archiveB,
            comparator: this.comparator,
            platform: this.platform,
            tmpDir: this.tmpDir
          });

      return {
        mode,
        archiveA: { path: archiveA.path, lines: summaryA },
        archiveB: { path: archiveB.path, lines: summaryB },
        identical,
        summaryDiff,
        content,
        exitCode: decideExitCode(identical, content)
      };
    });
  }

  async check(pathA: string, pathB: string): Promise<CheckResult> {
    return this.withArchives(pathA, pathB, async (archiveA, archiveB) => {
      const differences = await countEntryDifferences(archiveA, archiveB);
      return { identical: differences === 0, differences };
    });
  }

  private async withArchives<T>(
    pathA: string,
    pathB: string,
    fn: (archiveA: ArchiveHandle, archiveB: ArchiveHandle) => Promise<T>
  ): Promise<T> {
    assertFileExists(pathA);
    assertFileExists(pathB);

    const archiveA = await this.registry.open(pathA);
    try {
      const archiveB = await this.registry.open(pathB);
      try {
        return await fn(archiveA, archiveB);
      } finally {
        archiveB.close();
      }
    } finally {
      archiveA.close();
    }
  }
}

export function decideExitCode(identical: boolean, content: ContentSection): ExitCode {
  if (identical) return ExitCode.SUCCESS;
  return content.kind === 'difference' ? content.exitCode : ExitCode.FAILURE;
}
