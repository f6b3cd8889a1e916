import type { DiffMode, ExitCode } from '../types/enums.js';

export type ContentSection =
  | { kind: 'identical' }
  | { kind: 'no-difference' }
  | {
      kind: 'difference';
      lines: string[];
      /** Rendered as an error block after the lines. */
      message?: string;
      exitCode: ExitCode;
    };

export interface ArchiveSummary {
  path: string;
  lines: string[];
}

export interface DiffReport {
  readonly mode: DiffMode;
  readonly archiveA: ArchiveSummary;
  readonly archiveB: ArchiveSummary;
  readonly identical: boolean;
  readonly summaryDiff: readonly string[];
  readonly content: ContentSection;
  readonly exitCode: ExitCode;
}

export interface CheckResult {
  identical: boolean;
  /** Entries added, removed or whose contents differ. */
  differences: number;
}
