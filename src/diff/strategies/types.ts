import type { ArchiveHandle } from '../../archive/types.js';
import type { ExternalComparator } from '../comparator.js';

export interface ContentDiffContext {
  archiveA: ArchiveHandle;
  archiveB: ArchiveHandle;
  comparator: ExternalComparator;
  platform: NodeJS.Platform;
  /** Parent of the per-invocation temporary directory. */
  tmpDir: string;
}
