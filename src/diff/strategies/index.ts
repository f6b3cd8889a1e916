import type { ContentSection } from '../report.js';
import type { ContentDiffContext } from './types.js';
import { diffFileNames } from './fileName.js';
import { diffWithGit, diffWithGnu } from './external.js';
import { DiffMode } from '../../types/enums.js';

export type { ContentDiffContext } from './types.js';

export async function compareContents(mode: DiffMode, context: ContentDiffContext): Promise<ContentSection> {
  switch (mode) {
    case DiffMode.FILE_NAME:
      return diffFileNames(context);
    case DiffMode.GNU:
      return diffWithGnu(context);
    case DiffMode.GIT:
      return diffWithGit(context);
  }
}
