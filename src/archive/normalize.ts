import { ArchiveEntryError } from '../errors.js';
import { ErrorCode } from '../types/enums.js';

export function normalizeEntryPath(name: string): string {
  let normalized = name.replace(/\\/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  if (normalized.startsWith('/')) {
    throw new ArchiveEntryError(ErrorCode.INVALID_ENTRY_PATH, `Absolute entry path "${name}"`);
  }
  const parts: string[] = [];
  for (const part of normalized.split('/')) {
    if (part.length === 0) {
      throw new ArchiveEntryError(ErrorCode.INVALID_ENTRY_PATH, `Empty segment in entry path "${name}"`);
    }
    if (part === '..') {
      throw new ArchiveEntryError(ErrorCode.INVALID_ENTRY_PATH, `Entry path "${name}" escapes the archive`);
    }
    if (part === '.') {
      continue;
    }
    parts.push(part);
  }
  if (parts.length === 0) {
    throw new ArchiveEntryError(ErrorCode.INVALID_ENTRY_PATH, `Empty entry path "${name}"`);
  }
  return parts.join('/');
}
