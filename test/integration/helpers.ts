import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import yazl from 'yazl';
import { PharBuilder } from '../../src/archive/phar/PharBuilder.js';

export const FIXED_TIMESTAMP = new Date('2024-01-01T00:00:00.000Z');

export function createTempDir(prefix = 'pharsmith-int-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

// Writes a PHAR holding `files`; `configure` tweaks the builder before the build.
export function createPhar(
  pharPath: string,
  files: Record<string, string>,
  configure: (builder: PharBuilder) => void = () => undefined
): Buffer {
  const builder = new PharBuilder(FIXED_TIMESTAMP);
  for (const [name, contents] of Object.entries(files)) {
    builder.addFile(name, contents);
  }
  configure(builder);
  const buffer = builder.build();
  fs.writeFileSync(pharPath, buffer);
  return buffer;
}

export interface ZipFixtureEntry {
  name: string;
  content?: string | Buffer;
  directory?: boolean;
  compress?: boolean;
}

export function createZip(zipPath: string, entries: ZipFixtureEntry[]): Promise<void> {
  const zip = new yazl.ZipFile();
  for (const entry of entries) {
    if (entry.directory) {
      zip.addEmptyDirectory(entry.name, { mtime: FIXED_TIMESTAMP });
      continue;
    }
    const content = typeof entry.content === 'string' ? Buffer.from(entry.content, 'utf8') : entry.content ?? Buffer.alloc(0);
    zip.addBuffer(content, entry.name, { mtime: FIXED_TIMESTAMP, compress: entry.compress ?? true });
  }
  zip.end();
  return new Promise((resolve, reject) => {
    const out = fs.createWriteStream(zipPath);
    zip.outputStream.pipe(out);
    out.on('close', () => resolve());
    out.on('error', reject);
  });
}
